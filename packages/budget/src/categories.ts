/**
 * Category Registry
 *
 * Categories label transactions for reporting. They form a forest:
 * each category has at most one parent, and following parents always
 * reaches a root.
 *
 * Rules:
 * - A parent must exist when it is set
 * - A category can never become its own ancestor (CATEGORY_CYCLE)
 * - Categories are never deleted, so a transaction's category always resolves
 * - Siblings are listed in creation order
 */

import type { Category, CategoryNode, Transaction } from "@potledger/types";
import { LedgerError, categoryTransactions, requireCategory } from "@potledger/ledger";
import type { DateRange, LedgerReader, LedgerStore } from "@potledger/ledger";
import type { CategoryPatch, CategoryTransactionsOptions } from "./types.js";

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export interface CategoryRegistryOptions {
  readonly now?: (() => Date) | undefined;
}

// =============================================================================
// Queries over a reader
// =============================================================================

export function childrenIn(reader: LedgerReader, categoryId: number): readonly Category[] {
  requireCategory(reader, categoryId);
  return reader.categories.find((category) => category.parentId === categoryId);
}

function nodeOf(reader: LedgerReader, category: Category): CategoryNode {
  return {
    id: category.id,
    name: category.name,
    children: reader.categories
      .find((child) => child.parentId === category.id)
      .map((child) => nodeOf(reader, child)),
  };
}

/**
 * Every root category with its descendants nested under it.
 */
export function hierarchyIn(reader: LedgerReader): readonly CategoryNode[] {
  return reader.categories
    .find((category) => category.parentId === undefined)
    .map((root) => nodeOf(reader, root));
}

/**
 * The category's id followed by the ids of all its descendants, depth first.
 */
export function subtreeIdsIn(reader: LedgerReader, categoryId: number): readonly number[] {
  requireCategory(reader, categoryId);
  const ids: number[] = [];
  const visit = (id: number): void => {
    ids.push(id);
    for (const child of reader.categories.find((category) => category.parentId === id)) {
      visit(child.id);
    }
  };
  visit(categoryId);
  return ids;
}

function assertNotAncestor(reader: LedgerReader, categoryId: number, parentId: number): void {
  let current: Category | undefined = requireCategory(reader, parentId);
  while (current !== undefined) {
    if (current.id === categoryId) {
      throw new LedgerError(
        "CATEGORY_CYCLE",
        `Category ${String(parentId)} cannot be the parent of its ancestor ${String(categoryId)}`,
        { categoryId, parentId },
      );
    }
    current = current.parentId !== undefined ? reader.categories.get(current.parentId) : undefined;
  }
}

// =============================================================================
// Registry
// =============================================================================

export class CategoryRegistry {
  private readonly store: LedgerStore;
  private readonly now: () => Date;

  constructor(store: LedgerStore, options?: CategoryRegistryOptions) {
    this.store = store;
    this.now = options?.now ?? (() => new Date());
  }

  createCategory(name: string, parentId?: number): Category {
    const createdAt = this.now().toISOString();

    return this.store.transaction((session) => {
      const parent = parentId !== undefined ? requireCategory(session, parentId) : undefined;
      return session.categories.insert({
        id: session.nextId("categories"),
        name,
        ...(parent !== undefined ? { parentId: parent.id } : {}),
        createdAt,
      });
    });
  }

  /**
   * Rename a category or move it under another parent.
   * `parentId: null` makes it a root.
   */
  updateCategory(id: number, patch: CategoryPatch): Category {
    return this.store.transaction((session) => {
      const next: Mutable<Category> = { ...requireCategory(session, id) };

      if (patch.name !== undefined) {
        next.name = patch.name;
      }

      if (patch.parentId === null) {
        delete next.parentId;
      } else if (patch.parentId !== undefined) {
        assertNotAncestor(session, id, patch.parentId);
        next.parentId = patch.parentId;
      }

      return session.categories.replace(next);
    });
  }

  get(id: number): Category | undefined {
    return this.store.read((reader) => reader.categories.get(id));
  }

  getAll(): readonly Category[] {
    return this.store.read((reader) => reader.categories.all());
  }

  children(id: number): readonly Category[] {
    return this.store.read((reader) => childrenIn(reader, id));
  }

  fullHierarchy(): readonly CategoryNode[] {
    return this.store.read((reader) => hierarchyIn(reader));
  }

  /**
   * Transactions filed under the category, ordered by (date, id).
   * With `includeSubcategories`, those filed under its descendants too.
   */
  transactions(
    id: number,
    range?: DateRange,
    options?: CategoryTransactionsOptions,
  ): readonly Transaction[] {
    return this.store.read((reader) => {
      const ids = options?.includeSubcategories === true ? subtreeIdsIn(reader, id) : [id];
      return categoryTransactions(reader, ids, range);
    });
  }
}
