/**
 * @potledger/currency — Error type.
 */

export type CurrencyErrorCode =
  | "DUPLICATE_CURRENCY"
  | "UNKNOWN_CURRENCY"
  | "INVALID_RATE"
  | "INVALID_CURRENCY"
  | "SEED_INVALID";

export class CurrencyError extends Error {
  public readonly code: CurrencyErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: CurrencyErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "CurrencyError";
    this.code = code;
    this.details = details;
  }
}
