/**
 * @potledger/currency — Currency Directory.
 *
 * Currencies, directional exchange-rate history, and conversion.
 */

export { CurrencyDirectory } from "./directory.js";
export type { CurrencyDirectoryOptions, RegisterCurrencyInput } from "./directory.js";

export {
  convertIn,
  endOfDay,
  normalizeCode,
  normalizeRate,
  normalizeTimestamp,
  rateAtIn,
  rateHistoryIn,
  requireCurrencyIn,
  setRateIn,
} from "./rates.js";

export { DEFAULT_SEED_FILE, loadSeedEntries, parseSeedEntries, seedCurrencies } from "./seed.js";

export { CurrencyError } from "./errors.js";
export type { CurrencyErrorCode } from "./errors.js";
