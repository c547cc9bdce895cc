/**
 * Company name normalizer barrel exports.
 */
export {
  EMPTY_KEY,
  cleanDisplayName,
  keyTokens,
  normalizeCompanyKey,
  transliterate,
} from "./company";
export type { KeyOptions } from "./company";
export { DEFAULT_ABBREVIATIONS, DEFAULT_LEGAL_SUFFIXES } from "./vocabulary";
