export {
  classifyContent,
  classifyLine,
  classifyPrice,
  classifyDetails,
  classifyValidity,
  isNameCandidate,
} from './classify';
export type { ContentClassification, LineClassification } from './classify';
export {
  PRICE_MARKERS,
  DETAIL_RULES,
  VALIDITY_RULES,
  UNKNOWN_BUNDLE,
  NO_PRICE,
  NO_DETAILS,
} from './rules';
export type { DetailKind, DetailRule, ValidityRule } from './rules';
