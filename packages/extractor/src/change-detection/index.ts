// Change detection module exports
export {
  compareOffer,
  compareToHistory,
  NEW_OFFER_REMARK,
  DEFAULT_SAME_LABEL,
  DETAILS_UPDATED,
} from './detect';
export { detectPriceChange, formatPriceChange } from './price';
export { detectDetailsChange, splitDetails } from './details';
export type { CompareOptions } from './types';
