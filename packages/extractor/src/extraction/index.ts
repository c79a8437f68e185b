export { extractOffer, extractOffers, isUsableOffer } from './pattern';
export { PatternStrategy, withFallback, validateOperator, inputToText, isRawBlock } from './strategy';
export {
  normalizeLines,
  toRawBlock,
  splitIntoBlocks,
  extractBlocksFromHtml,
  DEFAULT_CARD_ANCHORS,
  DEFAULT_CARD_DEPTH,
} from './blocks';
export type { HtmlBlockOptions } from './blocks';
export type { ExtractionStrategy, ExtractionInput } from './types';
