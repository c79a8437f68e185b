import * as cheerio from 'cheerio';
import type { RawBlock } from '@offerscope/shared';

export interface HtmlBlockOptions {
  /** Phrases that mark an element inside an offer card (case-insensitive) */
  anchors?: string[];
  /** How many ancestors to climb from the anchor element to reach the card */
  depth?: number;
}

export const DEFAULT_CARD_ANCHORS = ['Consumer Price', 'MORE DETAILS', 'SUBSCRIBE'];
export const DEFAULT_CARD_DEPTH = 3;

const BLOCK_TAGS =
  'address, article, aside, blockquote, button, dd, div, dl, dt, footer, h1, h2, h3, h4, h5, h6, header, li, main, nav, ol, p, section, table, td, th, tr, ul';

/**
 * Trim every line and drop the empty ones
 */
export function normalizeLines(lines: readonly string[]): string[] {
  return lines.map(line => line.trim()).filter(line => line.length > 0);
}

/**
 * Split a multi-line string into a RawBlock
 */
export function toRawBlock(text: string): RawBlock {
  return normalizeLines(text.split(/\r?\n/));
}

/**
 * Split page text into blocks on blank lines.
 * Lines with only whitespace count as blank.
 */
export function splitIntoBlocks(pageText: string): RawBlock[] {
  return pageText
    .split(/\r?\n\s*\r?\n/)
    .map(toRawBlock)
    .filter(block => block.length > 0);
}

/**
 * Find offer cards in rendered HTML.
 *
 * Every element whose own text contains an anchor phrase is walked up `depth`
 * ancestors; the element reached is taken as the card. Each card is returned
 * once, as the visible text lines it contains, in document order.
 */
export function extractBlocksFromHtml(html: string, options: HtmlBlockOptions = {}): RawBlock[] {
  const anchors = (options.anchors ?? DEFAULT_CARD_ANCHORS).map(a => a.toLowerCase());
  const depth = options.depth ?? DEFAULT_CARD_DEPTH;

  const $ = cheerio.load(html);
  $('script, style, noscript, template').remove();

  // Line breaks at block boundaries so text() keeps the visual lines
  $('br').replaceWith('\n');
  $(BLOCK_TAGS).after('\n');

  const seen = new Set<unknown>();
  const blocks: RawBlock[] = [];

  $('body *').each((_, el) => {
    const element = $(el);
    const ownText = element.clone().children().remove().end().text().toLowerCase();
    if (!anchors.some(anchor => ownText.includes(anchor))) {
      return;
    }

    let card = element;
    for (let i = 0; i < depth; i++) {
      const parent = card.parent();
      if (parent.length === 0) {
        break;
      }
      card = parent;
    }

    const node = card.get(0);
    if (node === undefined || seen.has(node)) {
      return;
    }
    seen.add(node);

    const block = toRawBlock(card.text());
    if (block.length > 0) {
      blocks.push(block);
    }
  });

  return blocks;
}
