import type { ChangeResult, ChangeStatus, ExtractedOffer, LedgerRow } from '@offerscope/shared';
import { compareToHistory } from '../change-detection/detect';
import type { CompareOptions } from '../change-detection/types';
import type { ExtractionInput, ExtractionStrategy } from '../extraction/types';
import { buildLookup, formatLedgerDate, toLedgerRow, type LedgerReader, type LedgerWriter } from '../ledger/ledger';
import { toError } from '../utils/errors';
import { ExtractorLogger, pipelineLogger } from '../utils/logger';

export interface OfferSource {
  operator: string;
  /** Page text or a single card block from the page-text provider */
  text: ExtractionInput;
}

export interface TrackOptions {
  sources: OfferSource[];
  strategy: ExtractionStrategy;
  reader: LedgerReader;
  writer: LedgerWriter;
  /** Date stamped on every row, defaults to now */
  date?: Date;
  compare?: CompareOptions;
  logger?: ExtractorLogger;
}

export interface TrackedOffer {
  offer: ExtractedOffer;
  result: ChangeResult;
  row: LedgerRow;
}

export interface TrackSummary {
  date: string;
  offers: TrackedOffer[];
  rows: LedgerRow[];
  counts: Record<ChangeStatus, number>;
  /** Operators whose extraction rejected */
  failedSources: string[];
}

/**
 * One tracking run.
 *
 * The ledger is read once before any source is processed, so offers first
 * seen in this run are compared against history only, never against each
 * other. All rows are appended in a single call at the end.
 */
export async function trackOffers(options: TrackOptions): Promise<TrackSummary> {
  const logger = options.logger ?? pipelineLogger;
  const date = formatLedgerDate(options.date ?? new Date());

  const history = await options.reader.getAllRecords();
  const lookup = buildLookup(history);
  logger.info(`Loaded ${history.length} historical rows`);

  const offers: TrackedOffer[] = [];
  const failedSources: string[] = [];
  const counts: Record<ChangeStatus, number> = { new: 0, same: 0, changed: 0 };

  for (const source of options.sources) {
    let extracted: ExtractedOffer[];
    try {
      extracted = await options.strategy.extract(source.operator, source.text);
    } catch (error) {
      logger.error(`${source.operator}: extraction failed`, toError(error));
      failedSources.push(source.operator);
      continue;
    }

    logger.info(`${source.operator}: ${extracted.length} offers via ${options.strategy.name}`);

    for (const offer of extracted) {
      const result = compareToHistory(offer, lookup, options.compare);
      counts[result.status] += 1;
      offers.push({ offer, result, row: toLedgerRow(date, offer, result.remark) });
    }
  }

  const rows = offers.map(tracked => tracked.row);
  if (rows.length > 0) {
    await options.writer.appendRows(rows);
    logger.info(`Appended ${rows.length} rows`);
  } else {
    logger.warn('Run finished with 0 offers, nothing appended');
  }

  return { date, offers, rows, counts, failedSources };
}
