/**
 * Raw record extracted from the content source, before filtering and dedup.
 */
export interface CandidateRecord {
  readonly sourceItemId: string;
  readonly title: string;
  readonly description: string;
  readonly imageRef: string;
  readonly pinUrl: string;
  readonly category: string;
  readonly topic: string;
  readonly scrapedAt: string;
}

/**
 * A candidate that passed the text filter and won the dedup insert.
 */
export interface AcceptedRecord extends CandidateRecord {
  readonly fingerprint: string;
}

/**
 * On-disk JSON shape of an accepted record.
 */
export interface PinJson {
  pin_id: string;
  title: string;
  description: string;
  image_url: string;
  pin_url: string;
  category: string;
  topic: string;
  scraped_at: string;
}

export const END_OF_STREAM = Symbol('end-of-stream');
export type EndOfStream = typeof END_OF_STREAM;

/**
 * One open browsing session for a topic. Each call to nextBatch drives the
 * source forward (scrolls, pages) and returns whatever cards are visible.
 */
export interface RecordSession {
  nextBatch(signal?: AbortSignal): Promise<CandidateRecord[] | EndOfStream>;
  close(): Promise<void>;
}

export interface RecordSource {
  open(category: string, topic: string, signal?: AbortSignal): Promise<RecordSession>;
}

export interface TopicTask {
  readonly category: string;
  readonly topic: string;
  readonly attempt: number;
}

export type HarvestStatus = 'succeeded' | 'exhausted' | 'aborted';

export interface TopicResult {
  status: HarvestStatus;
  category: string;
  topic: string;
  records: AcceptedRecord[];
  attempts: number;
  filteredText: number;
  duplicates: number;
  error?: string;
}

export type DownloadOutcome = 'saved' | 'skipped_existing' | 'failed_fetch' | 'filtered_unsafe';

export interface AssetResult {
  sourceItemId: string;
  path: string;
  outcome: DownloadOutcome;
  error?: string;
}

export interface AssetBatchStats {
  saved: number;
  skippedExisting: number;
  failedFetch: number;
  filteredUnsafe: number;
  outcomes: AssetResult[];
}

export function toPinJson(record: AcceptedRecord): PinJson {
  return {
    pin_id: record.sourceItemId,
    title: record.title,
    description: record.description,
    image_url: record.imageRef,
    pin_url: record.pinUrl,
    category: record.category,
    topic: record.topic,
    scraped_at: record.scrapedAt,
  };
}
