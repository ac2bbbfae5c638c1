import fs from 'node:fs';
import path from 'node:path';
import type { AcceptedRecord, AssetBatchStats, AssetResult } from '../harvest/types.js';
import type { Limit } from '../harvest/scheduler.js';
import type { ImageClassifier } from '../safety/classifier.js';
import { FetchError, errorMessage } from '../shared/errors.js';
import { withTimeout, type FetchLike } from '../shared/http.js';
import { logger } from '../shared/logger.js';
import { topicSlug } from '../shared/utils.js';
import { toOriginalsUrl } from './imageUrl.js';

export interface AssetPipelineOptions {
  outputRoot: string;
  /** Download budget shared by every topic in the run. */
  downloadLimit: Limit;
  classifier: ImageClassifier | null;
  fetchTimeoutMs: number;
  userAgent: string;
  referer: string;
  fetchImpl?: FetchLike;
  signal?: AbortSignal;
}

export function imagesDir(outputRoot: string, category: string, topic: string): string {
  return path.join(outputRoot, category, topicSlug(topic), 'images');
}

export function imagePath(outputRoot: string, record: AcceptedRecord): string {
  return path.join(imagesDir(outputRoot, record.category, record.topic), `${record.sourceItemId}.jpg`);
}

/**
 * Fetches full-resolution images for accepted records, runs the optional
 * image classifier on the in-memory bytes, and writes survivors to disk.
 *
 * Per-item failures become outcomes; downloadBatch never rejects.
 * A classifier error lets the image through (fail-open).
 */
export class AssetPipeline {
  constructor(private readonly options: AssetPipelineOptions) {}

  /**
   * Only records whose image file already exists are skipped. Items that were
   * filtered or failed on an earlier run have no file and are fetched again.
   */
  async downloadBatch(records: readonly AcceptedRecord[]): Promise<AssetBatchStats> {
    const outcomes = await Promise.all(
      records.map((record) => this.options.downloadLimit(() => this.processRecord(record))),
    );

    const stats: AssetBatchStats = {
      saved: 0,
      skippedExisting: 0,
      failedFetch: 0,
      filteredUnsafe: 0,
      outcomes,
    };
    for (const result of outcomes) {
      switch (result.outcome) {
        case 'saved':
          stats.saved++;
          break;
        case 'skipped_existing':
          stats.skippedExisting++;
          break;
        case 'failed_fetch':
          stats.failedFetch++;
          break;
        case 'filtered_unsafe':
          stats.filteredUnsafe++;
          break;
      }
    }
    return stats;
  }

  private async processRecord(record: AcceptedRecord): Promise<AssetResult> {
    const target = imagePath(this.options.outputRoot, record);
    const base = { sourceItemId: record.sourceItemId, path: target };

    if (fs.existsSync(target)) {
      return { ...base, outcome: 'skipped_existing' };
    }

    let bytes: ArrayBuffer;
    try {
      bytes = await this.fetchImage(toOriginalsUrl(record.imageRef));
    } catch (err) {
      logger.debug({ pin: record.sourceItemId, error: errorMessage(err) }, 'Image fetch failed');
      return { ...base, outcome: 'failed_fetch', error: errorMessage(err) };
    }

    if (await this.isUnsafe(record, bytes)) {
      return { ...base, outcome: 'filtered_unsafe' };
    }

    try {
      await this.writeImage(target, bytes);
    } catch (err) {
      logger.warn({ pin: record.sourceItemId, error: errorMessage(err) }, 'Image write failed');
      return { ...base, outcome: 'failed_fetch', error: errorMessage(err) };
    }

    logger.debug({ pin: record.sourceItemId }, 'Image saved');
    return { ...base, outcome: 'saved' };
  }

  private async fetchImage(url: string): Promise<ArrayBuffer> {
    const fetchImpl = this.options.fetchImpl ?? fetch;
    return withTimeout(this.options.fetchTimeoutMs, this.options.signal, async (signal) => {
      const response = await fetchImpl(url, {
        headers: {
          'User-Agent': this.options.userAgent,
          Referer: this.options.referer,
        },
        signal,
      });
      if (!response.ok) {
        throw new FetchError(`HTTP ${response.status}`, { url, status: response.status });
      }
      return response.arrayBuffer();
    });
  }

  private async isUnsafe(record: AcceptedRecord, bytes: ArrayBuffer): Promise<boolean> {
    const { classifier } = this.options;
    if (!classifier) return false;

    try {
      const verdict = await classifier.scoreImage(bytes, this.options.signal);
      if (verdict.unsafe) {
        logger.debug({ pin: record.sourceItemId, score: verdict.score }, 'Filtered unsafe image');
      }
      return verdict.unsafe;
    } catch (err) {
      logger.debug(
        { pin: record.sourceItemId, error: errorMessage(err) },
        'Image classifier failed, keeping image',
      );
      return false;
    }
  }

  private async writeImage(target: string, bytes: ArrayBuffer): Promise<void> {
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    const partial = `${target}.part`;
    await fs.promises.writeFile(partial, new Uint8Array(bytes));
    await fs.promises.rename(partial, target);
  }
}
