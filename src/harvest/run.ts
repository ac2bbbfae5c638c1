import type { Config } from '../shared/config.js';
import type { CatalogEntry } from '../shared/topics.js';
import { loadTopicCatalog, selectTopics } from '../shared/topics.js';
import type { AcceptedRecord, AssetBatchStats, HarvestStatus, RecordSource } from './types.js';
import { Deduplicator } from './dedup.js';
import { ProgressLedger, type RunProgress } from './progress.js';
import { Scheduler, createLimit } from './scheduler.js';
import { harvestTopic } from './topicHarvester.js';
import { AssetPipeline } from '../assets/assetPipeline.js';
import { createImageClassifier, type ImageClassifier } from '../safety/classifier.js';
import { ResultStore } from '../store/resultStore.js';
import { errorMessage } from '../shared/errors.js';
import type { FetchLike } from '../shared/http.js';
import { logger } from '../shared/logger.js';
import { generateId, resolvePath } from '../shared/utils.js';

export interface RunDependencies {
  source: RecordSource;
  /** Overrides the classifier built from config; null disables image filtering. */
  classifier?: ImageClassifier | null;
  /** Overrides the catalog selection from config. */
  entries?: CatalogEntry[];
  fetchImpl?: FetchLike;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  signal?: AbortSignal;
}

export type AssetTotals = Omit<AssetBatchStats, 'outcomes'>;

export interface TopicReport {
  category: string;
  topic: string;
  status: HarvestStatus;
  accepted: number;
  attempts: number;
  filteredText: number;
  duplicates: number;
  assets?: AssetTotals;
  error?: string;
}

export interface RunSummary {
  runId: string;
  outputRoot: string;
  progress: RunProgress;
  topics: TopicReport[];
  assets: AssetTotals;
  filteredText: number;
  duplicates: number;
  /** Null when the master file could not be written; see masterError. */
  masterPath: string | null;
  masterError?: string;
  durationMs: number;
}

function emptyAssetTotals(): AssetTotals {
  return { saved: 0, skippedExisting: 0, failedFetch: 0, filteredUnsafe: 0 };
}

function totalsOf(stats: AssetBatchStats): AssetTotals {
  return {
    saved: stats.saved,
    skippedExisting: stats.skippedExisting,
    failedFetch: stats.failedFetch,
    filteredUnsafe: stats.filteredUnsafe,
  };
}

function resolveClassifier(config: Config, deps: RunDependencies): ImageClassifier | null {
  if (deps.classifier !== undefined) return deps.classifier;
  try {
    return createImageClassifier(config.image_filter, deps.fetchImpl);
  } catch (err) {
    logger.error({ error: errorMessage(err) }, 'Failed to initialize image classifier');
    logger.info('Proceeding without image safety filtering');
    return null;
  }
}

/**
 * Harvest every selected topic, persist JSON, download images, and write the master file.
 */
export async function runHarvest(config: Config, deps: RunDependencies): Promise<RunSummary> {
  const startTime = Date.now();
  const runId = generateId(10);
  const store = new ResultStore(resolvePath(config.output.root));
  store.ensureRoot();

  const entries =
    deps.entries ?? selectTopics(loadTopicCatalog(config.topics_file || undefined), config.harvest.categories);
  logger.info({ runId, topics: entries.length, categories: config.harvest.categories }, 'Run starting');

  const dedup = new Deduplicator();
  const ledger = new ProgressLedger(entries.length);
  const downloadLimit = createLimit(config.assets.max_concurrent_downloads);
  const assets = config.assets.download_images
    ? new AssetPipeline({
        outputRoot: store.outputRoot,
        downloadLimit,
        classifier: resolveClassifier(config, deps),
        fetchTimeoutMs: config.assets.fetch_timeout_ms,
        userAgent: config.assets.user_agent,
        referer: config.assets.referer,
        fetchImpl: deps.fetchImpl,
        signal: deps.signal,
      })
    : null;

  const scheduler = new Scheduler({
    maxConcurrentTopics: config.harvest.max_concurrent_topics,
    interTaskDelayMinMs: config.harvest.inter_task_delay_min_ms,
    interTaskDelayMaxMs: config.harvest.inter_task_delay_max_ms,
    signal: deps.signal,
    sleep: deps.sleep,
  });

  const allRecords: AcceptedRecord[] = [];
  const assetTotals = emptyAssetTotals();

  const processTopic = async (entry: CatalogEntry): Promise<TopicReport> => {
    const result = await harvestTopic(entry.category, entry.topic, deps.source, dedup, {
      maxRecords: config.harvest.max_pins_per_topic,
      maxPulls: config.harvest.max_pulls,
      maxRetries: config.harvest.max_retries,
      backoffBaseMs: config.harvest.backoff_base_ms,
      signal: deps.signal,
      sleep: deps.sleep,
    });

    const report: TopicReport = {
      category: entry.category,
      topic: entry.topic,
      status: result.status,
      accepted: result.records.length,
      attempts: result.attempts,
      filteredText: result.filteredText,
      duplicates: result.duplicates,
    };

    if (result.status !== 'succeeded') {
      report.error = result.error;
      ledger.recordTopicFailure(entry.category, entry.topic);
      logger.warn({ category: entry.category, topic: entry.topic, status: result.status }, 'No pins collected');
      return report;
    }

    allRecords.push(...result.records);

    try {
      await store.writeTopic(entry.category, entry.topic, result.records);
    } catch (err) {
      report.error = errorMessage(err);
      logger.error({ category: entry.category, topic: entry.topic, error: report.error }, 'Topic JSON write failed');
    }

    if (assets) {
      const batch = totalsOf(await assets.downloadBatch(result.records));
      report.assets = batch;
      assetTotals.saved += batch.saved;
      assetTotals.skippedExisting += batch.skippedExisting;
      assetTotals.failedFetch += batch.failedFetch;
      assetTotals.filteredUnsafe += batch.filteredUnsafe;

      logger.info(
        { category: entry.category, topic: entry.topic, ...batch, total: result.records.length },
        'Images processed',
      );
    }

    ledger.recordTopicCompletion(entry.category, result.records.length, entry.topic);
    return report;
  };

  const onTaskError = (entry: CatalogEntry, err: unknown): TopicReport => {
    ledger.recordTopicFailure(entry.category, entry.topic);
    return {
      category: entry.category,
      topic: entry.topic,
      status: 'aborted',
      accepted: 0,
      attempts: 0,
      filteredText: 0,
      duplicates: 0,
      error: errorMessage(err),
    };
  };

  const topics = await scheduler.run(entries, processTopic, onTaskError);
  let masterPath: string | null = null;
  let masterError: string | undefined;
  try {
    masterPath = await store.writeMaster(allRecords);
  } catch (err) {
    masterError = errorMessage(err);
    logger.error({ runId, error: masterError }, 'Master JSON write failed');
  }
  const progress = ledger.snapshot();

  const summary: RunSummary = {
    runId,
    outputRoot: store.outputRoot,
    progress,
    topics,
    assets: assetTotals,
    filteredText: topics.reduce((n, t) => n + t.filteredText, 0),
    duplicates: topics.reduce((n, t) => n + t.duplicates, 0),
    masterPath,
    durationMs: Date.now() - startTime,
  };
  if (masterError) summary.masterError = masterError;

  logger.info(
    {
      runId,
      completed: progress.completedTopics,
      total: progress.totalTopics,
      failed: progress.failedTopics,
      uniquePins: progress.totalAccepted,
      masterPath,
      durationMs: summary.durationMs,
    },
    'Run complete',
  );
  return summary;
}
