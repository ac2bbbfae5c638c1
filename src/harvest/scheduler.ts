import pLimit from 'p-limit';
import type { CatalogEntry } from '../shared/topics.js';
import { CancelledError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { randomBetween, sleep as defaultSleep } from '../shared/utils.js';

/** Counting semaphore returned by `p-limit`. */
export type Limit = ReturnType<typeof pLimit>;

export function createLimit(concurrency: number): Limit {
  return pLimit(Math.max(1, Math.floor(concurrency)));
}

export interface SchedulerOptions {
  maxConcurrentTopics: number;
  interTaskDelayMinMs: number;
  interTaskDelayMaxMs: number;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export type TopicWork<T> = (entry: CatalogEntry) => Promise<T>;
export type TopicFailure<T> = (entry: CatalogEntry, err: unknown) => T;

/**
 * Admits at most maxConcurrentTopics tasks at once. Each task keeps its slot
 * through a randomized cool-down after finishing, so the next admission is
 * spaced out. A task that throws is converted through `onError` and never
 * affects its siblings.
 */
export class Scheduler {
  private readonly limit: Limit;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private readonly options: SchedulerOptions) {
    this.limit = createLimit(options.maxConcurrentTopics);
    this.sleep = options.sleep ?? defaultSleep;
  }

  get activeCount(): number {
    return this.limit.activeCount;
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  async run<T>(
    entries: readonly CatalogEntry[],
    work: TopicWork<T>,
    onError: TopicFailure<T>,
  ): Promise<T[]> {
    logger.info(
      { topics: entries.length, maxConcurrentTopics: this.options.maxConcurrentTopics },
      'Scheduling topics',
    );
    return Promise.all(entries.map((entry) => this.limit(() => this.runOne(entry, work, onError))));
  }

  private async runOne<T>(
    entry: CatalogEntry,
    work: TopicWork<T>,
    onError: TopicFailure<T>,
  ): Promise<T> {
    if (this.options.signal?.aborted) {
      return onError(entry, new CancelledError());
    }

    let result: T;
    try {
      result = await work(entry);
    } catch (err) {
      logger.error(
        { category: entry.category, topic: entry.topic, error: errorMessage(err) },
        'Topic task failed unexpectedly',
      );
      result = onError(entry, err);
    }

    await this.coolDown();
    return result;
  }

  private async coolDown(): Promise<void> {
    const { interTaskDelayMinMs, interTaskDelayMaxMs, signal } = this.options;
    const delayMs = randomBetween(interTaskDelayMinMs, interTaskDelayMaxMs);
    try {
      await this.sleep(delayMs, signal);
    } catch (err) {
      logger.debug({ error: errorMessage(err) }, 'Inter-task delay interrupted');
    }
  }
}
