import { logger } from '../shared/logger.js';

export interface RunProgress {
  readonly totalTopics: number;
  readonly completedTopics: number;
  readonly failedTopics: number;
  readonly totalAccepted: number;
  readonly perCategory: Readonly<Record<string, number>>;
}

/**
 * Run-wide counters. Updates are synchronous so concurrent harvesters can
 * call them between awaits without interleaving.
 */
export class ProgressLedger {
  private completedTopics = 0;
  private failedTopics = 0;
  private totalAccepted = 0;
  private readonly perCategory = new Map<string, number>();

  constructor(private readonly totalTopics: number) {}

  recordTopicCompletion(category: string, acceptedCount: number, topic?: string): void {
    if (this.completedTopics + this.failedTopics >= this.totalTopics) {
      logger.warn({ category, topic }, 'Topic completion reported past total, ignoring');
      return;
    }
    this.completedTopics++;
    this.totalAccepted += acceptedCount;
    this.perCategory.set(category, (this.perCategory.get(category) ?? 0) + acceptedCount);

    logger.info(
      {
        completed: this.completedTopics,
        total: this.totalTopics,
        totalAccepted: this.totalAccepted,
        category,
        topic,
        accepted: acceptedCount,
      },
      'Topic complete',
    );
  }

  recordTopicFailure(category: string, topic?: string): void {
    if (this.completedTopics + this.failedTopics >= this.totalTopics) return;
    this.failedTopics++;
    logger.debug({ category, topic, failed: this.failedTopics }, 'Topic failure recorded');
  }

  snapshot(): RunProgress {
    return Object.freeze({
      totalTopics: this.totalTopics,
      completedTopics: this.completedTopics,
      failedTopics: this.failedTopics,
      totalAccepted: this.totalAccepted,
      perCategory: Object.freeze(Object.fromEntries(this.perCategory)),
    });
  }
}
