import type { Logger } from 'pino';
import type {
  AcceptedRecord,
  CandidateRecord,
  RecordSession,
  RecordSource,
  TopicResult,
  TopicTask,
} from './types.js';
import { END_OF_STREAM } from './types.js';
import type { Deduplicator } from './dedup.js';
import { fingerprint } from './dedup.js';
import { isTextSafe } from './textFilter.js';
import { CancelledError, SourceError, errorMessage, isTransient } from '../shared/errors.js';
import { logger as rootLogger } from '../shared/logger.js';
import { sleep as defaultSleep } from '../shared/utils.js';

export interface HarvesterOptions {
  maxRecords: number;
  maxPulls: number;
  maxRetries: number;
  backoffBaseMs: number;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onAccepted?: (record: AcceptedRecord, acceptedSoFar: number) => void;
}

export type HarvestState =
  | { kind: 'starting'; task: TopicTask }
  | { kind: 'collecting'; task: TopicTask; session: RecordSession }
  | { kind: 'backoff'; task: TopicTask }
  | { kind: 'succeeded'; task: TopicTask }
  | { kind: 'exhausted'; task: TopicTask; error: string }
  | { kind: 'aborted'; task: TopicTask; error: string };

type TerminalState = Extract<HarvestState, { kind: 'succeeded' | 'exhausted' | 'aborted' }>;

function isTerminal(state: HarvestState): state is TerminalState {
  return state.kind === 'succeeded' || state.kind === 'exhausted' || state.kind === 'aborted';
}

/**
 * Drives one topic through Starting → Collecting → Succeeded | Exhausted | Aborted.
 *
 * Retries only rescue attempts that produced nothing: once any record has
 * been accepted, a later failure ends the topic as Succeeded with what was
 * collected. The backoff before attempt n+1 is backoffBaseMs × (n+1).
 */
export class TopicHarvester {
  private readonly records: AcceptedRecord[] = [];
  private filteredText = 0;
  private duplicates = 0;
  private readonly log: Logger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly category: string,
    private readonly topic: string,
    private readonly source: RecordSource,
    private readonly dedup: Deduplicator,
    private readonly options: HarvesterOptions,
  ) {
    this.log = rootLogger.child({ category, topic });
    this.sleep = options.sleep ?? defaultSleep;
  }

  async run(): Promise<TopicResult> {
    let state: HarvestState = {
      kind: 'starting',
      task: { category: this.category, topic: this.topic, attempt: 0 },
    };

    this.log.info('Starting topic');
    while (!isTerminal(state)) {
      state = await this.step(state);
    }

    return this.finish(state);
  }

  private async step(state: Exclude<HarvestState, TerminalState>): Promise<HarvestState> {
    switch (state.kind) {
      case 'starting':
        return this.start(state.task);
      case 'collecting':
        return this.collect(state.task, state.session);
      case 'backoff':
        return this.backoff(state.task);
    }
  }

  private async start(task: TopicTask): Promise<HarvestState> {
    if (this.options.signal?.aborted) {
      return { kind: 'aborted', task, error: new CancelledError().message };
    }
    try {
      const session = await this.source.open(task.category, task.topic, this.options.signal);
      return { kind: 'collecting', task, session };
    } catch (err) {
      return this.onFailure(task, err);
    }
  }

  private async collect(task: TopicTask, session: RecordSession): Promise<HarvestState> {
    const { maxRecords, maxPulls, signal } = this.options;
    let pulls = 0;

    try {
      while (this.records.length < maxRecords && pulls < maxPulls) {
        if (signal?.aborted) throw new CancelledError();

        const batch = await session.nextBatch(signal);
        pulls++;
        if (batch === END_OF_STREAM) {
          this.log.debug({ pulls }, 'Source reports no further content');
          break;
        }
        this.accept(batch);
      }
    } catch (err) {
      await this.closeSession(session);
      if (this.records.length > 0) {
        this.log.warn(
          { error: errorMessage(err), kept: this.records.length },
          'Collection failed after partial success, keeping records',
        );
        return { kind: 'succeeded', task };
      }
      return this.onFailure(task, err);
    }

    await this.closeSession(session);

    if (pulls >= maxPulls && this.records.length < maxRecords) {
      this.log.debug({ pulls }, 'Pull ceiling reached');
    }
    if (this.records.length > 0) {
      return { kind: 'succeeded', task };
    }
    return this.onFailure(task, new SourceError('No records collected', { pulls }));
  }

  private accept(batch: CandidateRecord[]): void {
    for (const candidate of batch) {
      if (this.records.length >= this.options.maxRecords) break;

      if (!isTextSafe(candidate.title, candidate.description)) {
        this.filteredText++;
        this.log.debug({ title: candidate.title.slice(0, 50) }, 'Filtered unsafe text');
        continue;
      }

      const fp = fingerprint(candidate.sourceItemId);
      if (!this.dedup.tryAccept(fp)) {
        this.duplicates++;
        continue;
      }

      const record: AcceptedRecord = Object.freeze({ ...candidate, fingerprint: fp });
      this.records.push(record);
      this.options.onAccepted?.(record, this.records.length);
    }
  }

  private onFailure(task: TopicTask, err: unknown): HarvestState {
    if (!isTransient(err)) {
      this.log.error({ attempt: task.attempt + 1, error: errorMessage(err) }, 'Topic aborted');
      return { kind: 'aborted', task, error: errorMessage(err) };
    }

    this.log.warn({ attempt: task.attempt + 1, error: errorMessage(err) }, 'Attempt failed');
    if (task.attempt < this.options.maxRetries) {
      return { kind: 'backoff', task };
    }

    this.log.error(
      { attempts: task.attempt + 1, error: errorMessage(err) },
      'All attempts failed',
    );
    return { kind: 'exhausted', task, error: errorMessage(err) };
  }

  private async backoff(task: TopicTask): Promise<HarvestState> {
    const waitMs = this.options.backoffBaseMs * (task.attempt + 1);
    this.log.info({ waitMs }, 'Retrying after backoff');
    try {
      await this.sleep(waitMs, this.options.signal);
    } catch (err) {
      return { kind: 'aborted', task, error: errorMessage(err) };
    }
    return { kind: 'starting', task: { ...task, attempt: task.attempt + 1 } };
  }

  private async closeSession(session: RecordSession): Promise<void> {
    try {
      await session.close();
    } catch (err) {
      this.log.debug({ error: errorMessage(err) }, 'Session close failed');
    }
  }

  private finish(state: TerminalState): TopicResult {
    const result: TopicResult = {
      status: state.kind,
      category: this.category,
      topic: this.topic,
      records: [...this.records],
      attempts: state.task.attempt + 1,
      filteredText: this.filteredText,
      duplicates: this.duplicates,
    };
    if (state.kind !== 'succeeded') {
      result.error = state.error;
    }
    return result;
  }
}

export function harvestTopic(
  category: string,
  topic: string,
  source: RecordSource,
  dedup: Deduplicator,
  options: HarvesterOptions,
): Promise<TopicResult> {
  return new TopicHarvester(category, topic, source, dedup, options).run();
}
