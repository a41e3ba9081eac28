import {
  AppError,
  CancelledError,
  EngineShutdownError,
  ReplayMismatchError,
  toErrorMessage,
} from '../errors';
import type { ActivityHandlers } from './activities';
import { ActivityInvoker, type RetryNotice } from './activity-invoker';
import type { Clock } from './clock';
import type { ConcurrencyLimiter, LimiterToken } from './concurrency-limiter';
import { InstanceJournal, type ReplayLog, type StageEvent } from './replay-log';
import type { RetryPolicy } from './retry-policy';
import type { StatusStore } from './status-store';
import {
  chunkId,
  type ChunkRecord,
  type DocumentRecord,
  type DocumentStage,
  type EmbeddingVector,
  type IndexEntry,
  type RetryCounts,
} from './types';

export type DocumentOutcome = 'indexed' | 'failed' | 'interrupted';

export interface DocumentOrchestratorOptions {
  jobId: string;
  instanceId: string;
  documentId: string;
  ordinal: number;
  indexName: string;
  maxChunkSize: number;
  handlers: ActivityHandlers;
  replayLog: ReplayLog;
  statusStore: StatusStore;
  retryPolicy: RetryPolicy;
  limiter: ConcurrencyLimiter;
  clock: Clock;
  signal: AbortSignal;
}

type FanInState = {
  next: number;
  failure: { error: unknown } | null;
};

export class InvalidChunkSequenceError extends AppError {
  constructor(message: string) {
    super(message, 422, 'INVALID_CHUNKS');
    this.name = 'InvalidChunkSequenceError';
  }
}

/**
 * Checks that chunk sequence indices are 0..n-1 in order and belong to the document.
 */
export function validateChunkSequence(documentId: string, chunks: ChunkRecord[]): ChunkRecord[] {
  if (chunks.length === 0) {
    throw new InvalidChunkSequenceError(`Document ${documentId} produced no chunks (no extractable text)`);
  }

  chunks.forEach((chunk, index) => {
    if (chunk.documentId !== documentId) {
      throw new InvalidChunkSequenceError(
        `Chunk ${index} belongs to ${chunk.documentId}, expected ${documentId}`
      );
    }
    if (chunk.sequence !== index) {
      throw new InvalidChunkSequenceError(
        `Chunk sequence for ${documentId} is not contiguous: expected ${index}, got ${chunk.sequence}`
      );
    }
    if (chunk.text.trim().length === 0) {
      throw new InvalidChunkSequenceError(`Chunk ${index} of ${documentId} is empty`);
    }
  });

  return chunks;
}

/**
 * Per-document state machine: Extract -> Chunk -> Embed (fan-out) -> IndexUpload.
 *
 * State is never restored from a snapshot. An orchestrator starts empty and
 * re-executes its workflow against its journal: transitions already recorded
 * are replayed without being appended again, activity calls already recorded
 * return their recorded result.
 */
export class DocumentOrchestrator {
  readonly jobId: string;
  readonly instanceId: string;
  readonly documentId: string;
  readonly ordinal: number;

  private readonly options: DocumentOrchestratorOptions;
  private readonly journal: InstanceJournal;
  private readonly invoker: ActivityInvoker;
  private readonly recorded: StageEvent[];
  private cursor = 0;
  private currentStage: DocumentStage | null = null;
  private retries: RetryCounts;
  private lastError: string | null = null;
  private failedStage: DocumentStage | null = null;

  private constructor(options: DocumentOrchestratorOptions, journal: InstanceJournal) {
    this.options = options;
    this.jobId = options.jobId;
    this.instanceId = options.instanceId;
    this.documentId = options.documentId;
    this.ordinal = options.ordinal;
    this.journal = journal;
    this.recorded = journal.recordedStages();
    this.retries = journal.retryCounts();
    this.invoker = new ActivityInvoker({
      journal,
      handlers: options.handlers,
      retryPolicy: options.retryPolicy,
      clock: options.clock,
      signal: options.signal,
      onRetry: (notice) => this.recordRetry(notice),
    });
  }

  /**
   * Loads the instance journal and records `listed` if the document is new.
   */
  static async open(options: DocumentOrchestratorOptions): Promise<DocumentOrchestrator> {
    const journal = await InstanceJournal.load(options.replayLog, options.instanceId);
    const orchestrator = new DocumentOrchestrator(options, journal);
    await orchestrator.advance('listed');
    return orchestrator;
  }

  get stage(): DocumentStage | null {
    return this.currentStage;
  }

  /**
   * Outcome already present in the journal, if the document reached a terminal stage before.
   */
  recordedOutcome(): 'indexed' | 'failed' | null {
    const last = this.journal.lastStage();
    if (last === 'indexed' || last === 'failed') {
      return last;
    }
    return null;
  }

  /**
   * Fast-forwards a document whose journal is already terminal and republishes its status.
   */
  async restoreTerminal(): Promise<'indexed' | 'failed'> {
    const outcome = this.recordedOutcome();
    if (outcome === null) {
      throw new ReplayMismatchError(`Instance ${this.instanceId} is not terminal`);
    }

    const last = this.recorded[this.recorded.length - 1];
    this.cursor = this.recorded.length;
    this.currentStage = outcome;
    this.lastError = last?.error ?? null;
    this.failedStage = last?.failedStage ?? null;
    await this.publish();
    return outcome;
  }

  /**
   * Drives the document to a terminal stage. `token` is the admission granted
   * by the engine; it is released when this call settles.
   */
  async run(token: LimiterToken): Promise<DocumentOutcome> {
    const { indexName, maxChunkSize, limiter } = this.options;
    try {
      this.ensureActive();
      await this.advance('extracting');
      const text = await this.invoker.extract(this.activityId('extract'), this.documentId);
      await this.advance('extracted');

      this.ensureActive();
      await this.advance('chunking');
      const chunks = validateChunkSequence(
        this.documentId,
        await this.invoker.chunk(this.activityId('chunk'), text, maxChunkSize)
      );
      await this.advance('chunked');

      this.ensureActive();
      await this.advance('embedding');
      const entries = await this.embedAll(chunks);
      await this.advance('embedded');

      this.ensureActive();
      await this.advance('indexing');
      await this.invoker.indexUpload(this.activityId('indexUpload'), indexName, entries);
      await this.advance('indexed');
      return 'indexed';
    } catch (error) {
      return this.fail(error);
    } finally {
      limiter.release(token);
    }
  }

  /**
   * Settles a document that was listed but never admitted because its job was
   * cancelled. A journal that is already terminal keeps its outcome.
   */
  async cancelBeforeAdmission(): Promise<DocumentOutcome> {
    if (this.recordedOutcome() !== null) {
      return this.restoreTerminal();
    }

    // A document resumed after a restart skips to its last recorded stage and fails from there.
    const last = this.recorded[this.recorded.length - 1];
    if (last && this.cursor < this.recorded.length) {
      this.cursor = this.recorded.length;
      this.currentStage = last.stage;
    }
    return this.fail(new CancelledError());
  }

  private async fail(error: unknown): Promise<DocumentOutcome> {
    if (this.options.signal.reason instanceof EngineShutdownError && error instanceof CancelledError) {
      console.warn(
        `[orchestrator] job=${this.jobId} document="${this.documentId}" stage=${this.currentStage} interrupted by shutdown`
      );
      return 'interrupted';
    }

    if (error instanceof ReplayMismatchError) {
      throw error;
    }

    const failedStage = this.currentStage;
    const message = error instanceof CancelledError ? error.message : toErrorMessage(error);
    await this.advance('failed', { error: message, failedStage: failedStage ?? undefined });
    return 'failed';
  }

  /**
   * Embeds every chunk. The document's own admission token serves as the
   * first lane so it always makes progress; extra lanes borrow tokens from
   * the shared limiter. After the first permanent failure no new chunk
   * starts, in-flight siblings drain and their results are dropped.
   */
  private async embedAll(chunks: ChunkRecord[]): Promise<IndexEntry[]> {
    const { limiter, signal } = this.options;
    const embeddings = new Map<number, EmbeddingVector>();
    const state: FanInState = { next: 0, failure: null };
    const lanesDone = new AbortController();
    const stopLanes = () => lanesDone.abort();
    signal.addEventListener('abort', stopLanes, { once: true });

    const work = async (): Promise<void> => {
      while (state.failure === null && state.next < chunks.length && !signal.aborted) {
        const chunk = chunks[state.next];
        state.next += 1;
        try {
          const embedding = await this.invoker.embed(this.activityId(`embed:${chunk.sequence}`), chunk);
          embeddings.set(chunk.sequence, embedding);
        } catch (error) {
          state.failure ??= { error };
        }
      }
    };

    const borrowedLane = async (): Promise<void> => {
      let token: LimiterToken;
      try {
        token = await limiter.acquire(lanesDone.signal);
      } catch (error) {
        if (error instanceof CancelledError) {
          return;
        }
        throw error;
      }

      try {
        await work();
      } finally {
        limiter.release(token);
      }
    };

    const extraLanes = Math.min(chunks.length - 1, limiter.capacity - 1);
    const borrowed = Array.from({ length: Math.max(0, extraLanes) }, () => borrowedLane());

    try {
      await work();
    } finally {
      lanesDone.abort();
      await Promise.all(borrowed);
      signal.removeEventListener('abort', stopLanes);
    }

    if (state.failure !== null) {
      throw state.failure.error;
    }
    if (signal.aborted) {
      throw new CancelledError();
    }

    return chunks.map((chunk) => {
      const embedding = embeddings.get(chunk.sequence);
      if (!embedding) {
        throw new ReplayMismatchError(`Chunk ${chunkId(chunk)} finished without an embedding`);
      }
      return { chunk, embedding };
    });
  }

  /**
   * Moves to `stage`: replays the next recorded transition if there is one,
   * otherwise appends it to the journal. Either way the status projection is
   * written after the journal.
   */
  private async advance(
    stage: DocumentStage,
    details: { error?: string; failedStage?: DocumentStage } = {}
  ): Promise<void> {
    const recorded = this.recorded[this.cursor];
    if (recorded) {
      if (recorded.stage !== stage) {
        throw new ReplayMismatchError(
          `Instance ${this.instanceId} recorded ${recorded.stage} where replay reached ${stage}`
        );
      }
      this.cursor += 1;
      this.lastError = recorded.error ?? null;
      this.failedStage = recorded.failedStage ?? null;
    } else {
      await this.journal.append({ type: 'stage', stage, ...details });
      this.lastError = details.error ?? null;
      this.failedStage = details.failedStage ?? null;
      const suffix = details.error ? ` failedStage=${details.failedStage} error="${details.error}"` : '';
      const log = stage === 'failed' ? console.error : console.log;
      log(`[orchestrator] job=${this.jobId} document="${this.documentId}" stage=${stage}${suffix}`);
    }

    this.currentStage = stage;
    await this.publish();
  }

  private async recordRetry(notice: RetryNotice): Promise<void> {
    this.retries = {
      ...this.retries,
      [notice.activity]: (this.retries[notice.activity] ?? 0) + 1,
    };
    await this.publish();
  }

  private async publish(): Promise<void> {
    if (this.currentStage === null) {
      return;
    }

    const record: DocumentRecord = {
      jobId: this.jobId,
      instanceId: this.instanceId,
      documentId: this.documentId,
      ordinal: this.ordinal,
      stage: this.currentStage,
      retries: { ...this.retries },
      lastError: this.lastError,
      failedStage: this.failedStage,
      updatedAt: this.options.clock.now().toISOString(),
    };
    await this.options.statusStore.putDocument(record);
  }

  private ensureActive(): void {
    if (this.options.signal.aborted) {
      throw new CancelledError();
    }
  }

  private activityId(step: string): string {
    return `${this.instanceId}:${step}`;
  }
}
