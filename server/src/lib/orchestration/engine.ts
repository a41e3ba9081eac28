import { randomUUID } from 'node:crypto';
import {
  ActivityFailedError,
  CancelledError,
  EngineShutdownError,
  InvalidConfigurationError,
  NotFoundError,
  toErrorMessage,
} from '../errors';
import type { ActivityHandlers } from './activities';
import { ActivityInvoker } from './activity-invoker';
import { systemClock, type Clock } from './clock';
import { ConcurrencyLimiter, DEFAULT_PARALLELISM, type LimiterToken } from './concurrency-limiter';
import { DocumentOrchestrator, type DocumentOutcome } from './document-orchestrator';
import { InstanceJournal, type ReplayLog } from './replay-log';
import { RetryPolicy } from './retry-policy';
import type { StatusStore } from './status-store';
import {
  isTerminalJobStatus,
  type JobRecord,
  type JobStatus,
  type ReplayEntry,
  type StatusRecord,
} from './types';

export interface EngineConfig {
  parallelism: number;
  maxRetryAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  indexName: string;
  maxChunkSize: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  parallelism: DEFAULT_PARALLELISM,
  maxRetryAttempts: 5,
  retryBaseDelayMs: 1_000,
  retryMaxDelayMs: 30_000,
  indexName: 'default-index',
  maxChunkSize: 1_000,
});

export interface EngineDependencies {
  config?: Partial<EngineConfig>;
  handlers: ActivityHandlers;
  replayLog: ReplayLog;
  statusStore: StatusStore;
  clock?: Clock;
  newJobId?: () => string;
}

export type StartJobRequest = {
  sourcePrefixes: unknown;
  indexName: unknown;
};

export type JobHistory = {
  job: ReplayEntry[];
  documents: Record<string, ReplayEntry[]>;
};

type JobPlan = {
  indexName: string;
  sourcePrefixes: string[];
  /** Set for single-document jobs, which skip listing. */
  documentRefs?: string[];
};

type JobRuntime = {
  jobId: string;
  plan: JobPlan;
  record: JobRecord;
  journal: InstanceJournal;
  controller: AbortController;
  cancelled: boolean;
  seen: Set<string>;
  inFlight: Promise<void>[];
  unadmitted: Set<DocumentOrchestrator>;
  done: Promise<void>;
};

function isRecordedCompletion(journal: InstanceJournal, activityId: string): boolean {
  const attempts = journal.attemptsFor(activityId);
  return attempts[attempts.length - 1]?.outcome === 'completed';
}

export function validateStartJobRequest(request: StartJobRequest): JobPlan {
  const { sourcePrefixes, indexName } = request;

  if (typeof indexName !== 'string' || indexName.trim().length === 0) {
    throw new InvalidConfigurationError('index_name must be a non-empty string');
  }

  if (!Array.isArray(sourcePrefixes) || sourcePrefixes.length === 0) {
    throw new InvalidConfigurationError('prefix_list must be a non-empty array of strings');
  }

  const prefixes: string[] = [];
  for (const prefix of sourcePrefixes) {
    if (typeof prefix !== 'string') {
      throw new InvalidConfigurationError('prefix_list must only contain strings');
    }
    prefixes.push(prefix);
  }

  return { indexName: indexName.trim(), sourcePrefixes: prefixes };
}

/**
 * Top-level orchestrator: lists documents per job, admits each into a
 * {@link DocumentOrchestrator} through the shared limiter and aggregates
 * their outcomes into the job record.
 */
export class OrchestrationEngine {
  readonly config: Readonly<EngineConfig>;
  readonly limiter: ConcurrencyLimiter;

  private readonly handlers: ActivityHandlers;
  private readonly replayLog: ReplayLog;
  private readonly statusStore: StatusStore;
  private readonly clock: Clock;
  private readonly retryPolicy: RetryPolicy;
  private readonly newJobId: () => string;
  private readonly jobs = new Map<string, JobRuntime>();

  constructor(deps: EngineDependencies) {
    this.config = Object.freeze({ ...DEFAULT_ENGINE_CONFIG, ...deps.config });
    this.handlers = deps.handlers;
    this.replayLog = deps.replayLog;
    this.statusStore = deps.statusStore;
    this.clock = deps.clock ?? systemClock;
    this.newJobId = deps.newJobId ?? randomUUID;
    this.limiter = new ConcurrencyLimiter(this.config.parallelism);
    this.retryPolicy = new RetryPolicy({
      maxAttempts: this.config.maxRetryAttempts,
      baseDelayMs: this.config.retryBaseDelayMs,
      maxDelayMs: this.config.retryMaxDelayMs,
    });
  }

  /**
   * Validates the request, records the job and starts it in the background.
   * The job record is readable through {@link getStatus} once this resolves.
   */
  async startJob(request: StartJobRequest): Promise<string> {
    const plan = validateStartJobRequest(request);
    return this.launch(plan);
  }

  /**
   * Starts a job over exactly one blob, as produced by a blob-created event.
   */
  async startDocumentJob(blobRef: string, indexName: string = this.config.indexName): Promise<string> {
    const trimmed = blobRef.trim();
    if (trimmed.length === 0) {
      throw new InvalidConfigurationError('Blob reference must be a non-empty string');
    }

    const plan = validateStartJobRequest({ sourcePrefixes: [trimmed], indexName });
    return this.launch({ ...plan, documentRefs: [trimmed] });
  }

  async getStatus(jobId: string): Promise<StatusRecord> {
    const status = await this.statusStore.get(jobId);
    if (!status) {
      throw new NotFoundError(`Job ${jobId} not found`);
    }
    return status;
  }

  async listJobs(): Promise<JobRecord[]> {
    return this.statusStore.listJobs();
  }

  async getHistory(jobId: string): Promise<JobHistory> {
    const status = await this.getStatus(jobId);
    const documents: Record<string, ReplayEntry[]> = {};
    for (const document of status.documents) {
      documents[document.instanceId] = await this.replayLog.read(document.instanceId);
    }
    return { job: await this.replayLog.read(jobId), documents };
  }

  /**
   * Cancels a running job. Waiting admissions return immediately, in-flight
   * activity calls are abandoned, and every unfinished document ends `failed`.
   */
  async cancelJob(jobId: string, reason = 'Cancelled by request'): Promise<StatusRecord> {
    const runtime = this.jobs.get(jobId);
    if (runtime && !runtime.cancelled && !isTerminalJobStatus(runtime.record.status)) {
      runtime.cancelled = true;
      await runtime.journal.append({ type: 'job-cancelled', reason });
      runtime.controller.abort(new CancelledError());
      console.log(`[engine] job=${jobId} cancellation requested reason="${reason}"`);
    }
    return this.getStatus(jobId);
  }

  /**
   * Resumes every job the status store still reports as running. Recorded
   * listing pages and activity results are replayed, not re-requested.
   */
  async recover(): Promise<string[]> {
    const running = await this.statusStore.listJobs({ status: 'running' });
    const resumed: string[] = [];

    for (const job of running) {
      if (this.jobs.has(job.jobId)) {
        continue;
      }

      const journal = await InstanceJournal.load(this.replayLog, job.jobId);
      const started = journal.events().find((event) => event.type === 'job-started');
      const plan: JobPlan =
        started?.type === 'job-started'
          ? {
              indexName: started.indexName,
              sourcePrefixes: started.sourcePrefixes,
              documentRefs: started.documentRefs,
            }
          : { indexName: job.indexName, sourcePrefixes: job.sourcePrefixes };

      const runtime = this.createRuntime(job.jobId, plan, journal, {
        ...job,
        total: 0,
        succeeded: 0,
        failed: 0,
        pending: 0,
        listingComplete: false,
      });

      if (journal.events().some((event) => event.type === 'job-cancelled')) {
        runtime.cancelled = true;
        runtime.controller.abort(new CancelledError());
      }

      console.log(`[engine] job=${job.jobId} resuming from ${journal.length} journal entries`);
      this.spawn(runtime);
      resumed.push(job.jobId);
    }

    return resumed;
  }

  /** Resolves once the given job (or every job started here) has settled. */
  async whenIdle(jobId?: string): Promise<void> {
    if (jobId !== undefined) {
      await this.jobs.get(jobId)?.done;
      return;
    }
    await Promise.all(Array.from(this.jobs.values(), (runtime) => runtime.done));
  }

  /**
   * Stops running jobs without recording a cancellation so that
   * {@link recover} can resume them in a later process.
   */
  async shutdown(): Promise<void> {
    for (const runtime of this.jobs.values()) {
      if (!runtime.controller.signal.aborted) {
        runtime.controller.abort(new EngineShutdownError());
      }
    }
    await this.whenIdle();
  }

  async checkHealth(): Promise<boolean> {
    try {
      await this.statusStore.listJobs({ status: 'running' });
      return true;
    } catch (error) {
      console.error(`[engine] Health check failed: ${toErrorMessage(error)}`);
      return false;
    }
  }

  private async launch(plan: JobPlan): Promise<string> {
    const jobId = this.newJobId();
    const journal = await InstanceJournal.load(this.replayLog, jobId);
    const createdAt = this.clock.now().toISOString();

    await journal.append({
      type: 'job-started',
      jobId,
      indexName: plan.indexName,
      sourcePrefixes: plan.sourcePrefixes,
      documentRefs: plan.documentRefs,
      createdAt,
    });

    const runtime = this.createRuntime(jobId, plan, journal, {
      jobId,
      indexName: plan.indexName,
      sourcePrefixes: plan.sourcePrefixes,
      status: 'running',
      total: 0,
      succeeded: 0,
      failed: 0,
      pending: 0,
      listingComplete: false,
      error: null,
      createdAt,
      updatedAt: createdAt,
      completedAt: null,
    });
    await this.statusStore.putJob({ ...runtime.record });

    console.log(
      `[engine] job=${jobId} started indexName=${plan.indexName} prefixes=${JSON.stringify(plan.sourcePrefixes)}`
    );
    this.spawn(runtime);
    return jobId;
  }

  private createRuntime(jobId: string, plan: JobPlan, journal: InstanceJournal, record: JobRecord): JobRuntime {
    return {
      jobId,
      plan,
      record,
      journal,
      controller: new AbortController(),
      cancelled: false,
      seen: new Set(),
      inFlight: [],
      unadmitted: new Set(),
      done: Promise.resolve(),
    };
  }

  private spawn(runtime: JobRuntime): void {
    runtime.done = this.runJob(runtime).catch(async (error: unknown) => {
      const message = toErrorMessage(error);
      console.error(`[engine] job=${runtime.jobId} crashed: ${message}`);
      try {
        await this.finishJob(runtime, 'failed', `Job crashed: ${message}`);
      } catch (finishError) {
        console.error(`[engine] job=${runtime.jobId} could not record failure: ${toErrorMessage(finishError)}`);
      }
    });
    this.jobs.set(runtime.jobId, runtime);
  }

  private async runJob(runtime: JobRuntime): Promise<void> {
    const signal = runtime.controller.signal;
    const invoker = new ActivityInvoker({
      journal: runtime.journal,
      handlers: this.handlers,
      retryPolicy: this.retryPolicy,
      clock: this.clock,
      signal,
    });

    try {
      if (runtime.plan.documentRefs) {
        await this.admitPage(runtime, runtime.plan.documentRefs);
      } else {
        await this.listAndAdmit(runtime, invoker);
      }
      runtime.record.listingComplete = true;
    } catch (error) {
      if (error instanceof ActivityFailedError) {
        runtime.record.error = `Listing failed: ${error.message}`;
        console.error(`[engine] job=${runtime.jobId} ${runtime.record.error}`);
      } else if (!(error instanceof CancelledError)) {
        throw error;
      }
    }

    // Listed but never admitted: the job was cancelled or is shutting down.
    for (const orchestrator of runtime.unadmitted) {
      runtime.inFlight.push(
        orchestrator.cancelBeforeAdmission().then((outcome) => this.applyOutcome(runtime, outcome))
      );
    }
    runtime.unadmitted.clear();

    await Promise.all(runtime.inFlight);

    if (signal.reason instanceof EngineShutdownError) {
      console.warn(`[engine] job=${runtime.jobId} interrupted by shutdown; it resumes on next recovery`);
      return;
    }

    if (runtime.cancelled) {
      await this.finishJob(runtime, 'cancelled', 'Job cancelled');
      return;
    }

    if (runtime.record.succeeded === 0) {
      const reason =
        runtime.record.error ??
        (runtime.record.total === 0 ? 'No documents matched the source prefixes' : 'No documents were indexed');
      await this.finishJob(runtime, 'failed', reason);
      return;
    }

    await this.finishJob(runtime, 'completed', runtime.record.error);
  }

  /**
   * Pages through every prefix. Pages may be empty; a `null` cursor ends the prefix.
   */
  private async listAndAdmit(runtime: JobRuntime, invoker: ActivityInvoker): Promise<void> {
    const { sourcePrefixes } = runtime.plan;
    for (let prefixIndex = 0; prefixIndex < sourcePrefixes.length; prefixIndex += 1) {
      const prefix = sourcePrefixes[prefixIndex];
      let cursor: string | null = null;
      let pageNumber = 0;

      do {
        const activityId = `${runtime.jobId}:list:${prefixIndex}:${pageNumber}`;
        // Recorded pages are still replayed after an abort so every listed document settles.
        if (runtime.controller.signal.aborted && !isRecordedCompletion(runtime.journal, activityId)) {
          throw new CancelledError();
        }

        const page = await invoker.listDocuments(activityId, prefix, cursor);
        await this.admitPage(runtime, page.documents);
        cursor = page.nextCursor;
        pageNumber += 1;
      } while (cursor !== null);
    }
  }

  /**
   * Records every new document of a page as listed, then admits them one by
   * one. Admission blocks while the limiter is full, which also holds back
   * the next listing call.
   */
  private async admitPage(runtime: JobRuntime, blobRefs: string[]): Promise<void> {
    const opened: DocumentOrchestrator[] = [];
    for (const blobRef of blobRefs) {
      if (runtime.seen.has(blobRef)) {
        continue;
      }

      const ordinal = runtime.seen.size;
      runtime.seen.add(blobRef);
      const orchestrator = await DocumentOrchestrator.open({
        jobId: runtime.jobId,
        instanceId: `${runtime.jobId}:doc:${ordinal}`,
        documentId: blobRef,
        ordinal,
        indexName: runtime.plan.indexName,
        maxChunkSize: this.config.maxChunkSize,
        handlers: this.handlers,
        replayLog: this.replayLog,
        statusStore: this.statusStore,
        retryPolicy: this.retryPolicy,
        limiter: this.limiter,
        clock: this.clock,
        signal: runtime.controller.signal,
      });
      opened.push(orchestrator);
      runtime.unadmitted.add(orchestrator);
      runtime.record.total += 1;
    }

    if (opened.length === 0) {
      return;
    }
    await this.publishJob(runtime);

    for (const orchestrator of opened) {
      if (orchestrator.recordedOutcome() !== null) {
        runtime.unadmitted.delete(orchestrator);
        await this.applyOutcome(runtime, await orchestrator.restoreTerminal());
        continue;
      }

      // Left in `unadmitted`; runJob settles it as cancelled before admission.
      if (runtime.controller.signal.aborted) {
        continue;
      }

      let token: LimiterToken;
      try {
        token = await this.limiter.acquire(runtime.controller.signal);
      } catch (error) {
        if (error instanceof CancelledError) {
          continue;
        }
        throw error;
      }
      runtime.unadmitted.delete(orchestrator);
      runtime.inFlight.push(
        orchestrator
          .run(token)
          .catch((error: unknown): DocumentOutcome => {
            console.error(
              `[engine] job=${runtime.jobId} document="${orchestrator.documentId}" orchestration error: ${toErrorMessage(error)}`
            );
            return 'failed';
          })
          .then((outcome) => this.applyOutcome(runtime, outcome))
      );
    }
  }

  private async applyOutcome(runtime: JobRuntime, outcome: DocumentOutcome): Promise<void> {
    if (outcome === 'indexed') {
      runtime.record.succeeded += 1;
    } else if (outcome === 'failed') {
      runtime.record.failed += 1;
    } else {
      return;
    }
    await this.publishJob(runtime);
  }

  private async publishJob(runtime: JobRuntime): Promise<void> {
    const record = runtime.record;
    record.pending = record.total - record.succeeded - record.failed;
    record.updatedAt = this.clock.now().toISOString();
    await this.statusStore.putJob({ ...record, sourcePrefixes: [...record.sourcePrefixes] });
  }

  private async finishJob(runtime: JobRuntime, status: JobStatus, error: string | null): Promise<void> {
    const alreadyFinished = runtime.journal.events().some((event) => event.type === 'job-finished');
    if (!alreadyFinished) {
      await runtime.journal.append({ type: 'job-finished', status });
    }

    const now = this.clock.now().toISOString();
    runtime.record.status = status;
    runtime.record.error = error;
    runtime.record.completedAt = now;
    await this.publishJob(runtime);

    const { succeeded, failed, total } = runtime.record;
    const log = status === 'completed' ? console.log : console.warn;
    log(
      `[engine] job=${runtime.jobId} status=${status} total=${total} succeeded=${succeeded} failed=${failed}${error ? ` error="${error}"` : ''}`
    );
  }
}
