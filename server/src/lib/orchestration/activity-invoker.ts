import {
  ActivityFailedError,
  CancelledError,
  ReplayMismatchError,
  classifyError,
  toErrorMessage,
} from '../errors';
import { runActivity, type ActivityHandlers } from './activities';
import { raceWithSignal, type Clock } from './clock';
import type { InstanceJournal } from './replay-log';
import type { RetryPolicy } from './retry-policy';
import type {
  ActivityKind,
  ActivityRequest,
  ActivityResult,
  ChunkRecord,
  DocumentPage,
  DocumentText,
  EmbeddingVector,
  IndexAck,
  IndexEntry,
} from './types';

export type RetryNotice = {
  activityId: string;
  activity: ActivityKind;
  attempt: number;
  retryAfterMs: number;
  error: string;
};

export interface ActivityInvokerOptions {
  journal: InstanceJournal;
  handlers: ActivityHandlers;
  retryPolicy: RetryPolicy;
  clock: Clock;
  signal: AbortSignal;
  onRetry?: (notice: RetryNotice) => void | Promise<void>;
}

/**
 * Calls activities on behalf of one orchestration instance.
 *
 * Every attempt is journaled before control returns to the caller. An
 * activity id whose outcome is already in the journal is answered from the
 * journal without calling out again.
 */
export class ActivityInvoker {
  private readonly journal: InstanceJournal;
  private readonly handlers: ActivityHandlers;
  private readonly retryPolicy: RetryPolicy;
  private readonly clock: Clock;
  private readonly signal: AbortSignal;
  private readonly onRetry?: ActivityInvokerOptions['onRetry'];

  constructor(options: ActivityInvokerOptions) {
    this.journal = options.journal;
    this.handlers = options.handlers;
    this.retryPolicy = options.retryPolicy;
    this.clock = options.clock;
    this.signal = options.signal;
    this.onRetry = options.onRetry;
  }

  async invoke(activityId: string, request: ActivityRequest): Promise<ActivityResult> {
    const recorded = this.journal.attemptsFor(activityId);
    for (const event of recorded) {
      if (event.activity !== request.kind) {
        throw new ReplayMismatchError(
          `Activity ${activityId} was recorded as ${event.activity}, replay asked for ${request.kind}`
        );
      }
    }

    const last = recorded[recorded.length - 1];
    if (last?.outcome === 'completed') {
      return last.result;
    }
    if (last?.outcome === 'failed') {
      throw new ActivityFailedError(request.kind, activityId, last.attempt, last.error, last.exhausted);
    }

    let attempt = (last?.attempt ?? 0) + 1;
    for (;;) {
      if (this.signal.aborted) {
        throw new CancelledError();
      }

      const startedMs = Date.now();
      try {
        const result = await raceWithSignal(
          runActivity(this.handlers, request, this.signal),
          this.signal,
          (error) => {
            console.warn(
              `[invoker] activity=${request.kind} id=${activityId} attempt=${attempt} abandoned after cancellation: ${toErrorMessage(error)}`
            );
          }
        );
        await this.journal.append({
          type: 'activity',
          activityId,
          activity: request.kind,
          attempt,
          outcome: 'completed',
          result,
        });
        console.log(
          `[invoker][timing] activity=${request.kind} id=${activityId} attempt=${attempt} status=completed durationMs=${Date.now() - startedMs}`
        );
        return result;
      } catch (error) {
        if (error instanceof CancelledError) {
          throw error;
        }

        const message = toErrorMessage(error);
        const errorKind = classifyError(error);
        const decision = this.retryPolicy.decide(attempt, errorKind, activityId);

        if (decision.action === 'give-up') {
          const exhausted = errorKind === 'transient';
          await this.journal.append({
            type: 'activity',
            activityId,
            activity: request.kind,
            attempt,
            outcome: 'failed',
            error: message,
            errorKind,
            exhausted,
          });
          console.error(
            `[invoker] activity=${request.kind} id=${activityId} attempt=${attempt} status=failed kind=${errorKind} error="${message}"`
          );
          throw new ActivityFailedError(request.kind, activityId, attempt, message, exhausted);
        }

        await this.journal.append({
          type: 'activity',
          activityId,
          activity: request.kind,
          attempt,
          outcome: 'retrying',
          error: message,
          retryAfterMs: decision.afterMs,
        });
        console.warn(
          `[invoker] activity=${request.kind} id=${activityId} attempt=${attempt} status=retrying retryAfterMs=${decision.afterMs} error="${message}"`
        );
        await this.onRetry?.({
          activityId,
          activity: request.kind,
          attempt,
          retryAfterMs: decision.afterMs,
          error: message,
        });
        await this.clock.sleep(decision.afterMs, this.signal);
        attempt += 1;
      }
    }
  }

  async listDocuments(activityId: string, prefix: string, cursor: string | null): Promise<DocumentPage> {
    const result = await this.invoke(activityId, { kind: 'listDocuments', prefix, cursor });
    if (result.kind === 'listDocuments') {
      return result.page;
    }
    throw mismatch(activityId, 'listDocuments', result);
  }

  async extract(activityId: string, blobRef: string): Promise<DocumentText> {
    const result = await this.invoke(activityId, { kind: 'extract', blobRef });
    if (result.kind === 'extract') {
      return result.text;
    }
    throw mismatch(activityId, 'extract', result);
  }

  async chunk(activityId: string, text: DocumentText, maxChunkSize: number): Promise<ChunkRecord[]> {
    const result = await this.invoke(activityId, { kind: 'chunk', text, maxChunkSize });
    if (result.kind === 'chunk') {
      return result.chunks;
    }
    throw mismatch(activityId, 'chunk', result);
  }

  async embed(activityId: string, chunk: ChunkRecord): Promise<EmbeddingVector> {
    const result = await this.invoke(activityId, { kind: 'embed', chunk });
    if (result.kind === 'embed') {
      return result.embedding;
    }
    throw mismatch(activityId, 'embed', result);
  }

  async indexUpload(activityId: string, indexName: string, entries: IndexEntry[]): Promise<IndexAck> {
    const result = await this.invoke(activityId, { kind: 'indexUpload', indexName, entries });
    if (result.kind === 'indexUpload') {
      return result.ack;
    }
    throw mismatch(activityId, 'indexUpload', result);
  }
}

function mismatch(activityId: string, expected: ActivityKind, result: ActivityResult): ReplayMismatchError {
  return new ReplayMismatchError(`Activity ${activityId} returned ${result.kind}, expected ${expected}`);
}
