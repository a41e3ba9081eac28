import { ReplayCorruptionError } from '../errors';
import {
  isTerminalStage,
  stageRank,
  type ActivityKind,
  type DocumentStage,
  type ReplayEntry,
  type ReplayEvent,
} from './types';

/**
 * Append-only history of decisions and results, one stream per orchestration instance.
 *
 * `append` must reject an entry whose sequence is not the next one for its
 * instance, which keeps two writers from interleaving a single stream.
 */
export interface ReplayLog {
  append(entry: ReplayEntry): Promise<void>;
  read(instanceId: string): Promise<ReplayEntry[]>;
}

export class ReplayConflictError extends Error {
  constructor(instanceId: string, sequence: number) {
    super(`Replay log for ${instanceId} already has an entry at sequence ${sequence}`);
    this.name = 'ReplayConflictError';
  }
}

export class InMemoryReplayLog implements ReplayLog {
  private readonly streams = new Map<string, ReplayEntry[]>();

  async append(entry: ReplayEntry): Promise<void> {
    const stream = this.streams.get(entry.instanceId) ?? [];
    if (entry.sequence !== stream.length) {
      throw new ReplayConflictError(entry.instanceId, entry.sequence);
    }
    stream.push(structuredClone(entry));
    this.streams.set(entry.instanceId, stream);
  }

  async read(instanceId: string): Promise<ReplayEntry[]> {
    return structuredClone(this.streams.get(instanceId) ?? []);
  }
}

export type StageEvent = Extract<ReplayEvent, { type: 'stage' }>;
export type ActivityEvent = Extract<ReplayEvent, { type: 'activity' }>;

/**
 * Folds the stage events of a journal into the stage sequence it implies.
 * Throws if the sequence ever moves backwards or continues past a terminal stage.
 */
export function replayStages(entries: ReplayEntry[]): DocumentStage[] {
  const stages: DocumentStage[] = [];
  for (const entry of entries) {
    if (entry.event.type !== 'stage') {
      continue;
    }

    const previous = stages[stages.length - 1];
    const next = entry.event.stage;
    if (previous !== undefined) {
      if (isTerminalStage(previous)) {
        throw new ReplayCorruptionError(
          `Instance ${entry.instanceId} records ${next} after terminal stage ${previous}`
        );
      }
      if (stageRank(next) <= stageRank(previous)) {
        throw new ReplayCorruptionError(
          `Instance ${entry.instanceId} regresses from ${previous} to ${next} at sequence ${entry.sequence}`
        );
      }
    }
    stages.push(next);
  }
  return stages;
}

/**
 * One instance's view of the replay log: the entries recorded so far plus an
 * append that keeps the in-memory copy and the durable log in step.
 */
export class InstanceJournal {
  private readonly activityEvents = new Map<string, ActivityEvent[]>();
  private readonly stageEvents: StageEvent[] = [];
  private tail: Promise<void> = Promise.resolve();

  private constructor(
    readonly instanceId: string,
    private readonly log: ReplayLog,
    private readonly entries: ReplayEntry[]
  ) {
    // Validates monotonicity up front.
    replayStages(entries);
    for (const entry of entries) {
      this.index(entry.event);
    }
  }

  static async load(log: ReplayLog, instanceId: string): Promise<InstanceJournal> {
    const entries = await log.read(instanceId);
    return new InstanceJournal(instanceId, log, entries);
  }

  get length(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  history(): ReplayEntry[] {
    return [...this.entries];
  }

  events(): ReplayEvent[] {
    return this.entries.map((entry) => entry.event);
  }

  recordedStages(): StageEvent[] {
    return [...this.stageEvents];
  }

  lastStage(): DocumentStage | null {
    return this.stageEvents[this.stageEvents.length - 1]?.stage ?? null;
  }

  /** Attempts recorded for an activity id, in append order. */
  attemptsFor(activityId: string): ActivityEvent[] {
    return [...(this.activityEvents.get(activityId) ?? [])];
  }

  retryCounts(): Partial<Record<ActivityKind, number>> {
    const counts: Partial<Record<ActivityKind, number>> = {};
    for (const events of this.activityEvents.values()) {
      for (const event of events) {
        if (event.outcome === 'retrying') {
          counts[event.activity] = (counts[event.activity] ?? 0) + 1;
        }
      }
    }
    return counts;
  }

  /**
   * Appends are serialized per instance; each waits for the previous one so
   * sequences stay gap-free when fan-out lanes record concurrently.
   */
  append(event: ReplayEvent): Promise<ReplayEntry> {
    const write = this.tail.then(() => this.write(event));
    // The chain only orders writes; a failed write is reported through `write`.
    this.tail = write.then(
      () => undefined,
      () => undefined
    );
    return write;
  }

  private async write(event: ReplayEvent): Promise<ReplayEntry> {
    if (event.type === 'stage') {
      const previous = this.lastStage();
      if (previous !== null && (isTerminalStage(previous) || stageRank(event.stage) <= stageRank(previous))) {
        throw new ReplayCorruptionError(
          `Refusing to record ${event.stage} after ${previous} for instance ${this.instanceId}`
        );
      }
    }

    const entry: ReplayEntry = {
      instanceId: this.instanceId,
      sequence: this.entries.length,
      recordedAt: new Date().toISOString(),
      event,
    };
    await this.log.append(entry);
    this.entries.push(entry);
    this.index(entry.event);
    return entry;
  }

  private index(event: ReplayEvent): void {
    if (event.type === 'stage') {
      this.stageEvents.push(event);
      return;
    }

    if (event.type === 'activity') {
      const existing = this.activityEvents.get(event.activityId) ?? [];
      existing.push(event);
      this.activityEvents.set(event.activityId, existing);
    }
  }
}
