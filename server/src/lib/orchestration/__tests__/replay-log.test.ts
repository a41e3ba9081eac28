import { describe, expect, it } from 'vitest';
import { ReplayCorruptionError } from '../../errors';
import { InMemoryReplayLog, InstanceJournal, ReplayConflictError, replayStages } from '../replay-log';
import type { DocumentStage, ReplayEntry } from '../types';

function stageEntry(sequence: number, stage: DocumentStage): ReplayEntry {
  return {
    instanceId: 'job-1:doc:0',
    sequence,
    recordedAt: '2026-01-01T00:00:00.000Z',
    event: { type: 'stage', stage },
  };
}

describe('InMemoryReplayLog', () => {
  it('rejects an entry that is not next in its stream', async () => {
    const log = new InMemoryReplayLog();
    await log.append(stageEntry(0, 'listed'));

    await expect(log.append(stageEntry(0, 'extracting'))).rejects.toThrow(
      'Replay log for job-1:doc:0 already has an entry at sequence 0'
    );
    await expect(log.append(stageEntry(2, 'extracting'))).rejects.toBeInstanceOf(ReplayConflictError);
    expect(await log.read('job-1:doc:0')).toHaveLength(1);
  });

  it('returns copies that callers cannot mutate', async () => {
    const log = new InMemoryReplayLog();
    await log.append(stageEntry(0, 'listed'));

    const [entry] = await log.read('job-1:doc:0');
    entry.sequence = 9;

    expect((await log.read('job-1:doc:0'))[0].sequence).toBe(0);
    expect(await log.read('unknown')).toEqual([]);
  });
});

describe('replayStages', () => {
  it('folds stage events and skips other events', () => {
    const entries: ReplayEntry[] = [
      stageEntry(0, 'listed'),
      {
        instanceId: 'job-1:doc:0',
        sequence: 1,
        recordedAt: '2026-01-01T00:00:00.000Z',
        event: { type: 'job-cancelled', reason: 'Job cancelled' },
      },
      stageEntry(2, 'extracting'),
    ];

    expect(replayStages(entries)).toEqual(['listed', 'extracting']);
  });

  it('throws when a journal regresses', () => {
    expect(() => replayStages([stageEntry(0, 'chunking'), stageEntry(1, 'extracting')])).toThrow(
      'Instance job-1:doc:0 regresses from chunking to extracting at sequence 1'
    );
  });

  it('throws when a journal continues past a terminal stage', () => {
    expect(() => replayStages([stageEntry(0, 'failed'), stageEntry(1, 'indexed')])).toThrow(ReplayCorruptionError);
  });
});

describe('InstanceJournal', () => {
  it('assigns gap-free sequences to concurrent appends', async () => {
    const log = new InMemoryReplayLog();
    const journal = await InstanceJournal.load(log, 'job-1:doc:0');

    const entries = await Promise.all(
      [0, 1, 2, 3].map((sequence) =>
        journal.append({
          type: 'activity',
          activityId: `job-1:doc:0:embed:${sequence}`,
          activity: 'embed',
          attempt: 1,
          outcome: 'retrying',
          error: 'busy',
          retryAfterMs: 1000,
        })
      )
    );

    expect(entries.map((entry) => entry.sequence)).toEqual([0, 1, 2, 3]);
    expect((await log.read('job-1:doc:0')).map((entry) => entry.sequence)).toEqual([0, 1, 2, 3]);
    expect(journal.retryCounts()).toEqual({ embed: 4 });
  });

  it('refuses to record a stage that moves backwards', async () => {
    const log = new InMemoryReplayLog();
    const journal = await InstanceJournal.load(log, 'job-1:doc:0');
    await journal.append({ type: 'stage', stage: 'listed' });
    await journal.append({ type: 'stage', stage: 'extracting' });

    await expect(journal.append({ type: 'stage', stage: 'listed' })).rejects.toThrow(
      'Refusing to record listed after extracting for instance job-1:doc:0'
    );
    expect(journal.length).toBe(2);
    expect(journal.lastStage()).toBe('extracting');
  });

  it('keeps later appends working after a rejected one', async () => {
    const log = new InMemoryReplayLog();
    const journal = await InstanceJournal.load(log, 'job-1:doc:0');
    await journal.append({ type: 'stage', stage: 'extracting' });

    const rejected = journal.append({ type: 'stage', stage: 'listed' });
    const accepted = journal.append({ type: 'stage', stage: 'extracted' });

    await expect(rejected).rejects.toBeInstanceOf(ReplayCorruptionError);
    await expect(accepted).resolves.toMatchObject({ sequence: 1 });
  });

  it('indexes recorded attempts by activity id on load', async () => {
    const log = new InMemoryReplayLog();
    await log.append(stageEntry(0, 'listed'));
    await log.append({
      instanceId: 'job-1:doc:0',
      sequence: 1,
      recordedAt: '2026-01-01T00:00:00.000Z',
      event: {
        type: 'activity',
        activityId: 'job-1:doc:0:extract',
        activity: 'extract',
        attempt: 1,
        outcome: 'failed',
        error: 'unsupported format',
        errorKind: 'permanent',
        exhausted: false,
      },
    });

    const journal = await InstanceJournal.load(log, 'job-1:doc:0');

    expect(journal.attemptsFor('job-1:doc:0:extract')).toHaveLength(1);
    expect(journal.attemptsFor('job-1:doc:0:chunk')).toEqual([]);
    expect(journal.recordedStages()).toEqual([{ type: 'stage', stage: 'listed' }]);
    expect(journal.retryCounts()).toEqual({});
  });

  it('refuses to load a corrupt journal', async () => {
    const log = new InMemoryReplayLog();
    await log.append(stageEntry(0, 'indexed'));
    await log.append(stageEntry(1, 'failed'));

    await expect(InstanceJournal.load(log, 'job-1:doc:0')).rejects.toThrow(
      'Instance job-1:doc:0 records failed after terminal stage indexed'
    );
  });
});
