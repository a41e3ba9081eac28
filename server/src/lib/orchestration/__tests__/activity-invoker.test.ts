import { describe, expect, it } from 'vitest';
import { ActivityError, ActivityFailedError, CancelledError, ReplayMismatchError } from '../../errors';
import { ActivityInvoker, type RetryNotice } from '../activity-invoker';
import { InMemoryReplayLog, InstanceJournal } from '../replay-log';
import { RetryPolicy } from '../retry-policy';
import { FakeActivities, InstantClock, waitFor, type FakeActivitiesOptions } from './fakes';

async function createInvoker(
  options: Partial<FakeActivitiesOptions> = {},
  context: { log?: InMemoryReplayLog; signal?: AbortSignal; onRetry?: (notice: RetryNotice) => void } = {}
) {
  const log = context.log ?? new InMemoryReplayLog();
  const journal = await InstanceJournal.load(log, 'job-1:doc:0');
  const activities = new FakeActivities({ blobs: [], ...options });
  const clock = new InstantClock();
  const invoker = new ActivityInvoker({
    journal,
    handlers: activities,
    retryPolicy: new RetryPolicy({ maxAttempts: 3 }),
    clock,
    signal: context.signal ?? new AbortController().signal,
    onRetry: context.onRetry,
  });
  return { invoker, journal, activities, clock, log };
}

describe('ActivityInvoker', () => {
  it('answers a recorded activity id from the journal', async () => {
    const { invoker, activities } = await createInvoker();

    const first = await invoker.extract('job-1:doc:0:extract', 'docs/a.txt');
    const second = await invoker.extract('job-1:doc:0:extract', 'docs/a.txt');

    expect(second).toEqual(first);
    expect(activities.callsOf('extract')).toEqual(['docs/a.txt']);
  });

  it('replays recorded results after a restart', async () => {
    const log = new InMemoryReplayLog();
    const before = await createInvoker({}, { log });
    const text = await before.invoker.extract('job-1:doc:0:extract', 'docs/a.txt');

    const after = await createInvoker({}, { log });
    await expect(after.invoker.extract('job-1:doc:0:extract', 'docs/a.txt')).resolves.toEqual(text);
    expect(after.activities.calls).toEqual([]);
  });

  it('retries transient failures and journals every attempt', async () => {
    const notices: RetryNotice[] = [];
    const { invoker, journal, clock } = await createInvoker(
      {
        failures: {
          extract: (_key, attempt) => (attempt < 3 ? ActivityError.transient('storage throttled', 429) : undefined),
        },
      },
      { onRetry: (notice) => notices.push(notice) }
    );

    const text = await invoker.extract('job-1:doc:0:extract', 'docs/a.txt');

    expect(text.pages).toEqual(['text of docs/a.txt']);
    expect(journal.attemptsFor('job-1:doc:0:extract').map((event) => [event.attempt, event.outcome])).toEqual([
      [1, 'retrying'],
      [2, 'retrying'],
      [3, 'completed'],
    ]);
    expect(clock.sleeps).toHaveLength(2);
    expect(notices.map((notice) => [notice.activity, notice.attempt, notice.error])).toEqual([
      ['extract', 1, 'storage throttled'],
      ['extract', 2, 'storage throttled'],
    ]);
  });

  it('gives up after the attempt budget', async () => {
    const { invoker, journal } = await createInvoker({
      failures: { extract: () => ActivityError.transient('storage throttled', 429) },
    });

    const error = await invoker.extract('job-1:doc:0:extract', 'docs/a.txt').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ActivityFailedError);
    expect(error).toMatchObject({
      message: 'extract failed after 3 attempts: storage throttled',
      attempts: 3,
      exhausted: true,
    });
    expect(journal.attemptsFor('job-1:doc:0:extract').at(-1)).toMatchObject({
      outcome: 'failed',
      errorKind: 'transient',
      exhausted: true,
    });
  });

  it('fails permanent errors on the first attempt', async () => {
    const { invoker, activities, clock } = await createInvoker({
      failures: { extract: () => ActivityError.permanent('unsupported format') },
    });

    await expect(invoker.extract('job-1:doc:0:extract', 'docs/a.txt')).rejects.toThrow(
      'extract failed: unsupported format'
    );
    expect(activities.callsOf('extract')).toHaveLength(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('re-raises a recorded failure without calling again', async () => {
    const log = new InMemoryReplayLog();
    const before = await createInvoker({ failures: { extract: () => ActivityError.permanent('unsupported format') } }, { log });
    await expect(before.invoker.extract('job-1:doc:0:extract', 'docs/a.txt')).rejects.toThrow();

    const after = await createInvoker({}, { log });
    await expect(after.invoker.extract('job-1:doc:0:extract', 'docs/a.txt')).rejects.toThrow(
      'extract failed: unsupported format'
    );
    expect(after.activities.calls).toEqual([]);
  });

  it('continues the retry budget from recorded attempts', async () => {
    const log = new InMemoryReplayLog();
    const journal = await InstanceJournal.load(log, 'job-1:doc:0');
    for (const attempt of [1, 2]) {
      await journal.append({
        type: 'activity',
        activityId: 'job-1:doc:0:extract',
        activity: 'extract',
        attempt,
        outcome: 'retrying',
        error: 'storage throttled',
        retryAfterMs: 1_000,
      });
    }

    const { invoker, activities } = await createInvoker(
      { failures: { extract: () => ActivityError.transient('storage throttled', 429) } },
      { log }
    );

    await expect(invoker.extract('job-1:doc:0:extract', 'docs/a.txt')).rejects.toThrow(
      'extract failed after 3 attempts: storage throttled'
    );
    expect(activities.callsOf('extract')).toHaveLength(1);
  });

  it('refuses to replay an id recorded for another activity', async () => {
    const { invoker } = await createInvoker();
    await invoker.extract('job-1:doc:0:step', 'docs/a.txt');

    await expect(
      invoker.chunk('job-1:doc:0:step', { blobRef: 'docs/a.txt', contentType: 'text/plain', pages: ['x'] }, 100)
    ).rejects.toBeInstanceOf(ReplayMismatchError);
  });

  it('releases the caller as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const { invoker, journal, activities } = await createInvoker({ gate: () => true }, { signal: controller.signal });

    const pending = invoker.extract('job-1:doc:0:extract', 'docs/a.txt');
    await waitFor(() => activities.inFlight === 1);
    controller.abort(new CancelledError());

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    activities.releaseGate();
    expect(journal.attemptsFor('job-1:doc:0:extract')).toEqual([]);
  });
});
