import { asc, eq } from 'drizzle-orm';
import { replayEvents } from '../../schema/replay-events';
import type { Database } from '../db';
import { ReplayConflictError, type ReplayLog } from '../orchestration/replay-log';
import type { ReplayEntry } from '../orchestration/types';

/**
 * Replay log on `app.replay_events`. The unique `(instance_id, sequence)`
 * index rejects a second writer at the same position.
 */
export class PostgresReplayLog implements ReplayLog {
  constructor(private readonly db: Database) {}

  async append(entry: ReplayEntry): Promise<void> {
    const inserted = await this.db
      .insert(replayEvents)
      .values({
        instance_id: entry.instanceId,
        sequence: entry.sequence,
        event: entry.event,
        recorded_at: new Date(entry.recordedAt),
      })
      .onConflictDoNothing({ target: [replayEvents.instance_id, replayEvents.sequence] })
      .returning({ id: replayEvents.id });

    if (inserted.length === 0) {
      throw new ReplayConflictError(entry.instanceId, entry.sequence);
    }
  }

  async read(instanceId: string): Promise<ReplayEntry[]> {
    const rows = await this.db
      .select()
      .from(replayEvents)
      .where(eq(replayEvents.instance_id, instanceId))
      .orderBy(asc(replayEvents.sequence));

    return rows.map((row) => ({
      instanceId: row.instance_id,
      sequence: row.sequence,
      recordedAt: row.recorded_at.toISOString(),
      event: row.event,
    }));
  }
}
