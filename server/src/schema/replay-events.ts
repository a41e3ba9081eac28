import { integer, jsonb, serial, text, timestamp, uniqueIndex } from 'drizzle-orm/pg-core';
import type { ReplayEvent } from '../lib/orchestration/types';
import { appSchema } from './app';

export const replayEvents = appSchema.table(
  'replay_events',
  {
    id: serial('id').primaryKey(),
    instance_id: text('instance_id').notNull(),
    sequence: integer('sequence').notNull(),
    event: jsonb('event').$type<ReplayEvent>().notNull(),
    recorded_at: timestamp('recorded_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    uniqueInstanceSequence: uniqueIndex('replay_events_instance_sequence_idx').on(
      table.instance_id,
      table.sequence
    ),
  })
);

export type ReplayEventRow = typeof replayEvents.$inferSelect;
export type NewReplayEventRow = typeof replayEvents.$inferInsert;
