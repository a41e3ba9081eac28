import { index, integer, jsonb, text, timestamp } from 'drizzle-orm/pg-core';
import type { DocumentStage, RetryCounts } from '../lib/orchestration/types';
import { appSchema } from './app';
import { indexingJobs } from './indexing-jobs';

export const documentTasks = appSchema.table(
  'document_tasks',
  {
    instance_id: text('instance_id').primaryKey(),
    job_id: text('job_id')
      .notNull()
      .references(() => indexingJobs.job_id, { onDelete: 'cascade' }),
    document_id: text('document_id').notNull(),
    ordinal: integer('ordinal').notNull(),
    stage: text('stage').$type<DocumentStage>().notNull(),
    // Mirrors `stage` so the upsert guard can compare ranks in SQL.
    stage_rank: integer('stage_rank').notNull(),
    retries: jsonb('retries').$type<RetryCounts>().notNull().default({}),
    last_error: text('last_error'),
    failed_stage: text('failed_stage').$type<DocumentStage>(),
    updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    jobOrdinal: index('document_tasks_job_ordinal_idx').on(table.job_id, table.ordinal),
  })
);

export type DocumentTask = typeof documentTasks.$inferSelect;
export type NewDocumentTask = typeof documentTasks.$inferInsert;
