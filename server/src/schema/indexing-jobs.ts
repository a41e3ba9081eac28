import { boolean, integer, jsonb, text, timestamp } from 'drizzle-orm/pg-core';
import type { JobStatus } from '../lib/orchestration/types';
import { appSchema } from './app';

export const indexingJobs = appSchema.table('indexing_jobs', {
  job_id: text('job_id').primaryKey(),
  index_name: text('index_name').notNull(),
  source_prefixes: jsonb('source_prefixes').$type<string[]>().notNull(),
  status: text('status').$type<JobStatus>().notNull().default('running'),
  total: integer('total').notNull().default(0),
  succeeded: integer('succeeded').notNull().default(0),
  failed: integer('failed').notNull().default(0),
  pending: integer('pending').notNull().default(0),
  listing_complete: boolean('listing_complete').notNull().default(false),
  error: text('error'),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  completed_at: timestamp('completed_at', { withTimezone: true }),
});

export type IndexingJob = typeof indexingJobs.$inferSelect;
export type NewIndexingJob = typeof indexingJobs.$inferInsert;
