import { index, integer, jsonb, text, timestamp } from 'drizzle-orm/pg-core';
import { appSchema } from './app';

export const indexDocuments = appSchema.table(
  'index_documents',
  {
    // `<indexName>/<chunkId>`
    id: text('id').primaryKey(),
    index_name: text('index_name').notNull(),
    chunk_id: text('chunk_id').notNull(),
    document_id: text('document_id').notNull(),
    content: text('content').notNull(),
    sourcepages: text('sourcepages').notNull(),
    storage_url: text('storage_url').notNull(),
    section: text('section'),
    embedding_model: text('embedding_model').notNull(),
    embedding_dim: integer('embedding_dim').notNull(),
    embedding: jsonb('embedding').$type<number[]>().notNull(),
    created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    indexNameIdx: index('index_documents_index_name_idx').on(table.index_name),
  })
);

export type IndexDocument = typeof indexDocuments.$inferSelect;
export type NewIndexDocument = typeof indexDocuments.$inferInsert;
