import { sql } from 'drizzle-orm';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from '../schema';

export type Database = PostgresJsDatabase<typeof schema>;

let client: postgres.Sql | null = null;
let database: Database | null = null;

/**
 * Lazily opens the shared connection pool. Later calls return the same
 * instance regardless of the URL passed.
 */
export async function getDatabase(databaseUrl: string): Promise<Database> {
  if (database) {
    return database;
  }

  client = postgres(databaseUrl, { max: 10, onnotice: () => undefined });
  database = drizzle(client, { schema });
  return database;
}

export async function testDatabaseConnection(): Promise<boolean> {
  if (!database) {
    return false;
  }

  try {
    await database.execute(sql`select 1`);
    return true;
  } catch (error) {
    console.error('[db] Connection check failed:', error);
    return false;
  }
}

export async function closeDatabase(): Promise<void> {
  const current = client;
  client = null;
  database = null;
  await current?.end({ timeout: 5 });
}
