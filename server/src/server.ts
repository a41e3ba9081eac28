import 'dotenv/config';
import net from 'node:net';
import { serve, type ServerType } from '@hono/node-server';
import { createApp } from './api';
import { createServices, type Services } from './lib/bootstrap';
import { loadConfig, type AppConfig } from './lib/config';
import { closeDatabase, testDatabaseConnection } from './lib/db';
import { getIntEnv } from './lib/env';
import { toErrorMessage } from './lib/errors';

const startupDbWaitTimeoutMs = getIntEnv('STARTUP_DB_WAIT_TIMEOUT_MS', 30_000);
const startupDbWaitPollMs = getIntEnv('STARTUP_DB_WAIT_POLL_MS', 500);

let isShuttingDown = false;
let services: Services | null = null;
let server: ServerType | null = null;

function logConfiguration(config: Readonly<AppConfig>): void {
  const timestamp = new Date().toISOString();
  console.log(
    `[server][startup] timestamp=${timestamp} backend=${config.stateBackend} parallelism=${config.parallelism} maxRetryAttempts=${config.maxRetryAttempts} indexName="${config.indexName}" container="${config.sourceContainer}" embeddingProvider=${config.embeddingProvider}`
  );
}

function getDatabaseHostAndPort(databaseUrl: string): { host: string; port: number } {
  try {
    const parsed = new URL(databaseUrl);
    return {
      host: parsed.hostname || 'localhost',
      port: parsed.port ? Number(parsed.port) : 5432,
    };
  } catch (error) {
    console.warn(`[server] Could not parse DATABASE_URL (${toErrorMessage(error)}); assuming localhost:5432`);
    return { host: 'localhost', port: 5432 };
  }
}

function tryConnect(host: string, port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.createConnection({ host, port });
    const done = (ok: boolean): void => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(ok);
    };

    socket.once('connect', () => done(true));
    socket.once('error', () => done(false));
    socket.setTimeout(1000, () => done(false));
  });
}

async function waitForDatabasePort(databaseUrl: string): Promise<boolean> {
  const { host, port } = getDatabaseHostAndPort(databaseUrl);
  const startedAtMs = Date.now();
  const deadlineMs = startedAtMs + startupDbWaitTimeoutMs;

  while (!isShuttingDown && Date.now() < deadlineMs) {
    if (await tryConnect(host, port)) {
      const elapsedMs = Date.now() - startedAtMs;
      if (elapsedMs > 0) {
        console.log(`[server] Database reachable at ${host}:${port} after ${elapsedMs}ms.`);
      }
      return true;
    }

    await new Promise((resolve) => setTimeout(resolve, startupDbWaitPollMs));
  }

  console.warn(`[server] Timed out waiting ${startupDbWaitTimeoutMs}ms for database at ${host}:${port}.`);
  return false;
}

async function startServer(): Promise<void> {
  let config: Readonly<AppConfig>;
  try {
    config = loadConfig();
    logConfiguration(config);
  } catch (error) {
    console.error(`[server] Startup configuration failed: ${toErrorMessage(error)}`);
    process.exitCode = 1;
    return;
  }

  if (config.stateBackend === 'postgres' && config.databaseUrl) {
    await waitForDatabasePort(config.databaseUrl);
  }

  services = await createServices(config);

  if (config.stateBackend === 'postgres' && !(await testDatabaseConnection())) {
    console.warn('[server] Database connection check failed; job recovery may be incomplete.');
  }

  const resumed = await services.engine.recover();
  if (resumed.length > 0) {
    console.log(`[server] Resumed ${resumed.length} running job(s): ${resumed.join(', ')}`);
  }

  const app = createApp(services);
  server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    console.log(`[server] Listening on http://localhost:${info.port}`);
  });
}

async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    return;
  }

  console.log(`[server] Received ${signal}. Shutting down...`);
  isShuttingDown = true;
  server?.close();
  await services?.engine.shutdown();
  await closeDatabase();
}

function onSignal(signal: string): void {
  shutdown(signal).catch((error: unknown) => {
    console.error(`[server] Shutdown failed: ${toErrorMessage(error)}`);
    process.exitCode = 1;
  });
}

process.on('SIGINT', () => onSignal('SIGINT'));
process.on('SIGTERM', () => onSignal('SIGTERM'));

void startServer().catch((error: unknown) => {
  console.error(`[server] Startup failed: ${toErrorMessage(error)}`);
  process.exitCode = 1;
});
