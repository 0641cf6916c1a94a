// Chunk store connection for PgVectorIndex: pool, schema migrations and statement helpers
// Retries belong to the callers' withRetry('vector-index'); a lost connection only drops the pool

import { readFileSync, readdirSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Pool, QueryResult, QueryResultRow } from 'pg';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../types/errors.js';

const log = createLogger('ChunkStore');

export interface ChunkStoreConfig {
  /** Takes precedence over the discrete settings when present */
  connectionString?: string;
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  poolMax: number;
  statementTimeoutMs: number;
}

export function chunkStoreConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ChunkStoreConfig {
  return {
    connectionString: env.DATABASE_URL || undefined,
    host: env.PG_HOST ?? 'localhost',
    port: Number(env.PG_PORT ?? 5432),
    user: env.PG_USER ?? 'ledgerlens',
    password: env.PG_PASSWORD ?? '',
    database: env.PG_DATABASE ?? 'ledgerlens',
    poolMax: Number(env.PG_POOL_MAX ?? 10),
    statementTimeoutMs: Number(env.PG_STATEMENT_TIMEOUT_MS ?? 30_000),
  };
}

// pg loads only when the postgres backend is selected
let pool: Pool | null = null;

export async function getPool(config: ChunkStoreConfig = chunkStoreConfigFromEnv()): Promise<Pool> {
  if (pool) return pool;
  const pg = await import('pg');
  const created = new pg.default.Pool({
    ...(config.connectionString
      ? { connectionString: config.connectionString }
      : { host: config.host, port: config.port, user: config.user, password: config.password, database: config.database }),
    max: config.poolMax,
    statement_timeout: config.statementTimeoutMs,
    application_name: 'ledgerlens',
  });
  created.on('error', (err) => {
    log.warn('Idle chunk store connection failed, dropping pool', { error: err.message });
    discardPool(created);
  });
  pool = created;
  return created;
}

const CONNECTION_LOST = [
  'Connection terminated',
  'connection refused',
  'ECONNREFUSED',
  'ECONNRESET',
  'terminating connection',
  'the database system is starting up',
];

export function isConnectionLost(err: unknown): boolean {
  const message = errorMessage(err);
  return CONNECTION_LOST.some(marker => message.includes(marker));
}

function discardPool(stale: Pool): void {
  if (pool !== stale) return;
  pool = null;
  stale.end().catch((err: unknown) => {
    log.debug('Ending dropped pool failed', { error: errorMessage(err) });
  });
}

/** One statement on the shared pool */
export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params: unknown[] = [],
): Promise<QueryResult<T>> {
  const current = await getPool();
  try {
    return await current.query<T>(text, params);
  } catch (err) {
    if (isConnectionLost(err)) discardPool(current);
    throw err;
  }
}

export type RunQuery = <T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
) => Promise<QueryResult<T>>;

/** Run `work` on one connection inside BEGIN/COMMIT; any failure rolls the whole batch back */
export async function inTransaction<T>(work: (run: RunQuery) => Promise<T>): Promise<T> {
  const current = await getPool();
  const client = await current.connect();
  try {
    await client.query('BEGIN');
    const result = await work(<R extends QueryResultRow>(text: string, params: unknown[] = []) => client.query<R>(text, params));
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
      log.warn('Rollback failed', { error: errorMessage(rollbackErr) });
    });
    if (isConnectionLost(err)) discardPool(current);
    throw err;
  } finally {
    client.release();
  }
}

export const MIGRATIONS_DIR = join(dirname(fileURLToPath(import.meta.url)), 'migrations');

/** Apply chunk store migrations not yet recorded in schema_migrations, in file order */
export async function runMigrations(dir: string = MIGRATIONS_DIR): Promise<string[]> {
  await query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `);
  if (!existsSync(dir)) {
    log.warn('No migrations directory', { dir });
    return [];
  }

  const { rows } = await query<{ version: string }>('SELECT version FROM schema_migrations');
  const applied = new Set(rows.map(r => r.version));
  const pending = readdirSync(dir)
    .filter(f => f.endsWith('.sql'))
    .sort()
    .map(file => ({ file, version: file.slice(0, -'.sql'.length) }))
    .filter(m => !applied.has(m.version));

  for (const { file, version } of pending) {
    const sql = readFileSync(join(dir, file), 'utf-8');
    await inTransaction(async run => {
      await run(sql);
      await run('INSERT INTO schema_migrations (version) VALUES ($1)', [version]);
    });
    log.info('Migration applied', { version });
  }
  return pending.map(m => m.version);
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
}

/** pgvector literal `[0.1,0.2,...]` at six decimals */
export function toVectorLiteral(vec: Float32Array): string {
  return `[${Array.from(vec, v => v.toFixed(6)).join(',')}]`;
}
