import { Pool } from 'pg';
import { connectionString, type DatabaseConfig } from '../config';
import { StorageConnectionError, StorageWriteError } from '../errors';

export interface DbClient {
  query(text: string, params?: unknown[]): Promise<{ rowCount: number | null }>;
  release(err?: Error | boolean): void;
}

export interface DbPool {
  connect(): Promise<DbClient>;
  end(): Promise<void>;
}

export function createPool(db: DatabaseConfig): DbPool {
  const pool = new Pool({
    connectionString: connectionString(db),
    connectionTimeoutMillis: db.connectTimeoutMs,
    max: 1,
  });
  pool.on('error', (err) => {
    console.error('Idle client error', err);
  });
  return pool;
}

const CONNECTION_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE']);

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

// SQLSTATE classes 08 (connection), 28 (auth) and 57P (server shutdown) mean the
// database was unreachable; anything else is a problem with the write itself.
export function isConnectionFailure(err: unknown): boolean {
  const code = errorCode(err);
  if (code) {
    return CONNECTION_ERROR_CODES.has(code) || code.startsWith('08') || code.startsWith('28') || code.startsWith('57P');
  }
  return err instanceof Error && /connection terminated|timeout expired/i.test(err.message);
}

export function toStorageError(err: unknown): StorageConnectionError | StorageWriteError {
  if (err instanceof StorageConnectionError || err instanceof StorageWriteError) return err;
  const reason = err instanceof Error ? err.message : String(err);
  if (isConnectionFailure(err)) {
    return new StorageConnectionError(`Database connection failed: ${reason}`, err);
  }
  return new StorageWriteError(`Database write failed: ${reason}`, err);
}

export async function withTransaction<T>(pool: DbPool, fn: (client: DbClient) => Promise<T>): Promise<T> {
  let client: DbClient;
  try {
    client = await pool.connect();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StorageConnectionError(`Database connection failed: ${reason}`, error);
  }

  try {
    await client.query('begin');
    const result = await fn(client);
    await client.query('commit');
    return result;
  } catch (error) {
    try {
      await client.query('rollback');
    } catch (rollbackError) {
      console.error('Rollback failed', rollbackError);
    }
    throw toStorageError(error);
  } finally {
    client.release();
  }
}
