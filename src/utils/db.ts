import { type SQL, eq } from 'drizzle-orm';
import type { PgColumn } from 'drizzle-orm/pg-core';
import { StoreUnavailableError } from './errors';

// Node socket errors, postgres-js connection errors, and SQLSTATE class 08
// (connection exception) plus the 57P0x shutdown codes.
const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'EAI_AGAIN',
  'CONNECT_TIMEOUT',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  '57P01',
  '57P02',
  '57P03',
]);

const MAX_CAUSE_DEPTH = 5;

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * True when the error (or one of its causes) means the database could not be reached.
 */
export function isConnectionError(error: unknown): boolean {
  let current: unknown = error;

  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current; depth++) {
    const code = errorCode(current);
    if (code && (CONNECTION_ERROR_CODES.has(code) || code.startsWith('08'))) {
      return true;
    }
    current = current instanceof Error ? current.cause : undefined;
  }

  return false;
}

/**
 * Run a store query, turning connection failures into StoreUnavailableError.
 */
export async function withStoreErrors<T>(operation: string, query: () => Promise<T>): Promise<T> {
  try {
    return await query();
  } catch (error) {
    if (isConnectionError(error)) {
      throw new StoreUnavailableError(`Catalog store unavailable during ${operation}`, error);
    }
    throw error;
  }
}

export function isActive(column: PgColumn): SQL {
  return eq(column, true);
}
