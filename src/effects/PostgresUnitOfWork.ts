import type {Repositories, UnitOfWork} from '../pure/effects';
import {PersistenceUnavailableError, toError} from './EffectsError';
import {makeRepositories} from './PostgresRepositories';
import {DatabaseError, Pool} from 'pg';
import {Either} from 'purify-ts';

// SQLSTATE codes after which the whole call can simply be retried
const TRANSIENT_CODES = new Set([
  '57P01', // admin_shutdown
  '57014', // query_canceled (statement_timeout)
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '53300', // too_many_connections
]);

// two checkouts drew the same order number; the loser can run again
const ORDER_NUMBER_CONSTRAINT = 'orders_order_number_key';

const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN']);

// messages of the pg client and pool for connect and read timeouts
const CLIENT_TIMEOUT = /timeout|Connection terminated/i;

export function isTransient(error: unknown): boolean {
  if (error instanceof DatabaseError) {
    const code = error.code ?? '';
    if (code === '23505') return error.constraint === ORDER_NUMBER_CONSTRAINT;
    return code.startsWith('08') || TRANSIENT_CODES.has(code);
  }
  if (!(error instanceof Error)) {
    return false;
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
  return NETWORK_CODES.has(code) || CLIENT_TIMEOUT.test(error.message);
}

export function toPersistenceError(error: unknown): Error {
  if (error instanceof PersistenceUnavailableError || !isTransient(error)) {
    return toError(error);
  }
  const code = error instanceof DatabaseError ? error.code ?? null : null;
  return new PersistenceUnavailableError(toError(error), code);
}

/**
 * One pooled connection per unit of work. BEGIN on entry; COMMIT when the
 * work resolves to a Right, ROLLBACK when it resolves to a Left or throws.
 */
export class PostgresUnitOfWork implements UnitOfWork {
  constructor(private pool: Pool) {}

  async run<L, R>(work: (repositories: Repositories) => Promise<Either<L, R>>): Promise<Either<L, R>> {
    const client = await this.pool.connect().catch((error: unknown) => {
      throw toPersistenceError(error);
    });

    try {
      await client.query('BEGIN');
      const result = await work(makeRepositories(client));
      await client.query(result.isRight() ? 'COMMIT' : 'ROLLBACK');
      return result;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        console.error('❌ Rollback failed:', toError(rollbackError).message);
      });
      throw toPersistenceError(error);
    } finally {
      client.release();
    }
  }
}
