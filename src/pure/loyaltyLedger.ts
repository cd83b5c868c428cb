/**
 * LOYALTY LEDGER - coordinator
 *
 * The balance on the account row and the append-only transaction list move
 * together: every write locks the account row, applies the delta with the
 * pure rules and appends the matching entry in the same unit of work.
 */

import type {LoyaltyAccount, LoyaltyTransaction, LoyaltyTransactionKind} from '../domain';
import type {TierThresholds} from '../types';
import type {AppEffects, LoyaltyRepository} from './effects';
import {CommerceError, notFound} from './errors';
import {applyLedgerDelta, calculatePointsEarned, validateAdjustment, validatePoints} from './loyalty';
import {Either, Left, Right} from 'purify-ts';

type LedgerResult<T> = Promise<Either<CommerceError, T>>;

type LedgerEntry = {
  readonly userId: number;
  readonly delta: number;
  readonly kind: LoyaltyTransactionKind;
  readonly description: string;
  readonly relatedOrderId: number | null;
};

async function postEntry(
  loyalty: LoyaltyRepository,
  entry: LedgerEntry,
  now: Date,
  thresholds: TierThresholds
): LedgerResult<LoyaltyAccount> {
  const account = await loyalty.findAccount(entry.userId, true);
  if (!account) return Left(notFound('user', entry.userId));

  return applyLedgerDelta(account, entry.delta, thresholds).caseOf<LedgerResult<LoyaltyAccount>>({
    Left: error => Promise.resolve(Left(error)),
    Right: async updated => {
      await loyalty.saveAccount(updated);
      await loyalty.appendTransaction({...entry, createdAt: now});
      return Right(updated);
    },
  });
}

function post(
  validated: Either<CommerceError, number>,
  toEntry: (points: number) => LedgerEntry
): (appEffects: AppEffects) => LedgerResult<LoyaltyAccount> {
  return async (appEffects: AppEffects) =>
    validated.caseOf<LedgerResult<LoyaltyAccount>>({
      Left: error => Promise.resolve(Left(error)),
      Right: points => appEffects.transactions.run(({loyalty}) =>
        postEntry(loyalty, toEntry(points), appEffects.clock.now(), appEffects.settings.tierThresholds)
      ),
    });
}

export function creditPoints(
  userId: number,
  points: number,
  description: string,
  relatedOrderId: number | null = null
): (appEffects: AppEffects) => LedgerResult<LoyaltyAccount> {
  return post(validatePoints(points), delta => ({userId, delta, kind: 'earn', description, relatedOrderId}));
}

export function debitPoints(
  userId: number,
  points: number,
  description: string
): (appEffects: AppEffects) => LedgerResult<LoyaltyAccount> {
  return post(validatePoints(points), value => ({
    userId,
    delta: -value,
    kind: 'redeem',
    description,
    relatedOrderId: null,
  }));
}

export function adjustPoints(
  userId: number,
  delta: number,
  description: string
): (appEffects: AppEffects) => LedgerResult<LoyaltyAccount> {
  return post(validateAdjustment(delta), value => ({
    userId,
    delta: value,
    kind: 'admin_adjustment',
    description,
    relatedOrderId: null,
  }));
}

export function getLoyaltyAccount(userId: number): (appEffects: AppEffects) => LedgerResult<LoyaltyAccount> {
  return async (appEffects: AppEffects) =>
    appEffects.transactions.run(async ({loyalty}): LedgerResult<LoyaltyAccount> => {
      const account = await loyalty.findAccount(userId, false);
      return account ? Right(account) : Left(notFound('user', userId));
    });
}

export function getLoyaltyHistory(
  userId: number,
  limit = 50
): (appEffects: AppEffects) => LedgerResult<LoyaltyTransaction[]> {
  return async (appEffects: AppEffects) =>
    appEffects.transactions.run(async ({loyalty}): LedgerResult<LoyaltyTransaction[]> =>
      Right(await loyalty.listTransactions(userId, limit))
    );
}

/**
 * Credits the points earned by an order, once. Resolves with the points
 * credited by this call: zero when the order already has its earn entry or
 * earns nothing.
 */
export function creditPointsForOrder(orderId: number): (appEffects: AppEffects) => LedgerResult<number> {
  return async (appEffects: AppEffects) =>
    appEffects.transactions.run(async ({orders, loyalty}): LedgerResult<number> => {
      const order = await orders.findById(orderId, false);
      if (!order) return Left(notFound('order', orderId));

      const points = calculatePointsEarned(order.total, appEffects.settings.pointsPerCurrencyUnit);
      if (points === 0) return Right(0);

      // lock before checking so concurrent retries serialise
      const account = await loyalty.findAccount(order.userId, true);
      if (!account) return Left(notFound('user', order.userId));
      if (await loyalty.hasEarnForOrder(order.userId, order.id)) return Right(0);

      const posted = await postEntry(
        loyalty,
        {
          userId: order.userId,
          delta: points,
          kind: 'earn',
          description: `Points for order #${order.orderNumber}`,
          relatedOrderId: order.id,
        },
        appEffects.clock.now(),
        appEffects.settings.tierThresholds
      );
      return posted.map(() => points);
    });
}
