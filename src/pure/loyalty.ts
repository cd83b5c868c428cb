import type {LoyaltyAccount, LoyaltyTransactionKind, MembershipTier} from '../domain';
import type {TierThresholds} from '../types';
import {CommerceError, insufficientBalance, validationError} from './errors';
import {Either, Left, Right} from 'purify-ts';

export const DEFAULT_TIER_THRESHOLDS: TierThresholds = {
  silver: 1000,
  gold: 5000,
};

export const MEMBERSHIP_TIERS: readonly MembershipTier[] = ['Bronze', 'Silver', 'Gold'];

export const LOYALTY_TRANSACTION_KINDS: readonly LoyaltyTransactionKind[] = ['earn', 'redeem', 'admin_adjustment'];

export function isMembershipTier(value: string): value is MembershipTier {
  return MEMBERSHIP_TIERS.some(tier => tier === value);
}

export function isLoyaltyTransactionKind(value: string): value is LoyaltyTransactionKind {
  return LOYALTY_TRANSACTION_KINDS.some(kind => kind === value);
}

export function calculateMembershipTier(balance: number, thresholds: TierThresholds): MembershipTier {
  if (balance >= thresholds.gold) return 'Gold';
  if (balance >= thresholds.silver) return 'Silver';
  return 'Bronze';
}

export function calculatePointsEarned(total: number, pointsPerCurrencyUnit: number): number {
  return Math.max(0, Math.floor(total * pointsPerCurrencyUnit));
}

export function validatePoints(points: number): Either<CommerceError, number> {
  return Number.isInteger(points) && points > 0
    ? Right(points)
    : Left(validationError('Points must be a positive whole number', 'points'));
}

export function validateAdjustment(delta: number): Either<CommerceError, number> {
  return Number.isInteger(delta) && delta !== 0
    ? Right(delta)
    : Left(validationError('Adjustment must be a non-zero whole number', 'delta'));
}

/** New account state after a signed delta; never lets the balance go negative. */
export function applyLedgerDelta(
  account: LoyaltyAccount,
  delta: number,
  thresholds: TierThresholds
): Either<CommerceError, LoyaltyAccount> {
  const balance = account.balance + delta;
  if (balance < 0) {
    return Left(insufficientBalance(account.balance, -delta));
  }
  return Right({
    ...account,
    balance,
    tier: calculateMembershipTier(balance, thresholds),
  });
}
