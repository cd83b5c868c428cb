/**
 * VOUCHER RULES
 *
 * Eligibility checks and discount arithmetic. The coordinator fetches the
 * voucher and the caller's usage row; everything here is a function of them.
 */

import type {DiscountKind, Voucher, VoucherUsage} from '../domain';
import type {VoucherRejectionReason, VoucherValidation} from './types';

export function isDiscountKind(value: string): value is DiscountKind {
  return value === 'percentage' || value === 'fixed';
}

export function normalizeVoucherCode(code: string): string {
  return code.trim().toUpperCase();
}

const accept = (voucher: Voucher): VoucherValidation => ({ok: true, reason: null, voucher});

const reject = (reason: VoucherRejectionReason, voucher: Voucher | null): VoucherValidation => ({
  ok: false,
  reason,
  voucher,
});

function checkWindow(voucher: Voucher, now: Date): VoucherRejectionReason | null {
  if (!voucher.isActive) return 'inactive';
  if (voucher.startsAt && now.getTime() < voucher.startsAt.getTime()) return 'not_started';
  if (voucher.endsAt && now.getTime() > voucher.endsAt.getTime()) return 'expired';
  return null;
}

function checkUsage(voucher: Voucher, usage: VoucherUsage | null): VoucherRejectionReason | null {
  if (voucher.usageLimit !== null && voucher.currentUsage >= voucher.usageLimit) {
    return 'usage_limit_reached';
  }
  const timesUsed = usage?.timesUsed ?? 0;
  if (voucher.usagePerUser !== null && timesUsed >= voucher.usagePerUser) {
    return 'per_user_limit_reached';
  }
  return null;
}

/**
 * Runs the checks in a fixed order and reports the first failure. Without a
 * subtotal the minimum-amount check is skipped, which is what redemption needs.
 */
export function checkVoucherRules(
  voucher: Voucher | null,
  usage: VoucherUsage | null,
  now: Date,
  subtotal?: number
): VoucherValidation {
  if (!voucher) return reject('not_found', null);

  const windowProblem = checkWindow(voucher, now);
  if (windowProblem) return reject(windowProblem, voucher);

  if (subtotal !== undefined && subtotal < voucher.minOrderAmount) {
    return reject('below_minimum', voucher);
  }

  const usageProblem = checkUsage(voucher, usage);
  if (usageProblem) return reject(usageProblem, voucher);

  return accept(voucher);
}

export function acceptedVoucher(validation: VoucherValidation | null): Voucher | null {
  return validation && validation.ok ? validation.voucher : null;
}

export function computeDiscount(subtotal: number, voucher: Voucher): number {
  const raw = voucher.discountKind === 'percentage'
    ? Math.floor((subtotal * voucher.discountValue) / 100)
    : voucher.discountValue;

  const capped = voucher.discountKind === 'percentage' && voucher.maxDiscountAmount !== null
    ? Math.min(raw, voucher.maxDiscountAmount)
    : raw;

  return Math.max(0, Math.min(capped, subtotal));
}

export function describeRejection(reason: VoucherRejectionReason): string {
  switch (reason) {
    case 'not_found':
      return 'Voucher code does not exist';
    case 'inactive':
      return 'Voucher is no longer active';
    case 'not_started':
      return 'Voucher is not valid yet';
    case 'expired':
      return 'Voucher has expired';
    case 'below_minimum':
      return 'Order amount is below the voucher minimum';
    case 'usage_limit_reached':
      return 'Voucher has been fully redeemed';
    case 'per_user_limit_reached':
      return 'You have already used this voucher';
  }
}

/** Vouchers the user could still apply, best discount first. */
export function selectAvailableVouchers(
  vouchers: readonly Voucher[],
  usages: readonly VoucherUsage[],
  now: Date
): Voucher[] {
  const usageByVoucher = new Map(usages.map(usage => [usage.voucherId, usage]));

  return vouchers
    .filter(voucher => checkVoucherRules(voucher, usageByVoucher.get(voucher.id) ?? null, now).ok)
    .sort((a, b) => b.discountValue - a.discountValue);
}
