/**
 * VOUCHER VALIDATION AND REDEMPTION - coordinator
 */

import type {Voucher, VoucherUsage} from '../domain';
import type {AppEffects, Repositories} from './effects';
import type {VoucherValidation} from './types';
import {CommerceError, notFound, validationError} from './errors';
import {
  checkVoucherRules,
  computeDiscount,
  describeRejection,
  normalizeVoucherCode,
  selectAvailableVouchers,
} from './vouchers';
import {Either, Left, Right} from 'purify-ts';

export type VoucherEvaluation = {
  readonly validation: VoucherValidation;
  readonly discountAmount: number;
};

/**
 * Looks the code up and checks it against a subtotal. With `forUpdate` the
 * voucher row stays locked, so a redemption later in the same unit of work
 * sees the counters it was checked against.
 */
export async function evaluateVoucher(
  repositories: Repositories,
  userId: number,
  code: string,
  subtotal: number,
  now: Date,
  forUpdate: boolean
): Promise<VoucherEvaluation> {
  const voucher = await repositories.vouchers.findByCode(normalizeVoucherCode(code), forUpdate);
  const usage = voucher ? await repositories.vouchers.getUsage(userId, voucher.id) : null;
  const validation = checkVoucherRules(voucher, usage, now, subtotal);

  return {
    validation,
    discountAmount: validation.ok ? computeDiscount(subtotal, validation.voucher) : 0,
  };
}

export function validateVoucherCode(
  userId: number,
  code: string,
  subtotal: number
): (appEffects: AppEffects) => Promise<Either<CommerceError, VoucherEvaluation>> {
  return async (appEffects: AppEffects) =>
    appEffects.transactions.run(async (repositories): Promise<Either<CommerceError, VoucherEvaluation>> =>
      Right(await evaluateVoucher(repositories, userId, code, subtotal, appEffects.clock.now(), false))
    );
}

/**
 * Consumes one use of a voucher: re-checks state, window and both usage
 * limits under a row lock, then bumps both counters and records the
 * redemption. The minimum order amount is not re-checked.
 */
export function redeemVoucher(
  userId: number,
  voucherId: number,
  orderId: number | null = null,
  discountAmount = 0
): (appEffects: AppEffects) => Promise<Either<CommerceError, VoucherUsage>> {
  return async (appEffects: AppEffects) =>
    appEffects.transactions.run(async ({vouchers}): Promise<Either<CommerceError, VoucherUsage>> => {
      const voucher = await vouchers.findById(voucherId, true);
      if (!voucher) return Left(notFound('voucher', voucherId));

      const now = appEffects.clock.now();
      const validation = checkVoucherRules(voucher, await vouchers.getUsage(userId, voucherId), now);
      if (!validation.ok) {
        return Left(validationError(`${describeRejection(validation.reason)} (${validation.reason})`, 'voucher'));
      }

      return Right(await vouchers.recordRedemption({
        voucherId,
        userId,
        orderId,
        discountAmount,
        redeemedAt: now,
      }));
    });
}

export function listAvailableVouchers(
  userId: number
): (appEffects: AppEffects) => Promise<Either<CommerceError, Voucher[]>> {
  return async (appEffects: AppEffects) =>
    appEffects.transactions.run(async ({vouchers}): Promise<Either<CommerceError, Voucher[]>> => {
      const now = appEffects.clock.now();
      const [active, usages] = await Promise.all([
        vouchers.listActive(now),
        vouchers.listUsageForUser(userId),
      ]);
      return Right(selectAvailableVouchers(active, usages, now));
    });
}
