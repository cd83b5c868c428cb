import {notFound, validationError} from '../pure/errors';
import {listAvailableVouchers, redeemVoucher, validateVoucherCode} from '../pure/voucherRedemption';
import {createTestEffects, FIXED_NOW, TestEffects, voucher} from './fakes/inMemoryEffects';
import {Left, Right} from 'purify-ts';

function withVouchers(): TestEffects {
  const effects = createTestEffects();
  const {vouchers} = effects.store.state;
  vouchers.set(1, voucher(1, 'SAVE10', {minOrderAmount: 50000, maxDiscountAmount: 8000}));
  vouchers.set(2, voucher(2, 'WELCOME', {discountKind: 'fixed', discountValue: 15000, usagePerUser: 1}));
  vouchers.set(3, voucher(3, 'SPRING', {startsAt: new Date('2024-04-01T00:00:00Z')}));
  return effects;
}

describe('validateVoucherCode', () => {
  it('computes the discount of an accepted code', async () => {
    const effects = withVouchers();

    const result = await validateVoucherCode(7, ' save10 ', 100000)(effects);

    // 10% of 100000, capped at 8000
    expect(result.map(({validation, discountAmount}) => [validation.ok, discountAmount])).toEqual(Right([true, 8000]));
  });

  it('explains a rejection without failing', async () => {
    const effects = withVouchers();

    const result = await validateVoucherCode(7, 'SAVE10', 30000)(effects);

    expect(result.map(({validation, discountAmount}) => [validation.reason, discountAmount]))
      .toEqual(Right(['below_minimum', 0]));
  });

  it('reports unknown codes as not found', async () => {
    const effects = withVouchers();

    const result = await validateVoucherCode(7, 'NOPE', 30000)(effects);

    expect(result.map(({validation}) => validation.reason)).toEqual(Right('not_found'));
  });
});

describe('redeemVoucher', () => {
  it('bumps both counters and records the redemption', async () => {
    const effects = withVouchers();

    const result = await redeemVoucher(7, 2, 31, 15000)(effects);

    expect(result).toEqual(Right({userId: 7, voucherId: 2, timesUsed: 1, lastUsedAt: FIXED_NOW}));
    expect(effects.store.state.vouchers.get(2)?.currentUsage).toBe(1);
    expect(effects.store.state.redemptions).toEqual([
      {voucherId: 2, userId: 7, orderId: 31, discountAmount: 15000, redeemedAt: FIXED_NOW},
    ]);
  });

  it('enforces the per-user limit', async () => {
    const effects = withVouchers();
    await redeemVoucher(7, 2)(effects);

    const again = await redeemVoucher(7, 2)(effects);

    expect(again).toEqual(Left(validationError('You have already used this voucher (per_user_limit_reached)', 'voucher')));
    expect(effects.store.state.vouchers.get(2)?.currentUsage).toBe(1);
  });

  it('refuses a voucher outside its window', async () => {
    const effects = withVouchers();

    expect(await redeemVoucher(7, 3)(effects)).toEqual(
      Left(validationError('Voucher is not valid yet (not_started)', 'voucher'))
    );
  });

  it('reports an unknown voucher', async () => {
    const effects = withVouchers();

    expect(await redeemVoucher(7, 404)(effects)).toEqual(Left(notFound('voucher', 404)));
  });
});

describe('listAvailableVouchers', () => {
  it('lists what the user can still apply, best first', async () => {
    const effects = withVouchers();
    await redeemVoucher(8, 2)(effects);

    expect((await listAvailableVouchers(7)(effects)).map(list => list.map(v => v.code)))
      .toEqual(Right(['WELCOME', 'SAVE10']));
    expect((await listAvailableVouchers(8)(effects)).map(list => list.map(v => v.code)))
      .toEqual(Right(['SAVE10']));
  });
});
