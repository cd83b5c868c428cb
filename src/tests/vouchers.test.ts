import type {Voucher, VoucherUsage} from '../domain';
import {
  acceptedVoucher,
  checkVoucherRules,
  computeDiscount,
  describeRejection,
  normalizeVoucherCode,
  selectAvailableVouchers,
} from '../pure/vouchers';

const now = new Date('2024-03-15T10:00:00Z');

function voucher(overrides: Partial<Voucher> = {}): Voucher {
  return {
    id: 1,
    code: 'SAVE10',
    name: 'Ten percent off',
    discountKind: 'percentage',
    discountValue: 10,
    minOrderAmount: 50000,
    maxDiscountAmount: null,
    usageLimit: null,
    usagePerUser: null,
    currentUsage: 0,
    startsAt: new Date('2024-03-01T00:00:00Z'),
    endsAt: new Date('2024-03-31T23:59:59Z'),
    isActive: true,
    ...overrides,
  };
}

const usage = (timesUsed: number, voucherId = 1): VoucherUsage => ({
  userId: 7,
  voucherId,
  timesUsed,
  lastUsedAt: null,
});

describe('normalizeVoucherCode', () => {
  it('trims and upper-cases', () => {
    expect(normalizeVoucherCode('  save10 ')).toBe('SAVE10');
  });
});

describe('checkVoucherRules', () => {
  it('accepts a voucher that passes every check', () => {
    const validation = checkVoucherRules(voucher(), null, now, 55000);

    expect(validation.ok).toBe(true);
    expect(acceptedVoucher(validation)?.code).toBe('SAVE10');
  });

  it('reports a missing voucher', () => {
    expect(checkVoucherRules(null, null, now, 55000)).toEqual({ok: false, reason: 'not_found', voucher: null});
  });

  it.each([
    ['inactive', {isActive: false}],
    ['not_started', {startsAt: new Date('2024-04-01T00:00:00Z')}],
    ['expired', {endsAt: new Date('2024-03-14T00:00:00Z')}],
    ['usage_limit_reached', {usageLimit: 5, currentUsage: 5}],
  ] as const)('rejects with %s', (reason, overrides) => {
    expect(checkVoucherRules(voucher(overrides), null, now, 55000).reason).toBe(reason);
  });

  it('rejects a subtotal below the minimum', () => {
    expect(checkVoucherRules(voucher(), null, now, 49999).reason).toBe('below_minimum');
  });

  it('skips the minimum check without a subtotal', () => {
    expect(checkVoucherRules(voucher(), null, now).ok).toBe(true);
  });

  it('enforces the per-user limit', () => {
    expect(checkVoucherRules(voucher({usagePerUser: 1}), usage(1), now, 55000).reason)
      .toBe('per_user_limit_reached');
    expect(checkVoucherRules(voucher({usagePerUser: 2}), usage(1), now, 55000).ok).toBe(true);
  });

  it('reports the window problem before the usage problem', () => {
    const validation = checkVoucherRules(
      voucher({isActive: false, usageLimit: 1, currentUsage: 1}),
      null,
      now,
      55000
    );
    expect(validation.reason).toBe('inactive');
    expect(acceptedVoucher(validation)).toBeNull();
  });
});

describe('computeDiscount', () => {
  it('rounds percentage discounts down', () => {
    expect(computeDiscount(55555, voucher())).toBe(5555);
  });

  it('caps percentage discounts at the maximum', () => {
    expect(computeDiscount(300000, voucher({maxDiscountAmount: 20000}))).toBe(20000);
  });

  it('never exceeds the subtotal', () => {
    expect(computeDiscount(15000, voucher({discountKind: 'fixed', discountValue: 20000}))).toBe(15000);
  });

  it('applies fixed discounts as-is', () => {
    expect(computeDiscount(60000, voucher({discountKind: 'fixed', discountValue: 20000}))).toBe(20000);
  });
});

describe('describeRejection', () => {
  it('explains each reason', () => {
    expect(describeRejection('expired')).toBe('Voucher has expired');
    expect(describeRejection('per_user_limit_reached')).toBe('You have already used this voucher');
  });
});

describe('selectAvailableVouchers', () => {
  it('drops vouchers the user can no longer apply and sorts by value', () => {
    const vouchers = [
      voucher({id: 1, code: 'SAVE10', discountValue: 10}),
      voucher({id: 2, code: 'ONCE', discountValue: 30, usagePerUser: 1}),
      voucher({id: 3, code: 'SAVE20', discountValue: 20}),
      voucher({id: 4, code: 'GONE', discountValue: 50, usageLimit: 10, currentUsage: 10}),
    ];

    const available = selectAvailableVouchers(vouchers, [usage(1, 2)], now);

    expect(available.map(v => v.code)).toEqual(['SAVE20', 'SAVE10']);
  });
});
