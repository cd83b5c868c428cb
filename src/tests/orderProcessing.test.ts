/**
 * ORDER MATERIALIZER INTEGRATION TESTS
 *
 * Checkout runs against the in-memory store, which rolls back on a Left or
 * a throw just like the database. We're checking the plumbing: what is
 * written together, what is left alone, and what happens after commit.
 */

import type {NewCartLine} from '../domain';
import type {Repositories, UnitOfWork} from '../pure/effects';
import {emptyCart, notFound, validationError} from '../pure/errors';
import {createOrderFromCart, reorder} from '../pure/orderProcessing';
import type {CheckoutRequest} from '../pure/types';
import {account, createTestEffects, product, TestEffects, voucher} from './fakes/inMemoryEffects';
import {Either, Left, Right} from 'purify-ts';

const largeLatte: NewCartLine = {
  userId: 7,
  productId: 1,
  size: 'L',
  quantity: 1,
  sugarLevel: 50,
  iceLevel: 100,
  temperature: 'cold',
  toppingIds: [],
};

const pickup: CheckoutRequest = {orderType: 'pickup', paymentMethod: 'cash', storeId: 2, voucherCode: 'save10'};

async function seededEffects(): Promise<TestEffects> {
  const effects = createTestEffects();
  const {state} = effects.store;
  state.products.set(1, product(1, 'Latte', 45000));
  state.vouchers.set(1, voucher(1, 'SAVE10', {minOrderAmount: 50000}));
  state.accounts.set(7, account(7));
  state.accounts.set(8, account(8));
  await effects.store.repositories.cart.addOrIncrement(largeLatte);
  return effects;
}

describe('createOrderFromCart', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('writes the order, its lines and the redemption, then empties the cart', async () => {
    const effects = await seededEffects();

    const result = await createOrderFromCart(7, pickup)(effects);

    expect(result.isRight()).toBe(true);
    const orderId = result.orDefault(0);
    const order = effects.store.state.orders.get(orderId);

    // 55000 subtotal, 10% off, no fee for pickup
    expect(order).toMatchObject({
      userId: 7,
      subtotal: 55000,
      discountAmount: 5500,
      deliveryFee: 0,
      total: 49500,
      voucherId: 1,
      status: 'pending',
      paymentStatus: 'pending',
    });
    expect(order?.orderNumber).toMatch(/^ORD-\d{8}-[A-Z0-9]{6}$/);
    expect(effects.store.state.orderLines.map(line => [line.orderId, line.lineSubtotal])).toEqual([[orderId, 55000]]);
    expect(effects.store.state.cartLines).toEqual([]);
    expect(effects.store.state.vouchers.get(1)?.currentUsage).toBe(1);
    expect(effects.store.state.redemptions).toEqual([{
      voucherId: 1,
      userId: 7,
      orderId,
      discountAmount: 5500,
      redeemedAt: effects.clock.now(),
    }]);
  });

  it('credits loyalty points after commit', async () => {
    const effects = await seededEffects();

    const result = await createOrderFromCart(7, pickup)(effects);

    // floor(49500 * 0.01)
    expect(effects.store.state.accounts.get(7)).toEqual({userId: 7, balance: 495, tier: 'Bronze'});
    expect(effects.store.state.loyaltyTransactions.map(entry => [entry.kind, entry.delta, entry.relatedOrderId]))
      .toEqual([['earn', 495, result.orDefault(0)]]);
    expect(effects.monitoring.sendAlerts).not.toHaveBeenCalled();
  });

  it('places the order without a discount when the voucher is rejected', async () => {
    const effects = await seededEffects();
    effects.store.state.vouchers.set(1, voucher(1, 'SAVE10', {endsAt: new Date('2024-03-01T00:00:00Z')}));

    const result = await createOrderFromCart(7, pickup)(effects);

    const order = effects.store.state.orders.get(result.orDefault(0));
    expect(order?.discountAmount).toBe(0);
    expect(order?.voucherId).toBeNull();
    expect(order?.total).toBe(55000);
    expect(effects.store.state.redemptions).toEqual([]);
  });

  it('adds the delivery fee to delivery orders', async () => {
    const effects = await seededEffects();

    const result = await createOrderFromCart(7, {
      orderType: 'delivery',
      paymentMethod: 'momo',
      deliveryAddress: '12 Nguyen Hue',
      deliveryDistanceKm: 2,
    })(effects);

    const order = effects.store.state.orders.get(result.orDefault(0));
    expect(order?.deliveryFee).toBe(20000);
    expect(order?.total).toBe(75000);
    expect(order?.deliveryAddress).toBe('12 Nguyen Hue');
  });

  it('writes nothing when the request is invalid', async () => {
    const effects = await seededEffects();

    const result = await createOrderFromCart(7, {orderType: 'delivery', paymentMethod: 'cash'})(effects);

    expect(result).toEqual(
      Left(validationError('A delivery address is required for delivery orders', 'deliveryAddress'))
    );
    expect(effects.store.state.orders.size).toBe(0);
    expect(effects.store.state.cartLines).toHaveLength(1);
  });

  it('refuses an empty cart', async () => {
    const effects = await seededEffects();

    expect(await createOrderFromCart(8, pickup)(effects)).toEqual(Left(emptyCart(8)));
  });

  it('lets only one of two concurrent checkouts use a single-use voucher', async () => {
    const effects = await seededEffects();
    effects.store.state.vouchers.set(1, voucher(1, 'SAVE10', {usageLimit: 1}));
    await effects.store.repositories.cart.addOrIncrement({...largeLatte, userId: 8});

    const [first, second] = await Promise.all([
      createOrderFromCart(7, pickup)(effects),
      createOrderFromCart(8, pickup)(effects),
    ]);

    expect(first.isRight() && second.isRight()).toBe(true);
    const discounts = [...effects.store.state.orders.values()].map(order => order.discountAmount).sort();
    expect(discounts).toEqual([0, 5500]);
    expect(effects.store.state.vouchers.get(1)?.currentUsage).toBe(1);
  });

  it('rolls everything back when a write fails', async () => {
    const effects = await seededEffects();
    const store = effects.store;
    const failingRemove: UnitOfWork = {
      run: <L, R>(work: (repositories: Repositories) => Promise<Either<L, R>>) => store.run(repositories => work({
        ...repositories,
        cart: {...repositories.cart, removeLines: () => Promise.reject(new Error('disk full'))},
      })),
    };

    await expect(createOrderFromCart(7, pickup)({...effects, transactions: failingRemove})).rejects.toThrow('disk full');

    expect(store.state.orders.size).toBe(0);
    expect(store.state.orderLines).toEqual([]);
    expect(store.state.vouchers.get(1)?.currentUsage).toBe(0);
    expect(store.state.cartLines).toHaveLength(1);
  });

  it('leaves a line added after the cart was locked for the next order', async () => {
    const effects = await seededEffects();
    const store = effects.store;
    store.state.products.set(2, product(2, 'Mocha', 50000));
    const addsMochaAfterLock: UnitOfWork = {
      run: <L, R>(work: (repositories: Repositories) => Promise<Either<L, R>>) => store.run(repositories => work({
        ...repositories,
        cart: {
          ...repositories.cart,
          lockForUser: async userId => {
            const locked = await repositories.cart.lockForUser(userId);
            await repositories.cart.addOrIncrement({...largeLatte, productId: 2});
            return locked;
          },
        },
      })),
    };

    const result = await createOrderFromCart(7, pickup)({...effects, transactions: addsMochaAfterLock});

    expect(result.isRight()).toBe(true);
    expect(store.state.orderLines.map(line => line.productId)).toEqual([1]);
    expect(store.state.cartLines.map(line => line.productId)).toEqual([2]);
  });

  it('keeps the order and raises an alert when the loyalty credit fails', async () => {
    const effects = await seededEffects();
    effects.store.state.accounts.delete(7);

    const result = await createOrderFromCart(7, pickup)(effects);

    const orderId = result.orDefault(0);
    expect(effects.store.state.orders.has(orderId)).toBe(true);
    expect(effects.monitoring.sendAlerts).toHaveBeenCalledWith([{
      type: 'side_effect_failed',
      sideEffect: 'loyalty_credit',
      userId: 7,
      orderId,
      detail: 'user 7 not found',
    }]);
  });
});

describe('reorder', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('copies the lines of a past order back into the cart', async () => {
    const effects = await seededEffects();
    const orderId = (await createOrderFromCart(7, pickup)(effects)).orDefault(0);

    const result = await reorder(orderId, 7)(effects);

    expect(result.map(lines => lines.map(line => [line.productId, line.size, line.quantity, line.sugarLevel])))
      .toEqual(Right([[1, 'L', 1, 50]]));
    expect(effects.store.state.cartLines).toHaveLength(1);
  });

  it('skips products that left the catalog', async () => {
    const effects = await seededEffects();
    const orderId = (await createOrderFromCart(7, pickup)(effects)).orDefault(0);
    effects.store.state.products.delete(1);

    expect(await reorder(orderId, 7)(effects)).toEqual(Right([]));
  });

  it('does not reorder orders of other users', async () => {
    const effects = await seededEffects();
    const orderId = (await createOrderFromCart(7, pickup)(effects)).orDefault(0);

    expect(await reorder(orderId, 8)(effects)).toEqual(Left(notFound('order', orderId)));
  });
});
