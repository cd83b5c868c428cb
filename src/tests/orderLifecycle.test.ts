import type {Order} from '../domain';
import {invalidTransition, validationError} from '../pure/errors';
import {
  allowedNextStatuses,
  buildOrderTracking,
  buildStatusNotification,
  buildStatusUpdate,
  buildTrackingTimeline,
  checkTransition,
  validatePaymentStatus,
} from '../pure/orderLifecycle';
import {Left, Right} from 'purify-ts';

const now = new Date('2024-03-15T10:00:00Z');

function order(overrides: Partial<Order> = {}): Order {
  return {
    id: 5,
    userId: 7,
    orderNumber: 'ORD-20240315-ABC123',
    orderType: 'pickup',
    storeId: 2,
    deliveryAddress: null,
    tableNumber: null,
    notes: null,
    voucherId: null,
    subtotal: 55000,
    discountAmount: 0,
    deliveryFee: 0,
    total: 55000,
    paymentMethod: 'cash',
    paymentStatus: 'pending',
    status: 'pending',
    estimatedReadyTime: new Date('2024-03-15T10:23:00Z'),
    cancellationReason: null,
    createdAt: now,
    updatedAt: now,
    completedAt: null,
    cancelledAt: null,
    ...overrides,
  };
}

describe('allowedNextStatuses', () => {
  it('routes ready orders by order type', () => {
    expect(allowedNextStatuses(order({status: 'ready'}))).toEqual(['completed']);
    expect(allowedNextStatuses(order({status: 'ready', orderType: 'delivery'}))).toEqual(['delivering']);
  });

  it('allows cancelling only before preparation', () => {
    expect(allowedNextStatuses(order({status: 'confirmed'}))).toContain('cancelled');
    expect(allowedNextStatuses(order({status: 'preparing'}))).toEqual(['ready']);
  });

  it('has no moves out of terminal states', () => {
    expect(allowedNextStatuses(order({status: 'completed'}))).toEqual([]);
    expect(allowedNextStatuses(order({status: 'cancelled'}))).toEqual([]);
  });
});

describe('checkTransition', () => {
  it('accepts a legal move', () => {
    expect(checkTransition(order(), 'confirmed')).toEqual(Right('confirmed'));
  });

  it('rejects skipping a step', () => {
    expect(checkTransition(order(), 'ready')).toEqual(Left(invalidTransition('pending', 'ready')));
  });

  it('rejects unknown statuses as transitions', () => {
    expect(checkTransition(order(), 'teleported')).toEqual(Left(invalidTransition('pending', 'teleported')));
  });

  it('keeps delivery orders away from completed until delivering', () => {
    expect(checkTransition(order({status: 'ready', orderType: 'delivery'}), 'completed').isLeft()).toBe(true);
  });
});

describe('validatePaymentStatus', () => {
  it('accepts known statuses', () => {
    expect(validatePaymentStatus('paid')).toEqual(Right('paid'));
  });

  it('rejects anything else', () => {
    expect(validatePaymentStatus('lost')).toEqual(Left(validationError('Unknown payment status lost', 'paymentStatus')));
  });
});

describe('buildStatusUpdate', () => {
  it('stamps completion', () => {
    expect(buildStatusUpdate('completed', now, 'ignored')).toEqual({
      status: 'completed',
      updatedAt: now,
      completedAt: now,
      cancelledAt: null,
      cancellationReason: null,
    });
  });

  it('stamps cancellation with its reason', () => {
    expect(buildStatusUpdate('cancelled', now, 'Changed my mind')).toEqual({
      status: 'cancelled',
      updatedAt: now,
      completedAt: null,
      cancelledAt: now,
      cancellationReason: 'Changed my mind',
    });
  });
});

describe('buildStatusNotification', () => {
  it('addresses the owner of the order', () => {
    expect(buildStatusNotification(order(), 'delivering')).toEqual({
      userId: 7,
      title: 'Order update #ORD-20240315-ABC123',
      message: 'Your order is on its way',
      type: 'order_update',
      relatedOrderId: 5,
    });
  });
});

describe('tracking', () => {
  it('marks steps up to the current status and hides delivery for pickup', () => {
    const timeline = buildTrackingTimeline(order({status: 'preparing'}));

    expect(timeline.map(step => step.status)).toEqual(['pending', 'confirmed', 'preparing', 'ready', 'completed']);
    expect(timeline.map(step => step.reached)).toEqual([true, true, true, false, false]);
  });

  it('includes the delivery step for delivery orders', () => {
    const timeline = buildTrackingTimeline(order({status: 'delivering', orderType: 'delivery'}));

    expect(timeline.find(step => step.status === 'delivering')).toEqual({
      status: 'delivering',
      label: 'Out for delivery',
      reached: true,
    });
  });

  it('has no timeline once cancelled', () => {
    expect(buildTrackingTimeline(order({status: 'cancelled'}))).toEqual([]);
  });

  it('drops the estimate for finished orders', () => {
    expect(buildOrderTracking(order()).estimatedReadyTime).toEqual(new Date('2024-03-15T10:23:00Z'));
    expect(buildOrderTracking(order({status: 'completed'})).estimatedReadyTime).toBeNull();
  });
});
