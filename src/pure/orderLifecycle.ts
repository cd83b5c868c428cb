/**
 * ORDER LIFECYCLE
 *
 * The status state machine and the records a transition produces. Legal moves:
 *
 *   pending    -> confirmed | cancelled
 *   confirmed  -> preparing | cancelled
 *   preparing  -> ready
 *   ready      -> delivering (delivery orders) | completed (pickup, dine-in)
 *   delivering -> completed
 *
 * completed and cancelled are terminal.
 */

import type {Order, OrderStatus, OrderStatusChange, PaymentStatus} from '../domain';
import type {NotificationPayload} from '../types';
import type {OrderTracking, StatusUpdate, TrackingStep} from './types';
import {CommerceError, invalidTransition, validationError} from './errors';
import {Either, Left, Right} from 'purify-ts';

export const ORDER_STATUSES: readonly OrderStatus[] = [
  'pending',
  'confirmed',
  'preparing',
  'ready',
  'delivering',
  'completed',
  'cancelled',
];

export const PAYMENT_STATUSES: readonly PaymentStatus[] = ['pending', 'paid', 'failed', 'refunded'];

export function isOrderStatus(value: string): value is OrderStatus {
  return ORDER_STATUSES.some(status => status === value);
}

export function isPaymentStatus(value: string): value is PaymentStatus {
  return PAYMENT_STATUSES.some(status => status === value);
}

export function allowedNextStatuses(order: Pick<Order, 'status' | 'orderType'>): OrderStatus[] {
  switch (order.status) {
    case 'pending':
      return ['confirmed', 'cancelled'];
    case 'confirmed':
      return ['preparing', 'cancelled'];
    case 'preparing':
      return ['ready'];
    case 'ready':
      return order.orderType === 'delivery' ? ['delivering'] : ['completed'];
    case 'delivering':
      return ['completed'];
    case 'completed':
    case 'cancelled':
      return [];
  }
}

export function isTerminal(status: OrderStatus): boolean {
  return status === 'completed' || status === 'cancelled';
}

export function checkTransition(
  order: Pick<Order, 'status' | 'orderType'>,
  requested: string
): Either<CommerceError, OrderStatus> {
  const next = allowedNextStatuses(order).find(status => status === requested);
  return next ? Right(next) : Left(invalidTransition(order.status, requested));
}

export function validatePaymentStatus(value: string): Either<CommerceError, PaymentStatus> {
  return isPaymentStatus(value)
    ? Right(value)
    : Left(validationError(`Unknown payment status ${value}`, 'paymentStatus'));
}

export function buildStatusUpdate(
  status: OrderStatus,
  now: Date,
  notes: string | null
): StatusUpdate {
  return {
    status,
    updatedAt: now,
    completedAt: status === 'completed' ? now : null,
    cancelledAt: status === 'cancelled' ? now : null,
    cancellationReason: status === 'cancelled' ? notes : null,
  };
}

export function buildStatusChange(
  order: Order,
  to: OrderStatus,
  actorId: number,
  notes: string | null,
  now: Date
): OrderStatusChange {
  return {
    orderId: order.id,
    fromStatus: order.status,
    toStatus: to,
    actorId,
    notes,
    changedAt: now,
  };
}

// ============================================================================
// Customer-facing text
// ============================================================================

const STATUS_MESSAGES: Record<OrderStatus, string> = {
  pending: 'Your order has been received',
  confirmed: 'Your order has been confirmed',
  preparing: 'Your order is being prepared',
  ready: 'Your order is ready',
  delivering: 'Your order is on its way',
  completed: 'Your order has been completed',
  cancelled: 'Your order has been cancelled',
};

const STATUS_LABELS: Record<OrderStatus, string> = {
  pending: 'Received',
  confirmed: 'Confirmed',
  preparing: 'Preparing',
  ready: 'Ready',
  delivering: 'Out for delivery',
  completed: 'Completed',
  cancelled: 'Cancelled',
};

export function buildStatusNotification(order: Order, status: OrderStatus): NotificationPayload {
  return {
    userId: order.userId,
    title: `Order update #${order.orderNumber}`,
    message: STATUS_MESSAGES[status],
    type: 'order_update',
    relatedOrderId: order.id,
  };
}

const TIMELINE: readonly OrderStatus[] = ['pending', 'confirmed', 'preparing', 'ready', 'delivering', 'completed'];

/** Cancelled orders have no timeline. */
export function buildTrackingTimeline(order: Pick<Order, 'status' | 'orderType'>): TrackingStep[] {
  if (order.status === 'cancelled') return [];

  const reachedUpTo = TIMELINE.indexOf(order.status);
  return TIMELINE
    .map((status, index) => ({status, label: STATUS_LABELS[status], reached: index <= reachedUpTo}))
    .filter(step => step.status !== 'delivering' || order.orderType === 'delivery');
}

export function buildOrderTracking(order: Order): OrderTracking {
  return {
    order,
    currentStatus: order.status,
    timeline: buildTrackingTimeline(order),
    estimatedReadyTime: isTerminal(order.status) ? null : order.estimatedReadyTime,
  };
}
