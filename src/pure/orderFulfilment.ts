/**
 * ORDER LIFECYCLE - coordinator
 *
 * Status changes commit on their own; the history row and the customer
 * notification follow after commit and may fail without undoing the change.
 */

import type {Order, OrderOverview, OrderStatusChange, OrderWithLines} from '../domain';
import type {AppEffects} from './effects';
import type {OrderTracking} from './types';
import {CommerceError, notFound} from './errors';
import {
    buildOrderTracking,
    buildStatusChange,
    buildStatusNotification,
    buildStatusUpdate,
    checkTransition,
    validatePaymentStatus,
} from './orderLifecycle';
import {runBestEffort} from './sideEffects';
import {Either, Left, Right} from 'purify-ts';

type OrderResult<T> = Promise<Either<CommerceError, T>>;

type Transitioned = {
    readonly before: Order;
    readonly after: Order;
};

const ownedBy = (order: Order | null, userId: number | null): order is Order =>
    order !== null && (userId === null || order.userId === userId);

function transition(
    orderId: number,
    requested: string,
    actorId: number,
    notes: string | null,
    ownerId: number | null
): (appEffects: AppEffects) => OrderResult<Order> {
    return async (appEffects: AppEffects) => {
        const now = appEffects.clock.now();

        const result = await appEffects.transactions.run(async ({orders}): OrderResult<Transitioned> => {
            const order = await orders.findById(orderId, true);
            if (!ownedBy(order, ownerId)) return Left(notFound('order', orderId));

            return checkTransition(order, requested).caseOf<OrderResult<Transitioned>>({
                Left: error => Promise.resolve(Left(error)),
                Right: async status => Right({
                    before: order,
                    after: await orders.updateStatus(orderId, buildStatusUpdate(status, now, notes)),
                }),
            });
        });

        return result.caseOf<OrderResult<Order>>({
            Left: error => Promise.resolve(Left(error)),
            Right: async ({before, after}) => {
                console.log(`🔄 Order ${after.orderNumber}: ${before.status} -> ${after.status}`);
                await announceTransition(buildStatusChange(before, after.status, actorId, notes, now), after)(appEffects);
                return Right(after);
            },
        });
    };
}

function announceTransition(
    change: OrderStatusChange,
    order: Order
): (appEffects: AppEffects) => Promise<void> {
    return async (appEffects: AppEffects) => {
        await runBestEffort(
            [
                {
                    name: 'status_history',
                    run: () => appEffects.transactions.run(async ({orders}) => {
                        await orders.recordStatusChange(change);
                        return Right(undefined);
                    }),
                },
                {
                    name: 'status_notification',
                    run: () => appEffects.notifications.publish(buildStatusNotification(order, change.toStatus)),
                },
            ],
            {userId: order.userId, orderId: order.id},
            appEffects.monitoring
        );
    };
}

/**
 * Move an order to a new status on behalf of staff.
 *
 * @param newStatus unvalidated; anything that is not a legal next status
 * yields InvalidTransition
 * @param notes stored as the cancellation reason when cancelling
 */
export function transitionOrderStatus(
    orderId: number,
    newStatus: string,
    actorId: number,
    notes: string | null = null
): (appEffects: AppEffects) => OrderResult<Order> {
    return transition(orderId, newStatus, actorId, notes, null);
}

/** Customer cancellation. Orders of other users are reported as not found. */
export function cancelOrder(
    orderId: number,
    userId: number,
    reason: string | null = null
): (appEffects: AppEffects) => OrderResult<Order> {
    return transition(orderId, 'cancelled', userId, reason, userId);
}

export function updatePaymentStatus(
    orderId: number,
    paymentStatus: string
): (appEffects: AppEffects) => OrderResult<Order> {
    return async (appEffects: AppEffects) =>
        validatePaymentStatus(paymentStatus).caseOf<OrderResult<Order>>({
            Left: error => Promise.resolve(Left(error)),
            Right: status => appEffects.transactions.run(async ({orders}): OrderResult<Order> => {
                const updated = await orders.updatePaymentStatus(orderId, status, appEffects.clock.now());
                return updated ? Right(updated) : Left(notFound('order', orderId));
            }),
        });
}

// ============================================================================
// Queries
// ============================================================================

/** With a user id, orders of other users are reported as not found. */
export function getOrder(
    orderId: number,
    userId: number | null = null
): (appEffects: AppEffects) => OrderResult<OrderWithLines> {
    return async (appEffects: AppEffects) =>
        appEffects.transactions.run(async ({orders}): OrderResult<OrderWithLines> => {
            const order = await orders.findById(orderId, false);
            if (!ownedBy(order, userId)) return Left(notFound('order', orderId));
            return Right({...order, lines: await orders.findLines(orderId)});
        });
}

export function getOrdersForUser(
    userId: number,
    limit = 20
): (appEffects: AppEffects) => OrderResult<OrderOverview[]> {
    return async (appEffects: AppEffects) =>
        appEffects.transactions.run(async ({orders}): OrderResult<OrderOverview[]> =>
            Right(await orders.listForUser(userId, limit))
        );
}

export function trackOrder(
    orderId: number,
    userId: number
): (appEffects: AppEffects) => OrderResult<OrderTracking> {
    return async (appEffects: AppEffects) =>
        appEffects.transactions.run(async ({orders}): OrderResult<OrderTracking> => {
            const order = await orders.findById(orderId, false);
            return ownedBy(order, userId) ? Right(buildOrderTracking(order)) : Left(notFound('order', orderId));
        });
}

/** Oldest first. */
export function getStatusHistory(
    orderId: number,
    userId: number | null = null
): (appEffects: AppEffects) => OrderResult<OrderStatusChange[]> {
    return async (appEffects: AppEffects) =>
        appEffects.transactions.run(async ({orders}): OrderResult<OrderStatusChange[]> => {
            const order = await orders.findById(orderId, false);
            if (!ownedBy(order, userId)) return Left(notFound('order', orderId));
            return Right(await orders.listStatusChanges(orderId));
        });
}
