/**
 * ORDER MATERIALIZER - The Coordinator
 *
 * This is the thin "effectful shell" around checkout:
 * 1. Inside one unit of work: lock and price the cart, validate the request
 *    and the voucher, write the order, its lines and the redemption, remove
 *    the ordered lines from the cart
 * 2. After commit: credit loyalty points, best-effort
 *
 * The arithmetic lives in orderBuilding.ts, vouchers.ts and pricing.ts.
 */

import type {CartLine, Order} from '../domain';
import type {AppEffects, Repositories} from './effects';
import type {CartSummary, CheckoutRequest, Fulfilment} from './types';
import {loadCartSummary} from './cartStore';
import {validateCartItem} from './cart';
import {CommerceError, describeError, emptyCart, notFound} from './errors';
import {creditPointsForOrder} from './loyaltyLedger';
import {
    buildCheckoutQuote,
    buildOrderDraft,
    buildOrderLineDrafts,
    generateOrderNumber,
    validateFulfilment,
} from './orderBuilding';
import {runBestEffort} from './sideEffects';
import {evaluateVoucher, VoucherEvaluation} from './voucherRedemption';
import {acceptedVoucher, describeRejection} from './vouchers';
import {Either, Left, Right} from 'purify-ts';
import {randomInt} from 'node:crypto';

type OrderResult<T> = Promise<Either<CommerceError, T>>;

const ORDER_NUMBER_ATTEMPTS = 10;

/**
 * Turn the cart of a user into an order.
 *
 * @return a function to place the order using the given app effects returning
 * either the business failure or the id of the new order
 * @throws EffectsError when the store is unavailable; nothing is written then
 */
export function createOrderFromCart(
    userId: number,
    request: CheckoutRequest
): (appEffects: AppEffects) => OrderResult<number> {
    return async (appEffects: AppEffects) => {
        const placed = await appEffects.transactions.run(repositories =>
            materializeOrder(userId, request, repositories, appEffects)
        );

        return placed.caseOf<OrderResult<number>>({
            Left: error => Promise.resolve(Left(error)),
            Right: async order => {
                console.log(`🧾 Order ${order.orderNumber} placed by user ${userId} (total ${order.total})`);
                await creditLoyaltyAfterCommit(order)(appEffects);
                return Right(order.id);
            },
        });
    };
}

/**
 * Steps that must commit or roll back together.
 */
async function materializeOrder(
    userId: number,
    request: CheckoutRequest,
    repositories: Repositories,
    appEffects: AppEffects
): OrderResult<Order> {
    // ========== GATHER INPUTS (Effects) ==========

    const cart = await loadCartSummary(repositories, userId, true);
    if (cart.lines.length === 0) return Left(emptyCart(userId));

    return validateFulfilment(request).caseOf<OrderResult<Order>>({
        Left: error => Promise.resolve(Left(error)),
        Right: fulfilment => writeOrder(userId, request, cart, fulfilment, repositories, appEffects),
    });
}

async function writeOrder(
    userId: number,
    request: CheckoutRequest,
    cart: CartSummary,
    fulfilment: Fulfilment,
    repositories: Repositories,
    appEffects: AppEffects
): OrderResult<Order> {
    const {clock, settings} = appEffects;
    const now = clock.now();

    const voucher = await lockVoucher(repositories, userId, request.voucherCode, cart.subtotal, now);

    // ========== PURE BUSINESS LOGIC (No Effects) ==========

    const quote = buildCheckoutQuote(
        cart,
        fulfilment.orderType,
        voucher?.validation ?? null,
        voucher?.discountAmount ?? 0,
        request.deliveryDistanceKm ?? settings.defaultDeliveryDistanceKm,
        settings
    );
    const appliedVoucher = acceptedVoucher(voucher?.validation ?? null);

    // ========== PERFORM OUTPUTS (Effects) ==========

    const orderNumber = await allocateOrderNumber(repositories, now);
    const order = await repositories.orders.insert(
        buildOrderDraft(userId, orderNumber, fulfilment, quote, appliedVoucher, now, settings)
    );
    await repositories.orders.insertLines(order.id, buildOrderLineDrafts(cart));

    if (appliedVoucher) {
        await repositories.vouchers.recordRedemption({
            voucherId: appliedVoucher.id,
            userId,
            orderId: order.id,
            discountAmount: quote.discountAmount,
            redeemedAt: now,
        });
    }

    await repositories.cart.removeLines(userId, cart.lines.map(line => line.id));
    return Right(order);
}

/**
 * Validates the code under a row lock. A rejected code does not fail
 * checkout; the order is placed without a discount.
 */
async function lockVoucher(
    repositories: Repositories,
    userId: number,
    code: string | undefined,
    subtotal: number,
    now: Date
): Promise<VoucherEvaluation | null> {
    if (!code?.trim()) return null;

    const evaluation = await evaluateVoucher(repositories, userId, code, subtotal, now, true);
    if (!evaluation.validation.ok) {
        console.info(
            `ℹ️  Voucher ${code} not applied for user ${userId}: ${describeRejection(evaluation.validation.reason)}`
        );
    }
    return evaluation;
}

async function allocateOrderNumber(repositories: Repositories, now: Date): Promise<string> {
    for (let attempt = 0; attempt < ORDER_NUMBER_ATTEMPTS; attempt++) {
        const candidate = generateOrderNumber(now, bound => randomInt(bound));
        if (!(await repositories.orders.existsByNumber(candidate))) return candidate;
    }
    throw new Error(`No free order number after ${ORDER_NUMBER_ATTEMPTS} attempts`);
}

/**
 * Best-effort: a failed credit leaves the order in place and raises an alert;
 * `creditPointsForOrder` can be replayed later.
 */
function creditLoyaltyAfterCommit(order: Order): (appEffects: AppEffects) => Promise<void> {
    return async (appEffects: AppEffects) => {
        await runBestEffort(
            [{
                name: 'loyalty_credit',
                run: async () => {
                    const credited = await creditPointsForOrder(order.id)(appEffects);
                    credited.ifLeft(error => {
                        throw new Error(describeError(error));
                    });
                },
            }],
            {userId: order.userId, orderId: order.id},
            appEffects.monitoring
        );
    };
}

// ============================================================================
// Reorder
// ============================================================================

/**
 * Copy the lines of a past order of the user back into their cart. Lines
 * whose product has left the catalog are skipped; quantities above the
 * per-add limit are capped at it.
 */
export function reorder(
    orderId: number,
    userId: number
): (appEffects: AppEffects) => OrderResult<CartLine[]> {
    return async (appEffects: AppEffects) =>
        appEffects.transactions.run(async ({orders, catalog, cart}): OrderResult<CartLine[]> => {
            const order = await orders.findById(orderId, false);
            if (!order || order.userId !== userId) return Left(notFound('order', orderId));

            const lines = await orders.findLines(orderId);
            const products = await catalog.getProducts([...new Set(lines.map(line => line.productId))]);
            const maxQuantity = appEffects.settings.maxQuantityPerAdd;

            const items = Either.sequence(lines
                .filter(line => products.has(line.productId))
                .map(line => validateCartItem(userId, {
                    productId: line.productId,
                    size: line.size,
                    quantity: Math.min(line.quantity, maxQuantity),
                    sugarLevel: line.sugarLevel,
                    iceLevel: line.iceLevel,
                    temperature: line.temperature,
                    toppingIds: line.toppingIds,
                }, maxQuantity)));

            return items.caseOf<OrderResult<CartLine[]>>({
                Left: error => Promise.resolve(Left(error)),
                Right: async validated => {
                    const added: CartLine[] = [];
                    for (const item of validated) {
                        added.push(await cart.addOrIncrement(item));
                    }
                    return Right(added);
                },
            });
        });
}
