/**
 * ORDER BUILDING
 *
 * Turns a priced cart and a checkout request into the records the order
 * materializer writes. Nothing here reads the clock or a random source on its
 * own; both are passed in.
 */

import type {OrderType, PaymentMethod, Voucher} from '../domain';
import type {CommerceSettings} from '../types';
import type {
  CartSummary,
  CheckoutQuote,
  CheckoutRequest,
  Fulfilment,
  OrderDraft,
  OrderLineDraft,
  VoucherValidation,
} from './types';
import {CommerceError, validationError} from './errors';
import {addMinutes, format} from 'date-fns';
import {Either, Left, Right} from 'purify-ts';

export const ORDER_TYPES: readonly OrderType[] = ['pickup', 'delivery', 'dine_in'];

export const PAYMENT_METHODS: readonly PaymentMethod[] = [
  'cash',
  'momo',
  'shopeepay',
  'zalopay',
  'applepay',
  'googlepay',
  'card',
];

export function isOrderType(value: string): value is OrderType {
  return ORDER_TYPES.some(type => type === value);
}

export function isPaymentMethod(value: string): value is PaymentMethod {
  return PAYMENT_METHODS.some(method => method === value);
}

// ============================================================================
// Order number
// ============================================================================

const ORDER_NUMBER_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const ORDER_NUMBER_SUFFIX_LENGTH = 6;

/**
 * ORD-YYYYMMDD-XXXXXX. `randomIndex(n)` must return an integer in [0, n).
 */
export function generateOrderNumber(now: Date, randomIndex: (bound: number) => number): string {
  const suffix = Array.from(
    {length: ORDER_NUMBER_SUFFIX_LENGTH},
    () => ORDER_NUMBER_ALPHABET.charAt(randomIndex(ORDER_NUMBER_ALPHABET.length))
  ).join('');
  return `ORD-${format(now, 'yyyyMMdd')}-${suffix}`;
}

// ============================================================================
// Fees and timing
// ============================================================================

export function calculateDeliveryFee(
  orderType: OrderType,
  subtotal: number,
  distanceKm: number,
  settings: Pick<CommerceSettings, 'freeShippingThreshold' | 'baseDeliveryFee'>
): number {
  if (orderType !== 'delivery') return 0;
  if (subtotal >= settings.freeShippingThreshold) return 0;

  const base = settings.baseDeliveryFee;
  if (distanceKm <= 3) return base;
  if (distanceKm <= 5) return base + 10000;
  if (distanceKm <= 10) return base + 20000;
  return base + 30000;
}

const FULFILMENT_MINUTES: Record<OrderType, number> = {
  pickup: 5,
  delivery: 30,
  dine_in: 0,
};

export function calculateEstimatedReadyTime(
  now: Date,
  itemCount: number,
  orderType: OrderType,
  settings: Pick<CommerceSettings, 'basePrepMinutes' | 'prepMinutesPerItem'>
): Date {
  const minutes =
    settings.basePrepMinutes + settings.prepMinutesPerItem * itemCount + FULFILMENT_MINUTES[orderType];
  return addMinutes(now, minutes);
}

// ============================================================================
// Checkout request
// ============================================================================

function blankToNull(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function validateOrderType(orderType: string): Either<CommerceError, OrderType> {
  return isOrderType(orderType)
    ? Right(orderType)
    : Left(validationError('Order type must be pickup, delivery or dine_in', 'orderType'));
}

export function validateFulfilment(request: CheckoutRequest): Either<CommerceError, Fulfilment> {
  const {paymentMethod} = request;

  return validateOrderType(request.orderType).chain((orderType): Either<CommerceError, Fulfilment> => {
    if (!isPaymentMethod(paymentMethod)) {
      return Left(validationError(`Unsupported payment method ${paymentMethod}`, 'paymentMethod'));
    }

    const deliveryAddress = blankToNull(request.deliveryAddress);
    const tableNumber = blankToNull(request.tableNumber);

    if (orderType === 'pickup' && request.storeId === undefined) {
      return Left(validationError('A store is required for pickup orders', 'storeId'));
    }
    if (orderType === 'delivery' && deliveryAddress === null) {
      return Left(validationError('A delivery address is required for delivery orders', 'deliveryAddress'));
    }
    if (orderType === 'dine_in' && tableNumber === null) {
      return Left(validationError('A table number is required for dine-in orders', 'tableNumber'));
    }

    return Right({
      orderType,
      paymentMethod,
      storeId: request.storeId ?? null,
      deliveryAddress,
      tableNumber,
      notes: blankToNull(request.notes),
    });
  });
}

// ============================================================================
// Records
// ============================================================================

export function buildCheckoutQuote(
  cart: CartSummary,
  orderType: OrderType,
  validation: VoucherValidation | null,
  discountAmount: number,
  distanceKm: number,
  settings: CommerceSettings
): CheckoutQuote {
  const deliveryFee = calculateDeliveryFee(orderType, cart.subtotal, distanceKm, settings);

  return {
    itemCount: cart.itemCount,
    subtotal: cart.subtotal,
    discountAmount,
    deliveryFee,
    total: cart.subtotal - discountAmount + deliveryFee,
    voucher: validation,
  };
}

export function buildOrderDraft(
  userId: number,
  orderNumber: string,
  fulfilment: Fulfilment,
  quote: CheckoutQuote,
  voucher: Voucher | null,
  now: Date,
  settings: CommerceSettings
): OrderDraft {
  return {
    userId,
    orderNumber,
    orderType: fulfilment.orderType,
    storeId: fulfilment.storeId,
    deliveryAddress: fulfilment.deliveryAddress,
    tableNumber: fulfilment.tableNumber,
    notes: fulfilment.notes,
    voucherId: voucher?.id ?? null,
    subtotal: quote.subtotal,
    discountAmount: quote.discountAmount,
    deliveryFee: quote.deliveryFee,
    total: quote.total,
    paymentMethod: fulfilment.paymentMethod,
    paymentStatus: 'pending',
    status: 'pending',
    estimatedReadyTime: calculateEstimatedReadyTime(now, quote.itemCount, fulfilment.orderType, settings),
    cancellationReason: null,
    createdAt: now,
    completedAt: null,
    cancelledAt: null,
  };
}

export function buildOrderLineDrafts(cart: CartSummary): OrderLineDraft[] {
  return cart.lines.map(line => ({
    productId: line.productId,
    productName: line.productName,
    size: line.size,
    quantity: line.quantity,
    unitPrice: line.unitPrice,
    sugarLevel: line.sugarLevel,
    iceLevel: line.iceLevel,
    temperature: line.temperature,
    toppingIds: line.toppingIds,
    toppingCost: line.price.toppingCost,
    lineSubtotal: line.lineSubtotal,
  }));
}
