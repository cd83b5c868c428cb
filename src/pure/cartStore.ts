/**
 * CART STORE - coordinator
 *
 * Every call validates its input with the pure rules first and only then
 * opens a unit of work. Reads go through a unit of work too; repositories are
 * never reachable outside one.
 */

import type {CartLine} from '../domain';
import type {AppEffects, CartRepository, Repositories} from './effects';
import type {CartItemInput, CartLineEdit, CartLinePatch, CartSummary, CheckoutQuote, QuoteRequest} from './types';
import {applyCartLinePatch, validateCartItem, validateQuantity} from './cart';
import {CommerceError, emptyCart, notFound} from './errors';
import {buildCheckoutQuote, validateOrderType} from './orderBuilding';
import {collectToppingIds, summarizeCart} from './pricing';
import {evaluateVoucher} from './voucherRedemption';
import {Either, Left, Right} from 'purify-ts';

type CartResult<T> = Promise<Either<CommerceError, T>>;

/**
 * Prices the cart of a user against the current catalog. With `lock` the
 * cart rows stay locked until the surrounding unit of work ends.
 */
export async function loadCartSummary(
  repositories: Repositories,
  userId: number,
  lock: boolean
): Promise<CartSummary> {
  const lines = lock
    ? await repositories.cart.lockForUser(userId)
    : await repositories.cart.listForUser(userId);

  const [products, toppings] = await Promise.all([
    repositories.catalog.getProducts([...new Set(lines.map(line => line.productId))]),
    repositories.catalog.getToppings(collectToppingIds(lines)),
  ]);

  return summarizeCart(userId, lines, products, toppings);
}

export function addCartItem(
  userId: number,
  input: CartItemInput
): (appEffects: AppEffects) => CartResult<CartLine> {
  return async (appEffects: AppEffects) => {
    const validated = validateCartItem(userId, input, appEffects.settings.maxQuantityPerAdd);

    return validated.caseOf<CartResult<CartLine>>({
      Left: error => Promise.resolve(Left(error)),
      Right: line => appEffects.transactions.run(async ({cart, catalog}): CartResult<CartLine> => {
        const products = await catalog.getProducts([line.productId]);
        if (!products.has(line.productId)) {
          return Left(notFound('product', line.productId));
        }
        return Right(await cart.addOrIncrement(line));
      }),
    });
  };
}

/**
 * Overwrites the quantity of a line. Zero or less removes it, in which case
 * the result is null.
 */
export function updateCartQuantity(
  lineId: number,
  userId: number,
  quantity: number
): (appEffects: AppEffects) => CartResult<CartLine | null> {
  return async (appEffects: AppEffects) => {
    if (Number.isInteger(quantity) && quantity <= 0) {
      const removed = await removeCartItem(lineId, userId)(appEffects);
      return removed.map(() => null);
    }

    const validated = validateQuantity(quantity, appEffects.settings.maxQuantityPerAdd);

    return validated.caseOf<CartResult<CartLine | null>>({
      Left: error => Promise.resolve(Left(error)),
      Right: checked => appEffects.transactions.run(async ({cart}): CartResult<CartLine | null> => {
        const updated = await cart.updateQuantity(lineId, userId, checked);
        return updated ? Right(updated) : Left(notFound('cart_line', lineId));
      }),
    });
  };
}

/**
 * Applies a partial edit. When the edited line ends up identical to another
 * line of the same user the two merge and the surviving line is returned.
 */
export function updateCartItem(
  lineId: number,
  userId: number,
  patch: CartLinePatch
): (appEffects: AppEffects) => CartResult<CartLine | null> {
  return async (appEffects: AppEffects) =>
    appEffects.transactions.run(async ({cart}): CartResult<CartLine | null> => {
      const line = await cart.findOwned(lineId, userId);
      if (!line) return Left(notFound('cart_line', lineId));

      return applyCartLinePatch(line, patch, appEffects.settings.maxQuantityPerAdd)
        .caseOf<CartResult<CartLine | null>>({
          Left: error => Promise.resolve(Left(error)),
          Right: edit => saveCartLineEdit(cart, line, edit),
        });
    });
}

async function saveCartLineEdit(
  cart: CartRepository,
  line: CartLine,
  {customization, quantity}: CartLineEdit
): CartResult<CartLine | null> {
  if (quantity <= 0) {
    await cart.remove(line.id, line.userId);
    return Right(null);
  }

  const twin = await cart.findByIdentity(line.userId, line.productId, customization);
  if (twin && twin.id !== line.id) {
    await cart.remove(line.id, line.userId);
    const merged = await cart.updateQuantity(twin.id, line.userId, twin.quantity + quantity);
    return merged ? Right(merged) : Left(notFound('cart_line', twin.id));
  }

  const updated = await cart.updateLine(line.id, line.userId, customization, quantity);
  return updated ? Right(updated) : Left(notFound('cart_line', line.id));
}

export function removeCartItem(
  lineId: number,
  userId: number
): (appEffects: AppEffects) => CartResult<void> {
  return async (appEffects: AppEffects) =>
    appEffects.transactions.run(async ({cart}): CartResult<void> => {
      const removed = await cart.remove(lineId, userId);
      return removed ? Right(undefined) : Left(notFound('cart_line', lineId));
    });
}

/** Resolves with the number of lines removed. */
export function clearCart(userId: number): (appEffects: AppEffects) => CartResult<number> {
  return async (appEffects: AppEffects) =>
    appEffects.transactions.run(async ({cart}): CartResult<number> => Right(await cart.clear(userId)));
}

export function getCartSummary(userId: number): (appEffects: AppEffects) => CartResult<CartSummary> {
  return async (appEffects: AppEffects) =>
    appEffects.transactions.run(async (repositories): CartResult<CartSummary> =>
      Right(await loadCartSummary(repositories, userId, false))
    );
}

export function getCartCount(userId: number): (appEffects: AppEffects) => CartResult<number> {
  return async (appEffects: AppEffects) =>
    appEffects.transactions.run(async ({cart}): CartResult<number> => Right(await cart.countItems(userId)));
}

/** Checkout preview. Reads only; voucher usage is not touched. */
export function quoteCheckout(
  userId: number,
  request: QuoteRequest
): (appEffects: AppEffects) => CartResult<CheckoutQuote> {
  return async (appEffects: AppEffects) => {
    const {settings, clock} = appEffects;

    return validateOrderType(request.orderType).caseOf<CartResult<CheckoutQuote>>({
      Left: error => Promise.resolve(Left(error)),
      Right: orderType => appEffects.transactions.run(async (repositories): CartResult<CheckoutQuote> => {
        const summary = await loadCartSummary(repositories, userId, false);
        if (summary.lines.length === 0) return Left(emptyCart(userId));

        const voucher = request.voucherCode
          ? await evaluateVoucher(repositories, userId, request.voucherCode, summary.subtotal, clock.now(), false)
          : null;

        return Right(buildCheckoutQuote(
          summary,
          orderType,
          voucher?.validation ?? null,
          voucher?.discountAmount ?? 0,
          request.deliveryDistanceKm ?? settings.defaultDeliveryDistanceKm,
          settings
        ));
      }),
    });
  };
}
