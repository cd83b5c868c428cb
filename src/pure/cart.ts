/**
 * CART RULES
 *
 * Input validation and line identity for the cart store. Validation happens
 * here, before any repository is touched.
 */

import type {CartLine, Customization, NewCartLine, Temperature} from '../domain';
import type {CartItemInput, CartLineEdit, CartLinePatch} from './types';
import {CommerceError, validationError} from './errors';
import {isCupSize} from './pricing';
import {Either, Left, Right} from 'purify-ts';

export const TEMPERATURES: readonly Temperature[] = ['hot', 'cold'];

export function isTemperature(value: string): value is Temperature {
  return TEMPERATURES.some(temperature => temperature === value);
}

export function normalizeToppingIds(toppingIds: readonly number[]): number[] {
  return [...new Set(toppingIds)].sort((a, b) => a - b);
}

/** Key under which two lines of the same user merge. */
export function cartLineIdentityKey(productId: number, customization: Customization): string {
  return [
    productId,
    customization.size,
    customization.sugarLevel,
    customization.iceLevel,
    customization.temperature,
    normalizeToppingIds(customization.toppingIds).join(','),
  ].join('|');
}

export function validateQuantity(quantity: number, maxQuantity: number): Either<CommerceError, number> {
  if (!Number.isInteger(quantity) || quantity < 1) {
    return Left(validationError('Quantity must be a positive whole number', 'quantity'));
  }
  if (quantity > maxQuantity) {
    return Left(validationError(`Quantity cannot exceed ${maxQuantity}`, 'quantity'));
  }
  return Right(quantity);
}

function validateLevel(value: number, field: 'sugarLevel' | 'iceLevel'): Either<CommerceError, number> {
  return Number.isInteger(value) && value >= 0 && value <= 100
    ? Right(value)
    : Left(validationError('Level must be a whole number between 0 and 100', field));
}

function validateToppingIds(toppingIds: readonly number[]): Either<CommerceError, number[]> {
  return toppingIds.every(id => Number.isInteger(id) && id > 0)
    ? Right(normalizeToppingIds(toppingIds))
    : Left(validationError('Topping ids must be positive whole numbers', 'toppingIds'));
}

export function validateCartItem(
  userId: number,
  input: CartItemInput,
  maxQuantity: number
): Either<CommerceError, NewCartLine> {
  const { size, temperature } = input;
  if (!Number.isInteger(input.productId) || input.productId < 1) {
    return Left(validationError('Unknown product id', 'productId'));
  }
  if (!isCupSize(size)) {
    return Left(validationError('Size must be one of S, M, L', 'size'));
  }
  if (!isTemperature(temperature)) {
    return Left(validationError('Temperature must be hot or cold', 'temperature'));
  }

  return validateQuantity(input.quantity, maxQuantity).chain(quantity =>
    validateLevel(input.sugarLevel, 'sugarLevel').chain(sugarLevel =>
      validateLevel(input.iceLevel, 'iceLevel').chain(iceLevel =>
        validateToppingIds(input.toppingIds).map(toppingIds => ({
          userId,
          productId: input.productId,
          quantity,
          size,
          sugarLevel,
          iceLevel,
          temperature,
          toppingIds,
        }))
      )
    )
  );
}

/**
 * Applies a patch to a line. A resulting quantity of zero or less is returned
 * as-is; the caller turns it into a removal.
 */
export function applyCartLinePatch(
  line: CartLine,
  patch: CartLinePatch,
  maxQuantity: number
): Either<CommerceError, CartLineEdit> {
  if (Object.values(patch).every(value => value === undefined)) {
    return Left(validationError('Nothing to update'));
  }

  const quantity = patch.quantity ?? line.quantity;
  const quantityCheck: Either<CommerceError, number> = quantity <= 0 ? Right(quantity) : validateQuantity(quantity, maxQuantity);

  return quantityCheck.chain(checkedQuantity =>
    validateLevel(patch.sugarLevel ?? line.sugarLevel, 'sugarLevel').chain(sugarLevel =>
      validateLevel(patch.iceLevel ?? line.iceLevel, 'iceLevel').chain(iceLevel =>
        validateToppingIds(patch.toppingIds ?? line.toppingIds).map(toppingIds => ({
          quantity: checkedQuantity,
          customization: {
            size: patch.size ?? line.size,
            sugarLevel,
            iceLevel,
            temperature: patch.temperature ?? line.temperature,
            toppingIds,
          },
        }))
      )
    )
  );
}
