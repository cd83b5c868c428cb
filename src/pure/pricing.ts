/**
 * PRICING
 *
 * Unit prices of customised drinks. Everything here is a pure function of
 * catalog data that the caller has already fetched.
 */

import type {CartLine, CupSize, Product, SizeAdjustment, Topping} from '../domain';
import type {CartSummary, PriceBreakdown, PricedCartLine} from './types';
import {Maybe} from 'purify-ts';

export const CUP_SIZES: readonly CupSize[] = ['S', 'M', 'L'];

/** Used when a product has no size table of its own. */
export const DEFAULT_SIZE_ADJUSTMENTS: readonly SizeAdjustment[] = [
  { size: 'S', priceAdjustment: -5000 },
  { size: 'M', priceAdjustment: 0 },
  { size: 'L', priceAdjustment: 10000 },
];

const ZERO_PRICE: PriceBreakdown = {
  basePrice: 0,
  sizeAdjustment: 0,
  toppingCost: 0,
  total: 0,
};

export function isCupSize(value: string): value is CupSize {
  return CUP_SIZES.some(size => size === value);
}

export function sizeAdjustmentFor(product: Product, size: CupSize): number {
  const table = product.sizes.length > 0 ? product.sizes : DEFAULT_SIZE_ADJUSTMENTS;
  return table.find(entry => entry.size === size)?.priceAdjustment ?? 0;
}

export function calculateToppingCost(
  toppingIds: readonly number[],
  toppings: ReadonlyMap<number, Topping>
): number {
  return toppingIds.reduce((sum, id) => sum + (toppings.get(id)?.price ?? 0), 0);
}

/**
 * Unknown products price at zero rather than failing; an all-zero breakdown
 * means "not found" to callers.
 */
export function calculateItemPrice(
  product: Product | undefined,
  size: CupSize,
  toppingIds: readonly number[],
  toppings: ReadonlyMap<number, Topping>
): PriceBreakdown {
  if (!product) return ZERO_PRICE;

  const basePrice = product.basePrice;
  const sizeAdjustment = sizeAdjustmentFor(product, size);
  const toppingCost = calculateToppingCost(toppingIds, toppings);

  return {
    basePrice,
    sizeAdjustment,
    toppingCost,
    total: basePrice + sizeAdjustment + toppingCost,
  };
}

export function collectToppingIds(lines: readonly { toppingIds: readonly number[] }[]): number[] {
  return [...new Set(lines.flatMap(line => line.toppingIds))];
}

// ============================================================================
// Cart pricing
// ============================================================================

export function priceCartLines(
  lines: readonly CartLine[],
  products: ReadonlyMap<number, Product>,
  toppings: ReadonlyMap<number, Topping>
): { lines: PricedCartLine[]; missingProductIds: Maybe<number[]> } {
  const result = lines.reduce<{ lines: PricedCartLine[]; missingProductIds: number[] }>(
    (acc, line) => {
      const product = products.get(line.productId);

      if (!product) {
        return {
          ...acc,
          missingProductIds: [...acc.missingProductIds, line.productId],
        };
      }

      const price = calculateItemPrice(product, line.size, line.toppingIds, toppings);
      return {
        ...acc,
        lines: [...acc.lines, {
          ...line,
          productName: product.name,
          price,
          unitPrice: price.total,
          lineSubtotal: price.total * line.quantity,
        }],
      };
    },
    { lines: [], missingProductIds: [] }
  );

  return {
    lines: result.lines,
    missingProductIds: Maybe.fromPredicate(ids => ids.length > 0, result.missingProductIds),
  };
}

export function summarizeCart(
  userId: number,
  lines: readonly CartLine[],
  products: ReadonlyMap<number, Product>,
  toppings: ReadonlyMap<number, Topping>
): CartSummary {
  const priced = priceCartLines(lines, products, toppings);

  return {
    userId,
    lines: priced.lines,
    subtotal: priced.lines.reduce((sum, line) => sum + line.lineSubtotal, 0),
    itemCount: priced.lines.reduce((sum, line) => sum + line.quantity, 0),
    missingProductIds: priced.missingProductIds.orDefault([]),
  };
}
