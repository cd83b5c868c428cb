/**
 * TESTS FOR PURE PRICING
 *
 * No mocks: catalog data goes in, prices come out.
 */

import type {CartLine, Product, Topping} from '../domain';
import {
  calculateItemPrice,
  calculateToppingCost,
  collectToppingIds,
  sizeAdjustmentFor,
  summarizeCart,
} from '../pure/pricing';

const latte: Product = {id: 1, name: 'Latte', basePrice: 45000, isAvailable: true, sizes: []};
const mocha: Product = {
  id: 2,
  name: 'Mocha',
  basePrice: 50000,
  isAvailable: true,
  sizes: [
    {size: 'S', priceAdjustment: -3000},
    {size: 'M', priceAdjustment: 0},
    {size: 'L', priceAdjustment: 8000},
  ],
};

const toppings = new Map<number, Topping>([
  [10, {id: 10, name: 'Pearls', price: 5000, isAvailable: true}],
  [11, {id: 11, name: 'Cream', price: 7000, isAvailable: true}],
]);

function line(id: number, productId: number, overrides: Partial<CartLine> = {}): CartLine {
  return {
    id,
    userId: 7,
    productId,
    quantity: 1,
    size: 'M',
    sugarLevel: 100,
    iceLevel: 100,
    temperature: 'cold',
    toppingIds: [],
    createdAt: new Date('2024-03-15T10:00:00Z'),
    ...overrides,
  };
}

describe('sizeAdjustmentFor', () => {
  it('falls back to the default table when the product has none', () => {
    expect(sizeAdjustmentFor(latte, 'S')).toBe(-5000);
    expect(sizeAdjustmentFor(latte, 'M')).toBe(0);
    expect(sizeAdjustmentFor(latte, 'L')).toBe(10000);
  });

  it('uses the product table when present', () => {
    expect(sizeAdjustmentFor(mocha, 'S')).toBe(-3000);
    expect(sizeAdjustmentFor(mocha, 'L')).toBe(8000);
  });
});

describe('calculateToppingCost', () => {
  it('sums known toppings and ignores unknown ids', () => {
    expect(calculateToppingCost([10, 11, 99], toppings)).toBe(12000);
  });

  it('is zero without toppings', () => {
    expect(calculateToppingCost([], toppings)).toBe(0);
  });
});

describe('calculateItemPrice', () => {
  it('adds base price, size adjustment and toppings', () => {
    expect(calculateItemPrice(latte, 'L', [10], toppings)).toEqual({
      basePrice: 45000,
      sizeAdjustment: 10000,
      toppingCost: 5000,
      total: 60000,
    });
  });

  it('prices an unknown product at zero', () => {
    const price = calculateItemPrice(undefined, 'M', [10], toppings);

    expect(price).toEqual({basePrice: 0, sizeAdjustment: 0, toppingCost: 0, total: 0});
  });
});

describe('collectToppingIds', () => {
  it('returns each topping once', () => {
    expect(collectToppingIds([{toppingIds: [10, 11]}, {toppingIds: [11]}])).toEqual([10, 11]);
  });
});

describe('summarizeCart', () => {
  const products = new Map<number, Product>([[1, latte], [2, mocha]]);

  it('prices every line and totals them', () => {
    const summary = summarizeCart(
      7,
      [line(1, 1, {quantity: 2, size: 'S'}), line(2, 2, {toppingIds: [10, 11]})],
      products,
      toppings
    );

    // Latte S: (45000 - 5000) * 2 = 80000
    // Mocha M + pearls + cream: 50000 + 12000 = 62000
    expect(summary.lines.map(priced => priced.lineSubtotal)).toEqual([80000, 62000]);
    expect(summary.lines[1].unitPrice).toBe(62000);
    expect(summary.lines[0].productName).toBe('Latte');
    expect(summary.subtotal).toBe(142000);
    expect(summary.itemCount).toBe(3);
    expect(summary.missingProductIds).toEqual([]);
  });

  it('leaves out lines whose product has left the catalog', () => {
    const summary = summarizeCart(7, [line(1, 1), line(2, 42, {quantity: 3})], products, toppings);

    expect(summary.lines).toHaveLength(1);
    expect(summary.subtotal).toBe(45000);
    expect(summary.itemCount).toBe(1);
    expect(summary.missingProductIds).toEqual([42]);
  });

  it('summarizes an empty cart as zero', () => {
    const summary = summarizeCart(7, [], products, toppings);

    expect(summary.subtotal).toBe(0);
    expect(summary.itemCount).toBe(0);
  });
});
