import {z} from 'zod';

// Request shapes only. Ranges and enumerations are checked by the engine,
// which reports them as ValidationError with the offending field.

const id = z.coerce.number().int().positive();
const wholeNumber = z.number().int();

export const userIdHeaderSchema = id;

export const idParamSchema = id;

export const listQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(100).optional(),
});

export const addCartItemSchema = z.object({
  productId: wholeNumber,
  size: z.string().default('M'),
  quantity: wholeNumber.default(1),
  sugarLevel: wholeNumber.default(100),
  iceLevel: wholeNumber.default(100),
  temperature: z.string().default('cold'),
  toppingIds: z.array(wholeNumber).default([]),
});

export const updateQuantitySchema = z.object({
  quantity: wholeNumber,
});

export const cartLinePatchSchema = z
  .object({
    size: z.enum(['S', 'M', 'L']).optional(),
    quantity: wholeNumber.optional(),
    sugarLevel: wholeNumber.optional(),
    iceLevel: wholeNumber.optional(),
    temperature: z.enum(['hot', 'cold']).optional(),
    toppingIds: z.array(wholeNumber).optional(),
  })
  .strict();

export const quoteSchema = z.object({
  orderType: z.string(),
  voucherCode: z.string().optional(),
  deliveryDistanceKm: z.number().nonnegative().optional(),
});

export const checkoutSchema = z.object({
  orderType: z.string(),
  paymentMethod: z.string(),
  storeId: z.number().int().positive().optional(),
  deliveryAddress: z.string().optional(),
  tableNumber: z.string().optional(),
  notes: z.string().max(500).optional(),
  voucherCode: z.string().optional(),
  deliveryDistanceKm: z.number().nonnegative().optional(),
});

export const validateVoucherSchema = z.object({
  code: z.string().min(1),
  subtotal: wholeNumber.nonnegative(),
});

export const statusChangeSchema = z.object({
  status: z.string(),
  notes: z.string().optional(),
});

export const cancelSchema = z.object({
  reason: z.string().optional(),
});

export const paymentStatusSchema = z.object({
  paymentStatus: z.string(),
});

export const redeemPointsSchema = z.object({
  points: wholeNumber,
  description: z.string().min(1).default('Points redeemed'),
});

export const adjustmentSchema = z.object({
  userId: z.number().int().positive(),
  delta: wholeNumber,
  description: z.string().min(1),
});
