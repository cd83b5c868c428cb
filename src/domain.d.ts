// Domain types shared across the application
//
// Money amounts are integers in the shop's currency (no minor unit).

export type CupSize = 'S' | 'M' | 'L';
export type Temperature = 'hot' | 'cold';
export type OrderType = 'pickup' | 'delivery' | 'dine_in';
export type OrderStatus =
  | 'pending'
  | 'confirmed'
  | 'preparing'
  | 'ready'
  | 'delivering'
  | 'completed'
  | 'cancelled';
export type PaymentStatus = 'pending' | 'paid' | 'failed' | 'refunded';
export type PaymentMethod = 'cash' | 'momo' | 'shopeepay' | 'zalopay' | 'applepay' | 'googlepay' | 'card';
export type MembershipTier = 'Bronze' | 'Silver' | 'Gold';
export type DiscountKind = 'percentage' | 'fixed';
export type LoyaltyTransactionKind = 'earn' | 'redeem' | 'admin_adjustment';

// ============================================================================
// Catalog (read-only reference data)
// ============================================================================

export type SizeAdjustment = {
  readonly size: CupSize;
  readonly priceAdjustment: number;
};

export type Product = {
  readonly id: number;
  readonly name: string;
  readonly basePrice: number;
  readonly isAvailable: boolean;
  readonly sizes: readonly SizeAdjustment[];
};

export type Topping = {
  readonly id: number;
  readonly name: string;
  readonly price: number;
  readonly isAvailable: boolean;
};

// ============================================================================
// Cart
// ============================================================================

/** Toppings are kept sorted and de-duplicated so two sets compare by value. */
export type Customization = {
  readonly size: CupSize;
  readonly sugarLevel: number;
  readonly iceLevel: number;
  readonly temperature: Temperature;
  readonly toppingIds: readonly number[];
};

export type CartLine = Customization & {
  readonly id: number;
  readonly userId: number;
  readonly productId: number;
  readonly quantity: number;
  readonly createdAt: Date;
};

export type NewCartLine = Customization & {
  readonly userId: number;
  readonly productId: number;
  readonly quantity: number;
};

// ============================================================================
// Vouchers
// ============================================================================

export type Voucher = {
  readonly id: number;
  readonly code: string;
  readonly name: string;
  readonly discountKind: DiscountKind;
  readonly discountValue: number;
  readonly minOrderAmount: number;
  readonly maxDiscountAmount: number | null;
  readonly usageLimit: number | null;
  readonly usagePerUser: number | null;
  readonly currentUsage: number;
  readonly startsAt: Date | null;
  readonly endsAt: Date | null;
  readonly isActive: boolean;
};

export type VoucherUsage = {
  readonly userId: number;
  readonly voucherId: number;
  readonly timesUsed: number;
  readonly lastUsedAt: Date | null;
};

export type VoucherRedemption = {
  readonly voucherId: number;
  readonly userId: number;
  readonly orderId: number | null;
  readonly discountAmount: number;
  readonly redeemedAt: Date;
};

// ============================================================================
// Orders
// ============================================================================

export type Order = {
  readonly id: number;
  readonly userId: number;
  readonly orderNumber: string;
  readonly orderType: OrderType;
  readonly storeId: number | null;
  readonly deliveryAddress: string | null;
  readonly tableNumber: string | null;
  readonly notes: string | null;
  readonly voucherId: number | null;
  readonly subtotal: number;
  readonly discountAmount: number;
  readonly deliveryFee: number;
  readonly total: number;
  readonly paymentMethod: PaymentMethod;
  readonly paymentStatus: PaymentStatus;
  readonly status: OrderStatus;
  readonly estimatedReadyTime: Date;
  readonly cancellationReason: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly completedAt: Date | null;
  readonly cancelledAt: Date | null;
};

export type OrderLine = {
  readonly id: number;
  readonly orderId: number;
  readonly productId: number;
  readonly productName: string;
  readonly size: CupSize;
  readonly quantity: number;
  readonly unitPrice: number;
  readonly sugarLevel: number;
  readonly iceLevel: number;
  readonly temperature: Temperature;
  readonly toppingIds: readonly number[];
  readonly toppingCost: number;
  readonly lineSubtotal: number;
};

export type OrderWithLines = Order & {
  readonly lines: readonly OrderLine[];
};

export type OrderOverview = Order & {
  readonly lineCount: number;
  readonly totalQuantity: number;
};

export type OrderStatusChange = {
  readonly orderId: number;
  readonly fromStatus: OrderStatus;
  readonly toStatus: OrderStatus;
  readonly actorId: number;
  readonly notes: string | null;
  readonly changedAt: Date;
};

// ============================================================================
// Loyalty
// ============================================================================

export type LoyaltyAccount = {
  readonly userId: number;
  readonly balance: number;
  readonly tier: MembershipTier;
};

export type LoyaltyTransaction = {
  readonly id: number;
  readonly userId: number;
  readonly delta: number;
  readonly kind: LoyaltyTransactionKind;
  readonly description: string;
  readonly relatedOrderId: number | null;
  readonly createdAt: Date;
};

export type NewLoyaltyTransaction = Omit<LoyaltyTransaction, 'id'>;
