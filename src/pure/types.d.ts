// Module product types

import type {
    CartLine,
    CupSize,
    Customization,
    Order,
    OrderStatus,
    OrderType,
    PaymentMethod,
    Temperature,
    Voucher,
} from "../domain";

export type PriceBreakdown = {
    readonly basePrice: number;
    readonly sizeAdjustment: number;
    readonly toppingCost: number;
    readonly total: number;
};

export type PricedCartLine = CartLine & {
    readonly productName: string;
    readonly price: PriceBreakdown;
    readonly unitPrice: number;
    readonly lineSubtotal: number;
};

export type CartSummary = {
    readonly userId: number;
    readonly lines: PricedCartLine[];
    readonly subtotal: number;
    readonly itemCount: number;
    readonly missingProductIds: number[];
};

export type CartItemInput = {
    readonly productId: number;
    readonly size: string;
    readonly quantity: number;
    readonly sugarLevel: number;
    readonly iceLevel: number;
    readonly temperature: string;
    readonly toppingIds: readonly number[];
};

/** Absent properties are left unchanged. */
export type CartLinePatch = {
    readonly size?: CupSize;
    readonly quantity?: number;
    readonly sugarLevel?: number;
    readonly iceLevel?: number;
    readonly temperature?: Temperature;
    readonly toppingIds?: readonly number[];
};

export type CartLineEdit = {
    readonly customization: Customization;
    readonly quantity: number;
};

export type VoucherRejectionReason =
    | 'not_found'
    | 'inactive'
    | 'not_started'
    | 'expired'
    | 'below_minimum'
    | 'usage_limit_reached'
    | 'per_user_limit_reached';

export type VoucherValidation =
    | { readonly ok: true; readonly reason: null; readonly voucher: Voucher }
    | { readonly ok: false; readonly reason: VoucherRejectionReason; readonly voucher: Voucher | null };

export type CheckoutRequest = {
    readonly orderType: string;
    readonly paymentMethod: string;
    readonly storeId?: number;
    readonly deliveryAddress?: string;
    readonly tableNumber?: string;
    readonly notes?: string;
    readonly voucherCode?: string;
    readonly deliveryDistanceKm?: number;
};

export type Fulfilment = {
    readonly orderType: OrderType;
    readonly paymentMethod: PaymentMethod;
    readonly storeId: number | null;
    readonly deliveryAddress: string | null;
    readonly tableNumber: string | null;
    readonly notes: string | null;
};

export type QuoteRequest = {
    readonly orderType: string;
    readonly voucherCode?: string;
    readonly deliveryDistanceKm?: number;
};

export type CheckoutQuote = {
    readonly itemCount: number;
    readonly subtotal: number;
    readonly discountAmount: number;
    readonly deliveryFee: number;
    readonly total: number;
    readonly voucher: VoucherValidation | null;
};

export type OrderDraft = Omit<Order, 'id' | 'updatedAt'>;

export type OrderLineDraft = {
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

export type StatusUpdate = {
    readonly status: OrderStatus;
    readonly updatedAt: Date;
    readonly completedAt: Date | null;
    readonly cancelledAt: Date | null;
    readonly cancellationReason: string | null;
};

export type TrackingStep = {
    readonly status: OrderStatus;
    readonly label: string;
    readonly reached: boolean;
};

export type OrderTracking = {
    readonly order: Order;
    readonly currentStatus: OrderStatus;
    readonly timeline: TrackingStep[];
    readonly estimatedReadyTime: Date | null;
};
