// Non domain types

export type NotificationType = 'order_update' | 'loyalty' | 'system';

export type NotificationPayload = {
    readonly userId: number;
    readonly title: string;
    readonly message: string;
    readonly type: NotificationType;
    readonly relatedOrderId: number | null;
};

export type SideEffectName = 'loyalty_credit' | 'status_history' | 'status_notification';

export type SideEffectFailureAlert = {
    readonly type: 'side_effect_failed';
    readonly sideEffect: SideEffectName;
    readonly userId: number;
    readonly orderId: number;
    readonly detail: string;
};

export type Clock = {
    now(): Date;
};

export type TierThresholds = {
    readonly silver: number;
    readonly gold: number;
};

export type CommerceSettings = {
    readonly maxQuantityPerAdd: number;
    readonly pointsPerCurrencyUnit: number;
    readonly tierThresholds: TierThresholds;
    readonly freeShippingThreshold: number;
    readonly baseDeliveryFee: number;
    readonly defaultDeliveryDistanceKm: number;
    readonly basePrepMinutes: number;
    readonly prepMinutesPerItem: number;
};
