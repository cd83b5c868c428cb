import type {CommerceSettings} from '../types';
import {DEFAULT_TIER_THRESHOLDS} from './loyalty';

export const DEFAULT_COMMERCE_SETTINGS: CommerceSettings = {
  maxQuantityPerAdd: 100,
  pointsPerCurrencyUnit: 0.01,
  tierThresholds: DEFAULT_TIER_THRESHOLDS,
  freeShippingThreshold: 200000,
  baseDeliveryFee: 20000,
  defaultDeliveryDistanceKm: 5,
  basePrepMinutes: 15,
  prepMinutesPerItem: 3,
};
