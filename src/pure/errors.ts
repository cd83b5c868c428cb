/**
 * Business failures are returned as values (the Left side of an Either),
 * never thrown. Infrastructure failures are thrown from the effects layer
 * instead, see effects/EffectsError.ts.
 */

import type {OrderStatus} from '../domain';

export type ValidationError = {
  readonly kind: 'ValidationError';
  readonly message: string;
  readonly field: string | null;
};

export type NotFoundEntity = 'cart_line' | 'voucher' | 'order' | 'product' | 'user';

export type NotFoundError = {
  readonly kind: 'NotFoundError';
  readonly entity: NotFoundEntity;
  readonly id: number | string;
};

export type InvalidTransition = {
  readonly kind: 'InvalidTransition';
  readonly from: OrderStatus;
  readonly to: string;
};

export type InsufficientBalance = {
  readonly kind: 'InsufficientBalance';
  readonly balance: number;
  readonly requested: number;
};

export type EmptyCart = {
  readonly kind: 'EmptyCart';
  readonly userId: number;
};

export type CommerceError =
  | ValidationError
  | NotFoundError
  | InvalidTransition
  | InsufficientBalance
  | EmptyCart;

export const validationError = (message: string, field: string | null = null): CommerceError => ({
  kind: 'ValidationError',
  message,
  field,
});

export const notFound = (entity: NotFoundEntity, id: number | string): CommerceError => ({
  kind: 'NotFoundError',
  entity,
  id,
});

export const invalidTransition = (from: OrderStatus, to: string): CommerceError => ({
  kind: 'InvalidTransition',
  from,
  to,
});

export const insufficientBalance = (balance: number, requested: number): CommerceError => ({
  kind: 'InsufficientBalance',
  balance,
  requested,
});

export const emptyCart = (userId: number): CommerceError => ({
  kind: 'EmptyCart',
  userId,
});

export function describeError(error: CommerceError): string {
  switch (error.kind) {
    case 'ValidationError':
      return error.field ? `${error.field}: ${error.message}` : error.message;
    case 'NotFoundError':
      return `${error.entity} ${error.id} not found`;
    case 'InvalidTransition':
      return `Cannot move order from ${error.from} to ${error.to}`;
    case 'InsufficientBalance':
      return `Insufficient points: balance ${error.balance}, requested ${error.requested}`;
    case 'EmptyCart':
      return `Cart of user ${error.userId} is empty`;
  }
}
