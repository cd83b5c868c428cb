import type {CommerceError} from '../pure/errors';
import {describeError} from '../pure/errors';
import {PersistenceUnavailableError} from '../effects/EffectsError';
import {z} from 'zod';

export type ErrorResponse = {
  readonly status: number;
  readonly body: {
    readonly error: string;
    readonly kind: string;
    readonly details?: unknown;
  };
};

/** The caller identity header was missing or malformed. */
export class UnauthenticatedError extends Error {
  constructor() {
    super('Missing or invalid x-user-id header');
    this.name = 'UnauthenticatedError';
  }
}

export function commerceErrorStatus(error: CommerceError): number {
  switch (error.kind) {
    case 'ValidationError':
      return 400;
    case 'NotFoundError':
      return 404;
    case 'InvalidTransition':
    case 'InsufficientBalance':
      return 409;
    case 'EmptyCart':
      return 422;
  }
}

export function toErrorResponse(error: CommerceError): ErrorResponse {
  return {
    status: commerceErrorStatus(error),
    body: {error: describeError(error), kind: error.kind, details: error},
  };
}

/** Thrown failures: bad request shapes, missing identity, infrastructure. */
export function toThrownErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof z.ZodError) {
    return {status: 400, body: {error: 'Invalid request', kind: 'ValidationError', details: error.issues}};
  }
  const requestStatus = requestErrorStatus(error);
  if (requestStatus !== null) {
    return {status: requestStatus, body: {error: 'Malformed request body', kind: 'MalformedRequest'}};
  }
  if (error instanceof UnauthenticatedError) {
    return {status: 401, body: {error: error.message, kind: 'Unauthenticated'}};
  }
  if (error instanceof PersistenceUnavailableError) {
    return {status: 503, body: {error: 'Service temporarily unavailable, please retry', kind: 'PersistenceUnavailable'}};
  }
  return {status: 500, body: {error: 'Internal server error', kind: 'InternalError'}};
}

// body-parser rejections carry a `type` such as entity.parse.failed and a 4xx `status`
function requestErrorStatus(error: unknown): number | null {
  if (!(error instanceof Error) || !('type' in error) || !('status' in error)) return null;
  const {status} = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}
