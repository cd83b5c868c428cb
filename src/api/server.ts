/**
 * HTTP surface over the commerce coordinators.
 *
 * Identity comes from the x-user-id header set by the upstream auth layer.
 * Business failures (Left) map to 4xx through httpErrors.ts; anything thrown
 * is either a malformed request or an infrastructure failure.
 */
import type {AppEffects} from '../pure/effects';
import type {CommerceError} from '../pure/errors';
import {
  addCartItem,
  clearCart,
  getCartCount,
  getCartSummary,
  quoteCheckout,
  removeCartItem,
  updateCartItem,
  updateCartQuantity,
} from '../pure/cartStore';
import {
  adjustPoints,
  debitPoints,
  getLoyaltyAccount,
  getLoyaltyHistory,
} from '../pure/loyaltyLedger';
import {
  cancelOrder,
  getOrder,
  getOrdersForUser,
  getStatusHistory,
  trackOrder,
  transitionOrderStatus,
  updatePaymentStatus,
} from '../pure/orderFulfilment';
import {createOrderFromCart, reorder} from '../pure/orderProcessing';
import {listAvailableVouchers, validateVoucherCode} from '../pure/voucherRedemption';
import {describeRejection} from '../pure/vouchers';
import {toErrorResponse, toThrownErrorResponse, UnauthenticatedError} from './httpErrors';
import {
  addCartItemSchema,
  adjustmentSchema,
  cancelSchema,
  cartLinePatchSchema,
  checkoutSchema,
  idParamSchema,
  listQuerySchema,
  paymentStatusSchema,
  quoteSchema,
  redeemPointsSchema,
  statusChangeSchema,
  updateQuantitySchema,
  userIdHeaderSchema,
  validateVoucherSchema,
} from './schemas';
import express, {ErrorRequestHandler, Request, RequestHandler, Response} from 'express';
import {Either} from 'purify-ts';

type Outcome = Promise<Either<CommerceError, unknown>>;

export function callerId(req: Request): number {
  const parsed = userIdHeaderSchema.safeParse(req.header('x-user-id'));
  if (!parsed.success) throw new UnauthenticatedError();
  return parsed.data;
}

function sendThrown(req: Request, res: Response, error: unknown): void {
  const {status, body} = toThrownErrorResponse(error);
  if (status >= 500) {
    console.error(`❌ ${req.method} ${req.originalUrl} failed:`, error);
  }
  res.status(status).json(body);
}

function handle(run: (req: Request) => Outcome, successStatus = 200): RequestHandler {
  return async (req, res) => {
    try {
      const result = await run(req);
      result.caseOf({
        Left: error => {
          const {status, body} = toErrorResponse(error);
          res.status(status).json(body);
        },
        Right: value => {
          if (value === undefined) {
            res.status(204).end();
          } else {
            res.status(successStatus).json(value);
          }
        },
      });
    } catch (error) {
      sendThrown(req, res, error);
    }
  };
}

export function createApp(appEffects: AppEffects): express.Express {
  const app = express();

  app.use(express.json());

  app.get('/health', (req, res) => {
    res.json({status: 'healthy', service: 'coffee-commerce-engine'});
  });

  // ---------------------------------------------------------------- cart

  app.get('/api/cart', handle(req => getCartSummary(callerId(req))(appEffects)));

  app.get('/api/cart/count', handle(async req => {
    const count = await getCartCount(callerId(req))(appEffects);
    return count.map(itemCount => ({itemCount}));
  }));

  app.post('/api/cart/items', handle(req =>
    addCartItem(callerId(req), addCartItemSchema.parse(req.body))(appEffects), 201));

  app.patch('/api/cart/items/:lineId', handle(async req => {
    const updated = await updateCartItem(
      idParamSchema.parse(req.params.lineId),
      callerId(req),
      cartLinePatchSchema.parse(req.body)
    )(appEffects);
    return updated.map(line => ({line}));
  }));

  app.put('/api/cart/items/:lineId/quantity', handle(async req => {
    const {quantity} = updateQuantitySchema.parse(req.body);
    const updated = await updateCartQuantity(idParamSchema.parse(req.params.lineId), callerId(req), quantity)(appEffects);
    return updated.map(line => ({line}));
  }));

  app.delete('/api/cart/items/:lineId', handle(req =>
    removeCartItem(idParamSchema.parse(req.params.lineId), callerId(req))(appEffects)));

  app.delete('/api/cart', handle(async req => {
    const cleared = await clearCart(callerId(req))(appEffects);
    return cleared.map(removed => ({removed}));
  }));

  app.post('/api/cart/quote', handle(req =>
    quoteCheckout(callerId(req), quoteSchema.parse(req.body))(appEffects)));

  // ------------------------------------------------------------ vouchers

  app.post('/api/vouchers/validate', handle(async req => {
    const {code, subtotal} = validateVoucherSchema.parse(req.body);
    const evaluated = await validateVoucherCode(callerId(req), code, subtotal)(appEffects);
    return evaluated.map(({validation, discountAmount}) => ({
      valid: validation.ok,
      reason: validation.reason,
      message: validation.ok ? null : describeRejection(validation.reason),
      voucher: validation.voucher,
      discountAmount,
    }));
  }));

  app.get('/api/vouchers/available', handle(req => listAvailableVouchers(callerId(req))(appEffects)));

  // -------------------------------------------------------------- orders

  app.post('/api/orders', handle(async req => {
    const placed = await createOrderFromCart(callerId(req), checkoutSchema.parse(req.body))(appEffects);
    return placed.map(orderId => ({orderId}));
  }, 201));

  app.get('/api/orders', handle(req => {
    const {limit} = listQuerySchema.parse(req.query);
    return getOrdersForUser(callerId(req), limit)(appEffects);
  }));

  app.get('/api/orders/:orderId', handle(req =>
    getOrder(idParamSchema.parse(req.params.orderId), callerId(req))(appEffects)));

  app.get('/api/orders/:orderId/tracking', handle(req =>
    trackOrder(idParamSchema.parse(req.params.orderId), callerId(req))(appEffects)));

  app.get('/api/orders/:orderId/history', handle(req =>
    getStatusHistory(idParamSchema.parse(req.params.orderId), callerId(req))(appEffects)));

  // staff; role checks belong to the upstream auth layer
  app.post('/api/orders/:orderId/status', handle(req => {
    const {status, notes} = statusChangeSchema.parse(req.body);
    return transitionOrderStatus(idParamSchema.parse(req.params.orderId), status, callerId(req), notes ?? null)(appEffects);
  }));

  app.post('/api/orders/:orderId/cancel', handle(req => {
    const {reason} = cancelSchema.parse(req.body ?? {});
    return cancelOrder(idParamSchema.parse(req.params.orderId), callerId(req), reason ?? null)(appEffects);
  }));

  app.post('/api/orders/:orderId/payment-status', handle(req => {
    callerId(req);
    const {paymentStatus} = paymentStatusSchema.parse(req.body);
    return updatePaymentStatus(idParamSchema.parse(req.params.orderId), paymentStatus)(appEffects);
  }));

  app.post('/api/orders/:orderId/reorder', handle(async req => {
    const added = await reorder(idParamSchema.parse(req.params.orderId), callerId(req))(appEffects);
    return added.map(lines => ({added: lines}));
  }));

  // ------------------------------------------------------------- loyalty

  app.get('/api/loyalty', handle(req => getLoyaltyAccount(callerId(req))(appEffects)));

  app.get('/api/loyalty/history', handle(req => {
    const {limit} = listQuerySchema.parse(req.query);
    return getLoyaltyHistory(callerId(req), limit)(appEffects);
  }));

  app.post('/api/loyalty/redeem', handle(req => {
    const {points, description} = redeemPointsSchema.parse(req.body);
    return debitPoints(callerId(req), points, description)(appEffects);
  }));

  app.post('/api/loyalty/adjustments', handle(req => {
    callerId(req);
    const {userId, delta, description} = adjustmentSchema.parse(req.body);
    return adjustPoints(userId, delta, description)(appEffects);
  }));

  // reached by body-parser failures; route handlers answer their own errors
  const jsonErrors: ErrorRequestHandler = (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    sendThrown(req, res, error);
  };
  app.use(jsonErrors);

  return app;
}
