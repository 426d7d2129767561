/**
 * HTTP ADAPTER
 *
 * Stands in for the chat transport: it tokenizes nothing, just passes request
 * values to the coordinators. Admin routes take the acting user from the
 * x-actor-id header and check the capability before calling the core; the
 * order lookup reads the same header to decide how much of the order to show.
 */

import express, {NextFunction, Request, RequestHandler, Response} from 'express';
import {Either, Left, Right} from 'purify-ts';
import type {Capability} from '../domain';
import type {AppEffects} from '../pure/effects';
import {andThen, describeError, OrderError, unauthorized} from '../pure/errors';
import {describeFeeSchedule} from '../pure/feeSchedule';
import {
  assignRole,
  authorize,
  getDiscountPolicy,
  getFeeSchedule,
  replaceDiscountPolicy,
  replaceFeeSchedule,
  setGlobalDiscount,
} from '../pure/admin';
import {addToCart, clearCart, listCart} from '../pure/cart';
import {
  createProduct,
  deactivateProduct,
  getProduct,
  listActiveProducts,
  listInactiveProducts,
  reactivateProduct,
  setProductPrice,
  setProductStock,
} from '../pure/catalog';
import {
  assignCourier,
  cancelOrder,
  confirmDelivered,
  currentCheckoutStep,
  listOpenOrders,
  markOutForDelivery,
  startCheckout,
  submitCheckoutInput,
  viewOrder,
} from '../pure/orderProcessing';
import {
  listCourierApplications,
  listReviews,
  listSupportMessages,
  submitCourierApplication,
  submitReview,
  submitSupportMessage,
} from '../pure/feedback';
import {listTreasuryEntries, recordTreasuryEntry} from '../pure/treasury';
import {revenueOver, summaryOver} from '../pure/reporting';
import {DiscountPolicyCodec} from '../pure/codecs';
import {
  AddToCartBody,
  AssignCourierBody,
  CheckoutInputBody,
  CreateProductBody,
  decodeBody,
  FeeScheduleBody,
  GlobalDiscountBody,
  httpStatusFor,
  MessageBody,
  parseId,
  parseWindowDays,
  PriceBody,
  ReviewBody,
  RoleBody,
  StockBody,
  TreasuryEntryBody,
} from './requests';

type Handler = (req: Request) => Promise<Either<OrderError, unknown>>;

function sendError(res: Response, error: OrderError): void {
  res.status(httpStatusFor(error)).json({ error: error.code, message: describeError(error), details: error });
}

function route(handler: Handler): RequestHandler {
  return (req, res, next) => {
    handler(req)
      .then(result => result.caseOf({
        Left: error => sendError(res, error),
        Right: value => {
          res.json(value);
        },
      }))
      .catch(next);
  };
}

export function createApp(effects: AppEffects): express.Express {
  const app = express();

  // Parse JSON bodies
  app.use(express.json());

  function adminRoute(capability: Capability, handler: Handler): RequestHandler {
    return route(async req => {
      const actorId = req.header('x-actor-id');
      if (!actorId) {
        return Left(unauthorized(capability));
      }
      return andThen(await authorize(actorId, capability)(effects), () => handler(req));
    });
  }

  function withId(
    req: Request,
    handle: (id: number) => Promise<Either<OrderError, unknown>>
  ): Promise<Either<OrderError, unknown>> {
    return andThen(parseId('id', req.params.id), handle);
  }

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({ status: 'healthy', service: 'cod-order-core' });
  });

  // ==========================================================================
  // Customer routes
  // ==========================================================================

  app.get('/api/products', route(async () => Right(await listActiveProducts()(effects))));

  app.get('/api/products/:id', route(req => withId(req, id => getProduct(id)(effects))));

  app.get('/api/fees', route(async () => {
    const schedule = await getFeeSchedule()(effects);
    return Right({ schedule, text: describeFeeSchedule(schedule) });
  }));

  app.get('/api/customers/:customerId/cart', route(async req =>
    Right(await listCart(req.params.customerId)(effects))));

  app.post('/api/customers/:customerId/cart', route(req =>
    andThen(decodeBody(AddToCartBody, req.body), body =>
      addToCart(req.params.customerId, body.productId, body.quantity ?? 1)(effects))));

  app.delete('/api/customers/:customerId/cart', route(async req => {
    await clearCart(req.params.customerId)(effects);
    return Right({ cleared: true });
  }));

  app.get('/api/customers/:customerId/checkout', route(req =>
    currentCheckoutStep(req.params.customerId)(effects)));

  app.post('/api/customers/:customerId/checkout', route(req =>
    startCheckout(req.params.customerId)(effects)));

  app.post('/api/customers/:customerId/checkout/input', route(req =>
    andThen(decodeBody(CheckoutInputBody, req.body), body =>
      submitCheckoutInput(req.params.customerId, body.text)(effects))));

  app.post('/api/customers/:customerId/reviews', route(req =>
    andThen(decodeBody(ReviewBody, req.body), body =>
      submitReview(req.params.customerId, body.rating, body.text)(effects))));

  app.post('/api/customers/:customerId/support', route(req =>
    andThen(decodeBody(MessageBody, req.body), body =>
      submitSupportMessage(req.params.customerId, body.text)(effects))));

  app.post('/api/customers/:customerId/applications', route(req =>
    andThen(decodeBody(MessageBody, req.body), body =>
      submitCourierApplication(req.params.customerId, body.text)(effects))));

  app.get('/api/orders/:code', route(req =>
    viewOrder(req.params.code, req.header('x-actor-id') || null)(effects)));

  // ==========================================================================
  // Admin routes
  // ==========================================================================

  app.put('/api/admin/fees', adminRoute('set_fees', req =>
    andThen(decodeBody(FeeScheduleBody, req.body), body =>
      replaceFeeSchedule(body.tiers, body.freeZone, body.perKmAboveMax)(effects))));

  app.get('/api/admin/discounts', adminRoute('set_discounts', async () =>
    Right(await getDiscountPolicy()(effects))));

  app.put('/api/admin/discounts', adminRoute('set_discounts', req =>
    andThen(decodeBody(DiscountPolicyCodec, req.body), policy =>
      replaceDiscountPolicy(policy)(effects))));

  app.post('/api/admin/discounts/global', adminRoute('set_discounts', req =>
    andThen(decodeBody(GlobalDiscountBody, req.body), body =>
      setGlobalDiscount(body.active, body.amount)(effects))));

  app.post('/api/admin/products', adminRoute('manage_catalog', req =>
    andThen(decodeBody(CreateProductBody, req.body), body =>
      createProduct(body.name, body.price, body.stock)(effects))));

  app.get('/api/admin/products/inactive', adminRoute('manage_catalog', async () =>
    Right(await listInactiveProducts()(effects))));

  app.put('/api/admin/products/:id/price', adminRoute('manage_catalog', req => withId(req, id =>
    andThen(decodeBody(PriceBody, req.body), body => setProductPrice(id, body.price)(effects)))));

  app.put('/api/admin/products/:id/stock', adminRoute('manage_catalog', req => withId(req, id =>
    andThen(decodeBody(StockBody, req.body), body => setProductStock(id, body.stock)(effects)))));

  app.post('/api/admin/products/:id/deactivate', adminRoute('manage_catalog', req =>
    withId(req, id => deactivateProduct(id)(effects))));

  app.post('/api/admin/products/:id/reactivate', adminRoute('manage_catalog', req =>
    withId(req, id => reactivateProduct(id)(effects))));

  app.put('/api/admin/roles/:userId', adminRoute('set_role', req =>
    andThen(decodeBody(RoleBody, req.body), body =>
      assignRole(req.params.userId, body.role)(effects))));

  app.get('/api/admin/orders', adminRoute('confirm_delivery', async () =>
    Right(await listOpenOrders()(effects))));

  app.post('/api/admin/orders/:code/assign', adminRoute('assign_courier', req =>
    andThen(decodeBody(AssignCourierBody, req.body), body =>
      assignCourier(req.params.code, body.courierId)(effects))));

  app.post('/api/admin/orders/:code/out-for-delivery', adminRoute('assign_courier', req =>
    markOutForDelivery(req.params.code)(effects)));

  app.post('/api/admin/orders/:code/delivered', adminRoute('confirm_delivery', req =>
    confirmDelivered(req.params.code)(effects)));

  app.post('/api/admin/orders/:code/cancel', adminRoute('cancel_order', req =>
    cancelOrder(req.params.code)(effects)));

  app.get('/api/admin/orders/:id/treasury', adminRoute('export_report', req =>
    withId(req, async id => Right(await listTreasuryEntries(id)(effects)))));

  app.post('/api/admin/orders/:id/treasury', adminRoute('record_treasury', req => withId(req, id =>
    andThen(decodeBody(TreasuryEntryBody, req.body), body =>
      recordTreasuryEntry(id, body.kind, body.amount)(effects)))));

  app.get('/api/admin/reports/summary', adminRoute('export_report', req =>
    andThen(parseWindowDays(req.query.days), days => summaryOver(days)(effects))));

  app.get('/api/admin/reports/revenue', adminRoute('export_report', req =>
    andThen(parseWindowDays(req.query.days), days => revenueOver(days)(effects))));

  app.get('/api/admin/reviews', adminRoute('read_feedback', async () =>
    Right(await listReviews()(effects))));

  app.get('/api/admin/support', adminRoute('read_feedback', async () =>
    Right(await listSupportMessages()(effects))));

  app.get('/api/admin/applications', adminRoute('read_feedback', async () =>
    Right(await listCourierApplications()(effects))));

  // Infrastructure failures: database, network
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    console.error(`❌ ${req.method} ${req.path} failed:`, error);
    res.status(500).json({ error: 'INTERNAL', message: 'Internal error, please retry later.' });
  });

  return app;
}
