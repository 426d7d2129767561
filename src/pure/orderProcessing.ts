/**
 * ORDER PROCESSOR - The Coordinator
 *
 * The thin effectful shell around the checkout protocol and the order
 * lifecycle:
 * 1. Calls effects to get data (inputs)
 * 2. Passes data to pure business logic functions
 * 3. Calls effects to persist results (outputs)
 *
 * Domain failures come back as Left values. Effects that throw are not
 * caught here, except for the two best-effort side effects (courier dispatch
 * and monitoring alerts) whose failure must never undo a committed order.
 */

import {Either, EitherAsync, Left, Right} from 'purify-ts';
import type {Order} from '../domain';
import type {MonitoringAlert} from '../types';
import type {AppEffects} from './effects';
import type {CheckoutDetails, CheckoutSession, CheckoutStep, PricedLine, PublicOrderView} from './types';
import {
  buildDispatchFailedAlert,
  buildDispatchNotice,
  buildStockReconciliationAlert,
  findStockShortage,
  findUnavailableLines,
  generateOrderCode,
  normalizeOrderCode,
  priceCartLines,
  quoteOrder,
  toNewOrder,
  toPublicOrderView,
} from './businessLogic';
import {roleOf} from './admin';
import {advanceCheckout, initialCheckout, parseRequiredText} from './checkout';
import {deliveryFee} from './feeSchedule';
import {
  decideAssignment,
  decideCancellation,
  decideOutForDelivery,
  decideSettlement,
} from './orderLifecycle';
import {andThen, emptyCart, noActiveCheckout, orderNotFound, OrderError, productNotFound} from './errors';
import {can} from './roles';

export const MAX_ORDER_CODE_ATTEMPTS = 10;

export type CheckoutOutcome =
  | { readonly kind: 'awaiting'; readonly step: CheckoutStep }
  | { readonly kind: 'committed'; readonly order: Order };

/**
 * The customer's cart joined against the current catalog.
 */
export function loadPricedCart(
  customerId: string
): (effects: AppEffects) => Promise<PricedLine[]> {
  return async (effects: AppEffects) => {
    const lines = await effects.carts.lines(customerId);
    if (lines.length === 0) return [];
    const products = await effects.products.getByIds(lines.map(line => line.productId));
    return priceCartLines(lines, products);
  };
}

// ============================================================================
// Checkout Protocol
// ============================================================================

/**
 * Begin a checkout for the customer. Any checkout already in progress for the
 * same customer is thrown away, never merged.
 */
export function startCheckout(
  customerId: string
): (effects: AppEffects) => Promise<Either<OrderError, CheckoutOutcome>> {
  return async (effects: AppEffects) => {
    const cart = await loadPricedCart(customerId)(effects);
    if (cart.length === 0) {
      return Left(emptyCart());
    }

    const session = initialCheckout();
    await effects.checkouts.begin(customerId, session);
    return Right({ kind: 'awaiting' as const, step: session.step });
  };
}

/**
 * Feed one message of the customer into the checkout in progress.
 *
 * An INVALID_INPUT leaves the checkout where it was, so the caller can ask
 * again. The answer to the last step commits the order.
 */
export function submitCheckoutInput(
  customerId: string,
  input: string
): (effects: AppEffects) => Promise<Either<OrderError, CheckoutOutcome>> {
  return async (effects: AppEffects) => {
    const session = await effects.checkouts.get(customerId);
    if (!session) {
      return Left(noActiveCheckout());
    }

    return andThen(advanceCheckout(session, input), async (next): Promise<Either<OrderError, CheckoutOutcome>> => {
      if (next.kind === 'next') {
        const moved = await effects.checkouts.replace(customerId, session, next.session);
        return moved
          ? Right({ kind: 'awaiting' as const, step: next.session.step })
          : Left(noActiveCheckout());
      }

      // claiming the session first means a duplicate final message cannot commit twice
      const claimed = await effects.checkouts.finish(customerId, session);
      if (!claimed) {
        return Left(noActiveCheckout());
      }

      const committed = await commitCheckout(customerId, next.details)(effects);
      return committed.map(order => ({ kind: 'committed' as const, order }));
    });
  };
}

/**
 * Turn the cart into a pending order.
 *
 * Stock is checked but not held: the authoritative check happens when the
 * order is settled. On failure the cart is left as it was, except for lines
 * whose product is no longer sold: those are dropped and the first one is
 * reported as PRODUCT_NOT_FOUND.
 */
export function commitCheckout(
  customerId: string,
  details: CheckoutDetails
): (effects: AppEffects) => Promise<Either<OrderError, Order>> {
  return async (effects: AppEffects) => {
    // ========== GATHER INPUTS (Effects) ==========

    const lines = await effects.carts.lines(customerId);
    if (lines.length === 0) {
      return Left(emptyCart());
    }

    const products = await effects.products.getByIds(lines.map(line => line.productId));
    const unavailable = findUnavailableLines(lines, products);
    if (unavailable.length > 0) {
      await effects.carts.remove(customerId, unavailable);
      return Left(productNotFound(unavailable[0].productId));
    }
    const cart = priceCartLines(lines, products);

    const [schedule, policy] = await Promise.all([
      effects.pricing.getFeeSchedule(),
      effects.pricing.getDiscountPolicy(),
    ]);
    const deliveredOrders = policy.loyalty.enabled
      ? await effects.orders.countDelivered(customerId)
      : 0;

    // ========== PURE BUSINESS LOGIC (No Effects) ==========

    const shortage = findStockShortage(cart).extract();
    if (shortage) {
      return Left(shortage);
    }

    return andThen(deliveryFee(schedule, details.city, details.distanceKm), async fee => {
      const quote = quoteOrder(cart, policy, details.promoCode, fee, deliveredOrders);

      // ========== PERFORM OUTPUTS (Effects) ==========

      const order = await insertWithUniqueCode(customerId, cart, details, quote)(effects);
      await effects.carts.remove(customerId, cart.map(line => ({
        customerId,
        productId: line.product.id,
        quantity: line.quantity,
      })));
      await notifyDispatch(order)(effects);

      return Right(order);
    });
  };
}

function insertWithUniqueCode(
  customerId: string,
  cart: readonly PricedLine[],
  details: CheckoutDetails,
  quote: ReturnType<typeof quoteOrder>
): (effects: AppEffects) => Promise<Order> {
  return async (effects: AppEffects) => {
    for (let attempt = 0; attempt < MAX_ORDER_CODE_ATTEMPTS; attempt++) {
      const code = generateOrderCode(effects.env.orderCodePrefix, () => effects.env.random());
      if (await effects.orders.codeExists(code)) continue;

      const inserted = await effects.orders.insert(
        toNewOrder(code, customerId, cart, quote, details, effects.env.now())
      );
      if (inserted) return inserted;
    }
    throw new Error(`Could not allocate a unique order code after ${MAX_ORDER_CODE_ATTEMPTS} attempts`);
  };
}

// ============================================================================
// Best-effort Side Effects
// ============================================================================

function notifyDispatch(order: Order): (effects: AppEffects) => Promise<void> {
  return async (effects: AppEffects) => {
    const result = await EitherAsync(() => effects.dispatch.notifyNewOrder(buildDispatchNotice(order))).run();
    if (result.isLeft()) {
      const reason = result.extract();
      console.warn(`Dispatch of order ${order.code} failed, order kept:`, reason);
      await raiseAlerts([buildDispatchFailedAlert(order.code, reason)])(effects);
    }
  };
}

function raiseAlerts(alerts: MonitoringAlert[]): (effects: AppEffects) => Promise<void> {
  return async (effects: AppEffects) => {
    const result = await EitherAsync(() => effects.monitoring.sendAlerts(alerts)).run();
    result.ifLeft(err => console.error('Monitoring alert failed:', err));
  };
}

// ============================================================================
// Order Lifecycle (admin commands)
// ============================================================================

export function getOrder(
  code: string
): (effects: AppEffects) => Promise<Either<OrderError, Order>> {
  return async (effects: AppEffects) => {
    const orderCode = normalizeOrderCode(code);
    const order = await effects.orders.getByCode(orderCode);
    return order ? Right(order) : Left(orderNotFound(orderCode));
  };
}

/**
 * Look up an order by code. Its customer and staff see the whole record;
 * anyone else holding the code gets the public view.
 */
export function viewOrder(
  code: string,
  actorId: string | null
): (effects: AppEffects) => Promise<Either<OrderError, Order | PublicOrderView>> {
  return async (effects: AppEffects) => {
    const found = await getOrder(code)(effects);
    return andThen(found, async (order): Promise<Either<OrderError, Order | PublicOrderView>> => {
      if (actorId === null) return Right(toPublicOrderView(order));
      if (actorId === order.customerId) return Right(order);
      const role = await roleOf(actorId)(effects);
      return Right(can(role, 'confirm_delivery') ? order : toPublicOrderView(order));
    });
  };
}

/**
 * Orders still to be delivered, newest first.
 */
export function listOpenOrders(): (effects: AppEffects) => Promise<Order[]> {
  return async (effects: AppEffects) => effects.orders.listOpen();
}

export function assignCourier(
  code: string,
  courierId: string
): (effects: AppEffects) => Promise<Either<OrderError, Order>> {
  return async (effects: AppEffects) => {
    return andThen(parseRequiredText('courierId', courierId), courier =>
      effects.orders.applyChange(normalizeOrderCode(code), order => decideAssignment(order, courier)));
  };
}

export function markOutForDelivery(
  code: string
): (effects: AppEffects) => Promise<Either<OrderError, Order>> {
  return async (effects: AppEffects) =>
    effects.orders.applyChange(normalizeOrderCode(code), decideOutForDelivery);
}

/**
 * Settle a delivered order: debit stock for every snapshot line, stamp the
 * delivery time and record the sale, all or nothing. A second call for the
 * same code finds the order delivered and returns ORDER_ALREADY_SETTLED.
 *
 * A stock shortfall at this point means the books disagree with the shelf;
 * it is refused and reported for manual reconciliation.
 */
export function confirmDelivered(
  code: string
): (effects: AppEffects) => Promise<Either<OrderError, Order>> {
  return async (effects: AppEffects) => {
    const orderCode = normalizeOrderCode(code);
    const settled = await effects.orders.applyChange(
      orderCode,
      order => decideSettlement(order, effects.env.now())
    );

    if (settled.isLeft()) {
      const alert = buildStockReconciliationAlert(orderCode, settled.extract()).extract();
      if (alert) {
        console.error(`Settlement of order ${orderCode} refused, stock needs reconciliation`);
        await raiseAlerts([alert])(effects);
      }
    }
    return settled;
  };
}

export function cancelOrder(
  code: string
): (effects: AppEffects) => Promise<Either<OrderError, Order>> {
  return async (effects: AppEffects) =>
    effects.orders.applyChange(normalizeOrderCode(code), decideCancellation);
}

export function currentCheckoutStep(
  customerId: string
): (effects: AppEffects) => Promise<Either<OrderError, CheckoutSession>> {
  return async (effects: AppEffects) => {
    const session = await effects.checkouts.get(customerId);
    return session ? Right(session) : Left(noActiveCheckout());
  };
}
