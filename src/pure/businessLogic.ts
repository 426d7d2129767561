/**
 * PURE BUSINESS LOGIC
 *
 * These functions take values and return values. No effects whatsoever.
 * Money is a plain number rounded to cents at each computed total.
 */

import type {CartLine, DiscountPolicy, Order, Product, SnapshotLineItem} from '../domain';
import type {DispatchNotice, MonitoringAlert, NotificationPayload} from '../types';
import type {NewOrder, OrderQuote, PricedLine, PublicOrderView} from './types';
import {Either, Left, Maybe, Right} from 'purify-ts';
import {insufficientStock, invalidInput, OrderError} from './errors';

export const ORDER_CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const ORDER_CODE_LENGTH = 6;

export function roundMoney(amount: number): number {
  return Math.round(amount * 100) / 100;
}

// ============================================================================
// Cart & Line Items
// ============================================================================

/**
 * Join cart lines against the catalog. Lines whose product is missing or
 * inactive are left out.
 */
export function priceCartLines(
  lines: readonly CartLine[],
  products: ReadonlyMap<number, Product>
): PricedLine[] {
  return lines.flatMap(line => {
    const product = products.get(line.productId);
    if (!product || !product.active) return [];
    return [{
      product,
      quantity: line.quantity,
      lineTotal: roundMoney(product.price * line.quantity),
    }];
  });
}

/**
 * Cart lines whose product has left the catalog or been deactivated.
 */
export function findUnavailableLines(
  lines: readonly CartLine[],
  products: ReadonlyMap<number, Product>
): CartLine[] {
  return lines.filter(line => !products.get(line.productId)?.active);
}

export function calculateSubtotal(lines: readonly PricedLine[]): number {
  return roundMoney(lines.reduce((sum, line) => sum + line.product.price * line.quantity, 0));
}

export function findStockShortage(lines: readonly PricedLine[]): Maybe<OrderError> {
  return Maybe.fromNullable(lines.find(line => line.product.stock < line.quantity))
    .map(line => insufficientStock(line.product.name, line.product.stock));
}

export function toSnapshot(lines: readonly PricedLine[]): SnapshotLineItem[] {
  return lines.map(line => ({
    productId: line.product.id,
    name: line.product.name,
    unitPrice: line.product.price,
    quantity: line.quantity,
  }));
}

// ============================================================================
// Discounts & Totals
// ============================================================================

export function normalizePromoCode(text: string): string | null {
  const code = text.trim().toUpperCase();
  return code === '' || code === 'NON' ? null : code;
}

/**
 * With deliveredOrders already settled for the customer, the order being
 * placed is number deliveredOrders + 1; every Nth one earns the loyalty amount.
 */
export function isLoyaltyOrder(policy: DiscountPolicy, deliveredOrders: number): boolean {
  const {enabled, everyNthOrder} = policy.loyalty;
  return enabled && everyNthOrder > 0 && (deliveredOrders + 1) % everyNthOrder === 0;
}

export function calculateDiscount(
  policy: DiscountPolicy,
  promoCode: string | null,
  deliveredOrders: number
): number {
  const global = policy.globalDiscount.active ? policy.globalDiscount.amount : 0;
  const promo = policy.promo !== null && promoCode !== null && promoCode === policy.promo.code.toUpperCase()
    ? policy.promo.amount
    : 0;
  const loyalty = isLoyaltyOrder(policy, deliveredOrders) ? policy.loyalty.amount : 0;
  return roundMoney(global + promo + loyalty);
}

/**
 * Amounts must be zero or more; a promo code is stored upper-cased.
 */
export function validateDiscountPolicy(policy: DiscountPolicy): Either<OrderError, DiscountPolicy> {
  const amounts = [
    policy.globalDiscount.amount,
    policy.loyalty.amount,
    ...(policy.promo ? [policy.promo.amount] : []),
  ];
  if (amounts.some(amount => !Number.isFinite(amount) || amount < 0)) {
    return Left(invalidInput('discount', 'amounts must be zero or more'));
  }
  if (!Number.isInteger(policy.loyalty.everyNthOrder) || policy.loyalty.everyNthOrder < 1) {
    return Left(invalidInput('everyNthOrder', 'must be a whole number of one or more'));
  }
  const promoCode = policy.promo ? normalizePromoCode(policy.promo.code) : null;
  if (policy.promo && promoCode === null) {
    return Left(invalidInput('promo', 'code must not be empty or NON'));
  }
  return Right({
    globalDiscount: { active: policy.globalDiscount.active, amount: roundMoney(policy.globalDiscount.amount) },
    promo: policy.promo && promoCode !== null ? { code: promoCode, amount: roundMoney(policy.promo.amount) } : null,
    loyalty: {
      enabled: policy.loyalty.enabled,
      everyNthOrder: policy.loyalty.everyNthOrder,
      amount: roundMoney(policy.loyalty.amount),
    },
  });
}

export function calculateTotal(subtotal: number, discount: number, deliveryFee: number): number {
  return roundMoney(Math.max(0, subtotal - discount) + deliveryFee);
}

export function quoteOrder(
  lines: readonly PricedLine[],
  policy: DiscountPolicy,
  promoCode: string | null,
  deliveryFee: number,
  deliveredOrders: number
): OrderQuote {
  const subtotal = calculateSubtotal(lines);
  const discount = calculateDiscount(policy, promoCode, deliveredOrders);
  return {
    subtotal,
    discount,
    deliveryFee,
    total: calculateTotal(subtotal, discount, deliveryFee),
  };
}

// ============================================================================
// Order Codes
// ============================================================================

export function generateOrderCode(prefix: string, random: () => number): string {
  const head = prefix.trim().toUpperCase();
  const tail = Array.from({ length: ORDER_CODE_LENGTH }, () => {
    const index = Math.min(ORDER_CODE_ALPHABET.length - 1, Math.floor(random() * ORDER_CODE_ALPHABET.length));
    return ORDER_CODE_ALPHABET[index];
  }).join('');
  return `${head}-${tail}`;
}

export function normalizeOrderCode(text: string): string {
  return text.trim().toUpperCase();
}

// ============================================================================
// Catalog Input
// ============================================================================

export function validateProductName(name: string): Either<OrderError, string> {
  const trimmed = name.trim();
  return trimmed === '' ? Left(invalidInput('name', 'must not be empty')) : Right(trimmed);
}

export function validatePrice(price: number): Either<OrderError, number> {
  return Number.isFinite(price) && price >= 0
    ? Right(roundMoney(price))
    : Left(invalidInput('price', 'must be a number of zero or more'));
}

export function validateStock(stock: number): Either<OrderError, number> {
  return Number.isInteger(stock) && stock >= 0
    ? Right(stock)
    : Left(invalidInput('stock', 'must be a whole number of zero or more'));
}

export function validateQuantity(quantity: number): Either<OrderError, number> {
  return Number.isInteger(quantity) && quantity >= 1
    ? Right(quantity)
    : Left(invalidInput('quantity', 'must be a whole number of one or more'));
}

// ============================================================================
// Notifications & External Data Preparation
// ============================================================================

export function toNewOrder(
  code: string,
  customerId: string,
  lines: readonly PricedLine[],
  quote: OrderQuote,
  delivery: { readonly address: string; readonly city: string; readonly distanceKm: number },
  createdAt: Date
): NewOrder {
  return {
    ...quote,
    code,
    customerId,
    items: toSnapshot(lines),
    address: delivery.address,
    city: delivery.city,
    distanceKm: delivery.distanceKm,
    createdAt,
  };
}

/**
 * The courier only sees what is needed to deliver: no customer identity.
 */
export function buildDispatchNotice(order: Order): DispatchNotice {
  return {
    code: order.code,
    items: order.items.map(item => ({ name: item.name, quantity: item.quantity })),
    city: order.city,
    distanceKm: order.distanceKm,
    address: order.address,
    total: order.total,
  };
}

export function toPublicOrderView(order: Order): PublicOrderView {
  return {
    code: order.code,
    status: order.status,
    items: order.items.map(item => ({ name: item.name, quantity: item.quantity })),
    total: order.total,
    createdAt: order.createdAt,
    deliveredAt: order.deliveredAt,
  };
}

export function buildDispatchMessage(notice: DispatchNotice): NotificationPayload {
  const items = notice.items.map(item => `- ${item.name} x${item.quantity}`).join('\n');
  return {
    subject: `New order ${notice.code}`,
    body: `
New order ${notice.code}
Items:
${items}

Delivery: ${notice.city}, ${notice.distanceKm.toFixed(1)} km
Address: ${notice.address}
Payment: cash
Amount to collect: ${notice.total.toFixed(2)}
(Anonymous customer)
    `.trim(),
  };
}

export function buildStockReconciliationAlert(orderCode: string, error: OrderError): Maybe<MonitoringAlert> {
  return error.code === 'INSUFFICIENT_STOCK'
    ? Maybe.of({
        type: 'stock_reconciliation' as const,
        orderCode,
        productName: error.productName,
        available: error.available,
      })
    : Maybe.empty();
}

export function buildDispatchFailedAlert(orderCode: string, reason: unknown): MonitoringAlert {
  return {
    type: 'dispatch_failed',
    orderCode,
    reason: reason instanceof Error ? reason.message : String(reason),
  };
}
