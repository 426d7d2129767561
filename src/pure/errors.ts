/**
 * ORDER ERRORS
 *
 * Every domain failure is a value of the OrderError union and travels as the
 * Left side of an Either. Infrastructure failures (database, network) are
 * thrown instead and never show up here.
 */

import {Either, Left} from 'purify-ts';
import type {Capability, OrderStatus} from '../domain';

export type OrderError =
  | { readonly code: 'EMPTY_CART' }
  | { readonly code: 'INSUFFICIENT_STOCK'; readonly productName: string; readonly available: number }
  | { readonly code: 'UNCOVERED_ZONE'; readonly distanceKm: number; readonly maxDistanceKm: number }
  | { readonly code: 'INVALID_INPUT'; readonly field: string; readonly reason: string }
  | { readonly code: 'ORDER_NOT_FOUND'; readonly orderCode: string }
  | { readonly code: 'ORDER_ALREADY_SETTLED'; readonly orderCode: string }
  | { readonly code: 'ORDER_CANCELLED'; readonly orderCode: string }
  | {
      readonly code: 'INVALID_TRANSITION';
      readonly orderCode: string;
      readonly from: OrderStatus;
      readonly to: OrderStatus;
    }
  | { readonly code: 'PRODUCT_NOT_FOUND'; readonly productId: number }
  | { readonly code: 'NO_ACTIVE_CHECKOUT' }
  | { readonly code: 'UNAUTHORIZED'; readonly capability: Capability };

export type OrderErrorCode = OrderError['code'];

export type Outcome<T> = Promise<Either<OrderError, T>>;

/**
 * Run the effectful continuation on a Right; a Left passes straight through.
 */
export function andThen<T, U>(value: Either<OrderError, T>, next: (value: T) => Outcome<U>): Outcome<U> {
  return value.caseOf<Outcome<U>>({
    Left: error => Promise.resolve(Left(error)),
    Right: next,
  });
}

export const emptyCart = (): OrderError => ({ code: 'EMPTY_CART' });

export const insufficientStock = (productName: string, available: number): OrderError => ({
  code: 'INSUFFICIENT_STOCK',
  productName,
  available,
});

export const uncoveredZone = (distanceKm: number, maxDistanceKm: number): OrderError => ({
  code: 'UNCOVERED_ZONE',
  distanceKm,
  maxDistanceKm,
});

export const invalidInput = (field: string, reason: string): OrderError => ({
  code: 'INVALID_INPUT',
  field,
  reason,
});

export const orderNotFound = (orderCode: string): OrderError => ({ code: 'ORDER_NOT_FOUND', orderCode });

export const orderAlreadySettled = (orderCode: string): OrderError => ({
  code: 'ORDER_ALREADY_SETTLED',
  orderCode,
});

export const orderCancelled = (orderCode: string): OrderError => ({ code: 'ORDER_CANCELLED', orderCode });

export const invalidTransition = (orderCode: string, from: OrderStatus, to: OrderStatus): OrderError => ({
  code: 'INVALID_TRANSITION',
  orderCode,
  from,
  to,
});

export const productNotFound = (productId: number): OrderError => ({ code: 'PRODUCT_NOT_FOUND', productId });

export const noActiveCheckout = (): OrderError => ({ code: 'NO_ACTIVE_CHECKOUT' });

export const unauthorized = (capability: Capability): OrderError => ({ code: 'UNAUTHORIZED', capability });

/**
 * User-facing message for an error. Admin callers get these verbatim.
 */
export function describeError(error: OrderError): string {
  switch (error.code) {
    case 'EMPTY_CART':
      return 'Your cart is empty.';
    case 'INSUFFICIENT_STOCK':
      return `Insufficient stock for ${error.productName} (${error.available} left).`;
    case 'UNCOVERED_ZONE':
      return `Delivery zone not covered: ${error.distanceKm} km is beyond the last tier (${error.maxDistanceKm} km).`;
    case 'INVALID_INPUT':
      return `Invalid ${error.field}: ${error.reason}.`;
    case 'ORDER_NOT_FOUND':
      return `Order ${error.orderCode} not found.`;
    case 'ORDER_ALREADY_SETTLED':
      return `Order ${error.orderCode} is already delivered.`;
    case 'ORDER_CANCELLED':
      return `Order ${error.orderCode} is cancelled.`;
    case 'INVALID_TRANSITION':
      return `Order ${error.orderCode} cannot go from ${error.from} to ${error.to}.`;
    case 'PRODUCT_NOT_FOUND':
      return `Product #${error.productId} not found.`;
    case 'NO_ACTIVE_CHECKOUT':
      return 'No checkout in progress.';
    case 'UNAUTHORIZED':
      return `Not allowed to ${error.capability.replace(/_/g, ' ')}.`;
  }
}
