/**
 * ORDER LIFECYCLE
 *
 * The order status machine and the pure deciders that turn an admin command
 * into an OrderChange. Repositories apply a change atomically under their own
 * lock; deciders only look at the order as it is at that moment.
 *
 *   pending -> assigned -> out_for_delivery -> delivered
 *   any status before delivered -> cancelled
 *
 * delivered and cancelled are terminal.
 */

import {Either, Left, Right} from 'purify-ts';
import type {Order, OrderStatus} from '../domain';
import type {OrderChange, StockDebit} from './types';
import {invalidTransition, orderAlreadySettled, orderCancelled, OrderError} from './errors';

export const ORDER_STATUSES: readonly OrderStatus[] = [
  'pending',
  'assigned',
  'out_for_delivery',
  'delivered',
  'cancelled',
];

const transitions: Record<OrderStatus, readonly OrderStatus[]> = {
  pending: ['assigned', 'delivered', 'cancelled'],
  // reassigning a courier keeps the order in 'assigned'
  assigned: ['assigned', 'out_for_delivery', 'delivered', 'cancelled'],
  out_for_delivery: ['delivered', 'cancelled'],
  delivered: [],
  cancelled: [],
};

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return transitions[from].includes(to);
}

export function isTerminal(status: OrderStatus): boolean {
  return transitions[status].length === 0;
}

export function isOrderStatus(value: string): value is OrderStatus {
  return (ORDER_STATUSES as readonly string[]).includes(value);
}

function guardTransition(order: Order, to: OrderStatus): Either<OrderError, OrderStatus> {
  if (order.status === 'delivered') return Left(orderAlreadySettled(order.code));
  if (order.status === 'cancelled') return Left(orderCancelled(order.code));
  if (!canTransition(order.status, to)) return Left(invalidTransition(order.code, order.status, to));
  return Right(to);
}

function statusOnly(order: Order, status: OrderStatus, courierId: string | null): OrderChange {
  return {
    status,
    courierId,
    deliveredAt: order.deliveredAt,
    stockDebits: [],
    ledgerEntry: null,
  };
}

/**
 * One debit per product, in ascending product id order so that concurrent
 * settlements always lock products in the same sequence.
 */
export function planStockDebits(order: Order): StockDebit[] {
  const totals = new Map<number, number>();
  for (const item of order.items) {
    totals.set(item.productId, (totals.get(item.productId) ?? 0) + item.quantity);
  }
  return [...totals.entries()]
    .sort(([a], [b]) => a - b)
    .map(([productId, quantity]) => ({ productId, quantity }));
}

export function decideAssignment(order: Order, courierId: string): Either<OrderError, OrderChange> {
  return guardTransition(order, 'assigned').map(status => statusOnly(order, status, courierId));
}

export function decideOutForDelivery(order: Order): Either<OrderError, OrderChange> {
  return guardTransition(order, 'out_for_delivery').map(status => statusOnly(order, status, order.courierId));
}

export function decideSettlement(order: Order, deliveredAt: Date): Either<OrderError, OrderChange> {
  return guardTransition(order, 'delivered').map(status => ({
    status,
    courierId: order.courierId,
    deliveredAt,
    stockDebits: planStockDebits(order),
    ledgerEntry: { kind: 'sale' as const, amount: order.total, createdAt: deliveredAt },
  }));
}

export function decideCancellation(order: Order): Either<OrderError, OrderChange> {
  return guardTransition(order, 'cancelled').map(status => statusOnly(order, status, order.courierId));
}
