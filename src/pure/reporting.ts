/**
 * REPORTING VIEW
 *
 * Read-only projections over orders and the treasury ledger. Rendering to CSV
 * or PDF is left to the caller.
 */

import {Either, Left, Right} from 'purify-ts';
import type {Order, ReportRow, TreasuryEntry} from '../domain';
import type {AppEffects} from './effects';
import type {RevenueSummary} from './types';
import {roundMoney} from './businessLogic';
import {andThen, invalidInput, OrderError} from './errors';

export const DEFAULT_REPORT_WINDOW_DAYS = 30;

const DAY_MS = 24 * 60 * 60 * 1000;

export function windowStart(now: Date, windowDays: number): Either<OrderError, Date> {
  if (!Number.isInteger(windowDays) || windowDays < 1) {
    return Left(invalidInput('windowDays', 'must be a whole number of one or more'));
  }
  return Right(new Date(now.getTime() - windowDays * DAY_MS));
}

export function toReportRow(order: Order): ReportRow {
  return {
    orderId: order.id,
    code: order.code,
    status: order.status,
    total: order.total,
    discount: order.discount,
    deliveryFee: order.deliveryFee,
    createdAt: order.createdAt,
    deliveredAt: order.deliveredAt,
  };
}

export function summarizeRevenue(rows: readonly ReportRow[], entries: readonly TreasuryEntry[]): RevenueSummary {
  return {
    orderCount: rows.length,
    deliveredCount: rows.filter(row => row.status === 'delivered').length,
    grossTotal: roundMoney(rows.reduce((sum, row) => sum + row.total, 0)),
    settledRevenue: roundMoney(entries
      .filter(entry => entry.kind === 'sale')
      .reduce((sum, entry) => sum + entry.amount, 0)),
  };
}

/**
 * Orders created within the last windowDays, in the order they were placed.
 */
export function summaryOver(
  windowDays: number = DEFAULT_REPORT_WINDOW_DAYS
): (effects: AppEffects) => Promise<Either<OrderError, ReportRow[]>> {
  return async (effects: AppEffects) =>
    andThen(windowStart(effects.env.now(), windowDays), async since => {
      const orders = await effects.orders.listCreatedSince(since);
      return Right(orders.map(toReportRow));
    });
}

export function revenueOver(
  windowDays: number = DEFAULT_REPORT_WINDOW_DAYS
): (effects: AppEffects) => Promise<Either<OrderError, RevenueSummary>> {
  return async (effects: AppEffects) =>
    andThen(windowStart(effects.env.now(), windowDays), async since => {
      const [orders, entries] = await Promise.all([
        effects.orders.listCreatedSince(since),
        effects.treasury.listSince(since),
      ]);
      return Right(summarizeRevenue(orders.map(toReportRow), entries));
    });
}
