/**
 * TREASURY LEDGER
 *
 * Append-only. Sale entries are written by settlement alone; this entry
 * point is for refunds and manual adjustments.
 */

import {Either, Left, Right} from 'purify-ts';
import type {TreasuryEntry, TreasuryEntryKind} from '../domain';
import type {AppEffects} from './effects';
import {roundMoney} from './businessLogic';
import {andThen, invalidInput, OrderError, orderNotFound} from './errors';

export function parseEntryKind(value: string): Either<OrderError, Exclude<TreasuryEntryKind, 'sale'>> {
  switch (value.trim().toLowerCase()) {
    case 'refund':
      return Right('refund' as const);
    case 'adjustment':
      return Right('adjustment' as const);
    case 'sale':
      return Left(invalidInput('kind', 'sale entries are written by settlement only'));
    default:
      return Left(invalidInput('kind', 'expected refund or adjustment'));
  }
}

export function recordTreasuryEntry(
  orderId: number,
  kind: string,
  amount: number
): (effects: AppEffects) => Promise<Either<OrderError, TreasuryEntry>> {
  return async (effects: AppEffects) => {
    const validKind: Either<OrderError, Exclude<TreasuryEntryKind, 'sale'>> = Number.isFinite(amount)
      ? parseEntryKind(kind)
      : Left(invalidInput('amount', 'must be a number'));

    return andThen(validKind, async entryKind => {
      if (!(await effects.orders.getById(orderId))) {
        return Left(orderNotFound(`#${orderId}`));
      }

      const entry = await effects.treasury.record({
        orderId,
        kind: entryKind,
        amount: roundMoney(amount),
        createdAt: effects.env.now(),
      });
      return Right(entry);
    });
  };
}

export function listTreasuryEntries(orderId: number): (effects: AppEffects) => Promise<TreasuryEntry[]> {
  return async (effects: AppEffects) => effects.treasury.listForOrder(orderId);
}
