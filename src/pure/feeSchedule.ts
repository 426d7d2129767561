/**
 * FEE TIER TABLE
 *
 * Pure lookup and validation for the delivery fee schedule. The schedule is a
 * single value replaced as a whole; nothing here mutates it.
 */

import {Either, Left, Right} from 'purify-ts';
import type {FeeSchedule, FeeTier} from '../domain';
import {invalidInput, OrderError, uncoveredZone} from './errors';

export const DEFAULT_FEE_TIERS: readonly FeeTier[] = [
  { maxDistanceKm: 20, fee: 20 },
  { maxDistanceKm: 30, fee: 30 },
  { maxDistanceKm: 50, fee: 50 },
];

export function isFreeZone(schedule: FeeSchedule, city: string): boolean {
  return city.trim().toLowerCase() === schedule.freeZone.trim().toLowerCase();
}

export function deliveryFee(
  schedule: FeeSchedule,
  city: string,
  distanceKm: number
): Either<OrderError, number> {
  if (isFreeZone(schedule, city)) return Right(0);

  const tier = schedule.tiers.find(t => t.maxDistanceKm >= distanceKm);
  if (tier) return Right(tier.fee);

  const last = schedule.tiers[schedule.tiers.length - 1];
  return Left(uncoveredZone(distanceKm, last ? last.maxDistanceKm : 0));
}

export function validateFeeTiers(tiers: readonly FeeTier[]): Either<OrderError, FeeTier[]> {
  const sorted = [...tiers].sort((a, b) => a.maxDistanceKm - b.maxDistanceKm);

  for (const tier of sorted) {
    if (!Number.isFinite(tier.maxDistanceKm) || tier.maxDistanceKm <= 0) {
      return Left(invalidInput('tiers', `distance ${tier.maxDistanceKm} must be a positive number`));
    }
    if (!Number.isFinite(tier.fee) || tier.fee < 0) {
      return Left(invalidInput('tiers', `fee ${tier.fee} must be zero or more`));
    }
  }

  const duplicate = sorted.find((tier, i) => i > 0 && sorted[i - 1].maxDistanceKm === tier.maxDistanceKm);
  if (duplicate) {
    return Left(invalidInput('tiers', `distance ${duplicate.maxDistanceKm} appears more than once`));
  }

  return Right(sorted.map(t => ({ maxDistanceKm: t.maxDistanceKm, fee: t.fee })));
}

/**
 * Parse the compact admin form "20:20,30:30,50:50" (max km : fee).
 */
export function parseFeeTiers(text: string): Either<OrderError, FeeTier[]> {
  const chunks = text.split(',').map(c => c.trim()).filter(c => c.length > 0);
  if (chunks.length === 0) {
    return Left(invalidInput('tiers', 'at least one tier is required'));
  }

  const tiers: FeeTier[] = [];
  for (const chunk of chunks) {
    const parts = chunk.split(':').map(p => p.trim());
    if (parts.length !== 2 || parts[0] === '' || parts[1] === '') {
      return Left(invalidInput('tiers', `"${chunk}" is not of the form km:fee`));
    }
    const maxDistanceKm = Number(parts[0]);
    const fee = Number(parts[1]);
    if (Number.isNaN(maxDistanceKm) || Number.isNaN(fee)) {
      return Left(invalidInput('tiers', `"${chunk}" is not numeric`));
    }
    tiers.push({ maxDistanceKm, fee });
  }

  return validateFeeTiers(tiers);
}

export function buildFeeSchedule(
  tiers: readonly FeeTier[],
  freeZone: string,
  perKmAboveMax = 0
): Either<OrderError, FeeSchedule> {
  if (freeZone.trim() === '') {
    return Left(invalidInput('freeZone', 'must not be empty'));
  }
  if (!Number.isFinite(perKmAboveMax) || perKmAboveMax < 0) {
    return Left(invalidInput('perKmAboveMax', 'must be zero or more'));
  }
  return validateFeeTiers(tiers).map(valid =>
    Object.freeze({
      tiers: Object.freeze(valid.map(t => Object.freeze(t))),
      freeZone: freeZone.trim(),
      perKmAboveMax,
    })
  );
}

export function describeFeeSchedule(schedule: FeeSchedule): string {
  const lines = [`${schedule.freeZone}: 0.00`];
  for (const tier of schedule.tiers) {
    lines.push(`<= ${tier.maxDistanceKm} km: ${tier.fee.toFixed(2)}`);
  }
  const last = schedule.tiers[schedule.tiers.length - 1];
  lines.push(last ? `> ${last.maxDistanceKm} km: not covered` : 'outside the free zone: not covered');
  return lines.join('\n');
}
