// Admin coordinators: authorization, pricing settings and roles.

import {Either, Left, Right} from 'purify-ts';
import type {Capability, DiscountPolicy, FeeSchedule, Role} from '../domain';
import type {AppEffects} from './effects';
import {validateDiscountPolicy} from './businessLogic';
import {buildFeeSchedule, parseFeeTiers} from './feeSchedule';
import {andThen, OrderError, unauthorized} from './errors';
import {can, parseRole, resolveRole} from './roles';

export function roleOf(userId: string): (effects: AppEffects) => Promise<Role> {
  return async (effects: AppEffects) => {
    const stored = await effects.roles.getRole(userId);
    return resolveRole(stored, userId, effects.roles.ownerId);
  };
}

export function authorize(
  actorId: string,
  capability: Capability
): (effects: AppEffects) => Promise<Either<OrderError, Role>> {
  return async (effects: AppEffects) => {
    const role = await roleOf(actorId)(effects);
    return can(role, capability) ? Right(role) : Left(unauthorized(capability));
  };
}

export function assignRole(
  userId: string,
  role: string
): (effects: AppEffects) => Promise<Either<OrderError, Role>> {
  return async (effects: AppEffects) =>
    andThen(parseRole(role), async parsed => {
      await effects.roles.setRole(userId.trim(), parsed);
      return Right(parsed);
    });
}

export function getFeeSchedule(): (effects: AppEffects) => Promise<FeeSchedule> {
  return async (effects: AppEffects) => effects.pricing.getFeeSchedule();
}

/**
 * Replace the whole schedule from the compact "km:fee,km:fee" form. The free
 * zone and per-km value are kept unless given.
 */
export function replaceFeeSchedule(
  tiersText: string,
  freeZone?: string,
  perKmAboveMax?: number
): (effects: AppEffects) => Promise<Either<OrderError, FeeSchedule>> {
  return async (effects: AppEffects) =>
    andThen(parseFeeTiers(tiersText), tiers =>
      effects.pricing.updateFeeSchedule(current =>
        buildFeeSchedule(tiers, freeZone ?? current.freeZone, perKmAboveMax ?? current.perKmAboveMax)));
}

export function getDiscountPolicy(): (effects: AppEffects) => Promise<DiscountPolicy> {
  return async (effects: AppEffects) => effects.pricing.getDiscountPolicy();
}

export function replaceDiscountPolicy(
  policy: DiscountPolicy
): (effects: AppEffects) => Promise<Either<OrderError, DiscountPolicy>> {
  return async (effects: AppEffects) =>
    andThen(validateDiscountPolicy(policy), async valid => {
      await effects.pricing.replaceDiscountPolicy(valid);
      return Right(valid);
    });
}

/**
 * Toggle the global discount, optionally with a new amount; the rest of the
 * policy is kept.
 */
export function setGlobalDiscount(
  active: boolean,
  amount?: number
): (effects: AppEffects) => Promise<Either<OrderError, DiscountPolicy>> {
  return async (effects: AppEffects) =>
    effects.pricing.updateDiscountPolicy(current => validateDiscountPolicy({
      ...current,
      globalDiscount: { active, amount: amount ?? current.globalDiscount.amount },
    }));
}
