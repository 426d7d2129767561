/**
 * CHECKOUT PROTOCOL
 *
 * Each substate carries only the fields collected so far, so a later step can
 * never read a value that has not been given yet. advanceCheckout is the only
 * way from one substate to the next.
 */

import {Either, Left, Right} from 'purify-ts';
import type {CheckoutAdvance, CheckoutSession} from './types';
import {invalidInput, OrderError} from './errors';
import {normalizePromoCode} from './businessLogic';

const DISTANCE_PATTERN = /^(\d+(\.\d*)?|\.\d+)$/;

// well inside the NUMERIC(8, 2) distance column
export const MAX_DISTANCE_KM = 1000;

export function initialCheckout(): CheckoutSession {
  return { step: 'collecting_address' };
}

export function parseRequiredText(field: string, text: string): Either<OrderError, string> {
  const trimmed = text.trim();
  return trimmed === '' ? Left(invalidInput(field, 'must not be empty')) : Right(trimmed);
}

/**
 * Distances accept a comma as decimal separator ("12,5" is 12.5).
 */
export function parseDistance(text: string): Either<OrderError, number> {
  const normalized = text.trim().replace(',', '.');
  if (!DISTANCE_PATTERN.test(normalized)) {
    return Left(invalidInput('distance', 'enter a number of kilometres'));
  }
  const distanceKm = Number(normalized);
  if (!Number.isFinite(distanceKm) || distanceKm > MAX_DISTANCE_KM) {
    return Left(invalidInput('distance', `must be at most ${MAX_DISTANCE_KM} km`));
  }
  return Right(distanceKm);
}

export function advanceCheckout(session: CheckoutSession, input: string): Either<OrderError, CheckoutAdvance> {
  switch (session.step) {
    case 'collecting_address':
      return parseRequiredText('address', input).map(address => ({
        kind: 'next' as const,
        session: { step: 'collecting_city' as const, address },
      }));
    case 'collecting_city':
      return parseRequiredText('city', input).map(city => ({
        kind: 'next' as const,
        session: { step: 'collecting_distance' as const, address: session.address, city },
      }));
    case 'collecting_distance':
      return parseDistance(input).map(distanceKm => ({
        kind: 'next' as const,
        session: {
          step: 'collecting_promo' as const,
          address: session.address,
          city: session.city,
          distanceKm,
        },
      }));
    case 'collecting_promo':
      return Right({
        kind: 'ready' as const,
        details: {
          address: session.address,
          city: session.city,
          distanceKm: session.distanceKm,
          promoCode: normalizePromoCode(input),
        },
      });
  }
}
