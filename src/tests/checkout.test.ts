import {advanceCheckout, initialCheckout, parseDistance} from '../pure/checkout';
import type {CheckoutSession} from '../pure/types';

describe('parseDistance', () => {
  it.each([
    ['12', 12],
    ['12,5', 12.5],
    [' 7.25 ', 7.25],
    ['.5', 0.5],
    ['7.', 7],
    ['0', 0],
  ])('reads %j as %d km', (text, km) => {
    expect(parseDistance(text).extract()).toBe(km);
  });

  it.each(['', 'loin', '-3', '1e3', '12 km', '1,2,3'])('rejects %j', text => {
    expect(parseDistance(text).extract()).toEqual({
      code: 'INVALID_INPUT',
      field: 'distance',
      reason: 'enter a number of kilometres',
    });
  });

  it('accepts the largest distance it can store', () => {
    expect(parseDistance('1000').extract()).toBe(1000);
  });

  it.each(['1000000', '1000.5', '1'.repeat(400)])('rejects %j as too far to store', text => {
    expect(parseDistance(text).extract()).toEqual({
      code: 'INVALID_INPUT',
      field: 'distance',
      reason: 'must be at most 1000 km',
    });
  });
});

describe('advanceCheckout', () => {
  it('collects address, city, distance and promo in that order', () => {
    const city = advanceCheckout(initialCheckout(), ' 3 rue Haute ').unsafeCoerce();
    expect(city).toEqual({ kind: 'next', session: { step: 'collecting_city', address: '3 rue Haute' } });
    if (city.kind !== 'next') throw new Error('expected another step');

    const distance = advanceCheckout(city.session, 'Rodez').unsafeCoerce();
    expect(distance).toEqual({
      kind: 'next',
      session: { step: 'collecting_distance', address: '3 rue Haute', city: 'Rodez' },
    });
    if (distance.kind !== 'next') throw new Error('expected another step');

    const promo = advanceCheckout(distance.session, '12,5').unsafeCoerce();
    expect(promo).toEqual({
      kind: 'next',
      session: { step: 'collecting_promo', address: '3 rue Haute', city: 'Rodez', distanceKm: 12.5 },
    });
    if (promo.kind !== 'next') throw new Error('expected another step');

    expect(advanceCheckout(promo.session, 'tresorerie10').unsafeCoerce()).toEqual({
      kind: 'ready',
      details: { address: '3 rue Haute', city: 'Rodez', distanceKm: 12.5, promoCode: 'TRESORERIE10' },
    });
  });

  it('reads NON at the promo step as no code', () => {
    const session: CheckoutSession = { step: 'collecting_promo', address: 'a', city: 'b', distanceKm: 1 };

    expect(advanceCheckout(session, 'NON').unsafeCoerce()).toEqual({
      kind: 'ready',
      details: { address: 'a', city: 'b', distanceKm: 1, promoCode: null },
    });
  });

  it('refuses a blank address or city', () => {
    expect(advanceCheckout(initialCheckout(), '   ').extract()).toEqual({
      code: 'INVALID_INPUT',
      field: 'address',
      reason: 'must not be empty',
    });
    expect(advanceCheckout({ step: 'collecting_city', address: 'a' }, '').extract()).toEqual({
      code: 'INVALID_INPUT',
      field: 'city',
      reason: 'must not be empty',
    });
  });
});
