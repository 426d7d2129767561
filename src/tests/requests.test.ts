import {AddToCartBody, decodeBody, FeeScheduleBody, httpStatusFor, parseId, parseWindowDays} from '../api/requests';
import {emptyCart, invalidInput, orderNotFound, uncoveredZone, unauthorized} from '../pure/errors';

describe('decodeBody', () => {
  it('passes a well-formed body through', () => {
    expect(decodeBody(AddToCartBody, { productId: 4, quantity: 2 }).extract()).toEqual({ productId: 4, quantity: 2 });
    expect(decodeBody(FeeScheduleBody, { tiers: '0-10:20' }).extract()).toEqual({ tiers: '0-10:20' });
  });

  it('turns a decode failure into an invalid body', () => {
    const result = decodeBody(AddToCartBody, { productId: 'four' });

    expect(result.isLeft()).toBe(true);
    expect(result.extract()).toMatchObject({ code: 'INVALID_INPUT', field: 'body' });
  });
});

describe('parseId', () => {
  it('reads a whole number', () => {
    expect(parseId('productId', ' 12 ').extract()).toBe(12);
  });

  it.each(['-1', '1.5', 'abc', ''])('rejects %p', text => {
    expect(parseId('productId', text).extract()).toEqual({
      code: 'INVALID_INPUT',
      field: 'productId',
      reason: 'must be a positive whole number',
    });
  });
});

describe('parseWindowDays', () => {
  it('defaults to thirty days', () => {
    expect(parseWindowDays(undefined).extract()).toBe(30);
    expect(parseWindowDays('').extract()).toBe(30);
  });

  it('reads the query value', () => {
    expect(parseWindowDays('7').extract()).toBe(7);
  });

  it('rejects anything else', () => {
    expect(parseWindowDays('week').isLeft()).toBe(true);
    expect(parseWindowDays(['7', '8']).isLeft()).toBe(true);
  });
});

describe('httpStatusFor', () => {
  it('maps each error family to a status', () => {
    expect(httpStatusFor(invalidInput('city', 'must not be empty'))).toBe(400);
    expect(httpStatusFor(unauthorized('set_fees'))).toBe(403);
    expect(httpStatusFor(orderNotFound('CMD-NOPE00'))).toBe(404);
    expect(httpStatusFor(emptyCart())).toBe(409);
    expect(httpStatusFor(uncoveredZone(80, 60))).toBe(422);
  });
});
