/**
 * Request decoding for the HTTP adapter. Bodies go through purify-ts codecs;
 * anything that does not decode becomes an INVALID_INPUT.
 */

import {boolean, Codec, Either, Left, number, optional, Right, string} from 'purify-ts';
import {invalidInput, OrderError, OrderErrorCode} from '../pure/errors';
import {DEFAULT_REPORT_WINDOW_DAYS} from '../pure/reporting';

export const AddToCartBody = Codec.interface({
  productId: number,
  quantity: optional(number),
});

export const CheckoutInputBody = Codec.interface({
  text: string,
});

export const CreateProductBody = Codec.interface({
  name: string,
  price: number,
  stock: number,
});

export const PriceBody = Codec.interface({ price: number });

export const StockBody = Codec.interface({ stock: number });

export const FeeScheduleBody = Codec.interface({
  tiers: string,
  freeZone: optional(string),
  perKmAboveMax: optional(number),
});

export const GlobalDiscountBody = Codec.interface({
  active: boolean,
  amount: optional(number),
});

export const RoleBody = Codec.interface({ role: string });

export const AssignCourierBody = Codec.interface({ courierId: string });

export const TreasuryEntryBody = Codec.interface({
  kind: string,
  amount: number,
});

export const ReviewBody = Codec.interface({
  rating: number,
  text: string,
});

export const MessageBody = Codec.interface({ text: string });

export function decodeBody<T>(codec: Codec<T>, body: unknown): Either<OrderError, T> {
  return codec.decode(body).mapLeft(reason => invalidInput('body', reason));
}

export function parseId(field: string, text: string): Either<OrderError, number> {
  return /^\d+$/.test(text.trim())
    ? Right(parseInt(text.trim(), 10))
    : Left(invalidInput(field, 'must be a positive whole number'));
}

/**
 * The ?days= query parameter; absent means the default window.
 */
export function parseWindowDays(value: unknown): Either<OrderError, number> {
  if (value === undefined || value === '') return Right(DEFAULT_REPORT_WINDOW_DAYS);
  return typeof value === 'string' && /^\d+$/.test(value)
    ? Right(parseInt(value, 10))
    : Left(invalidInput('windowDays', 'must be a whole number of one or more'));
}

const statuses: Record<OrderErrorCode, number> = {
  EMPTY_CART: 409,
  INSUFFICIENT_STOCK: 409,
  UNCOVERED_ZONE: 422,
  INVALID_INPUT: 400,
  ORDER_NOT_FOUND: 404,
  ORDER_ALREADY_SETTLED: 409,
  ORDER_CANCELLED: 409,
  INVALID_TRANSITION: 409,
  PRODUCT_NOT_FOUND: 404,
  NO_ACTIVE_CHECKOUT: 409,
  UNAUTHORIZED: 403,
};

export function httpStatusFor(error: OrderError): number {
  return statuses[error.code];
}
