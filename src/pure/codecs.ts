/**
 * Codecs for the JSON documents the shop stores and accepts: the fee
 * schedule, the discount policy and the order item snapshot.
 */

import {array, boolean, Codec, nullable, number, string} from 'purify-ts';

export const FeeTierCodec = Codec.interface({
  maxDistanceKm: number,
  fee: number,
});

export const FeeScheduleCodec = Codec.interface({
  tiers: array(FeeTierCodec),
  freeZone: string,
  perKmAboveMax: number,
});

export const DiscountPolicyCodec = Codec.interface({
  globalDiscount: Codec.interface({
    active: boolean,
    amount: number,
  }),
  promo: nullable(Codec.interface({
    code: string,
    amount: number,
  })),
  loyalty: Codec.interface({
    enabled: boolean,
    everyNthOrder: number,
    amount: number,
  }),
});

export const SnapshotItemsCodec = array(Codec.interface({
  productId: number,
  name: string,
  unitPrice: number,
  quantity: number,
}));
