// Module product types

import type {CustomerMessage, OrderStatus, Product, Review, SnapshotLineItem, TreasuryEntryKind} from "../domain";

export type PricedLine = {
  readonly product: Product;
  readonly quantity: number;
  readonly lineTotal: number;
};

export type OrderQuote = {
  readonly subtotal: number;
  readonly discount: number;
  readonly deliveryFee: number;
  readonly total: number;
};

export type NewOrder = OrderQuote & {
  readonly code: string;
  readonly customerId: string;
  readonly items: readonly SnapshotLineItem[];
  readonly address: string;
  readonly city: string;
  readonly distanceKm: number;
  readonly createdAt: Date;
};

export type StockDebit = {
  readonly productId: number;
  readonly quantity: number;
};

export type NewTreasuryEntry = {
  readonly orderId: number;
  readonly kind: TreasuryEntryKind;
  readonly amount: number;
  readonly createdAt: Date;
};

/**
 * The outcome of a lifecycle decision, applied by the order repository as a
 * single atomic unit.
 */
export type OrderChange = {
  readonly status: OrderStatus;
  readonly courierId: string | null;
  readonly deliveredAt: Date | null;
  readonly stockDebits: readonly StockDebit[];
  readonly ledgerEntry: Omit<NewTreasuryEntry, 'orderId'> | null;
};

export type CheckoutStep = 'collecting_address' | 'collecting_city' | 'collecting_distance' | 'collecting_promo';

export type CheckoutSession =
  | { readonly step: 'collecting_address' }
  | { readonly step: 'collecting_city'; readonly address: string }
  | { readonly step: 'collecting_distance'; readonly address: string; readonly city: string }
  | {
      readonly step: 'collecting_promo';
      readonly address: string;
      readonly city: string;
      readonly distanceKm: number;
    };

export type CheckoutDetails = {
  readonly address: string;
  readonly city: string;
  readonly distanceKm: number;
  readonly promoCode: string | null;
};

export type CheckoutAdvance =
  | { readonly kind: 'next'; readonly session: CheckoutSession }
  | { readonly kind: 'ready'; readonly details: CheckoutDetails };

export type RevenueSummary = {
  readonly orderCount: number;
  readonly deliveredCount: number;
  readonly grossTotal: number;
  readonly settledRevenue: number;
};

export type NewReview = Omit<Review, 'id'>;

export type NewCustomerMessage = Omit<CustomerMessage, 'id'>;

export type ReviewSummary = {
  readonly count: number;
  readonly averageRating: number | null;
  readonly reviews: Review[];
};

/**
 * What anyone holding an order code may see: no customer identity, no
 * address and no courier.
 */
export type PublicOrderView = {
  readonly code: string;
  readonly status: OrderStatus;
  readonly items: readonly { readonly name: string; readonly quantity: number }[];
  readonly total: number;
  readonly createdAt: Date;
  readonly deliveredAt: Date | null;
};
