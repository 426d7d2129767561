// Domain types shared across the application

export type Product = {
  readonly id: number;
  readonly name: string;
  readonly price: number;
  readonly stock: number;
  readonly active: boolean;
};

export type CartLine = {
  readonly customerId: string;
  readonly productId: number;
  readonly quantity: number;
};

export type FeeTier = {
  readonly maxDistanceKm: number;
  readonly fee: number;
};

export type FeeSchedule = {
  readonly tiers: readonly FeeTier[];
  readonly freeZone: string;
  // Reserved for future tiering, never applied to a fee
  readonly perKmAboveMax: number;
};

export type DiscountPolicy = {
  readonly globalDiscount: {
    readonly active: boolean;
    readonly amount: number;
  };
  readonly promo: {
    readonly code: string;
    readonly amount: number;
  } | null;
  readonly loyalty: {
    readonly enabled: boolean;
    readonly everyNthOrder: number;
    readonly amount: number;
  };
};

export type OrderStatus = 'pending' | 'assigned' | 'out_for_delivery' | 'delivered' | 'cancelled';

export type SnapshotLineItem = {
  readonly productId: number;
  readonly name: string;
  readonly unitPrice: number;
  readonly quantity: number;
};

export type Order = {
  readonly id: number;
  readonly code: string;
  readonly customerId: string;
  readonly items: readonly SnapshotLineItem[];
  readonly subtotal: number;
  readonly discount: number;
  readonly deliveryFee: number;
  readonly total: number;
  readonly address: string;
  readonly city: string;
  readonly distanceKm: number;
  readonly status: OrderStatus;
  readonly courierId: string | null;
  readonly createdAt: Date;
  readonly deliveredAt: Date | null;
};

export type TreasuryEntryKind = 'sale' | 'refund' | 'adjustment';

export type TreasuryEntry = {
  readonly id: number;
  readonly orderId: number;
  readonly kind: TreasuryEntryKind;
  readonly amount: number;
  readonly createdAt: Date;
};

export type Review = {
  readonly id: number;
  readonly userId: string;
  readonly rating: number;
  readonly text: string;
  readonly createdAt: Date;
};

// Free-text messages left by customers: a support request or a courier job application
export type MessageKind = 'support' | 'courier_application';

export type CustomerMessage = {
  readonly id: number;
  readonly kind: MessageKind;
  readonly userId: string;
  readonly text: string;
  readonly createdAt: Date;
};

export type Role = 'customer' | 'staff' | 'admin';

export type Capability =
  | 'manage_catalog'
  | 'export_report'
  | 'confirm_delivery'
  | 'set_fees'
  | 'set_discounts'
  | 'assign_courier'
  | 'cancel_order'
  | 'set_role'
  | 'record_treasury'
  | 'read_feedback';

export type ReportRow = {
  readonly orderId: number;
  readonly code: string;
  readonly status: OrderStatus;
  readonly total: number;
  readonly discount: number;
  readonly deliveryFee: number;
  readonly createdAt: Date;
  readonly deliveredAt: Date | null;
};
