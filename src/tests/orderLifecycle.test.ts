import type {Order, OrderStatus} from '../domain';
import {
  canTransition,
  decideAssignment,
  decideCancellation,
  decideOutForDelivery,
  decideSettlement,
  isOrderStatus,
  isTerminal,
  planStockDebits,
} from '../pure/orderLifecycle';

function order(status: OrderStatus, overrides: Partial<Order> = {}): Order {
  return {
    id: 1,
    code: 'CMD-AB12CD',
    customerId: 'cust-1',
    items: [
      { productId: 3, name: 'Sel', unitPrice: 1, quantity: 1 },
      { productId: 1, name: 'Savon', unitPrice: 2.5, quantity: 2 },
      { productId: 3, name: 'Sel', unitPrice: 1, quantity: 4 },
    ],
    subtotal: 10,
    discount: 0,
    deliveryFee: 20,
    total: 30,
    address: '3 rue Haute',
    city: 'Rodez',
    distanceKm: 12.5,
    status,
    courierId: null,
    createdAt: new Date('2026-03-01T10:00:00Z'),
    deliveredAt: null,
    ...overrides,
  };
}

describe('order status machine', () => {
  it('allows the delivery path', () => {
    expect(canTransition('pending', 'assigned')).toBe(true);
    expect(canTransition('assigned', 'out_for_delivery')).toBe(true);
    expect(canTransition('out_for_delivery', 'delivered')).toBe(true);
    expect(canTransition('pending', 'delivered')).toBe(true);
  });

  it('refuses to skip backwards', () => {
    expect(canTransition('out_for_delivery', 'assigned')).toBe(false);
    expect(canTransition('pending', 'out_for_delivery')).toBe(false);
  });

  it('ends at delivered or cancelled', () => {
    expect(isTerminal('delivered')).toBe(true);
    expect(isTerminal('cancelled')).toBe(true);
    expect(isTerminal('assigned')).toBe(false);
  });

  it('recognizes stored status strings', () => {
    expect(isOrderStatus('out_for_delivery')).toBe(true);
    expect(isOrderStatus('shipped')).toBe(false);
  });
});

describe('planStockDebits', () => {
  it('merges lines per product in ascending product id', () => {
    expect(planStockDebits(order('pending'))).toEqual([
      { productId: 1, quantity: 2 },
      { productId: 3, quantity: 5 },
    ]);
  });
});

describe('deciders', () => {
  const deliveredAt = new Date('2026-03-02T18:00:00Z');

  it('assigns and reassigns a courier', () => {
    expect(decideAssignment(order('pending'), 'courier-7').unsafeCoerce()).toEqual({
      status: 'assigned',
      courierId: 'courier-7',
      deliveredAt: null,
      stockDebits: [],
      ledgerEntry: null,
    });
    expect(decideAssignment(order('assigned', { courierId: 'courier-7' }), 'courier-8').unsafeCoerce().courierId)
      .toBe('courier-8');
  });

  it('sends an assigned order out for delivery', () => {
    const change = decideOutForDelivery(order('assigned', { courierId: 'courier-7' })).unsafeCoerce();

    expect(change.status).toBe('out_for_delivery');
    expect(change.courierId).toBe('courier-7');
  });

  it('refuses to send out an order nobody was assigned', () => {
    expect(decideOutForDelivery(order('pending')).extract()).toEqual({
      code: 'INVALID_TRANSITION',
      orderCode: 'CMD-AB12CD',
      from: 'pending',
      to: 'out_for_delivery',
    });
  });

  it('settles with stock debits and one sale entry for the total', () => {
    expect(decideSettlement(order('out_for_delivery'), deliveredAt).unsafeCoerce()).toEqual({
      status: 'delivered',
      courierId: null,
      deliveredAt,
      stockDebits: [
        { productId: 1, quantity: 2 },
        { productId: 3, quantity: 5 },
      ],
      ledgerEntry: { kind: 'sale', amount: 30, createdAt: deliveredAt },
    });
  });

  it('refuses to settle twice', () => {
    expect(decideSettlement(order('delivered', { deliveredAt }), deliveredAt).extract()).toEqual({
      code: 'ORDER_ALREADY_SETTLED',
      orderCode: 'CMD-AB12CD',
    });
  });

  it('cancels without touching stock or treasury', () => {
    const change = decideCancellation(order('assigned')).unsafeCoerce();

    expect(change.status).toBe('cancelled');
    expect(change.stockDebits).toEqual([]);
    expect(change.ledgerEntry).toBeNull();
  });

  it('keeps cancelled orders closed', () => {
    const cancelled = { code: 'ORDER_CANCELLED', orderCode: 'CMD-AB12CD' };

    expect(decideCancellation(order('cancelled')).extract()).toEqual(cancelled);
    expect(decideAssignment(order('cancelled'), 'courier-7').extract()).toEqual(cancelled);
    expect(decideSettlement(order('cancelled'), deliveredAt).extract()).toEqual(cancelled);
  });

  it('cannot cancel a delivered order', () => {
    expect(decideCancellation(order('delivered')).extract()).toEqual({
      code: 'ORDER_ALREADY_SETTLED',
      orderCode: 'CMD-AB12CD',
    });
  });
});
