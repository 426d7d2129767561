/**
 * Test wiring: the real in-memory store, with jest doubles for the two
 * outbound services and a clock the test controls.
 */

import type {DiscountPolicy, Order} from '../domain';
import type {DispatchNotice, MonitoringAlert} from '../types';
import type {ShopEnvironment} from '../pure/effects';
import type {NewOrder} from '../pure/types';
import {createInMemoryEffects, InMemoryEffects, InMemoryEffectsOptions} from '../effects/memory';

export const NOW = new Date('2026-03-31T12:00:00Z');

export const NO_DISCOUNTS: DiscountPolicy = {
  globalDiscount: { active: false, amount: 10 },
  promo: { code: 'TRESORERIE10', amount: 10 },
  loyalty: { enabled: false, everyNthOrder: 10, amount: 10 },
};

export class TestEnvironment implements ShopEnvironment {
  readonly orderCodePrefix = 'CMD';
  current: Date = NOW;
  nextRandom: () => number = () => Math.random();

  now(): Date {
    return this.current;
  }

  random(): number {
    return this.nextRandom();
  }
}

export type TestEffects = InMemoryEffects & {
  readonly env: TestEnvironment;
  readonly dispatch: { notifyNewOrder: jest.Mock<Promise<void>, [DispatchNotice]> };
  readonly monitoring: { sendAlerts: jest.Mock<Promise<void>, [MonitoringAlert[]]> };
};

export function createTestEffects(options: InMemoryEffectsOptions = {}): TestEffects {
  const env = new TestEnvironment();
  const dispatch = { notifyNewOrder: jest.fn<Promise<void>, [DispatchNotice]>().mockResolvedValue(undefined) };
  const monitoring = { sendAlerts: jest.fn<Promise<void>, [MonitoringAlert[]]>().mockResolvedValue(undefined) };
  const effects = createInMemoryEffects({ discountPolicy: NO_DISCOUNTS, ...options, dispatch, monitoring, env });
  return { ...effects, env, dispatch, monitoring };
}

export function newOrder(overrides: Partial<NewOrder> = {}): NewOrder {
  return {
    code: 'CMD-TEST01',
    customerId: 'cust-1',
    items: [{ productId: 1, name: 'Savon', unitPrice: 2.5, quantity: 2 }],
    subtotal: 5,
    discount: 0,
    deliveryFee: 20,
    total: 25,
    address: '3 rue Haute',
    city: 'Rodez',
    distanceKm: 12.5,
    createdAt: NOW,
    ...overrides,
  };
}

export async function insertOrder(effects: TestEffects, overrides: Partial<NewOrder> = {}): Promise<Order> {
  const order = await effects.orders.insert(newOrder(overrides));
  if (!order) {
    throw new Error(`Order code ${overrides.code ?? 'CMD-TEST01'} already taken`);
  }
  return order;
}
