import {createProduct} from '../pure/catalog';
import {confirmDelivered} from '../pure/orderProcessing';
import {revenueOver, summarizeRevenue, summaryOver, windowStart} from '../pure/reporting';
import {listTreasuryEntries, recordTreasuryEntry} from '../pure/treasury';
import {createTestEffects, insertOrder, NOW, TestEffects} from './testEffects';

const DAY_MS = 24 * 60 * 60 * 1000;

function daysAgo(days: number): Date {
  return new Date(NOW.getTime() - days * DAY_MS);
}

async function seedOrders(effects: TestEffects): Promise<void> {
  await createProduct('Savon', 2.5, 5)(effects);
  await insertOrder(effects, { code: 'CMD-OLD001', createdAt: daysAgo(40) });
  await insertOrder(effects, { code: 'CMD-MID002', createdAt: daysAgo(10), discount: 1, total: 24 });
  await insertOrder(effects, { code: 'CMD-NEW003', createdAt: daysAgo(1) });
}

describe('windowStart', () => {
  it('goes back a whole number of days', () => {
    expect(windowStart(NOW, 30).extract()).toEqual(daysAgo(30));
  });

  it.each([0, -3, 1.5])('rejects a window of %d days', days => {
    expect(windowStart(NOW, days).extract()).toEqual({
      code: 'INVALID_INPUT',
      field: 'windowDays',
      reason: 'must be a whole number of one or more',
    });
  });
});

describe('summaryOver', () => {
  it('lists orders created inside the window, oldest first', async () => {
    const effects = createTestEffects();
    await seedOrders(effects);

    const rows = (await summaryOver(30)(effects)).unsafeCoerce();

    expect(rows).toEqual([
      {
        orderId: 2,
        code: 'CMD-MID002',
        status: 'pending',
        total: 24,
        discount: 1,
        deliveryFee: 20,
        createdAt: daysAgo(10),
        deliveredAt: null,
      },
      {
        orderId: 3,
        code: 'CMD-NEW003',
        status: 'pending',
        total: 25,
        discount: 0,
        deliveryFee: 20,
        createdAt: daysAgo(1),
        deliveredAt: null,
      },
    ]);
  });

  it('defaults to thirty days', async () => {
    const effects = createTestEffects();
    await seedOrders(effects);

    const rows = (await summaryOver()(effects)).unsafeCoerce();

    expect(rows.map(row => row.code)).toEqual(['CMD-MID002', 'CMD-NEW003']);
  });

  it('shows settlement in the row', async () => {
    const effects = createTestEffects();
    await seedOrders(effects);
    await confirmDelivered('CMD-NEW003')(effects);

    const rows = (await summaryOver(7)(effects)).unsafeCoerce();

    expect(rows).toHaveLength(1);
    expect(rows[0].status).toBe('delivered');
    expect(rows[0].deliveredAt).toEqual(NOW);
  });

  it('rejects an invalid window', async () => {
    const effects = createTestEffects();

    expect((await summaryOver(0)(effects)).isLeft()).toBe(true);
  });
});

describe('revenueOver', () => {
  it('counts settled revenue from sale entries only', async () => {
    const effects = createTestEffects();
    await seedOrders(effects);
    await confirmDelivered('CMD-NEW003')(effects);
    await recordTreasuryEntry(2, 'refund', -5)(effects);

    const summary = (await revenueOver(30)(effects)).unsafeCoerce();

    expect(summary).toEqual({
      orderCount: 2,
      deliveredCount: 1,
      grossTotal: 49,
      settledRevenue: 25,
    });
  });

  it('summarizes an empty period', () => {
    expect(summarizeRevenue([], [])).toEqual({
      orderCount: 0,
      deliveredCount: 0,
      grossTotal: 0,
      settledRevenue: 0,
    });
  });
});

describe('treasury ledger', () => {
  it('appends refunds and adjustments', async () => {
    const effects = createTestEffects();
    await seedOrders(effects);

    const refund = await recordTreasuryEntry(2, ' Refund ', -7.5)(effects);
    await recordTreasuryEntry(2, 'adjustment', 1.25)(effects);

    expect(refund.extract()).toEqual({ id: 1, orderId: 2, kind: 'refund', amount: -7.5, createdAt: NOW });
    expect((await listTreasuryEntries(2)(effects)).map(entry => entry.kind)).toEqual(['refund', 'adjustment']);
  });

  it('leaves sale entries to settlement', async () => {
    const effects = createTestEffects();
    await seedOrders(effects);

    expect((await recordTreasuryEntry(2, 'sale', 25)(effects)).extract()).toEqual({
      code: 'INVALID_INPUT',
      field: 'kind',
      reason: 'sale entries are written by settlement only',
    });
    expect(await listTreasuryEntries(2)(effects)).toEqual([]);
  });

  it('rejects unknown kinds, bad amounts and unknown orders', async () => {
    const effects = createTestEffects();
    await seedOrders(effects);

    expect((await recordTreasuryEntry(2, 'bonus', 5)(effects)).extract()).toMatchObject({ field: 'kind' });
    expect((await recordTreasuryEntry(2, 'refund', Number.NaN)(effects)).extract()).toMatchObject({ field: 'amount' });
    expect((await recordTreasuryEntry(999, 'refund', 5)(effects)).extract())
      .toEqual({ code: 'ORDER_NOT_FOUND', orderCode: '#999' });
  });
});
