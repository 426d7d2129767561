import {loadConfigFromEnv} from '../effects/config';
import {defaultsFromConfig, EffectsFactory} from '../effects/EffectsFactory';
import {LoggingDispatchService} from '../effects/dispatch';
import {SystemEnvironment} from '../effects/memory';
import {describeAlert, LoggingMonitoringService} from '../effects/monitoring';
import {getFeeSchedule, roleOf} from '../pure/admin';

describe('loadConfigFromEnv', () => {
  it('falls back to local defaults', () => {
    const config = loadConfigFromEnv({});

    expect(config.store).toBe('postgres');
    expect(config.dispatch).toBe('log');
    expect(config.monitoring).toBe('log');
    expect(config.database).toEqual({
      host: 'localhost',
      port: 5432,
      user: 'appuser',
      password: 'apppassword',
      database: 'shopdb',
    });
    expect(config.aws.alertTopicArn).toBe('arn:aws:sns:us-east-1:000000000000:order-alerts');
    expect(config.shop).toEqual({
      ownerId: null,
      orderCodePrefix: 'CMD',
      freeZone: 'Millau',
      globalDiscount: 10,
      globalDiscountActive: true,
      promoCode: 'TRESORERIE10',
      promoAmount: 10,
      seedDemoCatalog: true,
    });
    expect(config.apiPort).toBe(3000);
  });

  it('reads overrides', () => {
    const config = loadConfigFromEnv({
      STORE_DRIVER: 'memory',
      DISPATCH_DRIVER: 'webhook',
      OWNER_ID: 'owner-1',
      FREE_ZONE: 'Rodez',
      GLOBAL_DISCOUNT_ACTIVE: 'false',
      PROMO_CODE: 'ete5',
      PROMO_AMOUNT: '5',
      PORT: '8080',
    });

    expect(config.store).toBe('memory');
    expect(config.dispatch).toBe('webhook');
    expect(config.shop.ownerId).toBe('owner-1');
    expect(config.shop.freeZone).toBe('Rodez');
    expect(config.shop.globalDiscountActive).toBe(false);
    expect(config.shop.promoCode).toBe('ETE5');
    expect(config.shop.promoAmount).toBe(5);
    expect(config.apiPort).toBe(8080);
  });

  it('upper-cases the order code prefix', () => {
    expect(loadConfigFromEnv({ ORDER_CODE_PREFIX: ' cmd ' }).shop.orderCodePrefix).toBe('CMD');
  });

  it('rejects an order code prefix that lookups could never match', () => {
    expect(() => loadConfigFromEnv({ ORDER_CODE_PREFIX: 'c-md' }))
      .toThrow('ORDER_CODE_PREFIX must be letters and digits only, got "c-md"');
  });

  it('turns demo seeding off', () => {
    expect(loadConfigFromEnv({ SEED_DEMO_CATALOG: 'false' }).shop.seedDemoCatalog).toBe(false);
  });

  it('turns the promo off with an empty code', () => {
    expect(loadConfigFromEnv({ PROMO_CODE: '' }).shop.promoCode).toBeNull();
  });

  it('rejects unknown drivers and non-numeric amounts', () => {
    expect(() => loadConfigFromEnv({ STORE_DRIVER: 'mongo' }))
      .toThrow('Unsupported value "mongo", expected one of postgres, memory');
    expect(() => loadConfigFromEnv({ GLOBAL_DISCOUNT: 'ten' })).toThrow('Expected a number, got "ten"');
  });
});

describe('defaultsFromConfig', () => {
  it('builds the starting schedule and policy', () => {
    const { feeSchedule, discountPolicy } = defaultsFromConfig(loadConfigFromEnv({ PROMO_CODE: '' }).shop);

    expect(feeSchedule.freeZone).toBe('Millau');
    expect(feeSchedule.tiers.map(t => t.fee)).toEqual([20, 30, 50]);
    expect(discountPolicy.promo).toBeNull();
    expect(discountPolicy.loyalty.enabled).toBe(false);
  });

  it('refuses a negative discount', () => {
    expect(() => defaultsFromConfig(loadConfigFromEnv({ GLOBAL_DISCOUNT: '-5' }).shop)).toThrow();
  });
});

describe('EffectsFactory', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('wires the in-memory store from configuration', async () => {
    const effects = await EffectsFactory.make(loadConfigFromEnv({
      STORE_DRIVER: 'memory',
      OWNER_ID: 'owner-1',
      FREE_ZONE: 'Rodez',
    }));

    expect(await roleOf('owner-1')(effects)).toBe('admin');
    expect((await getFeeSchedule()(effects)).freeZone).toBe('Rodez');
    expect(effects.dispatch).toBeInstanceOf(LoggingDispatchService);
    expect(effects.monitoring).toBeInstanceOf(LoggingMonitoringService);
    await effects.close();
  });

  it('needs initialize() before the PostgreSQL repositories', () => {
    const effects = new EffectsFactory(loadConfigFromEnv({}));

    expect(() => effects.products).toThrow('Database pool not initialized. Call initialize() first.');
  });
});

describe('SystemEnvironment', () => {
  it('issues codes under an upper-case prefix', () => {
    const env = new SystemEnvironment('cmd');

    expect(env.orderCodePrefix).toBe('CMD');
  });
});

describe('describeAlert', () => {
  it('spells out each alert', () => {
    expect(describeAlert({ type: 'stock_reconciliation', orderCode: 'CMD-AB12CD', productName: 'Savon', available: 1 }))
      .toBe('Stock reconciliation needed: Savon has 1 left (order: CMD-AB12CD)');
    expect(describeAlert({ type: 'dispatch_failed', orderCode: 'CMD-AB12CD', reason: 'timeout' }))
      .toBe('Dispatch failed for order CMD-AB12CD: timeout');
  });
});
