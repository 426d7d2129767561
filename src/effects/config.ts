import type {
  DispatchDriver,
  MonitoringDriver,
  ProductionConfig,
  StoreDriver,
} from './types';

function oneOf<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  const found = allowed.find(option => option === value);
  if (value !== undefined && value !== '' && !found) {
    throw new Error(`Unsupported value "${value}", expected one of ${allowed.join(', ')}`);
  }
  return found ?? fallback;
}

function number(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Expected a number, got "${value}"`);
  }
  return parsed;
}

function orderCodePrefix(value: string | undefined): string {
  const prefix = (value || 'CMD').trim().toUpperCase();
  if (!/^[A-Z0-9]+$/.test(prefix)) {
    throw new Error(`ORDER_CODE_PREFIX must be letters and digits only, got "${value}"`);
  }
  return prefix;
}

// Load configuration from environment variables
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ProductionConfig {
  const region = env.AWS_DEFAULT_REGION || 'us-east-1';
  return {
    store: oneOf<StoreDriver>(env.STORE_DRIVER, ['postgres', 'memory'], 'postgres'),
    database: {
      host: env.DATABASE_HOST || 'localhost',
      port: parseInt(env.DATABASE_PORT || '5432', 10),
      user: env.DATABASE_USER || 'appuser',
      password: env.DATABASE_PASSWORD || 'apppassword',
      database: env.DATABASE_NAME || 'shopdb',
    },
    dispatch: oneOf<DispatchDriver>(env.DISPATCH_DRIVER, ['webhook', 'email', 'log'], 'log'),
    webhook: {
      url: env.DISPATCH_WEBHOOK_URL || 'http://localhost:8081/dispatch',
      timeoutMs: parseInt(env.DISPATCH_WEBHOOK_TIMEOUT_MS || '5000', 10),
    },
    email: {
      host: env.SMTP_HOST || 'localhost',
      port: parseInt(env.SMTP_PORT || '1025', 10),
      from: env.DISPATCH_EMAIL_FROM || '"Order Desk" <noreply@example.com>',
      dispatchTo: env.DISPATCH_EMAIL_TO || 'couriers@example.com',
    },
    monitoring: oneOf<MonitoringDriver>(env.MONITORING_DRIVER, ['aws', 'log'], 'log'),
    aws: {
      region,
      accessKeyId: env.AWS_ACCESS_KEY_ID || 'test',
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY || 'test',
      endpoint: env.AWS_ENDPOINT_MONITORING || 'http://localhost:4566',
      alertTopicArn: env.ALERT_TOPIC_ARN || `arn:aws:sns:${region}:000000000000:order-alerts`,
    },
    shop: {
      ownerId: env.OWNER_ID || null,
      orderCodePrefix: orderCodePrefix(env.ORDER_CODE_PREFIX),
      freeZone: env.FREE_ZONE || 'Millau',
      globalDiscount: number(env.GLOBAL_DISCOUNT, 10),
      globalDiscountActive: env.GLOBAL_DISCOUNT_ACTIVE !== 'false',
      promoCode: env.PROMO_CODE === '' ? null : (env.PROMO_CODE || 'TRESORERIE10').toUpperCase(),
      promoAmount: number(env.PROMO_AMOUNT, 10),
      seedDemoCatalog: env.SEED_DEMO_CATALOG !== 'false',
    },
    apiPort: parseInt(env.PORT || '3000', 10),
  };
}
