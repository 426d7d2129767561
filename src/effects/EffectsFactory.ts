/**
 * PRODUCTION EFFECTS WIRING
 *
 * Connects the effect interfaces to real services, picked by configuration:
 * - PostgreSQL (or the in-memory store) for catalog, orders, treasury, settings and roles
 * - process memory for carts and checkout sessions
 * - an axios webhook, a nodemailer SMTP server or the console for courier dispatch
 * - LocalStack CloudWatch/SNS or the console for monitoring alerts
 */

import {promises as fs} from 'fs';
import path from 'path';
import {Pool} from 'pg';
import type {DiscountPolicy, FeeSchedule} from '../domain';
import type {
  AppEffects,
  CartStore,
  CheckoutSessionStore,
  DispatchService,
  FeedbackRepository,
  MonitoringService,
  OrderRepository,
  PricingService,
  ProductRepository,
  RoleRepository,
  ShopEnvironment,
  TreasuryRepository,
} from '../pure/effects';
import type {ProductionConfig, ShopConfig} from './types';
import {loadConfigFromEnv} from './config';
import {buildFeeSchedule, DEFAULT_FEE_TIERS} from '../pure/feeSchedule';
import {validateDiscountPolicy} from '../pure/businessLogic';
import {
  InMemoryCartStore,
  InMemoryCheckoutSessionStore,
  InMemoryFeedbackRepository,
  InMemoryOrderRepository,
  InMemoryPricingService,
  InMemoryProductRepository,
  InMemoryRoleRepository,
  InMemoryTreasuryRepository,
  MemoryState,
  SystemEnvironment,
} from './memory';
import {
  PostgresFeedbackRepository,
  PostgresOrderRepository,
  PostgresPricingService,
  PostgresProductRepository,
  PostgresRoleRepository,
  PostgresTreasuryRepository,
} from './postgres';
import {EmailDispatchService, LoggingDispatchService, WebhookDispatchService} from './dispatch';
import {CloudWatchMonitoringService, LoggingMonitoringService} from './monitoring';

const SCHEMA_PATH = path.resolve(__dirname, '../../db/schema.sql');

export function defaultsFromConfig(shop: ShopConfig): { feeSchedule: FeeSchedule; discountPolicy: DiscountPolicy } {
  const discountPolicy = validateDiscountPolicy({
    globalDiscount: { active: shop.globalDiscountActive, amount: shop.globalDiscount },
    promo: shop.promoCode === null ? null : { code: shop.promoCode, amount: shop.promoAmount },
    loyalty: { enabled: false, everyNthOrder: 10, amount: 10 },
  });

  return buildFeeSchedule(DEFAULT_FEE_TIERS, shop.freeZone)
    .chain(feeSchedule => discountPolicy.map(policy => ({ feeSchedule, discountPolicy: policy })))
    .caseOf({
      Left: () => {
        throw new Error('Invalid shop configuration: check FREE_ZONE and the discount settings');
      },
      Right: defaults => defaults,
    });
}

export class EffectsFactory implements AppEffects {
  private _pool?: Pool;
  private _memory?: MemoryState;
  private _productRepository?: ProductRepository;
  private _orderRepository?: OrderRepository;
  private _treasuryRepository?: TreasuryRepository;
  private _pricingService?: PricingService;
  private _roleRepository?: RoleRepository;
  private _feedbackRepository?: FeedbackRepository;
  private _dispatchService?: DispatchService;
  private _monitoringService?: MonitoringService;

  readonly carts: CartStore = new InMemoryCartStore();
  readonly checkouts: CheckoutSessionStore = new InMemoryCheckoutSessionStore();
  readonly env: ShopEnvironment;

  constructor(private config: ProductionConfig) {
    this.env = new SystemEnvironment(config.shop.orderCodePrefix);
  }

  private requirePool(): Pool {
    // Synchronous access requires pool to be already initialized
    if (!this._pool) {
      throw new Error('Database pool not initialized. Call initialize() first.');
    }
    return this._pool;
  }

  private memory(): MemoryState {
    if (!this._memory) {
      this._memory = new MemoryState();
    }
    return this._memory;
  }

  private usesPostgres(): boolean {
    return this.config.store === 'postgres';
  }

  private async getPool(): Promise<Pool> {
    if (!this._pool) {
      this._pool = new Pool({
        host: this.config.database.host,
        port: this.config.database.port,
        user: this.config.database.user,
        password: this.config.database.password,
        database: this.config.database.database,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
      });

      try {
        const schema = await fs.readFile(SCHEMA_PATH, 'utf8');
        await this._pool.query(schema);
        console.log('✅ Connected to PostgreSQL, schema applied');
      } catch (error) {
        console.error('❌ Failed to prepare PostgreSQL:', error);
        throw error;
      }
    }
    return this._pool;
  }

  get products(): ProductRepository {
    if (!this._productRepository) {
      this._productRepository = this.usesPostgres()
        ? new PostgresProductRepository(this.requirePool())
        : new InMemoryProductRepository(this.memory());
    }
    return this._productRepository;
  }

  get orders(): OrderRepository {
    if (!this._orderRepository) {
      this._orderRepository = this.usesPostgres()
        ? new PostgresOrderRepository(this.requirePool())
        : new InMemoryOrderRepository(this.memory());
    }
    return this._orderRepository;
  }

  get treasury(): TreasuryRepository {
    if (!this._treasuryRepository) {
      this._treasuryRepository = this.usesPostgres()
        ? new PostgresTreasuryRepository(this.requirePool())
        : new InMemoryTreasuryRepository(this.memory());
    }
    return this._treasuryRepository;
  }

  get pricing(): PricingService {
    if (!this._pricingService) {
      const defaults = defaultsFromConfig(this.config.shop);
      this._pricingService = this.usesPostgres()
        ? new PostgresPricingService(this.requirePool(), defaults)
        : new InMemoryPricingService(defaults.feeSchedule, defaults.discountPolicy);
    }
    return this._pricingService;
  }

  get roles(): RoleRepository {
    if (!this._roleRepository) {
      this._roleRepository = this.usesPostgres()
        ? new PostgresRoleRepository(this.requirePool(), this.config.shop.ownerId)
        : new InMemoryRoleRepository(this.config.shop.ownerId);
    }
    return this._roleRepository;
  }

  get feedback(): FeedbackRepository {
    if (!this._feedbackRepository) {
      this._feedbackRepository = this.usesPostgres()
        ? new PostgresFeedbackRepository(this.requirePool())
        : new InMemoryFeedbackRepository();
    }
    return this._feedbackRepository;
  }

  get dispatch(): DispatchService {
    if (!this._dispatchService) {
      this._dispatchService = this.buildDispatch();
    }
    return this._dispatchService;
  }

  private buildDispatch(): DispatchService {
    switch (this.config.dispatch) {
      case 'webhook':
        return new WebhookDispatchService(this.config.webhook);
      case 'email':
        return new EmailDispatchService(this.config.email);
      case 'log':
        return new LoggingDispatchService();
    }
  }

  get monitoring(): MonitoringService {
    if (!this._monitoringService) {
      this._monitoringService = this.config.monitoring === 'aws'
        ? new CloudWatchMonitoringService(this.config.aws)
        : new LoggingMonitoringService();
    }
    return this._monitoringService;
  }

  /**
   * Open the database connection and apply the schema (PostgreSQL store only).
   * Must be called before using the effects
   */
  async initialize(): Promise<void> {
    if (this.usesPostgres()) {
      await this.getPool();
    }
    console.log(`✅ Effects initialized (store: ${this.config.store}, dispatch: ${this.config.dispatch})`);
  }

  async close(): Promise<void> {
    if (this._pool) {
      await this._pool.end();
      this._pool = undefined;
    }
  }

  /**
   * Static factory method to create and initialize production effects
   */
  static async make(config?: ProductionConfig): Promise<EffectsFactory> {
    const cfg = config || loadConfigFromEnv();
    const effects = new EffectsFactory(cfg);
    await effects.initialize();
    return effects;
  }
}

