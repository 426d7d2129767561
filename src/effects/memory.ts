/**
 * IN-MEMORY EFFECTS IMPLEMENTATION
 *
 * Carts and checkout sessions always live here: they are per-process state
 * and are lost on restart. With STORE_DRIVER=memory, and in the tests, the
 * catalog, orders, treasury, settings, roles and feedback live here too.
 *
 * Every mutation runs synchronously between two awaits, so each one is
 * atomic with respect to every other caller on the event loop. Stored
 * objects never leave this module; callers get copies.
 */

import {Either, Left, Right} from 'purify-ts';
import type {
  CartLine,
  CustomerMessage,
  DiscountPolicy,
  FeeSchedule,
  MessageKind,
  Order,
  OrderStatus,
  Product,
  Review,
  Role,
  TreasuryEntry,
} from '../domain';
import type {
  CheckoutSession,
  NewCustomerMessage,
  NewOrder,
  NewReview,
  NewTreasuryEntry,
  OrderChange,
} from '../pure/types';
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
import {insufficientStock, orderNotFound, OrderError, productNotFound} from '../pure/errors';
import {buildFeeSchedule, DEFAULT_FEE_TIERS} from '../pure/feeSchedule';
import {LoggingDispatchService} from './dispatch';
import {LoggingMonitoringService} from './monitoring';

export const DEFAULT_FREE_ZONE = 'Millau';

export const DEFAULT_DISCOUNT_POLICY: DiscountPolicy = {
  globalDiscount: { active: true, amount: 10 },
  promo: { code: 'TRESORERIE10', amount: 10 },
  loyalty: { enabled: false, everyNthOrder: 10, amount: 10 },
};

export function defaultFeeSchedule(freeZone: string = DEFAULT_FREE_ZONE): FeeSchedule {
  return buildFeeSchedule(DEFAULT_FEE_TIERS, freeZone).caseOf({
    Left: () => {
      throw new Error(`Invalid default free zone "${freeZone}"`);
    },
    Right: schedule => schedule,
  });
}

// ============================================================================
// Shared State
// ============================================================================

/**
 * The rows of the in-memory store. Order settlement touches products, orders
 * and treasury in one synchronous step, so the repositories share this state.
 */
export class MemoryState {
  readonly products = new Map<number, Product>();
  readonly orders = new Map<number, Order>();
  readonly treasury: TreasuryEntry[] = [];
  private productSeq = 0;
  private orderSeq = 0;
  private treasurySeq = 0;

  nextProductId(): number {
    return ++this.productSeq;
  }

  nextOrderId(): number {
    return ++this.orderSeq;
  }

  nextTreasuryId(): number {
    return ++this.treasurySeq;
  }

  findOrder(code: string): Order | undefined {
    for (const order of this.orders.values()) {
      if (order.code === code) return order;
    }
    return undefined;
  }

  appendTreasury(entry: NewTreasuryEntry): TreasuryEntry {
    const stored: TreasuryEntry = { id: this.nextTreasuryId(), ...entry };
    this.treasury.push(stored);
    return stored;
  }
}

const OPEN_STATUSES: readonly OrderStatus[] = ['pending', 'assigned', 'out_for_delivery'];

function copyOrder(order: Order): Order {
  return { ...order, items: order.items.map(item => ({ ...item })) };
}

// ============================================================================
// Catalog
// ============================================================================

export class InMemoryProductRepository implements ProductRepository {
  constructor(private state: MemoryState) {}

  async getById(id: number): Promise<Product | null> {
    const product = this.state.products.get(id);
    return product ? { ...product } : null;
  }

  async getByIds(ids: readonly number[]): Promise<Map<number, Product>> {
    const found = new Map<number, Product>();
    for (const id of ids) {
      const product = this.state.products.get(id);
      if (product) found.set(id, { ...product });
    }
    return found;
  }

  async listActive(): Promise<Product[]> {
    return this.list(true);
  }

  async listInactive(): Promise<Product[]> {
    return this.list(false);
  }

  async create(name: string, price: number, stock: number): Promise<Product> {
    for (const existing of this.state.products.values()) {
      if (existing.name === name) return { ...existing };
    }
    const product: Product = { id: this.state.nextProductId(), name, price, stock, active: true };
    this.state.products.set(product.id, product);
    return { ...product };
  }

  async setPrice(id: number, price: number): Promise<Product | null> {
    return this.update(id, product => ({ ...product, price }));
  }

  async setStock(id: number, stock: number): Promise<Product | null> {
    return this.update(id, product => ({ ...product, stock }));
  }

  async setActive(id: number, active: boolean): Promise<Product | null> {
    return this.update(id, product => ({ ...product, active }));
  }

  private list(active: boolean): Product[] {
    return [...this.state.products.values()]
      .filter(product => product.active === active)
      .sort((a, b) => a.id - b.id)
      .map(product => ({ ...product }));
  }

  private update(id: number, change: (product: Product) => Product): Product | null {
    const product = this.state.products.get(id);
    if (!product) return null;
    const updated = change(product);
    this.state.products.set(id, updated);
    return { ...updated };
  }
}

// ============================================================================
// Orders
// ============================================================================

export class InMemoryOrderRepository implements OrderRepository {
  constructor(private state: MemoryState) {}

  async getByCode(code: string): Promise<Order | null> {
    const order = this.state.findOrder(code);
    return order ? copyOrder(order) : null;
  }

  async getById(id: number): Promise<Order | null> {
    const order = this.state.orders.get(id);
    return order ? copyOrder(order) : null;
  }

  async codeExists(code: string): Promise<boolean> {
    return this.state.findOrder(code) !== undefined;
  }

  async insert(order: NewOrder): Promise<Order | null> {
    if (this.state.findOrder(order.code)) return null;
    const stored: Order = {
      ...order,
      id: this.state.nextOrderId(),
      items: order.items.map(item => ({ ...item })),
      status: 'pending',
      courierId: null,
      deliveredAt: null,
    };
    this.state.orders.set(stored.id, stored);
    return copyOrder(stored);
  }

  async applyChange(
    code: string,
    decide: (order: Order) => Either<OrderError, OrderChange>
  ): Promise<Either<OrderError, Order>> {
    const order = this.state.findOrder(code);
    if (!order) {
      return Left(orderNotFound(code));
    }

    return decide(copyOrder(order)).chain(change => this.apply(order, change));
  }

  private apply(order: Order, change: OrderChange): Either<OrderError, Order> {
    // check every debit before touching anything
    for (const debit of change.stockDebits) {
      const product = this.state.products.get(debit.productId);
      if (!product) {
        return Left(productNotFound(debit.productId));
      }
      if (product.stock < debit.quantity) {
        return Left(insufficientStock(product.name, product.stock));
      }
    }

    for (const debit of change.stockDebits) {
      const product = this.state.products.get(debit.productId);
      if (product) {
        this.state.products.set(product.id, { ...product, stock: product.stock - debit.quantity });
      }
    }

    const updated: Order = {
      ...order,
      status: change.status,
      courierId: change.courierId,
      deliveredAt: change.deliveredAt,
    };
    this.state.orders.set(updated.id, updated);

    if (change.ledgerEntry) {
      this.state.appendTreasury({ ...change.ledgerEntry, orderId: updated.id });
    }

    return Right(copyOrder(updated));
  }

  async listCreatedSince(since: Date): Promise<Order[]> {
    return [...this.state.orders.values()]
      .filter(order => order.createdAt.getTime() >= since.getTime())
      .sort((a, b) => a.id - b.id)
      .map(copyOrder);
  }

  async listOpen(): Promise<Order[]> {
    return [...this.state.orders.values()]
      .filter(order => OPEN_STATUSES.includes(order.status))
      .sort((a, b) => b.id - a.id)
      .map(copyOrder);
  }

  async countDelivered(customerId: string): Promise<number> {
    return [...this.state.orders.values()]
      .filter(order => order.customerId === customerId && order.status === 'delivered')
      .length;
  }
}

// ============================================================================
// Treasury
// ============================================================================

export class InMemoryTreasuryRepository implements TreasuryRepository {
  constructor(private state: MemoryState) {}

  async record(entry: NewTreasuryEntry): Promise<TreasuryEntry> {
    return { ...this.state.appendTreasury(entry) };
  }

  async listForOrder(orderId: number): Promise<TreasuryEntry[]> {
    return this.state.treasury
      .filter(entry => entry.orderId === orderId)
      .map(entry => ({ ...entry }));
  }

  async listSince(since: Date): Promise<TreasuryEntry[]> {
    return this.state.treasury
      .filter(entry => entry.createdAt.getTime() >= since.getTime())
      .map(entry => ({ ...entry }));
  }
}

// ============================================================================
// Settings & Roles
// ============================================================================

export class InMemoryPricingService implements PricingService {
  constructor(
    private schedule: FeeSchedule,
    private policy: DiscountPolicy = DEFAULT_DISCOUNT_POLICY
  ) {}

  async getFeeSchedule(): Promise<FeeSchedule> {
    return this.schedule;
  }

  async updateFeeSchedule(
    update: (current: FeeSchedule) => Either<OrderError, FeeSchedule>
  ): Promise<Either<OrderError, FeeSchedule>> {
    const next = update(this.schedule);
    next.ifRight(schedule => {
      this.schedule = schedule;
    });
    return next;
  }

  async getDiscountPolicy(): Promise<DiscountPolicy> {
    return this.policy;
  }

  async replaceDiscountPolicy(policy: DiscountPolicy): Promise<void> {
    this.policy = policy;
  }

  async updateDiscountPolicy(
    update: (current: DiscountPolicy) => Either<OrderError, DiscountPolicy>
  ): Promise<Either<OrderError, DiscountPolicy>> {
    const next = update(this.policy);
    next.ifRight(policy => {
      this.policy = policy;
    });
    return next;
  }
}

export class InMemoryFeedbackRepository implements FeedbackRepository {
  private reviews: Review[] = [];
  private messages: CustomerMessage[] = [];

  async addReview(review: NewReview): Promise<Review> {
    const stored: Review = { id: this.reviews.length + 1, ...review };
    this.reviews.push(stored);
    return { ...stored };
  }

  async listReviews(): Promise<Review[]> {
    return [...this.reviews].reverse().map(review => ({ ...review }));
  }

  async addMessage(message: NewCustomerMessage): Promise<CustomerMessage> {
    const stored: CustomerMessage = { id: this.messages.length + 1, ...message };
    this.messages.push(stored);
    return { ...stored };
  }

  async listMessages(kind: MessageKind): Promise<CustomerMessage[]> {
    return this.messages
      .filter(message => message.kind === kind)
      .reverse()
      .map(message => ({ ...message }));
  }
}

export class InMemoryRoleRepository implements RoleRepository {
  private roles = new Map<string, Role>();

  constructor(readonly ownerId: string | null) {}

  async getRole(userId: string): Promise<Role | null> {
    return this.roles.get(userId) ?? null;
  }

  async setRole(userId: string, role: Role): Promise<void> {
    this.roles.set(userId, role);
  }
}

// ============================================================================
// Conversation State (always in memory)
// ============================================================================

export class InMemoryCartStore implements CartStore {
  private carts = new Map<string, Map<number, number>>();

  async add(customerId: string, productId: number, quantity: number): Promise<void> {
    const cart = this.carts.get(customerId) ?? new Map<number, number>();
    cart.set(productId, (cart.get(productId) ?? 0) + quantity);
    this.carts.set(customerId, cart);
  }

  async lines(customerId: string): Promise<CartLine[]> {
    const cart = this.carts.get(customerId);
    if (!cart) return [];
    return [...cart.entries()].map(([productId, quantity]) => ({ customerId, productId, quantity }));
  }

  async remove(customerId: string, lines: readonly CartLine[]): Promise<void> {
    const cart = this.carts.get(customerId);
    if (!cart) return;
    for (const line of lines) {
      const left = (cart.get(line.productId) ?? 0) - line.quantity;
      if (left > 0) {
        cart.set(line.productId, left);
      } else {
        cart.delete(line.productId);
      }
    }
    if (cart.size === 0) this.carts.delete(customerId);
  }

  async clear(customerId: string): Promise<void> {
    this.carts.delete(customerId);
  }
}

export class InMemoryCheckoutSessionStore implements CheckoutSessionStore {
  private sessions = new Map<string, CheckoutSession>();

  async get(customerId: string): Promise<CheckoutSession | null> {
    return this.sessions.get(customerId) ?? null;
  }

  async begin(customerId: string, session: CheckoutSession): Promise<void> {
    this.sessions.set(customerId, session);
  }

  async replace(customerId: string, expected: CheckoutSession, next: CheckoutSession): Promise<boolean> {
    if (this.sessions.get(customerId) !== expected) return false;
    this.sessions.set(customerId, next);
    return true;
  }

  async finish(customerId: string, expected: CheckoutSession): Promise<boolean> {
    if (this.sessions.get(customerId) !== expected) return false;
    this.sessions.delete(customerId);
    return true;
  }
}

// ============================================================================
// Factory
// ============================================================================

export class SystemEnvironment implements ShopEnvironment {
  readonly orderCodePrefix: string;

  constructor(orderCodePrefix: string) {
    this.orderCodePrefix = orderCodePrefix.trim().toUpperCase();
  }

  now(): Date {
    return new Date();
  }

  random(): number {
    return Math.random();
  }
}

export type InMemoryEffectsOptions = {
  readonly feeSchedule?: FeeSchedule;
  readonly discountPolicy?: DiscountPolicy;
  readonly ownerId?: string | null;
  readonly dispatch?: DispatchService;
  readonly monitoring?: MonitoringService;
  readonly env?: ShopEnvironment;
};

export type InMemoryEffects = AppEffects & { readonly state: MemoryState };

export function createInMemoryEffects(options: InMemoryEffectsOptions = {}): InMemoryEffects {
  const state = new MemoryState();
  return {
    state,
    products: new InMemoryProductRepository(state),
    orders: new InMemoryOrderRepository(state),
    treasury: new InMemoryTreasuryRepository(state),
    pricing: new InMemoryPricingService(
      options.feeSchedule ?? defaultFeeSchedule(),
      options.discountPolicy ?? DEFAULT_DISCOUNT_POLICY
    ),
    roles: new InMemoryRoleRepository(options.ownerId ?? null),
    feedback: new InMemoryFeedbackRepository(),
    carts: new InMemoryCartStore(),
    checkouts: new InMemoryCheckoutSessionStore(),
    dispatch: options.dispatch ?? new LoggingDispatchService(),
    monitoring: options.monitoring ?? new LoggingMonitoringService(),
    env: options.env ?? new SystemEnvironment('CMD'),
  };
}
