/**
 * EFFECTS LAYER
 *
 * The abstractions the coordinators depend on. They sit at the level of the
 * business ("apply this order change atomically") rather than the storage
 * ("execute arbitrary SQL"), so a test implements them with plain objects.
 */

import type {Either} from 'purify-ts';
import type {
  CartLine,
  CustomerMessage,
  DiscountPolicy,
  FeeSchedule,
  Order,
  MessageKind,
  Product,
  Review,
  Role,
  TreasuryEntry,
} from '../domain';
import type {DispatchNotice, MonitoringAlert} from '../types';
import type {
  CheckoutSession,
  NewCustomerMessage,
  NewOrder,
  NewReview,
  NewTreasuryEntry,
  OrderChange,
} from './types';
import type {OrderError} from './errors';

// ============================================================================
// Effect Interfaces
// ============================================================================

export interface ProductRepository {
  getById(id: number): Promise<Product | null>;
  getByIds(ids: readonly number[]): Promise<Map<number, Product>>;
  listActive(): Promise<Product[]>;
  listInactive(): Promise<Product[]>;
  /** Inserts unless the name exists; either way returns the stored product. */
  create(name: string, price: number, stock: number): Promise<Product>;
  setPrice(id: number, price: number): Promise<Product | null>;
  setStock(id: number, stock: number): Promise<Product | null>;
  setActive(id: number, active: boolean): Promise<Product | null>;
}

export interface OrderRepository {
  getByCode(code: string): Promise<Order | null>;
  getById(id: number): Promise<Order | null>;
  codeExists(code: string): Promise<boolean>;
  /** Resolves to null when the code is already taken. */
  insert(order: NewOrder): Promise<Order | null>;
  /**
   * Locks the order, asks decide for a change and applies it, stock debits
   * and ledger entry included, as one atomic unit. Nothing is written when
   * decide or any stock debit fails.
   */
  applyChange(
    code: string,
    decide: (order: Order) => Either<OrderError, OrderChange>
  ): Promise<Either<OrderError, Order>>;
  listCreatedSince(since: Date): Promise<Order[]>;
  /** Pending, assigned or out for delivery, newest first. */
  listOpen(): Promise<Order[]>;
  countDelivered(customerId: string): Promise<number>;
}

export interface TreasuryRepository {
  record(entry: NewTreasuryEntry): Promise<TreasuryEntry>;
  listForOrder(orderId: number): Promise<TreasuryEntry[]>;
  listSince(since: Date): Promise<TreasuryEntry[]>;
}

/**
 * The update methods read, transform and write the document as one unit, so
 * two concurrent edits cannot lose each other. Nothing is written on a Left.
 */
export interface PricingService {
  getFeeSchedule(): Promise<FeeSchedule>;
  updateFeeSchedule(
    update: (current: FeeSchedule) => Either<OrderError, FeeSchedule>
  ): Promise<Either<OrderError, FeeSchedule>>;
  getDiscountPolicy(): Promise<DiscountPolicy>;
  replaceDiscountPolicy(policy: DiscountPolicy): Promise<void>;
  updateDiscountPolicy(
    update: (current: DiscountPolicy) => Either<OrderError, DiscountPolicy>
  ): Promise<Either<OrderError, DiscountPolicy>>;
}

export interface FeedbackRepository {
  addReview(review: NewReview): Promise<Review>;
  /** Newest first. */
  listReviews(): Promise<Review[]>;
  addMessage(message: NewCustomerMessage): Promise<CustomerMessage>;
  /** Newest first. */
  listMessages(kind: MessageKind): Promise<CustomerMessage[]>;
}

export interface RoleRepository {
  readonly ownerId: string | null;
  getRole(userId: string): Promise<Role | null>;
  setRole(userId: string, role: Role): Promise<void>;
}

export interface CartStore {
  add(customerId: string, productId: number, quantity: number): Promise<void>;
  lines(customerId: string): Promise<CartLine[]>;
  /** Subtracts the given quantities, dropping lines that reach zero. */
  remove(customerId: string, lines: readonly CartLine[]): Promise<void>;
  clear(customerId: string): Promise<void>;
}

export interface CheckoutSessionStore {
  get(customerId: string): Promise<CheckoutSession | null>;
  /** Starts over, discarding whatever was in progress. */
  begin(customerId: string, session: CheckoutSession): Promise<void>;
  /** Compare-and-set: false when the stored session is no longer `expected`. */
  replace(customerId: string, expected: CheckoutSession, next: CheckoutSession): Promise<boolean>;
  /** Compare-and-delete, with the same contract as replace. */
  finish(customerId: string, expected: CheckoutSession): Promise<boolean>;
}

export interface DispatchService {
  notifyNewOrder(notice: DispatchNotice): Promise<void>;
}

export interface MonitoringService {
  sendAlerts(alerts: MonitoringAlert[]): Promise<void>;
}

export interface ShopEnvironment {
  readonly orderCodePrefix: string;
  now(): Date;
  random(): number;
}

// ============================================================================
// Combined Dependencies
// ============================================================================

export type AppEffects = {
  readonly products: ProductRepository;
  readonly orders: OrderRepository;
  readonly treasury: TreasuryRepository;
  readonly pricing: PricingService;
  readonly roles: RoleRepository;
  readonly feedback: FeedbackRepository;
  readonly carts: CartStore;
  readonly checkouts: CheckoutSessionStore;
  readonly dispatch: DispatchService;
  readonly monitoring: MonitoringService;
  readonly env: ShopEnvironment;
}
