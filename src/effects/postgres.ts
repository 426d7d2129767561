/**
 * POSTGRESQL EFFECTS IMPLEMENTATION
 *
 * NUMERIC columns come back from pg as strings and are parsed here; the
 * JSONB item snapshot and the settings documents are decoded with codecs, and
 * a row that does not decode is an infrastructure failure (thrown).
 * Settings updates and settlements lock their row for the whole
 * read-modify-write.
 */

import {Either, Left, Right} from 'purify-ts';
import {Pool, PoolClient} from 'pg';
import type {
  CustomerMessage,
  DiscountPolicy,
  FeeSchedule,
  MessageKind,
  Order,
  Product,
  Review,
  Role,
  TreasuryEntry,
} from '../domain';
import type {NewCustomerMessage, NewOrder, NewReview, NewTreasuryEntry, OrderChange} from '../pure/types';
import type {
  FeedbackRepository,
  OrderRepository,
  PricingService,
  ProductRepository,
  RoleRepository,
  TreasuryRepository,
} from '../pure/effects';
import {andThen, insufficientStock, orderNotFound, OrderError, productNotFound} from '../pure/errors';
import {DiscountPolicyCodec, FeeScheduleCodec, SnapshotItemsCodec} from '../pure/codecs';
import {buildFeeSchedule} from '../pure/feeSchedule';
import {validateDiscountPolicy} from '../pure/businessLogic';
import {isOrderStatus} from '../pure/orderLifecycle';
import {parseRole} from '../pure/roles';

// ============================================================================
// Row Mapping
// ============================================================================

type ProductRow = {
  id: number;
  name: string;
  price: string;
  stock: number;
  active: boolean;
};

type OrderRow = {
  id: number;
  code: string;
  customer_id: string;
  items: unknown;
  subtotal: string;
  discount: string;
  delivery_fee: string;
  total: string;
  address: string;
  city: string;
  distance_km: string;
  status: string;
  courier_id: string | null;
  created_at: Date;
  delivered_at: Date | null;
};

type TreasuryRow = {
  id: number;
  order_id: number;
  kind: string;
  amount: string;
  created_at: Date;
};

const PRODUCT_COLUMNS = 'id, name, price, stock, active';

const ORDER_COLUMNS = `id, code, customer_id, items, subtotal, discount, delivery_fee, total,
  address, city, distance_km, status, courier_id, created_at, delivered_at`;

const TREASURY_COLUMNS = 'id, order_id, kind, amount, created_at';

function toProduct(row: ProductRow): Product {
  return {
    id: row.id,
    name: row.name,
    price: parseFloat(row.price),
    stock: row.stock,
    active: row.active,
  };
}

function toOrder(row: OrderRow): Order {
  const items = SnapshotItemsCodec.decode(row.items).caseOf({
    Left: err => {
      throw new Error(`Order ${row.code} has a malformed item snapshot: ${err}`);
    },
    Right: decoded => decoded,
  });
  const status = row.status;
  if (!isOrderStatus(status)) {
    throw new Error(`Order ${row.code} has unknown status "${status}"`);
  }

  return {
    id: row.id,
    code: row.code,
    customerId: row.customer_id,
    items,
    subtotal: parseFloat(row.subtotal),
    discount: parseFloat(row.discount),
    deliveryFee: parseFloat(row.delivery_fee),
    total: parseFloat(row.total),
    address: row.address,
    city: row.city,
    distanceKm: parseFloat(row.distance_km),
    status,
    courierId: row.courier_id,
    createdAt: row.created_at,
    deliveredAt: row.delivered_at,
  };
}

function toTreasuryEntry(row: TreasuryRow): TreasuryEntry {
  const kind = row.kind;
  if (kind !== 'sale' && kind !== 'refund' && kind !== 'adjustment') {
    throw new Error(`Treasury entry ${row.id} has unknown kind "${kind}"`);
  }
  return {
    id: row.id,
    orderId: row.order_id,
    kind,
    amount: parseFloat(row.amount),
    createdAt: row.created_at,
  };
}

async function insertTreasuryEntry(client: PoolClient, entry: NewTreasuryEntry): Promise<TreasuryEntry> {
  const result = await client.query<TreasuryRow>(
    `INSERT INTO treasury_entries (order_id, kind, amount, created_at)
     VALUES ($1, $2, $3, $4) RETURNING ${TREASURY_COLUMNS}`,
    [entry.orderId, entry.kind, entry.amount, entry.createdAt]
  );
  return toTreasuryEntry(result.rows[0]);
}

// ============================================================================
// PostgreSQL Product Repository
// ============================================================================

export class PostgresProductRepository implements ProductRepository {
  constructor(private pool: Pool) {}

  async getById(id: number): Promise<Product | null> {
    const result = await this.pool.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = $1`,
      [id]
    );
    return result.rows.length === 0 ? null : toProduct(result.rows[0]);
  }

  async getByIds(ids: readonly number[]): Promise<Map<number, Product>> {
    const products = new Map<number, Product>();
    if (ids.length === 0) {
      return products;
    }

    const result = await this.pool.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = ANY($1)`,
      [ids]
    );
    for (const row of result.rows) {
      products.set(row.id, toProduct(row));
    }
    return products;
  }

  async listActive(): Promise<Product[]> {
    return this.list(true);
  }

  async listInactive(): Promise<Product[]> {
    return this.list(false);
  }

  async create(name: string, price: number, stock: number): Promise<Product> {
    const inserted = await this.pool.query<ProductRow>(
      `INSERT INTO products (name, price, stock) VALUES ($1, $2, $3)
       ON CONFLICT (name) DO NOTHING RETURNING ${PRODUCT_COLUMNS}`,
      [name, price, stock]
    );
    if (inserted.rows.length > 0) {
      return toProduct(inserted.rows[0]);
    }

    const existing = await this.pool.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE name = $1`,
      [name]
    );
    return toProduct(existing.rows[0]);
  }

  async setPrice(id: number, price: number): Promise<Product | null> {
    return this.update('price = $2', id, price);
  }

  async setStock(id: number, stock: number): Promise<Product | null> {
    return this.update('stock = $2', id, stock);
  }

  async setActive(id: number, active: boolean): Promise<Product | null> {
    return this.update('active = $2', id, active);
  }

  private async list(active: boolean): Promise<Product[]> {
    const result = await this.pool.query<ProductRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE active = $1 ORDER BY id`,
      [active]
    );
    return result.rows.map(toProduct);
  }

  private async update(assignment: string, id: number, value: number | boolean): Promise<Product | null> {
    const result = await this.pool.query<ProductRow>(
      `UPDATE products SET ${assignment} WHERE id = $1 RETURNING ${PRODUCT_COLUMNS}`,
      [id, value]
    );
    return result.rows.length === 0 ? null : toProduct(result.rows[0]);
  }
}

// ============================================================================
// PostgreSQL Order Repository
// ============================================================================

export class PostgresOrderRepository implements OrderRepository {
  constructor(private pool: Pool) {}

  async getByCode(code: string): Promise<Order | null> {
    const result = await this.pool.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM orders WHERE code = $1`,
      [code]
    );
    return result.rows.length === 0 ? null : toOrder(result.rows[0]);
  }

  async getById(id: number): Promise<Order | null> {
    const result = await this.pool.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1`,
      [id]
    );
    return result.rows.length === 0 ? null : toOrder(result.rows[0]);
  }

  async codeExists(code: string): Promise<boolean> {
    const result = await this.pool.query('SELECT 1 FROM orders WHERE code = $1', [code]);
    return result.rows.length > 0;
  }

  async insert(order: NewOrder): Promise<Order | null> {
    const result = await this.pool.query<OrderRow>(
      `INSERT INTO orders (code, customer_id, items, subtotal, discount, delivery_fee, total,
                           address, city, distance_km, status, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, 'pending', $11)
       ON CONFLICT (code) DO NOTHING
       RETURNING ${ORDER_COLUMNS}`,
      [
        order.code,
        order.customerId,
        JSON.stringify(order.items),
        order.subtotal,
        order.discount,
        order.deliveryFee,
        order.total,
        order.address,
        order.city,
        order.distanceKm,
        order.createdAt,
      ]
    );
    return result.rows.length === 0 ? null : toOrder(result.rows[0]);
  }

  async applyChange(
    code: string,
    decide: (order: Order) => Either<OrderError, OrderChange>
  ): Promise<Either<OrderError, Order>> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      const found = await client.query<OrderRow>(
        `SELECT ${ORDER_COLUMNS} FROM orders WHERE code = $1 FOR UPDATE`,
        [code]
      );
      if (found.rows.length === 0) {
        await client.query('ROLLBACK');
        return Left(orderNotFound(code));
      }

      const orderId = found.rows[0].id;
      const applied = await andThen(decide(toOrder(found.rows[0])), change => this.apply(client, orderId, change));

      await client.query(applied.isRight() ? 'COMMIT' : 'ROLLBACK');
      return applied;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private async apply(client: PoolClient, orderId: number, change: OrderChange): Promise<Either<OrderError, Order>> {
    // debits arrive in ascending product id order
    for (const debit of change.stockDebits) {
      const debited = await client.query(
        'UPDATE products SET stock = stock - $1 WHERE id = $2 AND stock >= $1 RETURNING id',
        [debit.quantity, debit.productId]
      );
      if (debited.rows.length === 0) {
        const shelf = await client.query<{ name: string; stock: number }>(
          'SELECT name, stock FROM products WHERE id = $1',
          [debit.productId]
        );
        return Left(shelf.rows.length === 0
          ? productNotFound(debit.productId)
          : insufficientStock(shelf.rows[0].name, shelf.rows[0].stock));
      }
    }

    const updated = await client.query<OrderRow>(
      `UPDATE orders SET status = $1, courier_id = $2, delivered_at = $3
       WHERE id = $4 RETURNING ${ORDER_COLUMNS}`,
      [change.status, change.courierId, change.deliveredAt, orderId]
    );

    if (change.ledgerEntry) {
      await insertTreasuryEntry(client, { ...change.ledgerEntry, orderId });
    }
    return Right(toOrder(updated.rows[0]));
  }

  async listCreatedSince(since: Date): Promise<Order[]> {
    const result = await this.pool.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM orders WHERE created_at >= $1 ORDER BY id`,
      [since]
    );
    return result.rows.map(toOrder);
  }

  async listOpen(): Promise<Order[]> {
    const result = await this.pool.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM orders
       WHERE status IN ('pending', 'assigned', 'out_for_delivery') ORDER BY id DESC`
    );
    return result.rows.map(toOrder);
  }

  async countDelivered(customerId: string): Promise<number> {
    const result = await this.pool.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM orders WHERE customer_id = $1 AND status = 'delivered'`,
      [customerId]
    );
    return parseInt(result.rows[0].count, 10);
  }
}

// ============================================================================
// PostgreSQL Treasury Repository
// ============================================================================

export class PostgresTreasuryRepository implements TreasuryRepository {
  constructor(private pool: Pool) {}

  async record(entry: NewTreasuryEntry): Promise<TreasuryEntry> {
    const client = await this.pool.connect();
    try {
      return await insertTreasuryEntry(client, entry);
    } finally {
      client.release();
    }
  }

  async listForOrder(orderId: number): Promise<TreasuryEntry[]> {
    const result = await this.pool.query<TreasuryRow>(
      `SELECT ${TREASURY_COLUMNS} FROM treasury_entries WHERE order_id = $1 ORDER BY id`,
      [orderId]
    );
    return result.rows.map(toTreasuryEntry);
  }

  async listSince(since: Date): Promise<TreasuryEntry[]> {
    const result = await this.pool.query<TreasuryRow>(
      `SELECT ${TREASURY_COLUMNS} FROM treasury_entries WHERE created_at >= $1 ORDER BY id`,
      [since]
    );
    return result.rows.map(toTreasuryEntry);
  }
}

// ============================================================================
// PostgreSQL Settings (fee schedule, discount policy)
// ============================================================================

const FEE_SCHEDULE_KEY = 'fee_schedule';
const DISCOUNT_POLICY_KEY = 'discount_policy';

const UPSERT_SETTING = `INSERT INTO settings (key, value) VALUES ($1, $2)
  ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value`;

export class PostgresPricingService implements PricingService {
  constructor(
    private pool: Pool,
    private defaults: { readonly feeSchedule: FeeSchedule; readonly discountPolicy: DiscountPolicy }
  ) {}

  async getFeeSchedule(): Promise<FeeSchedule> {
    return this.decodeFeeSchedule(await this.read(FEE_SCHEDULE_KEY));
  }

  async updateFeeSchedule(
    update: (current: FeeSchedule) => Either<OrderError, FeeSchedule>
  ): Promise<Either<OrderError, FeeSchedule>> {
    return this.update(FEE_SCHEDULE_KEY, stored => update(this.decodeFeeSchedule(stored)));
  }

  async getDiscountPolicy(): Promise<DiscountPolicy> {
    return this.decodeDiscountPolicy(await this.read(DISCOUNT_POLICY_KEY));
  }

  async replaceDiscountPolicy(policy: DiscountPolicy): Promise<void> {
    await this.pool.query(UPSERT_SETTING, [DISCOUNT_POLICY_KEY, JSON.stringify(policy)]);
  }

  async updateDiscountPolicy(
    update: (current: DiscountPolicy) => Either<OrderError, DiscountPolicy>
  ): Promise<Either<OrderError, DiscountPolicy>> {
    return this.update(DISCOUNT_POLICY_KEY, stored => update(this.decodeDiscountPolicy(stored)));
  }

  private decodeFeeSchedule(stored: unknown): FeeSchedule {
    if (stored === null) {
      return this.defaults.feeSchedule;
    }
    return FeeScheduleCodec.decode(stored)
      .mapLeft(err => `undecodable document: ${err}`)
      .chain(doc => buildFeeSchedule(doc.tiers, doc.freeZone, doc.perKmAboveMax)
        .mapLeft(err => JSON.stringify(err)))
      .caseOf({
        Left: err => {
          throw new Error(`Stored fee schedule is invalid, ${err}`);
        },
        Right: schedule => schedule,
      });
  }

  private decodeDiscountPolicy(stored: unknown): DiscountPolicy {
    if (stored === null) {
      return this.defaults.discountPolicy;
    }
    return DiscountPolicyCodec.decode(stored)
      .mapLeft(err => `undecodable document: ${err}`)
      .chain(doc => validateDiscountPolicy(doc).mapLeft(err => JSON.stringify(err)))
      .caseOf({
        Left: err => {
          throw new Error(`Stored discount policy is invalid, ${err}`);
        },
        Right: policy => policy,
      });
  }

  /**
   * Read-modify-write under a row lock. A document that was never written
   * gets a placeholder row first, so there is always a row to lock.
   */
  private async update<T extends FeeSchedule | DiscountPolicy>(
    key: string,
    next: (stored: unknown) => Either<OrderError, T>
  ): Promise<Either<OrderError, T>> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(
        `INSERT INTO settings (key, value) VALUES ($1, 'null'::jsonb) ON CONFLICT (key) DO NOTHING`,
        [key]
      );
      const locked = await client.query<{ value: unknown }>(
        'SELECT value FROM settings WHERE key = $1 FOR UPDATE',
        [key]
      );
      const result = next(locked.rows[0].value);
      if (result.isRight()) {
        await client.query(UPSERT_SETTING, [key, JSON.stringify(result.extract())]);
      }
      await client.query(result.isRight() ? 'COMMIT' : 'ROLLBACK');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private async read(key: string): Promise<unknown> {
    const result = await this.pool.query<{ value: unknown }>(
      'SELECT value FROM settings WHERE key = $1',
      [key]
    );
    return result.rows.length === 0 ? null : result.rows[0].value;
  }
}

// ============================================================================
// PostgreSQL Feedback Repository (reviews, support, courier applications)
// ============================================================================

type ReviewRow = {
  id: number;
  user_id: string;
  rating: number;
  text: string;
  created_at: Date;
};

type MessageRow = {
  id: number;
  user_id: string;
  text: string;
  created_at: Date;
};

const MESSAGE_TABLES: Record<MessageKind, string> = {
  support: 'support_messages',
  courier_application: 'courier_applications',
};

function toReview(row: ReviewRow): Review {
  return { id: row.id, userId: row.user_id, rating: row.rating, text: row.text, createdAt: row.created_at };
}

function toMessage(kind: MessageKind, row: MessageRow): CustomerMessage {
  return { id: row.id, kind, userId: row.user_id, text: row.text, createdAt: row.created_at };
}

export class PostgresFeedbackRepository implements FeedbackRepository {
  constructor(private pool: Pool) {}

  async addReview(review: NewReview): Promise<Review> {
    const result = await this.pool.query<ReviewRow>(
      `INSERT INTO reviews (user_id, rating, text, created_at) VALUES ($1, $2, $3, $4)
       RETURNING id, user_id, rating, text, created_at`,
      [review.userId, review.rating, review.text, review.createdAt]
    );
    return toReview(result.rows[0]);
  }

  async listReviews(): Promise<Review[]> {
    const result = await this.pool.query<ReviewRow>(
      'SELECT id, user_id, rating, text, created_at FROM reviews ORDER BY id DESC'
    );
    return result.rows.map(toReview);
  }

  async addMessage(message: NewCustomerMessage): Promise<CustomerMessage> {
    const result = await this.pool.query<MessageRow>(
      `INSERT INTO ${MESSAGE_TABLES[message.kind]} (user_id, text, created_at) VALUES ($1, $2, $3)
       RETURNING id, user_id, text, created_at`,
      [message.userId, message.text, message.createdAt]
    );
    return toMessage(message.kind, result.rows[0]);
  }

  async listMessages(kind: MessageKind): Promise<CustomerMessage[]> {
    const result = await this.pool.query<MessageRow>(
      `SELECT id, user_id, text, created_at FROM ${MESSAGE_TABLES[kind]} ORDER BY id DESC`
    );
    return result.rows.map(row => toMessage(kind, row));
  }
}

// ============================================================================
// PostgreSQL Role Repository
// ============================================================================

export class PostgresRoleRepository implements RoleRepository {
  constructor(private pool: Pool, readonly ownerId: string | null) {}

  async getRole(userId: string): Promise<Role | null> {
    const result = await this.pool.query<{ role: string }>(
      'SELECT role FROM user_roles WHERE user_id = $1',
      [userId]
    );
    if (result.rows.length === 0) {
      return null;
    }
    return parseRole(result.rows[0].role).caseOf({
      Left: () => {
        throw new Error(`User ${userId} has unknown role "${result.rows[0].role}"`);
      },
      Right: role => role,
    });
  }

  async setRole(userId: string, role: Role): Promise<void> {
    await this.pool.query(
      `INSERT INTO user_roles (user_id, role) VALUES ($1, $2)
       ON CONFLICT (user_id) DO UPDATE SET role = EXCLUDED.role`,
      [userId, role]
    );
  }
}
