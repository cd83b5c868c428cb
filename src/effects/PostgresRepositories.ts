/**
 * POSTGRESQL REPOSITORIES
 *
 * Every repository is bound to the client of one open transaction, handed out
 * by PostgresUnitOfWork. Enum columns are TEXT and are narrowed with the
 * guards of the pure layer when rows are mapped.
 */
import type {
  CartLine,
  Customization,
  LoyaltyAccount,
  LoyaltyTransaction,
  NewCartLine,
  NewLoyaltyTransaction,
  Order,
  OrderLine,
  OrderOverview,
  OrderStatusChange,
  PaymentStatus,
  Product,
  SizeAdjustment,
  Topping,
  Voucher,
  VoucherRedemption,
  VoucherUsage,
} from '../domain';
import type {
  CartRepository,
  CatalogRepository,
  LoyaltyRepository,
  OrderRepository,
  Repositories,
  VoucherRepository,
} from '../pure/effects';
import type {OrderDraft, OrderLineDraft, StatusUpdate} from '../pure/types';
import {cartLineIdentityKey, isTemperature, normalizeToppingIds} from '../pure/cart';
import {isLoyaltyTransactionKind, isMembershipTier} from '../pure/loyalty';
import {isOrderType, isPaymentMethod} from '../pure/orderBuilding';
import {isOrderStatus, isPaymentStatus} from '../pure/orderLifecycle';
import {isCupSize} from '../pure/pricing';
import {isDiscountKind} from '../pure/vouchers';
import type {PoolClient} from 'pg';

function narrow<T extends string>(value: string, guard: (candidate: string) => candidate is T, column: string): T {
  if (!guard(value)) {
    throw new Error(`Unexpected value '${value}' in column ${column}`);
  }
  return value;
}

const lockClause = (forUpdate: boolean): string => (forUpdate ? ' FOR UPDATE' : '');

// ============================================================================
// Cart
// ============================================================================

type CartLineRow = {
  id: number;
  user_id: number;
  product_id: number;
  size: string;
  quantity: number;
  sugar_level: number;
  ice_level: number;
  temperature: string;
  topping_ids: number[];
  created_at: Date;
};

const CART_COLUMNS =
  'id, user_id, product_id, size, quantity, sugar_level, ice_level, temperature, topping_ids, created_at';

function toCartLine(row: CartLineRow): CartLine {
  return {
    id: row.id,
    userId: row.user_id,
    productId: row.product_id,
    size: narrow(row.size, isCupSize, 'cart_lines.size'),
    quantity: row.quantity,
    sugarLevel: row.sugar_level,
    iceLevel: row.ice_level,
    temperature: narrow(row.temperature, isTemperature, 'cart_lines.temperature'),
    toppingIds: row.topping_ids,
    createdAt: row.created_at,
  };
}

class PostgresCartRepository implements CartRepository {
  constructor(private client: PoolClient) {}

  async listForUser(userId: number): Promise<CartLine[]> {
    const result = await this.client.query<CartLineRow>(
      `SELECT ${CART_COLUMNS} FROM cart_lines WHERE user_id = $1 ORDER BY created_at DESC, id DESC`,
      [userId]
    );
    return result.rows.map(toCartLine);
  }

  async lockForUser(userId: number): Promise<CartLine[]> {
    const result = await this.client.query<CartLineRow>(
      `SELECT ${CART_COLUMNS} FROM cart_lines WHERE user_id = $1 ORDER BY created_at DESC, id DESC FOR UPDATE`,
      [userId]
    );
    return result.rows.map(toCartLine);
  }

  async findOwned(lineId: number, userId: number): Promise<CartLine | null> {
    const result = await this.client.query<CartLineRow>(
      `SELECT ${CART_COLUMNS} FROM cart_lines WHERE id = $1 AND user_id = $2`,
      [lineId, userId]
    );
    return result.rows.length === 0 ? null : toCartLine(result.rows[0]);
  }

  async findByIdentity(userId: number, productId: number, customization: Customization): Promise<CartLine | null> {
    const result = await this.client.query<CartLineRow>(
      `SELECT ${CART_COLUMNS} FROM cart_lines WHERE user_id = $1 AND identity_key = $2`,
      [userId, cartLineIdentityKey(productId, customization)]
    );
    return result.rows.length === 0 ? null : toCartLine(result.rows[0]);
  }

  async addOrIncrement(line: NewCartLine): Promise<CartLine> {
    // one statement, so concurrent adds of the same identity serialise on the unique index
    const result = await this.client.query<CartLineRow>(
      `INSERT INTO cart_lines
         (user_id, product_id, size, quantity, sugar_level, ice_level, temperature, topping_ids, identity_key)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       ON CONFLICT (user_id, identity_key)
       DO UPDATE SET quantity = cart_lines.quantity + EXCLUDED.quantity
       RETURNING ${CART_COLUMNS}`,
      [
        line.userId,
        line.productId,
        line.size,
        line.quantity,
        line.sugarLevel,
        line.iceLevel,
        line.temperature,
        normalizeToppingIds(line.toppingIds),
        cartLineIdentityKey(line.productId, line),
      ]
    );
    return toCartLine(result.rows[0]);
  }

  async updateQuantity(lineId: number, userId: number, quantity: number): Promise<CartLine | null> {
    const result = await this.client.query<CartLineRow>(
      `UPDATE cart_lines SET quantity = $3 WHERE id = $1 AND user_id = $2 RETURNING ${CART_COLUMNS}`,
      [lineId, userId, quantity]
    );
    return result.rows.length === 0 ? null : toCartLine(result.rows[0]);
  }

  async updateLine(
    lineId: number,
    userId: number,
    customization: Customization,
    quantity: number
  ): Promise<CartLine | null> {
    const current = await this.findOwned(lineId, userId);
    if (!current) return null;

    const result = await this.client.query<CartLineRow>(
      `UPDATE cart_lines
          SET size = $3, sugar_level = $4, ice_level = $5, temperature = $6,
              topping_ids = $7, identity_key = $8, quantity = $9
        WHERE id = $1 AND user_id = $2
        RETURNING ${CART_COLUMNS}`,
      [
        lineId,
        userId,
        customization.size,
        customization.sugarLevel,
        customization.iceLevel,
        customization.temperature,
        normalizeToppingIds(customization.toppingIds),
        cartLineIdentityKey(current.productId, customization),
        quantity,
      ]
    );
    return result.rows.length === 0 ? null : toCartLine(result.rows[0]);
  }

  async remove(lineId: number, userId: number): Promise<boolean> {
    const result = await this.client.query('DELETE FROM cart_lines WHERE id = $1 AND user_id = $2', [lineId, userId]);
    return (result.rowCount ?? 0) > 0;
  }

  async clear(userId: number): Promise<number> {
    const result = await this.client.query('DELETE FROM cart_lines WHERE user_id = $1', [userId]);
    return result.rowCount ?? 0;
  }

  async removeLines(userId: number, lineIds: readonly number[]): Promise<number> {
    if (lineIds.length === 0) return 0;
    const result = await this.client.query(
      'DELETE FROM cart_lines WHERE user_id = $1 AND id = ANY($2::int[])',
      [userId, [...lineIds]]
    );
    return result.rowCount ?? 0;
  }

  async countItems(userId: number): Promise<number> {
    const result = await this.client.query<{ total: number }>(
      'SELECT COALESCE(SUM(quantity), 0)::int AS total FROM cart_lines WHERE user_id = $1',
      [userId]
    );
    return result.rows[0].total;
  }
}

// ============================================================================
// Catalog
// ============================================================================

type ProductRow = { id: number; name: string; base_price: number; is_available: boolean };
type SizeRow = { product_id: number; size: string; price_adjustment: number };
type ToppingRow = { id: number; name: string; price: number; is_available: boolean };

class PostgresCatalogRepository implements CatalogRepository {
  constructor(private client: PoolClient) {}

  async getProducts(ids: readonly number[]): Promise<Map<number, Product>> {
    if (ids.length === 0) {
      return new Map();
    }

    const [products, sizes] = await Promise.all([
      this.client.query<ProductRow>(
        'SELECT id, name, base_price, is_available FROM products WHERE id = ANY($1::int[])',
        [ids]
      ),
      this.client.query<SizeRow>(
        'SELECT product_id, size, price_adjustment FROM product_sizes WHERE product_id = ANY($1::int[])',
        [ids]
      ),
    ]);

    const sizesByProduct = new Map<number, SizeAdjustment[]>();
    for (const row of sizes.rows) {
      const entry: SizeAdjustment = {
        size: narrow(row.size, isCupSize, 'product_sizes.size'),
        priceAdjustment: row.price_adjustment,
      };
      sizesByProduct.set(row.product_id, [...(sizesByProduct.get(row.product_id) ?? []), entry]);
    }

    return new Map(products.rows.map(row => [row.id, {
      id: row.id,
      name: row.name,
      basePrice: row.base_price,
      isAvailable: row.is_available,
      sizes: sizesByProduct.get(row.id) ?? [],
    }]));
  }

  async getToppings(ids: readonly number[]): Promise<Map<number, Topping>> {
    if (ids.length === 0) {
      return new Map();
    }

    const result = await this.client.query<ToppingRow>(
      'SELECT id, name, price, is_available FROM toppings WHERE id = ANY($1::int[])',
      [ids]
    );
    return new Map(result.rows.map(row => [row.id, {
      id: row.id,
      name: row.name,
      price: row.price,
      isAvailable: row.is_available,
    }]));
  }
}

// ============================================================================
// Vouchers
// ============================================================================

type VoucherRow = {
  id: number;
  code: string;
  name: string;
  discount_kind: string;
  discount_value: number;
  min_order_amount: number;
  max_discount_amount: number | null;
  usage_limit: number | null;
  usage_per_user: number | null;
  current_usage: number;
  starts_at: Date | null;
  ends_at: Date | null;
  is_active: boolean;
};

type VoucherUsageRow = { user_id: number; voucher_id: number; times_used: number; last_used_at: Date | null };

const VOUCHER_COLUMNS = `id, code, name, discount_kind, discount_value, min_order_amount, max_discount_amount,
  usage_limit, usage_per_user, current_usage, starts_at, ends_at, is_active`;

function toVoucher(row: VoucherRow): Voucher {
  return {
    id: row.id,
    code: row.code,
    name: row.name,
    discountKind: narrow(row.discount_kind, isDiscountKind, 'vouchers.discount_kind'),
    discountValue: row.discount_value,
    minOrderAmount: row.min_order_amount,
    maxDiscountAmount: row.max_discount_amount,
    usageLimit: row.usage_limit,
    usagePerUser: row.usage_per_user,
    currentUsage: row.current_usage,
    startsAt: row.starts_at,
    endsAt: row.ends_at,
    isActive: row.is_active,
  };
}

function toVoucherUsage(row: VoucherUsageRow): VoucherUsage {
  return {
    userId: row.user_id,
    voucherId: row.voucher_id,
    timesUsed: row.times_used,
    lastUsedAt: row.last_used_at,
  };
}

class PostgresVoucherRepository implements VoucherRepository {
  constructor(private client: PoolClient) {}

  async findByCode(code: string, forUpdate: boolean): Promise<Voucher | null> {
    const result = await this.client.query<VoucherRow>(
      `SELECT ${VOUCHER_COLUMNS} FROM vouchers WHERE code = UPPER($1)${lockClause(forUpdate)}`,
      [code]
    );
    return result.rows.length === 0 ? null : toVoucher(result.rows[0]);
  }

  async findById(voucherId: number, forUpdate: boolean): Promise<Voucher | null> {
    const result = await this.client.query<VoucherRow>(
      `SELECT ${VOUCHER_COLUMNS} FROM vouchers WHERE id = $1${lockClause(forUpdate)}`,
      [voucherId]
    );
    return result.rows.length === 0 ? null : toVoucher(result.rows[0]);
  }

  async getUsage(userId: number, voucherId: number): Promise<VoucherUsage | null> {
    const result = await this.client.query<VoucherUsageRow>(
      'SELECT user_id, voucher_id, times_used, last_used_at FROM voucher_usage WHERE user_id = $1 AND voucher_id = $2',
      [userId, voucherId]
    );
    return result.rows.length === 0 ? null : toVoucherUsage(result.rows[0]);
  }

  async listUsageForUser(userId: number): Promise<VoucherUsage[]> {
    const result = await this.client.query<VoucherUsageRow>(
      'SELECT user_id, voucher_id, times_used, last_used_at FROM voucher_usage WHERE user_id = $1',
      [userId]
    );
    return result.rows.map(toVoucherUsage);
  }

  async listActive(now: Date): Promise<Voucher[]> {
    const result = await this.client.query<VoucherRow>(
      `SELECT ${VOUCHER_COLUMNS} FROM vouchers
        WHERE is_active
          AND (starts_at IS NULL OR starts_at <= $1)
          AND (ends_at IS NULL OR ends_at >= $1)
        ORDER BY discount_value DESC, id`,
      [now]
    );
    return result.rows.map(toVoucher);
  }

  async recordRedemption(redemption: VoucherRedemption): Promise<VoucherUsage> {
    await this.client.query(
      'UPDATE vouchers SET current_usage = current_usage + 1 WHERE id = $1',
      [redemption.voucherId]
    );

    const usage = await this.client.query<VoucherUsageRow>(
      `INSERT INTO voucher_usage (user_id, voucher_id, times_used, last_used_at)
       VALUES ($1, $2, 1, $3)
       ON CONFLICT (user_id, voucher_id)
       DO UPDATE SET times_used = voucher_usage.times_used + 1, last_used_at = EXCLUDED.last_used_at
       RETURNING user_id, voucher_id, times_used, last_used_at`,
      [redemption.userId, redemption.voucherId, redemption.redeemedAt]
    );

    await this.client.query(
      `INSERT INTO voucher_redemptions (voucher_id, user_id, order_id, discount_amount, redeemed_at)
       VALUES ($1, $2, $3, $4, $5)`,
      [redemption.voucherId, redemption.userId, redemption.orderId, redemption.discountAmount, redemption.redeemedAt]
    );

    return toVoucherUsage(usage.rows[0]);
  }
}

// ============================================================================
// Orders
// ============================================================================

type OrderRow = {
  id: number;
  user_id: number;
  order_number: string;
  order_type: string;
  store_id: number | null;
  delivery_address: string | null;
  table_number: string | null;
  notes: string | null;
  voucher_id: number | null;
  subtotal: number;
  discount_amount: number;
  delivery_fee: number;
  total: number;
  payment_method: string;
  payment_status: string;
  status: string;
  estimated_ready_time: Date;
  cancellation_reason: string | null;
  created_at: Date;
  updated_at: Date;
  completed_at: Date | null;
  cancelled_at: Date | null;
};

type OrderOverviewRow = OrderRow & { line_count: number; total_quantity: number };

type OrderLineRow = {
  id: number;
  order_id: number;
  product_id: number;
  product_name: string;
  size: string;
  quantity: number;
  unit_price: number;
  sugar_level: number;
  ice_level: number;
  temperature: string;
  topping_ids: number[];
  topping_cost: number;
  line_subtotal: number;
};

type StatusChangeRow = {
  order_id: number;
  from_status: string;
  to_status: string;
  actor_id: number;
  notes: string | null;
  changed_at: Date;
};

const ORDER_COLUMNS = `id, user_id, order_number, order_type, store_id, delivery_address, table_number, notes,
  voucher_id, subtotal, discount_amount, delivery_fee, total, payment_method, payment_status, status,
  estimated_ready_time, cancellation_reason, created_at, updated_at, completed_at, cancelled_at`;

const ORDER_LINE_COLUMNS = `id, order_id, product_id, product_name, size, quantity, unit_price, sugar_level,
  ice_level, temperature, topping_ids, topping_cost, line_subtotal`;

function toOrder(row: OrderRow): Order {
  return {
    id: row.id,
    userId: row.user_id,
    orderNumber: row.order_number,
    orderType: narrow(row.order_type, isOrderType, 'orders.order_type'),
    storeId: row.store_id,
    deliveryAddress: row.delivery_address,
    tableNumber: row.table_number,
    notes: row.notes,
    voucherId: row.voucher_id,
    subtotal: row.subtotal,
    discountAmount: row.discount_amount,
    deliveryFee: row.delivery_fee,
    total: row.total,
    paymentMethod: narrow(row.payment_method, isPaymentMethod, 'orders.payment_method'),
    paymentStatus: narrow(row.payment_status, isPaymentStatus, 'orders.payment_status'),
    status: narrow(row.status, isOrderStatus, 'orders.status'),
    estimatedReadyTime: row.estimated_ready_time,
    cancellationReason: row.cancellation_reason,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    completedAt: row.completed_at,
    cancelledAt: row.cancelled_at,
  };
}

function toOrderLine(row: OrderLineRow): OrderLine {
  return {
    id: row.id,
    orderId: row.order_id,
    productId: row.product_id,
    productName: row.product_name,
    size: narrow(row.size, isCupSize, 'order_lines.size'),
    quantity: row.quantity,
    unitPrice: row.unit_price,
    sugarLevel: row.sugar_level,
    iceLevel: row.ice_level,
    temperature: narrow(row.temperature, isTemperature, 'order_lines.temperature'),
    toppingIds: row.topping_ids,
    toppingCost: row.topping_cost,
    lineSubtotal: row.line_subtotal,
  };
}

function toStatusChange(row: StatusChangeRow): OrderStatusChange {
  return {
    orderId: row.order_id,
    fromStatus: narrow(row.from_status, isOrderStatus, 'order_status_history.from_status'),
    toStatus: narrow(row.to_status, isOrderStatus, 'order_status_history.to_status'),
    actorId: row.actor_id,
    notes: row.notes,
    changedAt: row.changed_at,
  };
}

class PostgresOrderRepository implements OrderRepository {
  constructor(private client: PoolClient) {}

  async existsByNumber(orderNumber: string): Promise<boolean> {
    const result = await this.client.query('SELECT 1 FROM orders WHERE order_number = $1', [orderNumber]);
    return result.rows.length > 0;
  }

  async insert(draft: OrderDraft): Promise<Order> {
    const result = await this.client.query<OrderRow>(
      `INSERT INTO orders
         (user_id, order_number, order_type, store_id, delivery_address, table_number, notes, voucher_id,
          subtotal, discount_amount, delivery_fee, total, payment_method, payment_status, status,
          estimated_ready_time, cancellation_reason, created_at, updated_at, completed_at, cancelled_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $18, $19, $20)
       RETURNING ${ORDER_COLUMNS}`,
      [
        draft.userId,
        draft.orderNumber,
        draft.orderType,
        draft.storeId,
        draft.deliveryAddress,
        draft.tableNumber,
        draft.notes,
        draft.voucherId,
        draft.subtotal,
        draft.discountAmount,
        draft.deliveryFee,
        draft.total,
        draft.paymentMethod,
        draft.paymentStatus,
        draft.status,
        draft.estimatedReadyTime,
        draft.cancellationReason,
        draft.createdAt,
        draft.completedAt,
        draft.cancelledAt,
      ]
    );
    return toOrder(result.rows[0]);
  }

  async insertLines(orderId: number, lines: readonly OrderLineDraft[]): Promise<OrderLine[]> {
    const inserted: OrderLine[] = [];
    for (const line of lines) {
      const result = await this.client.query<OrderLineRow>(
        `INSERT INTO order_lines
           (order_id, product_id, product_name, size, quantity, unit_price, sugar_level, ice_level,
            temperature, topping_ids, topping_cost, line_subtotal)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
         RETURNING ${ORDER_LINE_COLUMNS}`,
        [
          orderId,
          line.productId,
          line.productName,
          line.size,
          line.quantity,
          line.unitPrice,
          line.sugarLevel,
          line.iceLevel,
          line.temperature,
          [...line.toppingIds],
          line.toppingCost,
          line.lineSubtotal,
        ]
      );
      inserted.push(toOrderLine(result.rows[0]));
    }
    return inserted;
  }

  async findById(orderId: number, forUpdate: boolean): Promise<Order | null> {
    const result = await this.client.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1${lockClause(forUpdate)}`,
      [orderId]
    );
    return result.rows.length === 0 ? null : toOrder(result.rows[0]);
  }

  async findLines(orderId: number): Promise<OrderLine[]> {
    const result = await this.client.query<OrderLineRow>(
      `SELECT ${ORDER_LINE_COLUMNS} FROM order_lines WHERE order_id = $1 ORDER BY id`,
      [orderId]
    );
    return result.rows.map(toOrderLine);
  }

  async listForUser(userId: number, limit: number): Promise<OrderOverview[]> {
    const result = await this.client.query<OrderOverviewRow>(
      `SELECT o.*, COUNT(l.id)::int AS line_count, COALESCE(SUM(l.quantity), 0)::int AS total_quantity
         FROM orders o
         LEFT JOIN order_lines l ON l.order_id = o.id
        WHERE o.user_id = $1
        GROUP BY o.id
        ORDER BY o.created_at DESC, o.id DESC
        LIMIT $2`,
      [userId, limit]
    );
    return result.rows.map(row => ({
      ...toOrder(row),
      lineCount: row.line_count,
      totalQuantity: row.total_quantity,
    }));
  }

  async updateStatus(orderId: number, update: StatusUpdate): Promise<Order> {
    const result = await this.client.query<OrderRow>(
      `UPDATE orders
          SET status = $2,
              updated_at = $3,
              completed_at = COALESCE($4, completed_at),
              cancelled_at = COALESCE($5, cancelled_at),
              cancellation_reason = COALESCE($6, cancellation_reason)
        WHERE id = $1
        RETURNING ${ORDER_COLUMNS}`,
      [orderId, update.status, update.updatedAt, update.completedAt, update.cancelledAt, update.cancellationReason]
    );
    if (result.rows.length === 0) {
      throw new Error(`Order ${orderId} disappeared during a status update`);
    }
    return toOrder(result.rows[0]);
  }

  async updatePaymentStatus(orderId: number, status: PaymentStatus, at: Date): Promise<Order | null> {
    const result = await this.client.query<OrderRow>(
      `UPDATE orders SET payment_status = $2, updated_at = $3 WHERE id = $1 RETURNING ${ORDER_COLUMNS}`,
      [orderId, status, at]
    );
    return result.rows.length === 0 ? null : toOrder(result.rows[0]);
  }

  async recordStatusChange(change: OrderStatusChange): Promise<void> {
    await this.client.query(
      `INSERT INTO order_status_history (order_id, from_status, to_status, actor_id, notes, changed_at)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [change.orderId, change.fromStatus, change.toStatus, change.actorId, change.notes, change.changedAt]
    );
  }

  async listStatusChanges(orderId: number): Promise<OrderStatusChange[]> {
    const result = await this.client.query<StatusChangeRow>(
      `SELECT order_id, from_status, to_status, actor_id, notes, changed_at
         FROM order_status_history WHERE order_id = $1 ORDER BY changed_at, id`,
      [orderId]
    );
    return result.rows.map(toStatusChange);
  }
}

// ============================================================================
// Loyalty
// ============================================================================

type AccountRow = { id: number; loyalty_points: number; membership_tier: string };

type LoyaltyTransactionRow = {
  id: number;
  user_id: number;
  delta: number;
  kind: string;
  description: string;
  related_order_id: number | null;
  created_at: Date;
};

const TRANSACTION_COLUMNS = 'id, user_id, delta, kind, description, related_order_id, created_at';

function toLoyaltyTransaction(row: LoyaltyTransactionRow): LoyaltyTransaction {
  return {
    id: row.id,
    userId: row.user_id,
    delta: row.delta,
    kind: narrow(row.kind, isLoyaltyTransactionKind, 'loyalty_transactions.kind'),
    description: row.description,
    relatedOrderId: row.related_order_id,
    createdAt: row.created_at,
  };
}

class PostgresLoyaltyRepository implements LoyaltyRepository {
  constructor(private client: PoolClient) {}

  async findAccount(userId: number, forUpdate: boolean): Promise<LoyaltyAccount | null> {
    const result = await this.client.query<AccountRow>(
      `SELECT id, loyalty_points, membership_tier FROM users WHERE id = $1${lockClause(forUpdate)}`,
      [userId]
    );
    if (result.rows.length === 0) {
      return null;
    }

    const row = result.rows[0];
    return {
      userId: row.id,
      balance: row.loyalty_points,
      tier: narrow(row.membership_tier, isMembershipTier, 'users.membership_tier'),
    };
  }

  async saveAccount(account: LoyaltyAccount): Promise<void> {
    await this.client.query(
      'UPDATE users SET loyalty_points = $2, membership_tier = $3 WHERE id = $1',
      [account.userId, account.balance, account.tier]
    );
  }

  async appendTransaction(entry: NewLoyaltyTransaction): Promise<LoyaltyTransaction> {
    const result = await this.client.query<LoyaltyTransactionRow>(
      `INSERT INTO loyalty_transactions (user_id, delta, kind, description, related_order_id, created_at)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${TRANSACTION_COLUMNS}`,
      [entry.userId, entry.delta, entry.kind, entry.description, entry.relatedOrderId, entry.createdAt]
    );
    return toLoyaltyTransaction(result.rows[0]);
  }

  async listTransactions(userId: number, limit: number): Promise<LoyaltyTransaction[]> {
    const result = await this.client.query<LoyaltyTransactionRow>(
      `SELECT ${TRANSACTION_COLUMNS} FROM loyalty_transactions
        WHERE user_id = $1 ORDER BY created_at DESC, id DESC LIMIT $2`,
      [userId, limit]
    );
    return result.rows.map(toLoyaltyTransaction);
  }

  async hasEarnForOrder(userId: number, orderId: number): Promise<boolean> {
    const result = await this.client.query(
      `SELECT 1 FROM loyalty_transactions
        WHERE user_id = $1 AND related_order_id = $2 AND kind = 'earn' LIMIT 1`,
      [userId, orderId]
    );
    return result.rows.length > 0;
  }
}

export function makeRepositories(client: PoolClient): Repositories {
  return {
    cart: new PostgresCartRepository(client),
    catalog: new PostgresCatalogRepository(client),
    vouchers: new PostgresVoucherRepository(client),
    orders: new PostgresOrderRepository(client),
    loyalty: new PostgresLoyaltyRepository(client),
  };
}
