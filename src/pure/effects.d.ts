/**
 * EFFECTS LAYER
 *
 * All external IO goes through these interfaces. They are deliberately narrow
 * ("lock the cart of a user", "append a ledger entry") rather than "execute
 * arbitrary SQL", so a test stand-in only has to keep a few maps.
 */

import type {Either} from 'purify-ts';
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
  Topping,
  Voucher,
  VoucherRedemption,
  VoucherUsage,
} from '../domain';
import type {Clock, CommerceSettings, NotificationPayload, SideEffectFailureAlert} from '../types';
import type {OrderDraft, OrderLineDraft, StatusUpdate} from './types';

// ============================================================================
// Repositories (only reachable inside a unit of work)
// ============================================================================

export interface CartRepository {
  /** Newest first. */
  listForUser(userId: number): Promise<CartLine[]>;
  /** Same as listForUser but holds row locks until the unit of work ends. */
  lockForUser(userId: number): Promise<CartLine[]>;
  /** Owner-scoped lookup; a line of another user is reported as absent. */
  findOwned(lineId: number, userId: number): Promise<CartLine | null>;
  findByIdentity(userId: number, productId: number, customization: Customization): Promise<CartLine | null>;
  /** Inserts the line, or adds its quantity to the line with the same identity. */
  addOrIncrement(line: NewCartLine): Promise<CartLine>;
  updateQuantity(lineId: number, userId: number, quantity: number): Promise<CartLine | null>;
  updateLine(lineId: number, userId: number, customization: Customization, quantity: number): Promise<CartLine | null>;
  remove(lineId: number, userId: number): Promise<boolean>;
  clear(userId: number): Promise<number>;
  /** Deletes only the given lines of the user; lines added since they were read stay. */
  removeLines(userId: number, lineIds: readonly number[]): Promise<number>;
  countItems(userId: number): Promise<number>;
}

export interface CatalogRepository {
  getProducts(ids: readonly number[]): Promise<Map<number, Product>>;
  getToppings(ids: readonly number[]): Promise<Map<number, Topping>>;
}

export interface VoucherRepository {
  /** Code is matched upper-case; forUpdate locks the voucher row. */
  findByCode(code: string, forUpdate: boolean): Promise<Voucher | null>;
  findById(voucherId: number, forUpdate: boolean): Promise<Voucher | null>;
  getUsage(userId: number, voucherId: number): Promise<VoucherUsage | null>;
  listUsageForUser(userId: number): Promise<VoucherUsage[]>;
  listActive(now: Date): Promise<Voucher[]>;
  /** Bumps the global counter and the per-user counter, appends a history row. */
  recordRedemption(redemption: VoucherRedemption): Promise<VoucherUsage>;
}

export interface OrderRepository {
  existsByNumber(orderNumber: string): Promise<boolean>;
  insert(draft: OrderDraft): Promise<Order>;
  insertLines(orderId: number, lines: readonly OrderLineDraft[]): Promise<OrderLine[]>;
  findById(orderId: number, forUpdate: boolean): Promise<Order | null>;
  findLines(orderId: number): Promise<OrderLine[]>;
  /** Newest first. */
  listForUser(userId: number, limit: number): Promise<OrderOverview[]>;
  updateStatus(orderId: number, update: StatusUpdate): Promise<Order>;
  updatePaymentStatus(orderId: number, status: PaymentStatus, at: Date): Promise<Order | null>;
  recordStatusChange(change: OrderStatusChange): Promise<void>;
  /** Oldest first. */
  listStatusChanges(orderId: number): Promise<OrderStatusChange[]>;
}

export interface LoyaltyRepository {
  findAccount(userId: number, forUpdate: boolean): Promise<LoyaltyAccount | null>;
  saveAccount(account: LoyaltyAccount): Promise<void>;
  appendTransaction(entry: NewLoyaltyTransaction): Promise<LoyaltyTransaction>;
  /** Newest first. */
  listTransactions(userId: number, limit: number): Promise<LoyaltyTransaction[]>;
  hasEarnForOrder(userId: number, orderId: number): Promise<boolean>;
}

export type Repositories = {
  cart: CartRepository;
  catalog: CatalogRepository;
  vouchers: VoucherRepository;
  orders: OrderRepository;
  loyalty: LoyaltyRepository;
};

/**
 * One transaction over every repository. The work commits when it resolves to
 * a Right and rolls back when it resolves to a Left or throws.
 */
export interface UnitOfWork {
  run<L, R>(work: (repositories: Repositories) => Promise<Either<L, R>>): Promise<Either<L, R>>;
}

// ============================================================================
// Services
// ============================================================================

export interface NotificationService {
  publish(payload: NotificationPayload): Promise<void>;
}

export interface MonitoringService {
  sendAlerts(alerts: SideEffectFailureAlert[]): Promise<void>;
}

// ============================================================================
// Combined Dependencies
//
// No DI framework needed - just an object.
// ============================================================================

export type AppEffects = {
  transactions: UnitOfWork;
  notifications: NotificationService;
  monitoring: MonitoringService;
  clock: Clock;
  settings: CommerceSettings;
};
