/**
 * Store Types — the persisted commerce document
 *
 * One structured document holds every account, the catalog, the order
 * ledger, payment destinations, encryption key metadata and ratings.
 */

export type PaymentMethod = 'BTC' | 'USDT';

export const PAYMENT_METHODS: readonly PaymentMethod[] = ['BTC', 'USDT'];

export type OrderStatus = 'pending';

/** Snapshot of a product taken when it was added to a cart or wishlist */
export interface CartLine {
  id: string;
  name: string;
  price: number;
}

export type WishlistEntry = CartLine;

export interface Account {
  /** Opaque transport user id; null once the id has been re-bound to another phrase */
  transportId: string | null;
  displayName: string;
  country: string | null;
  cart: CartLine[];
  wishlist: WishlistEntry[];
  /** Single coupon slot, consumed at checkout */
  coupon: string | null;
  /** Order ids in creation order */
  orders: string[];
}

/** Raw availability as stored: flat SKU list or variant → count mapping */
export type RawQuantities = string[] | Record<string, number>;

export interface Product {
  id: string;
  name: string;
  price: number;
  description: string;
  quantities?: RawQuantities;
}

export interface Order {
  orderId: string;
  /** Secret phrase of the owning account */
  user: string;
  items: CartLine[];
  addressEncrypted: string;
  notes: string;
  paymentType: PaymentMethod;
  status: OrderStatus;
  /** Unix seconds */
  timestamp: number;
  subtotal: number;
  discount: number;
  total: number;
  coupon: string;
}

export interface PaymentConfig {
  btc_address: string;
  usdt_address: string;
}

export interface PgpConfig {
  key_generated: boolean;
  key_id?: string;
  algorithm?: string;
  created_at?: number;
}

export interface Rating {
  user: string;
  value: number;
  /** Unix seconds */
  ts: number;
}

export interface StoreDocument {
  /** Keyed by secret phrase */
  users: Record<string, Account>;
  /** Category name → products in display order */
  products: Record<string, Product[]>;
  orders: Order[];
  payment: PaymentConfig;
  pgp_config: PgpConfig;
  ratings: Rating[];
}

/** Storage medium for the whole document */
export interface DocumentBackend {
  readonly name: string;
  /** Returns null when nothing has been persisted yet */
  load(): Promise<unknown | null>;
  save(doc: StoreDocument): Promise<void>;
}

export interface DataStore {
  /** Deep copy of the last committed document */
  read(): Promise<StoreDocument>;
  /**
   * Run `mutate` against a private copy of the latest document under the
   * write lock, persist it, then publish it. If `mutate` or the persist throws,
   * nothing is published.
   */
  transact<T>(mutate: (doc: StoreDocument) => T | Promise<T>): Promise<T>;
  ping(): Promise<boolean>;
}

export function emptyDocument(): StoreDocument {
  return {
    users: {},
    products: {},
    orders: [],
    payment: { btc_address: '', usdt_address: '' },
    pgp_config: { key_generated: false },
    ratings: [],
  };
}
