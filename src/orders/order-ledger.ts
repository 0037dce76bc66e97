/**
 * Order Ledger — append-only record of finalized checkouts
 *
 * Orders are priced, assigned an id and appended exactly once; nothing in
 * this module updates or deletes an order.
 */

import { v4 as uuid } from 'uuid';
import { CartLine, DataStore, Order, PaymentMethod, StoreDocument } from '../store/types';
import { accountRef } from '../identity/identity-service';
import { OpResult, ok, fail } from '../common/errors';
import { round2 } from '../common/money';
import { logger } from '../observability/logger';
import { ordersCreated } from '../observability/metrics';

const log = logger.child({ component: 'order-ledger' });

const MAX_MINT_ATTEMPTS = 64;

export interface OrderTotals {
  subtotal: number;
  discount: number;
  total: number;
}

export interface NewOrder {
  items: CartLine[];
  addressEncrypted: string;
  notes: string;
  paymentType: PaymentMethod;
  /** Amount already computed by the coupon engine; 0 when no coupon applies */
  discount: number;
  /** Code that earned the discount, empty when none */
  coupon: string;
}

/** subtotal and total are rounded to cents; total = subtotal − discount */
export function priceOrder(items: CartLine[], discount: number): OrderTotals {
  const subtotal = round2(items.reduce((sum, item) => sum + item.price, 0));
  const roundedDiscount = round2(discount);
  return { subtotal, discount: roundedDiscount, total: round2(subtotal - roundedDiscount) };
}

/**
 * Order ids are `<unix seconds>-<6 hex chars>`. The random part alone can
 * repeat within one second, so every candidate is checked against the ids
 * already taken.
 */
export class OrderIdMinter {
  constructor(
    private readonly now: () => number = Date.now,
    private readonly suffix: () => string = () => uuid().replace(/-/g, '').slice(0, 6),
  ) {}

  mint(isTaken: (orderId: string) => boolean): string {
    const seconds = Math.floor(this.now() / 1000);
    for (let attempt = 0; attempt < MAX_MINT_ATTEMPTS; attempt++) {
      const candidate = `${seconds}-${this.suffix()}`;
      if (!isTaken(candidate)) return candidate;
    }
    throw new Error(`Could not mint a unique order id after ${MAX_MINT_ATTEMPTS} attempts`);
  }
}

export class OrderLedger {
  constructor(
    private readonly store: DataStore,
    private readonly minter: OrderIdMinter = new OrderIdMinter(),
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Append an order for `secret` to the document and reference it from the
   * account. Must run inside a store transaction.
   */
  appendOrder(doc: StoreDocument, secret: string, input: NewOrder): Order {
    const account = doc.users[secret];
    if (!account) throw new Error('appendOrder called for an unknown account');

    const taken = new Set(doc.orders.map((o) => o.orderId));
    const orderId = this.minter.mint((id) => taken.has(id));
    const totals = priceOrder(input.items, input.discount);

    const order: Order = {
      orderId,
      user: secret,
      items: input.items.map((item) => ({ ...item })),
      addressEncrypted: input.addressEncrypted,
      notes: input.notes,
      paymentType: input.paymentType,
      status: 'pending',
      timestamp: Math.floor(this.now() / 1000),
      subtotal: totals.subtotal,
      discount: totals.discount,
      total: totals.total,
      coupon: totals.discount > 0 ? input.coupon : '',
    };

    doc.orders.push(order);
    account.orders.push(orderId);

    ordersCreated.inc({ payment: order.paymentType });
    log.info(
      {
        orderId,
        account: accountRef(secret),
        items: order.items.length,
        subtotal: order.subtotal,
        discount: order.discount,
        total: order.total,
        payment: order.paymentType,
      },
      'Order recorded',
    );
    return order;
  }

  /** Linear scan over the ledger */
  async findById(orderId: string): Promise<OpResult<Order>> {
    const { orders } = await this.store.read();
    const order = orders.find((o) => o.orderId === orderId);
    return order ? ok(order) : fail('ORDER_NOT_FOUND', 'Order not found.');
  }

  /** Orders owned by the account, oldest first */
  async findByOwner(secret: string): Promise<Order[]> {
    const { orders } = await this.store.read();
    return orders.filter((o) => o.user === secret);
  }

  /** Encrypted address of an order, only for its owner */
  async encryptedAddressFor(orderId: string, secret: string): Promise<OpResult<string>> {
    const { orders } = await this.store.read();
    const order = orders.find((o) => o.orderId === orderId && o.user === secret);
    if (!order) return fail('ORDER_NOT_FOUND', 'Order not found or you do not have permission to access it.');
    if (!order.addressEncrypted) return fail('ORDER_NOT_FOUND', 'No encrypted address found for this order.');
    return ok(order.addressEncrypted);
  }
}
