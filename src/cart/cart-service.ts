/**
 * Cart Service — per-account shopping cart
 *
 * The cart is a multiset of product snapshots: each add copies the
 * product's id, name and price at that moment, so later catalog edits
 * never change a pending cart.
 */

import { Account, CartLine, DataStore } from '../store/types';
import { findProductIn } from '../catalog/catalog-service';
import { accountRef } from '../identity/identity-service';
import { OpResult, ok, fail } from '../common/errors';
import { round2 } from '../common/money';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'cart-service' });

export interface CartView {
  lines: CartLine[];
  subtotal: number;
  /** Coupon waiting in the account's slot, applied at checkout */
  coupon: string | null;
}

export function cartSubtotal(lines: CartLine[]): number {
  return round2(lines.reduce((sum, line) => sum + line.price, 0));
}

/** Empty the account's cart in place; callers run this inside a store transaction */
export function emptyCart(account: Account): number {
  const removed = account.cart.length;
  account.cart = [];
  return removed;
}

export class CartService {
  constructor(private readonly store: DataStore) {}

  /** Append a snapshot of the product to the account's cart */
  async addItem(secret: string, productId: string): Promise<OpResult<{ line: CartLine; cartSize: number }>> {
    return this.store.transact((doc): OpResult<{ line: CartLine; cartSize: number }> => {
      const account = doc.users[secret];
      if (!account) return fail('NOT_REGISTERED', 'User not registered. Use /start to register.');

      const product = findProductIn(doc, productId);
      if (!product) {
        log.warn({ productId }, 'Add to cart for unknown product');
        return fail('PRODUCT_NOT_FOUND', 'Product not found.');
      }

      const line: CartLine = { id: product.id, name: product.name, price: product.price };
      account.cart.push(line);
      log.info({ account: accountRef(secret), productId, cartSize: account.cart.length }, 'Item added to cart');
      return ok({ line, cartSize: account.cart.length });
    });
  }

  async viewCart(secret: string): Promise<OpResult<CartView>> {
    const doc = await this.store.read();
    const account = doc.users[secret];
    if (!account) return fail('NOT_REGISTERED', 'User not registered. Use /start to register.');
    return ok({ lines: account.cart, subtotal: cartSubtotal(account.cart), coupon: account.coupon });
  }

  async clearCart(secret: string): Promise<OpResult<{ removed: number }>> {
    return this.store.transact((doc): OpResult<{ removed: number }> => {
      const account = doc.users[secret];
      if (!account) return fail('NOT_REGISTERED', 'User not registered. Use /start to register.');
      const removed = emptyCart(account);
      log.info({ account: accountRef(secret), removed }, 'Cart cleared');
      return ok({ removed });
    });
  }
}
