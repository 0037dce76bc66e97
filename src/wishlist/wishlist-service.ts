import { DataStore, WishlistEntry } from '../store/types';
import { findProductIn } from '../catalog/catalog-service';
import { accountRef } from '../identity/identity-service';
import { OpResult, ok, fail } from '../common/errors';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'wishlist-service' });

export class WishlistService {
  constructor(private readonly store: DataStore) {}

  /** Add a product snapshot; a product already on the list is left as is */
  async add(secret: string, productId: string): Promise<OpResult<{ entry: WishlistEntry; added: boolean }>> {
    return this.store.transact((doc): OpResult<{ entry: WishlistEntry; added: boolean }> => {
      const account = doc.users[secret];
      if (!account) return fail('NOT_REGISTERED', 'Please /start to register first.');

      const product = findProductIn(doc, productId);
      if (!product) return fail('PRODUCT_NOT_FOUND', 'Product not found.');

      const existing = account.wishlist.find((w) => w.id === product.id);
      if (existing) return ok({ entry: existing, added: false });

      const entry: WishlistEntry = { id: product.id, name: product.name, price: product.price };
      account.wishlist.push(entry);
      log.info({ account: accountRef(secret), productId }, 'Added to wishlist');
      return ok({ entry, added: true });
    });
  }

  async list(secret: string): Promise<OpResult<WishlistEntry[]>> {
    const doc = await this.store.read();
    const account = doc.users[secret];
    if (!account) return fail('NOT_REGISTERED', 'Please /start to register first.');
    return ok(account.wishlist);
  }
}
