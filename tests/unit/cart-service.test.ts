import { CartService, cartSubtotal, emptyCart } from '../../src/cart/cart-service';
import { DocumentDataStore } from '../../src/store/data-store';
import { account, memoryStore, sampleDocument } from '../helpers/fixtures';

describe('CartService', () => {
  let store: DocumentDataStore;
  let service: CartService;

  beforeEach(() => {
    const doc = sampleDocument();
    doc.users['beta-phrase'] = account({ transportId: 'tg-2', displayName: 'Beta', country: 'UK' });
    store = memoryStore(doc);
    service = new CartService(store);
  });

  describe('addItem', () => {
    it('should append a snapshot of the product', async () => {
      const result = await service.addItem('alpha-phrase', 'tee-black');
      expect(result).toEqual({
        ok: true,
        value: { line: { id: 'tee-black', name: 'Black Tee', price: 15 }, cartSize: 1 },
      });
    });

    it('should find products in any category', async () => {
      const result = await service.addItem('alpha-phrase', 'cap-navy');
      expect(result.ok && result.value.line.name).toBe('Navy Cap');
    });

    it('should keep duplicates as separate lines', async () => {
      await service.addItem('alpha-phrase', 'tee-black');
      await service.addItem('alpha-phrase', 'tee-black');
      await service.addItem('alpha-phrase', 'cap-navy');

      const view = await service.viewCart('alpha-phrase');
      expect(view.ok && view.value.lines.map((l) => l.id)).toEqual(['tee-black', 'tee-black', 'cap-navy']);
    });

    it('should leave the cart unchanged for an unknown product', async () => {
      await service.addItem('alpha-phrase', 'tee-black');
      const result = await service.addItem('alpha-phrase', 'no-such-product');

      expect(result).toEqual({ ok: false, code: 'PRODUCT_NOT_FOUND', message: 'Product not found.' });
      expect((await store.read()).users['alpha-phrase'].cart).toHaveLength(1);
    });

    it('should reject unregistered callers', async () => {
      const result = await service.addItem('ghost-phrase', 'tee-black');
      expect(result).toEqual({
        ok: false,
        code: 'NOT_REGISTERED',
        message: 'User not registered. Use /start to register.',
      });
    });

    it('should not follow later catalog price changes', async () => {
      await service.addItem('alpha-phrase', 'tee-black');
      await store.transact((doc) => {
        doc.products.Apparel[0].price = 99;
      });

      const view = await service.viewCart('alpha-phrase');
      expect(view.ok && view.value.lines[0].price).toBe(15);
    });

    it('should keep concurrent adds for different accounts apart', async () => {
      await Promise.all([
        ...Array.from({ length: 10 }, () => service.addItem('alpha-phrase', 'tee-black')),
        ...Array.from({ length: 7 }, () => service.addItem('beta-phrase', 'cap-navy')),
      ]);

      const { users } = await store.read();
      expect(users['alpha-phrase'].cart).toHaveLength(10);
      expect(users['alpha-phrase'].cart.every((l) => l.id === 'tee-black')).toBe(true);
      expect(users['beta-phrase'].cart).toHaveLength(7);
      expect(users['beta-phrase'].cart.every((l) => l.id === 'cap-navy')).toBe(true);
    });
  });

  describe('viewCart', () => {
    it('should report lines, subtotal and coupon slot', async () => {
      await service.addItem('alpha-phrase', 'tee-black');
      await service.addItem('alpha-phrase', 'cap-navy');

      const view = await service.viewCart('alpha-phrase');
      expect(view).toEqual({
        ok: true,
        value: {
          lines: [
            { id: 'tee-black', name: 'Black Tee', price: 15 },
            { id: 'cap-navy', name: 'Navy Cap', price: 10 },
          ],
          subtotal: 25,
          coupon: null,
        },
      });
    });
  });

  describe('clearCart', () => {
    it('should empty the cart and report how many lines went', async () => {
      await service.addItem('alpha-phrase', 'tee-black');
      await service.addItem('alpha-phrase', 'cap-navy');

      const result = await service.clearCart('alpha-phrase');
      expect(result).toEqual({ ok: true, value: { removed: 2 } });
      expect((await store.read()).users['alpha-phrase'].cart).toEqual([]);
    });
  });

  describe('emptyCart', () => {
    it('should empty the account cart in place and return the line count', () => {
      const holder = account({ cart: [{ id: 'tee-black', name: 'Black Tee', price: 15 }] });
      expect(emptyCart(holder)).toBe(1);
      expect(holder.cart).toEqual([]);
    });
  });

  describe('cartSubtotal', () => {
    it('should round to cents', () => {
      expect(cartSubtotal([
        { id: 'a', name: 'A', price: 0.1 },
        { id: 'b', name: 'B', price: 0.2 },
      ])).toBe(0.3);
    });
  });
});
