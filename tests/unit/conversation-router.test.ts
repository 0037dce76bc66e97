import { ConversationRouter, parseCommand } from '../../src/conversation/conversation-router';
import { ConversationSession, InboundMessage } from '../../src/conversation/types';
import { IdentityService } from '../../src/identity/identity-service';
import { CatalogService } from '../../src/catalog/catalog-service';
import { CartService } from '../../src/cart/cart-service';
import { CheckoutService } from '../../src/checkout/checkout-service';
import { CheckoutStateMachine } from '../../src/checkout/checkout-machine';
import { CheckoutDraft } from '../../src/checkout/types';
import { CouponService } from '../../src/coupon/coupon-service';
import { OrderIdMinter, OrderLedger } from '../../src/orders/order-ledger';
import { WishlistService } from '../../src/wishlist/wishlist-service';
import { RatingService } from '../../src/ratings/rating-service';
import { AddressEncryptionService, AesGcmAddressEncryptor } from '../../src/security/address-encryptor';
import { SessionMemory } from '../../src/session/session-memory';
import { DocumentDataStore } from '../../src/store/data-store';
import { TestClock, memoryStore } from '../helpers/fixtures';

const ORDER_ID = '1700000000-abc123';

function buildRouter(store: DocumentDataStore, encryptor: AesGcmAddressEncryptor): ConversationRouter {
  const clock = new TestClock();
  const idle = 30 * 60 * 1000;
  const coupons = new CouponService(store, { code: 'SAVE10', percent: 10 });
  const ledger = new OrderLedger(store, new OrderIdMinter(clock.now, () => 'abc123'), clock.now);
  const encryption = new AddressEncryptionService(encryptor, store, clock.now);
  const checkout = new CheckoutService(
    store,
    new SessionMemory<CheckoutDraft>('drafts', idle, clock.now),
    encryption,
    coupons,
    ledger,
    new CheckoutStateMachine(),
    clock.now,
  );
  return new ConversationRouter({
    identity: new IdentityService(store),
    catalog: new CatalogService(store),
    cart: new CartService(store),
    checkout,
    ledger,
    coupons,
    wishlist: new WishlistService(store),
    ratings: new RatingService(store, clock.now),
    encryption,
    sessions: new SessionMemory<ConversationSession>('sessions', idle, clock.now),
    supportContact: 'help@test.invalid',
  });
}

describe('parseCommand', () => {
  it.each([
    ['/start', { verb: 'start', arg: '' }],
    ['/track 1700000000-abc123', { verb: 'track', arg: '1700000000-abc123' }],
    ['add|tee-black', { verb: 'add', arg: 'tee-black' }],
    ['cat|Apparel', { verb: 'cat', arg: 'Apparel' }],
    ['menu|cart', { verb: 'cart', arg: '' }],
    ['menu|track', { verb: 'track_help', arg: '' }],
    ['Order History', { verb: 'history', arg: '' }],
    ['listings', { verb: 'products', arg: '' }],
    ['inlinecheckout|start', { verb: 'checkout', arg: 'start' }],
    ['/CART', { verb: 'cart', arg: '' }],
  ])('should parse %p', (input, expected) => {
    expect(parseCommand(input)).toEqual(expected);
  });
});

describe('ConversationRouter', () => {
  let store: DocumentDataStore;
  let encryptor: AesGcmAddressEncryptor;
  let router: ConversationRouter;

  const from = (transportId: string, sessionKey: string) => ({
    text: (text: string) => router.handle({ sessionKey, transportId, displayName: 'Tester', text }),
    action: (action: string) => router.handle({ sessionKey, transportId, displayName: 'Tester', action }),
  });

  beforeEach(() => {
    store = memoryStore();
    encryptor = new AesGcmAddressEncryptor('test-secret');
    router = buildRouter(store, encryptor);
  });

  describe('registration', () => {
    it('should register a new phrase and finish at the main menu', async () => {
      const user = from('tg-new', 'chat-new');

      const welcome = await user.text('/start');
      expect(welcome.stage).toBe('ASK_SECRET');

      const ask = await user.text('gamma-phrase');
      expect(ask.stage).toBe('ASK_COUNTRY');
      expect(ask.text).toBe('Secret saved!\nPlease choose your country:');
      expect(ask.options?.map((o) => o.action)).toEqual([
        'country|USA',
        'country|UK',
        'country|Nigeria',
        'country|India',
        'country|Other',
      ]);

      const done = await user.action('country|UK');
      expect(done.stage).toBe('MAIN_MENU');
      expect(done.text.startsWith('Registration complete. Welcome!\n\n')).toBe(true);

      const { users } = await store.read();
      expect(users['gamma-phrase']).toMatchObject({ transportId: 'tg-new', country: 'UK', cart: [] });
    });

    it('should welcome back a known phrase without resetting it', async () => {
      await store.transact((doc) => {
        doc.users['alpha-phrase'].cart.push({ id: 'tee-black', name: 'Black Tee', price: 15 });
      });
      const user = from('tg-other', 'chat-other');

      await user.text('/start');
      const reply = await user.text('alpha-phrase');
      expect(reply.text).toBe('This secret phrase is already registered. Welcome back!\nPlease choose your country:');
      expect((await store.read()).users['alpha-phrase'].cart).toHaveLength(1);
    });

    it('should send a registered user straight to the menu on /start', async () => {
      const reply = await from('tg-1', 'chat-1').text('/start');
      expect(reply.stage).toBe('MAIN_MENU');
      expect(reply.options?.[0]).toEqual({ label: 'Listings', action: 'menu|products' });
    });

    it('should report an expired session for a country without a pending phrase', async () => {
      const reply = await from('tg-new', 'chat-new').action('country|UK');
      expect(reply).toEqual({ stage: 'ASK_SECRET', error: 'SESSION_EXPIRED', text: 'Session expired, please /start again.' });
    });
  });

  describe('menu commands', () => {
    it('should require registration for account commands', async () => {
      const reply = await from('tg-stranger', 'chat-x').text('/cart');
      expect(reply.error).toBe('NOT_REGISTERED');
      expect(reply.text).toBe('You need to /start and register with a secret phrase first.');
    });

    it('should show the cart with the pending coupon', async () => {
      const user = from('tg-1', 'chat-1');
      await user.action('add|tee-black');
      await user.action('add|cap-navy');
      await user.action('applycoupon');

      const reply = await user.text('/cart');
      expect(reply.text).toBe(
        'Your cart:\n1. Black Tee — $15.00\n2. Navy Cap — $10.00\n\n' +
          'Coupon applied: -10% (applies at checkout)\n\nSubtotal: $25.00',
      );
    });

    it('should confirm additions and report unknown products', async () => {
      const user = from('tg-1', 'chat-1');
      expect((await user.action('add|hoodie-grey')).text).toBe('Added Grey Hoodie to cart.');
      expect(await user.action('add|missing')).toMatchObject({ error: 'PRODUCT_NOT_FOUND', text: 'Product not found.' });
    });

    it('should list products of a category with availability', async () => {
      const reply = await from('tg-1', 'chat-1').action('cat|Accessories');
      expect(reply.text).toBe('Products in Accessories:\n\nNavy Cap — $10.00\nSix-panel cap\nAvailable: CAP-NV-1, CAP-NV-2\n');
      expect(reply.options?.slice(0, 2)).toEqual([
        { label: 'Add Navy Cap', action: 'add|cap-navy' },
        { label: 'Wishlist', action: 'wish|cap-navy' },
      ]);
    });

    it('should manage the wishlist', async () => {
      const user = from('tg-1', 'chat-1');
      expect((await user.action('wish|hoodie-grey')).text).toBe('Added Grey Hoodie to wishlist.');
      expect((await user.action('wish|hoodie-grey')).text).toBe('Grey Hoodie is already on your wishlist.');
      expect((await user.action('menu|wishlist')).text).toBe('Your wishlist:\n1. Grey Hoodie — $30.00');
    });

    it('should accept anonymous ratings and summarise them', async () => {
      const stranger = from('tg-stranger', 'chat-x');
      expect((await stranger.action('rate|4')).text).toBe('Thanks for rating ★★★★!');
      expect((await stranger.action('menu|ratings')).text).toBe('Ratings\n1 rating, average 4.0\nTap to rate:');
      expect((await stranger.action('rate|9')).error).toBe('INVALID_RATING');
    });

    it('should show the encryption key id', async () => {
      const reply = await from('tg-1', 'chat-1').text('/pgp');
      expect(reply.text).toBe(
        `Address Encryption\nYour delivery address is encrypted before storage.\nKey ID: ${encryptor.keyInfo().keyId} (aes-256-gcm)`,
      );
    });
  });

  describe('checkout', () => {
    async function checkoutAsAlpha(): Promise<void> {
      const user = from('tg-1', 'chat-1');
      await user.action('add|tee-black');
      await user.action('add|cap-navy');
      await user.action('applycoupon');

      expect((await user.action('inlinecheckout|start')).stage).toBe('AWAITING_ADDRESS');
      expect((await user.text('Start Street 5')).stage).toBe('AWAITING_NOTES');

      const payment = await user.text('skip');
      expect(payment.stage).toBe('AWAITING_PAYMENT_TYPE');
      expect(payment.options).toEqual([
        { label: 'BTC', action: 'pay|BTC' },
        { label: 'USDT', action: 'pay|USDT' },
      ]);

      const done = await user.action('pay|BTC');
      expect(done.stage).toBe('MAIN_MENU');
      expect(done.text.split('\n')[0]).toBe(`Order ${ORDER_ID} created!`);
    }

    it('should take typed text as the address even when it looks like a command', async () => {
      await checkoutAsAlpha();
      const [order] = (await store.read()).orders;
      expect(encryptor.decrypt(order.addressEncrypted)).toBe('Start Street 5');
    });

    it('should track and list the new order', async () => {
      await checkoutAsAlpha();
      const user = from('tg-1', 'chat-1');

      expect((await user.text(`/track ${ORDER_ID}`)).text).toBe(
        `Order ${ORDER_ID}: status pending. Items: 2 Total: $22.50`,
      );
      expect((await user.text('/history')).text).toBe(`Your orders:\n${ORDER_ID} — pending — $22.50`);
      expect((await user.text('/track nope')).text).toBe('Order not found.');
    });

    it('should hand the encrypted address file to the owner only', async () => {
      await checkoutAsAlpha();

      const owner = await from('tg-1', 'chat-1').text(`/download_address ${ORDER_ID}`);
      expect(owner.document?.filename).toBe(`${ORDER_ID}_address.asc`);
      expect(owner.document?.content.startsWith('-----BEGIN ENCRYPTED ADDRESS-----')).toBe(true);

      const stranger = from('tg-2', 'chat-2');
      await stranger.text('/start');
      await stranger.text('beta-phrase');
      await stranger.action('country|India');
      const denied = await stranger.text(`/download_address ${ORDER_ID}`);
      expect(denied).toMatchObject({
        error: 'ORDER_NOT_FOUND',
        text: 'Order not found or you do not have permission to access it.',
      });
    });

    it('should cancel an open checkout and keep the cart', async () => {
      const user = from('tg-1', 'chat-1');
      await user.action('add|tee-black');
      await user.action('inlinecheckout|start');
      await user.text('1 Test Street');

      expect(await user.text('/cancel')).toEqual({ stage: 'MAIN_MENU', text: 'Cancelled.' });
      expect((await store.read()).users['alpha-phrase'].cart).toHaveLength(1);
      expect((await user.text('skip')).stage).toBe('MAIN_MENU');
    });

    it('should refuse to start with an empty cart', async () => {
      const reply = await from('tg-1', 'chat-1').action('inlinecheckout|start');
      expect(reply).toMatchObject({ stage: 'MAIN_MENU', error: 'EMPTY_CART', text: 'Your cart is empty. Add products first.' });
    });
  });
});
