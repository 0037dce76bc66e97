/**
 * Conversation Router — transport-agnostic chat command surface
 *
 * Takes one inbound message (typed text or a button payload), decides
 * which flow it belongs to (registration, checkout, menu command) and
 * returns the reply the transport should render.
 */

import { IdentityService, COUNTRIES, ResolvedAccount } from '../identity/identity-service';
import { CatalogService, describeAvailability } from '../catalog/catalog-service';
import { CartService } from '../cart/cart-service';
import { CheckoutService } from '../checkout/checkout-service';
import { CheckoutStep } from '../checkout/types';
import { OrderLedger } from '../orders/order-ledger';
import { CouponService } from '../coupon/coupon-service';
import { WishlistService } from '../wishlist/wishlist-service';
import { RatingService } from '../ratings/rating-service';
import { AddressEncryptionService } from '../security/address-encryptor';
import { SessionMemory } from '../session/session-memory';
import { formatUsd } from '../common/money';
import { sessionLogger } from '../observability/logger';
import { chatMessagesTotal } from '../observability/metrics';
import {
  ConversationSession,
  ConversationStage,
  InboundMessage,
  OutboundReply,
  ReplyOption,
} from './types';

export interface RouterDeps {
  identity: IdentityService;
  catalog: CatalogService;
  cart: CartService;
  checkout: CheckoutService;
  ledger: OrderLedger;
  coupons: CouponService;
  wishlist: WishlistService;
  ratings: RatingService;
  encryption: AddressEncryptionService;
  sessions: SessionMemory<ConversationSession>;
  supportContact: string;
}

interface Command {
  verb: string;
  arg: string;
}

const NOT_REGISTERED_TEXT = 'You need to /start and register with a secret phrase first.';

const MAIN_MENU_OPTIONS: ReplyOption[] = [
  { label: 'Listings', action: 'menu|products' },
  { label: 'Coupon', action: 'menu|coupon' },
  { label: 'Track', action: 'menu|track' },
  { label: 'About', action: 'menu|about' },
  { label: 'Ratings', action: 'menu|ratings' },
  { label: 'PGP', action: 'menu|pgp' },
  { label: 'Wishlist', action: 'menu|wishlist' },
  { label: 'Cart', action: 'menu|cart' },
  { label: 'Order History', action: 'menu|history' },
  { label: 'Contact', action: 'menu|contact' },
];

const BACK_TO_MENU: ReplyOption = { label: 'Main Menu', action: 'menu|main' };

/** Commands that work without a resolved account */
const PUBLIC_VERBS = new Set(['about', 'contact', 'support', 'coupon', 'ratings', 'rate', 'main', 'track_help']);

const ALIASES: Record<string, string> = {
  categories: 'products',
  listings: 'products',
  category: 'cat',
  inlinecheckout: 'checkout',
  download: 'download_address',
  orders: 'history',
};

/** `verb|arg` payloads and `/verb arg` or `verb arg` text all reduce to one shape */
export function parseCommand(input: string): Command {
  const trimmed = input.trim();
  if (trimmed.toLowerCase() === 'order history') return { verb: 'history', arg: '' };

  const pipe = trimmed.indexOf('|');
  const [head, tail] =
    pipe >= 0
      ? [trimmed.slice(0, pipe), trimmed.slice(pipe + 1)]
      : splitFirstWord(trimmed);

  let verb = head.replace(/^\//, '').toLowerCase();
  verb = ALIASES[verb] ?? verb;
  let arg = tail.trim();

  // menu|cart → cart
  if (verb === 'menu') {
    const [inner, rest] = splitFirstWord(arg);
    verb = inner.toLowerCase() === 'track' ? 'track_help' : inner.toLowerCase();
    arg = rest;
  }
  return { verb, arg };
}

function splitFirstWord(text: string): [string, string] {
  const space = text.search(/\s/);
  return space === -1 ? [text, ''] : [text.slice(0, space), text.slice(space + 1).trim()];
}

export class ConversationRouter {
  constructor(private readonly deps: RouterDeps) {}

  async handle(message: InboundMessage): Promise<OutboundReply> {
    const input = (message.action ?? message.text ?? '').trim();
    const session = this.deps.sessions.get(message.sessionKey);
    const log = sessionLogger(message.sessionKey);
    const command = parseCommand(input);

    chatMessagesTotal.inc({ stage: this.currentStage(message.sessionKey, session) });
    log.debug({ verb: command.verb, isAction: message.action !== undefined }, 'Inbound chat message');

    // Free text belongs to whichever multi-step flow is open
    const isFreeText = message.action === undefined && !input.startsWith('/');
    if (isFreeText && this.deps.checkout.isActive(message.sessionKey)) {
      return this.continueCheckout(message, input);
    }
    if (isFreeText && session?.stage === 'ASK_SECRET') return this.register(message, input);
    if (isFreeText && session?.stage === 'ASK_COUNTRY') return this.saveCountry(message, input);

    if (command.verb === 'start') return this.start(message);
    if (command.verb === 'cancel') return this.cancel(message);
    if (command.verb === 'country') return this.saveCountry(message, command.arg);
    if (command.verb === 'pay') return this.continueCheckout(message, command.arg);

    return this.menuCommand(message, command);
  }

  // ───── Registration ───────────────────────────────────────

  private async start(message: InboundMessage): Promise<OutboundReply> {
    const resolved = await this.deps.identity.resolve(message.transportId);
    if (resolved) {
      this.deps.sessions.set(message.sessionKey, { stage: 'MAIN_MENU' });
      return this.mainMenu(message.sessionKey);
    }

    this.deps.sessions.set(message.sessionKey, { stage: 'ASK_SECRET' });
    return {
      stage: 'ASK_SECRET',
      text:
        'Welcome! Please send me your secret key phrase (this identifies you).\n' +
        'Pick something unique — this will be used as your account identifier.',
    };
  }

  private async register(message: InboundMessage, phrase: string): Promise<OutboundReply> {
    if (!phrase) {
      return { stage: 'ASK_SECRET', text: 'Please send a non-empty secret phrase.' };
    }

    const result = await this.deps.identity.registerOrGreet(phrase, message.transportId, message.displayName);
    this.deps.sessions.set(message.sessionKey, { stage: 'ASK_COUNTRY', pendingSecret: phrase });

    const greeting = result.created ? 'Secret saved!' : 'This secret phrase is already registered. Welcome back!';
    return {
      stage: 'ASK_COUNTRY',
      text: `${greeting}\nPlease choose your country:`,
      options: COUNTRIES.map((c) => ({ label: c, action: `country|${c}` })),
    };
  }

  private async saveCountry(message: InboundMessage, country: string): Promise<OutboundReply> {
    const session = this.deps.sessions.get(message.sessionKey);
    if (!session || session.stage !== 'ASK_COUNTRY' || !session.pendingSecret) {
      this.deps.sessions.delete(message.sessionKey);
      return { stage: 'ASK_SECRET', error: 'SESSION_EXPIRED', text: 'Session expired, please /start again.' };
    }

    const result = await this.deps.identity.setCountry(
      session.pendingSecret,
      country.trim(),
      message.transportId,
      message.displayName,
    );
    if (!result.ok) {
      if (result.code === 'INVALID_COUNTRY') {
        return {
          stage: 'ASK_COUNTRY',
          error: result.code,
          text: result.message,
          options: COUNTRIES.map((c) => ({ label: c, action: `country|${c}` })),
        };
      }
      this.deps.sessions.delete(message.sessionKey);
      return { stage: 'ASK_SECRET', error: result.code, text: result.message };
    }

    this.deps.sessions.set(message.sessionKey, { stage: 'MAIN_MENU' });
    const menu = this.mainMenu(message.sessionKey);
    return { ...menu, text: `Registration complete. Welcome!\n\n${menu.text}` };
  }

  // ───── Checkout ───────────────────────────────────────────

  private async continueCheckout(message: InboundMessage, text: string): Promise<OutboundReply> {
    const step = await this.deps.checkout.handle(message.sessionKey, text);
    return this.fromCheckoutStep(message.sessionKey, step);
  }

  private cancel(message: InboundMessage): OutboundReply {
    const step = this.deps.checkout.cancel(message.sessionKey);
    const session = this.deps.sessions.get(message.sessionKey);
    if (session && session.stage !== 'MAIN_MENU') {
      this.deps.sessions.delete(message.sessionKey);
    }
    return { stage: this.currentStage(message.sessionKey), text: step.message };
  }

  private fromCheckoutStep(sessionKey: string, step: CheckoutStep): OutboundReply {
    const options = step.options?.map((o) => ({ label: o, action: `pay|${o}` }));
    const reply: OutboundReply = { stage: this.currentStage(sessionKey), text: step.message, error: step.error };
    if (options) reply.options = options;
    if (step.stage === 'FINALIZED') reply.options = MAIN_MENU_OPTIONS;
    return reply;
  }

  // ───── Menu commands ──────────────────────────────────────

  private async menuCommand(message: InboundMessage, command: Command): Promise<OutboundReply> {
    const { sessionKey } = message;

    const account = await this.deps.identity.resolve(message.transportId);
    if (PUBLIC_VERBS.has(command.verb)) {
      return this.publicCommand(sessionKey, command, account);
    }
    if (!account) {
      return { stage: this.currentStage(sessionKey), error: 'NOT_REGISTERED', text: NOT_REGISTERED_TEXT };
    }
    // A registered caller acting from a new session lands in the menu
    if (!this.deps.sessions.get(sessionKey)) {
      this.deps.sessions.set(sessionKey, { stage: 'MAIN_MENU' });
    }

    switch (command.verb) {
      case 'products':
        return this.categories(sessionKey);
      case 'cat':
        return this.category(sessionKey, account, command.arg);
      case 'add':
        return this.addToCart(sessionKey, account, command.arg);
      case 'cart':
        return this.viewCart(sessionKey, account);
      case 'checkout':
        return this.fromCheckoutStep(sessionKey, await this.deps.checkout.begin(sessionKey, account.secret));
      case 'track':
        return this.track(sessionKey, command.arg);
      case 'history':
        return this.history(sessionKey, account);
      case 'applycoupon':
        return this.applyCoupon(sessionKey, account);
      case 'wish':
        return this.addToWishlist(sessionKey, account, command.arg);
      case 'wishlist':
        return this.viewWishlist(sessionKey, account);
      case 'download_address':
        return this.downloadAddress(sessionKey, account, command.arg);
      case 'pgp':
        return this.pgp(sessionKey);
      default:
        return this.mainMenu(sessionKey);
    }
  }

  private async publicCommand(
    sessionKey: string,
    command: Command,
    account: ResolvedAccount | null,
  ): Promise<OutboundReply> {
    const stage = this.currentStage(sessionKey);
    switch (command.verb) {
      case 'about':
        return {
          stage,
          text: 'About\nThis is a demo shop. Browse products, add to cart, and checkout with an encrypted delivery address.',
          options: [BACK_TO_MENU],
        };
      case 'contact':
      case 'support':
        return {
          stage,
          text: `Contact\nSupport: ${this.deps.supportContact}\nReply here and an agent will reach out.`,
          options: [BACK_TO_MENU],
        };
      case 'coupon':
        return {
          stage,
          text: this.deps.coupons.describe(),
          options: [{ label: 'Apply Coupon', action: 'applycoupon' }, BACK_TO_MENU],
        };
      case 'track_help':
        return { stage, text: 'Track Orders\nSend the command:\n/track ORDER_ID', options: [BACK_TO_MENU] };
      case 'ratings':
        return this.ratingStats(stage);
      case 'rate':
        return this.rate(stage, account, command.arg);
      default:
        return account
          ? this.mainMenu(sessionKey)
          : { stage, error: 'NOT_REGISTERED', text: NOT_REGISTERED_TEXT };
    }
  }

  private mainMenu(sessionKey: string): OutboundReply {
    return {
      stage: this.currentStage(sessionKey),
      text:
        `Welcome to the shop\n\n` +
        `Browse listings, grab a ${this.deps.coupons.percent}% coupon, track orders, ` +
        `secure your address with encryption, and more.\n\nChoose an option:`,
      options: MAIN_MENU_OPTIONS,
    };
  }

  private async categories(sessionKey: string): Promise<OutboundReply> {
    const categories = await this.deps.catalog.listCategories();
    if (categories.length === 0) {
      return { stage: this.currentStage(sessionKey), text: 'No product categories available.', options: [BACK_TO_MENU] };
    }
    return {
      stage: this.currentStage(sessionKey),
      text: 'Product categories:',
      options: [...categories.map((c) => ({ label: c, action: `cat|${c}` })), BACK_TO_MENU],
    };
  }

  private async category(sessionKey: string, account: ResolvedAccount, name: string): Promise<OutboundReply> {
    const stage = this.currentStage(sessionKey);
    const products = await this.deps.catalog.listProducts(name);
    if (products.length === 0) {
      return { stage, text: 'No products in this category.', options: [{ label: 'Back to categories', action: 'products' }] };
    }

    let text = `Products in ${name}:\n`;
    const options: ReplyOption[] = [];
    for (const p of products) {
      const availability = describeAvailability(p.availability);
      text += `\n${p.name} — ${formatUsd(p.price)}\n${p.description}\n${availability ? `${availability}\n` : ''}`;
      options.push({ label: `Add ${p.name}`, action: `add|${p.id}` });
      options.push({ label: 'Wishlist', action: `wish|${p.id}` });
    }

    const cart = await this.deps.cart.viewCart(account.secret);
    const subtotal = cart.ok ? cart.value.subtotal : 0;
    options.push({ label: `Cart: ${formatUsd(subtotal)}`, action: 'menu|cart' });
    options.push({ label: 'Checkout', action: 'inlinecheckout|start' });
    options.push({ label: 'Back to categories', action: 'products' });
    return { stage, text, options };
  }

  private async addToCart(sessionKey: string, account: ResolvedAccount, productId: string): Promise<OutboundReply> {
    const stage = this.currentStage(sessionKey);
    const result = await this.deps.cart.addItem(account.secret, productId);
    if (!result.ok) return { stage, error: result.code, text: result.message };
    return {
      stage,
      text: `Added ${result.value.line.name} to cart.`,
      options: [
        { label: 'Cart', action: 'menu|cart' },
        { label: 'Checkout', action: 'inlinecheckout|start' },
        BACK_TO_MENU,
      ],
    };
  }

  private async viewCart(sessionKey: string, account: ResolvedAccount): Promise<OutboundReply> {
    const stage = this.currentStage(sessionKey);
    const result = await this.deps.cart.viewCart(account.secret);
    if (!result.ok) return { stage, error: result.code, text: result.message };

    const { lines, subtotal, coupon } = result.value;
    if (lines.length === 0) {
      return { stage, text: 'Your cart is empty.', options: [BACK_TO_MENU] };
    }

    const text = ['Your cart:'];
    lines.forEach((line, idx) => text.push(`${idx + 1}. ${line.name} — ${formatUsd(line.price)}`));
    if (coupon === this.deps.coupons.code) {
      text.push(`\nCoupon applied: -${this.deps.coupons.percent}% (applies at checkout)`);
    }
    text.push(`\nSubtotal: ${formatUsd(subtotal)}`);
    return {
      stage,
      text: text.join('\n'),
      options: [{ label: 'Checkout', action: 'inlinecheckout|start' }, BACK_TO_MENU],
    };
  }

  private async track(sessionKey: string, orderId: string): Promise<OutboundReply> {
    const stage = this.currentStage(sessionKey);
    if (!orderId) return { stage, text: 'Usage: /track ORDER_ID' };

    const result = await this.deps.ledger.findById(orderId);
    if (!result.ok) return { stage, error: result.code, text: result.message };

    const order = result.value;
    return {
      stage,
      text: `Order ${order.orderId}: status ${order.status}. Items: ${order.items.length} Total: ${formatUsd(order.total)}`,
    };
  }

  private async history(sessionKey: string, account: ResolvedAccount): Promise<OutboundReply> {
    const stage = this.currentStage(sessionKey);
    const orders = await this.deps.ledger.findByOwner(account.secret);
    if (orders.length === 0) return { stage, text: 'No orders yet.', options: [BACK_TO_MENU] };

    const lines = ['Your orders:', ...orders.map((o) => `${o.orderId} — ${o.status} — ${formatUsd(o.total)}`)];
    return { stage, text: lines.join('\n'), options: [BACK_TO_MENU] };
  }

  private async applyCoupon(sessionKey: string, account: ResolvedAccount): Promise<OutboundReply> {
    const stage = this.currentStage(sessionKey);
    const result = await this.deps.coupons.apply(account.secret);
    if (!result.ok) return { stage, error: result.code, text: result.message };
    return {
      stage,
      text: `Coupon applied. You will get ${this.deps.coupons.percent}% off at checkout.`,
      options: [BACK_TO_MENU],
    };
  }

  private async addToWishlist(sessionKey: string, account: ResolvedAccount, productId: string): Promise<OutboundReply> {
    const stage = this.currentStage(sessionKey);
    const result = await this.deps.wishlist.add(account.secret, productId);
    if (!result.ok) return { stage, error: result.code, text: result.message };
    return {
      stage,
      text: result.value.added
        ? `Added ${result.value.entry.name} to wishlist.`
        : `${result.value.entry.name} is already on your wishlist.`,
    };
  }

  private async viewWishlist(sessionKey: string, account: ResolvedAccount): Promise<OutboundReply> {
    const stage = this.currentStage(sessionKey);
    const result = await this.deps.wishlist.list(account.secret);
    if (!result.ok) return { stage, error: result.code, text: result.message };
    if (result.value.length === 0) return { stage, text: 'Your wishlist is empty.', options: [BACK_TO_MENU] };

    const lines = ['Your wishlist:', ...result.value.map((w, idx) => `${idx + 1}. ${w.name} — ${formatUsd(w.price)}`)];
    return { stage, text: lines.join('\n'), options: [BACK_TO_MENU] };
  }

  private async downloadAddress(sessionKey: string, account: ResolvedAccount, orderId: string): Promise<OutboundReply> {
    const stage = this.currentStage(sessionKey);
    if (!orderId) return { stage, text: 'Usage: /download_address ORDER_ID' };

    const result = await this.deps.ledger.encryptedAddressFor(orderId, account.secret);
    if (!result.ok) return { stage, error: result.code, text: result.message };
    return {
      stage,
      text: `Encrypted delivery address for order ${orderId} attached.`,
      document: {
        filename: `${orderId}_address.asc`,
        content: result.value,
        caption: `Encrypted delivery address for order ${orderId}`,
      },
    };
  }

  private async pgp(sessionKey: string): Promise<OutboundReply> {
    const info = await this.deps.encryption.keyInfo();
    return {
      stage: this.currentStage(sessionKey),
      text:
        'Address Encryption\nYour delivery address is encrypted before storage.\n' +
        `Key ID: ${info.keyId} (${info.algorithm})`,
      options: [BACK_TO_MENU],
    };
  }

  private async ratingStats(stage: ConversationStage): Promise<OutboundReply> {
    const stats = await this.deps.ratings.stats();
    const summary =
      stats.count > 0
        ? `${stats.count} rating${stats.count === 1 ? '' : 's'}, average ${stats.average.toFixed(1)}`
        : 'No ratings yet.';
    return {
      stage,
      text: `Ratings\n${summary}\nTap to rate:`,
      options: [1, 2, 3, 4, 5].map((n) => ({ label: '★'.repeat(n), action: `rate|${n}` })),
    };
  }

  private async rate(stage: ConversationStage, account: ResolvedAccount | null, arg: string): Promise<OutboundReply> {
    const value = /^\d+$/.test(arg) ? Number(arg) : NaN;
    const result = await this.deps.ratings.submit(account?.secret ?? null, value);
    if (!result.ok) return { stage, error: result.code, text: result.message };
    return { stage, text: `Thanks for rating ${'★'.repeat(result.value.value)}!` };
  }

  // ───── Helpers ────────────────────────────────────────────

  private currentStage(sessionKey: string, session?: ConversationSession): ConversationStage {
    const checkoutStage = this.deps.checkout.stage(sessionKey);
    if (
      checkoutStage === 'AWAITING_ADDRESS' ||
      checkoutStage === 'AWAITING_NOTES' ||
      checkoutStage === 'AWAITING_PAYMENT_TYPE'
    ) {
      return checkoutStage;
    }
    return (session ?? this.deps.sessions.get(sessionKey))?.stage ?? 'MAIN_MENU';
  }
}
