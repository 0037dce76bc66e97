/**
 * Checkout Service — drives address → notes → payment type → order
 *
 * The draft lives only in session memory until the payment choice. The
 * final step re-reads the cart and, in one store transaction, prices the
 * order, appends it to the ledger, clears the cart and consumes the coupon.
 * Aborting before that point leaves the store untouched.
 */

import { DataStore, Order, PAYMENT_METHODS, PaymentConfig, PaymentMethod } from '../store/types';
import { SessionMemory } from '../session/session-memory';
import { AddressEncryptionService } from '../security/address-encryptor';
import { CouponService } from '../coupon/coupon-service';
import { OrderLedger } from '../orders/order-ledger';
import { cartSubtotal, emptyCart } from '../cart/cart-service';
import { CheckoutStateMachine, checkoutStateMachine } from './checkout-machine';
import { CheckoutDraft, CheckoutStage, CheckoutStep } from './types';
import { EncryptionUnavailableError } from '../common/errors';
import { formatUsd } from '../common/money';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'checkout-service' });

const PROMPT_ADDRESS = 'Please enter delivery address:';
const PROMPT_NOTES = 'Address saved (encrypted). Any delivery notes? (or send "skip")';
const PROMPT_PAYMENT = 'Choose payment type:';
const PAYMENT_OPTIONS: string[] = [...PAYMENT_METHODS];

type FinalizeOutcome =
  | { kind: 'created'; order: Order; payTo: string }
  | { kind: 'empty_cart' }
  | { kind: 'not_registered' }
  | { kind: 'cancelled' };

export function parsePaymentChoice(input: string): PaymentMethod | null {
  const normalized = input.trim().toUpperCase();
  return PAYMENT_METHODS.find((m) => m === normalized) ?? null;
}

export function paymentDestination(payment: PaymentConfig, method: PaymentMethod): string {
  const address = method === 'BTC' ? payment.btc_address : payment.usdt_address;
  return address || 'N/A';
}

export class CheckoutService {
  constructor(
    private readonly store: DataStore,
    private readonly drafts: SessionMemory<CheckoutDraft>,
    private readonly encryption: AddressEncryptionService,
    private readonly coupons: CouponService,
    private readonly ledger: OrderLedger,
    private readonly machine: CheckoutStateMachine = checkoutStateMachine,
    private readonly now: () => number = Date.now,
  ) {}

  /** Stage of the session's draft, IDLE when there is none */
  stage(sessionKey: string): CheckoutStage {
    return this.drafts.get(sessionKey)?.stage ?? 'IDLE';
  }

  isActive(sessionKey: string): boolean {
    return this.drafts.get(sessionKey) !== undefined;
  }

  /** IDLE → AWAITING_ADDRESS, only with a non-empty cart */
  async begin(sessionKey: string, secret: string): Promise<CheckoutStep> {
    const doc = await this.store.read();
    const account = doc.users[secret];
    if (!account) {
      return { stage: 'IDLE', error: 'NOT_REGISTERED', message: 'You need to /start and register with a secret phrase first.' };
    }
    if (account.cart.length === 0) {
      return { stage: 'IDLE', error: 'EMPTY_CART', message: 'Your cart is empty. Add products first.' };
    }

    const draft: CheckoutDraft = {
      secret,
      stage: 'IDLE',
      notes: '',
      busy: false,
      committing: false,
      startedAt: this.now(),
    };
    this.machine.advance(sessionKey, draft, 'AWAITING_ADDRESS', 'checkout_started');
    this.drafts.set(sessionKey, draft);
    return { stage: draft.stage, message: PROMPT_ADDRESS };
  }

  /** Feed one user message to the draft's current stage */
  async handle(sessionKey: string, text: string): Promise<CheckoutStep> {
    const draft = this.drafts.get(sessionKey);
    if (!draft) {
      return { stage: 'IDLE', error: 'SESSION_EXPIRED', message: 'Checkout session expired. Please start checkout again.' };
    }
    if (draft.busy) {
      return { stage: draft.stage, message: 'Still working on your previous message…' };
    }

    switch (draft.stage) {
      case 'AWAITING_ADDRESS':
        return this.submitAddress(sessionKey, draft, text);
      case 'AWAITING_NOTES':
        return this.submitNotes(sessionKey, draft, text);
      case 'AWAITING_PAYMENT_TYPE':
        return this.submitPayment(sessionKey, draft, text);
      default:
        this.drafts.delete(sessionKey);
        return { stage: 'IDLE', message: 'No checkout in progress.' };
    }
  }

  /**
   * Discard the draft; the persisted cart and account are not touched.
   * Refused once the order transaction has claimed the draft.
   */
  cancel(sessionKey: string): CheckoutStep {
    const draft = this.drafts.get(sessionKey);
    if (!draft) return { stage: 'IDLE', message: 'Cancelled.' };
    if (draft.committing) {
      log.info({ sessionKey }, 'Cancel refused: order already being recorded');
      return { stage: draft.stage, message: 'Too late to cancel: your order is being placed.' };
    }

    this.machine.advance(sessionKey, draft, 'CANCELLED', 'user_cancelled');
    this.drafts.delete(sessionKey);
    return { stage: 'CANCELLED', message: 'Cancelled.' };
  }

  // ───── Stage handlers ─────────────────────────────────────

  private async submitAddress(sessionKey: string, draft: CheckoutDraft, text: string): Promise<CheckoutStep> {
    const address = text.trim();
    if (!address) {
      return { stage: draft.stage, message: PROMPT_ADDRESS };
    }

    draft.busy = true;
    let encrypted: string;
    try {
      encrypted = await this.encryption.encryptAddress(address);
    } catch (err) {
      draft.busy = false;
      if (err instanceof EncryptionUnavailableError) {
        log.warn({ sessionKey }, 'Address capture blocked: encryption unavailable');
        return {
          stage: draft.stage,
          error: 'ENCRYPTION_UNAVAILABLE',
          message: 'Address encryption is unavailable right now. Please send your address again later, or /cancel.',
        };
      }
      throw err;
    }
    draft.busy = false;

    // Cancelled or expired while encrypting: nothing to advance
    if (this.drafts.get(sessionKey) !== draft) {
      return { stage: 'CANCELLED', message: 'Cancelled.' };
    }

    draft.addressPlain = address;
    draft.addressEncrypted = encrypted;
    this.machine.advance(sessionKey, draft, 'AWAITING_NOTES', 'address_captured');
    return { stage: draft.stage, message: PROMPT_NOTES };
  }

  private async submitNotes(sessionKey: string, draft: CheckoutDraft, text: string): Promise<CheckoutStep> {
    draft.notes = text.trim().toLowerCase() === 'skip' ? '' : text;
    this.machine.advance(sessionKey, draft, 'AWAITING_PAYMENT_TYPE', 'notes_captured');
    return { stage: draft.stage, message: PROMPT_PAYMENT, options: PAYMENT_OPTIONS };
  }

  private async submitPayment(sessionKey: string, draft: CheckoutDraft, text: string): Promise<CheckoutStep> {
    const paymentType = parsePaymentChoice(text);
    if (!paymentType) {
      return {
        stage: draft.stage,
        error: 'INVALID_PAYMENT_CHOICE',
        message: 'Invalid payment type. Choose BTC or USDT.',
        options: PAYMENT_OPTIONS,
      };
    }
    draft.paymentType = paymentType;

    draft.busy = true;
    let outcome: FinalizeOutcome;
    try {
      outcome = await this.finalize(sessionKey, draft, paymentType);
    } finally {
      draft.busy = false;
      draft.committing = false;
    }

    switch (outcome.kind) {
      case 'cancelled':
        return { stage: 'CANCELLED', message: 'Cancelled.' };

      case 'not_registered':
        this.drafts.delete(sessionKey);
        return { stage: 'IDLE', error: 'NOT_REGISTERED', message: 'User not found. Please /start again.' };

      case 'empty_cart':
        this.machine.advance(sessionKey, draft, 'IDLE', 'cart_emptied');
        this.drafts.delete(sessionKey);
        return { stage: 'IDLE', error: 'EMPTY_CART', message: 'Your cart is empty. Aborting.' };

      case 'created': {
        this.machine.advance(sessionKey, draft, 'FINALIZED', 'order_created');
        this.drafts.delete(sessionKey);
        return {
          stage: draft.stage,
          message: this.paymentInstructions(outcome.order, outcome.payTo),
          order: outcome.order,
          payTo: outcome.payTo,
        };
      }
    }
  }

  private finalize(sessionKey: string, draft: CheckoutDraft, paymentType: PaymentMethod): Promise<FinalizeOutcome> {
    return this.store.transact((doc): FinalizeOutcome => {
      // Cancelled or expired while queued behind other writes
      if (this.drafts.get(sessionKey) !== draft) return { kind: 'cancelled' };
      draft.committing = true;

      const account = doc.users[draft.secret];
      if (!account) return { kind: 'not_registered' };
      if (account.cart.length === 0) return { kind: 'empty_cart' };

      const items = account.cart.map((line) => ({ ...line }));
      const discount = this.coupons.discountFor(account, cartSubtotal(items));

      const order = this.ledger.appendOrder(doc, draft.secret, {
        items,
        addressEncrypted: draft.addressEncrypted ?? '',
        notes: draft.notes,
        paymentType,
        discount,
        coupon: account.coupon ?? '',
      });

      emptyCart(account);
      this.coupons.consume(account);
      return { kind: 'created', order, payTo: paymentDestination(doc.payment, paymentType) };
    });
  }

  private paymentInstructions(order: Order, payTo: string): string {
    const lines = [
      `Order ${order.orderId} created!`,
      `Total: ${order.total.toFixed(2)} ${order.paymentType}`,
      `Pay to: ${payTo}`,
    ];
    if (order.discount > 0) {
      lines.push(
        `(${this.coupons.percent}% coupon applied: -${formatUsd(order.discount)} | Subtotal: ${formatUsd(order.subtotal)})`,
      );
    }
    lines.push('');
    lines.push(`Your address is encrypted. Send /download_address ${order.orderId} to get your encrypted address file.`);
    lines.push(`Then send /track ${order.orderId} to see status.`);
    return lines.join('\n');
  }
}
