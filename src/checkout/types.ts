import { Order, PaymentMethod } from '../store/types';
import { ErrorCode } from '../common/errors';

/** Checkout stages */
export type CheckoutStage =
  | 'IDLE'
  | 'AWAITING_ADDRESS'
  | 'AWAITING_NOTES'
  | 'AWAITING_PAYMENT_TYPE'
  | 'FINALIZED'
  | 'CANCELLED';

/** Linear flow; any non-terminal stage may be cancelled */
export const CHECKOUT_TRANSITIONS: Record<CheckoutStage, CheckoutStage[]> = {
  IDLE: ['AWAITING_ADDRESS', 'CANCELLED'],
  AWAITING_ADDRESS: ['AWAITING_NOTES', 'CANCELLED'],
  AWAITING_NOTES: ['AWAITING_PAYMENT_TYPE', 'CANCELLED'],
  // IDLE: cart emptied underneath the draft
  AWAITING_PAYMENT_TYPE: ['FINALIZED', 'IDLE', 'CANCELLED'],
  FINALIZED: [],
  CANCELLED: [],
};

/** In-progress checkout for one conversation. Never persisted. */
export interface CheckoutDraft {
  /** Account that started the checkout */
  secret: string;
  stage: CheckoutStage;
  /** Plaintext echo, dropped with the draft */
  addressPlain?: string;
  addressEncrypted?: string;
  notes: string;
  paymentType?: PaymentMethod;
  /** Set while an async step for this draft is running */
  busy: boolean;
  /** Set once the order transaction has claimed the draft; cancel is refused from then on */
  committing: boolean;
  startedAt: number;
}

export interface CheckoutStep {
  stage: CheckoutStage;
  message: string;
  /** Quick replies for the transport to render */
  options?: string[];
  error?: ErrorCode;
  order?: Order;
  /** Payment destination for the chosen method */
  payTo?: string;
}
