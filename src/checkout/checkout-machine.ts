import { CHECKOUT_TRANSITIONS, CheckoutDraft, CheckoutStage } from './types';
import { logger } from '../observability/logger';
import { checkoutTransitions } from '../observability/metrics';

const log = logger.child({ component: 'checkout-machine' });

export class CheckoutStateMachine {
  /**
   * Move the draft to `to` when CHECKOUT_TRANSITIONS allows it. Returns
   * false and leaves the draft alone otherwise.
   */
  advance(sessionKey: string, draft: CheckoutDraft, to: CheckoutStage, reason: string): boolean {
    const from = draft.stage;
    if (!CHECKOUT_TRANSITIONS[from].includes(to)) {
      log.warn({ sessionKey, from, to, reason }, 'Invalid checkout transition attempted');
      return false;
    }

    draft.stage = to;
    checkoutTransitions.inc({ from, to });
    log.info({ sessionKey, from, to, reason }, 'Checkout transition');
    return true;
  }
}

export const checkoutStateMachine = new CheckoutStateMachine();
