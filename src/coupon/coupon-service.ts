/**
 * Coupon Engine — one discount slot per account
 *
 * `apply` drops the shop's coupon code into the slot; the order ledger
 * reads it when pricing an order and `consume` empties it afterwards.
 * No expiry and no stacking.
 */

import { Account, DataStore } from '../store/types';
import { accountRef } from '../identity/identity-service';
import { OpResult, ok, fail } from '../common/errors';
import { round2 } from '../common/money';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'coupon-service' });

export interface CouponConfig {
  code: string;
  percent: number;
}

export class CouponService {
  constructor(
    private readonly store: DataStore,
    private readonly config: CouponConfig,
  ) {}

  get code(): string {
    return this.config.code;
  }

  get percent(): number {
    return this.config.percent;
  }

  describe(): string {
    return `${this.config.percent}% OFF COUPON\nUse code ${this.config.code}.\nTap Apply Coupon to attach it to your next order.`;
  }

  async apply(secret: string): Promise<OpResult<{ code: string }>> {
    return this.store.transact((doc): OpResult<{ code: string }> => {
      const account = doc.users[secret];
      if (!account) return fail('NOT_REGISTERED', 'Please /start to register first.');
      account.coupon = this.config.code;
      log.info({ account: accountRef(secret), code: this.config.code }, 'Coupon attached');
      return ok({ code: this.config.code });
    });
  }

  /** Discount earned by the account's slot on this subtotal; 0 unless the slot holds the valid code */
  discountFor(account: Account, subtotal: number): number {
    if (account.coupon !== this.config.code) return 0;
    return round2(subtotal * (this.config.percent / 100));
  }

  /** Empty the slot. Only called while an order is being recorded. */
  consume(account: Account): void {
    account.coupon = null;
  }
}
