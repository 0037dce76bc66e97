import { CouponService } from '../../src/coupon/coupon-service';
import { account, memoryStore } from '../helpers/fixtures';

describe('CouponService', () => {
  const config = { code: 'SAVE10', percent: 10 };

  describe('apply', () => {
    it('should put the configured code into the account slot', async () => {
      const store = memoryStore();
      const coupons = new CouponService(store, config);

      const result = await coupons.apply('alpha-phrase');
      expect(result).toEqual({ ok: true, value: { code: 'SAVE10' } });
      expect((await store.read()).users['alpha-phrase'].coupon).toBe('SAVE10');
    });

    it('should reject unregistered callers', async () => {
      const coupons = new CouponService(memoryStore(), config);
      const result = await coupons.apply('ghost-phrase');
      expect(result).toEqual({ ok: false, code: 'NOT_REGISTERED', message: 'Please /start to register first.' });
    });
  });

  describe('discountFor', () => {
    const coupons = new CouponService(memoryStore(), config);

    it('should take the percentage off when the slot holds the code', () => {
      expect(coupons.discountFor(account({ coupon: 'SAVE10' }), 25)).toBe(2.5);
    });

    it('should round the discount to cents', () => {
      expect(coupons.discountFor(account({ coupon: 'SAVE10' }), 33.33)).toBe(3.33);
    });

    it('should send an exact half-cent discount to the even cent', () => {
      const holder = account({ coupon: 'SAVE10' });
      expect(coupons.discountFor(holder, 1.25)).toBe(0.12);
      expect(coupons.discountFor(holder, 6.25)).toBe(0.62);
      expect(coupons.discountFor(holder, 11.25)).toBe(1.12);
    });

    it('should give nothing for an empty slot', () => {
      expect(coupons.discountFor(account(), 25)).toBe(0);
    });

    it('should give nothing for a code other than the configured one', () => {
      expect(coupons.discountFor(account({ coupon: 'OLD5' }), 25)).toBe(0);
    });
  });

  describe('consume', () => {
    it('should empty the slot', () => {
      const coupons = new CouponService(memoryStore(), config);
      const acct = account({ coupon: 'SAVE10' });
      coupons.consume(acct);
      expect(acct.coupon).toBeNull();
    });
  });

  describe('describe', () => {
    it('should mention the percentage and code', () => {
      const coupons = new CouponService(memoryStore(), { code: 'SPRING20', percent: 20 });
      expect(coupons.describe()).toBe(
        '20% OFF COUPON\nUse code SPRING20.\nTap Apply Coupon to attach it to your next order.',
      );
    });
  });
});
