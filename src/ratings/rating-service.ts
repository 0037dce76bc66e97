/**
 * Shop Rating Service
 *
 * Append-only 1–5 star ratings with a running average.
 */

import { DataStore, Rating } from '../store/types';
import { OpResult, ok, fail } from '../common/errors';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'rating-service' });

export const ANONYMOUS_RATER = 'anonymous';

export interface RatingStats {
  count: number;
  /** Rounded to one decimal; 0 when there are no ratings */
  average: number;
}

export class RatingService {
  constructor(
    private readonly store: DataStore,
    private readonly now: () => number = Date.now,
  ) {}

  async submit(user: string | null, value: number): Promise<OpResult<Rating>> {
    if (!Number.isInteger(value) || value < 1 || value > 5) {
      return fail('INVALID_RATING', 'Invalid rating value.');
    }

    const rating: Rating = {
      user: user ?? ANONYMOUS_RATER,
      value,
      ts: Math.floor(this.now() / 1000),
    };
    await this.store.transact((doc) => {
      doc.ratings.push(rating);
    });
    log.info({ value, anonymous: user === null }, 'Rating recorded');
    return ok(rating);
  }

  async stats(): Promise<RatingStats> {
    const { ratings } = await this.store.read();
    if (ratings.length === 0) return { count: 0, average: 0 };
    const total = ratings.reduce((sum, r) => sum + r.value, 0);
    return { count: ratings.length, average: Math.round((total / ratings.length) * 10) / 10 };
  }
}
