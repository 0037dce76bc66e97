/**
 * Identity Resolver
 *
 * Maps a transport-level user id to an account keyed by its secret phrase.
 * The phrase is the only credential: presenting a known phrase from any
 * transport id re-binds that id to the account.
 */

import { createHash } from 'crypto';
import { Account, DataStore, StoreDocument } from '../store/types';
import { OpResult, ok, fail } from '../common/errors';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'identity-service' });

export const COUNTRIES = ['USA', 'UK', 'Nigeria', 'India', 'Other'] as const;
export type Country = (typeof COUNTRIES)[number];

export interface ResolvedAccount {
  secret: string;
  account: Account;
}

export interface RegistrationResult extends ResolvedAccount {
  created: boolean;
}

/** Stable, non-reversible tag for an account, safe to log */
export function accountRef(secret: string): string {
  return createHash('sha256').update(secret).digest('hex').slice(0, 12);
}

export function isCountry(value: string): value is Country {
  return COUNTRIES.some((c) => c === value);
}

/** Find the secret currently bound to a transport id */
export function findSecretByTransport(doc: StoreDocument, transportId: string): string | null {
  for (const [secret, account] of Object.entries(doc.users)) {
    if (account.transportId === transportId) return secret;
  }
  return null;
}

/** A transport id belongs to at most one account: clear it everywhere but `secret` */
function bindTransport(doc: StoreDocument, secret: string, transportId: string): void {
  for (const [other, account] of Object.entries(doc.users)) {
    if (other !== secret && account.transportId === transportId) {
      account.transportId = null;
      log.info({ from: accountRef(other), to: accountRef(secret) }, 'Transport identity re-bound');
    }
  }
  doc.users[secret].transportId = transportId;
}

export class IdentityService {
  constructor(private readonly store: DataStore) {}

  /** Look up the account bound to a transport id. Always reads the latest committed state. */
  async resolve(transportId: string): Promise<ResolvedAccount | null> {
    const doc = await this.store.read();
    const secret = findSecretByTransport(doc, transportId);
    if (secret === null) return null;
    return { secret, account: doc.users[secret] };
  }

  /**
   * Log in by phrase, or create the account on first sight of the phrase.
   * An existing account keeps its country, cart, wishlist, coupon and orders.
   */
  async registerOrGreet(secret: string, transportId: string, displayName: string): Promise<RegistrationResult> {
    return this.store.transact((doc) => {
      const existing = doc.users[secret];
      if (existing) {
        bindTransport(doc, secret, transportId);
        log.info({ account: accountRef(secret) }, 'Known secret phrase; welcome back');
        return { secret, account: doc.users[secret], created: false };
      }

      doc.users[secret] = {
        transportId: null,
        displayName,
        country: null,
        cart: [],
        wishlist: [],
        coupon: null,
        orders: [],
      };
      bindTransport(doc, secret, transportId);
      log.info({ account: accountRef(secret) }, 'Account created');
      return { secret, account: doc.users[secret], created: true };
    });
  }

  /** Record the country picked during registration and refresh the transport binding */
  async setCountry(
    secret: string,
    country: string,
    transportId: string,
    displayName: string,
  ): Promise<OpResult<ResolvedAccount>> {
    if (!isCountry(country)) {
      return fail('INVALID_COUNTRY', `Please choose one of: ${COUNTRIES.join(', ')}.`);
    }

    return this.store.transact((doc): OpResult<ResolvedAccount> => {
      const account = doc.users[secret];
      if (!account) {
        return fail('NOT_REGISTERED', 'User not found. Please /start again.');
      }
      account.country = country;
      account.displayName = displayName || account.displayName;
      bindTransport(doc, secret, transportId);
      log.info({ account: accountRef(secret), country }, 'Country saved');
      return ok({ secret, account });
    });
  }
}
