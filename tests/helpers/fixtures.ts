import { Account, StoreDocument } from '../../src/store/types';
import { DocumentDataStore, MemoryBackend } from '../../src/store/data-store';

export const FIXED_NOW = 1_700_000_000_000;

/** Mutable clock for code that takes a `now` function */
export class TestClock {
  constructor(public ms = FIXED_NOW) {}

  readonly now = (): number => this.ms;

  advance(ms: number): void {
    this.ms += ms;
  }
}

export class Deferred<T> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => undefined;
  reject: (reason: unknown) => void = () => undefined;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
  }
}

export function account(overrides: Partial<Account> = {}): Account {
  return {
    transportId: null,
    displayName: '',
    country: null,
    cart: [],
    wishlist: [],
    coupon: null,
    orders: [],
    ...overrides,
  };
}

/**
 * Two categories, three products, one registered account (`alpha-phrase`
 * on transport id `tg-1`) with an empty cart.
 */
export function sampleDocument(): StoreDocument {
  return {
    users: {
      'alpha-phrase': account({ transportId: 'tg-1', displayName: 'Alpha', country: 'USA' }),
    },
    products: {
      Apparel: [
        { id: 'tee-black', name: 'Black Tee', price: 15, description: 'Cotton tee', quantities: { S: 3, M: 2 } },
        { id: 'hoodie-grey', name: 'Grey Hoodie', price: 30, description: 'Fleece hoodie' },
      ],
      Accessories: [
        { id: 'cap-navy', name: 'Navy Cap', price: 10, description: 'Six-panel cap', quantities: ['CAP-NV-1', 'CAP-NV-2'] },
      ],
    },
    orders: [],
    payment: { btc_address: 'bc1-test-btc', usdt_address: 'T-test-usdt' },
    pgp_config: { key_generated: false },
    ratings: [],
  };
}

export function memoryStore(doc: StoreDocument = sampleDocument()): DocumentDataStore {
  return new DocumentDataStore(new MemoryBackend(doc));
}
