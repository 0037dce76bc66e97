/**
 * Data Store — single source of truth for users, catalog, orders and config
 *
 * The whole document is held in memory as the last committed snapshot.
 * Every mutation runs under one process-wide write lock against a private
 * copy of that snapshot; the copy is persisted through a backend and only
 * then published. Readers always receive a copy of a committed snapshot.
 *
 * Factory pattern: Redis-backed or JSON-file backend, in-memory for tests.
 */

import { promises as fs } from 'fs';
import path from 'path';
import Redis from 'ioredis';
import { DataStore, DocumentBackend, StoreDocument, emptyDocument } from './types';
import { isStoreDocument, documentErrors } from './document-schema';
import { WriteLock } from './write-lock';
import { StoreCorruptError, StorePersistError } from '../common/errors';
import { logger } from '../observability/logger';
import { storeCommitDuration } from '../observability/metrics';

const log = logger.child({ component: 'data-store' });

// ───── Backends ─────────────────────────────────────────────────

/**
 * JSON file on disk. Writes go to a temp file in the same directory which
 * is then renamed over the target, so a crash mid-write leaves the previous
 * document intact.
 */
export class JsonFileBackend implements DocumentBackend {
  readonly name = 'json-file';

  constructor(private readonly filePath: string) {}

  async load(): Promise<unknown | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null;
      throw err;
    }

    try {
      return JSON.parse(raw);
    } catch {
      throw new StoreCorruptError(`Store file ${this.filePath} is not valid JSON`);
    }
  }

  async save(doc: StoreDocument): Promise<void> {
    const dir = path.dirname(this.filePath);
    await fs.mkdir(dir, { recursive: true });

    const tmpPath = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.${Date.now()}.tmp`);
    try {
      await fs.writeFile(tmpPath, JSON.stringify(doc, null, 2), 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw err;
    }
  }
}

/** Whole document under one Redis key; SET replaces it atomically */
export class RedisBackend implements DocumentBackend {
  readonly name = 'redis';
  private readonly key: string;

  constructor(private readonly redis: Redis, keyPrefix: string) {
    this.key = `${keyPrefix}store:document`;
  }

  async load(): Promise<unknown | null> {
    const raw = await this.redis.get(this.key);
    if (raw === null) return null;
    try {
      return JSON.parse(raw);
    } catch {
      throw new StoreCorruptError(`Redis key ${this.key} does not hold valid JSON`);
    }
  }

  async save(doc: StoreDocument): Promise<void> {
    await this.redis.set(this.key, JSON.stringify(doc));
  }
}

/** Serialised copy held in process memory (dev/test) */
export class MemoryBackend implements DocumentBackend {
  readonly name = 'memory';
  private raw: string | null;

  constructor(initial?: StoreDocument) {
    this.raw = initial ? JSON.stringify(initial) : null;
  }

  async load(): Promise<unknown | null> {
    return this.raw === null ? null : JSON.parse(this.raw);
  }

  async save(doc: StoreDocument): Promise<void> {
    this.raw = JSON.stringify(doc);
  }
}

// ───── Store ────────────────────────────────────────────────────

export class DocumentDataStore implements DataStore {
  private committed: StoreDocument | null = null;
  private loading: Promise<void> | null = null;
  private readonly lock = new WriteLock();

  constructor(
    private readonly backend: DocumentBackend,
    private readonly seed?: StoreDocument,
  ) {}

  async read(): Promise<StoreDocument> {
    return structuredClone(await this.latest());
  }

  async transact<T>(mutate: (doc: StoreDocument) => T | Promise<T>): Promise<T> {
    await this.ensureLoaded();

    return this.lock.run(async () => {
      const endTimer = storeCommitDuration.startTimer({ backend: this.backend.name });
      const base = await this.latest();
      const draft = structuredClone(base);
      const before = JSON.stringify(draft);

      let result: T;
      try {
        result = await mutate(draft);
      } catch (err) {
        endTimer({ outcome: 'aborted' });
        throw err;
      }

      if (JSON.stringify(draft) === before) {
        endTimer({ outcome: 'unchanged' });
        return structuredClone(result);
      }

      if (!isStoreDocument(draft)) {
        endTimer({ outcome: 'rejected' });
        throw new StorePersistError(`Refusing to persist invalid document: ${documentErrors()}`);
      }

      try {
        await this.backend.save(draft);
      } catch (err) {
        endTimer({ outcome: 'failed' });
        log.error({ err, backend: this.backend.name }, 'Store persist failed; committed document unchanged');
        throw new StorePersistError('Failed to persist store document', err);
      }

      this.committed = draft;
      endTimer({ outcome: 'committed' });
      return structuredClone(result);
    });
  }

  async ping(): Promise<boolean> {
    try {
      await this.ensureLoaded();
      return true;
    } catch {
      return false;
    }
  }

  private async latest(): Promise<StoreDocument> {
    await this.ensureLoaded();
    if (!this.committed) throw new StoreCorruptError('Store document not loaded');
    return this.committed;
  }

  private ensureLoaded(): Promise<void> {
    if (this.committed) return Promise.resolve();
    if (!this.loading) {
      // A failed load is not cached; the next caller tries the backend again
      this.loading = this.load().catch((err: unknown) => {
        this.loading = null;
        throw err;
      });
    }
    return this.loading;
  }

  private async load(): Promise<void> {
    const raw = await this.backend.load();
    if (raw === null) {
      this.committed = this.seed ? structuredClone(this.seed) : emptyDocument();
      log.info({ backend: this.backend.name }, 'No persisted document; starting from seed');
      return;
    }

    if (!isStoreDocument(raw)) {
      const detail = documentErrors();
      log.error({ backend: this.backend.name, detail }, 'Persisted store document failed validation');
      throw new StoreCorruptError(`Store document failed validation: ${detail}`);
    }

    this.committed = raw;
    log.info(
      {
        backend: this.backend.name,
        users: Object.keys(raw.users).length,
        orders: raw.orders.length,
        categories: Object.keys(raw.products).length,
      },
      'Store document loaded',
    );
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

// ───── Factory ──────────────────────────────────────────────────

export interface DataStoreOptions {
  redis?: Redis;
  keyPrefix?: string;
  dataFile?: string;
  seed?: StoreDocument;
}

export function createDataStore(options: DataStoreOptions = {}): DocumentDataStore {
  if (options.redis) {
    logger.info('Data store: Redis-backed');
    return new DocumentDataStore(new RedisBackend(options.redis, options.keyPrefix ?? ''), options.seed);
  }
  if (options.dataFile) {
    logger.info({ file: options.dataFile }, 'Data store: JSON file');
    return new DocumentDataStore(new JsonFileBackend(options.dataFile), options.seed);
  }
  logger.warn('Using in-memory data store (nothing is persisted)');
  return new DocumentDataStore(new MemoryBackend(options.seed), options.seed);
}
