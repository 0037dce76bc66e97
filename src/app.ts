import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { env } from './config/env';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { DataStore } from './store/types';
import { createDataStore } from './store/data-store';
import { loadSeed } from './store/seed';
import { IdentityService } from './identity/identity-service';
import { CatalogService } from './catalog/catalog-service';
import { CartService } from './cart/cart-service';
import { CouponService } from './coupon/coupon-service';
import { WishlistService } from './wishlist/wishlist-service';
import { RatingService } from './ratings/rating-service';
import { OrderIdMinter, OrderLedger } from './orders/order-ledger';
import { AddressEncryptor, AesGcmAddressEncryptor, AddressEncryptionService } from './security/address-encryptor';
import { SessionMemory } from './session/session-memory';
import { CheckoutService } from './checkout/checkout-service';
import { checkoutStateMachine } from './checkout/checkout-machine';
import { CheckoutDraft } from './checkout/types';
import { ConversationRouter } from './conversation/conversation-router';
import { ConversationSession } from './conversation/types';
import { registerChatRoutes } from './channels/chat-routes';
import { registerHealthRoutes } from './health/health-routes';

export interface AppOptions {
  /** Use this store instead of building one from env (Redis / JSON file) */
  store?: DataStore;
  encryptor?: AddressEncryptor;
  now?: () => number;
}

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
  store: DataStore;
  router: ConversationRouter;
  /** Stop background sweepers */
  stop(): void;
}

async function connectRedis(url: string): Promise<Redis | undefined> {
  try {
    const redisInstance = new Redis(url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using JSON file store');
    return undefined;
  }
}

export async function buildApp(options: AppOptions = {}): Promise<AppContext> {
  const now = options.now ?? Date.now;

  // Initialize Fastify
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
  });

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  // ───── Persistence ─────
  let redis: Redis | undefined;
  let store = options.store;
  if (!store) {
    redis = env.redis.url ? await connectRedis(env.redis.url) : undefined;
    store = createDataStore({
      redis,
      keyPrefix: env.redis.keyPrefix,
      dataFile: env.store.dataFile,
      seed: await loadSeed(env.store.seedFile),
    });
    // A corrupt persisted document must stop startup, not the first request
    await store.read();
  }

  // ───── Domain services ─────
  const identity = new IdentityService(store);
  const catalog = new CatalogService(store);
  const cart = new CartService(store);
  const coupons = new CouponService(store, { code: env.coupon.code, percent: env.coupon.percent });
  const wishlist = new WishlistService(store);
  const ratings = new RatingService(store, now);
  const ledger = new OrderLedger(store, new OrderIdMinter(now), now);
  const encryption = new AddressEncryptionService(
    options.encryptor ?? new AesGcmAddressEncryptor(env.encryption.key),
    store,
    now,
  );

  // ───── Conversation memory ─────
  const idleTimeoutMs = env.drafts.idleTimeoutMinutes * 60 * 1000;
  const sweepIntervalMs = env.drafts.sweepIntervalSeconds * 1000;
  const drafts = new SessionMemory<CheckoutDraft>('checkout-drafts', idleTimeoutMs, now, (sessionKey, draft) => {
    logger.info({ sessionKey, stage: draft.stage }, 'Checkout draft expired');
  });
  const sessions = new SessionMemory<ConversationSession>('conversation-sessions', idleTimeoutMs, now);
  drafts.startSweeper(sweepIntervalMs);
  sessions.startSweeper(sweepIntervalMs);

  const checkout = new CheckoutService(store, drafts, encryption, coupons, ledger, checkoutStateMachine, now);
  const router = new ConversationRouter({
    identity,
    catalog,
    cart,
    checkout,
    ledger,
    coupons,
    wishlist,
    ratings,
    encryption,
    sessions,
    supportContact: env.shop.supportContact,
  });

  // ───── Routes ─────
  registerHealthRoutes(app, store, redis);
  registerChatRoutes(app, router);

  const stop = (): void => {
    drafts.stopSweeper();
    sessions.stopSweeper();
  };
  app.addHook('onClose', async () => {
    stop();
  });

  logger.info('Application built successfully');
  return { app, redis, store, router, stop };
}
