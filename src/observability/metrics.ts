import client from 'prom-client';

const register = new client.Registry();

client.collectDefaultMetrics({ register });

export const httpRequestDuration = new client.Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
  registers: [register],
});

export const chatMessagesTotal = new client.Counter({
  name: 'chat_messages_total',
  help: 'Inbound chat messages by conversation stage',
  labelNames: ['stage'] as const,
  registers: [register],
});

export const checkoutTransitions = new client.Counter({
  name: 'checkout_transitions_total',
  help: 'Checkout state machine transitions',
  labelNames: ['from', 'to'] as const,
  registers: [register],
});

export const ordersCreated = new client.Counter({
  name: 'orders_created_total',
  help: 'Orders appended to the ledger',
  labelNames: ['payment'] as const,
  registers: [register],
});

export const storeCommitDuration = new client.Histogram({
  name: 'store_commit_duration_seconds',
  help: 'Time spent inside the store write lock (load, mutate, persist)',
  labelNames: ['backend', 'outcome'] as const,
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
  registers: [register],
});

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getContentType(): string {
  return register.contentType;
}
