import Ajv from 'ajv';
import { StoreDocument } from './types';

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

const cartLineSchema = {
  type: 'object',
  required: ['id', 'name', 'price'],
  properties: {
    id: { type: 'string' },
    name: { type: 'string' },
    price: { type: 'number', minimum: 0 },
  },
};

const accountSchema = {
  type: 'object',
  required: ['transportId', 'displayName', 'country', 'cart', 'wishlist', 'coupon', 'orders'],
  properties: {
    transportId: { type: ['string', 'null'] },
    displayName: { type: 'string' },
    country: { type: ['string', 'null'] },
    cart: { type: 'array', items: cartLineSchema },
    wishlist: { type: 'array', items: cartLineSchema },
    coupon: { type: ['string', 'null'] },
    orders: { type: 'array', items: { type: 'string' } },
  },
};

const productSchema = {
  type: 'object',
  required: ['id', 'name', 'price', 'description'],
  properties: {
    id: { type: 'string' },
    name: { type: 'string' },
    price: { type: 'number', minimum: 0 },
    description: { type: 'string' },
    quantities: {
      oneOf: [
        { type: 'array', items: { type: 'string' } },
        { type: 'object', additionalProperties: { type: 'integer', minimum: 0 } },
      ],
    },
  },
};

const orderSchema = {
  type: 'object',
  required: [
    'orderId', 'user', 'items', 'addressEncrypted', 'notes', 'paymentType',
    'status', 'timestamp', 'subtotal', 'discount', 'total', 'coupon',
  ],
  properties: {
    orderId: { type: 'string' },
    user: { type: 'string' },
    items: { type: 'array', items: cartLineSchema },
    addressEncrypted: { type: 'string' },
    notes: { type: 'string' },
    paymentType: { type: 'string', enum: ['BTC', 'USDT'] },
    status: { type: 'string', enum: ['pending'] },
    timestamp: { type: 'integer' },
    subtotal: { type: 'number' },
    discount: { type: 'number' },
    total: { type: 'number' },
    coupon: { type: 'string' },
  },
};

const storeDocumentSchema = {
  type: 'object',
  required: ['users', 'products', 'orders', 'payment', 'pgp_config', 'ratings'],
  properties: {
    users: { type: 'object', additionalProperties: accountSchema },
    products: { type: 'object', additionalProperties: { type: 'array', items: productSchema } },
    orders: { type: 'array', items: orderSchema },
    payment: {
      type: 'object',
      required: ['btc_address', 'usdt_address'],
      properties: {
        btc_address: { type: 'string' },
        usdt_address: { type: 'string' },
      },
    },
    pgp_config: {
      type: 'object',
      required: ['key_generated'],
      properties: {
        key_generated: { type: 'boolean' },
        key_id: { type: 'string' },
        algorithm: { type: 'string' },
        created_at: { type: 'integer' },
      },
    },
    ratings: {
      type: 'array',
      items: {
        type: 'object',
        required: ['user', 'value', 'ts'],
        properties: {
          user: { type: 'string' },
          value: { type: 'integer', minimum: 1, maximum: 5 },
          ts: { type: 'integer' },
        },
      },
    },
  },
};

const validateDocument = ajv.compile<StoreDocument>(storeDocumentSchema);

export function isStoreDocument(raw: unknown): raw is StoreDocument {
  return validateDocument(raw);
}

/** Human-readable summary of the last validation failure */
export function documentErrors(): string {
  return ajv.errorsText(validateDocument.errors);
}
