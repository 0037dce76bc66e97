/**
 * Delivery Address Encryption
 *
 * Addresses are encrypted with AES-256-GCM before they leave the checkout
 * draft; only the armoured ciphertext is ever stored on an order. The key
 * metadata (never the key) is recorded in the store's `pgp_config` on
 * first use.
 */

import { randomBytes, createCipheriv, createDecipheriv, createHash } from 'crypto';
import { DataStore } from '../store/types';
import { EncryptionUnavailableError } from '../common/errors';
import { logger } from '../observability/logger';

const ALGORITHM = 'aes-256-gcm';
const IV_BYTES = 12;
const TAG_BYTES = 16;
const ARMOR_BEGIN = '-----BEGIN ENCRYPTED ADDRESS-----';
const ARMOR_END = '-----END ENCRYPTED ADDRESS-----';

const log = logger.child({ component: 'address-encryptor' });

export interface KeyInfo {
  keyId: string;
  algorithm: string;
}

/** Opaque plaintext → ciphertext-blob collaborator */
export interface AddressEncryptor {
  encrypt(plaintext: string): Promise<string>;
  keyInfo(): KeyInfo;
}

// ───── AES-GCM Implementation ───────────────────────────────────

function deriveKey(secret: string): Buffer {
  return createHash('sha256').update(secret, 'utf8').digest();
}

function wrap(base64: string, width = 64): string[] {
  const lines: string[] = [];
  for (let i = 0; i < base64.length; i += width) {
    lines.push(base64.slice(i, i + width));
  }
  return lines;
}

export class AesGcmAddressEncryptor implements AddressEncryptor {
  private readonly key: Buffer;
  private readonly keyId: string;

  constructor(secret: string) {
    if (!secret) throw new EncryptionUnavailableError('Address encryption key is not configured');
    this.key = deriveKey(secret);
    this.keyId = createHash('sha256').update(this.key).digest('hex').slice(0, 16).toUpperCase();
  }

  async encrypt(plaintext: string): Promise<string> {
    const iv = randomBytes(IV_BYTES);
    const cipher = createCipheriv(ALGORITHM, this.key, iv);
    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();
    const body = Buffer.concat([iv, tag, encrypted]).toString('base64');

    return [ARMOR_BEGIN, `Key-Id: ${this.keyId}`, `Algorithm: ${ALGORITHM}`, '', ...wrap(body), ARMOR_END].join('\n');
  }

  /** Recover the plaintext of an armoured blob produced with the same key */
  decrypt(armored: string): string {
    const lines = armored.split('\n');
    const start = lines.indexOf('');
    const end = lines.indexOf(ARMOR_END);
    if (lines[0] !== ARMOR_BEGIN || start === -1 || end === -1) {
      throw new Error('Not an encrypted address block');
    }

    const raw = Buffer.from(lines.slice(start + 1, end).join(''), 'base64');
    const iv = raw.subarray(0, IV_BYTES);
    const tag = raw.subarray(IV_BYTES, IV_BYTES + TAG_BYTES);
    const ciphertext = raw.subarray(IV_BYTES + TAG_BYTES);

    const decipher = createDecipheriv(ALGORITHM, this.key, iv);
    decipher.setAuthTag(tag);
    return decipher.update(ciphertext, undefined, 'utf8') + decipher.final('utf8');
  }

  keyInfo(): KeyInfo {
    return { keyId: this.keyId, algorithm: ALGORITHM };
  }
}

// ───── Service ──────────────────────────────────────────────────

/**
 * Wraps an encryptor for checkout: registers key metadata once and turns
 * any encryptor failure into EncryptionUnavailableError.
 */
export class AddressEncryptionService {
  private keyRegistered = false;

  constructor(
    private readonly encryptor: AddressEncryptor,
    private readonly store: DataStore,
    private readonly now: () => number = Date.now,
  ) {}

  async encryptAddress(plaintext: string): Promise<string> {
    let blob: string;
    try {
      blob = await this.encryptor.encrypt(plaintext);
    } catch (err) {
      log.error({ err }, 'Address encryption failed');
      throw new EncryptionUnavailableError('Address encryption failed', err);
    }

    if (!this.keyRegistered) {
      await this.registerKey();
    }
    return blob;
  }

  /** Key metadata as recorded in the store, registering it if needed */
  async keyInfo(): Promise<KeyInfo & { createdAt: number }> {
    await this.registerKey();
    const { pgp_config } = await this.store.read();
    const info = this.encryptor.keyInfo();
    return { ...info, createdAt: pgp_config.created_at ?? 0 };
  }

  private async registerKey(): Promise<void> {
    const info = this.encryptor.keyInfo();
    await this.store.transact((doc) => {
      if (doc.pgp_config.key_generated && doc.pgp_config.key_id === info.keyId) return;
      doc.pgp_config = {
        key_generated: true,
        key_id: info.keyId,
        algorithm: info.algorithm,
        created_at: Math.floor(this.now() / 1000),
      };
      log.info({ keyId: info.keyId }, 'Address encryption key registered');
    });
    this.keyRegistered = true;
  }
}
