import { promises as fs } from 'fs';
import { StoreDocument } from './types';
import { isStoreDocument, documentErrors } from './document-schema';
import { logger } from '../observability/logger';

/**
 * Starting document (catalog, payment addresses) used when the backend has
 * nothing persisted yet. A missing seed file means an empty shop.
 */
export async function loadSeed(filePath: string): Promise<StoreDocument | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    logger.warn({ err, file: filePath }, 'Seed file not readable; starting with an empty shop');
    return undefined;
  }

  const parsed: unknown = JSON.parse(raw);
  if (!isStoreDocument(parsed)) {
    throw new Error(`Seed file ${filePath} is not a valid store document: ${documentErrors()}`);
  }
  return parsed;
}
