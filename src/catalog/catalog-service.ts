/**
 * Catalog — read-only view over the product categories in the store.
 */

import { DataStore, Product, RawQuantities, StoreDocument } from '../store/types';

/** Availability info attached to a product */
export type Availability =
  | { kind: 'skus'; skus: string[] }
  | { kind: 'counts'; counts: Record<string, number> };

export interface CatalogProduct extends Omit<Product, 'quantities'> {
  category: string;
  availability?: Availability;
}

export function toAvailability(raw: RawQuantities | undefined): Availability | undefined {
  if (raw === undefined) return undefined;
  if (Array.isArray(raw)) return { kind: 'skus', skus: [...raw] };
  return { kind: 'counts', counts: { ...raw } };
}

export function describeAvailability(availability: Availability | undefined): string {
  if (!availability) return '';
  switch (availability.kind) {
    case 'skus':
      return `Available: ${availability.skus.join(', ')}`;
    case 'counts':
      return `Available: ${Object.entries(availability.counts)
        .map(([variant, count]) => `${variant} (${count})`)
        .join(', ')}`;
  }
}

/** Scan every category; the first product with a matching id wins */
export function findProductIn(doc: StoreDocument, productId: string): CatalogProduct | null {
  for (const [category, products] of Object.entries(doc.products)) {
    const product = products.find((p) => p.id === productId);
    if (product) return toCatalogProduct(category, product);
  }
  return null;
}

function toCatalogProduct(category: string, product: Product): CatalogProduct {
  const { quantities, ...rest } = product;
  return { ...rest, category, availability: toAvailability(quantities) };
}

export class CatalogService {
  constructor(private readonly store: DataStore) {}

  async listCategories(): Promise<string[]> {
    const doc = await this.store.read();
    return Object.keys(doc.products);
  }

  /** Products of one category in display order; empty when the category is unknown */
  async listProducts(category: string): Promise<CatalogProduct[]> {
    const doc = await this.store.read();
    const products = doc.products[category] ?? [];
    return products.map((p) => toCatalogProduct(category, p));
  }

  async findProduct(productId: string): Promise<CatalogProduct | null> {
    return findProductIn(await this.store.read(), productId);
  }
}
