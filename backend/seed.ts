import { z } from 'zod';
import { matchAll, type DocumentStore } from './database';
import { PRODUCT_COLLECTION, productSchema } from './schema';
import demoProductsData from './data/demo-products.json';

export type SeedResult =
  | { status: 'skipped'; message: string }
  | { status: 'ok'; inserted: number };

export const demoProducts = z.array(productSchema).parse(demoProductsData);

/*
  Inserts the demo catalog once.
  Any existing product, demo or not, leaves the collection untouched.
*/
export async function seedProducts(store: DocumentStore): Promise<SeedResult> {
  const existing = await store.getDocuments(PRODUCT_COLLECTION, matchAll(), 1);
  if (existing.length > 0) {
    return { status: 'skipped', message: 'Products already exist' };
  }

  let inserted = 0;
  for (const product of demoProducts) {
    await store.createDocument(PRODUCT_COLLECTION, product);
    inserted += 1;
  }

  return { status: 'ok', inserted };
}
