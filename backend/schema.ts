import { z } from 'zod';

/*
  Canonical stored shape of a product.
  Every record that reaches the document store has passed through this schema.
*/
export const productSchema = z.object({
  title: z.string().min(1),
  price: z.number().finite().nonnegative(),
  category: z.string(),
  description: z.string().nullable().optional(),
  image_url: z.string().nullable().optional(),
  animal: z.string().nullable().optional(),
  colors: z.array(z.string()).default([]),
  rating: z.number().default(4.5),
  tags: z.array(z.string()).default([]),
  in_stock: z.boolean().default(true),
});

/*
  Request body accepted by POST /api/products.
  Only title, price and category are required; the canonical schema is the authoritative check.
*/
export const createProductInputSchema = z.object({
  title: z.string(),
  price: z.number(),
  category: z.string(),
  description: z.string().nullable().optional(),
  image_url: z.string().nullable().optional(),
  animal: z.string().nullable().optional(),
  colors: z.array(z.string()).default([]),
  rating: z.number().default(4.5),
  tags: z.array(z.string()).default([]),
  in_stock: z.boolean().default(true),
});

// Product as returned to clients
export const productRecordSchema = productSchema.extend({
  id: z.string(),
  created_at: z.string(),
});

export const searchProductsInputSchema = z.object({
  animal: z.string().optional(),
  q: z.string().optional(),
});

export type Product = z.infer<typeof productSchema>;
export type CreateProductInput = z.infer<typeof createProductInputSchema>;
export type ProductRecord = z.infer<typeof productRecordSchema>;
export type SearchProductsInput = z.infer<typeof searchProductsInputSchema>;

export const PRODUCT_COLLECTION = 'product';
