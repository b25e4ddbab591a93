import { z } from 'zod';

const productFields = {
  name: z.string().min(1).max(100),
  description: z.string().max(1000),
  developer: z.string().min(1).max(100),
  category: z.string().min(1),
  price: z.number().min(0),
  version: z.string().min(1),
  download_count: z.number().int().min(0),
  icon_url: z.string().url().nullable(),
  screenshots: z.array(z.string()),
  tags: z.array(z.string()),
};

/**
 * Schema for POST /api/v1/admin/products.
 * `rating` is not accepted: the reviews service owns it.
 */
export const createProductSchema = z.object({
  ...productFields,
  download_count: productFields.download_count.default(0),
  icon_url: productFields.icon_url.default(null),
  screenshots: productFields.screenshots.default([]),
  tags: productFields.tags.default([]),
});

export type CreateProductBody = z.infer<typeof createProductSchema>;

/**
 * Schema for PUT /api/v1/admin/products/:product_id (partial).
 * Admins may override the derived rating.
 */
export const updateProductSchema = z.object({
  ...productFields,
  rating: z.number().min(0).max(5).nullable(),
}).partial();

export type UpdateProductBody = z.infer<typeof updateProductSchema>;

/** Querystring for GET /api/v1/products. */
export const listProductsQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(100).default(20),
  category: z.string().min(1).optional(),
});

export type ListProductsQuery = z.infer<typeof listProductsQuerySchema>;
