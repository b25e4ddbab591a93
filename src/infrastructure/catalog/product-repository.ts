import { ObjectId } from 'mongodb';
import type { Filter, OptionalId } from 'mongodb';
import type { Product } from '../../domain/index.js';
import type { ProductCollection, ProductDocument } from './client.js';

const OBJECT_ID_RE = /^[0-9a-f]{24}$/i;

/** Fields accepted when creating a product (server assigns id, rating and timestamps). */
export interface CreateProductInput {
  name: string;
  description: string;
  developer: string;
  category: string;
  price: number;
  version: string;
  download_count: number;
  icon_url: string | null;
  screenshots: string[];
  tags: string[];
}

/** Fields accepted for a partial update (all optional). */
export type PatchProductInput = Partial<CreateProductInput> & { rating?: number | null };

export interface ProductListFilters {
  category?: string;
}

export interface ProductPagination {
  skip: number;
  limit: number;
}

/** Product ids are 24-hex ObjectId strings; nothing else is a catalog key. */
export function isValidProductId(productId: string): boolean {
  return OBJECT_ID_RE.test(productId);
}

export function toProduct(doc: ProductDocument): Product {
  return {
    id: doc._id.toHexString(),
    name: doc.name,
    description: doc.description,
    developer: doc.developer,
    category: doc.category,
    price: doc.price,
    version: doc.version,
    rating: doc.rating,
    download_count: doc.download_count,
    icon_url: doc.icon_url,
    screenshots: doc.screenshots,
    tags: doc.tags,
    created_at: doc.created_at,
    updated_at: doc.updated_at,
  };
}

export async function insertProduct(
  products: ProductCollection,
  input: CreateProductInput,
): Promise<Product> {
  const now = new Date();
  const doc: OptionalId<ProductDocument> = {
    ...input,
    rating: null,
    created_at: now,
    updated_at: now,
  };

  const result = await products.insertOne(doc);
  return toProduct({ ...doc, _id: result.insertedId });
}

export async function findProductById(
  products: ProductCollection,
  productId: string,
): Promise<Product | undefined> {
  if (!isValidProductId(productId)) return undefined;

  const doc = await products.findOne({ _id: new ObjectId(productId) });
  return doc === null ? undefined : toProduct(doc);
}

/** Newest first. Returns the page and the total matching count. */
export async function listProducts(
  products: ProductCollection,
  filters: ProductListFilters,
  pagination: ProductPagination,
): Promise<{ rows: Product[]; total: number }> {
  const filter: Filter<ProductDocument> = {};
  if (filters.category !== undefined) filter.category = filters.category;

  const [docs, total] = await Promise.all([
    products
      .find(filter)
      .sort({ created_at: -1 })
      .skip(pagination.skip)
      .limit(pagination.limit)
      .toArray(),
    products.countDocuments(filter),
  ]);

  return { rows: docs.map(toProduct), total };
}

export async function updateProduct(
  products: ProductCollection,
  productId: string,
  input: PatchProductInput,
): Promise<Product | undefined> {
  if (!isValidProductId(productId)) return undefined;

  const setFields: Partial<ProductDocument> = { updated_at: new Date() };
  if (input.name !== undefined) setFields.name = input.name;
  if (input.description !== undefined) setFields.description = input.description;
  if (input.developer !== undefined) setFields.developer = input.developer;
  if (input.category !== undefined) setFields.category = input.category;
  if (input.price !== undefined) setFields.price = input.price;
  if (input.version !== undefined) setFields.version = input.version;
  if (input.rating !== undefined) setFields.rating = input.rating;
  if (input.download_count !== undefined) setFields.download_count = input.download_count;
  if (input.icon_url !== undefined) setFields.icon_url = input.icon_url;
  if (input.screenshots !== undefined) setFields.screenshots = input.screenshots;
  if (input.tags !== undefined) setFields.tags = input.tags;

  const doc = await products.findOneAndUpdate(
    { _id: new ObjectId(productId) },
    { $set: setFields },
    { returnDocument: 'after' },
  );

  return doc === null ? undefined : toProduct(doc);
}

export async function deleteProduct(products: ProductCollection, productId: string): Promise<boolean> {
  if (!isValidProductId(productId)) return false;

  const result = await products.deleteOne({ _id: new ObjectId(productId) });
  return result.deletedCount > 0;
}

export async function productExists(products: ProductCollection, productId: string): Promise<boolean> {
  if (!isValidProductId(productId)) return false;

  const found = await products.countDocuments({ _id: new ObjectId(productId) }, { limit: 1 });
  return found > 0;
}

/**
 * Overwrites the aggregate rating of one product.
 * Returns whether a document matched; an unchanged value still matches.
 */
export async function setProductRating(
  products: ProductCollection,
  productId: string,
  rating: number | null,
  updatedAt: Date,
): Promise<boolean> {
  const result = await products.updateOne(
    { _id: new ObjectId(productId) },
    { $set: { rating, updated_at: updatedAt } },
  );

  return result.matchedCount > 0;
}
