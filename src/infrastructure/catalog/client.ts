import { MongoClient } from 'mongodb';
import type { Collection, ObjectId } from 'mongodb';

/** Product document as stored in the catalog collection. */
export interface ProductDocument {
  _id: ObjectId;
  name: string;
  description: string;
  developer: string;
  category: string;
  price: number;
  version: string;
  rating: number | null;
  download_count: number;
  icon_url: string | null;
  screenshots: string[];
  tags: string[];
  created_at: Date;
  updated_at: Date;
}

export type ProductCollection = Collection<ProductDocument>;

export interface CatalogClientOptions {
  url: string;
  database: string;
  collection: string;
}

/**
 * Creates a MongoDB client for the catalog store.
 *
 * The client is not connected yet; callers own `connect()` / `close()`.
 */
export function createCatalogClient(options: CatalogClientOptions) {
  const client = new MongoClient(options.url, {
    maxPoolSize: 10,
    serverSelectionTimeoutMS: 5000,
  });

  const products: ProductCollection = client
    .db(options.database)
    .collection<ProductDocument>(options.collection);

  return { client, products };
}
