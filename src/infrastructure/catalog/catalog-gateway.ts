import type { MongoClient } from 'mongodb';
import type { BaseLogger } from 'pino';
import type { ProductLookup, ProductRatingWriter } from '../../application/ports.js';
import { createCatalogClient } from './client.js';
import type { CatalogClientOptions, ProductCollection } from './client.js';
import { isValidProductId, productExists, setProductRating } from './product-repository.js';

export class CatalogUnavailableError extends Error {
  readonly name = 'CatalogUnavailableError';

  constructor() {
    super('Catalog store is not connected');
  }
}

/**
 * The reviews service's view of the catalog store.
 *
 * Connecting is tolerant: if the catalog is unreachable at boot the
 * gateway stays disconnected, product validation is skipped and rating
 * writes are refused, but the reviews API still starts.
 */
export class CatalogGateway implements ProductLookup, ProductRatingWriter {
  private client: MongoClient | null = null;
  private products: ProductCollection | null = null;

  constructor(
    private readonly options: CatalogClientOptions,
    private readonly log: BaseLogger,
  ) {}

  async connect(): Promise<void> {
    const { client, products } = createCatalogClient(this.options);

    try {
      await client.connect();
      await client.db('admin').command({ ping: 1 });
      this.client = client;
      this.products = products;
      this.log.info(
        { database: this.options.database, collection: this.options.collection },
        'Connected to catalog MongoDB',
      );
    } catch (err: unknown) {
      this.log.error({ err }, 'Failed to connect to catalog MongoDB, product validation will be skipped');
      await client.close().catch((closeErr: unknown) => {
        this.log.debug({ err: closeErr }, 'Catalog client close after failed connect');
      });
    }
  }

  async disconnect(): Promise<void> {
    if (this.client === null) return;

    await this.client.close();
    this.client = null;
    this.products = null;
    this.log.info('Disconnected from catalog MongoDB');
  }

  isConnected(): boolean {
    return this.client !== null && this.products !== null;
  }

  isValidProductId(productId: string): boolean {
    return isValidProductId(productId);
  }

  /**
   * Existence check for review creation.
   * Returns true when the catalog is not connected so reviews keep working.
   */
  async productExists(productId: string): Promise<boolean> {
    if (this.products === null) {
      this.log.warn({ product_id: productId }, 'Catalog not connected, skipping product validation');
      return true;
    }

    if (!isValidProductId(productId)) {
      this.log.warn({ product_id: productId }, 'Invalid product id format');
      return false;
    }

    const exists = await productExists(this.products, productId);
    if (!exists) {
      this.log.warn({ product_id: productId }, 'Product not found in catalog');
    }
    return exists;
  }

  async setProductRating(productId: string, rating: number | null, updatedAt: Date): Promise<boolean> {
    if (this.products === null) {
      throw new CatalogUnavailableError();
    }
    return setProductRating(this.products, productId, rating, updatedAt);
  }
}
