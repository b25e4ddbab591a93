import type { ProductCollection } from '../infrastructure/catalog/index.js';
import {
  insertProduct,
  findProductById,
  listProducts as repoList,
  updateProduct as repoUpdate,
  deleteProduct as repoDelete,
} from '../infrastructure/catalog/index.js';
import type { Product, ProductPage } from '../domain/index.js';
import type { CreateProductBody, UpdateProductBody, ListProductsQuery } from './product-schema.js';

/** Create a product. Its rating starts out null. */
export async function createProduct(products: ProductCollection, input: CreateProductBody): Promise<Product> {
  return insertProduct(products, input);
}

/** Page of products, newest first, optionally filtered by category. */
export async function listProducts(products: ProductCollection, query: ListProductsQuery): Promise<ProductPage> {
  const { rows, total } = await repoList(
    products,
    { category: query.category },
    { skip: (query.page - 1) * query.page_size, limit: query.page_size },
  );

  return {
    products: rows,
    total,
    page: query.page,
    page_size: query.page_size,
    total_pages: total === 0 ? 0 : Math.ceil(total / query.page_size),
  };
}

/** Fetch one product. Null when absent or when the id is malformed. */
export async function getProduct(products: ProductCollection, productId: string): Promise<Product | null> {
  return (await findProductById(products, productId)) ?? null;
}

/** Partial update. Null if not found. */
export async function updateProduct(
  products: ProductCollection,
  productId: string,
  input: UpdateProductBody,
): Promise<Product | null> {
  return (await repoUpdate(products, productId, input)) ?? null;
}

/** Returns true if a product was deleted. */
export async function removeProduct(products: ProductCollection, productId: string): Promise<boolean> {
  return repoDelete(products, productId);
}
