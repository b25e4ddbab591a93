export { createCatalogClient } from './client.js';
export type { ProductDocument, ProductCollection, CatalogClientOptions } from './client.js';
export {
  isValidProductId,
  toProduct,
  insertProduct,
  findProductById,
  listProducts,
  updateProduct,
  deleteProduct,
  productExists,
  setProductRating,
} from './product-repository.js';
export type {
  CreateProductInput,
  PatchProductInput,
  ProductListFilters,
  ProductPagination,
} from './product-repository.js';
export { CatalogGateway, CatalogUnavailableError } from './catalog-gateway.js';
export { default as catalogGatewayPlugin } from './catalog-gateway-plugin.js';
export { default as catalogPlugin } from './catalog-plugin.js';
