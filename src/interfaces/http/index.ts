export { default as reviewRoutes } from './review-routes.js';
export { default as healthRoutes } from './health-routes.js';
export type { HealthRoutesOptions } from './health-routes.js';
export { default as productRoutes } from './product-routes.js';
