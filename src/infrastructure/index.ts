export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { dbPlugin, createActiveReviewReader } from './db/index.js';
export type { Database } from './db/index.js';
export { catalogGatewayPlugin, catalogPlugin } from './catalog/index.js';
export { eventsPlugin, SubscriptionRegistry, createMainScope, runInScope } from './events/index.js';
