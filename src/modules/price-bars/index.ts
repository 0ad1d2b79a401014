/**
 * PRICE BARS MODULE — Index
 */

export * from './price-bars.types.js';
export { MongoPriceBarStore } from './price-bars.mongo.js';
export { registerPriceBarRoutes } from './price-bars.routes.js';
