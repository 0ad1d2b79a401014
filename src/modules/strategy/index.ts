/**
 * STRATEGY MODULE — Index
 */

export * from './strategy.types.js';
export { registerStrategyRoutes } from './strategy.routes.js';
