/**
 * Provider Interfaces
 * Barrel export for upstream provider contracts
 */

export * from './IMarketDataProvider';
