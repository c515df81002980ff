/**
 * Central export point for all models
 * Allows clean imports: import { QuotePoint, PriceBar } from '@/models'
 */

export * from './MarketData';
export * from './Fundamentals';
export * from './Historical';
export * from './ErrorEnvelope';
