import type { CurrencyQuote } from '../../domain/entities/ImportCost.js';

export interface CurrencyRatePort {
  /** Never rejects: implementations fall back to a static quote on failure. */
  getCurrentRate(): Promise<CurrencyQuote>;
}
