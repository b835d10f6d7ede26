import type Decimal from 'decimal.js';
import dayjs from 'dayjs';
import { z } from 'zod';
import type { CurrencyRatePort } from '../../../application/ports/CurrencyRatePort.js';
import type { CurrencyQuote } from '../../../domain/entities/ImportCost.js';
import { FALLBACK_USD_BRL_RATE } from '../../../domain/services/FinanceConstants.js';
import { toDecimal } from '../../../domain/services/MoneyValue.js';
import type { JsonTransport } from '../../http/FetchTransport.js';

const QuoteResponseSchema = z.object({
  USDBRL: z.object({
    bid: z.string().regex(/^\d+(\.\d+)?$/),
    create_date: z.string().optional(),
  }),
});

interface AwesomeApiOptions {
  url: string;
  timeoutMs: number;
  fallbackRate?: Decimal;
}

/**
 * Live USD/BRL bid from AwesomeAPI. Any transport, status or payload problem
 * resolves to the fallback quote.
 */
export class AwesomeApiCurrencyRateProvider implements CurrencyRatePort {
  constructor(
    private readonly options: AwesomeApiOptions,
    private readonly transport: JsonTransport,
  ) {}

  async getCurrentRate(): Promise<CurrencyQuote> {
    try {
      const response = await this.transport({ url: this.options.url, timeoutMs: this.options.timeoutMs });

      if (response.status < 200 || response.status >= 300) {
        console.warn(`⚠️ Currency quote request returned ${response.status}, using fallback rate`);
        return this.fallback();
      }

      const parsed = QuoteResponseSchema.safeParse(response.body);
      if (!parsed.success) {
        console.warn('⚠️ Currency quote payload not recognised, using fallback rate');
        return this.fallback();
      }

      const { bid, create_date: createdAt } = parsed.data.USDBRL;
      const asOf = createdAt && dayjs(createdAt).isValid() ? dayjs(createdAt).format() : dayjs().format();

      return { rate: toDecimal(bid), asOf, source: 'live' };
    } catch (error) {
      console.warn('⚠️ Currency quote request failed, using fallback rate:', error instanceof Error ? error.message : error);
      return this.fallback();
    }
  }

  private fallback(): CurrencyQuote {
    return {
      rate: this.options.fallbackRate ?? FALLBACK_USD_BRL_RATE,
      asOf: dayjs().format(),
      source: 'fallback',
    };
  }
}
