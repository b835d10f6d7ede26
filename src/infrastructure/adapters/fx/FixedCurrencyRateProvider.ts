import type Decimal from 'decimal.js';
import dayjs from 'dayjs';
import type { CurrencyRatePort } from '../../../application/ports/CurrencyRatePort.js';
import type { CurrencyQuote } from '../../../domain/entities/ImportCost.js';

export class FixedCurrencyRateProvider implements CurrencyRatePort {
  constructor(
    private readonly rate: Decimal,
    private readonly asOf?: string,
  ) {}

  async getCurrentRate(): Promise<CurrencyQuote> {
    return { rate: this.rate, asOf: this.asOf ?? dayjs().format(), source: 'fixed' };
  }
}
