import { FinanceDecisionService } from '../../application/services/FinanceDecisionService.js';
import { UserFinanceService } from '../../application/services/UserFinanceService.js';
import type { CurrencyRatePort } from '../../application/ports/CurrencyRatePort.js';
import type { ProfileStoragePort } from '../../application/ports/ProfileStoragePort.js';
import type { RecommendationNarratorPort } from '../../application/ports/RecommendationNarratorPort.js';
import { toDecimal } from '../../domain/services/MoneyValue.js';
import { AwesomeApiCurrencyRateProvider } from '../adapters/fx/AwesomeApiCurrencyRateProvider.js';
import { FixedCurrencyRateProvider } from '../adapters/fx/FixedCurrencyRateProvider.js';
import { LlmRecommendationNarrator } from '../adapters/narrator/LlmRecommendationNarrator.js';
import { InMemoryProfileStorageAdapter } from '../adapters/storage/InMemoryProfileStorageAdapter.js';
import { type AppConfig, loadConfig } from '../config/Config.js';
import { fetchTransport } from '../http/FetchTransport.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  currencyRates?: CurrencyRatePort;
  storage?: ProfileStoragePort;
  narrator?: RecommendationNarratorPort;
}

export class AppContainer {
  readonly config: AppConfig;

  readonly currencyRates: CurrencyRatePort;
  readonly storage: ProfileStoragePort;
  readonly narrator: RecommendationNarratorPort;
  readonly financeService: FinanceDecisionService;
  readonly userFinanceService: UserFinanceService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    const fxConfig = this.config.fx;

    this.currencyRates =
      overrides.currencyRates ??
      (fxConfig.fixedRate
        ? new FixedCurrencyRateProvider(toDecimal(fxConfig.fixedRate))
        : new AwesomeApiCurrencyRateProvider(
            {
              url: fxConfig.quoteUrl,
              timeoutMs: fxConfig.timeoutMs,
              fallbackRate: toDecimal(fxConfig.fallbackRate),
            },
            fetchTransport,
          ));

    this.storage = overrides.storage ?? new InMemoryProfileStorageAdapter();
    this.narrator = overrides.narrator ?? new LlmRecommendationNarrator(this.config.llm);

    this.financeService = new FinanceDecisionService(this.currencyRates, {
      annualInflationRate: toDecimal(this.config.finance.annualInflationRate),
    });
    this.userFinanceService = new UserFinanceService(this.storage, this.narrator);
  }

  hasLiveQuotes(): boolean {
    return this.currencyRates instanceof AwesomeApiCurrencyRateProvider;
  }

  hasLlm(): boolean {
    return Boolean(this.config.llm.enabled && this.config.llm.apiKey);
  }
}
