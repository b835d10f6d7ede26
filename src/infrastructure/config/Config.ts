export interface AppConfig {
  app: {
    port: number;
    baseCurrency: string;
    corsOrigin: string;
  };
  fx: {
    quoteUrl: string;
    timeoutMs: number;
    fallbackRate: string;
    fixedRate?: string;
  };
  finance: {
    annualInflationRate: string;
  };
  llm: {
    apiKey?: string;
    baseUrl: string;
    model: string;
    enabled: boolean;
  };
}

const numericString = /^\d+(\.\d+)?$/;

const decimalEnv = (value: string | undefined, fallback: string): string =>
  value && numericString.test(value.trim()) ? value.trim() : fallback;

const integerEnv = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const fixedRate = env.FX_FIXED_RATE?.trim();

  return {
    app: {
      port: integerEnv(env.PORT, 4000),
      baseCurrency: env.APP_BASE_CURRENCY ?? 'BRL',
      corsOrigin: env.CORS_ORIGIN ?? '*',
    },
    fx: {
      quoteUrl: env.FX_QUOTE_URL ?? 'https://economia.awesomeapi.com.br/json/last/USD-BRL',
      timeoutMs: integerEnv(env.FX_TIMEOUT_MS, 10_000),
      fallbackRate: decimalEnv(env.FX_FALLBACK_RATE, '5.50'),
      fixedRate: fixedRate && numericString.test(fixedRate) ? fixedRate : undefined,
    },
    finance: {
      annualInflationRate: decimalEnv(env.FINANCE_ANNUAL_INFLATION_RATE, '0.045'),
    },
    llm: {
      apiKey: env.LLM_API_KEY,
      baseUrl: env.LLM_BASE_URL ?? 'https://api.groq.com/openai/v1',
      model: env.LLM_MODEL ?? 'llama-3.1-8b-instant',
      enabled: env.LLM_ENABLED !== 'false',
    },
  };
};
