import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/infrastructure/config/Config.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.app).toEqual({ port: 4000, baseCurrency: 'BRL', corsOrigin: '*' });
    expect(config.fx).toEqual({
      quoteUrl: 'https://economia.awesomeapi.com.br/json/last/USD-BRL',
      timeoutMs: 10000,
      fallbackRate: '5.50',
      fixedRate: undefined,
    });
    expect(config.finance.annualInflationRate).toBe('0.045');
    expect(config.llm.apiKey).toBeUndefined();
    expect(config.llm.model).toBe('llama-3.1-8b-instant');
  });

  it('reads overrides', () => {
    const config = loadConfig({
      PORT: '8080',
      FX_FIXED_RATE: ' 5.25 ',
      FX_TIMEOUT_MS: '2500',
      FINANCE_ANNUAL_INFLATION_RATE: '0.06',
      LLM_API_KEY: 'test-secret',
      LLM_ENABLED: 'false',
    });

    expect(config.app.port).toBe(8080);
    expect(config.fx.fixedRate).toBe('5.25');
    expect(config.fx.timeoutMs).toBe(2500);
    expect(config.finance.annualInflationRate).toBe('0.06');
    expect(config.llm.apiKey).toBe('test-secret');
    expect(config.llm.enabled).toBe(false);
  });

  it('ignores malformed numbers', () => {
    const config = loadConfig({ PORT: 'abc', FX_FALLBACK_RATE: '-3', FX_FIXED_RATE: 'cinco' });

    expect(config.app.port).toBe(4000);
    expect(config.fx.fallbackRate).toBe('5.50');
    expect(config.fx.fixedRate).toBeUndefined();
  });
});
