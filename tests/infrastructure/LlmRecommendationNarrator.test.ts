import OpenAI from 'openai';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { computeCapacity } from '../../src/domain/services/CapacityCalculator.js';
import { toDecimal } from '../../src/domain/services/MoneyValue.js';
import { rankOffers } from '../../src/domain/services/SmartChoiceEngine.js';
import { LlmRecommendationNarrator } from '../../src/infrastructure/adapters/narrator/LlmRecommendationNarrator.js';

const config = { apiKey: 'test-secret', baseUrl: 'http://127.0.0.1:9/v1', model: 'test-model', enabled: true };

const capacity = computeCapacity({ monthlyIncome: toDecimal(5000), fixedExpenses: toDecimal(2000) });

const ranking = rankOffers({
  availableCash: toDecimal(1000),
  monthlyCapacity: toDecimal(750),
  offers: [
    {
      store: 'Loja A',
      cashPrice: toDecimal(900),
      installmentPrice: toDecimal(1000),
      installmentCount: 10,
      interestFree: true,
    },
  ],
});

describe('LlmRecommendationNarrator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('answers from the template without a client', async () => {
    const narrator = new LlmRecommendationNarrator({ ...config, apiKey: undefined });

    const answer = await narrator.answerQuestion({ question: 'Compro à vista?', capacity, ranking });

    expect(answer).toBe(
      [
        'Seu fluxo livre mensal é de R$ 2.500,00.',
        'Capacidade segura para novas parcelas: R$ 750,00 por mês (máximo de R$ 1.250,00).',
        'Pague à Vista! Recomendado: Loja A à vista por R$ 900,00. Economia de R$ 100,00 (10,0% de desconto).',
      ].join('\n'),
    );
  });

  it('warns when commitments exceed free cash flow', () => {
    const narrator = new LlmRecommendationNarrator(config, null);
    const stretched = computeCapacity({
      monthlyIncome: toDecimal(3000),
      fixedExpenses: toDecimal(2500),
      currentCommitments: toDecimal(500),
    });

    expect(narrator.fallbackAnswer({ question: 'E agora?', capacity: stretched })).toBe(
      [
        'Seu fluxo livre mensal é de R$ 200,00.',
        'Capacidade segura para novas parcelas: R$ 60,00 por mês (máximo de R$ 100,00).',
        'Atenção: seus compromissos atuais já superam seu fluxo livre.',
      ].join('\n'),
    );
  });

  it('lists the ranked offers in the prompt summary', () => {
    const narrator = new LlmRecommendationNarrator(config, null);
    const summary = narrator.buildFinancialSummary({ question: 'Qual loja?', capacity, ranking }).split('\n');

    expect(summary[0]).toBe('Renda mensal: R$ 5.000,00');
    expect(summary[2]).toBe('Margem de segurança: 10,0% (R$ 500,00)');
    expect(summary).toContain('- Loja A: à vista R$ 900,00, 10x de R$ 100,00, score 96');
  });

  it('falls back when the model call fails', async () => {
    const client = new OpenAI({ apiKey: 'test-secret', baseURL: config.baseUrl, maxRetries: 0 });
    const create = vi.spyOn(client.chat.completions, 'create').mockRejectedValue(new Error('rate limited'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const narrator = new LlmRecommendationNarrator(config, client);
    const answer = await narrator.answerQuestion({ question: 'Compro?', capacity });

    expect(create).toHaveBeenCalledTimes(1);
    expect(answer).toBe(narrator.fallbackAnswer({ question: 'Compro?', capacity }));
  });

  describe('prioritizeMissingItems', () => {
    const request = {
      projectName: 'Setup gamer',
      projectType: 'pc' as const,
      existingItems: ['Monitor'],
      missingItems: ['Placa de Video (GPU)', 'Processador (CPU)', 'Memoria RAM', 'SSD/HD', 'Placa Mae', 'Fonte'],
    };

    it('uses the catalog order without a client', async () => {
      const narrator = new LlmRecommendationNarrator(config, null);

      expect(await narrator.prioritizeMissingItems(request)).toEqual({
        suggestions: ['Placa de Video (GPU)', 'Processador (CPU)', 'Memoria RAM', 'SSD/HD', 'Placa Mae'],
        reasoning: 'Baseado no tipo de projeto selecionado.',
        priorityOrder: ['Placa de Video (GPU)', 'Processador (CPU)', 'Memoria RAM'],
        source: 'catalog',
      });
    });

    it('reads a fenced JSON reply', () => {
      const narrator = new LlmRecommendationNarrator(config, null);
      const reply = [
        '```json',
        '{"suggestions": ["Fonte", "Placa Mae"], "reasoning": "Base do sistema", "priority_order": ["Placa Mae"]}',
        '```',
      ].join('\n');

      expect(narrator.parsePrioritization(reply, request.missingItems)).toEqual({
        suggestions: ['Fonte', 'Placa Mae'],
        reasoning: 'Base do sistema',
        priorityOrder: ['Placa Mae'],
        source: 'model',
      });
    });

    it('falls back on unreadable replies', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const narrator = new LlmRecommendationNarrator(config, null);

      expect(narrator.parsePrioritization('Claro! Aqui vai:', request.missingItems).source).toBe('catalog');
      expect(narrator.parsePrioritization('{"suggestions": "Fonte"}', request.missingItems).source).toBe('catalog');
    });

    it('falls back when the model call fails', async () => {
      const client = new OpenAI({ apiKey: 'test-secret', baseURL: config.baseUrl, maxRetries: 0 });
      const create = vi.spyOn(client.chat.completions, 'create').mockRejectedValue(new Error('timeout'));
      vi.spyOn(console, 'log').mockImplementation(() => undefined);
      vi.spyOn(console, 'error').mockImplementation(() => undefined);

      const result = await new LlmRecommendationNarrator(config, client).prioritizeMissingItems(request);

      expect(create).toHaveBeenCalledTimes(1);
      expect(result.source).toBe('catalog');
      expect(result.priorityOrder).toEqual(['Placa de Video (GPU)', 'Processador (CPU)', 'Memoria RAM']);
    });

    it('lists existing and missing items in the prompt', () => {
      const prompt = new LlmRecommendationNarrator(config, null).buildPrioritizationPrompt({
        ...request,
        existingItems: [],
      });

      expect(prompt.split('\n')).toContain('Itens já adicionados: Nenhum');
      expect(prompt.split('\n')).toContain(
        'Itens possivelmente faltando: Placa de Video (GPU), Processador (CPU), Memoria RAM, SSD/HD, Placa Mae, Fonte',
      );
    });
  });
});
