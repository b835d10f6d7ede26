import OpenAI from 'openai';
import { z } from 'zod';
import type {
  AdvisorQuestion,
  MissingItemsRequest,
  RecommendationNarratorPort,
} from '../../../application/ports/RecommendationNarratorPort.js';
import type { SuggestionPrioritization } from '../../../domain/entities/ProjectSuggestion.js';
import { formatBrl, formatPercent } from '../../../domain/services/MoneyValue.js';
import { catalogPrioritization } from '../../../domain/services/ProjectSuggestions.js';

export interface NarratorConfig {
  apiKey?: string;
  baseUrl: string;
  model: string;
  enabled: boolean;
}

const systemPrompt = `Você é um assistente financeiro pessoal. Responda em português do Brasil.

Princípios:
- Use exatamente os números calculados fornecidos; não invente valores
- Não faça previsões de preços ou de renda
- Seja direto e prático
- Responda em no máximo 2 parágrafos`;

const PrioritizationReplySchema = z.object({
  suggestions: z.array(z.string()),
  reasoning: z.string(),
  priority_order: z.array(z.string()),
});

const codeFence = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

/**
 * Wraps the engine's figures in a prompt for an OpenAI-compatible chat model.
 * Without a key, or when the model fails, answers from a fixed template instead.
 */
export class LlmRecommendationNarrator implements RecommendationNarratorPort {
  private readonly client: OpenAI | null;

  constructor(
    private readonly config: NarratorConfig,
    client?: OpenAI | null,
  ) {
    this.client =
      client !== undefined
        ? client
        : config.enabled && config.apiKey
          ? new OpenAI({ baseURL: config.baseUrl, apiKey: config.apiKey, timeout: 25000, maxRetries: 0 })
          : null;
  }

  async answerQuestion(request: AdvisorQuestion): Promise<string> {
    if (!this.client) {
      return this.fallbackAnswer(request);
    }

    try {
      console.log('🤖 Using LLM to narrate recommendation');

      const response = await this.client.chat.completions.create({
        model: this.config.model,
        messages: [
          { role: 'system', content: systemPrompt },
          {
            role: 'user',
            content: `Pergunta: "${request.question}"\n\nMeus números:\n${this.buildFinancialSummary(request)}`,
          },
        ],
        temperature: 0.3,
        max_tokens: 500,
      });

      const answer = response.choices[0]?.message?.content?.trim();
      if (!answer) {
        console.log('❌ Empty response from LLM');
        return this.fallbackAnswer(request);
      }

      return answer;
    } catch (error) {
      console.error('❌ LLM narration failed:', error);
      return this.fallbackAnswer(request);
    }
  }

  async prioritizeMissingItems(request: MissingItemsRequest): Promise<SuggestionPrioritization> {
    if (!this.client || request.missingItems.length === 0) {
      return catalogPrioritization(request.missingItems);
    }

    try {
      console.log(`🤖 Using LLM to prioritize suggestions for ${request.projectName}`);

      const response = await this.client.chat.completions.create({
        model: this.config.model,
        messages: [{ role: 'user', content: this.buildPrioritizationPrompt(request) }],
        temperature: 0.3,
        max_tokens: 500,
      });

      return this.parsePrioritization(response.choices[0]?.message?.content ?? '', request.missingItems);
    } catch (error) {
      console.error('❌ LLM prioritization failed:', error);
      return catalogPrioritization(request.missingItems);
    }
  }

  buildPrioritizationPrompt(request: MissingItemsRequest): string {
    const existing = request.existingItems.length > 0 ? request.existingItems.join(', ') : 'Nenhum';

    return [
      'Analise este projeto de compra e sugira os itens mais importantes que estão faltando.',
      '',
      `Nome do projeto: ${request.projectName}`,
      `Tipo: ${request.projectType}`,
      `Itens já adicionados: ${existing}`,
      `Itens possivelmente faltando: ${request.missingItems.join(', ')}`,
      '',
      'Responda apenas com JSON neste formato:',
      '{"suggestions": ["item1", "item2", "item3"], "reasoning": "explicação breve", "priority_order": ["mais importante", "segundo", "terceiro"]}',
      'Considere compatibilidade e necessidade real a partir do nome do projeto.',
    ].join('\n');
  }

  /** Reads the model's JSON reply, fenced or bare; anything unreadable yields the catalog order. */
  parsePrioritization(reply: string, missingItems: string[]): SuggestionPrioritization {
    const trimmed = reply.trim();
    const body = codeFence.exec(trimmed)?.[1] ?? trimmed;

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch {
      console.warn('⚠️ LLM prioritization reply is not JSON, using catalog order');
      return catalogPrioritization(missingItems);
    }

    const parsed = PrioritizationReplySchema.safeParse(payload);
    if (!parsed.success) {
      console.warn('⚠️ LLM prioritization reply has an unexpected shape, using catalog order');
      return catalogPrioritization(missingItems);
    }

    return {
      suggestions: parsed.data.suggestions,
      reasoning: parsed.data.reasoning,
      priorityOrder: parsed.data.priority_order,
      source: 'model',
    };
  }

  buildFinancialSummary(request: AdvisorQuestion): string {
    const { capacity, ranking } = request;
    const parts = [
      `Renda mensal: ${formatBrl(capacity.monthlyIncome)}`,
      `Gastos fixos: ${formatBrl(capacity.fixedExpenses)}`,
      `Margem de segurança: ${formatPercent(capacity.safetyMarginPct)} (${formatBrl(capacity.safetyMargin)})`,
      `Fluxo livre: ${formatBrl(capacity.freeCashFlow)}`,
      `Parcelas já assumidas: ${formatBrl(capacity.currentCommitments)}`,
      `Disponível para novas compras: ${formatBrl(capacity.availableForNew)}`,
      `Capacidade segura de parcela: ${formatBrl(capacity.safeCapacity)}`,
    ];

    if (ranking?.status === 'ok') {
      parts.push('', 'Opções avaliadas (score de 0 a 100):');
      ranking.rankedOffers.forEach((offer) => {
        parts.push(
          `- ${offer.store}: à vista ${formatBrl(offer.cashPrice)}, ${offer.installmentCount}x de ${formatBrl(offer.monthlyInstallment)}, score ${offer.score}`,
        );
      });
      parts.push(`Recomendação: ${ranking.recommendation.title} ${ranking.recommendation.message}`);
    }

    return parts.join('\n');
  }

  fallbackAnswer(request: AdvisorQuestion): string {
    const { capacity, ranking } = request;
    const lines = [
      `Seu fluxo livre mensal é de ${formatBrl(capacity.freeCashFlow)}.`,
      `Capacidade segura para novas parcelas: ${formatBrl(capacity.safeCapacity)} por mês (máximo de ${formatBrl(capacity.maxCapacity)}).`,
    ];

    if (capacity.availableForNew.isNegative()) {
      lines.push('Atenção: seus compromissos atuais já superam seu fluxo livre.');
    }

    if (ranking?.status === 'ok') {
      lines.push(`${ranking.recommendation.title} ${ranking.recommendation.message}`);
    } else if (ranking?.status === 'no_offers') {
      lines.push(ranking.message);
    }

    return lines.join('\n');
  }
}
