import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import { ZodError } from 'zod';
import { ProfileNotFoundError } from './application/errors/ProfileNotFoundError.js';
import { FinancialInputError } from './domain/errors/FinancialInputError.js';
import type { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import {
  presentAffordability,
  presentCapacity,
  presentImportAnalysis,
  presentInstallmentQuote,
  presentInstallmentSuggestion,
  presentPayment,
  presentPlan,
  presentPlanSummary,
  presentProfile,
  presentQuote,
  presentSmartChoice,
} from './infrastructure/http/presenters.js';

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

const handle =
  (handler: AsyncHandler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

export const createApp = (container: AppContainer) => {
  const app = express();
  const currency = container.config.app.baseCurrency;
  const finance = container.financeService;
  const users = container.userFinanceService;

  app.use(cors({ origin: container.config.app.corsOrigin, credentials: false }));
  app.use(express.json({ limit: '1mb' }));

  app.get('/api/health', (req, res) => {
    res.json({
      name: 'Smart Choice Finance API',
      version: '0.1.0',
      baseCurrency: currency,
      liveQuotes: container.hasLiveQuotes(),
      llmConfigured: container.hasLlm(),
    });
  });

  app.post('/api/capacity', (req, res) => {
    res.json(presentCapacity(finance.computeCapacity(req.body), currency));
  });

  app.post(
    '/api/import',
    handle(async (req, res) => {
      res.json(presentImportAnalysis(await finance.analyzeImport(req.body)));
    }),
  );

  app.post('/api/payment', (req, res) => {
    res.json(presentPayment(finance.analyzePayment(req.body), currency));
  });

  app.post('/api/offers/rank', (req, res) => {
    const result = finance.rankOffers(req.body);
    res.status(result.status === 'no_offers' ? 422 : 200).json(presentSmartChoice(result, currency));
  });

  app.post('/api/affordability', (req, res) => {
    res.json(presentAffordability(finance.classifyAffordability(req.body), currency));
  });

  app.get(
    '/api/fx/usd-brl',
    handle(async (req, res) => {
      res.json(presentQuote(await finance.getDollarQuote()));
    }),
  );

  app.post('/api/prices/parse', (req, res) => {
    const amount = finance.parsePrice(req.body);
    res.json({ amount: amount ? amount.toFixed(2) : null });
  });

  app.post('/api/installments/quote', (req, res) => {
    res.json(presentInstallmentQuote(finance.quoteInstallments(req.body), currency));
  });

  app.post('/api/installments/suggest', (req, res) => {
    res.json(presentInstallmentSuggestion(finance.suggestInstallments(req.body), currency));
  });

  app.put(
    '/api/users/:userId/profile',
    handle(async (req, res) => {
      res.json(presentProfile(await users.saveProfile(req.params.userId, req.body), currency));
    }),
  );

  app.post(
    '/api/users/:userId/plans',
    handle(async (req, res) => {
      const { plan, summary } = await users.savePlan(req.params.userId, req.body);
      res.status(201).json({ plan: presentPlan(plan), summary: presentPlanSummary(summary) });
    }),
  );

  app.delete(
    '/api/users/:userId/plans/:planId',
    handle(async (req, res) => {
      const deleted = await users.deletePlan(req.params.userId, req.params.planId);
      res.status(deleted ? 204 : 404).end();
    }),
  );

  app.get(
    '/api/users/:userId/overview',
    handle(async (req, res) => {
      const overview = await users.getOverview(req.params.userId);
      res.json({
        userId: overview.userId,
        profile: presentProfile(overview.profile, currency),
        capacity: presentCapacity(overview.capacity, currency),
        commitmentPct: overview.commitmentPct.toFixed(1),
        overCommitted: overview.overCommitted,
        plans: overview.plans.map(presentPlanSummary),
      });
    }),
  );

  app.post(
    '/api/users/:userId/smart-choice',
    handle(async (req, res) => {
      const { capacity, result } = await users.smartChoiceForUser(req.params.userId, req.body);
      res.status(result.status === 'no_offers' ? 422 : 200).json({
        ...presentSmartChoice(result, currency),
        userCapacity: presentCapacity(capacity, currency),
      });
    }),
  );

  app.post(
    '/api/users/:userId/affordability',
    handle(async (req, res) => {
      res.json(presentAffordability(await users.affordabilityForUser(req.params.userId, req.body), currency));
    }),
  );

  app.get(
    '/api/users/:userId/suggestions',
    handle(async (req, res) => {
      res.json({ suggestions: await users.suggestMissingItems(req.params.userId) });
    }),
  );

  app.post(
    '/api/users/:userId/ask',
    handle(async (req, res) => {
      const result = await users.askAdvisor(req.params.userId, req.body);
      console.log(`✅ Advisor answer generated for ${req.params.userId}`);
      res.json({
        answer: result.answer,
        capacity: presentCapacity(result.capacity, currency),
        ranking: result.ranking ? presentSmartChoice(result.ranking, currency) : undefined,
        timestamp: result.answeredAt,
      });
    }),
  );

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'API endpoint not found' });
  });

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof ZodError) {
      res.status(400).json({ error: 'Invalid request', issues: error.issues });
      return;
    }

    if (error instanceof FinancialInputError) {
      res.status(400).json({ error: error.message, field: error.field });
      return;
    }

    if (error instanceof ProfileNotFoundError) {
      res.status(404).json({ error: error.message });
      return;
    }

    console.error('Request failed:', error);
    res.status(500).json({ error: error instanceof Error ? error.message : 'Unexpected error' });
  });

  return app;
};
