import crypto from 'node:crypto';
import dayjs from 'dayjs';
import type Decimal from 'decimal.js';
import type { AffordabilityResult } from '../../domain/entities/Affordability.js';
import type { CapacitySnapshot } from '../../domain/entities/CapacitySnapshot.js';
import type { FinancialProfile } from '../../domain/entities/FinancialProfile.js';
import type { ProjectSuggestion } from '../../domain/entities/ProjectSuggestion.js';
import type { ProfileSettings, PurchasePlan, PurchasePlanSummary } from '../../domain/entities/PurchasePlan.js';
import { classifyAffordability } from '../../domain/services/AffordabilityClassifier.js';
import {
  availableCash,
  commitmentPercentage,
  computeCapacity,
  isOverCommitted,
} from '../../domain/services/CapacityCalculator.js';
import { findMissingItems } from '../../domain/services/ProjectSuggestions.js';
import { summarizePlan, totalCommitted } from '../../domain/services/PurchasePlanCalculator.js';
import { rankOffers, type SmartChoiceResult } from '../../domain/services/SmartChoiceEngine.js';
import {
  AskAdvisorRequestSchema,
  ProfileSettingsSchema,
  PurchasePlanInputSchema,
  UserAffordabilityRequestSchema,
  UserIdSchema,
  UserSmartChoiceRequestSchema,
} from '../dto/UserFinanceDTO.js';
import { ProfileNotFoundError } from '../errors/ProfileNotFoundError.js';
import type { ProfileStoragePort } from '../ports/ProfileStoragePort.js';
import type { RecommendationNarratorPort } from '../ports/RecommendationNarratorPort.js';

export interface UserOverview {
  userId: string;
  profile: ProfileSettings;
  capacity: CapacitySnapshot;
  commitmentPct: Decimal;
  overCommitted: boolean;
  plans: PurchasePlanSummary[];
}

export interface UserSmartChoice {
  capacity: CapacitySnapshot;
  result: SmartChoiceResult;
}

export interface AdvisorAnswer {
  answer: string;
  capacity: CapacitySnapshot;
  ranking?: SmartChoiceResult;
  answeredAt: string;
}

const generateId = () => crypto.randomUUID();

// Newest plans first; older ones are left out of the suggestion feed.
const SUGGESTED_PLAN_LIMIT = 3;

/**
 * Profile-backed flows: commitments come from the user's stored purchase plans,
 * and the buyer's cash and monthly capacity come from the stored profile.
 */
export class UserFinanceService {
  constructor(
    private readonly storage: ProfileStoragePort,
    private readonly narrator: RecommendationNarratorPort,
  ) {}

  async saveProfile(rawUserId: unknown, input: unknown): Promise<ProfileSettings> {
    const userId = UserIdSchema.parse(rawUserId);
    const settings = ProfileSettingsSchema.parse(input);

    const profile: ProfileSettings = { ...settings, updatedAt: dayjs().toISOString() };
    await this.storage.saveProfile(userId, profile);

    return profile;
  }

  async savePlan(rawUserId: unknown, input: unknown): Promise<{ plan: PurchasePlan; summary: PurchasePlanSummary }> {
    const userId = UserIdSchema.parse(rawUserId);
    const request = PurchasePlanInputSchema.parse(input);

    const plan: PurchasePlan = {
      id: generateId(),
      userId,
      name: request.name,
      projectType: request.projectType,
      budget: request.budget,
      items: request.items,
      createdAt: dayjs().toISOString(),
    };

    await this.storage.savePurchasePlan(plan);
    return { plan, summary: summarizePlan(plan) };
  }

  async deletePlan(rawUserId: unknown, planId: string): Promise<boolean> {
    const userId = UserIdSchema.parse(rawUserId);
    return this.storage.deletePurchasePlan(userId, planId);
  }

  async getOverview(rawUserId: unknown): Promise<UserOverview> {
    const userId = UserIdSchema.parse(rawUserId);
    const { settings, profile, plans } = await this.loadFinancialProfile(userId);

    return {
      userId,
      profile: settings,
      capacity: this.capacityOf(profile),
      commitmentPct: commitmentPercentage(profile),
      overCommitted: isOverCommitted(profile),
      plans: plans.map(summarizePlan),
    };
  }

  async smartChoiceForUser(rawUserId: unknown, input: unknown): Promise<UserSmartChoice> {
    const userId = UserIdSchema.parse(rawUserId);
    const { offers } = UserSmartChoiceRequestSchema.parse(input);
    const { profile } = await this.loadFinancialProfile(userId);
    const capacity = this.capacityOf(profile);

    const result = rankOffers({
      availableCash: availableCash(profile),
      monthlyCapacity: capacity.safeCapacity,
      offers,
    });

    return { capacity, result };
  }

  async affordabilityForUser(rawUserId: unknown, input: unknown): Promise<AffordabilityResult> {
    const userId = UserIdSchema.parse(rawUserId);
    const item = UserAffordabilityRequestSchema.parse(input);
    const { profile } = await this.loadFinancialProfile(userId);

    return classifyAffordability(profile, item);
  }

  async askAdvisor(rawUserId: unknown, input: unknown): Promise<AdvisorAnswer> {
    const userId = UserIdSchema.parse(rawUserId);
    const request = AskAdvisorRequestSchema.parse(input);
    const { profile } = await this.loadFinancialProfile(userId);
    const capacity = this.capacityOf(profile);

    const ranking = request.offers
      ? rankOffers({ availableCash: availableCash(profile), monthlyCapacity: capacity.safeCapacity, offers: request.offers })
      : undefined;

    const answer = await this.narrator.answerQuestion({ question: request.question, capacity, ranking });

    return { answer, capacity, ranking, answeredAt: dayjs().toISOString() };
  }

  /** Catalog items each recent plan still lacks, ordered by the narrator. */
  async suggestMissingItems(rawUserId: unknown): Promise<ProjectSuggestion[]> {
    const userId = UserIdSchema.parse(rawUserId);
    const plans = (await this.storage.listPurchasePlans(userId)).slice(0, SUGGESTED_PLAN_LIMIT);
    const suggestions: ProjectSuggestion[] = [];

    for (const plan of plans) {
      const existingItems = plan.items.map((item) => item.name);
      const missingItems = findMissingItems(plan.projectType, existingItems);

      if (missingItems.length === 0) {
        continue;
      }

      const prioritization = await this.narrator.prioritizeMissingItems({
        projectName: plan.name,
        projectType: plan.projectType,
        existingItems,
        missingItems,
      });

      suggestions.push({
        planId: plan.id,
        planName: plan.name,
        projectType: plan.projectType,
        existingItems,
        missingItems,
        prioritization,
      });
    }

    return suggestions;
  }

  private capacityOf(profile: FinancialProfile): CapacitySnapshot {
    return computeCapacity({
      monthlyIncome: profile.monthlyIncome,
      fixedExpenses: profile.fixedExpenses,
      safetyMarginPct: profile.safetyMarginPct,
      currentCommitments: profile.totalCommitted,
    });
  }

  private async loadFinancialProfile(
    userId: string,
  ): Promise<{ settings: ProfileSettings; profile: FinancialProfile; plans: PurchasePlan[] }> {
    const settings = await this.storage.loadProfile(userId);
    if (!settings) {
      throw new ProfileNotFoundError(userId);
    }

    const plans = await this.storage.listPurchasePlans(userId);

    return {
      settings,
      plans,
      profile: {
        monthlyIncome: settings.monthlyIncome,
        fixedExpenses: settings.fixedExpenses,
        safetyMarginPct: settings.safetyMarginPct,
        totalCommitted: totalCommitted(plans),
      },
    };
  }
}
