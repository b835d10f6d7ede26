import type { CapacitySnapshot } from '../../domain/entities/CapacitySnapshot.js';
import type { SuggestionPrioritization } from '../../domain/entities/ProjectSuggestion.js';
import type { ProjectType } from '../../domain/entities/PurchasePlan.js';
import type { SmartChoiceResult } from '../../domain/services/SmartChoiceEngine.js';

export interface AdvisorQuestion {
  question: string;
  capacity: CapacitySnapshot;
  ranking?: SmartChoiceResult;
}

export interface MissingItemsRequest {
  projectName: string;
  projectType: ProjectType;
  existingItems: string[];
  missingItems: string[];
}

export interface RecommendationNarratorPort {
  answerQuestion(request: AdvisorQuestion): Promise<string>;
  /** Never rejects: falls back to the catalog order. */
  prioritizeMissingItems(request: MissingItemsRequest): Promise<SuggestionPrioritization>;
}
