import type { ProjectType } from './PurchasePlan.js';

export interface SuggestionPrioritization {
  suggestions: string[];
  reasoning: string;
  priorityOrder: string[];
  source: 'model' | 'catalog';
}

export interface ProjectSuggestion {
  planId: string;
  planName: string;
  projectType: ProjectType;
  existingItems: string[];
  missingItems: string[];
  prioritization: SuggestionPrioritization;
}
