import catalog from '../data/projectSuggestions.json' with { type: 'json' };
import type { SuggestionPrioritization } from '../entities/ProjectSuggestion.js';
import type { ProjectType } from '../entities/PurchasePlan.js';

const CATALOG_SUGGESTION_LIMIT = 5;
const CATALOG_PRIORITY_LIMIT = 3;

const suggestionsByType: Record<ProjectType, readonly string[]> = catalog;

export const catalogFor = (projectType: ProjectType): readonly string[] => suggestionsByType[projectType];

/**
 * Catalog items for the project type that nothing in the project already covers.
 * Matching is case-insensitive and works both ways, so "Monitor 27 polegadas"
 * covers "Monitor" and "SSD" covers "SSD/HD".
 */
export const findMissingItems = (projectType: ProjectType, existingItems: string[]): string[] => {
  const existing = existingItems.map((name) => name.trim().toLowerCase()).filter((name) => name.length > 0);

  return catalogFor(projectType).filter((suggestion) => {
    const candidate = suggestion.toLowerCase();
    return !existing.some((name) => name.includes(candidate) || candidate.includes(name));
  });
};

export const catalogPrioritization = (missingItems: string[]): SuggestionPrioritization => ({
  suggestions: missingItems.slice(0, CATALOG_SUGGESTION_LIMIT),
  reasoning: 'Baseado no tipo de projeto selecionado.',
  priorityOrder: missingItems.slice(0, CATALOG_PRIORITY_LIMIT),
  source: 'catalog',
});
