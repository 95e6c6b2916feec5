// src/discovery-search.ts — Discovery Search
// Ranks catalog components for a business context:
//   name substring × 3 + domain name × 2 + API/event fragment × 1.
// Equal scores keep catalog insertion order. No match is an empty list, never an error.

import type { ComponentCatalog, ComponentDescriptor, DiscoveryBackend, DiscoveryMatch } from "./types.js";
import { normalizeWord, splitIdentifier } from "./text-normalizer.js";

const NAME_WEIGHT = 3;
const DOMAIN_WEIGHT = 2;
const FRAGMENT_WEIGHT = 1;

/**
 * Rank components of `catalog` against the given context terms.
 */
export function discover(
  contextTerms: readonly string[],
  catalog: ComponentCatalog,
): DiscoveryMatch[] {
  const terms = [...new Set(contextTerms.map((t) => normalizeWord(t.trim())).filter((t) => t !== ""))];
  if (terms.length === 0) return [];

  const scored = catalog.entries.map((component, index) => ({
    component,
    score: scoreComponent(component, terms),
    index,
  }));

  return scored
    .filter((s) => s.score > 0)
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map(({ component, score }) => ({ component, score }));
}

function scoreComponent(component: ComponentDescriptor, terms: readonly string[]): number {
  const name = component.name.toLowerCase();
  const domain = component.domain.toLowerCase();
  const fragments = new Set(
    [...component.apis, ...component.publishes, ...component.consumes].flatMap(splitIdentifier),
  );

  let total = 0;
  for (const term of terms) {
    if (name.includes(term)) total += NAME_WEIGHT;
    if (domain.includes(term)) total += DOMAIN_WEIGHT;
    if (fragments.has(term)) total += FRAGMENT_WEIGHT;
  }
  return total;
}

/**
 * Default discovery backend: searches whichever catalog snapshot it was given.
 */
export class CatalogDiscovery implements DiscoveryBackend {
  constructor(private readonly catalog: ComponentCatalog) {}

  discover(contextTerms: readonly string[]): DiscoveryMatch[] {
    return discover(contextTerms, this.catalog);
  }
}
