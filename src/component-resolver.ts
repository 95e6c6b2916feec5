// src/component-resolver.ts — Component Resolver
// Narrows an impacted domain to catalog components with templated change hints.
// A domain with no catalog components still yields a speculative placeholder.

import type {
  ComponentCatalog,
  ComponentDescriptor,
  ComponentHypothesis,
  DiscoveryBackend,
  ImpactRecord,
  ImpactType,
  OpenQuestion,
  Ontology,
} from "./types.js";
import { findDomain } from "./ontology-store.js";
import { componentOwnerQuestion, confirmImpactQuestion } from "./questions.js";
import { contextTerms, slugify } from "./text-normalizer.js";

export interface ResolveOptions {
  /** True for component names excluded by config. */
  isExcluded?: (name: string) => boolean;
  /** Shared HIGH question for records tied on ownership. */
  tieQuestion?: OpenQuestion;
  /** Used to suggest answers for owner and confirmation questions. */
  discovery?: DiscoveryBackend;
  maxSuggestions?: number;
}

const CHANGE_TEMPLATES: Record<ImpactType, (term: string) => string> = {
  "core-change": (term) => `Extend ${term} handling`,
  "ui-change": (term) => `Update ${term} presentation`,
  "api-change": (term) => `Revise ${term} API contract`,
  "side-effect": (term) => `Emit ${term} event`,
  dependency: (term) => `Consume ${term} from the owning domain`,
  possible: (term) => `Assess ${term} impact`,
};

const PLACEHOLDER_PREFIX = "unassigned/";
const EXPOSED_APIS_PREFIX = "Review exposed APIs: ";
const PUBLISHED_EVENTS_PREFIX = "Extend published events: ";
const DEFAULT_MAX_SUGGESTIONS = 3;

/**
 * Resolve one impact record to component hypotheses, in catalog order.
 */
export function resolve(
  record: ImpactRecord,
  catalog: ComponentCatalog,
  ontology: Ontology,
  options: ResolveOptions = {},
): ComponentHypothesis[] {
  if (record.status === "rejected") return [];

  const isExcluded = options.isExcluded ?? (() => false);
  const components = catalog.entries.filter((c) => c.domain === record.domain && !isExcluded(c.name));

  if (components.length === 0) {
    return [placeholderFor(record, ontology, options)];
  }

  return components.map((component) => ({
    component: component.name,
    domain: component.domain,
    changeKind: record.impactType,
    probableChanges: probableChanges(record, record.impactType, component),
    openQuestions: questionsFor(record, component, options),
    speculative: false,
    status: "proposed",
  }));
}

/**
 * Templated change descriptors: one per matched term, plus component-specific hints.
 */
export function probableChanges(
  record: ImpactRecord,
  changeKind: ImpactType,
  component?: ComponentDescriptor,
): string[] {
  const terms = [...new Set([...record.matchedEntities, ...record.matchedTriggers, ...record.matchedActions])];
  const template = CHANGE_TEMPLATES[changeKind];
  const changes = terms.map(template);

  if (changes.length === 0) {
    changes.push(`Apply ${changeKind} for ${record.domain}`);
  }
  if (component && component.apis.length > 0 && (changeKind === "core-change" || changeKind === "api-change")) {
    changes.push(`${EXPOSED_APIS_PREFIX}${component.apis.join(", ")}`);
  }
  if (component && component.publishes.length > 0 && changeKind === "side-effect") {
    changes.push(`${PUBLISHED_EVENTS_PREFIX}${component.publishes.join(", ")}`);
  }
  return changes;
}

/** True for the hint lines that list a component's own APIs or events. */
export function isSurfaceHint(change: string): boolean {
  return change.startsWith(EXPOSED_APIS_PREFIX) || change.startsWith(PUBLISHED_EVENTS_PREFIX);
}

export function placeholderName(domain: string): string {
  return `${PLACEHOLDER_PREFIX}${slugify(domain)}`;
}

export function isPlaceholder(component: string): boolean {
  return component.startsWith(PLACEHOLDER_PREFIX);
}

function questionsFor(
  record: ImpactRecord,
  component: ComponentDescriptor,
  options: ResolveOptions,
): OpenQuestion[] {
  if (record.tiedWith && options.tieQuestion) return [options.tieQuestion];
  if (record.confidence === "high") return [];

  const alternatives = suggest(record, options).filter((name) => name !== component.name);
  return [confirmImpactQuestion(component.name, record.domain, record.confidence, alternatives)];
}

function placeholderFor(
  record: ImpactRecord,
  ontology: Ontology,
  options: ResolveOptions,
): ComponentHypothesis {
  const domain = findDomain(ontology, record.domain);
  const declared = (domain?.components ?? []).filter((ref) => !/[*?[\]{}!]/.test(ref));
  const suggestions = [...new Set([...declared, ...suggest(record, options)])]
    .slice(0, options.maxSuggestions ?? DEFAULT_MAX_SUGGESTIONS);

  return {
    component: placeholderName(record.domain),
    domain: record.domain,
    changeKind: record.impactType,
    probableChanges: probableChanges(record, record.impactType),
    openQuestions: [componentOwnerQuestion(record.domain, domain?.responsibility ?? "", suggestions)],
    speculative: true,
    status: "proposed",
  };
}

function suggest(record: ImpactRecord, options: ResolveOptions): string[] {
  if (!options.discovery) return [];
  const terms = contextTerms(
    [record.domain, ...record.matchedEntities, ...record.matchedTriggers].join(" "),
  );
  const isExcluded = options.isExcluded ?? (() => false);
  return options.discovery
    .discover(terms)
    .map((m) => m.component.name)
    .filter((name) => !isExcluded(name))
    .slice(0, options.maxSuggestions ?? DEFAULT_MAX_SUGGESTIONS);
}
