// src/domain-scorer.ts — Domain Scorer
// Weighted rule table: trigger weights + ownership bonus, then fixed reasoning rules.
// Ties on ownership are surfaced, never broken by list order.

import type {
  Confidence,
  Domain,
  DomainKind,
  ImpactRecord,
  ImpactType,
  OpenQuestion,
  Ontology,
  ScoreResult,
  ScoringConfig,
  Tag,
  Warning,
} from "./types.js";
import { domainOfKind, entityOwners } from "./ontology-store.js";
import { ownershipTieQuestion } from "./questions.js";
import { qualifiersOf } from "./tagger.js";

interface DomainEvidence {
  domain: Domain;
  triggers: string[];
  entities: string[];
  triggerScore: number;
  score: number;
}

const CONFIDENCE_RANK: Record<Confidence, number> = { low: 0, medium: 1, high: 2 };

/**
 * Score every domain against the tags and apply the fixed reasoning rules.
 * Records are unique by domain and listed in ontology order.
 * Returns no records when no tag touches domain vocabulary.
 */
export function score(
  tags: readonly Tag[],
  ontology: Ontology,
  scoring: ScoringConfig,
  warnings: Warning[] = [],
): ScoreResult {
  const owners = entityOwners(ontology);
  const touchesVocabulary = tags.some(
    (t) => owners.has(t.term) || ontology.domains.some((d) => d.triggers.has(t.term)),
  );
  if (!touchesVocabulary) return { records: [] };

  const evidence = ontology.domains.map((domain) => collectEvidence(domain, tags, owners, scoring));

  // Ownership: tie among owning domains, else owner of the first owned entity
  const owning = evidence.filter((e) => e.entities.length > 0);
  const topScore = Math.max(0, ...owning.map((e) => e.score));
  const tied = owning.filter((e) => e.score === topScore).map((e) => e.domain.name);
  const tie = tied.length >= 2 ? tied : undefined;

  let primary: string | undefined;
  if (!tie) {
    const primaryTag =
      tags.find((t) => t.kind === "entity" && owners.has(t.term)) ?? tags.find((t) => owners.has(t.term));
    primary = primaryTag ? owners.get(primaryTag.term) : undefined;
  }

  const records = new Map<string, ImpactRecord>();

  for (const ev of evidence) {
    const name = ev.domain.name;
    const reasoning = describeEvidence(ev, tags);

    if (tie?.includes(name)) {
      const others = tie.filter((d) => d !== name);
      records.set(name, makeRecord(ev, impactFor(ev.domain.kind, "high"), "high", [
        ...reasoning,
        `ties with ${others.join(", ")} for ownership at score ${ev.score}`,
      ], others));
    } else if (name === primary) {
      const impactType: ImpactType = ev.domain.kind === "business" ? "core-change" : impactFor(ev.domain.kind, "high");
      const entity = ev.entities[0];
      records.set(name, makeRecord(ev, impactType, "high", [
        ...reasoning,
        `owns the primary entity "${entity}"`,
      ]));
    } else if (ev.entities.length > 0) {
      // Dependency rule: entity owned here, but the request is primarily about another domain
      const note = `references ${ev.entities.map((e) => `"${e}"`).join(", ")} owned here, not by the primary domain`;
      if (ev.triggerScore > 0) {
        const confidence = confidenceFor(ev.triggerScore, scoring);
        records.set(name, makeRecord(ev, impactFor(ev.domain.kind, confidence), confidence, [...reasoning, note]));
      } else {
        records.set(name, makeRecord(ev, "dependency", "low", [...reasoning, note]));
      }
    } else if (ev.triggerScore > 0) {
      const confidence = confidenceFor(ev.triggerScore, scoring);
      records.set(name, makeRecord(ev, impactFor(ev.domain.kind, confidence), confidence, reasoning));
    }
  }

  // Side-effect rule
  const communication = tags.find((t) => t.kind === "action" && t.actionClass === "communication");
  if (communication) {
    raiseTo(records, ontology, "integration", "side-effect", communication.term,
      `communication action "${communication.term}" implies an integration side effect`, warnings);
  }

  // UI rule
  const presentation = tags.find((t) => t.kind === "action" && t.actionClass === "presentation");
  if (presentation) {
    raiseTo(records, ontology, "frontend", "ui-change", presentation.term,
      `presentation action "${presentation.term}" implies a user interface change`, warnings);
  }

  const order = new Map(ontology.domains.map((d, i) => [d.name, i]));
  const sorted = [...records.values()].sort(
    (a, b) => (order.get(a.domain) ?? 0) - (order.get(b.domain) ?? 0),
  );

  return {
    records: sorted,
    ...(primary ? { primary } : {}),
    ...(tie ? { tie } : {}),
  };
}

/**
 * The HIGH-priority ownership question for a tied score, if any.
 */
export function detectOwnershipTie(result: ScoreResult): OpenQuestion | undefined {
  return result.tie ? ownershipTieQuestion(result.tie) : undefined;
}

export function confidenceFor(value: number, scoring: ScoringConfig): Confidence {
  if (value >= scoring.highThreshold) return "high";
  if (value > 0) return "medium";
  return "low";
}

export function impactFor(kind: DomainKind, confidence: Confidence): ImpactType {
  switch (kind) {
    case "frontend": return "ui-change";
    case "integration": return "side-effect";
    case "api": return "api-change";
    default: return confidence === "high" ? "core-change" : "possible";
  }
}

export function compareConfidence(a: Confidence, b: Confidence): number {
  return CONFIDENCE_RANK[a] - CONFIDENCE_RANK[b];
}

function collectEvidence(
  domain: Domain,
  tags: readonly Tag[],
  owners: ReadonlyMap<string, string>,
  scoring: ScoringConfig,
): DomainEvidence {
  const triggers: string[] = [];
  const entities: string[] = [];
  for (const t of tags) {
    if (domain.triggers.has(t.term) && !triggers.includes(t.term)) triggers.push(t.term);
    if (owners.get(t.term) === domain.name && !entities.includes(t.term)) entities.push(t.term);
  }
  const triggerScore = triggers.reduce((sum, term) => sum + (domain.triggers.get(term) ?? 0), 0);
  return {
    domain,
    triggers,
    entities,
    triggerScore,
    score: triggerScore + scoring.ownershipBonus * entities.length,
  };
}

function describeEvidence(ev: DomainEvidence, tags: readonly Tag[]): string[] {
  const lines: string[] = [];
  if (ev.triggers.length > 0) {
    const parts = ev.triggers.map((t) => `${t} (${ev.domain.triggers.get(t) ?? 0})`);
    lines.push(`matched triggers: ${parts.join(", ")}`);
  }
  if (ev.entities.length > 0) {
    const parts = ev.entities.map((entity) => {
      const index = tags.findIndex((t) => t.term === entity);
      const qualifiers = index >= 0 ? qualifiersOf(tags, index) : [];
      return qualifiers.length > 0 ? `${entity} [${qualifiers.join(", ")}]` : entity;
    });
    lines.push(`owns: ${parts.join(", ")}`);
  }
  return lines;
}

function makeRecord(
  ev: DomainEvidence,
  impactType: ImpactType,
  confidence: Confidence,
  reasoning: string[],
  tiedWith?: string[],
): ImpactRecord {
  return {
    domain: ev.domain.name,
    impactType,
    confidence,
    score: ev.score,
    matchedTriggers: [...ev.triggers],
    matchedEntities: [...ev.entities],
    matchedActions: [],
    reasoning,
    status: "proposed",
    ...(tiedWith ? { tiedWith } : {}),
  };
}

/**
 * Ensure the first domain of `kind` is impacted at least at MEDIUM.
 */
function raiseTo(
  records: Map<string, ImpactRecord>,
  ontology: Ontology,
  kind: DomainKind,
  impactType: ImpactType,
  action: string,
  reason: string,
  warnings: Warning[],
): void {
  const domain = domainOfKind(ontology, kind);
  if (!domain) {
    warnings.push({
      level: "info",
      module: "domain-scorer",
      message: `No ${kind} domain in ontology ${ontology.version}; skipped rule: ${reason}`,
    });
    return;
  }

  const existing = records.get(domain.name);
  if (existing) {
    if (compareConfidence(existing.confidence, "medium") < 0) existing.confidence = "medium";
    if (existing.impactType === "dependency") existing.impactType = impactType;
    if (!existing.matchedActions.includes(action)) existing.matchedActions.push(action);
    existing.reasoning.push(reason);
    return;
  }

  records.set(domain.name, {
    domain: domain.name,
    impactType,
    confidence: "medium",
    score: 0,
    matchedTriggers: [],
    matchedEntities: [],
    matchedActions: [action],
    reasoning: [reason],
    status: "proposed",
  });
}
