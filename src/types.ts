// src/types.ts — ALL shared types for the Architectural Intent Engine

export const ENGINE_VERSION = "0.4.0";

// ─── Warnings (passed to all modules) ────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
}

// ─── Configuration ───────────────────────────────────────────────────────────

export type ActionClass = "communication" | "presentation" | "mutation" | "query";

export interface ScoringConfig {
  /** Added to a domain's score for each distinct owned entity in the request. */
  ownershipBonus: number;
  /** Score at or above which a domain is HIGH confidence. */
  highThreshold: number;
  /** Weight of a trigger phrase declared without an explicit weight. */
  defaultTriggerWeight: number;
}

export interface LexiconConfig {
  actions: Record<string, ActionClass>;
  qualifiers: string[];
}

export interface ResolvedConfig {
  scoring: ScoringConfig;
  lexicon: LexiconConfig;
  /** Glob patterns (picomatch) of catalog components to leave out of analysis. */
  exclude: string[];
  discovery: {
    maxSuggestions: number;
  };
  verbose: boolean;
}

export type EngineOptions = Partial<Omit<ResolvedConfig, "scoring" | "lexicon" | "discovery">> & {
  scoring?: Partial<ScoringConfig>;
  lexicon?: Partial<LexiconConfig>;
  discovery?: Partial<ResolvedConfig["discovery"]>;
};

// ─── Knowledge base ──────────────────────────────────────────────────────────

export type DomainKind = "business" | "frontend" | "integration" | "api";

export interface Domain {
  readonly name: string;
  readonly responsibility: string;
  readonly kind: DomainKind;
  /** Normalized trigger phrase → weight. */
  readonly triggers: ReadonlyMap<string, number>;
  /** Normalized owned entity names. */
  readonly owns: ReadonlySet<string>;
  /** Component names or glob patterns this domain typically contains. */
  readonly components: readonly string[];
}

export interface Ontology {
  readonly version: string;
  readonly domains: readonly Domain[];
}

export type ComponentType = "backend-service" | "frontend-app" | "shared-library" | "integration";

export interface ComponentDescriptor {
  readonly name: string;
  readonly domain: string;
  readonly type: ComponentType;
  readonly technology?: string;
  readonly apis: readonly string[];
  readonly publishes: readonly string[];
  readonly consumes: readonly string[];
  /** Proposed by a refinement answer rather than registered. */
  readonly speculative?: boolean;
}

export interface ComponentCatalog {
  readonly version: number;
  readonly entries: readonly ComponentDescriptor[];
  readonly byName: ReadonlyMap<string, ComponentDescriptor>;
}

/** Raw shapes accepted from a loader before validation. */
export interface RawDomain {
  name?: unknown;
  responsibility?: unknown;
  kind?: unknown;
  triggers?: unknown;
  owns?: unknown;
  components?: unknown;
}

export interface RawOntology {
  version?: unknown;
  domains?: unknown;
}

export interface KnowledgeBase {
  ontology: Ontology;
  catalog: ComponentCatalog;
}

// ─── Tagging ─────────────────────────────────────────────────────────────────

export type TagKind = "entity" | "action" | "qualifier";

export interface Tag {
  /** Span of the input text the tag was read from. */
  text: string;
  kind: TagKind;
  /** Normalized vocabulary term. */
  term: string;
  start: number;
  end: number;
  actionClass?: ActionClass;
  /** For qualifiers: index of the entity tag this qualifier modifies. */
  attachedTo?: number;
}

// ─── Scoring ─────────────────────────────────────────────────────────────────

export type Confidence = "high" | "medium" | "low";

export type ImpactType =
  | "core-change"
  | "ui-change"
  | "api-change"
  | "side-effect"
  | "dependency"
  | "possible";

/** "overridden": a question about it was closed by manual override, not answered. */
export type ResolutionStatus = "proposed" | "confirmed" | "rejected" | "overridden";

export interface ImpactRecord {
  domain: string;
  impactType: ImpactType;
  confidence: Confidence;
  score: number;
  matchedTriggers: string[];
  matchedEntities: string[];
  /** Action terms that fired a reasoning rule for this domain. */
  matchedActions: string[];
  reasoning: string[];
  status: ResolutionStatus;
  /** Other domains sharing the top ownership score with this one. */
  tiedWith?: string[];
}

export interface ScoreResult {
  records: ImpactRecord[];
  /** Name of the primary domain, when ownership was not tied. */
  primary?: string;
  tie?: string[];
}

// ─── Questions ───────────────────────────────────────────────────────────────

export type QuestionTopic =
  | "ownership-tie"
  | "confirm-impact"
  | "component-owner"
  | "event-schema"
  | "rephrase";

export interface QuestionSubject {
  domains: string[];
  component?: string;
}

export interface OpenQuestion {
  id: string;
  topic: QuestionTopic;
  priority: Confidence;
  subject: QuestionSubject;
  prompt: string;
  /** Suggested answers (domain or component names, event names). */
  options: string[];
  state: "open" | "answered";
  answer?: Answer;
}

export type Answer =
  | { kind: "confirm" }
  | { kind: "reject" }
  | { kind: "choose"; option: string }
  | { kind: "reassign"; component: string }
  | { kind: "add-change"; description: string }
  | { kind: "unsure" }
  | { kind: "override" };

// ─── Components ──────────────────────────────────────────────────────────────

export interface ComponentHypothesis {
  component: string;
  domain: string;
  changeKind: ImpactType;
  probableChanges: string[];
  openQuestions: OpenQuestion[];
  /** No catalog entry backs this hypothesis; no domain consistency guarantee. */
  speculative: boolean;
  status: ResolutionStatus;
}

// ─── Discovery ───────────────────────────────────────────────────────────────

export interface DiscoveryMatch {
  component: ComponentDescriptor;
  score: number;
}

export interface DiscoveryBackend {
  discover(contextTerms: readonly string[]): DiscoveryMatch[];
}

// ─── Refinement ──────────────────────────────────────────────────────────────

export type SessionState = "open" | "awaiting-answer" | "resolved" | "stalled" | "cancelled";

export interface ResolutionEntry {
  questionId: string;
  answer: Answer;
}

export interface AnswerOutcome {
  accepted: boolean;
  state: SessionState;
  /** Ids of questions created by this answer. */
  spawned: string[];
  reason?: string;
}

export interface SessionSnapshot {
  request: string;
  ontologyVersion: string;
  state: SessionState;
  records: ImpactRecord[];
  hypotheses: ComponentHypothesis[];
  questions: OpenQuestion[];
  resolutions: ResolutionEntry[];
  speculativeComponents: ComponentDescriptor[];
  stall?: { questionId: string; reason: string };
  warnings: Warning[];
}

// ─── Output ──────────────────────────────────────────────────────────────────

export interface ImpactMatrixRow {
  domain: string;
  impactType: ImpactType;
  confidence: Confidence;
  status: ResolutionStatus;
  components: string[];
}

/** `from` depends on `to`: it consumes an event or calls an API that `to` provides. */
export interface DependencyEdge {
  from: string;
  to: string;
  kind: "event" | "api";
  via: string;
}

export interface UnresolvedQuestion {
  id: string;
  priority: Confidence;
  prompt: string;
  blocking: boolean;
  note?: string;
}

export interface Hypothesis {
  engineVersion: string;
  ontologyVersion: string;
  request: string;
  status: SessionState;
  impactMatrix: ImpactMatrixRow[];
  components: ComponentHypothesis[];
  dependencies: DependencyEdge[];
  openQuestions: UnresolvedQuestion[];
  resolutions: ResolutionEntry[];
  rejectedDomains: string[];
  warnings: Warning[];
}

export interface HypothesisDiff {
  addedDomains: string[];
  removedDomains: string[];
  confidenceChanges: { domain: string; from: Confidence; to: Confidence }[];
  addedComponents: string[];
  removedComponents: string[];
  newDependencies: string[];
  summary: string;
  changed: boolean;
}
