// src/index.ts — Library API
// Entry points: createEngine() / loadEngine(), then analyze() or startSession() per request.

import type {
  ComponentDescriptor,
  DiscoveryBackend,
  EngineOptions,
  Hypothesis,
  KnowledgeBase,
  Ontology,
  ResolvedConfig,
  Warning,
} from "./types.js";
import { resolveConfig } from "./config.js";
import { loadKnowledgeBase, type KnowledgePaths } from "./knowledge-loader.js";
import { CatalogStore } from "./ontology-store.js";
import { analyzeRequest, startSession, vlog, type AnalysisContext } from "./pipeline.js";
import type { RefinementSession } from "./refinement-session.js";

// Re-export all public types
export type {
  ActionClass,
  Answer,
  AnswerOutcome,
  ComponentCatalog,
  ComponentDescriptor,
  ComponentHypothesis,
  ComponentType,
  Confidence,
  DependencyEdge,
  DiscoveryBackend,
  DiscoveryMatch,
  Domain,
  DomainKind,
  EngineOptions,
  Hypothesis,
  HypothesisDiff,
  ImpactMatrixRow,
  ImpactRecord,
  ImpactType,
  KnowledgeBase,
  OpenQuestion,
  Ontology,
  QuestionTopic,
  RawOntology,
  ResolutionEntry,
  ResolvedConfig,
  ScoreResult,
  SessionSnapshot,
  SessionState,
  Tag,
  UnresolvedQuestion,
  Warning,
} from "./types.js";
export type { KnowledgePaths } from "./knowledge-loader.js";
export type { AnalysisContext } from "./pipeline.js";

export { ENGINE_VERSION } from "./types.js";
export { DEFAULT_CONFIG, resolveConfig, mergeConfig } from "./config.js";
export { buildOntology, buildCatalog, extendCatalog, CatalogStore } from "./ontology-store.js";
export { loadKnowledgeBase } from "./knowledge-loader.js";
export { buildVocabulary, tag } from "./tagger.js";
export { score, detectOwnershipTie } from "./domain-scorer.js";
export { resolve } from "./component-resolver.js";
export { discover, CatalogDiscovery } from "./discovery-search.js";
export { RefinementSession } from "./refinement-session.js";
export { assemble } from "./hypothesis-assembler.js";
export { diffHypotheses } from "./hypothesis-diff.js";
export { startSession, analyzeRequest } from "./pipeline.js";

export interface Engine {
  readonly ontology: Ontology;
  readonly config: ResolvedConfig;
  /** Warnings from config resolution, loading and registration. Sessions keep their own copy. */
  readonly warnings: Warning[];
  /** One-shot analysis against the current catalog snapshot. */
  analyze(request: string): Hypothesis;
  /** Open an interactive refinement session against the current catalog snapshot. */
  startSession(request: string): RefinementSession;
  /** Add a component to the shared catalog. Running sessions keep their snapshot. */
  register(descriptor: ComponentDescriptor): boolean;
}

export interface CreateEngineOptions extends Omit<EngineOptions, "discovery"> {
  /** Explicit config file; otherwise archintent.config.json or package.json is searched. */
  configPath?: string;
  discovery?: DiscoveryBackend;
}

/**
 * Wrap an already-validated knowledge base in an engine.
 */
export function createEngine(
  knowledge: KnowledgeBase,
  options: CreateEngineOptions = {},
  warnings: Warning[] = [],
): Engine {
  const { configPath, discovery, ...engineOptions } = options;
  const config = resolveConfig(engineOptions, warnings, configPath);
  return buildEngine(knowledge, config, discovery, warnings);
}

/**
 * Load the ontology and catalog files, then create an engine over them.
 */
export function loadEngine(paths: KnowledgePaths, options: CreateEngineOptions = {}): Engine {
  const warnings: Warning[] = [];
  const { configPath, discovery, ...engineOptions } = options;
  const config = resolveConfig(engineOptions, warnings, configPath);
  const knowledge = loadKnowledgeBase(paths, config, warnings);
  return buildEngine(knowledge, config, discovery, warnings);
}

function buildEngine(
  knowledge: KnowledgeBase,
  config: ResolvedConfig,
  discovery: DiscoveryBackend | undefined,
  warnings: Warning[],
): Engine {
  const store = new CatalogStore(knowledge.catalog);

  vlog(
    config.verbose,
    `Ontology ${knowledge.ontology.version}: ${knowledge.ontology.domains.length} domain(s), ` +
      `${knowledge.catalog.entries.length} component(s)`,
  );

  // Each run starts from the engine's warnings but never writes back to them
  const runWarnings = (): Warning[] => warnings.map((w) => ({ ...w }));

  const context = (): AnalysisContext => ({
    ontology: knowledge.ontology,
    catalog: store.snapshot(),
    config,
    ...(discovery ? { discovery } : {}),
  });

  return {
    ontology: knowledge.ontology,
    config,
    warnings,
    analyze: (request) => analyzeRequest(request, context(), runWarnings()),
    startSession: (request) => startSession(request, context(), runWarnings()),
    register: (descriptor) => store.register(descriptor, warnings),
  };
}
