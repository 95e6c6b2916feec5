// src/pipeline.ts — Pipeline Orchestrator
// Tagger → Domain Scorer → Component Resolver run synchronously to completion,
// then the Refinement Session takes over. Warnings are shared by every stage.

import type {
  ComponentCatalog,
  DiscoveryBackend,
  Hypothesis,
  Ontology,
  ResolvedConfig,
  Warning,
} from "./types.js";
import { buildVocabulary, tag } from "./tagger.js";
import { score } from "./domain-scorer.js";
import { RefinementSession } from "./refinement-session.js";
import { assemble } from "./hypothesis-assembler.js";

/** Verbose logger — writes to stderr only when verbose is enabled. */
export function vlog(verbose: boolean, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

export interface AnalysisContext {
  ontology: Ontology;
  /** Snapshot of the shared catalog; later registrations do not affect this run. */
  catalog: ComponentCatalog;
  config: ResolvedConfig;
  discovery?: DiscoveryBackend;
}

/**
 * Tag and score a change request and open a refinement session over the result.
 */
export function startSession(
  request: string,
  context: AnalysisContext,
  warnings: Warning[] = [],
): RefinementSession {
  const { ontology, catalog, config } = context;
  const verbose = config.verbose;
  const startTime = performance.now();

  const vocabulary = buildVocabulary(ontology, config.lexicon);
  const tags = tag(request, vocabulary);
  vlog(verbose, `Tagged ${tags.length} term(s): ${tags.map((t) => `${t.term}/${t.kind}`).join(", ") || "none"}`);

  const scored = score(tags, ontology, config.scoring, warnings);
  if (scored.records.length === 0) {
    vlog(verbose, "No domain vocabulary matched; asking for a rephrase");
  }
  for (const record of scored.records) {
    vlog(verbose, `  ${record.domain}: ${record.impactType} ${record.confidence} (score ${record.score})`);
  }
  if (scored.tie) {
    vlog(verbose, `  Ownership tie: ${scored.tie.join(", ")}`);
  }

  const session = new RefinementSession({
    request,
    ontology,
    catalog,
    scored,
    config,
    warnings,
    ...(context.discovery ? { discovery: context.discovery } : {}),
  });

  const open = session.openQuestions();
  vlog(verbose, `Session ${session.state}: ${open.length} open question(s)`);
  vlog(verbose, `Analysis time: ${Math.round(performance.now() - startTime)}ms`);
  return session;
}

/**
 * One-shot analysis without a dialogue: the hypothesis as first proposed,
 * with every open question listed.
 */
export function analyzeRequest(
  request: string,
  context: AnalysisContext,
  warnings: Warning[] = [],
): Hypothesis {
  return assemble(startSession(request, context, warnings));
}
