import { fileURLToPath } from "node:url";
import { DEFAULT_CONFIG } from "../src/config.js";
import { loadKnowledgeBase } from "../src/knowledge-loader.js";
import type { AnalysisContext } from "../src/pipeline.js";
import type { KnowledgeBase, ResolvedConfig, Warning } from "../src/types.js";

export const KNOWLEDGE_PATHS = {
  ontology: fileURLToPath(new URL("./fixtures/knowledge/ontology.json", import.meta.url)),
  catalog: fileURLToPath(new URL("./fixtures/knowledge/catalog.json", import.meta.url)),
};

export const PREMIUM_REQUEST =
  "When a premium customer submits a support ticket, show their priority status on the agent dashboard and notify the assigned team lead";

export function loadFixtureKnowledge(warnings: Warning[] = []): KnowledgeBase {
  return loadKnowledgeBase(KNOWLEDGE_PATHS, DEFAULT_CONFIG, warnings);
}

export function makeContext(overrides: Partial<ResolvedConfig> = {}): AnalysisContext {
  const { ontology, catalog } = loadFixtureKnowledge();
  return { ontology, catalog, config: { ...DEFAULT_CONFIG, ...overrides } };
}
