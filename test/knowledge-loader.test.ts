import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG } from "../src/config.js";
import { loadKnowledgeBase } from "../src/knowledge-loader.js";
import type { Warning } from "../src/types.js";
import { KNOWLEDGE_PATHS } from "./helpers.js";

describe("knowledge-loader", () => {
  it("loads the ontology and a catalog wrapped in a components object", () => {
    const warnings: Warning[] = [];
    const { ontology, catalog } = loadKnowledgeBase(KNOWLEDGE_PATHS, DEFAULT_CONFIG, warnings);

    expect(ontology.version).toBe("2024.1");
    expect(ontology.domains.map((d) => d.name)).toEqual([
      "Customer & Identity",
      "Order Management",
      "Billing",
      "Logistics",
      "Frontend Experience",
      "Integration & Event",
      "Analytics & Reporting",
    ]);
    expect(catalog.entries).toHaveLength(8);
    expect(catalog.byName.get("agent-portal")?.technology).toBe("react");
    expect(warnings).toEqual([
      {
        level: "info",
        module: "ontology-store",
        message: 'Domain "Billing" lists "billing-service" but no catalog component matches it',
      },
    ]);
  });

  it("uses the configured default weight for list-style triggers", () => {
    const config = { scoring: { ...DEFAULT_CONFIG.scoring, defaultTriggerWeight: 2 } };
    const { ontology } = loadKnowledgeBase(KNOWLEDGE_PATHS, config);
    const logistics = ontology.domains.find((d) => d.name === "Logistics");
    expect(logistics?.triggers.get("delivery")).toBe(2);
  });

  it("reports missing files as errors and returns an empty knowledge base", () => {
    const warnings: Warning[] = [];
    const { ontology, catalog } = loadKnowledgeBase(
      { ontology: "/nonexistent/ontology.json", catalog: "/nonexistent/catalog.json" },
      DEFAULT_CONFIG,
      warnings,
    );
    expect(ontology.domains).toEqual([]);
    expect(catalog.entries).toEqual([]);
    expect(warnings.filter((w) => w.level === "error").map((w) => w.message)).toEqual([
      "Knowledge file not found: /nonexistent/ontology.json",
      "Ontology has no domains array",
      "Knowledge file not found: /nonexistent/catalog.json",
    ]);
  });
});
