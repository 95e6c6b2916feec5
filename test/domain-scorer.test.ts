import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG } from "../src/config.js";
import { buildOntology } from "../src/ontology-store.js";
import { buildVocabulary, tag } from "../src/tagger.js";
import { compareConfidence, confidenceFor, detectOwnershipTie, impactFor, score } from "../src/domain-scorer.js";
import type { Ontology, ScoringConfig, Warning } from "../src/types.js";
import { loadFixtureKnowledge, PREMIUM_REQUEST } from "./helpers.js";

const { ontology } = loadFixtureKnowledge();

function scoreText(text: string, target: Ontology = ontology, scoring: ScoringConfig = DEFAULT_CONFIG.scoring, warnings: Warning[] = []) {
  const tags = tag(text, buildVocabulary(target, DEFAULT_CONFIG.lexicon));
  return score(tags, target, scoring, warnings);
}

describe("domain-scorer", () => {
  it("scores the premium support ticket request as three HIGH domains", () => {
    const result = scoreText(PREMIUM_REQUEST);
    expect(result.records.map((r) => [r.domain, r.impactType, r.confidence])).toEqual([
      ["Customer & Identity", "core-change", "high"],
      ["Frontend Experience", "ui-change", "high"],
      ["Integration & Event", "side-effect", "high"],
    ]);
    expect(result.primary).toBe("Customer & Identity");
    expect(result.tie).toBeUndefined();
  });

  it("explains each record", () => {
    const [customer, frontend, integration] = scoreText(PREMIUM_REQUEST).records;
    expect(customer.reasoning).toEqual([
      "owns: customer [premium], support ticket [priority]",
      'owns the primary entity "customer"',
    ]);
    expect(customer.score).toBe(6);
    expect(frontend.reasoning).toEqual([
      "matched triggers: show (1), dashboard (2)",
      'presentation action "show" implies a user interface change',
    ]);
    expect(frontend.matchedActions).toEqual(["show"]);
    expect(integration.matchedTriggers).toEqual(["notify"]);
    expect(integration.matchedActions).toEqual(["notify"]);
  });

  it("returns no records when no domain vocabulary matches", () => {
    expect(scoreText("Please submit it")).toEqual({ records: [] });
    expect(scoreText("")).toEqual({ records: [] });
  });

  it("surfaces a tie between uniquely owned entities", () => {
    const result = scoreText("Attach the invoice to the shipment");
    expect(result.tie).toEqual(["Billing", "Logistics"]);
    expect(result.primary).toBeUndefined();
    expect(result.records.map((r) => [r.domain, r.confidence, r.tiedWith])).toEqual([
      ["Billing", "high", ["Logistics"]],
      ["Logistics", "high", ["Billing"]],
    ]);
    expect(result.records[0].reasoning.at(-1)).toBe("ties with Logistics for ownership at score 3");

    const question = detectOwnershipTie(result);
    expect(question).toMatchObject({
      id: "tie/billing+logistics",
      topic: "ownership-tie",
      priority: "high",
      options: ["Billing", "Logistics"],
      state: "open",
    });
  });

  it("has no tie question without a tie", () => {
    expect(detectOwnershipTie(scoreText(PREMIUM_REQUEST))).toBeUndefined();
  });

  it("marks a domain reached only through a non-primary entity as a LOW dependency", () => {
    const result = scoreText("Add a checkout step to the order invoice");
    expect(result.primary).toBe("Order Management");
    const billing = result.records.find((r) => r.domain === "Billing");
    expect(billing).toMatchObject({ impactType: "dependency", confidence: "low", score: 3 });
    expect(billing?.reasoning).toEqual([
      "owns: invoice",
      'references "invoice" owned here, not by the primary domain',
    ]);
  });

  it("keeps the primary domain HIGH even when another domain scores more", () => {
    const result = scoreText("Refund the order payment");
    expect(result.primary).toBe("Order Management");
    expect(result.records.map((r) => [r.domain, r.impactType, r.confidence, r.score])).toEqual([
      ["Order Management", "core-change", "high", 3],
      ["Billing", "possible", "medium", 5],
    ]);
  });

  it("adds the integration domain at MEDIUM for a communication action alone", () => {
    const result = scoreText("Escalate support tickets");
    const integration = result.records.find((r) => r.domain === "Integration & Event");
    expect(integration).toEqual({
      domain: "Integration & Event",
      impactType: "side-effect",
      confidence: "medium",
      score: 0,
      matchedTriggers: [],
      matchedEntities: [],
      matchedActions: ["escalate"],
      reasoning: ['communication action "escalate" implies an integration side effect'],
      status: "proposed",
    });
  });

  it("warns when a rule names a kind of domain the ontology lacks", () => {
    const local = buildOntology({ version: "7", domains: [{ name: "Accounts", owns: ["customer"] }] }, 1);
    const warnings: Warning[] = [];
    const result = scoreText("Notify the customer", local, DEFAULT_CONFIG.scoring, warnings);
    expect(result.records.map((r) => r.domain)).toEqual(["Accounts"]);
    expect(warnings).toEqual([
      {
        level: "info",
        module: "domain-scorer",
        message: 'No integration domain in ontology 7; skipped rule: communication action "notify" implies an integration side effect',
      },
    ]);
  });

  it("uses the configured threshold", () => {
    const scoring = { ...DEFAULT_CONFIG.scoring, highThreshold: 4 };
    const frontend = scoreText(PREMIUM_REQUEST, ontology, scoring).records.find((r) => r.domain === "Frontend Experience");
    expect(frontend?.confidence).toBe("medium");
    expect(frontend?.impactType).toBe("ui-change");
  });

  it("gives a trigger-only business domain a possible change", () => {
    const result = scoreText("Track delivery delays");
    expect(result.records).toHaveLength(1);
    expect(result.records[0]).toMatchObject({ domain: "Logistics", impactType: "possible", confidence: "medium", score: 1 });
  });

  it("is deterministic", () => {
    expect(scoreText(PREMIUM_REQUEST)).toEqual(scoreText(PREMIUM_REQUEST));
  });

  describe("helpers", () => {
    it("maps scores to confidence", () => {
      expect(confidenceFor(3, DEFAULT_CONFIG.scoring)).toBe("high");
      expect(confidenceFor(1, DEFAULT_CONFIG.scoring)).toBe("medium");
      expect(confidenceFor(0, DEFAULT_CONFIG.scoring)).toBe("low");
    });

    it("maps domain kinds to impact types", () => {
      expect(impactFor("frontend", "low")).toBe("ui-change");
      expect(impactFor("integration", "medium")).toBe("side-effect");
      expect(impactFor("api", "high")).toBe("api-change");
      expect(impactFor("business", "high")).toBe("core-change");
      expect(impactFor("business", "medium")).toBe("possible");
    });

    it("orders confidence levels", () => {
      expect(compareConfidence("high", "medium")).toBeGreaterThan(0);
      expect(compareConfidence("low", "medium")).toBeLessThan(0);
    });
  });
});
