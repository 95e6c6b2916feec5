import { describe, it, expect, vi, afterEach } from "vitest";
import { assemble, createEngine, loadEngine } from "../src/index.js";
import { KNOWLEDGE_PATHS, loadFixtureKnowledge, PREMIUM_REQUEST } from "./helpers.js";

describe("integration: engine", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("loads the knowledge base and analyzes a request end-to-end", () => {
    const engine = loadEngine(KNOWLEDGE_PATHS);
    expect(engine.warnings.map((w) => w.message)).toEqual([
      'Domain "Billing" lists "billing-service" but no catalog component matches it',
    ]);

    const hypothesis = engine.analyze(PREMIUM_REQUEST);
    expect(hypothesis.impactMatrix.map((r) => [r.domain, r.confidence])).toEqual([
      ["Customer & Identity", "high"],
      ["Frontend Experience", "high"],
      ["Integration & Event", "high"],
    ]);
    expect(hypothesis.impactMatrix.some((r) => r.domain === "Analytics & Reporting")).toBe(false);
  });

  it("produces a HIGH ownership question for two uniquely owned entities", () => {
    const engine = createEngine(loadFixtureKnowledge());
    const hypothesis = engine.analyze("Attach the invoice to the shipment");
    expect(hypothesis.openQuestions[0]).toMatchObject({ id: "tie/billing+logistics", priority: "high", blocking: true });
    expect(hypothesis.impactMatrix.map((r) => r.confidence)).toEqual(["high", "high"]);
  });

  it("applies engine options", () => {
    const engine = createEngine(loadFixtureKnowledge(), { exclude: ["customer-web"], scoring: { highThreshold: 4 } });
    const hypothesis = engine.analyze(PREMIUM_REQUEST);
    expect(hypothesis.impactMatrix[1].components).toEqual(["agent-portal"]);
    expect(hypothesis.status).toBe("open");
    expect(hypothesis.openQuestions.map((q) => q.id)).toEqual([
      "confirm/agent-portal",
      "confirm/notification-gateway",
    ]);
  });

  it("keeps running sessions on their catalog snapshot when a component is registered", () => {
    const engine = createEngine(loadFixtureKnowledge());
    const earlier = engine.startSession("Attach the invoice to the shipment");

    expect(
      engine.register({
        name: "billing-service",
        domain: "Billing",
        type: "backend-service",
        apis: ["POST /invoices"],
        publishes: ["InvoiceIssued"],
        consumes: [],
      }),
    ).toBe(true);

    expect(earlier.openQuestions().map((q) => q.id)).toEqual(["tie/billing+logistics", "owner/billing"]);
    const later = engine.startSession("Attach the invoice to the shipment");
    expect(later.openQuestions().map((q) => q.id)).toEqual(["tie/billing+logistics"]);
    expect(later.snapshot().hypotheses.map((h) => h.component)).toEqual(["billing-service", "fulfillment-service"]);
  });

  it("drives a session to a resolved hypothesis", () => {
    const engine = createEngine(loadFixtureKnowledge());
    const session = engine.startSession("Attach the invoice to the shipment");

    const tie = session.nextQuestion();
    expect(tie?.id).toBe("tie/billing+logistics");
    session.answer("tie/billing+logistics", { kind: "choose", option: "Billing" });

    const owner = session.nextQuestion();
    expect(owner?.options).toEqual(["billing-service"]);
    session.answer("owner/billing", { kind: "choose", option: "billing-service" });

    expect(session.nextQuestion()).toBeUndefined();
    expect(session.state).toBe("resolved");
    expect(session.snapshot().warnings.at(-1)?.message).toBe(
      'Unknown component "billing-service" (answer to "owner/billing") added as a speculative catalog entry',
    );
  });

  it("keeps each session's warnings to itself", () => {
    const engine = loadEngine(KNOWLEDGE_PATHS);
    const first = engine.startSession("Attach the invoice to the shipment");
    const second = engine.startSession("Track delivery delays");

    first.answer("owner/billing", { kind: "choose", option: "billing-service" });

    const loadWarning = 'Domain "Billing" lists "billing-service" but no catalog component matches it';
    expect(first.snapshot().warnings.map((w) => w.message)).toEqual([
      loadWarning,
      'Unknown component "billing-service" (answer to "owner/billing") added as a speculative catalog entry',
    ]);
    expect(assemble(second).warnings.map((w) => w.message)).toEqual([loadWarning]);
    expect(engine.warnings.map((w) => w.message)).toEqual([loadWarning]);
  });

  it("ignores a blank exclude pattern instead of failing", () => {
    const engine = createEngine(loadFixtureKnowledge(), { exclude: [""] });
    expect(engine.warnings.map((w) => w.message)).toEqual(["Ignoring 1 empty exclude pattern(s)"]);
    const hypothesis = engine.analyze(PREMIUM_REQUEST);
    expect(hypothesis.impactMatrix[1].components).toEqual(["agent-portal", "customer-web"]);
  });

  it("writes verbose diagnostics to stderr", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    createEngine(loadFixtureKnowledge(), { verbose: true }).analyze("Track delivery delays");

    const lines = stderr.mock.calls.map((call) => String(call[0]));
    expect(lines[0]).toBe("[INFO] Ontology 2024.1: 7 domain(s), 8 component(s)\n");
    expect(lines).toContain("[INFO] Tagged 1 term(s): delivery/entity\n");
    expect(lines).toContain("[INFO]   Logistics: possible medium (score 1)\n");
  });

  it("stays silent without verbose", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    createEngine(loadFixtureKnowledge()).analyze(PREMIUM_REQUEST);
    expect(stderr).not.toHaveBeenCalled();
  });
});
