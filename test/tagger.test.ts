import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG } from "../src/config.js";
import { buildOntology } from "../src/ontology-store.js";
import { buildVocabulary, qualifiersOf, tag } from "../src/tagger.js";
import type { LexiconConfig } from "../src/types.js";
import { loadFixtureKnowledge, PREMIUM_REQUEST } from "./helpers.js";

const { ontology } = loadFixtureKnowledge();
const vocabulary = buildVocabulary(ontology, DEFAULT_CONFIG.lexicon);

describe("tagger", () => {
  it("tags entities, actions and qualifiers in input order", () => {
    const tags = tag(PREMIUM_REQUEST, vocabulary);
    expect(tags.map((t) => `${t.kind}:${t.term}`)).toEqual([
      "qualifier:premium",
      "entity:customer",
      "action:submit",
      "entity:support ticket",
      "action:show",
      "qualifier:priority",
      "entity:dashboard",
      "action:notify",
    ]);
  });

  it("keeps the original text span and offsets", () => {
    const tags = tag("Escalate Support Tickets now", vocabulary);
    const ticket = tags.find((t) => t.term === "support ticket");
    expect(ticket).toMatchObject({ text: "Support Tickets", start: 9, end: 24 });
  });

  it("slices tag text from the original request after non-ASCII capitals", () => {
    const tags = tag("\u0130stanbul Support Ticket", vocabulary);
    const ticket = tags.find((t) => t.term === "support ticket");
    expect(ticket).toMatchObject({ text: "Support Ticket", start: 9, end: 23 });
  });

  it("records the action class of action tags", () => {
    const tags = tag(PREMIUM_REQUEST, vocabulary);
    expect(tags.find((t) => t.term === "notify")?.actionClass).toBe("communication");
    expect(tags.find((t) => t.term === "show")?.actionClass).toBe("presentation");
    expect(tags.find((t) => t.term === "customer")?.actionClass).toBeUndefined();
  });

  it("attaches qualifiers to the nearest entity", () => {
    const tags = tag(PREMIUM_REQUEST, vocabulary);
    const customer = tags.findIndex((t) => t.term === "customer");
    const ticket = tags.findIndex((t) => t.term === "support ticket");
    expect(qualifiersOf(tags, customer)).toEqual(["premium"]);
    expect(qualifiersOf(tags, ticket)).toEqual(["priority"]);
  });

  it("prefers the following entity when distances are equal", () => {
    const tags = tag("order urgent invoice", vocabulary);
    expect(tags[1]).toMatchObject({ kind: "qualifier", term: "urgent", attachedTo: 2 });
  });

  it("prefers the longest phrase", () => {
    const lexicon: LexiconConfig = { actions: {}, qualifiers: [] };
    const local = buildOntology(
      { version: "1", domains: [{ name: "A", owns: ["ticket", "support ticket"] }] },
      1,
    );
    const tags = tag("support ticket", buildVocabulary(local, lexicon));
    expect(tags.map((t) => t.term)).toEqual(["support ticket"]);
  });

  it("lets an action win over an entity with the same term", () => {
    const tags = tag("show it", vocabulary);
    expect(tags).toEqual([{ text: "show", kind: "action", term: "show", start: 0, end: 4, actionClass: "presentation" }]);
  });

  it("returns an empty list for unrecognized text", () => {
    expect(tag("Please make everything faster", vocabulary)).toEqual([]);
    expect(tag("", vocabulary)).toEqual([]);
  });

  it("is deterministic", () => {
    expect(tag(PREMIUM_REQUEST, vocabulary)).toEqual(tag(PREMIUM_REQUEST, vocabulary));
  });
});
