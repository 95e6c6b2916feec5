import { describe, it, expect } from "vitest";
import {
  contextTerms,
  normalizePhrase,
  normalizeWord,
  slugify,
  splitIdentifier,
  tokenize,
} from "../src/text-normalizer.js";

describe("text-normalizer", () => {
  describe("tokenize", () => {
    it("lowercases words and keeps character offsets", () => {
      expect(tokenize("Show the VIP dashboard")).toEqual([
        { word: "show", start: 0, end: 4 },
        { word: "the", start: 5, end: 8 },
        { word: "vip", start: 9, end: 12 },
        { word: "dashboard", start: 13, end: 22 },
      ]);
    });

    it("keeps offsets into the original text when lowercasing changes length", () => {
      expect(tokenize("\u0130 Ticket")).toEqual([{ word: "ticket", start: 2, end: 8 }]);
    });

    it("keeps hyphenated words together", () => {
      expect(tokenize("high-value orders").map((t) => t.word)).toEqual(["high-value", "orders"]);
    });

    it("returns nothing for punctuation only", () => {
      expect(tokenize("?! ...")).toEqual([]);
    });
  });

  describe("normalizeWord", () => {
    it("folds plurals and third person", () => {
      expect(normalizeWord("tickets")).toBe("ticket");
      expect(normalizeWord("notifies")).toBe("notify");
      expect(normalizeWord("submits")).toBe("submit");
    });

    it("leaves -ss, -us and -is endings alone", () => {
      expect(normalizeWord("address")).toBe("address");
      expect(normalizeWord("status")).toBe("status");
      expect(normalizeWord("analysis")).toBe("analysis");
    });

    it("leaves short words alone", () => {
      expect(normalizeWord("ids")).toBe("ids");
      expect(normalizeWord("ties")).toBe("tie");
    });
  });

  it("normalizes phrases word by word", () => {
    expect(normalizePhrase("Support  Tickets")).toBe("support ticket");
  });

  describe("splitIdentifier", () => {
    it("splits camel case event names", () => {
      expect(splitIdentifier("OrderPlaced")).toEqual(["order", "placed"]);
    });

    it("splits HTTP routes", () => {
      expect(splitIdentifier("GET /orders/{id}")).toEqual(["get", "order", "id"]);
    });

    it("splits kebab and snake case", () => {
      expect(splitIdentifier("ticket_submitted-v2")).toEqual(["ticket", "submitted", "v2"]);
    });
  });

  it("extracts context terms without stop words or short words", () => {
    expect(contextTerms("Orders for the order-service in EU")).toEqual(["order", "service"]);
  });

  it("slugifies domain names", () => {
    expect(slugify("Customer & Identity")).toBe("customer-and-identity");
    expect(slugify("  Analytics / Reporting ")).toBe("analytics-reporting");
  });
});
