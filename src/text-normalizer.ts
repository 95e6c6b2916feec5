// src/text-normalizer.ts — Token and term normalization shared by tagging and discovery
// Light folding only (plurals, third person). No stemming library, no grammar.

export interface Token {
  word: string;
  start: number;
  end: number;
}

const WORD_PATTERN = /[a-z0-9]+(?:[-'][a-z0-9]+)*/gi;

const STOP_WORDS = new Set([
  "a",
  "an",
  "and",
  "as",
  "at",
  "by",
  "for",
  "from",
  "in",
  "into",
  "of",
  "on",
  "or",
  "the",
  "their",
  "to",
  "when",
  "with",
]);

const MIN_CONTEXT_TERM_LENGTH = 3;

/**
 * Split text into lowercase word tokens with their character offsets.
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  // Offsets index the original text; lowercasing can change a string's length
  for (const match of text.matchAll(WORD_PATTERN)) {
    const start = match.index ?? 0;
    tokens.push({ word: match[0].toLowerCase(), start, end: start + match[0].length });
  }
  return tokens;
}

/**
 * Fold a single lowercase word: "tickets" → "ticket", "notifies" → "notify".
 * Words ending in -ss, -us, -is are left alone ("address", "status", "analysis").
 */
export function normalizeWord(word: string): string {
  const w = word.toLowerCase();
  if (w.length > 4 && w.endsWith("ies")) return w.slice(0, -3) + "y";
  if (w.length > 3 && w.endsWith("s") && !/(ss|us|is)$/.test(w)) return w.slice(0, -1);
  return w;
}

/**
 * Normalize a multi-word phrase to its space-joined folded words.
 */
export function normalizePhrase(phrase: string): string {
  return tokenize(phrase).map((t) => normalizeWord(t.word)).join(" ");
}

/**
 * Split an API or event name into normalized fragments.
 * "OrderPlaced" → ["order", "placed"]; "GET /orders/{id}" → ["get", "order", "id"].
 */
export function splitIdentifier(name: string): string[] {
  const spaced = name.replace(/([a-z0-9])([A-Z])/g, "$1 $2");
  return tokenize(spaced.replace(/[-_]/g, " ")).map((t) => normalizeWord(t.word));
}

/**
 * Tokenize free text into discovery context terms: normalized, deduplicated,
 * stop words and very short words removed. Order of first appearance is kept.
 */
export function contextTerms(text: string): string[] {
  const terms: string[] = [];
  for (const token of tokenize(text.replace(/[-_]/g, " "))) {
    const term = normalizeWord(token.word);
    if (term.length < MIN_CONTEXT_TERM_LENGTH || STOP_WORDS.has(term)) continue;
    if (!terms.includes(term)) terms.push(term);
  }
  return terms;
}

/** URL-safe lowercase slug used in question ids and placeholder names. */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/&/g, " and ")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}
