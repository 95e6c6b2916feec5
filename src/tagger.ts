// src/tagger.ts — Business Tagger
// Extracts entity, action and qualifier tags from change-request prose.
// Greedy longest match over normalized token windows; qualifiers attach by adjacency.
// This is a heuristic, not a parser: unknown vocabulary is skipped, never an error.

import type { ActionClass, LexiconConfig, Ontology, Tag, TagKind } from "./types.js";
import { normalizePhrase, normalizeWord, tokenize } from "./text-normalizer.js";

interface VocabularyEntry {
  kind: TagKind;
  actionClass?: ActionClass;
}

export interface Vocabulary {
  entries: Map<string, VocabularyEntry>;
  /** Word count of the longest phrase. */
  maxWords: number;
}

/**
 * Build the tagging vocabulary from the ontology and lexicon.
 * On a phrase present in several sources: action beats qualifier beats entity.
 */
export function buildVocabulary(ontology: Ontology, lexicon: LexiconConfig): Vocabulary {
  const entries = new Map<string, VocabularyEntry>();

  for (const domain of ontology.domains) {
    for (const entity of domain.owns) entries.set(entity, { kind: "entity" });
    for (const trigger of domain.triggers.keys()) {
      if (!entries.has(trigger)) entries.set(trigger, { kind: "entity" });
    }
  }
  for (const qualifier of lexicon.qualifiers) {
    const term = normalizePhrase(qualifier);
    if (term) entries.set(term, { kind: "qualifier" });
  }
  for (const [verb, actionClass] of Object.entries(lexicon.actions)) {
    const term = normalizePhrase(verb);
    if (term) entries.set(term, { kind: "action", actionClass });
  }

  let maxWords = 1;
  for (const term of entries.keys()) {
    maxWords = Math.max(maxWords, term.split(" ").length);
  }
  return { entries, maxWords };
}

/**
 * Tag a change request. Output follows input order; the same text and
 * vocabulary always produce the same tags.
 */
export function tag(text: string, vocabulary: Vocabulary): Tag[] {
  const tokens = tokenize(text);
  const words = tokens.map((t) => normalizeWord(t.word));
  const tags: Tag[] = [];
  // Token index span of each tag, parallel to `tags`
  const spans: [number, number][] = [];

  let i = 0;
  while (i < tokens.length) {
    let matched = false;
    for (let len = Math.min(vocabulary.maxWords, tokens.length - i); len >= 1; len--) {
      const term = words.slice(i, i + len).join(" ");
      const entry = vocabulary.entries.get(term);
      if (!entry) continue;

      const start = tokens[i].start;
      const end = tokens[i + len - 1].end;
      tags.push({
        text: text.slice(start, end),
        kind: entry.kind,
        term,
        start,
        end,
        ...(entry.actionClass ? { actionClass: entry.actionClass } : {}),
      });
      spans.push([i, i + len - 1]);
      i += len;
      matched = true;
      break;
    }
    if (!matched) i++;
  }

  attachQualifiers(tags, spans);
  return tags;
}

/**
 * Point each qualifier at the nearest entity tag by token distance.
 * On equal distance the following entity wins ("premium customer").
 */
function attachQualifiers(tags: Tag[], spans: [number, number][]): void {
  for (let q = 0; q < tags.length; q++) {
    if (tags[q].kind !== "qualifier") continue;
    const [qStart, qEnd] = spans[q];

    let best: number | undefined;
    let bestDistance = Number.POSITIVE_INFINITY;
    let bestFollows = false;

    for (let e = 0; e < tags.length; e++) {
      if (tags[e].kind !== "entity") continue;
      const [eStart, eEnd] = spans[e];
      const follows = eStart > qEnd;
      const distance = follows ? eStart - qEnd : qStart - eEnd;
      if (distance < bestDistance || (distance === bestDistance && follows && !bestFollows)) {
        best = e;
        bestDistance = distance;
        bestFollows = follows;
      }
    }

    if (best !== undefined) tags[q].attachedTo = best;
  }
}

/** Qualifier terms attached to the entity tag at `index`. */
export function qualifiersOf(tags: readonly Tag[], index: number): string[] {
  return tags.filter((t) => t.kind === "qualifier" && t.attachedTo === index).map((t) => t.term);
}
