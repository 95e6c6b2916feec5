// src/questions.ts — Open question factories
// Ids are derived from the question's subject, never from a counter, so the same
// run always yields the same ids and answering one question never renames another.

import type { Confidence, OpenQuestion } from "./types.js";
import { slugify } from "./text-normalizer.js";

export const PRIORITY_ORDER: Record<Confidence, number> = { high: 0, medium: 1, low: 2 };

export function isBlocking(question: OpenQuestion): boolean {
  return question.state === "open" && question.priority !== "low";
}

export function ownershipTieQuestion(domains: readonly string[]): OpenQuestion {
  return {
    id: `tie/${domains.map(slugify).join("+")}`,
    topic: "ownership-tie",
    priority: "high",
    subject: { domains: [...domains] },
    prompt: `${domains.join(" and ")} match this request equally. Which domain owns the change?`,
    options: [...domains],
    state: "open",
  };
}

export function confirmImpactQuestion(
  component: string,
  domain: string,
  priority: Confidence,
  options: string[] = [],
): OpenQuestion {
  return {
    id: `confirm/${component}`,
    topic: "confirm-impact",
    priority,
    subject: { domains: [domain], component },
    prompt: `Does ${component} (${domain}) need to change for this request?`,
    options,
    state: "open",
  };
}

export function componentOwnerQuestion(
  domain: string,
  responsibility: string,
  options: string[] = [],
): OpenQuestion {
  const capability = responsibility ? ` (${responsibility})` : "";
  return {
    id: `owner/${slugify(domain)}`,
    topic: "component-owner",
    priority: "high",
    subject: { domains: [domain] },
    prompt: `Which component owns the ${domain} capability${capability}?`,
    options,
    state: "open",
  };
}

export function eventSchemaQuestion(component: string, domain: string, options: string[] = []): OpenQuestion {
  return {
    id: `event-schema/${component}`,
    topic: "event-schema",
    priority: "low",
    subject: { domains: [domain], component },
    prompt: `Which event should ${component} publish for this change, and what does its payload carry?`,
    options,
    state: "open",
  };
}

export const REPHRASE_QUESTION_ID = "rephrase";

export function rephraseQuestion(): OpenQuestion {
  return {
    id: REPHRASE_QUESTION_ID,
    topic: "rephrase",
    priority: "low",
    subject: { domains: [] },
    prompt: "Could not identify any business domain; please rephrase the request.",
    options: [],
    state: "open",
  };
}
