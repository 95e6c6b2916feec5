// src/hypothesis-assembler.ts — Hypothesis Assembler
// Folds a session's state into one self-describing output object.
// Dependency edges come only from explicit publish/consume pairs or API calls
// named in probable changes; domain adjacency alone never adds an edge.

import type {
  ComponentDescriptor,
  ComponentHypothesis,
  DependencyEdge,
  Hypothesis,
  ImpactMatrixRow,
  UnresolvedQuestion,
} from "./types.js";
import { ENGINE_VERSION } from "./types.js";
import { isSurfaceHint } from "./component-resolver.js";
import { isBlocking, PRIORITY_ORDER } from "./questions.js";
import type { RefinementSession } from "./refinement-session.js";

const NON_BLOCKING_NOTE = "unresolved, non-blocking";
// Characters that continue an API path; a mention must not run into one
const API_PATH_CHAR = /[\w/{}-]/;

/**
 * Assemble the current state of `session`. May be called at any point; the
 * `status` field tells a renderer whether refinement finished.
 */
export function assemble(session: RefinementSession): Hypothesis {
  const snapshot = session.snapshot();
  const active = snapshot.hypotheses.filter((h) => h.status !== "rejected");

  const impactMatrix: ImpactMatrixRow[] = snapshot.records.map((record) => ({
    domain: record.domain,
    impactType: record.impactType,
    confidence: record.confidence,
    status: record.status,
    components: active.filter((h) => h.domain === record.domain).map((h) => h.component),
  }));

  const openQuestions: UnresolvedQuestion[] = snapshot.questions
    .filter((q) => q.state === "open")
    .sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority])
    .map((q) => ({
      id: q.id,
      priority: q.priority,
      prompt: q.prompt,
      blocking: isBlocking(q),
      ...(isBlocking(q) ? {} : { note: NON_BLOCKING_NOTE }),
    }));

  return {
    engineVersion: ENGINE_VERSION,
    ontologyVersion: snapshot.ontologyVersion,
    request: snapshot.request,
    status: snapshot.state,
    impactMatrix,
    components: active,
    dependencies: inferDependencies(active, (name) => session.describe(name)),
    openQuestions,
    resolutions: snapshot.resolutions,
    rejectedDomains: snapshot.records.filter((r) => r.status === "rejected").map((r) => r.domain),
    warnings: snapshot.warnings,
  };
}

/**
 * Directed edges between hypotheses. `from` consumes an event `to` publishes,
 * or one of `from`'s probable changes names an API that `to` exposes.
 * Generated lines listing a component's own surface never count as a call.
 */
export function inferDependencies(
  hypotheses: readonly ComponentHypothesis[],
  describe: (component: string) => ComponentDescriptor | undefined,
): DependencyEdge[] {
  const edges: DependencyEdge[] = [];
  const seen = new Set<string>();
  const add = (edge: DependencyEdge): void => {
    const key = `${edge.from}|${edge.to}|${edge.kind}|${edge.via}`;
    if (seen.has(key)) return;
    seen.add(key);
    edges.push(edge);
  };

  for (const consumer of hypotheses) {
    const consumerDescriptor = describe(consumer.component);
    const changes = consumer.probableChanges.filter((c) => !isSurfaceHint(c));

    for (const provider of hypotheses) {
      if (provider.component === consumer.component) continue;
      const providerDescriptor = describe(provider.component);
      if (!providerDescriptor) continue;

      for (const event of providerDescriptor.publishes) {
        if (consumerDescriptor?.consumes.includes(event)) {
          add({ from: consumer.component, to: provider.component, kind: "event", via: event });
        }
      }
      for (const api of providerDescriptor.apis) {
        if (consumerDescriptor?.apis.includes(api)) continue;
        if (changes.some((c) => mentionsApi(c, api))) {
          add({ from: consumer.component, to: provider.component, kind: "api", via: api });
        }
      }
    }
  }
  return edges;
}

/** Case-insensitive whole-token match: "GET /orders" does not match "GET /orders/{id}". */
function mentionsApi(change: string, api: string): boolean {
  const text = change.toLowerCase();
  const needle = api.toLowerCase();
  if (needle === "") return false;
  for (let at = text.indexOf(needle); at >= 0; at = text.indexOf(needle, at + 1)) {
    const before = at > 0 ? text.charAt(at - 1) : "";
    const after = text.charAt(at + needle.length);
    if (!API_PATH_CHAR.test(before) && !API_PATH_CHAR.test(after)) return true;
  }
  return false;
}
