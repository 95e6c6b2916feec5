// src/hypothesis-diff.ts — Hypothesis diff
// Compares a Hypothesis to an earlier one for the same request (e.g. before and
// after refinement, or across ontology versions). Rejected domains count as absent.

import type { DependencyEdge, Hypothesis, HypothesisDiff } from "./types.js";

export function diffHypotheses(current: Hypothesis, previous: Hypothesis): HypothesisDiff {
  const diff: HypothesisDiff = {
    addedDomains: [],
    removedDomains: [],
    confidenceChanges: [],
    addedComponents: [],
    removedComponents: [],
    newDependencies: [],
    summary: "",
    changed: false,
  };

  const currentRows = new Map(
    current.impactMatrix.filter((r) => r.status !== "rejected").map((r) => [r.domain, r]),
  );
  const previousRows = new Map(
    previous.impactMatrix.filter((r) => r.status !== "rejected").map((r) => [r.domain, r]),
  );

  for (const [domain, row] of currentRows) {
    const before = previousRows.get(domain);
    if (!before) {
      diff.addedDomains.push(domain);
    } else if (before.confidence !== row.confidence) {
      diff.confidenceChanges.push({ domain, from: before.confidence, to: row.confidence });
    }
  }
  for (const domain of previousRows.keys()) {
    if (!currentRows.has(domain)) diff.removedDomains.push(domain);
  }

  const currentComponents = new Set(current.components.map((c) => c.component));
  const previousComponents = new Set(previous.components.map((c) => c.component));
  for (const name of currentComponents) {
    if (!previousComponents.has(name)) diff.addedComponents.push(name);
  }
  for (const name of previousComponents) {
    if (!currentComponents.has(name)) diff.removedComponents.push(name);
  }

  const previousEdges = new Set(previous.dependencies.map(formatEdge));
  diff.newDependencies = current.dependencies.map(formatEdge).filter((e) => !previousEdges.has(e));

  const parts: string[] = [];
  if (diff.addedDomains.length > 0) parts.push(`${diff.addedDomains.length} added domain(s)`);
  if (diff.removedDomains.length > 0) parts.push(`${diff.removedDomains.length} removed domain(s)`);
  if (diff.confidenceChanges.length > 0) parts.push(`${diff.confidenceChanges.length} confidence change(s)`);
  if (diff.addedComponents.length > 0) parts.push(`${diff.addedComponents.length} added component(s)`);
  if (diff.removedComponents.length > 0) parts.push(`${diff.removedComponents.length} removed component(s)`);
  if (diff.newDependencies.length > 0) parts.push(`${diff.newDependencies.length} new dependency edge(s)`);

  diff.changed = parts.length > 0;
  diff.summary = diff.changed ? `Changes: ${parts.join(", ")}.` : "No changes.";
  return diff;
}

export function formatEdge(edge: DependencyEdge): string {
  return `${edge.from} -> ${edge.to} (${edge.kind}: ${edge.via})`;
}
