// src/ontology-store.ts — Ontology Store
// Validates loader output once and freezes it. Domains own entities exclusively.
// The component catalog is replaced wholesale on registration (read-copy-update),
// so a snapshot taken by a running analysis never changes underneath it.

import picomatch from "picomatch";
import type {
  ComponentCatalog,
  ComponentDescriptor,
  ComponentType,
  Domain,
  DomainKind,
  Ontology,
  RawDomain,
  RawOntology,
  Warning,
} from "./types.js";
import { normalizePhrase } from "./text-normalizer.js";

const DOMAIN_KINDS: ReadonlySet<string> = new Set(["business", "frontend", "integration", "api"]);
const COMPONENT_TYPES: ReadonlySet<string> = new Set([
  "backend-service",
  "frontend-app",
  "shared-library",
  "integration",
]);

export const UNKNOWN_DOMAIN = "unknown";

// ─── Ontology ────────────────────────────────────────────────────────────────

/**
 * Build an immutable Ontology from already-parsed data.
 * Invalid entries are dropped with a warning; nothing throws.
 */
export function buildOntology(
  raw: RawOntology,
  defaultTriggerWeight: number,
  warnings: Warning[] = [],
): Ontology {
  const version = typeof raw.version === "string" && raw.version.length > 0 ? raw.version : "unversioned";
  if (version === "unversioned") {
    warnings.push({ level: "info", module: "ontology-store", message: "Ontology has no version; using \"unversioned\"" });
  }

  const rawDomains: unknown[] = Array.isArray(raw.domains) ? raw.domains : [];
  if (!Array.isArray(raw.domains)) {
    warnings.push({ level: "error", module: "ontology-store", message: "Ontology has no domains array" });
  }

  const domains: Domain[] = [];
  const names = new Set<string>();
  const ownerOf = new Map<string, string>();

  for (const entry of rawDomains) {
    if (!isRecord(entry)) {
      warnings.push({ level: "warn", module: "ontology-store", message: "Skipping non-object domain entry" });
      continue;
    }
    const domain = buildDomain(entry, defaultTriggerWeight, ownerOf, warnings);
    if (!domain) continue;
    if (names.has(domain.name)) {
      warnings.push({ level: "warn", module: "ontology-store", message: `Duplicate domain "${domain.name}" skipped` });
      continue;
    }
    names.add(domain.name);
    for (const entity of domain.owns) ownerOf.set(entity, domain.name);
    domains.push(domain);
  }

  return Object.freeze({ version, domains: Object.freeze(domains) });
}

function buildDomain(
  raw: RawDomain,
  defaultTriggerWeight: number,
  ownerOf: ReadonlyMap<string, string>,
  warnings: Warning[],
): Domain | null {
  if (typeof raw.name !== "string" || raw.name.trim() === "") {
    warnings.push({ level: "warn", module: "ontology-store", message: "Skipping domain without a name" });
    return null;
  }
  const name = raw.name.trim();

  let kind: DomainKind = "business";
  if (raw.kind !== undefined) {
    if (typeof raw.kind === "string" && isDomainKind(raw.kind)) {
      kind = raw.kind;
    } else {
      warnings.push({
        level: "warn",
        module: "ontology-store",
        message: `Domain "${name}" has invalid kind ${JSON.stringify(raw.kind)}; treating as business`,
      });
    }
  }

  const triggers = new Map<string, number>();
  for (const [phrase, weight] of triggerEntries(raw.triggers, name, warnings)) {
    const term = normalizePhrase(phrase);
    if (term === "") continue;
    if (weight === undefined) {
      triggers.set(term, defaultTriggerWeight);
    } else if (Number.isFinite(weight) && weight > 0) {
      triggers.set(term, weight);
    } else {
      warnings.push({
        level: "warn",
        module: "ontology-store",
        message: `Trigger "${phrase}" in "${name}" has an invalid weight; using ${defaultTriggerWeight}`,
      });
      triggers.set(term, defaultTriggerWeight);
    }
  }

  const owns = new Set<string>();
  for (const entity of stringList(raw.owns)) {
    const term = normalizePhrase(entity);
    if (term === "") continue;
    const existing = ownerOf.get(term);
    if (existing) {
      warnings.push({
        level: "warn",
        module: "ontology-store",
        message: `Entity "${entity}" is already owned by "${existing}"; ignoring claim by "${name}"`,
      });
      continue;
    }
    owns.add(term);
  }

  const responsibility = typeof raw.responsibility === "string" ? raw.responsibility : "";

  return Object.freeze({
    name,
    responsibility,
    kind,
    triggers,
    owns,
    components: Object.freeze(stringList(raw.components)),
  });
}

function triggerEntries(
  value: unknown,
  domain: string,
  warnings: Warning[],
): [string, number | undefined][] {
  if (value === undefined) return [];
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === "string").map((v): [string, undefined] => [v, undefined]);
  }
  if (isRecord(value)) {
    return Object.entries(value).map(([phrase, weight]): [string, number] => [
      phrase,
      typeof weight === "number" ? weight : Number.NaN,
    ]);
  }
  warnings.push({ level: "warn", module: "ontology-store", message: `Domain "${domain}" has unreadable triggers` });
  return [];
}

/**
 * Map of owned entity term → owning domain name.
 */
export function entityOwners(ontology: Ontology): Map<string, string> {
  const owners = new Map<string, string>();
  for (const domain of ontology.domains) {
    for (const entity of domain.owns) owners.set(entity, domain.name);
  }
  return owners;
}

export function findDomain(ontology: Ontology, name: string): Domain | undefined {
  return ontology.domains.find((d) => d.name === name);
}

/** First domain of the given kind, in ontology order. */
export function domainOfKind(ontology: Ontology, kind: DomainKind): Domain | undefined {
  return ontology.domains.find((d) => d.kind === kind);
}

// ─── Component Catalog ───────────────────────────────────────────────────────

/**
 * Build an immutable catalog. Entries keep their input order, which is the
 * tie-break order for discovery ranking.
 */
export function buildCatalog(
  rawEntries: unknown,
  ontology: Ontology,
  warnings: Warning[] = [],
): ComponentCatalog {
  const entries: ComponentDescriptor[] = [];
  if (!Array.isArray(rawEntries)) {
    warnings.push({ level: "error", module: "ontology-store", message: "Component catalog must be an array" });
  } else {
    const seen = new Set<string>();
    for (const raw of rawEntries) {
      const descriptor = buildDescriptor(raw, ontology, warnings);
      if (!descriptor) continue;
      if (seen.has(descriptor.name)) {
        warnings.push({ level: "warn", module: "ontology-store", message: `Duplicate component "${descriptor.name}" skipped` });
        continue;
      }
      seen.add(descriptor.name);
      entries.push(descriptor);
    }
  }

  const catalog = freezeCatalog(entries, 1);
  checkComponentRefs(ontology, catalog, warnings);
  return catalog;
}

function buildDescriptor(
  raw: unknown,
  ontology: Ontology,
  warnings: Warning[],
): ComponentDescriptor | null {
  if (!isRecord(raw) || typeof raw.name !== "string" || raw.name.trim() === "") {
    warnings.push({ level: "warn", module: "ontology-store", message: "Skipping component without a name" });
    return null;
  }
  const name = raw.name.trim();
  const domain = typeof raw.domain === "string" && raw.domain !== "" ? raw.domain : UNKNOWN_DOMAIN;
  if (domain !== UNKNOWN_DOMAIN && !findDomain(ontology, domain)) {
    warnings.push({
      level: "warn",
      module: "ontology-store",
      message: `Component "${name}" references unknown domain "${domain}"`,
    });
  }

  let type: ComponentType = "backend-service";
  if (typeof raw.type === "string" && isComponentType(raw.type)) {
    type = raw.type;
  } else {
    warnings.push({
      level: "warn",
      module: "ontology-store",
      message: `Component "${name}" has invalid type ${JSON.stringify(raw.type)}; treating as backend-service`,
    });
  }

  return Object.freeze({
    name,
    domain,
    type,
    ...(typeof raw.technology === "string" ? { technology: raw.technology } : {}),
    apis: Object.freeze(stringList(raw.apis)),
    publishes: Object.freeze(stringList(raw.publishes)),
    consumes: Object.freeze(stringList(raw.consumes)),
    ...(raw.speculative === true ? { speculative: true } : {}),
  });
}

function checkComponentRefs(ontology: Ontology, catalog: ComponentCatalog, warnings: Warning[]): void {
  for (const domain of ontology.domains) {
    for (const ref of domain.components) {
      const isMatch = picomatch(ref);
      const matches = catalog.entries.filter((c) => isMatch(c.name));
      if (matches.length === 0) {
        warnings.push({
          level: "info",
          module: "ontology-store",
          message: `Domain "${domain.name}" lists "${ref}" but no catalog component matches it`,
        });
      }
      for (const component of matches) {
        if (component.domain !== domain.name) {
          warnings.push({
            level: "warn",
            module: "ontology-store",
            message: `Domain "${domain.name}" lists "${component.name}", which the catalog registers under "${component.domain}"`,
          });
        }
      }
    }
  }
}

/**
 * Return a new catalog with `extra` appended. Names already present are kept as-is.
 */
export function extendCatalog(
  catalog: ComponentCatalog,
  extra: readonly ComponentDescriptor[],
): ComponentCatalog {
  const added = extra.filter((c) => !catalog.byName.has(c.name));
  if (added.length === 0) return catalog;
  return freezeCatalog([...catalog.entries, ...added], catalog.version + 1);
}

function freezeCatalog(entries: ComponentDescriptor[], version: number): ComponentCatalog {
  return Object.freeze({
    version,
    entries: Object.freeze(entries),
    byName: new Map(entries.map((c) => [c.name, c])),
  });
}

/**
 * Build a predicate that is true for component names matching any glob.
 */
export function componentFilter(patterns: readonly string[]): (name: string) => boolean {
  const usable = patterns.filter((p) => p.trim() !== "");
  if (usable.length === 0) return () => false;
  return picomatch(usable);
}

/**
 * Holder of the current shared catalog. Registration builds a new frozen
 * catalog and swaps it in; readers keep whatever snapshot they took.
 */
export class CatalogStore {
  private current: ComponentCatalog;

  constructor(initial: ComponentCatalog) {
    this.current = initial;
  }

  snapshot(): ComponentCatalog {
    return this.current;
  }

  /**
   * Register a component. Returns false (with a warning) when the name is taken.
   */
  register(descriptor: ComponentDescriptor, warnings: Warning[] = []): boolean {
    if (this.current.byName.has(descriptor.name)) {
      warnings.push({
        level: "warn",
        module: "ontology-store",
        message: `Component "${descriptor.name}" is already registered`,
      });
      return false;
    }
    this.current = extendCatalog(this.current, [Object.freeze({ ...descriptor })]);
    return true;
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string" && v.trim() !== "").map((v) => v.trim());
}

function isDomainKind(value: string): value is DomainKind {
  return DOMAIN_KINDS.has(value);
}

function isComponentType(value: string): value is ComponentType {
  return COMPONENT_TYPES.has(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
