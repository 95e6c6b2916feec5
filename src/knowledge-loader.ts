// src/knowledge-loader.ts — Ontology/Catalog loader
// Reads the JSON knowledge base from disk and hands parsed values to the Ontology Store.
// Unreadable files produce warnings and an empty knowledge base.

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { KnowledgeBase, RawOntology, ResolvedConfig, Warning } from "./types.js";
import { buildCatalog, buildOntology } from "./ontology-store.js";

export interface KnowledgePaths {
  ontology: string;
  catalog: string;
}

/**
 * Load and validate an ontology file and a component catalog file.
 * The catalog file may be a bare array or an object with a `components` array.
 */
export function loadKnowledgeBase(
  paths: KnowledgePaths,
  config: Pick<ResolvedConfig, "scoring">,
  warnings: Warning[] = [],
): KnowledgeBase {
  const rawOntology = readJson(paths.ontology, warnings);
  const ontology = buildOntology(
    isRecord(rawOntology) ? toRawOntology(rawOntology) : {},
    config.scoring.defaultTriggerWeight,
    warnings,
  );

  const rawCatalog = readJson(paths.catalog, warnings);
  const entries = isRecord(rawCatalog) ? rawCatalog.components : rawCatalog;
  const catalog = buildCatalog(entries ?? [], ontology, warnings);

  return { ontology, catalog };
}

function toRawOntology(value: Record<string, unknown>): RawOntology {
  return { version: value.version, domains: value.domains };
}

function readJson(filePath: string, warnings: Warning[]): unknown {
  const absPath = resolve(filePath);
  if (!existsSync(absPath)) {
    warnings.push({ level: "error", module: "knowledge-loader", message: `Knowledge file not found: ${filePath}` });
    return undefined;
  }
  try {
    return JSON.parse(readFileSync(absPath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "error",
      module: "knowledge-loader",
      message: `Failed to parse ${filePath}: ${msg}`,
    });
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
