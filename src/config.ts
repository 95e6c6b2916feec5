// src/config.ts — Config Resolver
// Merges defaults ← config file ← explicit options. Bad values become warnings, never failures.

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import type {
  ActionClass,
  EngineOptions,
  LexiconConfig,
  ResolvedConfig,
  ScoringConfig,
  Warning,
} from "./types.js";

const ACTION_CLASSES: ReadonlySet<string> = new Set(["communication", "presentation", "mutation", "query"]);

export const DEFAULT_ACTIONS: Readonly<Record<string, ActionClass>> = {
  notify: "communication",
  publish: "communication",
  broadcast: "communication",
  escalate: "communication",
  alert: "communication",
  email: "communication",
  send: "communication",
  show: "presentation",
  display: "presentation",
  render: "presentation",
  highlight: "presentation",
  create: "mutation",
  submit: "mutation",
  update: "mutation",
  delete: "mutation",
  cancel: "mutation",
  approve: "mutation",
  register: "mutation",
  search: "query",
  filter: "query",
  export: "query",
};

export const DEFAULT_QUALIFIERS: readonly string[] = [
  "premium",
  "high-value",
  "vip",
  "priority",
  "urgent",
  "critical",
  "overdue",
  "expired",
  "recurring",
  "guest",
  "bulk",
  "international",
];

export const DEFAULT_CONFIG: ResolvedConfig = {
  scoring: {
    ownershipBonus: 3,
    highThreshold: 3,
    defaultTriggerWeight: 1,
  },
  lexicon: {
    actions: { ...DEFAULT_ACTIONS },
    qualifiers: [...DEFAULT_QUALIFIERS],
  },
  exclude: [],
  discovery: {
    maxSuggestions: 3,
  },
  verbose: false,
};

const CONFIG_FILENAME = "archintent.config.json";
const PACKAGE_KEY = "archintent";

/**
 * Resolve config from explicit options, a config file, and defaults.
 * `configPath` names a file explicitly; otherwise the working directory is searched.
 */
export function resolveConfig(
  options: EngineOptions = {},
  warnings: Warning[] = [],
  configPath?: string,
): ResolvedConfig {
  const fileConfig = loadConfigFile(configPath, warnings);
  return mergeConfig(mergeConfig(DEFAULT_CONFIG, fileConfig ?? {}, warnings), options, warnings);
}

/** Config as read from a file: same keys as EngineOptions, values not yet checked. */
export type ConfigInput = { [K in keyof EngineOptions]?: unknown };

/**
 * Apply a partial config over a resolved one, validating each field.
 */
export function mergeConfig(
  base: ResolvedConfig,
  overrides: ConfigInput,
  warnings: Warning[] = [],
): ResolvedConfig {
  const discovery = section(overrides.discovery, "discovery", warnings);
  return {
    scoring: mergeScoring(base.scoring, section(overrides.scoring, "scoring", warnings), warnings),
    lexicon: mergeLexicon(base.lexicon, section(overrides.lexicon, "lexicon", warnings), warnings),
    exclude: excludePatterns(overrides.exclude, warnings) ?? base.exclude,
    discovery: {
      maxSuggestions: positiveNumber(
        discovery.maxSuggestions,
        "discovery.maxSuggestions",
        warnings,
      ) ?? base.discovery.maxSuggestions,
    },
    verbose: typeof overrides.verbose === "boolean" ? overrides.verbose : base.verbose,
  };
}

function section(value: unknown, field: string, warnings: Warning[]): Record<string, unknown> {
  if (value === undefined) return {};
  if (isRecord(value)) return value;
  warnings.push({ level: "warn", module: "config", message: `${field} must be an object` });
  return {};
}

function mergeScoring(
  base: ScoringConfig,
  overrides: Record<string, unknown>,
  warnings: Warning[],
): ScoringConfig {
  return {
    ownershipBonus: positiveNumber(overrides.ownershipBonus, "scoring.ownershipBonus", warnings) ?? base.ownershipBonus,
    highThreshold: positiveNumber(overrides.highThreshold, "scoring.highThreshold", warnings) ?? base.highThreshold,
    defaultTriggerWeight:
      positiveNumber(overrides.defaultTriggerWeight, "scoring.defaultTriggerWeight", warnings) ??
      base.defaultTriggerWeight,
  };
}

function mergeLexicon(
  base: LexiconConfig,
  overrides: Record<string, unknown>,
  warnings: Warning[],
): LexiconConfig {
  const actions = { ...base.actions };
  const rawActions = overrides.actions;
  if (rawActions !== undefined) {
    if (isRecord(rawActions)) {
      for (const [verb, cls] of Object.entries(rawActions)) {
        if (typeof cls === "string" && isActionClass(cls)) {
          actions[verb.toLowerCase()] = cls;
        } else {
          warnings.push({
            level: "warn",
            module: "config",
            message: `Ignoring action "${verb}": class must be one of ${[...ACTION_CLASSES].join(", ")}`,
          });
        }
      }
    } else {
      warnings.push({ level: "warn", module: "config", message: "lexicon.actions must be an object" });
    }
  }

  const qualifiers = validStrings(overrides.qualifiers, "lexicon.qualifiers", warnings);
  return {
    actions,
    qualifiers: qualifiers ? [...new Set([...base.qualifiers, ...qualifiers.map((q) => q.toLowerCase())])] : base.qualifiers,
  };
}

function positiveNumber(value: unknown, field: string, warnings: Warning[]): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "number" && Number.isFinite(value) && value > 0) return value;
  warnings.push({
    level: "warn",
    module: "config",
    message: `${field} must be a positive number, got ${JSON.stringify(value)}; keeping default`,
  });
  return undefined;
}

function validStrings(value: unknown, field: string, warnings: Warning[]): string[] | undefined {
  if (value === undefined) return undefined;
  if (Array.isArray(value) && value.every((v): v is string => typeof v === "string")) return value;
  warnings.push({ level: "warn", module: "config", message: `${field} must be an array of strings` });
  return undefined;
}

function excludePatterns(value: unknown, warnings: Warning[]): string[] | undefined {
  const patterns = validStrings(value, "exclude", warnings);
  if (!patterns) return undefined;
  const kept = patterns.map((p) => p.trim()).filter((p) => p !== "");
  if (kept.length < patterns.length) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Ignoring ${patterns.length - kept.length} empty exclude pattern(s)`,
    });
  }
  return kept;
}

function isActionClass(value: string): value is ActionClass {
  return ACTION_CLASSES.has(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function loadConfigFile(
  configPath: string | undefined,
  warnings: Warning[],
): ConfigInput | null {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, warnings);
  }

  const cwd = process.cwd();

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }

  // archintent key in package.json
  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgJson, "utf-8"));
      const embedded = isRecord(pkg) ? pkg[PACKAGE_KEY] : undefined;
      if (isRecord(embedded)) return embedded;
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({ level: "info", module: "config", message: `Skipping unreadable package.json: ${msg}` });
    }
  }

  return null;
}

function parseConfigFile(
  filePath: string,
  warnings: Warning[],
): ConfigInput | null {
  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    if (!isRecord(parsed)) {
      warnings.push({ level: "warn", module: "config", message: `Config file ${filePath} must contain an object` });
      return null;
    }
    return parsed;
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }
}
