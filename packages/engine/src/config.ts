/**
 * Config loader — reads and validates `.iam-warden.yml` configuration files.
 * Uses Zod for value validation; problems are warnings, never fatal.
 */

import { readFileSync, existsSync, statSync } from "node:fs";
import { resolve, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import {
  FindingCategorySchema,
  SEVERITY_RANK,
  SeveritySchema,
  type FindingCategory,
  type Severity,
} from "./schemas.js";

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export interface AuditConfig {
  /** Active keys at least this many days old are stale. */
  staleKeyThresholdDays: number;
  /** Users with more effective policies than this are flagged. */
  excessivePolicyCountThreshold: number;
  /** Actions that, allowed on Resource "*", mean full administrative access. */
  adminWildcardActions: string[];
  /** Managed policy names treated as administrative by name alone. */
  adminPolicyNames: string[];
  /** User tag whose non-empty value justifies a large policy set. */
  privilegeJustificationTag: string;
  /** Finding categories whose detectors are not registered. */
  disable: FindingCategory[];
  /** Minimum severity renderers show; the report itself keeps everything. */
  severityThreshold: Severity;
}

export const CONFIG_FILE_NAME = ".iam-warden.yml";

export const DEFAULT_CONFIG: Readonly<AuditConfig> = Object.freeze({
  staleKeyThresholdDays: 90,
  excessivePolicyCountThreshold: 5,
  adminWildcardActions: ["*"],
  adminPolicyNames: ["AdministratorAccess"],
  privilegeJustificationTag: "privilege-justification",
  disable: [],
  severityThreshold: "LOW",
});

/* ------------------------------------------------------------------ */
/*  Zod schemas                                                        */
/* ------------------------------------------------------------------ */

const configFileSchema = z.object({}).passthrough();

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();
const nonEmptyStrings = z.array(z.string().min(1)).min(1);
const strings = z.array(z.string().min(1));

const KNOWN_KEYS = new Set([
  "stale_key_threshold_days",
  "excessive_policy_count_threshold",
  "admin_wildcard_actions",
  "admin_policy_names",
  "privilege_justification_tag",
  "disable",
  "severity_threshold",
]);

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

export function didYouMean(input: string, valid: readonly string[]): string | null {
  let best: string | null = null;
  let bestDist = Infinity;

  for (const candidate of valid) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist && dist <= 3) {
      bestDist = dist;
      best = candidate;
    }
  }

  return best;
}

function levenshtein(a: string, b: string): number {
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      row[j] = Math.min(prev[j] + 1, row[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = row;
  }

  return prev[b.length];
}

function hint(input: string, valid: readonly string[]): string {
  const suggestion = didYouMean(input, valid);
  return suggestion ? ` — did you mean '${suggestion}'?` : "";
}

function resolveConfigPath(pathOrDir: string): string {
  const target = resolve(pathOrDir);
  if (existsSync(target) && statSync(target).isDirectory()) {
    return join(target, CONFIG_FILE_NAME);
  }
  return target;
}

/* ------------------------------------------------------------------ */
/*  Public API                                                         */
/* ------------------------------------------------------------------ */

/**
 * Fill unset fields from DEFAULT_CONFIG. Undefined overrides are skipped.
 */
export function resolveConfig(overrides: Partial<AuditConfig> = {}): AuditConfig {
  return {
    staleKeyThresholdDays: overrides.staleKeyThresholdDays ?? DEFAULT_CONFIG.staleKeyThresholdDays,
    excessivePolicyCountThreshold:
      overrides.excessivePolicyCountThreshold ?? DEFAULT_CONFIG.excessivePolicyCountThreshold,
    adminWildcardActions: [...(overrides.adminWildcardActions ?? DEFAULT_CONFIG.adminWildcardActions)],
    adminPolicyNames: [...(overrides.adminPolicyNames ?? DEFAULT_CONFIG.adminPolicyNames)],
    privilegeJustificationTag:
      overrides.privilegeJustificationTag ?? DEFAULT_CONFIG.privilegeJustificationTag,
    disable: [...(overrides.disable ?? DEFAULT_CONFIG.disable)],
    severityThreshold: overrides.severityThreshold ?? DEFAULT_CONFIG.severityThreshold,
  };
}

/**
 * Load `.iam-warden.yml` from a directory, or the given file path.
 * Returns the parsed config merged with defaults, or null if no file exists.
 */
export function loadConfig(pathOrDir: string): AuditConfig | null {
  const configPath = resolveConfigPath(pathOrDir);

  if (!existsSync(configPath)) return null;

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    logger.warn(`Warning: could not read ${configPath} — ${errorMessage(err)}. Using defaults.`);
    return resolveConfig();
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    logger.warn(`Warning: could not parse ${CONFIG_FILE_NAME} — ${errorMessage(err)}. Using defaults.`);
    return resolveConfig();
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) return resolveConfig();

  const data: Record<string, unknown> = result.data;

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      logger.warn(`Warning: unknown config key '${key}'${hint(key, [...KNOWN_KEYS])}`);
    }
  }

  const config = resolveConfig();

  const invalid = (key: string, expected: string) =>
    logger.warn(`Warning: invalid ${key} (expected ${expected}). Using default.`);

  if (data.stale_key_threshold_days !== undefined) {
    const value = positiveInt.safeParse(data.stale_key_threshold_days);
    if (value.success) config.staleKeyThresholdDays = value.data;
    else invalid("stale_key_threshold_days", "a positive integer");
  }

  if (data.excessive_policy_count_threshold !== undefined) {
    const value = nonNegativeInt.safeParse(data.excessive_policy_count_threshold);
    if (value.success) config.excessivePolicyCountThreshold = value.data;
    else invalid("excessive_policy_count_threshold", "a non-negative integer");
  }

  if (data.admin_wildcard_actions !== undefined) {
    const value = nonEmptyStrings.safeParse(data.admin_wildcard_actions);
    if (value.success) config.adminWildcardActions = value.data;
    else invalid("admin_wildcard_actions", "a non-empty list of actions");
  }

  if (data.admin_policy_names !== undefined) {
    const value = strings.safeParse(data.admin_policy_names);
    if (value.success) config.adminPolicyNames = value.data;
    else invalid("admin_policy_names", "a list of policy names");
  }

  if (data.privilege_justification_tag !== undefined) {
    const value = z.string().safeParse(data.privilege_justification_tag);
    if (value.success) config.privilegeJustificationTag = value.data;
    else invalid("privilege_justification_tag", "a tag key");
  }

  if (data.severity_threshold !== undefined) {
    const raw = String(data.severity_threshold);
    const value = SeveritySchema.safeParse(raw.toUpperCase());
    if (value.success) {
      config.severityThreshold = value.data;
    } else {
      logger.warn(
        `Warning: invalid severity_threshold '${raw}'${hint(raw, SeveritySchema.options)}. Using default '${DEFAULT_CONFIG.severityThreshold}'.`,
      );
    }
  }

  if (Array.isArray(data.disable)) {
    const valid: FindingCategory[] = [];
    for (const entry of data.disable) {
      const raw = String(entry);
      const value = FindingCategorySchema.safeParse(raw.toUpperCase());
      if (value.success) {
        valid.push(value.data);
      } else {
        logger.warn(`Warning: unknown category '${raw}' in disable list${hint(raw, FindingCategorySchema.options)}`);
      }
    }
    config.disable = valid;
  } else if (data.disable !== undefined) {
    invalid("disable", "a list of categories");
  }

  return config;
}

/**
 * Filter findings by config — removes below-threshold severities.
 */
export function filterByConfig<T extends { severity: Severity }>(
  findings: readonly T[],
  config: Pick<AuditConfig, "severityThreshold">,
): T[] {
  const threshold = SEVERITY_RANK[config.severityThreshold];
  return findings.filter((f) => SEVERITY_RANK[f.severity] >= threshold);
}
