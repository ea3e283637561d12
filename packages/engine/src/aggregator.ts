/**
 * Finding aggregation: flatten detector outputs, drop duplicates, and put
 * the survivors in a fixed order that does not depend on detector order.
 */

import { SEVERITY_RANK, type Finding } from "./schemas.js";

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

/** JSON with object keys sorted at every level. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => compareCodeUnits(a, b));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/**
 * Two findings with the same key are the same finding.
 */
export function findingKey(f: Finding): string {
  return `${f.category}|${f.subject.kind}:${f.subject.id}|${canonicalJson(f.evidence)}`;
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Deduplicate findings by identity. The first occurrence wins.
 */
export function dedupeFindings(findings: readonly Finding[]): Finding[] {
  const seen = new Map<string, Finding>();
  for (const f of findings) {
    const key = findingKey(f);
    if (!seen.has(key)) seen.set(key, f);
  }
  return [...seen.values()];
}

/**
 * Sort by severity (critical first), then category, subject and evidence.
 */
export function sortFindings(findings: readonly Finding[]): Finding[] {
  return findings.slice().sort((a, b) => {
    const sevDiff = SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity];
    if (sevDiff !== 0) return sevDiff;
    const catCmp = compareCodeUnits(a.category, b.category);
    if (catCmp !== 0) return catCmp;
    const subjectCmp = compareCodeUnits(a.subject.id, b.subject.id);
    if (subjectCmp !== 0) return subjectCmp;
    return compareCodeUnits(findingKey(a), findingKey(b));
  });
}

export function aggregate(lists: readonly (readonly Finding[])[]): Finding[] {
  return sortFindings(dedupeFindings(lists.flat()));
}
