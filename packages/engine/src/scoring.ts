/**
 * Security score: a 0..100 number and letter grade derived from the
 * severity mix of an audit's findings.
 */

import {
  SEVERITY_ORDER,
  type Finding,
  type SecurityScoreOutput,
  type Severity,
  type SeveritySummary,
} from "./schemas.js";

export type Grade = SecurityScoreOutput["grade"];
export type SecurityScore = SecurityScoreOutput;

/** Points deducted per finding. */
export const SEVERITY_DEDUCTIONS: Record<Severity, number> = {
  CRITICAL: 15,
  HIGH: 8,
  MEDIUM: 3,
  LOW: 1,
};

export function summarize(findings: readonly Finding[]): SeveritySummary {
  const summary: SeveritySummary = { total: findings.length, CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0 };
  for (const f of findings) summary[f.severity] += 1;
  return summary;
}

export function computeScore(findings: readonly Finding[]): SecurityScore {
  const summary = summarize(findings);

  let total = 0;
  for (const sev of SEVERITY_ORDER) {
    total += summary[sev] * SEVERITY_DEDUCTIONS[sev];
  }

  const score = Math.max(0, Math.min(100, 100 - total));
  let grade: Grade;
  if (score >= 90) grade = "A";
  else if (score >= 80) grade = "B";
  else if (score >= 70) grade = "C";
  else if (score >= 55) grade = "D";
  else grade = "F";

  return { score, grade };
}
