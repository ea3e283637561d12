/**
 * Markdown audit report generator.
 *
 * Produces a standalone markdown document suitable for sharing with a CISO or
 * attaching to a compliance ticket.
 */

import { filterByConfig } from "../config.js";
import { getAllRules } from "../rules/registry.js";
import type { AuditReport, Finding, Severity } from "../schemas.js";
import { SEVERITY_ORDER } from "../schemas.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ReportOptions {
  /** Heading; defaults to the account id or provider. */
  title?: string;
  /** Findings below this severity are left out of the listing. */
  severityThreshold?: Severity;
}

// ---------------------------------------------------------------------------
// Severity helpers
// ---------------------------------------------------------------------------

const SEVERITY_LABELS: Record<Severity, string> = {
  CRITICAL: "Critical",
  HIGH: "High",
  MEDIUM: "Medium",
  LOW: "Low",
};

function subjectLabel(f: Finding): string {
  return `${f.subject.kind} \`${f.subject.id}\``;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Generate a complete markdown audit report.
 */
export function generateMarkdownReport(report: AuditReport, options?: ReportOptions): string {
  const title = options?.title ?? report.account ?? report.provider;
  const findings = filterByConfig(report.findings, {
    severityThreshold: options?.severityThreshold ?? "LOW",
  });
  const { score, summary, resourceCounts } = report;

  const sections: string[] = [];

  sections.push(`# IAM Audit Report: ${title}`);
  sections.push("");
  sections.push(`*Evaluated: ${report.evaluatedAt}*`);
  sections.push("");

  // ── Executive Summary ──────────────────────────────────────────────────
  sections.push("## Executive Summary");
  sections.push("");
  sections.push(`**Security Score: ${score.score}/100 (${score.grade})**`);
  sections.push("");
  sections.push(
    `Audited ${resourceCounts.users} users, ${resourceCounts.groups} groups, ` +
      `${resourceCounts.accessKeys} access keys and ${resourceCounts.policies} policies.`,
  );
  sections.push("");

  sections.push("| Severity | Count |");
  sections.push("|----------|-------|");
  for (const sev of SEVERITY_ORDER) {
    sections.push(`| ${SEVERITY_LABELS[sev]} | ${summary[sev]} |`);
  }
  sections.push("");

  if (report.findings.length === 0) {
    sections.push("No issues found.");
    sections.push("");
  }

  // ── Degraded coverage ─────────────────────────────────────────────────
  if (report.degraded.length > 0) {
    sections.push("## Degraded Coverage");
    sections.push("");
    sections.push("The following checks failed to run; their categories were not evaluated:");
    sections.push("");
    for (const w of report.warnings) {
      sections.push(`- **${w.category}** (\`${w.detector}\`): ${w.message}`);
    }
    sections.push("");
  }

  // ── CIS Benchmark Coverage ────────────────────────────────────────────
  sections.push("## CIS Benchmark Coverage");
  sections.push("");
  sections.push("| Control | Check | Findings | Status |");
  sections.push("|---------|-------|----------|--------|");
  for (const rule of getAllRules()) {
    const count = report.findings.filter((f) => f.category === rule.category).length;
    let status: string;
    if (report.degraded.includes(rule.category)) status = "Not evaluated";
    else if (count === 0) status = "Pass";
    else status = "Fail";
    sections.push(`| ${rule.cisControls.join(", ")} | ${rule.name} | ${count} | ${status} |`);
  }
  sections.push("");

  // ── Findings by Severity ──────────────────────────────────────────────
  if (findings.length > 0) {
    sections.push("## Findings by Severity");
    sections.push("");
  }

  for (const sev of SEVERITY_ORDER) {
    const group = findings.filter((f) => f.severity === sev);
    if (group.length === 0) continue;

    sections.push(`### ${SEVERITY_LABELS[sev]} (${group.length})`);
    sections.push("");

    for (const f of group) {
      sections.push(`#### ${f.title}`);
      sections.push("");
      sections.push(`- **Category:** \`${f.category}\``);
      sections.push(`- **Subject:** ${subjectLabel(f)}`);
      sections.push(`- **Description:** ${f.description}`);
      sections.push(`- **Recommendation:** ${f.recommendation}`);
      sections.push("");
    }
  }

  // ── Remediation Priorities ────────────────────────────────────────────
  const actionable = findings.filter(
    (f) => f.severity === "CRITICAL" || f.severity === "HIGH" || f.severity === "MEDIUM",
  );

  if (actionable.length > 0) {
    sections.push("## Remediation Priorities");
    sections.push("");

    let idx = 1;
    for (const f of actionable) {
      sections.push(`${idx}. **[${SEVERITY_LABELS[f.severity]}]** ${f.title} - ${subjectLabel(f)}`);
      idx++;
    }
    sections.push("");
  }

  sections.push("---");
  sections.push("*Report generated by iam-warden*");
  sections.push("");

  return sections.join("\n");
}
