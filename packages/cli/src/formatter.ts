import type { AuditReport, Finding, RuleInfo, Severity } from "@iam-warden/engine";
import {
  SEVERITY_ORDER,
  filterByConfig,
  generateMarkdownReport,
  renderJson,
} from "@iam-warden/engine";

// ANSI escape codes — no dependencies needed
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const BLUE = "\x1b[34m";
const CYAN = "\x1b[36m";
const BG_RED = "\x1b[41m";
const BG_GREEN = "\x1b[42m";
const BG_YELLOW = "\x1b[43m";
const BG_BLUE = "\x1b[44m";
const WHITE = "\x1b[37m";

function c(color: string, text: string): string {
  return `${color}${text}${RESET}`;
}

function severityColor(severity: Severity): string {
  switch (severity) {
    case "CRITICAL": return BG_RED + WHITE;
    case "HIGH": return RED;
    case "MEDIUM": return YELLOW;
    case "LOW": return BLUE;
  }
}

function severityBadge(severity: Severity): string {
  return c(severityColor(severity), ` ${severity.padEnd(8)} `);
}

function gradeColor(grade: string): string {
  switch (grade) {
    case "A": return BG_GREEN + WHITE;
    case "B": return BG_BLUE + WHITE;
    case "C": return BG_YELLOW + WHITE;
    default: return BG_RED + WHITE;
  }
}

export const OUTPUT_FORMATS = ["table", "json", "markdown"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

export interface FormatOptions {
  format: OutputFormat;
  /** Listing threshold for table and markdown; JSON always carries the full report. */
  severityThreshold?: Severity;
}

export function formatReport(report: AuditReport, options: FormatOptions): string {
  const severityThreshold = options.severityThreshold ?? "LOW";
  switch (options.format) {
    case "json":
      return renderJson(report);
    case "markdown":
      return generateMarkdownReport(report, { severityThreshold });
    case "table":
      return formatTable(report, severityThreshold);
  }
}

function formatTable(report: AuditReport, severityThreshold: Severity): string {
  const { score, summary, resourceCounts } = report;
  const findings = filterByConfig(report.findings, { severityThreshold });
  const lines: string[] = [];

  // Header
  lines.push("");
  lines.push(c(CYAN, "  ╔══════════════════════════════════════════╗"));
  lines.push(c(CYAN, "  ║") + c(BOLD, "         IAM WARDEN AUDIT REPORT          ") + c(CYAN, "║"));
  lines.push(c(CYAN, "  ╚══════════════════════════════════════════╝"));
  lines.push("");

  const target = report.account ? `${report.provider} account ${report.account}` : report.provider;
  lines.push(`  ${c(DIM, `${target} · evaluated ${report.evaluatedAt}`)}`);
  lines.push(
    `  ${c(DIM, `${resourceCounts.users} users · ${resourceCounts.groups} groups · ${resourceCounts.accessKeys} access keys · ${resourceCounts.policies} policies`)}`,
  );
  lines.push("");

  // Score display
  const badge = c(gradeColor(score.grade), ` ${score.grade} `);
  lines.push(`  Score: ${c(BOLD, String(score.score))}${DIM}/100${RESET}  Grade: ${badge}`);
  lines.push("");

  // Breakdown bar
  const parts: string[] = [];
  if (summary.CRITICAL > 0) parts.push(c(BG_RED + WHITE, ` CRITICAL ${summary.CRITICAL} `));
  if (summary.HIGH > 0) parts.push(c(RED, `HIGH ${summary.HIGH}`));
  if (summary.MEDIUM > 0) parts.push(c(YELLOW, `MEDIUM ${summary.MEDIUM}`));
  if (summary.LOW > 0) parts.push(c(DIM, `LOW ${summary.LOW}`));

  if (parts.length > 0) {
    lines.push(`  ${parts.join("  ")}`);
    lines.push("");
  }

  // Degraded coverage is never hidden
  if (report.degraded.length > 0) {
    lines.push(c(YELLOW, `  Degraded coverage: ${report.degraded.join(", ")}`));
    for (const w of report.warnings) {
      lines.push(`              ${c(DIM, `${w.detector}: ${w.message}`)}`);
    }
    lines.push("");
  }

  if (findings.length === 0) {
    lines.push(c(GREEN, "  No issues found."));
    lines.push("");
    return lines.join("\n");
  }

  // Group by severity
  const grouped = new Map<Severity, Finding[]>();
  for (const f of findings) {
    const group = grouped.get(f.severity) ?? [];
    group.push(f);
    grouped.set(f.severity, group);
  }

  for (const sev of SEVERITY_ORDER) {
    const group = grouped.get(sev);
    if (!group || group.length === 0) continue;

    lines.push(c(BOLD, `  ${sev} (${group.length})`));
    lines.push("");

    for (const f of group) {
      lines.push(`  ${severityBadge(f.severity)} ${c(BOLD, f.title)}`);
      lines.push(`              ${c(DIM, `${f.subject.kind} ${f.subject.id}`)}`);
      lines.push(`              ${f.description}`);
      lines.push(`              ${c(DIM, f.category)}`);
      lines.push("");
    }
  }

  lines.push(c(DIM, "  ─".repeat(22)));
  lines.push(`  ${findings.length} finding${findings.length === 1 ? "" : "s"} shown`);
  lines.push("");

  return lines.join("\n");
}

export function formatRulesTable(rules: readonly RuleInfo[]): string {
  const lines: string[] = [];

  lines.push("");
  lines.push(c(CYAN, "  ╔══════════════════════════════════════════╗"));
  lines.push(c(CYAN, "  ║") + c(BOLD, "            IAM WARDEN RULES              ") + c(CYAN, "║"));
  lines.push(c(CYAN, "  ╚══════════════════════════════════════════╝"));
  lines.push("");

  // Header
  const idW = 24;
  const nameW = 32;
  const sevW = 10;
  const cisW = 8;

  lines.push(
    `  ${c(BOLD, "CATEGORY".padEnd(idW))}${c(BOLD, "NAME".padEnd(nameW))}${c(BOLD, "SEV".padEnd(sevW))}${c(BOLD, "CIS")}`,
  );
  lines.push(`  ${"─".repeat(idW + nameW + sevW + cisW)}`);

  for (const rule of rules) {
    const sev = c(severityColor(rule.defaultSeverity), rule.defaultSeverity.padEnd(sevW));
    lines.push(
      `  ${c(DIM, rule.category.padEnd(idW))}${rule.name.slice(0, nameW - 2).padEnd(nameW)}${sev}${rule.cisControls.join(", ")}`,
    );
  }

  lines.push("");
  lines.push(`  ${rules.length} rules total`);
  lines.push("");

  return lines.join("\n");
}
