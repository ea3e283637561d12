import { writeFileSync } from "node:fs";
import { resolve } from "node:path";
import {
  AuditEngine,
  AwsIamCollector,
  FileSnapshotCollector,
  SEVERITY_RANK,
  SeveritySchema,
  errorMessage,
  loadConfig,
  logger,
  resolveConfig,
  type AuditConfig,
  type SnapshotCollector,
} from "@iam-warden/engine";
import { OUTPUT_FORMATS, formatReport, isOutputFormat } from "../formatter.js";
import { withTimeout } from "../timeout.js";

export interface AuditOptions {
  provider: string;
  snapshot?: string;
  profile?: string;
  region?: string;
  /** Config file or directory; the working directory when unset. */
  config?: string;
  format: string;
  output?: string;
  failOn?: string;
  timeout?: string;
  staleKeyDays?: string;
  maxPolicies?: string;
}

export const DEFAULT_TIMEOUT_SECONDS = 300;

function usageError(message: string): number {
  process.stderr.write(`[iam-warden] Error: ${message}\n`);
  return 1;
}

function parsePositiveInt(value: string): number | undefined {
  if (!/^\d+$/.test(value)) return undefined;
  const n = parseInt(value, 10);
  return n > 0 ? n : undefined;
}

/**
 * Run an audit and print the report.
 *
 * Resolves to the process exit code: 0 on success, 1 for usage errors or a
 * `--fail-on` violation. Collection failures reject and are fatal.
 */
export async function runAudit(options: AuditOptions): Promise<number> {
  if (!isOutputFormat(options.format)) {
    return usageError(`invalid format '${options.format}'. Must be one of: ${OUTPUT_FORMATS.join(", ")}`);
  }
  const format = options.format;

  const provider = options.snapshot ? "file" : options.provider;
  if (provider !== "aws" && provider !== "file") {
    return usageError(`unknown provider '${provider}'. Must be one of: aws, file`);
  }
  if (provider === "file" && !options.snapshot) {
    return usageError("--provider file requires --snapshot <file>");
  }

  let failOn: number | undefined;
  if (options.failOn) {
    const sev = SeveritySchema.safeParse(options.failOn.toUpperCase());
    if (!sev.success) {
      return usageError(`invalid --fail-on '${options.failOn}'. Must be one of: ${SeveritySchema.options.join(", ")}`);
    }
    failOn = SEVERITY_RANK[sev.data];
  }

  const overrides: Partial<AuditConfig> = {};
  if (options.staleKeyDays !== undefined) {
    const n = parsePositiveInt(options.staleKeyDays);
    if (n === undefined) return usageError("--stale-key-days must be a positive integer");
    overrides.staleKeyThresholdDays = n;
  }
  if (options.maxPolicies !== undefined) {
    const n = parsePositiveInt(options.maxPolicies);
    if (n === undefined) return usageError("--max-policies must be a positive integer");
    overrides.excessivePolicyCountThreshold = n;
  }

  let timeoutSeconds = DEFAULT_TIMEOUT_SECONDS;
  if (options.timeout !== undefined) {
    const n = parsePositiveInt(options.timeout);
    if (n === undefined) return usageError("--timeout must be a positive number of seconds");
    timeoutSeconds = n;
  }

  const configPath = resolve(options.config ?? ".");
  const fileConfig = loadConfig(configPath);
  if (options.config && !fileConfig) {
    return usageError(`config file not found: ${options.config}`);
  }
  const config = resolveConfig({ ...(fileConfig ?? {}), ...overrides });
  logger.debug(`[audit] Config: ${JSON.stringify(config)}`);

  const collector: SnapshotCollector =
    provider === "file" && options.snapshot
      ? new FileSnapshotCollector(resolve(options.snapshot))
      : new AwsIamCollector({ profile: options.profile, region: options.region });

  const engine = new AuditEngine(config);
  const report = await withTimeout(
    engine.run(collector),
    timeoutSeconds * 1000,
    `audit timed out after ${timeoutSeconds}s`,
  );

  const output = formatReport(report, { format, severityThreshold: config.severityThreshold });

  if (options.output) {
    try {
      writeFileSync(resolve(options.output), output);
      process.stderr.write(`[iam-warden] Report written to ${options.output}\n`);
    } catch (err) {
      process.stderr.write(`[iam-warden] Error: could not write to ${options.output} — ${errorMessage(err)}\n`);
      return 1;
    }
  } else {
    process.stdout.write(output);
    if (format !== "markdown") process.stdout.write("\n");
  }

  if (failOn !== undefined) {
    const threshold = failOn;
    if (report.findings.some((f) => SEVERITY_RANK[f.severity] >= threshold)) return 1;
  }

  return 0;
}
