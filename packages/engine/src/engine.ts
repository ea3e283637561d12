/**
 * Audit engine.
 *
 * Pipeline:
 *   1. Acquire a snapshot from the collector (fatal on failure, never retried)
 *   2. Re-check referential closure
 *   3. Run every detector concurrently; a failing detector, or one whose
 *      output does not validate, degrades coverage
 *   4. Aggregate, summarize, score and freeze the report
 */

import { z } from "zod";
import { aggregate } from "./aggregator.js";
import type { SnapshotCollector } from "./collectors/types.js";
import { resolveConfig, type AuditConfig } from "./config.js";
import { freezeFinding, type Detector } from "./detectors/types.js";
import {
  CollectionError,
  DetectorError,
  InvalidSnapshotError,
  errorMessage,
} from "./errors.js";
import { logger } from "./logger.js";
import { createDetectors } from "./rules/registry.js";
import {
  FindingSchema,
  type AuditReport,
  type DetectorWarning,
  type Finding,
  type FindingCategory,
} from "./schemas.js";
import { computeScore, summarize } from "./scoring.js";
import { assertReferentialClosure, countResources } from "./snapshot/snapshot.js";
import type { Snapshot } from "./snapshot/types.js";

type DetectorOutcome =
  | { ok: true; detector: Detector; findings: readonly Finding[] }
  | { ok: false; detector: Detector; error: DetectorError };

const FindingListSchema = z.array(FindingSchema);

/**
 * Validate a detector's output and take ownership of it: the parsed copies
 * are frozen, so nothing the detector still holds can reach the report.
 */
function adoptFindings(detector: Detector, raw: unknown): Finding[] {
  const parsed = FindingListSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new DetectorError(
      detector.name,
      detector.category,
      `returned malformed findings: ${where}${issue?.message ?? "invalid finding"}`,
    );
  }

  const stray = parsed.data.find((f) => f.category !== detector.category);
  if (stray) {
    throw new DetectorError(
      detector.name,
      detector.category,
      `emitted a ${stray.category} finding, expected ${detector.category}`,
    );
  }

  return parsed.data.map((f) => freezeFinding<FindingCategory>(f));
}

async function runDetector(detector: Detector, snapshot: Snapshot): Promise<DetectorOutcome> {
  try {
    const startTime = Date.now();
    const findings = adoptFindings(detector, detector.evaluate(snapshot));
    const elapsed = Date.now() - startTime;
    logger.debug(`[engine] ${detector.name} completed in ${elapsed}ms — ${findings.length} findings`);
    return { ok: true, detector, findings };
  } catch (err: unknown) {
    const error =
      err instanceof DetectorError
        ? err
        : new DetectorError(detector.name, detector.category, errorMessage(err), err);
    logger.warn(`[engine] ${detector.name} failed: ${error.message}`);
    return { ok: false, detector, error };
  }
}

function freezeReport(report: AuditReport): AuditReport {
  Object.freeze(report.resourceCounts);
  Object.freeze(report.findings);
  Object.freeze(report.summary);
  Object.freeze(report.score);
  Object.freeze(report.degraded);
  for (const w of report.warnings) Object.freeze(w);
  Object.freeze(report.warnings);
  return Object.freeze(report);
}

export class AuditEngine {
  readonly config: AuditConfig;

  constructor(config: Partial<AuditConfig> = {}) {
    this.config = resolveConfig(config);
  }

  /**
   * Collect a snapshot and evaluate it.
   *
   * @throws CollectionError if the collector fails for any reason
   * @throws InvalidSnapshotError if the collected snapshot is inconsistent
   */
  async run(
    collector: SnapshotCollector,
    detectors: readonly Detector[] = createDetectors(this.config),
  ): Promise<AuditReport> {
    let snapshot: Snapshot;
    try {
      logger.info(`[engine] Collecting ${collector.provider} snapshot...`);
      snapshot = await collector.collect();
    } catch (err: unknown) {
      if (err instanceof CollectionError || err instanceof InvalidSnapshotError) throw err;
      throw new CollectionError(errorMessage(err), { provider: collector.provider, cause: err });
    }

    return this.evaluate(snapshot, detectors);
  }

  /**
   * Evaluate a snapshot the caller already holds.
   *
   * @throws InvalidSnapshotError if the snapshot is inconsistent
   */
  async evaluate(
    snapshot: Snapshot,
    detectors: readonly Detector[] = createDetectors(this.config),
  ): Promise<AuditReport> {
    assertReferentialClosure(snapshot);

    const outcomes = await Promise.all(detectors.map((d) => runDetector(d, snapshot)));

    const lists: (readonly Finding[])[] = [];
    const warnings: DetectorWarning[] = [];
    const degraded = new Set<FindingCategory>();

    for (const outcome of outcomes) {
      if (outcome.ok) {
        lists.push(outcome.findings);
      } else {
        degraded.add(outcome.detector.category);
        warnings.push({
          detector: outcome.error.detector,
          category: outcome.error.category,
          message: outcome.error.message,
        });
      }
    }

    const findings = aggregate(lists);

    const report: AuditReport = {
      evaluatedAt: snapshot.evaluatedAt.toISOString(),
      provider: snapshot.provider,
      ...(snapshot.account !== undefined ? { account: snapshot.account } : {}),
      resourceCounts: countResources(snapshot),
      findings,
      summary: summarize(findings),
      score: computeScore(findings),
      degraded: [...degraded].sort(),
      warnings,
    };

    logger.info(
      `[engine] ${findings.length} findings across ${snapshot.users.size} users` +
        (degraded.size > 0 ? ` (degraded: ${[...degraded].join(", ")})` : ""),
    );

    return freezeReport(report);
  }
}
