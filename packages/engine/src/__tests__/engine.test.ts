import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { AuditEngine } from "../engine.js";
import type { SnapshotCollector } from "../collectors/types.js";
import type { Detector } from "../detectors/types.js";
import { mfaDetector } from "../detectors/mfa.js";
import { createStaleKeyDetector } from "../detectors/stale-key.js";
import { CollectionError, DetectorError, InvalidSnapshotError } from "../errors.js";
import { renderJson } from "../formatters/json.js";
import { createDetectors } from "../rules/registry.js";
import type { Snapshot } from "../snapshot/types.js";
import { ADMIN_DOCUMENT, NOW, daysAgo, makeFinding, makeSnapshot, makeUser, managed } from "./helpers.js";

function collectorOf(snapshot: Snapshot): SnapshotCollector {
  return { provider: "test", collect: async () => snapshot };
}

function failingCollector(err: unknown): SnapshotCollector {
  return {
    provider: "test",
    collect: async () => {
      throw err;
    },
  };
}

describe("AuditEngine", () => {
  beforeEach(() => {
    vi.stubEnv("IAM_WARDEN_LOG_LEVEL", "info");
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("reports MFA_DISABLED HIGH for a user with a fresh active key and no MFA", async () => {
    const snapshot = makeSnapshot([
      makeUser("alice", {
        mfaEnabled: false,
        accessKeys: [{ id: "AKIAEXAMPLE1", createdAt: daysAgo(10), status: "Active" }],
      }),
    ]);

    const report = await new AuditEngine().run(collectorOf(snapshot));
    expect(report.findings).toHaveLength(1);
    expect(report.findings[0]?.category).toBe("MFA_DISABLED");
    expect(report.findings[0]?.severity).toBe("HIGH");
  });

  it("reports a 120 day old key as STALE_ACCESS_KEY MEDIUM", async () => {
    const snapshot = makeSnapshot([
      makeUser("alice", {
        accessKeys: [{ id: "AKIAEXAMPLE1", createdAt: daysAgo(120), status: "Active" }],
      }),
    ]);

    const report = await new AuditEngine({ staleKeyThresholdDays: 90 }).run(collectorOf(snapshot));
    expect(report.findings).toHaveLength(1);
    expect(report.findings[0]).toMatchObject({
      category: "STALE_ACCESS_KEY",
      severity: "MEDIUM",
      evidence: { keyId: "AKIAEXAMPLE1", ageDays: 120 },
    });
  });

  it("reports a wildcard grant inherited through a group as CRITICAL", async () => {
    const snapshot = makeSnapshot(
      [makeUser("alice", { groups: ["platform"] })],
      [{ name: "platform", attachedPolicies: [managed("PlatformFull", ADMIN_DOCUMENT)] }],
    );

    const report = await new AuditEngine().run(collectorOf(snapshot));
    expect(report.findings).toHaveLength(1);
    expect(report.findings[0]).toMatchObject({
      category: "PRIVILEGE_ESCALATION",
      severity: "CRITICAL",
      evidence: { policyName: "PlatformFull", attachmentPath: "via group", groupName: "platform" },
    });
  });

  it("returns an empty report for a snapshot with no users", async () => {
    const report = await new AuditEngine().run(collectorOf(makeSnapshot([])));

    expect(report.findings).toEqual([]);
    expect(report.summary).toEqual({ total: 0, CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0 });
    expect(report.score).toEqual({ score: 100, grade: "A" });
    expect(report.degraded).toEqual([]);
    expect(report.warnings).toEqual([]);
  });

  it("isolates a failing detector and marks its category degraded", async () => {
    const snapshot = makeSnapshot([
      makeUser("alice", {
        mfaEnabled: false,
        accessKeys: [{ id: "AKIAEXAMPLE1", createdAt: daysAgo(200), status: "Active" }],
      }),
    ]);
    const broken: Detector = {
      name: "stale-key",
      category: "STALE_ACCESS_KEY",
      evaluate() {
        throw new DetectorError("stale-key", "STALE_ACCESS_KEY", "unexpected key shape");
      },
    };

    const report = await new AuditEngine().run(collectorOf(snapshot), [mfaDetector, broken]);

    expect(report.findings.map((f) => f.category)).toEqual(["MFA_DISABLED"]);
    expect(report.degraded).toEqual(["STALE_ACCESS_KEY"]);
    expect(report.warnings).toEqual([
      { detector: "stale-key", category: "STALE_ACCESS_KEY", message: "unexpected key shape" },
    ]);
    const logged = vi.mocked(process.stderr.write).mock.calls.map((c) => String(c[0]));
    expect(logged).toContain("[iam-warden] [engine] stale-key failed: unexpected key shape\n");
  });

  it("wraps other detector exceptions in DetectorError", async () => {
    const broken: Detector = {
      name: "boom",
      category: "EXCESSIVE_PRIVILEGE",
      evaluate() {
        throw new TypeError("cannot read properties of undefined");
      },
    };

    const report = await new AuditEngine().evaluate(makeSnapshot([makeUser("alice")]), [broken]);
    expect(report.degraded).toEqual(["EXCESSIVE_PRIVILEGE"]);
    expect(report.warnings[0]).toEqual({
      detector: "boom",
      category: "EXCESSIVE_PRIVILEGE",
      message: "cannot read properties of undefined",
    });
  });

  it("degrades a detector that returns malformed findings", async () => {
    const snapshot = makeSnapshot([
      makeUser("alice", {
        mfaEnabled: false,
        accessKeys: [{ id: "AKIAEXAMPLE1", createdAt: daysAgo(10), status: "Active" }],
      }),
    ]);
    const garbled: Detector = {
      name: "garbled",
      category: "STALE_ACCESS_KEY",
      evaluate() {
        return JSON.parse("[null]");
      },
    };

    const report = await new AuditEngine().run(collectorOf(snapshot), [mfaDetector, garbled]);

    expect(report.findings.map((f) => f.category)).toEqual(["MFA_DISABLED"]);
    expect(report.degraded).toEqual(["STALE_ACCESS_KEY"]);
    expect(report.warnings).toEqual([
      {
        detector: "garbled",
        category: "STALE_ACCESS_KEY",
        message: "returned malformed findings: 0: Expected object, received null",
      },
    ]);
  });

  it("degrades a detector that emits another category", async () => {
    const stray: Detector = {
      name: "stray",
      category: "STALE_ACCESS_KEY",
      evaluate: () => [makeFinding("HIGH", "alice")],
    };

    const report = await new AuditEngine().evaluate(makeSnapshot([makeUser("alice")]), [stray]);

    expect(report.findings).toEqual([]);
    expect(report.degraded).toEqual(["STALE_ACCESS_KEY"]);
    expect(report.warnings[0]?.message).toBe("emitted a MFA_DISABLED finding, expected STALE_ACCESS_KEY");
  });

  it("keeps its own copy of every finding", async () => {
    const held = makeFinding("HIGH", "alice");
    const custom: Detector = { name: "custom", category: "MFA_DISABLED", evaluate: () => [held] };

    const report = await new AuditEngine().evaluate(makeSnapshot([makeUser("alice")]), [custom]);
    held.severity = "LOW";
    held.evidence.activeKeyCount = 7;

    expect(report.findings[0]).not.toBe(held);
    expect(report.findings[0]?.severity).toBe("HIGH");
    expect(report.findings[0]?.evidence).toEqual({ activeKeyCount: 1 });
    expect(report.summary.HIGH).toBe(1);
    expect(Object.isFrozen(report.findings[0])).toBe(true);
    expect(Object.isFrozen(report.findings[0]?.evidence)).toBe(true);
  });

  it("produces identical reports for the same snapshot", async () => {
    const snapshot = makeSnapshot(
      [
        makeUser("bob", {
          mfaEnabled: false,
          groups: ["admins"],
          accessKeys: [{ id: "AKIAEXAMPLE2", createdAt: daysAgo(400), status: "Active" }],
        }),
        makeUser("alice", { attachedPolicies: [managed("AdministratorAccess", ADMIN_DOCUMENT)] }),
      ],
      [{ name: "admins", attachedPolicies: [managed("AdministratorAccess", ADMIN_DOCUMENT)] }],
    );

    const engine = new AuditEngine();
    const first = await engine.run(collectorOf(snapshot));
    const second = await engine.run(collectorOf(snapshot), createDetectors(engine.config).reverse());

    expect(renderJson(second)).toBe(renderJson(first));
    expect(first.evaluatedAt).toBe(NOW.toISOString());
    expect(first.summary).toEqual({ total: 6, CRITICAL: 2, HIGH: 2, MEDIUM: 2, LOW: 0 });
  });

  it("freezes the report", async () => {
    const report = await new AuditEngine().run(collectorOf(makeSnapshot([makeUser("alice")])));
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.findings)).toBe(true);
    expect(Object.isFrozen(report.summary)).toBe(true);
  });

  it("fills the report header from the snapshot", async () => {
    const snapshot = makeSnapshot([makeUser("alice", { attachedPolicies: [managed("ReadOnlyAccess")] })]);
    const report = await new AuditEngine().run(collectorOf(snapshot));

    expect(report.provider).toBe("test");
    expect(report.account).toBe("111122223333");
    expect(report.resourceCounts).toEqual({ users: 1, groups: 0, accessKeys: 0, policies: 1 });
  });

  it("honors disabled categories from config", async () => {
    const snapshot = makeSnapshot([makeUser("alice", { mfaEnabled: false })]);
    const report = await new AuditEngine({ disable: ["MFA_DISABLED"] }).run(collectorOf(snapshot));
    expect(report.findings).toEqual([]);
  });

  it("rethrows CollectionError unchanged", async () => {
    const err = new CollectionError("credentials expired", { provider: "test" });
    await expect(new AuditEngine().run(failingCollector(err))).rejects.toBe(err);
  });

  it("wraps other collector failures in CollectionError", async () => {
    const rejection = new AuditEngine().run(failingCollector(new Error("socket hang up")));
    await expect(rejection).rejects.toBeInstanceOf(CollectionError);
    await expect(rejection).rejects.toThrow("socket hang up");
  });

  it("surfaces InvalidSnapshotError from the collector", async () => {
    const err = new InvalidSnapshotError(["user 'alice' references unknown group 'ghosts'"]);
    await expect(new AuditEngine().run(failingCollector(err))).rejects.toBe(err);
  });

  it("rejects snapshots that break referential closure", async () => {
    const valid = makeSnapshot([makeUser("alice")]);
    const alice = valid.users.get("alice");
    if (!alice) throw new Error("fixture");
    const broken: Snapshot = {
      ...valid,
      users: new Map([["alice", { ...alice, groups: ["ghosts"] }]]),
    };

    await expect(new AuditEngine().evaluate(broken)).rejects.toBeInstanceOf(InvalidSnapshotError);
  });

  it("applies a custom stale key threshold", async () => {
    const snapshot = makeSnapshot([
      makeUser("alice", { accessKeys: [{ id: "AKIAEXAMPLE1", createdAt: daysAgo(45), status: "Active" }] }),
    ]);
    const detectors = [createStaleKeyDetector({ thresholdDays: 30 })];
    const report = await new AuditEngine().evaluate(snapshot, detectors);
    expect(report.findings[0]?.evidence).toEqual({ keyId: "AKIAEXAMPLE1", ageDays: 45 });
  });
});
