import type { Finding } from "../schemas.js";
import { RULE_CATALOG } from "../rules/catalog.js";
import { ageInDays } from "../snapshot/snapshot.js";
import { freezeFinding, type Detector } from "./types.js";

export interface StaleKeyOptions {
  /** Age in days at which an active key is reported. */
  thresholdDays: number;
}

/**
 * Flags active keys at or past the rotation threshold: MEDIUM until twice
 * the threshold, HIGH from then on. Ages are measured against the
 * snapshot's evaluation time.
 */
export function createStaleKeyDetector(options: StaleKeyOptions): Detector {
  const { thresholdDays } = options;

  return {
    name: "stale-key",
    category: "STALE_ACCESS_KEY",

    evaluate(snapshot) {
      const findings: Finding[] = [];

      for (const user of snapshot.users.values()) {
        for (const key of user.accessKeys) {
          if (key.status !== "Active") continue;

          const ageDays = ageInDays(key.createdAt, snapshot.evaluatedAt);
          if (ageDays < thresholdDays) continue;

          const lastUsed = key.lastUsedAt
            ? ` Last used ${key.lastUsedAt.toISOString().slice(0, 10)}.`
            : "";

          findings.push(
            freezeFinding<"STALE_ACCESS_KEY">({
              category: "STALE_ACCESS_KEY",
              severity: ageDays < 2 * thresholdDays ? "MEDIUM" : "HIGH",
              subject: { kind: "user", id: user.name },
              title: RULE_CATALOG.STALE_ACCESS_KEY.name,
              description: `Access key ${key.id} of user '${user.name}' is ${ageDays} days old (threshold ${thresholdDays}).${lastUsed}`,
              recommendation: RULE_CATALOG.STALE_ACCESS_KEY.remediation,
              evidence: { keyId: key.id, ageDays },
            }),
          );
        }
      }

      return findings;
    },
  };
}
