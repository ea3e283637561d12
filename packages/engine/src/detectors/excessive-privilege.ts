import type { Finding } from "../schemas.js";
import { RULE_CATALOG } from "../rules/catalog.js";
import { countDistinctPolicies, effectivePolicies } from "../snapshot/effective-policies.js";
import { freezeFinding, type Detector } from "./types.js";

export interface ExcessivePrivilegeOptions {
  /** Report users with strictly more effective policies than this. */
  maxPolicies: number;
  /** A non-empty user tag with this key suppresses the finding. */
  justificationTag: string;
}

/**
 * Heuristic fan-out check. It counts policies, it does not prove anything
 * about least privilege.
 */
export function createExcessivePrivilegeDetector(options: ExcessivePrivilegeOptions): Detector {
  const { maxPolicies, justificationTag } = options;

  return {
    name: "excessive-privilege",
    category: "EXCESSIVE_PRIVILEGE",

    evaluate(snapshot) {
      const findings: Finding[] = [];

      for (const user of snapshot.users.values()) {
        if (justificationTag && user.tags[justificationTag]?.trim()) continue;

        const policyCount = countDistinctPolicies(effectivePolicies(snapshot, user));
        if (policyCount <= maxPolicies) continue;

        findings.push(
          freezeFinding<"EXCESSIVE_PRIVILEGE">({
            category: "EXCESSIVE_PRIVILEGE",
            severity: "LOW",
            subject: { kind: "user", id: user.name },
            title: RULE_CATALOG.EXCESSIVE_PRIVILEGE.name,
            description: `User '${user.name}' has ${policyCount} effective policies (threshold ${maxPolicies}).`,
            recommendation: RULE_CATALOG.EXCESSIVE_PRIVILEGE.remediation,
            evidence: { policyCount },
          }),
        );
      }

      return findings;
    },
  };
}
