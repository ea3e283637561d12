import type { Finding } from "../schemas.js";
import { RULE_CATALOG } from "../rules/catalog.js";
import { effectivePolicies } from "../snapshot/effective-policies.js";
import { freezeFinding, type Detector } from "./types.js";

export interface AdminPolicyOptions {
  /** Managed policy names that mean admin by name (exact match). */
  policyNames: readonly string[];
}

/**
 * Name-based admin signal. Kept apart from the wildcard check: a renamed
 * admin policy, or a harmless policy that happens to carry the name, shows
 * up here and not there, and the other way round.
 */
export function createAdminPolicyDetector(options: AdminPolicyOptions): Detector {
  const names = new Set(options.policyNames);

  return {
    name: "admin-policy",
    category: "ADMIN_POLICY_ATTACHED",

    evaluate(snapshot) {
      const findings: Finding[] = [];
      if (names.size === 0) return findings;

      for (const user of snapshot.users.values()) {
        for (const { policy, attachmentPath, groupName } of effectivePolicies(snapshot, user)) {
          if (policy.kind !== "managed" || !names.has(policy.name)) continue;

          const via = groupName ? ` via group '${groupName}'` : " directly";

          findings.push(
            freezeFinding<"ADMIN_POLICY_ATTACHED">({
              category: "ADMIN_POLICY_ATTACHED",
              severity: "MEDIUM",
              subject: { kind: "user", id: user.name },
              title: RULE_CATALOG.ADMIN_POLICY_ATTACHED.name,
              description: `User '${user.name}' has managed policy '${policy.name}' attached${via}.`,
              recommendation: RULE_CATALOG.ADMIN_POLICY_ATTACHED.remediation,
              evidence: groupName
                ? { policyName: policy.name, attachmentPath, groupName }
                : { policyName: policy.name, attachmentPath },
            }),
          );
        }
      }

      return findings;
    },
  };
}
