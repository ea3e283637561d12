import type { Finding } from "../schemas.js";
import { RULE_CATALOG } from "../rules/catalog.js";
import { effectivePolicies } from "../snapshot/effective-policies.js";
import { grantsFullAccess } from "../snapshot/policy.js";
import { freezeFinding, type Detector } from "./types.js";

export interface PrivilegeEscalationOptions {
  /** Actions that mean full access when allowed on Resource "*". */
  adminWildcardActions: readonly string[];
}

export function createPrivilegeEscalationDetector(options: PrivilegeEscalationOptions): Detector {
  const adminActions = [...options.adminWildcardActions];

  return {
    name: "privilege-escalation",
    category: "PRIVILEGE_ESCALATION",

    evaluate(snapshot) {
      const findings: Finding[] = [];

      for (const user of snapshot.users.values()) {
        for (const entry of effectivePolicies(snapshot, user)) {
          const { policy, attachmentPath, groupName } = entry;
          if (!policy.statements.some((s) => grantsFullAccess(s, adminActions))) continue;

          const via = groupName ? ` via group '${groupName}'` : " directly";

          findings.push(
            freezeFinding<"PRIVILEGE_ESCALATION">({
              category: "PRIVILEGE_ESCALATION",
              severity: "CRITICAL",
              subject: { kind: "user", id: user.name },
              title: RULE_CATALOG.PRIVILEGE_ESCALATION.name,
              description: `User '${user.name}' is granted full administrative access by ${policy.kind} policy '${policy.name}'${via}.`,
              recommendation: RULE_CATALOG.PRIVILEGE_ESCALATION.remediation,
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
