import type { Finding, Severity } from "../schemas.js";
import { RULE_CATALOG } from "../rules/catalog.js";
import { freezeFinding, type Detector } from "./types.js";

/**
 * Severity for a user without MFA. Programmatic access (any active key)
 * outranks console-only exposure.
 */
export const MFA_SEVERITY_POLICY: Readonly<{ programmatic: Severity; consoleOnly: Severity }> =
  Object.freeze({ programmatic: "HIGH", consoleOnly: "MEDIUM" });

export const mfaDetector: Detector = {
  name: "mfa",
  category: "MFA_DISABLED",

  evaluate(snapshot) {
    const findings: Finding[] = [];

    for (const user of snapshot.users.values()) {
      if (user.mfaEnabled) continue;

      const activeKeyCount = user.accessKeys.filter((k) => k.status === "Active").length;
      const programmatic = activeKeyCount > 0;

      findings.push(
        freezeFinding<"MFA_DISABLED">({
          category: "MFA_DISABLED",
          severity: programmatic ? MFA_SEVERITY_POLICY.programmatic : MFA_SEVERITY_POLICY.consoleOnly,
          subject: { kind: "user", id: user.name },
          title: RULE_CATALOG.MFA_DISABLED.name,
          description: programmatic
            ? `User '${user.name}' has ${activeKeyCount} active access key${activeKeyCount === 1 ? "" : "s"} and no MFA device.`
            : `User '${user.name}' has no MFA device.`,
          recommendation: RULE_CATALOG.MFA_DISABLED.remediation,
          evidence: { activeKeyCount },
        }),
      );
    }

    return findings;
  },
};
