/**
 * Rule catalogue: one entry per finding category, with remediation text and
 * the CIS AWS Foundations Benchmark (v2.0) controls it maps to.
 */

import type { FindingCategory, Severity } from "../schemas.js";

export interface RuleInfo {
  category: FindingCategory;
  name: string;
  description: string;
  /** Severity in the common case; some rules escalate or downgrade. */
  defaultSeverity: Severity;
  remediation: string;
  cisControls: string[];
}

export const RULE_CATALOG: Record<FindingCategory, RuleInfo> = {
  MFA_DISABLED: {
    category: "MFA_DISABLED",
    name: "MFA not enabled",
    description:
      "User has no MFA device. HIGH when the user also holds active access keys, MEDIUM for console-only users.",
    defaultSeverity: "HIGH",
    remediation: "Enable MFA for every user, starting with those holding programmatic access.",
    cisControls: ["1.10"],
  },
  STALE_ACCESS_KEY: {
    category: "STALE_ACCESS_KEY",
    name: "Stale access key",
    description:
      "Active access key older than the rotation threshold. HIGH once it is twice the threshold.",
    defaultSeverity: "MEDIUM",
    remediation: "Rotate the key: create a replacement, switch consumers over, then deactivate and delete the old key.",
    cisControls: ["1.14"],
  },
  PRIVILEGE_ESCALATION: {
    category: "PRIVILEGE_ESCALATION",
    name: "Full administrative access",
    description:
      "A policy in the user's effective set allows a full-access wildcard action on every resource, directly or through a group.",
    defaultSeverity: "CRITICAL",
    remediation:
      "Replace the wildcard grant with the specific actions and resource ARNs the user needs; for inherited grants, review the group's membership.",
    cisControls: ["1.16"],
  },
  EXCESSIVE_PRIVILEGE: {
    category: "EXCESSIVE_PRIVILEGE",
    name: "Excessive policy fan-out",
    description:
      "User's effective policy count exceeds the configured threshold and carries no justification tag. Heuristic only.",
    defaultSeverity: "LOW",
    remediation:
      "Consolidate the user's permissions into fewer, group-managed policies, or tag the user with the justification for the access.",
    cisControls: ["1.15"],
  },
  ADMIN_POLICY_ATTACHED: {
    category: "ADMIN_POLICY_ATTACHED",
    name: "Administrator policy attached",
    description:
      "A managed policy with an administrator name (AdministratorAccess by default) is attached to the user directly or through a group.",
    defaultSeverity: "MEDIUM",
    remediation: "Review whether full admin access is necessary and scope the permissions down.",
    cisControls: ["1.16"],
  },
};
