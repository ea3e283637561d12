/**
 * Detector registry.
 *
 * Central catalogue of the detection rules. The engine runs whatever list
 * `createDetectors()` returns against one snapshot.
 */

import type { AuditConfig } from "../config.js";
import {
  createAdminPolicyDetector,
  createExcessivePrivilegeDetector,
  createPrivilegeEscalationDetector,
  createStaleKeyDetector,
  mfaDetector,
  type Detector,
} from "../detectors/index.js";
import { FindingCategorySchema } from "../schemas.js";
import { RULE_CATALOG, type RuleInfo } from "./catalog.js";

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * The default registry, in a fixed order, minus disabled categories.
 */
export function createDetectors(
  config: Pick<
    AuditConfig,
    | "staleKeyThresholdDays"
    | "excessivePolicyCountThreshold"
    | "adminWildcardActions"
    | "adminPolicyNames"
    | "privilegeJustificationTag"
    | "disable"
  >,
): Detector[] {
  const all: Detector[] = [
    mfaDetector,
    createStaleKeyDetector({ thresholdDays: config.staleKeyThresholdDays }),
    createPrivilegeEscalationDetector({ adminWildcardActions: config.adminWildcardActions }),
    createExcessivePrivilegeDetector({
      maxPolicies: config.excessivePolicyCountThreshold,
      justificationTag: config.privilegeJustificationTag,
    }),
    createAdminPolicyDetector({ policyNames: config.adminPolicyNames }),
  ];

  const disabled = new Set(config.disable);
  return all.filter((d) => !disabled.has(d.category));
}

/**
 * Returns every rule in category order.
 */
export function getAllRules(): RuleInfo[] {
  return FindingCategorySchema.options.map((category) => RULE_CATALOG[category]);
}
