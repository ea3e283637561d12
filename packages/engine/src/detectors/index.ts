export { freezeFinding, type Detector } from "./types.js";
export { mfaDetector, MFA_SEVERITY_POLICY } from "./mfa.js";
export { createStaleKeyDetector, type StaleKeyOptions } from "./stale-key.js";
export {
  createPrivilegeEscalationDetector,
  type PrivilegeEscalationOptions,
} from "./privilege-escalation.js";
export {
  createExcessivePrivilegeDetector,
  type ExcessivePrivilegeOptions,
} from "./excessive-privilege.js";
export { createAdminPolicyDetector, type AdminPolicyOptions } from "./admin-policy.js";
