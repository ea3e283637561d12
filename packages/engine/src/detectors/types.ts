/**
 * Shared types for detection rules.
 */

import type { Finding, FindingCategory, FindingOf } from "../schemas.js";
import type { Snapshot } from "../snapshot/types.js";

/**
 * Interface that every detector must implement.
 *
 * `evaluate` is a pure function of the snapshot: no I/O, no clock, no state
 * kept between calls. "Nothing found" is an empty array, never an error.
 */
export interface Detector {
  /** Detector name (e.g., "mfa", "stale-key"), used in logs and warnings. */
  name: string;
  /** The single category this detector emits. */
  category: FindingCategory;
  evaluate(snapshot: Snapshot): readonly Finding[];
}

/** Freeze a finding and its nested objects. */
export function freezeFinding<C extends FindingCategory>(finding: FindingOf<C>): Readonly<FindingOf<C>> {
  Object.freeze(finding.subject);
  Object.freeze(finding.evidence);
  return Object.freeze(finding);
}
