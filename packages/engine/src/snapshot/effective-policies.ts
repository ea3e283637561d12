import type { AttachmentPath } from "../schemas.js";
import type { IamUser, PolicyDocument, Snapshot } from "./types.js";

export interface EffectivePolicy {
  policy: PolicyDocument;
  attachmentPath: AttachmentPath;
  /** Set when `attachmentPath` is "via group". */
  groupName?: string;
}

/**
 * Every policy that applies to `user`: direct managed, direct inline, then the
 * managed and inline policies of each group in membership order.
 *
 * The same managed policy reached through two paths appears once per path so
 * callers can report both.
 */
export function effectivePolicies(snapshot: Snapshot, user: IamUser): EffectivePolicy[] {
  const result: EffectivePolicy[] = [];

  for (const policy of [...user.attachedPolicies, ...user.inlinePolicies]) {
    result.push({ policy, attachmentPath: "direct" });
  }

  for (const groupName of user.groups) {
    const group = snapshot.groups.get(groupName);
    if (!group) continue;
    for (const policy of [...group.attachedPolicies, ...group.inlinePolicies]) {
      result.push({ policy, attachmentPath: "via group", groupName });
    }
  }

  return result;
}

/**
 * Number of distinct policies in an effective set. Managed policies are keyed
 * by ARN (or name); inline policies are distinct per owner.
 */
export function countDistinctPolicies(entries: readonly EffectivePolicy[]): number {
  const keys = new Set<string>();
  for (const { policy, groupName } of entries) {
    if (policy.kind === "managed") {
      keys.add(`managed:${policy.arn ?? policy.name}`);
    } else {
      keys.add(`inline:${groupName ?? ""}:${policy.name}`);
    }
  }
  return keys.size;
}
