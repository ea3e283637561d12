/**
 * Normalized, provider-neutral IAM model.
 *
 * Everything here is built once by `createSnapshot()` and frozen; detectors
 * only ever read it.
 */

export type AccessKeyStatus = "Active" | "Inactive";

export interface AccessKey {
  readonly id: string;
  readonly createdAt: Date;
  readonly status: AccessKeyStatus;
  readonly lastUsedAt?: Date;
}

export type PolicyEffect = "Allow" | "Deny";

export interface PolicyStatement {
  readonly sid?: string;
  readonly effect: PolicyEffect;
  readonly actions: readonly string[];
  readonly notActions: readonly string[];
  readonly resources: readonly string[];
  readonly notResources: readonly string[];
  /** Kept opaque; no detector interprets condition operators. */
  readonly conditions?: Readonly<Record<string, unknown>>;
}

export type PolicyKind = "managed" | "inline";

export interface PolicyDocument {
  readonly name: string;
  readonly kind: PolicyKind;
  readonly arn?: string;
  /** Empty when the collector could not read the document. */
  readonly statements: readonly PolicyStatement[];
}

export interface IamUser {
  readonly name: string;
  readonly id?: string;
  readonly arn?: string;
  readonly createdAt: Date;
  readonly attachedPolicies: readonly PolicyDocument[];
  readonly inlinePolicies: readonly PolicyDocument[];
  /** Group names, resolved against `Snapshot.groups`. */
  readonly groups: readonly string[];
  readonly mfaEnabled: boolean;
  readonly accessKeys: readonly AccessKey[];
  readonly tags: Readonly<Record<string, string>>;
}

export interface Group {
  readonly name: string;
  readonly id?: string;
  readonly arn?: string;
  readonly attachedPolicies: readonly PolicyDocument[];
  readonly inlinePolicies: readonly PolicyDocument[];
  /** Back-reference computed from user memberships, sorted. */
  readonly members: readonly string[];
}

export interface Snapshot {
  readonly provider: string;
  readonly account?: string;
  /** Reference time for every derived age. */
  readonly evaluatedAt: Date;
  readonly users: ReadonlyMap<string, IamUser>;
  readonly groups: ReadonlyMap<string, Group>;
}

export interface ResourceCounts {
  users: number;
  groups: number;
  accessKeys: number;
  policies: number;
}
