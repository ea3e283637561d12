export type {
  AccessKey,
  AccessKeyStatus,
  Group,
  IamUser,
  PolicyDocument,
  PolicyEffect,
  PolicyKind,
  PolicyStatement,
  ResourceCounts,
  Snapshot,
} from "./types.js";
export {
  SnapshotInputSchema,
  type AccessKeyInput,
  type GroupInput,
  type PolicyInput,
  type SnapshotInput,
  type UserInput,
} from "./input.js";
export {
  createSnapshot,
  assertReferentialClosure,
  countResources,
  ageInDays,
  type CreateSnapshotOptions,
} from "./snapshot.js";
export {
  parsePolicyDocument,
  decodePolicyDocument,
  grantsFullAccess,
  type PolicyParseResult,
} from "./policy.js";
export {
  effectivePolicies,
  countDistinctPolicies,
  type EffectivePolicy,
} from "./effective-policies.js";
