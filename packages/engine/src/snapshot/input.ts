/**
 * Collector-neutral snapshot input.
 *
 * Both collectors build this shape; snapshot files on disk are validated
 * against it directly.
 */

import { z } from "zod";

const Timestamp = z
  .union([
    z.date(),
    z.string().refine((s) => !Number.isNaN(Date.parse(s)), "invalid timestamp"),
  ])
  .transform((v) => (v instanceof Date ? v : new Date(v)));

export const PolicyInputSchema = z.object({
  name: z.string().min(1),
  arn: z.string().optional(),
  /** Raw IAM JSON (object or URL-encoded string). Absent when unreadable. */
  document: z.unknown().optional(),
});

export const AccessKeyInputSchema = z.object({
  id: z.string().min(1),
  createdAt: Timestamp,
  status: z.enum(["Active", "Inactive"]),
  lastUsedAt: Timestamp.optional(),
});

export const UserInputSchema = z.object({
  name: z.string().min(1),
  id: z.string().optional(),
  arn: z.string().optional(),
  createdAt: Timestamp,
  mfaEnabled: z.boolean().default(false),
  groups: z.array(z.string()).default([]),
  accessKeys: z.array(AccessKeyInputSchema).default([]),
  attachedPolicies: z.array(PolicyInputSchema).default([]),
  inlinePolicies: z.array(PolicyInputSchema).default([]),
  tags: z.record(z.string()).default({}),
});

export const GroupInputSchema = z.object({
  name: z.string().min(1),
  id: z.string().optional(),
  arn: z.string().optional(),
  attachedPolicies: z.array(PolicyInputSchema).default([]),
  inlinePolicies: z.array(PolicyInputSchema).default([]),
});

export const SnapshotInputSchema = z.object({
  provider: z.string().min(1),
  account: z.string().optional(),
  evaluatedAt: Timestamp.optional(),
  users: z.array(UserInputSchema).default([]),
  groups: z.array(GroupInputSchema).default([]),
});

export type PolicyInput = z.input<typeof PolicyInputSchema>;
export type AccessKeyInput = z.input<typeof AccessKeyInputSchema>;
export type UserInput = z.input<typeof UserInputSchema>;
export type GroupInput = z.input<typeof GroupInputSchema>;
export type SnapshotInput = z.input<typeof SnapshotInputSchema>;
