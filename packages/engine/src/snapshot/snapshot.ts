/**
 * Snapshot construction and invariants.
 *
 * `createSnapshot()` is the only way collectors hand data to the engine. It
 * validates the input shape, parses policy documents, enforces referential
 * closure (every group a user names exists) and freezes the result.
 */

import type { z } from "zod";
import { InvalidSnapshotError } from "../errors.js";
import {
  SnapshotInputSchema,
  type PolicyInputSchema,
  type SnapshotInput,
} from "./input.js";
import { parsePolicyDocument } from "./policy.js";
import type {
  AccessKey,
  Group,
  IamUser,
  PolicyDocument,
  PolicyKind,
  ResourceCounts,
  Snapshot,
} from "./types.js";

type ParsedPolicy = z.output<typeof PolicyInputSchema>;

export interface CreateSnapshotOptions {
  /** Clock used when the input carries no `evaluatedAt`. */
  now?: () => Date;
}

const DAY_MS = 86_400_000;

/**
 * Whole days between `from` and `at`. Timestamps in the future count as 0.
 */
export function ageInDays(from: Date, at: Date): number {
  return Math.max(0, Math.floor((at.getTime() - from.getTime()) / DAY_MS));
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}

function toPolicies(
  inputs: readonly ParsedPolicy[],
  kind: PolicyKind,
  owner: string,
  problems: string[],
): PolicyDocument[] {
  const seen = new Set<string>();
  const policies: PolicyDocument[] = [];

  for (const input of inputs) {
    const key = input.arn ?? input.name;
    if (seen.has(key)) {
      if (kind === "inline") problems.push(`${owner}: duplicate inline policy '${input.name}'`);
      continue;
    }
    seen.add(key);

    let statements: PolicyDocument["statements"] = [];
    if (input.document !== undefined) {
      const parsed = parsePolicyDocument(input.document);
      if (parsed.ok) {
        statements = Object.freeze(parsed.statements.map((s) => Object.freeze(s)));
      } else {
        problems.push(`${owner}: policy '${input.name}' is malformed: ${parsed.error}`);
      }
    }

    policies.push(
      Object.freeze({ name: input.name, kind, arn: input.arn, statements }),
    );
  }

  return policies;
}

/**
 * Build an immutable snapshot from collector input.
 *
 * @throws InvalidSnapshotError listing every problem found
 */
export function createSnapshot(
  input: SnapshotInput,
  options: CreateSnapshotOptions = {},
): Snapshot {
  const parsed = SnapshotInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidSnapshotError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      ),
    );
  }

  const data = parsed.data;
  const problems: string[] = [];

  const groupInputs = new Map<string, (typeof data.groups)[number]>();
  for (const g of data.groups) {
    if (groupInputs.has(g.name)) {
      problems.push(`duplicate group '${g.name}'`);
      continue;
    }
    groupInputs.set(g.name, g);
  }

  const members = new Map<string, string[]>();
  const users = new Map<string, IamUser>();

  for (const u of data.users) {
    if (users.has(u.name)) {
      problems.push(`duplicate user '${u.name}'`);
      continue;
    }

    const groups = unique(u.groups);
    for (const groupName of groups) {
      if (!groupInputs.has(groupName)) {
        problems.push(`user '${u.name}' references unknown group '${groupName}'`);
        continue;
      }
      const list = members.get(groupName) ?? [];
      list.push(u.name);
      members.set(groupName, list);
    }

    const accessKeys: AccessKey[] = u.accessKeys.map((k) =>
      Object.freeze({
        id: k.id,
        createdAt: k.createdAt,
        status: k.status,
        lastUsedAt: k.lastUsedAt,
      }),
    );

    const owner = `user '${u.name}'`;
    users.set(
      u.name,
      Object.freeze({
        name: u.name,
        id: u.id,
        arn: u.arn,
        createdAt: u.createdAt,
        attachedPolicies: Object.freeze(toPolicies(u.attachedPolicies, "managed", owner, problems)),
        inlinePolicies: Object.freeze(toPolicies(u.inlinePolicies, "inline", owner, problems)),
        groups: Object.freeze(groups),
        mfaEnabled: u.mfaEnabled,
        accessKeys: Object.freeze(accessKeys),
        tags: Object.freeze({ ...u.tags }),
      }),
    );
  }

  const groups = new Map<string, Group>();
  for (const [name, g] of groupInputs) {
    const owner = `group '${name}'`;
    groups.set(
      name,
      Object.freeze({
        name,
        id: g.id,
        arn: g.arn,
        attachedPolicies: Object.freeze(toPolicies(g.attachedPolicies, "managed", owner, problems)),
        inlinePolicies: Object.freeze(toPolicies(g.inlinePolicies, "inline", owner, problems)),
        members: Object.freeze((members.get(name) ?? []).sort()),
      }),
    );
  }

  if (problems.length > 0) {
    throw new InvalidSnapshotError(problems);
  }

  const now = options.now ?? (() => new Date());

  return Object.freeze({
    provider: data.provider,
    account: data.account,
    evaluatedAt: data.evaluatedAt ?? now(),
    users: Object.freeze(users),
    groups: Object.freeze(groups),
  });
}

/**
 * Re-check referential closure on a snapshot built elsewhere.
 *
 * @throws InvalidSnapshotError
 */
export function assertReferentialClosure(snapshot: Snapshot): void {
  const problems: string[] = [];

  for (const [key, user] of snapshot.users) {
    if (key !== user.name) {
      problems.push(`user stored under '${key}' is named '${user.name}'`);
    }
    for (const groupName of user.groups) {
      if (!snapshot.groups.has(groupName)) {
        problems.push(`user '${user.name}' references unknown group '${groupName}'`);
      }
    }
  }

  for (const [key, group] of snapshot.groups) {
    if (key !== group.name) {
      problems.push(`group stored under '${key}' is named '${group.name}'`);
    }
  }

  if (problems.length > 0) {
    throw new InvalidSnapshotError(problems);
  }
}

/**
 * Resource totals for the report header. Managed policies are counted once
 * however many principals they are attached to.
 */
export function countResources(snapshot: Snapshot): ResourceCounts {
  const managed = new Set<string>();
  let inline = 0;
  let accessKeys = 0;

  const visit = (attached: readonly PolicyDocument[], inlinePolicies: readonly PolicyDocument[]) => {
    for (const p of attached) managed.add(p.arn ?? p.name);
    inline += inlinePolicies.length;
  };

  for (const user of snapshot.users.values()) {
    accessKeys += user.accessKeys.length;
    visit(user.attachedPolicies, user.inlinePolicies);
  }
  for (const group of snapshot.groups.values()) {
    visit(group.attachedPolicies, group.inlinePolicies);
  }

  return {
    users: snapshot.users.size,
    groups: snapshot.groups.size,
    accessKeys,
    policies: managed.size + inline,
  };
}
