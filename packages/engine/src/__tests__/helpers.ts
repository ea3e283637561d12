import type { FindingOf, Severity } from "../schemas.js";
import type { GroupInput, UserInput } from "../snapshot/input.js";
import { createSnapshot } from "../snapshot/snapshot.js";
import type { Snapshot } from "../snapshot/types.js";

export const NOW = new Date("2026-03-01T00:00:00.000Z");

export function daysAgo(days: number): Date {
  return new Date(NOW.getTime() - days * 86_400_000);
}

export const ADMIN_DOCUMENT = {
  Version: "2012-10-17",
  Statement: [{ Effect: "Allow", Action: "*", Resource: "*" }],
};

export const READ_ONLY_DOCUMENT = {
  Version: "2012-10-17",
  Statement: { Effect: "Allow", Action: ["s3:GetObject", "s3:ListBucket"], Resource: "*" },
};

/** A user that trips no detector unless overridden. */
export function makeUser(name: string, overrides: Partial<UserInput> = {}): UserInput {
  return { name, createdAt: daysAgo(365), mfaEnabled: true, ...overrides };
}

export function makeSnapshot(users: UserInput[], groups: GroupInput[] = []): Snapshot {
  return createSnapshot({ provider: "test", account: "111122223333", evaluatedAt: NOW, users, groups });
}

export function managed(name: string, document?: unknown) {
  return { name, arn: `arn:aws:iam::aws:policy/${name}`, document };
}

export function makeFinding(
  severity: Severity,
  subject: string,
  activeKeyCount = 1,
): FindingOf<"MFA_DISABLED"> {
  return {
    category: "MFA_DISABLED",
    severity,
    subject: { kind: "user", id: subject },
    title: "MFA not enabled",
    description: `User '${subject}' has no MFA device.`,
    recommendation: "Enable MFA.",
    evidence: { activeKeyCount },
  };
}
