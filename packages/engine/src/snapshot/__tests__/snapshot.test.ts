import { describe, it, expect } from "vitest";
import { InvalidSnapshotError } from "../../errors.js";
import { ADMIN_DOCUMENT, NOW, daysAgo, makeUser, managed } from "../../__tests__/helpers.js";
import {
  ageInDays,
  assertReferentialClosure,
  countResources,
  createSnapshot,
} from "../snapshot.js";
import { countDistinctPolicies, effectivePolicies } from "../effective-policies.js";
import type { Snapshot } from "../types.js";

function problemsOf(fn: () => unknown): readonly string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidSnapshotError) return err.problems;
    throw err;
  }
  return [];
}

describe("createSnapshot", () => {
  it("builds users and groups keyed by name", () => {
    const snapshot = createSnapshot({
      provider: "test",
      evaluatedAt: NOW,
      users: [makeUser("alice", { groups: ["admins"] }), makeUser("bob", { groups: ["admins"] })],
      groups: [{ name: "admins" }],
    });

    expect([...snapshot.users.keys()]).toEqual(["alice", "bob"]);
    expect(snapshot.groups.get("admins")?.members).toEqual(["alice", "bob"]);
    expect(snapshot.evaluatedAt).toEqual(NOW);
  });

  it("fails when a user references a group that does not exist", () => {
    const problems = problemsOf(() =>
      createSnapshot({ provider: "test", users: [makeUser("alice", { groups: ["ghosts"] })] }),
    );
    expect(problems).toEqual(["user 'alice' references unknown group 'ghosts'"]);
  });

  it("names every dangling reference at once", () => {
    const problems = problemsOf(() =>
      createSnapshot({
        provider: "test",
        users: [
          makeUser("alice", { groups: ["a"] }),
          makeUser("bob", { groups: ["b"] }),
        ],
      }),
    );
    expect(problems).toEqual([
      "user 'alice' references unknown group 'a'",
      "user 'bob' references unknown group 'b'",
    ]);
  });

  it("rejects duplicate user and group names", () => {
    const problems = problemsOf(() =>
      createSnapshot({
        provider: "test",
        users: [makeUser("alice"), makeUser("alice")],
        groups: [{ name: "ops" }, { name: "ops" }],
      }),
    );
    expect(problems).toEqual(["duplicate group 'ops'", "duplicate user 'alice'"]);
  });

  it("reports schema problems with their path", () => {
    const problems = problemsOf(() =>
      createSnapshot({
        provider: "test",
        users: [{ name: "alice", createdAt: "not a date" }],
      }),
    );
    expect(problems).toEqual(["users.0.createdAt: invalid timestamp"]);
  });

  it("reports malformed policy documents", () => {
    const problems = problemsOf(() =>
      createSnapshot({
        provider: "test",
        users: [makeUser("alice", { inlinePolicies: [{ name: "broken", document: "%7Bnot json" }] })],
      }),
    );
    expect(problems).toHaveLength(1);
    expect(problems[0]).toMatch(/^user 'alice': policy 'broken' is malformed: not valid JSON/);
  });

  it("deduplicates group memberships and managed policies", () => {
    const snapshot = createSnapshot({
      provider: "test",
      evaluatedAt: NOW,
      users: [
        makeUser("alice", {
          groups: ["ops", "ops"],
          attachedPolicies: [managed("ReadOnlyAccess"), managed("ReadOnlyAccess")],
        }),
      ],
      groups: [{ name: "ops" }],
    });

    const alice = snapshot.users.get("alice");
    expect(alice?.groups).toEqual(["ops"]);
    expect(alice?.attachedPolicies).toHaveLength(1);
  });

  it("freezes entities", () => {
    const snapshot = createSnapshot({ provider: "test", users: [makeUser("alice")] });
    const alice = snapshot.users.get("alice");
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(alice)).toBe(true);
    expect(Object.isFrozen(alice?.accessKeys)).toBe(true);
  });

  it("uses the injected clock when the input has no evaluation time", () => {
    const snapshot = createSnapshot({ provider: "test" }, { now: () => NOW });
    expect(snapshot.evaluatedAt).toEqual(NOW);
    expect(snapshot.users.size).toBe(0);
  });
});

describe("assertReferentialClosure", () => {
  it("rejects a hand-built snapshot with a dangling group", () => {
    const alice = createSnapshot({ provider: "test", users: [makeUser("alice")] }).users.get("alice");
    if (!alice) throw new Error("fixture");

    const broken: Snapshot = {
      provider: "test",
      evaluatedAt: NOW,
      users: new Map([["alice", { ...alice, groups: ["missing"] }]]),
      groups: new Map(),
    };

    expect(() => assertReferentialClosure(broken)).toThrow(InvalidSnapshotError);
  });
});

describe("ageInDays", () => {
  it("counts whole days and never goes negative", () => {
    expect(ageInDays(daysAgo(120), NOW)).toBe(120);
    expect(ageInDays(new Date(NOW.getTime() - 1), NOW)).toBe(0);
    expect(ageInDays(new Date(NOW.getTime() + 86_400_000), NOW)).toBe(0);
  });
});

describe("effectivePolicies", () => {
  const snapshot = createSnapshot({
    provider: "test",
    evaluatedAt: NOW,
    users: [
      makeUser("alice", {
        groups: ["admins", "readers"],
        attachedPolicies: [managed("ReadOnlyAccess")],
        inlinePolicies: [{ name: "own", document: ADMIN_DOCUMENT }],
      }),
    ],
    groups: [
      { name: "admins", attachedPolicies: [managed("AdministratorAccess", ADMIN_DOCUMENT)] },
      {
        name: "readers",
        attachedPolicies: [managed("ReadOnlyAccess")],
        inlinePolicies: [{ name: "own" }],
      },
    ],
  });
  const alice = snapshot.users.get("alice");

  it("lists direct policies first, then each group's", () => {
    if (!alice) throw new Error("fixture");
    const entries = effectivePolicies(snapshot, alice).map(
      (e) => `${e.attachmentPath}:${e.groupName ?? "-"}:${e.policy.name}`,
    );
    expect(entries).toEqual([
      "direct:-:ReadOnlyAccess",
      "direct:-:own",
      "via group:admins:AdministratorAccess",
      "via group:readers:ReadOnlyAccess",
      "via group:readers:own",
    ]);
  });

  it("counts a managed policy once however it is reached", () => {
    if (!alice) throw new Error("fixture");
    // ReadOnlyAccess x2 -> 1, AdministratorAccess, inline own (direct), inline own (readers)
    expect(countDistinctPolicies(effectivePolicies(snapshot, alice))).toBe(4);
  });
});

describe("countResources", () => {
  it("counts managed policies once and every inline policy", () => {
    const snapshot = createSnapshot({
      provider: "test",
      users: [
        makeUser("alice", {
          attachedPolicies: [managed("ReadOnlyAccess")],
          inlinePolicies: [{ name: "a" }],
          accessKeys: [
            { id: "AKIAEXAMPLE1", createdAt: daysAgo(1), status: "Active" },
            { id: "AKIAEXAMPLE2", createdAt: daysAgo(1), status: "Inactive" },
          ],
        }),
      ],
      groups: [{ name: "ops", attachedPolicies: [managed("ReadOnlyAccess")], inlinePolicies: [{ name: "a" }] }],
    });

    expect(countResources(snapshot)).toEqual({ users: 1, groups: 1, accessKeys: 2, policies: 3 });
  });
});
