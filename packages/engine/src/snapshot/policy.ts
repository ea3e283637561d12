/**
 * IAM policy document parsing and the few statement semantics detectors use.
 *
 * Raw documents come either as objects (snapshot files) or as the URL-encoded
 * JSON strings the AWS API returns.
 */

import { z } from "zod";
import { errorMessage } from "../errors.js";
import type { PolicyStatement } from "./types.js";

const StringOrList = z.union([z.string(), z.array(z.string())]);

const RawStatementSchema = z
  .object({
    Sid: z.string().optional(),
    Effect: z.enum(["Allow", "Deny"]),
    Action: StringOrList.optional(),
    NotAction: StringOrList.optional(),
    Resource: StringOrList.optional(),
    NotResource: StringOrList.optional(),
    Condition: z.record(z.unknown()).optional(),
  })
  .passthrough();

const RawPolicyDocumentSchema = z
  .object({
    Version: z.string().optional(),
    Statement: z.union([RawStatementSchema, z.array(RawStatementSchema)]),
  })
  .passthrough();

type RawStatement = z.infer<typeof RawStatementSchema>;

export type PolicyParseResult =
  | { ok: true; statements: PolicyStatement[] }
  | { ok: false; error: string };

function toList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function normalizeStatement(raw: RawStatement): PolicyStatement {
  return {
    sid: raw.Sid,
    effect: raw.Effect,
    actions: toList(raw.Action),
    notActions: toList(raw.NotAction),
    resources: toList(raw.Resource),
    notResources: toList(raw.NotResource),
    conditions: raw.Condition,
  };
}

/**
 * Decode a policy document string. AWS returns documents URL-encoded
 * (RFC 3986); plain JSON is accepted as well.
 */
export function decodePolicyDocument(text: string): unknown {
  const trimmed = text.trim();
  const json = trimmed.startsWith("{") ? trimmed : decodeURIComponent(trimmed);
  return JSON.parse(json);
}

/**
 * Normalize a raw policy document into statements.
 */
export function parsePolicyDocument(raw: unknown): PolicyParseResult {
  let value = raw;
  if (typeof raw === "string") {
    try {
      value = decodePolicyDocument(raw);
    } catch (err) {
      return { ok: false, error: `not valid JSON (${errorMessage(err)})` };
    }
  }

  const result = RawPolicyDocumentSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return { ok: false, error: `${where}${issue?.message ?? "invalid policy document"}` };
  }

  const statements = Array.isArray(result.data.Statement)
    ? result.data.Statement
    : [result.data.Statement];

  return { ok: true, statements: statements.map(normalizeStatement) };
}

/**
 * True when the statement allows one of `adminActions` (compared
 * case-insensitively, as IAM does) on every resource.
 *
 * Conditions are not evaluated and Deny statements elsewhere do not cancel
 * the grant.
 */
export function grantsFullAccess(
  statement: PolicyStatement,
  adminActions: readonly string[],
): boolean {
  if (statement.effect !== "Allow") return false;
  if (statement.notActions.length > 0) return false;
  if (!statement.resources.includes("*")) return false;

  const wanted = new Set(adminActions.map((a) => a.toLowerCase()));
  return statement.actions.some((a) => wanted.has(a.toLowerCase()));
}
