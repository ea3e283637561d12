import { z } from "zod";

export const SeveritySchema = z.enum(["LOW", "MEDIUM", "HIGH", "CRITICAL"]);

export type Severity = z.infer<typeof SeveritySchema>;

/** Higher rank is more severe. */
export const SEVERITY_RANK: Record<Severity, number> = {
  LOW: 0,
  MEDIUM: 1,
  HIGH: 2,
  CRITICAL: 3,
};

/** Most severe first, the order reports are printed in. */
export const SEVERITY_ORDER: readonly Severity[] = ["CRITICAL", "HIGH", "MEDIUM", "LOW"];

export const FindingCategorySchema = z.enum([
  "MFA_DISABLED",
  "STALE_ACCESS_KEY",
  "PRIVILEGE_ESCALATION",
  "EXCESSIVE_PRIVILEGE",
  "ADMIN_POLICY_ATTACHED",
]);

export type FindingCategory = z.infer<typeof FindingCategorySchema>;

export const SubjectSchema = z.object({
  kind: z.literal("user"),
  id: z.string(),
});

export type Subject = z.infer<typeof SubjectSchema>;

export const AttachmentPathSchema = z.enum(["direct", "via group"]);

export type AttachmentPath = z.infer<typeof AttachmentPathSchema>;

const PolicyGrantEvidenceSchema = z.object({
  policyName: z.string(),
  attachmentPath: AttachmentPathSchema,
  groupName: z.string().optional(),
});

const findingFields = {
  severity: SeveritySchema,
  subject: SubjectSchema,
  title: z.string(),
  description: z.string(),
  recommendation: z.string(),
};

export const FindingSchema = z.discriminatedUnion("category", [
  z.object({
    category: z.literal("MFA_DISABLED"),
    ...findingFields,
    evidence: z.object({ activeKeyCount: z.number().int().nonnegative() }),
  }),
  z.object({
    category: z.literal("STALE_ACCESS_KEY"),
    ...findingFields,
    evidence: z.object({
      keyId: z.string(),
      ageDays: z.number().int().nonnegative(),
    }),
  }),
  z.object({
    category: z.literal("PRIVILEGE_ESCALATION"),
    ...findingFields,
    evidence: PolicyGrantEvidenceSchema,
  }),
  z.object({
    category: z.literal("EXCESSIVE_PRIVILEGE"),
    ...findingFields,
    evidence: z.object({ policyCount: z.number().int().nonnegative() }),
  }),
  z.object({
    category: z.literal("ADMIN_POLICY_ATTACHED"),
    ...findingFields,
    evidence: PolicyGrantEvidenceSchema,
  }),
]);

export type Finding = z.infer<typeof FindingSchema>;

export type FindingOf<C extends FindingCategory> = Extract<Finding, { category: C }>;

export const SeveritySummarySchema = z.object({
  total: z.number().int().nonnegative(),
  CRITICAL: z.number().int().nonnegative(),
  HIGH: z.number().int().nonnegative(),
  MEDIUM: z.number().int().nonnegative(),
  LOW: z.number().int().nonnegative(),
});

export type SeveritySummary = z.infer<typeof SeveritySummarySchema>;

export const SecurityScoreSchema = z.object({
  score: z.number().int().min(0).max(100),
  grade: z.enum(["A", "B", "C", "D", "F"]),
});

export type SecurityScoreOutput = z.infer<typeof SecurityScoreSchema>;

export const DetectorWarningSchema = z.object({
  detector: z.string(),
  category: FindingCategorySchema,
  message: z.string(),
});

export type DetectorWarning = z.infer<typeof DetectorWarningSchema>;

export const AuditReportSchema = z.object({
  evaluatedAt: z.string(),
  provider: z.string(),
  account: z.string().optional(),
  resourceCounts: z.object({
    users: z.number().int().nonnegative(),
    groups: z.number().int().nonnegative(),
    accessKeys: z.number().int().nonnegative(),
    policies: z.number().int().nonnegative(),
  }),
  findings: z.array(FindingSchema),
  summary: SeveritySummarySchema,
  score: SecurityScoreSchema,
  degraded: z.array(FindingCategorySchema),
  warnings: z.array(DetectorWarningSchema),
});

export type AuditReport = z.infer<typeof AuditReportSchema>;
