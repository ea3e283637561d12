// ---------------------------------------------------------------------------
// @iam-warden/engine
//
// IAM risk-assessment engine. Shared by the CLI and any embedding service.
// ---------------------------------------------------------------------------

// Schemas
export {
  AuditReportSchema,
  DetectorWarningSchema,
  FindingCategorySchema,
  FindingSchema,
  SecurityScoreSchema,
  SeveritySchema,
  SeveritySummarySchema,
  SEVERITY_ORDER,
  SEVERITY_RANK,
  type AttachmentPath,
  type AuditReport,
  type DetectorWarning,
  type Finding,
  type FindingCategory,
  type FindingOf,
  type SecurityScoreOutput,
  type Severity,
  type SeveritySummary,
  type Subject,
} from "./schemas.js";

// Snapshot model
export * from "./snapshot/index.js";

// Detectors
export * from "./detectors/index.js";

// Rules
export { createDetectors, getAllRules } from "./rules/registry.js";
export { RULE_CATALOG, type RuleInfo } from "./rules/catalog.js";

// Aggregation and scoring
export { aggregate, canonicalJson, dedupeFindings, findingKey, sortFindings } from "./aggregator.js";
export {
  computeScore,
  summarize,
  SEVERITY_DEDUCTIONS,
  type Grade,
  type SecurityScore,
} from "./scoring.js";

// Engine
export { AuditEngine } from "./engine.js";

// Collectors
export type { SnapshotCollector } from "./collectors/types.js";
export {
  FileSnapshotCollector,
  type FileSnapshotCollectorOptions,
} from "./collectors/file.js";
export {
  AwsIamCollector,
  accountFromArn,
  createAwsIamGateway,
  type AccessKeyPage,
  type AwsIamCollectorOptions,
  type IamGateway,
} from "./collectors/aws.js";

// Formatters
export { renderJson, type Renderer } from "./formatters/json.js";
export { generateMarkdownReport, type ReportOptions } from "./formatters/markdown-report.js";

// Config
export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  didYouMean,
  filterByConfig,
  loadConfig,
  resolveConfig,
  type AuditConfig,
} from "./config.js";

// Errors
export {
  CollectionError,
  DetectorError,
  IamWardenError,
  InvalidSnapshotError,
  errorMessage,
} from "./errors.js";

// Logger
export { logger, type LogLevel } from "./logger.js";
