import type { AuditReport } from "../schemas.js";

export type Renderer = (report: AuditReport) => string;

/**
 * Stable JSON rendering. Field order follows the report, so two runs over
 * the same snapshot produce byte-identical output.
 */
export const renderJson: Renderer = (report) => JSON.stringify(report, null, 2);
