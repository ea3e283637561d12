import type { Snapshot } from "../snapshot/types.js";

/**
 * Source of IAM state. The engine sees nothing provider-specific beyond this.
 */
export interface SnapshotCollector {
  /** Provider identifier recorded on the report (e.g. "aws", "file"). */
  readonly provider: string;
  /**
   * @throws CollectionError when the data cannot be obtained
   * @throws InvalidSnapshotError when the data obtained is inconsistent
   */
  collect(): Promise<Snapshot>;
}
