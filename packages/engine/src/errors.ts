/**
 * Error taxonomy for an audit run.
 *
 * CollectionError and InvalidSnapshotError abort the run. DetectorError is
 * caught by the engine and turned into a degraded-coverage marker.
 */

import type { FindingCategory } from "./schemas.js";

/**
 * Base class for engine errors
 */
export class IamWardenError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly metadata: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }

  toString(): string {
    return `${this.name}(${this.code}): ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      metadata: this.metadata,
    };
  }
}

/**
 * The provider could not be read: bad credentials, unreachable API,
 * exhausted throttling retries or a malformed response.
 */
export class CollectionError extends IamWardenError {
  constructor(
    public readonly reason: string,
    options: { provider?: string; cause?: unknown } = {},
  ) {
    super(reason, "COLLECTION_ERROR", { provider: options.provider });
    if (options.cause !== undefined) this.cause = options.cause;
  }
}

/**
 * The collector produced data that violates the snapshot invariants.
 */
export class InvalidSnapshotError extends IamWardenError {
  constructor(public readonly problems: readonly string[]) {
    super(
      `Invalid snapshot: ${problems.join("; ")}`,
      "INVALID_SNAPSHOT",
      { problems },
    );
  }
}

/**
 * A single detector failed to evaluate.
 */
export class DetectorError extends IamWardenError {
  constructor(
    public readonly detector: string,
    public readonly category: FindingCategory,
    message: string,
    cause?: unknown,
  ) {
    super(message, "DETECTOR_ERROR", { detector, category });
    if (cause !== undefined) this.cause = cause;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
