/**
 * Snapshot collector backed by a JSON or YAML document on disk.
 *
 * Used for offline audits, CI fixtures and replaying an export taken
 * elsewhere.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import yaml from "js-yaml";
import { CollectionError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { SnapshotInputSchema } from "../snapshot/input.js";
import { createSnapshot } from "../snapshot/snapshot.js";
import type { Snapshot } from "../snapshot/types.js";
import type { SnapshotCollector } from "./types.js";

export interface FileSnapshotCollectorOptions {
  /** Clock used when the document has no `evaluatedAt`. */
  now?: () => Date;
}

export class FileSnapshotCollector implements SnapshotCollector {
  readonly provider = "file";

  constructor(
    private readonly path: string,
    private readonly options: FileSnapshotCollectorOptions = {},
  ) {}

  async collect(): Promise<Snapshot> {
    let text: string;
    try {
      text = await readFile(this.path, "utf-8");
    } catch (err: unknown) {
      throw this.fail(`could not read snapshot file ${this.path}: ${errorMessage(err)}`, err);
    }

    let raw: unknown;
    try {
      raw = extname(this.path).toLowerCase() === ".json" ? JSON.parse(text) : yaml.load(text);
    } catch (err: unknown) {
      throw this.fail(`could not parse snapshot file ${this.path}: ${errorMessage(err)}`, err);
    }

    const parsed = SnapshotInputSchema.safeParse(raw);
    if (!parsed.success) {
      const problems = parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      );
      throw this.fail(`invalid snapshot file ${this.path}: ${problems.join("; ")}`, parsed.error);
    }

    logger.debug(
      `[file] Loaded ${parsed.data.users.length} users and ${parsed.data.groups.length} groups from ${this.path}`,
    );

    // Referential problems surface as InvalidSnapshotError from here.
    return createSnapshot(parsed.data, { now: this.options.now });
  }

  private fail(reason: string, cause: unknown): CollectionError {
    return new CollectionError(reason, { provider: this.provider, cause });
  }
}
