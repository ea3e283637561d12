import { FindingCategorySchema, getAllRules } from "@iam-warden/engine";
import { formatRulesTable } from "../formatter.js";

export function runRules(categories?: string): void {
  let rules = getAllRules();

  if (categories) {
    const filter = new Set(categories.split(",").map((s) => s.trim().toUpperCase()));
    for (const name of filter) {
      if (!FindingCategorySchema.safeParse(name).success) {
        process.stderr.write(`[iam-warden] Warning: unknown category '${name}'\n`);
      }
    }
    rules = rules.filter((r) => filter.has(r.category));
  }

  process.stdout.write(formatRulesTable(rules));
}
