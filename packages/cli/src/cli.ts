#!/usr/bin/env node

import { errorMessage } from "@iam-warden/engine";
import { parseArgs } from "./args.js";
import { runAudit } from "./commands/audit.js";
import { runRules } from "./commands/rules.js";

const VERSION = "0.1.0";

function printHelp(): void {
  process.stdout.write(`
\x1b[36miam-warden\x1b[0m — IAM risk assessment
\x1b[2mv${VERSION}\x1b[0m

\x1b[1mUSAGE\x1b[0m
  iam-warden audit                  Audit the account behind the default AWS credentials
  iam-warden audit --snapshot <f>   Audit a JSON or YAML snapshot file
  iam-warden rules                  List all rules with CIS controls
  iam-warden version                Print version

\x1b[1mAUDIT OPTIONS\x1b[0m
  --provider <name>            Snapshot source: aws, file (default: aws)
  --snapshot <file>            Snapshot document; implies --provider file
  --profile <name>             AWS shared-credentials profile
  --region <region>            AWS region used for signing (default: us-east-1)
  --config <file>              Config file (default: ./.iam-warden.yml)
  --format <fmt>               Output: table, json, markdown (default: table)
  --output <file>              Write report to file
  --fail-on <severity>         Exit 1 if findings >= severity (critical, high, medium, low)
  --timeout <seconds>          Abort the audit after this long (default: 300)
  --stale-key-days <n>         Access key age threshold (overrides config)
  --max-policies <n>           Effective policy count threshold (overrides config)

\x1b[1mRULES OPTIONS\x1b[0m
  --category <list>            Comma-separated categories to show

\x1b[1mEXAMPLES\x1b[0m
  iam-warden audit --profile security-audit              Audit using a named profile
  iam-warden audit --snapshot export.yml --format json   JSON report from a snapshot
  iam-warden audit --format markdown --output report.md  Markdown report to file
  iam-warden audit --fail-on high                        CI gate on high+ findings

\x1b[1mGLOBAL OPTIONS\x1b[0m
  --verbose                    Set log level to debug
  --quiet                      Suppress info/warn output

\x1b[1mENVIRONMENT\x1b[0m
  IAM_WARDEN_LOG_LEVEL              Log level: debug, info, warn, error, silent
  AWS_PROFILE, AWS_REGION, ...      Standard AWS SDK credential settings

\x1b[1mEXIT CODES\x1b[0m
  0  audit completed
  1  usage error, or findings at or above --fail-on
  2  audit failed (credentials, API errors, invalid snapshot, timeout)

`);
}

async function main(): Promise<number> {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.length === 0 || rawArgs.includes("--help") || rawArgs.includes("-h")) {
    printHelp();
    return 0;
  }

  if (rawArgs.includes("--version") || rawArgs.includes("-v")) {
    process.stdout.write(`iam-warden v${VERSION}\n`);
    return 0;
  }

  const { command, args } = parseArgs(rawArgs);

  switch (command) {
    case "version":
      process.stdout.write(`iam-warden v${VERSION}\n`);
      return 0;

    case "rules":
      runRules(args["category"]);
      return 0;

    case "audit":
      return runAudit({
        provider: args["provider"] ?? "aws",
        snapshot: args["snapshot"],
        profile: args["profile"],
        region: args["region"],
        config: args["config"],
        format: args["format"] ?? "table",
        output: args["output"],
        failOn: args["fail-on"],
        timeout: args["timeout"],
        staleKeyDays: args["stale-key-days"],
        maxPolicies: args["max-policies"],
      });

    default:
      process.stderr.write(`Unknown command: ${command}\n`);
      printHelp();
      return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`[iam-warden] Fatal: ${errorMessage(err)}\n`);
    process.exit(2);
  },
);
