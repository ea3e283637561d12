/**
 * Minimal structured logger for @iam-warden/engine.
 *
 * Respects IAM_WARDEN_LOG_LEVEL env var (debug | info | warn | error | silent).
 * Writes to stderr so stdout stays clean for report output.
 */

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 } as const;
export type LogLevel = keyof typeof LEVELS;

function isLevel(raw: string): raw is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, raw);
}

function parseLevel(raw: string | undefined): number {
  if (!raw) return LEVELS.info;
  const key = raw.toLowerCase();
  return isLevel(key) ? LEVELS[key] : LEVELS.info;
}

// Read per call: the CLI sets the env var after this module is loaded.
function current(): number {
  return parseLevel(process.env.IAM_WARDEN_LOG_LEVEL);
}

function write(msg: string): void {
  process.stderr.write(`[iam-warden] ${msg}\n`);
}

export const logger = {
  debug(msg: string) { if (current() <= LEVELS.debug) write(msg); },
  info(msg: string)  { if (current() <= LEVELS.info)  write(msg); },
  warn(msg: string)  { if (current() <= LEVELS.warn)  write(msg); },
  error(msg: string) { if (current() <= LEVELS.error) write(msg); },
};
