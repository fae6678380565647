/**
 * Levelled console logger with secret redaction.
 * Scoped loggers prefix every line with `[scope]`.
 */

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;
export type Level = keyof typeof LEVELS;

let currentLevel: Level = "info";

/** Patterns that should be redacted from log output. */
const redactPatterns: RegExp[] = [];

export function isLevel(value: string): value is Level {
  return Object.hasOwn(LEVELS, value);
}

export function setLogLevel(level: Level) {
  currentLevel = level;
}

export function addRedactPattern(pattern: RegExp) {
  redactPatterns.push(pattern);
}

/** Register a literal secret for redaction. Short values are ignored. */
export function redactSecret(secret: string) {
  if (secret.length <= 4) return;
  addRedactPattern(new RegExp(secret.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"), "g"));
}

export function redact(msg: string): string {
  let out = msg;
  for (const p of redactPatterns) {
    out = out.replace(p, "***REDACTED***");
  }
  return out;
}

function emit(level: Level, scope: string | null, args: unknown[]) {
  if (LEVELS[level] < LEVELS[currentLevel]) return;
  const parts = args.map((a) => {
    if (typeof a === "string") return redact(a);
    if (a instanceof Error) return redact(a.stack ?? a.message);
    return a;
  });
  const tag = scope ? ` [${scope}]` : "";
  const prefix = `[${new Date().toISOString()}] [${level.toUpperCase()}]${tag}`;

  switch (level) {
    case "error":
      console.error(prefix, ...parts);
      break;
    case "warn":
      console.warn(prefix, ...parts);
      break;
    default:
      console.log(prefix, ...parts);
  }
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

function makeLogger(scope: string | null): Logger {
  return {
    debug: (...args) => emit("debug", scope, args),
    info: (...args) => emit("info", scope, args),
    warn: (...args) => emit("warn", scope, args),
    error: (...args) => emit("error", scope, args),
  };
}

export const log: Logger & { scope: (name: string) => Logger } = {
  ...makeLogger(null),
  scope: (name: string) => makeLogger(name),
};
