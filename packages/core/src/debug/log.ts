/**
 * packages/core/src/debug/log.ts: Dev-mode warnings and opt-in audit records.
 *
 * Warnings go to `console.warn` unless NODE_ENV is "production"; each distinct
 * key is reported once per process. Audit records are NDJSON lines written to
 * stderr, only when explicitly enabled:
 *
 *   SKETCHPAD_AUDIT=1
 *
 * Diagnostics never throw into drawing code.
 */

export type LogSink = Readonly<{
  warn: (message: string) => void;
  audit: (line: string) => void;
}>;

type AuditFields = Readonly<Record<string, unknown>>;

function readEnv(name: "NODE_ENV" | "SKETCHPAD_AUDIT"): string | undefined {
  if (typeof process === "undefined") return undefined;
  return process.env[name];
}

function envFlag(name: "SKETCHPAD_AUDIT"): boolean {
  const raw = readEnv(name);
  if (raw === undefined) return false;
  const value = raw.trim().toLowerCase();
  return value === "1" || value === "true" || value === "yes" || value === "on";
}

const DEV_MODE = (readEnv("NODE_ENV") ?? "development") !== "production";

const defaultSink: LogSink = Object.freeze({
  warn: (message: string) => {
    console.warn(message);
  },
  audit: (line: string) => {
    if (typeof process !== "undefined" && typeof process.stderr?.write === "function") {
      process.stderr.write(`${line}\n`);
      return;
    }
    console.error(line);
  },
});

let sink: LogSink = defaultSink;
let auditEnabled = envFlag("SKETCHPAD_AUDIT");
const warnedKeys = new Set<string>();

/** Route diagnostics elsewhere (tests, host integrations). `null` restores the console sink. */
export function setLogSink(next: LogSink | null): void {
  sink = next ?? defaultSink;
  warnedKeys.clear();
}

/** Override the SKETCHPAD_AUDIT switch at runtime. */
export function setAuditEnabled(enabled: boolean): void {
  auditEnabled = enabled;
}

export function isAuditEnabled(): boolean {
  return auditEnabled;
}

/** Report a recoverable misuse once per `key`. No-op in production. */
export function warnDev(key: string, detail: string): void {
  if (!DEV_MODE) return;
  if (warnedKeys.has(key)) return;
  warnedKeys.add(key);
  try {
    sink.warn(`[sketchpad] ${detail}`);
  } catch {
    // Never break drawing due to diagnostics.
  }
}

export function emitAudit(scope: string, stage: string, fields: AuditFields = {}): void {
  if (!auditEnabled) return;
  try {
    const line = JSON.stringify({
      ts: new Date().toISOString(),
      scope,
      stage,
      ...fields,
    });
    sink.audit(line);
  } catch {
    // Never break drawing due to diagnostics.
  }
}
