/**
 * Centralised observability configuration.
 *
 * Externalises the trace directory, retention period and enabled flag so
 * they can be changed via environment variables without touching source
 * files. Read by src/utils/tracer.ts.
 */

import { homedir } from "os";
import { join } from "path";

export interface ObservabilityConfig {
  /** Directory where JSONL trace files are written. */
  logDir: string;
  /** Number of days to retain trace files before cleanup. */
  retentionDays: number;
  /** Whether structured tracing is active. Enable with OBSERVABILITY_ENABLED=1. */
  enabled: boolean;
}

/**
 * Root directory for everything the relay writes to disk.
 *
 * Override via .env:
 *   RELAY_DIR — absolute path (default: ~/.support-relay)
 */
export function getRelayDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.RELAY_DIR || join(env.HOME || homedir(), ".support-relay");
}

/**
 * Returns the observability configuration resolved from environment
 * variables with defaults.
 *
 * Override defaults via .env:
 *   LOG_DIR               — JSONL log directory (default: {RELAY_DIR}/logs)
 *   LOG_RETENTION_DAYS    — days to keep log files (default: 30)
 *   OBSERVABILITY_ENABLED — "1" or "true" to enable (default: off)
 */
export function getObservabilityConfig(env: NodeJS.ProcessEnv = process.env): ObservabilityConfig {
  return {
    logDir: env.LOG_DIR || join(getRelayDir(env), "logs"),
    retentionDays: Number(env.LOG_RETENTION_DAYS) || 30,
    enabled: ["1", "true"].includes((env.OBSERVABILITY_ENABLED || "").toLowerCase()),
  };
}
