/**
 * Structured JSONL tracer for observability.
 *
 * Writes fire-and-forget JSON Lines to the configured log directory
 * (default: ~/.support-relay/logs/YYYY-MM-DD.jsonl).
 *
 * Disabled by default — enable with OBSERVABILITY_ENABLED=1 in .env.
 * Cleans up log files older than the retention period on first write.
 */

import { appendFile, mkdir, readdir, stat, unlink } from "fs/promises";
import { join } from "path";
import { getObservabilityConfig, type ObservabilityConfig } from "../../config/observability.ts";

// Read on first use: relay.ts loads .env after the imports have run.
let config: ObservabilityConfig | null = null;

function settings(): ObservabilityConfig {
  if (!config) config = getObservabilityConfig();
  return config;
}

let initialized: Promise<void> | null = null;

function init(): Promise<void> {
  if (!initialized) {
    initialized = mkdir(settings().logDir, { recursive: true }).then(() => {
      cleanup().catch((err) => {
        console.error("[tracer] cleanup failed:", err);
      });
    });
  }
  return initialized;
}

async function cleanup(): Promise<void> {
  const { logDir, retentionDays } = settings();
  const cutoff = Date.now() - retentionDays * 86400_000;
  const files = await readdir(logDir);
  for (const f of files) {
    if (!f.endsWith(".jsonl")) continue;
    const fp = join(logDir, f);
    const s = await stat(fp);
    if (s.mtimeMs < cutoff) await unlink(fp);
  }
}

function getLogPath(): string {
  const d = new Date().toISOString().slice(0, 10); // YYYY-MM-DD
  return join(settings().logDir, `${d}.jsonl`);
}

/**
 * Append a structured trace event to today's JSONL log file.
 * Never blocks the caller; write errors go to stderr.
 * No-op when OBSERVABILITY_ENABLED is not set.
 */
export function trace(event: Record<string, unknown>): void {
  if (!settings().enabled) return;
  const line = JSON.stringify({ ts: new Date().toISOString(), ...event }) + "\n";
  init()
    .then(() => appendFile(getLogPath(), line))
    .catch((err) => {
      console.error("[tracer] write failed:", err);
    });
}
