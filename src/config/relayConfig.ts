/**
 * Relay configuration.
 *
 * All runtime code reads settings from the RelayConfig built here instead of
 * touching process.env directly. The routing mode is derived from which of
 * OWNER_ID / SUPPORT_CHAT_ID is set; exactly one must be.
 */

import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { getRelayDir } from "../../config/observability.ts";

const PROJECT_ROOT = dirname(dirname(dirname(fileURLToPath(import.meta.url))));

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type RelayMode =
  | { kind: "owner"; ownerId: number }
  | { kind: "forum"; supportChatId: number };

export interface RelayConfig {
  botToken: string;
  mode: RelayMode;
  dbPath: string;
  /** Hours of inactivity before a forum topic is closed. 0 disables archiving. */
  archiveAfterHours: number;
  replyContextLimit: number;
  telegramTimeoutMs: number;
  queueIdleTimeoutMs: number;
  supabase: { url: string; anonKey: string } | null;
}

/**
 * Load KEY=VALUE pairs from the project's .env into process.env.
 * Existing variables win, so launchd/pm2 environments are never overridden.
 */
export function loadEnv(envPath: string = join(PROJECT_ROOT, ".env")): void {
  let envFile: string;
  try {
    envFile = readFileSync(envPath, "utf-8");
  } catch {
    // .env is optional
    return;
  }
  for (const line of envFile.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const [key, ...valueParts] = trimmed.split("=");
    if (key && valueParts.length > 0) {
      const value = valueParts.join("=").trim();
      if (!process.env[key.trim()]) {
        process.env[key.trim()] = value;
      }
    }
  }
}

function parseChatId(name: string, raw: string): number {
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be a numeric chat id, got "${raw}"`);
  }
  return Number(raw);
}

function parsePositive(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive number, got "${raw}"`);
  }
  return value;
}

function parseNonNegative(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative number, got "${raw}"`);
  }
  return value;
}

/**
 * Resolve the routing mode. Both-set and neither-set are startup errors;
 * there is no precedence between the two modes.
 */
export function resolveMode(env: NodeJS.ProcessEnv): RelayMode {
  const ownerRaw = (env.OWNER_ID || "").trim();
  const supportRaw = (env.SUPPORT_CHAT_ID || "").trim();

  if (ownerRaw && supportRaw) {
    throw new ConfigError("OWNER_ID and SUPPORT_CHAT_ID are mutually exclusive — set only one");
  }
  if (!ownerRaw && !supportRaw) {
    throw new ConfigError(
      "Set OWNER_ID (owner-DM mode) or SUPPORT_CHAT_ID (forum mode). Use /id in the target chat to find its id."
    );
  }

  if (supportRaw) {
    const supportChatId = parseChatId("SUPPORT_CHAT_ID", supportRaw);
    if (supportChatId >= 0) {
      throw new ConfigError(`SUPPORT_CHAT_ID must be a supergroup id (negative), got ${supportChatId}`);
    }
    return { kind: "forum", supportChatId };
  }

  const ownerId = parseChatId("OWNER_ID", ownerRaw);
  if (ownerId <= 0) {
    throw new ConfigError(`OWNER_ID must be a user id (positive), got ${ownerId}`);
  }
  return { kind: "owner", ownerId };
}

/** The chat relayed copies land in; reply contexts are only valid within it. */
export function replyScopeOf(mode: RelayMode): string {
  return mode.kind === "owner" ? `owner:${mode.ownerId}` : `forum:${mode.supportChatId}`;
}

export function loadRelayConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const botToken = (env.TELEGRAM_BOT_TOKEN || "").trim();
  if (!botToken) {
    throw new ConfigError("TELEGRAM_BOT_TOKEN is not set. Put it in your environment or a .env file.");
  }

  const relayDir = getRelayDir(env);
  const supabaseUrl = env.SUPABASE_URL || "";
  const supabaseKey = env.SUPABASE_ANON_KEY || "";

  return {
    botToken,
    mode: resolveMode(env),
    dbPath: (env.DB_PATH || "").trim() || join(relayDir, "relay.db"),
    archiveAfterHours: parseNonNegative("ARCHIVE_AFTER_HOURS", env.ARCHIVE_AFTER_HOURS, 72),
    replyContextLimit: parseNonNegative("REPLY_CONTEXT_LIMIT", env.REPLY_CONTEXT_LIMIT, 10_000),
    telegramTimeoutMs: parsePositive("TELEGRAM_TIMEOUT_MS", env.TELEGRAM_TIMEOUT_MS, 15_000),
    queueIdleTimeoutMs: parseNonNegative("QUEUE_IDLE_TIMEOUT_MS", env.QUEUE_IDLE_TIMEOUT_MS, 60 * 60 * 1000),
    supabase: supabaseUrl && supabaseKey ? { url: supabaseUrl, anonKey: supabaseKey } : null,
  };
}
