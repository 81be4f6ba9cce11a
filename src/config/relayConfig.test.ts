import { describe, test, expect, afterEach } from "vitest";
import { mkdtempSync, writeFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { loadRelayConfig, resolveMode, loadEnv, replyScopeOf, ConfigError } from "./relayConfig.ts";

const BASE = { TELEGRAM_BOT_TOKEN: "test-token", RELAY_DIR: "/data/relay" };

describe("resolveMode", () => {
  test("OWNER_ID alone selects owner-DM mode", () => {
    expect(resolveMode({ OWNER_ID: "12345" })).toEqual({ kind: "owner", ownerId: 12345 });
  });

  test("SUPPORT_CHAT_ID alone selects forum mode", () => {
    expect(resolveMode({ SUPPORT_CHAT_ID: "-1001234567890" })).toEqual({
      kind: "forum",
      supportChatId: -1001234567890,
    });
  });

  test("both set is a configuration error", () => {
    expect(() => resolveMode({ OWNER_ID: "1", SUPPORT_CHAT_ID: "-100" })).toThrow(ConfigError);
  });

  test("neither set is a configuration error", () => {
    expect(() => resolveMode({})).toThrow(ConfigError);
  });

  test("whitespace-only values count as unset", () => {
    expect(resolveMode({ OWNER_ID: " 7 ", SUPPORT_CHAT_ID: "  " })).toEqual({ kind: "owner", ownerId: 7 });
  });

  test("positive SUPPORT_CHAT_ID is rejected", () => {
    expect(() => resolveMode({ SUPPORT_CHAT_ID: "100" })).toThrow("negative");
  });

  test("group id as OWNER_ID is rejected", () => {
    expect(() => resolveMode({ OWNER_ID: "-100555" })).toThrow("OWNER_ID must be a user id (positive), got -100555");
    expect(() => resolveMode({ OWNER_ID: "0" })).toThrow(ConfigError);
  });

  test("non-numeric OWNER_ID is rejected", () => {
    expect(() => resolveMode({ OWNER_ID: "alice" })).toThrow('OWNER_ID must be a numeric chat id, got "alice"');
  });
});

describe("replyScopeOf", () => {
  test("names the chat of each mode", () => {
    expect(replyScopeOf({ kind: "owner", ownerId: 555 })).toBe("owner:555");
    expect(replyScopeOf({ kind: "forum", supportChatId: -1001 })).toBe("forum:-1001");
  });
});

describe("loadRelayConfig", () => {
  test("applies defaults", () => {
    const config = loadRelayConfig({ ...BASE, OWNER_ID: "42" });
    expect(config).toEqual({
      botToken: "test-token",
      mode: { kind: "owner", ownerId: 42 },
      dbPath: "/data/relay/relay.db",
      archiveAfterHours: 72,
      replyContextLimit: 10_000,
      telegramTimeoutMs: 15_000,
      queueIdleTimeoutMs: 3_600_000,
      supabase: null,
    });
  });

  test("reads overrides", () => {
    const config = loadRelayConfig({
      ...BASE,
      SUPPORT_CHAT_ID: "-1009",
      DB_PATH: "/srv/mappings.db",
      ARCHIVE_AFTER_HOURS: "0",
      REPLY_CONTEXT_LIMIT: "500",
      SUPABASE_URL: "http://localhost:54321",
      SUPABASE_ANON_KEY: "test-key",
    });
    expect(config.dbPath).toBe("/srv/mappings.db");
    expect(config.archiveAfterHours).toBe(0);
    expect(config.replyContextLimit).toBe(500);
    expect(config.supabase).toEqual({ url: "http://localhost:54321", anonKey: "test-key" });
  });

  test("missing token is a configuration error", () => {
    expect(() => loadRelayConfig({ OWNER_ID: "1" })).toThrow(ConfigError);
  });

  test("zero topic creation timeout is rejected", () => {
    expect(() => loadRelayConfig({ ...BASE, SUPPORT_CHAT_ID: "-1009", TELEGRAM_TIMEOUT_MS: "0" })).toThrow(
      'TELEGRAM_TIMEOUT_MS must be a positive number, got "0"'
    );
  });

  test("negative numeric setting is rejected", () => {
    expect(() => loadRelayConfig({ ...BASE, OWNER_ID: "1", ARCHIVE_AFTER_HOURS: "-3" })).toThrow(
      'ARCHIVE_AFTER_HOURS must be a non-negative number, got "-3"'
    );
  });
});

describe("loadEnv", () => {
  let dir: string;
  const keys = ["RELAY_TEST_A", "RELAY_TEST_B", "RELAY_TEST_C"];

  afterEach(() => {
    for (const k of keys) delete process.env[k];
    rmSync(dir, { recursive: true, force: true });
  });

  test("sets unset variables and keeps existing ones", () => {
    dir = mkdtempSync(join(tmpdir(), "relay-env-"));
    const envPath = join(dir, ".env");
    writeFileSync(envPath, "# comment\nRELAY_TEST_A=one\nRELAY_TEST_B=x=y\nRELAY_TEST_C=file\n");
    process.env.RELAY_TEST_C = "shell";

    loadEnv(envPath);

    expect(process.env.RELAY_TEST_A).toBe("one");
    expect(process.env.RELAY_TEST_B).toBe("x=y");
    expect(process.env.RELAY_TEST_C).toBe("shell");
  });

  test("missing file is ignored", () => {
    dir = mkdtempSync(join(tmpdir(), "relay-env-"));
    expect(() => loadEnv(join(dir, "absent.env"))).not.toThrow();
  });
});
