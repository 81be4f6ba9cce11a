/**
 * Support Relay
 *
 * Relays private messages from users to one owner chat or to a forum group
 * with one topic per user, and routes the replies back.
 *
 * Run: npm start
 */

import { Bot, GrammyError, HttpError } from "grammy";
import { ConfigError, loadEnv, loadRelayConfig, replyScopeOf, type RelayConfig } from "./config/relayConfig.ts";
import { registerCommands } from "./commands/botCommands.ts";
import { createGrammyTransport } from "./delivery/grammyTransport.ts";
import { handleSupportMessage, handleUserMessage, type RelayDeps } from "./relay/handlers.ts";
import { messageSide, toSupportEvent, toUserEvent } from "./relay/telegramEvents.ts";
import { RoutingEngine } from "./routing/routingEngine.ts";
import { TelegramTopicProvisioner } from "./routing/topicProvisioner.ts";
import { SqliteMappingStore } from "./store/sqliteMappingStore.ts";
import { UserQueueManager } from "./queue/userQueueManager.ts";
import { TopicArchiver } from "./topics/archiver.ts";
import { createSupabaseClient } from "./utils/supabase.ts";

const QUEUE_SHUTDOWN_GRACE_MS = 10_000;

// ============================================================
// CONFIGURATION
// ============================================================

// Load .env explicitly (for launchd, pm2 and other non-interactive contexts)
loadEnv();

let config: RelayConfig;
try {
  config = loadRelayConfig();
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(`Configuration error: ${err.message}`);
    console.log("\nTo set up:");
    console.log("1. Message @BotFather on Telegram and create a bot with /newbot");
    console.log("2. Put TELEGRAM_BOT_TOKEN in .env");
    console.log("3. Set OWNER_ID (owner chat) or SUPPORT_CHAT_ID (forum group) — use /id to find them");
    process.exit(1);
  }
  throw err;
}

const { mode } = config;

// ============================================================
// SETUP
// ============================================================

const store = new SqliteMappingStore(config.dbPath, {
  replyContextLimit: config.replyContextLimit,
  replyScope: replyScopeOf(mode),
});
const queueManager = new UserQueueManager({ idleTimeout: config.queueIdleTimeoutMs });
const bot = new Bot(config.botToken);
const transport = createGrammyTransport(bot.api);

const provisioner =
  mode.kind === "forum" ? new TelegramTopicProvisioner(transport, mode.supportChatId, config.telegramTimeoutMs) : null;
const archiver =
  mode.kind === "forum"
    ? new TopicArchiver(transport, store, mode.supportChatId, { archiveAfterHours: config.archiveAfterHours })
    : null;

const relay: RelayDeps = {
  mode,
  engine: new RoutingEngine(mode, store, queueManager, provisioner),
  transport,
  archiver,
  supabase: createSupabaseClient(config),
};

registerCommands(bot, { relay, store });

// ============================================================
// MESSAGE HANDLERS
// ============================================================

bot.on("message", async (ctx) => {
  const msg = ctx.message;

  switch (messageSide(mode, msg, ctx.from)) {
    case "support":
      await handleSupportMessage(relay, toSupportEvent(msg));
      return;
    case "user":
      if (ctx.from) await handleUserMessage(relay, toUserEvent(msg, ctx.from));
      return;
    case "ignore":
      return;
  }
});

// Catch grammY-level errors (network issues, middleware failures, etc.)
bot.catch((err) => {
  const e = err.error;
  const updateId = err.ctx.update.update_id;
  if (e instanceof GrammyError) {
    console.error(`[relay] Telegram rejected a call in update ${updateId}: ${e.description}`);
  } else if (e instanceof HttpError) {
    console.error(`[relay] Could not reach Telegram in update ${updateId}:`, e);
  } else {
    console.error(`[relay] Error in update ${updateId}:`, e);
  }
});

// ============================================================
// START
// ============================================================

console.log("Starting Support Relay...");
console.log(
  mode.kind === "forum"
    ? `Mode: forum (support group ${mode.supportChatId})`
    : `Mode: owner DM (owner ${mode.ownerId})`
);
console.log(`Mapping store: ${config.dbPath}`);

archiver?.start();

async function shutdown(signal: string): Promise<void> {
  console.log(`Received ${signal}, shutting down gracefully...`);
  archiver?.stop();
  await bot.stop();
  await queueManager.shutdown(QUEUE_SHUTDOWN_GRACE_MS);
  store.close();
  process.exit(0);
}

process.on("SIGINT", () => {
  shutdown("SIGINT").catch((err) => {
    console.error("Shutdown failed:", err);
    process.exit(1);
  });
});

process.on("SIGTERM", () => {
  shutdown("SIGTERM").catch((err) => {
    console.error("Shutdown failed:", err);
    process.exit(1);
  });
});

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason);
});

bot.start({
  drop_pending_updates: false,
  onStart: (botInfo) => {
    console.log("Bot is running!");
    console.log(`Bot username: @${botInfo.username}`);
    // Signal PM2 that the bot is ready (wait_ready mode)
    if (typeof process.send === "function") {
      process.send("ready");
    }
  },
}).catch((error) => {
  console.error("ERROR starting bot:", error);
  process.exit(1);
});
