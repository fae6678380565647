/**
 * Entry point: load configuration, start the Telegram bot and the batch engine.
 */
import { ConfigurationError, loadConfigFromDotenv, type AppConfig } from "./config/env.js";
import { BOT_COMMANDS, createBot } from "./bot/telegram.js";
import { GeminiClient } from "./llm/gemini.js";
import { log, redactSecret, setLogLevel } from "./utils/log.js";

function readConfig(): AppConfig {
  try {
    return loadConfigFromDotenv();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      log.error(`[config] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

async function main() {
  const config = readConfig();
  setLogLevel(config.logLevel);

  // Redact secrets from logs
  redactSecret(config.telegramToken);
  for (const key of config.geminiApiKeys) {
    redactSecret(key);
  }

  log.info("Starting prompt batching relay...");
  log.info(`Gemini keys available: ${config.geminiApiKeys.length}`);
  log.info(`Model: ${config.geminiModel}`);
  log.info(`Quiet period: ${config.quietPeriodMs}ms, upstream timeout: ${config.upstreamTimeoutMs}ms`);
  if (config.promptPrefix) {
    log.info(`Prompt prefix: ${config.promptPrefix.length} chars`);
  }

  const client = new GeminiClient({ apiBase: config.geminiApiBase, model: config.geminiModel });
  const { bot, engine } = createBot(config, client);

  let shuttingDown = false;
  function gracefulShutdown(signal: string) {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`${signal} received, shutting down...`);
    const cancelled = engine.shutdown();
    if (cancelled > 0) {
      log.warn(`Dropped ${cancelled} pending request(s)`);
    }
    bot.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error("Failed to stop polling:", err);
        process.exit(1);
      }
    );
  }

  process.on("SIGINT", () => gracefulShutdown("SIGINT"));
  process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
  process.on("uncaughtException", (err) => {
    log.error("[FATAL] Uncaught exception:", err);
  });
  process.on("unhandledRejection", (reason) => {
    log.error("[FATAL] Unhandled promise rejection:", reason);
  });

  try {
    await bot.api.setMyCommands(BOT_COMMANDS);
  } catch (err) {
    log.warn(`[telegram] Could not register commands: ${err instanceof Error ? err.message : String(err)}`);
  }

  log.info("Starting Telegram long polling...");
  await bot.start({
    onStart: (botInfo) => {
      log.info(`Bot online as @${botInfo.username} (id: ${botInfo.id})`);
    },
  });
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
