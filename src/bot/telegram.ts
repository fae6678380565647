/**
 * Telegram bot setup using grammY with long polling.
 * Text messages feed the batch engine; answers come back through the notifier.
 */
import { Bot, type BotConfig, type Context } from "grammy";
import type { AppConfig } from "../config/env.js";
import { type BatchEngine, createBatchEngine } from "../core/engine.js";
import { NotificationError, type Notifier, type OwnerId } from "../core/types.js";
import type { GenerationClient } from "../llm/gemini.js";
import { log } from "../utils/log.js";
import {
  acceptedText,
  cancelledText,
  helpText,
  splitMessage,
  statusText,
  welcomeText,
} from "./formatting.js";

const logger = log.scope("telegram");

export const BOT_COMMANDS = [
  { command: "start", description: "Welcome message" },
  { command: "help", description: "How batching works" },
  { command: "status", description: "Show pending requests" },
  { command: "cancel", description: "Cancel pending requests" },
];

export type SendMessageFn = (chatId: OwnerId, text: string) => Promise<unknown>;

/**
 * Delivers plain-text messages to the owner's private chat, split to fit
 * Telegram's limit. Any transport failure surfaces as NotificationError.
 */
export function createTelegramNotifier(send: SendMessageFn): Notifier {
  return {
    async notify(owner, text) {
      try {
        for (const chunk of splitMessage(text)) {
          await send(owner, chunk);
        }
      } catch (err) {
        throw new NotificationError(owner, err);
      }
    },
  };
}

// --- Update Dedup ---

const MAX_DEDUP_SIZE = 200;

/** Remembers recent update ids; returns true for one already seen. */
export function createUpdateDeduper(maxSize: number = MAX_DEDUP_SIZE): (updateId: number) => boolean {
  const seen = new Set<number>();
  return (updateId) => {
    if (seen.has(updateId)) return true;
    seen.add(updateId);
    if (seen.size > maxSize) {
      // Sets iterate in insertion order, so the first entry is the oldest
      const oldest = seen.values().next();
      if (!oldest.done) seen.delete(oldest.value);
    }
    return false;
  };
}

// --- Bot Creation ---

export interface BotBundle {
  bot: Bot;
  engine: BatchEngine;
}

export function createBot(
  config: AppConfig,
  client: GenerationClient,
  botConfig?: BotConfig<Context>
): BotBundle {
  const bot = new Bot(config.telegramToken, botConfig);
  const bootTime = Math.floor(Date.now() / 1000);
  const isDuplicate = createUpdateDeduper();

  const notifier = createTelegramNotifier((chatId, text) => bot.api.sendMessage(chatId, text));
  const engine = createBatchEngine({
    credentials: config.geminiApiKeys,
    client,
    notifier,
    quietPeriodMs: config.quietPeriodMs,
    timeoutMs: config.upstreamTimeoutMs,
    promptPrefix: config.promptPrefix,
    onDispatched: (owner, id, outcome) => {
      logger.debug(`Dispatch of ${id} for ${owner} finished: ${outcome}`);
    },
  });

  // Middleware: drop messages sent before boot
  bot.use(async (ctx, next) => {
    const msgDate = ctx.message?.date ?? 0;
    if (msgDate > 0 && msgDate < bootTime) {
      logger.debug(`Dropping stale message (date=${msgDate}, boot=${bootTime})`);
      return;
    }
    await next();
  });

  // Middleware: update deduplication
  bot.use(async (ctx, next) => {
    if (isDuplicate(ctx.update.update_id)) {
      logger.debug(`Dropping duplicate update ${ctx.update.update_id}`);
      return;
    }
    await next();
  });

  // --- Commands ---

  bot.command("start", async (ctx) => {
    await ctx.reply(welcomeText(config.quietPeriodMs));
  });

  bot.command("help", async (ctx) => {
    await ctx.reply(helpText(config.quietPeriodMs));
  });

  bot.command("status", async (ctx) => {
    const userId = ctx.from?.id;
    if (!userId) return;
    await ctx.reply(statusText(engine.onStatusQuery(userId)), { parse_mode: "HTML" });
  });

  bot.command("cancel", async (ctx) => {
    const userId = ctx.from?.id;
    if (!userId) return;
    const count = engine.onCancel(userId);
    await ctx.reply(cancelledText(count));
  });

  // --- Text message handler ---

  bot.on("message:text", async (ctx) => {
    const userId = ctx.from.id;
    const text = ctx.message.text;

    if (text.startsWith("/")) {
      await ctx.reply("Unknown command. Try /help.");
      return;
    }
    if (!text.trim()) {
      await ctx.reply("❌ Please send some text to process.");
      return;
    }

    logger.info(`Message from user ${userId}: ${text.slice(0, 80)}`);

    const { id, merged } = engine.onText(userId, text);
    await ctx.reply(acceptedText(id, merged, config.quietPeriodMs), { parse_mode: "HTML" });
  });

  bot.catch((err) => {
    logger.error(`Error while handling update ${err.ctx.update.update_id}:`, err.error);
  });

  return { bot, engine };
}
