/**
 * Environment configuration loader.
 * All secrets come from .env or the process environment, never from code.
 * The credential pool is read once at startup and stays fixed afterwards.
 */
import dotenv from "dotenv";
import { isLevel, type Level } from "../utils/log.js";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

type Env = Record<string, string | undefined>;

function required(env: Env, key: string): string {
  const v = env[key]?.trim();
  if (!v) throw new ConfigurationError(`Missing required env var: ${key}`);
  return v;
}

function optional(env: Env, key: string, fallback: string): string {
  return env[key] || fallback;
}

function csvList(env: Env, key: string, fallback: string = ""): string[] {
  const raw = env[key] || fallback;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function positiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer, got "${raw}"`);
  }
  return n;
}

export interface AppConfig {
  telegramToken: string;
  geminiApiKeys: string[];
  geminiModel: string;
  geminiApiBase: string;
  /** Quiet period after the last message before a request is dispatched. */
  quietPeriodMs: number;
  upstreamTimeoutMs: number;
  /** Prepended to every aggregated request before dispatch. */
  promptPrefix: string;
  logLevel: Level;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const geminiApiKeys = csvList(env, "GEMINI_API_KEYS");
  if (geminiApiKeys.length === 0) {
    throw new ConfigurationError("GEMINI_API_KEYS must list at least one key");
  }

  const logLevel = optional(env, "LOG_LEVEL", "info");
  if (!isLevel(logLevel)) {
    throw new ConfigurationError(`Unknown LOG_LEVEL "${logLevel}"`);
  }

  return {
    telegramToken: required(env, "TELEGRAM_BOT_TOKEN"),
    geminiApiKeys,
    geminiModel: optional(env, "GEMINI_MODEL", "gemini-1.5-flash"),
    geminiApiBase: optional(
      env,
      "GEMINI_API_BASE",
      "https://generativelanguage.googleapis.com/v1beta/models"
    ),
    quietPeriodMs: positiveInt(env, "QUIET_PERIOD_MS", 60_000),
    upstreamTimeoutMs: positiveInt(env, "UPSTREAM_TIMEOUT_MS", 30_000),
    promptPrefix: optional(env, "PROMPT_PREFIX", "").trim(),
    logLevel,
  };
}

/** Load `.env` into process.env, then build the config from it. */
export function loadConfigFromDotenv(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
