/**
 * Telegram-facing text: command replies, status listings and message
 * splitting for Telegram's 4096-character limit.
 */
import type { RequestSummary } from "../core/types.js";

export const MAX_TG_MESSAGE = 4096;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/** `HH:MM:SS UTC` for an epoch-ms timestamp. */
export function formatClock(epochMs: number): string {
  return `${new Date(epochMs).toISOString().slice(11, 19)} UTC`;
}

function describePeriod(ms: number): string {
  const seconds = Math.round(ms / 1000);
  if (seconds % 60 === 0) {
    const minutes = seconds / 60;
    return minutes === 1 ? "1 minute" : `${minutes} minutes`;
  }
  return seconds === 1 ? "1 second" : `${seconds} seconds`;
}

export function welcomeText(quietPeriodMs: number): string {
  const period = describePeriod(quietPeriodMs);
  return [
    "🤖 Hi! I turn your messages into answers from Gemini.",
    "",
    "📝 Send me some text and I will:",
    "1. Give your request a unique ID",
    `2. Wait ${period} in case you want to add details`,
    "3. Send everything you wrote as one request",
    "4. Reply with the answer, labelled with the request ID",
    "",
    "Commands:",
    "/start - this message",
    "/help - how it works",
    "/status - your pending requests",
    "/cancel - cancel your pending requests",
  ].join("\n");
}

export function helpText(quietPeriodMs: number): string {
  const period = describePeriod(quietPeriodMs);
  return [
    "📚 How it works:",
    "",
    "• Send any text to start a request",
    `• Messages sent within ${period} of each other are merged into one request`,
    "• Every merge gives the request a new ID",
    `• ${period} after your last message the request is sent to Gemini`,
    "• The answer arrives labelled with its request ID",
    "",
    "/status - show pending requests",
    "/cancel - cancel pending requests",
  ].join("\n");
}

export function acceptedText(id: string, merged: boolean, quietPeriodMs: number): string {
  const period = describePeriod(quietPeriodMs);
  const lines = merged
    ? ["➕ Added to your pending request!", "", `📝 New request ID: <code>${escapeHtml(id)}</code>`]
    : ["✅ Request received!", "", `📝 Request ID: <code>${escapeHtml(id)}</code>`];
  lines.push(
    `🕐 Processing starts in ${period}...`,
    "✏️ You can send more details before then.",
    "",
    "Use /status to check it, /cancel to drop it."
  );
  return lines.join("\n");
}

export function statusText(requests: readonly RequestSummary[]): string {
  if (requests.length === 0) return "✅ You have no pending requests.";

  const blocks = requests.map((r) =>
    [
      `• ID: <code>${escapeHtml(r.id)}</code>`,
      `  Text: ${escapeHtml(r.preview)}`,
      `  Created: ${formatClock(r.createdAt)}`,
      `  Status: ⏳ ${r.status}`,
    ].join("\n")
  );
  return `📋 <b>Your pending requests:</b>\n\n${blocks.join("\n\n")}`;
}

export function cancelledText(count: number): string {
  if (count === 0) return "❌ No requests to cancel.";
  return count === 1 ? "✅ Cancelled 1 request." : `✅ Cancelled ${count} requests.`;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Split text into chunks of at most `maxLen` characters, preferring paragraph
 * breaks, then line breaks, then a hard cut.
 */
export function splitMessage(text: string, maxLen: number = MAX_TG_MESSAGE): string[] {
  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > maxLen) {
    const window = remaining.slice(0, maxLen);
    const floor = Math.floor(maxLen * 0.3);
    let cut = window.lastIndexOf("\n\n");
    if (cut <= floor) cut = window.lastIndexOf("\n");
    if (cut <= floor) {
      cut = maxLen;
      if (isHighSurrogate(remaining.charCodeAt(cut - 1))) cut--;
    }

    chunks.push(remaining.slice(0, cut).trimEnd());
    remaining = remaining.slice(cut).trimStart();
  }
  if (remaining.length > 0 || chunks.length === 0) chunks.push(remaining);

  return chunks;
}
