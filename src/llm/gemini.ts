/**
 * Gemini generateContent client.
 * One attempt per call: retries, key choice and timeouts belong to the caller.
 */
import { log } from "../utils/log.js";
import {
  GenerationError,
  MalformedResponseError,
  NetworkError,
  UpstreamError,
} from "./errors.js";

const logger = log.scope("gemini");

export interface GenerationRequest {
  text: string;
  credential: string;
}

export interface GenerationCallOptions {
  /** Aborts the in-flight HTTP request. */
  signal?: AbortSignal;
}

export interface GenerationClient {
  generate(request: GenerationRequest, options?: GenerationCallOptions): Promise<string>;
}

export interface GeminiClientOptions {
  apiBase: string;
  model: string;
  temperature?: number;
  topK?: number;
  topP?: number;
  maxOutputTokens?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Pull the first candidate's text out of a generateContent body. */
export function extractCandidateText(body: unknown): string {
  if (!isRecord(body)) {
    throw new MalformedResponseError("body is not an object");
  }
  const candidates = body["candidates"];
  if (!Array.isArray(candidates) || candidates.length === 0) {
    throw new MalformedResponseError("no candidates");
  }
  const first: unknown = candidates[0];
  const content = isRecord(first) ? first["content"] : undefined;
  const parts = isRecord(content) ? content["parts"] : undefined;
  if (!Array.isArray(parts)) {
    const finishReason = isRecord(first) ? first["finishReason"] : undefined;
    throw new MalformedResponseError(
      `candidate has no content (finishReason=${typeof finishReason === "string" ? finishReason : "unknown"})`
    );
  }
  const text = parts
    .map((p: unknown) => (isRecord(p) && typeof p["text"] === "string" ? p["text"] : ""))
    .join("");
  if (text.length === 0) {
    throw new MalformedResponseError("candidate text is empty");
  }
  return text;
}

export class GeminiClient implements GenerationClient {
  constructor(private readonly options: GeminiClientOptions) {}

  async generate(request: GenerationRequest, callOptions: GenerationCallOptions = {}): Promise<string> {
    const { apiBase, model } = this.options;
    const url = `${apiBase}/${model}:generateContent?key=${encodeURIComponent(request.credential)}`;

    const body = {
      contents: [{ role: "user", parts: [{ text: request.text }] }],
      generationConfig: {
        temperature: this.options.temperature ?? 0.7,
        topK: this.options.topK ?? 40,
        topP: this.options.topP ?? 0.95,
        maxOutputTokens: this.options.maxOutputTokens ?? 1024,
      },
    };

    logger.debug(`Calling ${model} (${request.text.length} chars)`);

    let res: Response;
    try {
      res = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: callOptions.signal,
      });
    } catch (err) {
      // An abort is reported by the caller that owns the timer
      if (callOptions.signal?.aborted) throw err;
      throw new NetworkError(err);
    }

    if (!res.ok) {
      const errText = await res.text().catch(() => "");
      logger.error(`API error ${res.status}: ${errText.slice(0, 300)}`);
      throw new UpstreamError(res.status, errText.slice(0, 300));
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch (err) {
      if (callOptions.signal?.aborted) throw err;
      throw new MalformedResponseError("body is not valid JSON");
    }

    try {
      return extractCandidateText(payload);
    } catch (err) {
      if (err instanceof GenerationError) {
        logger.error(err.message);
      }
      throw err;
    }
  }
}
