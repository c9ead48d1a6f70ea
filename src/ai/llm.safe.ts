import type { Logger } from "../config/logger";
import type { ChatCompletionRequest, ChatCompletionTransport } from "./llm.client";

export interface ChatSafeCallArgs {
  transport: ChatCompletionTransport;
  request: ChatCompletionRequest;
  logger?: Logger;
  timeoutMs?: number;
}

export type SafeChatErrorCode = "timeout" | "transient_failure" | "llm_failure";

export type SafeChatResult = { ok: true; text: string } | { ok: false; error_code: SafeChatErrorCode };

export const DEFAULT_TIMEOUT_MS = 25_000;

/**
 * Runs one chat completion with a timeout and a single retry on transient
 * failures. Never rejects.
 */
export async function callChatSafe(args: ChatSafeCallArgs): Promise<SafeChatResult> {
  const timeoutMs = normalizeTimeout(args.timeoutMs);
  const attempt = async (): Promise<string> =>
    withTimeout(args.transport.createChatCompletion(args.request), timeoutMs);

  try {
    return toResult(await attempt());
  } catch (error) {
    if (!isTransientError(error)) {
      return { ok: false, error_code: isTimeoutError(error) ? "timeout" : "llm_failure" };
    }
  }

  args.logger?.warn("llm.safe.retry.once", {
    promptName: args.request.promptName,
    modelName: args.transport.getModelName?.(),
  });
  try {
    return toResult(await attempt());
  } catch (error) {
    return {
      ok: false,
      error_code: isTimeoutError(error)
        ? "timeout"
        : isTransientError(error)
          ? "transient_failure"
          : "llm_failure",
    };
  }
}

function toResult(raw: string): SafeChatResult {
  const text = raw.trim();
  if (!text) {
    return { ok: false, error_code: "llm_failure" };
  }
  return { ok: true, text };
}

function normalizeTimeout(value?: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.round(value);
  }
  return DEFAULT_TIMEOUT_MS;
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error("timeout"));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

function isTimeoutError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return message.includes("timeout");
}

export function isTransientError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return (
    message.includes("timeout") ||
    message.includes("econnreset") ||
    message.includes("network") ||
    message.includes("429") ||
    message.includes("rate limit") ||
    message.includes("http 500") ||
    message.includes("http 502") ||
    message.includes("http 503") ||
    message.includes("http 504")
  );
}
