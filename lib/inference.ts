import { z } from "zod";
import {
  AuthenticationError,
  ModelUnavailableError,
  NetworkError,
  RateLimitError,
  errorMessage,
  payloadToMessage,
  type InferenceError
} from "@/lib/errors";
import type { Completion, DispatcherConfig } from "@/lib/types";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullish(),
            reasoning_content: z.string().nullish()
          })
          .nullish()
      })
    )
    .min(1),
  usage: z
    .object({
      completion_tokens: z.number().int().nonnegative().nullish()
    })
    .nullish()
});

export function budgetSystemPrompt(maxTokens: number): string {
  return [
    "You are a careful assistant that reasons step by step before answering.",
    `You have a thinking budget of ${maxTokens} tokens for this reply, reasoning included.`,
    "Spend more steps on hard problems and fewer on easy ones, and always finish with a short final answer before the budget runs out."
  ].join(" ");
}

function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return error.name === "AbortError";
}

export function parseRetryAfterMs(rawHeader: string | null): number | null {
  if (!rawHeader) return null;
  const numericSeconds = Number(rawHeader);
  if (Number.isFinite(numericSeconds) && numericSeconds >= 0) {
    return Math.floor(numericSeconds * 1000);
  }

  const epochMs = Date.parse(rawHeader);
  if (Number.isNaN(epochMs)) return null;
  return Math.max(0, epochMs - Date.now());
}

export function classifyHttpFailure(model: string, status: number, payload: unknown, retryAfter: string | null): InferenceError {
  const message = `HTTP ${status}: ${payloadToMessage(payload)}`;
  if (status === 401 || status === 403) return new AuthenticationError(model, message, status);
  if (status === 429) return new RateLimitError(model, message, parseRetryAfterMs(retryAfter));
  return new ModelUnavailableError(model, message, status);
}

function parsePayload(text: string): unknown {
  if (!text) return {};
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

async function fetchText(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  model: string,
  timeoutMs: number
): Promise<{ response: Response; text: string }> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(url, { ...init, signal: controller.signal, cache: "no-store" });
    const text = await response.text();
    return { response, text };
  } catch (error) {
    if (isAbortError(error)) {
      throw new NetworkError(model, `Request timed out after ${timeoutMs} ms.`);
    }
    throw new NetworkError(model, `Network failure: ${errorMessage(error)}`);
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Makes exactly one chat-completion call against one model. Every failure
 * surfaces as an InferenceError subclass; nothing is retried here.
 */
export async function requestCompletion(
  config: DispatcherConfig,
  model: string,
  prompt: string,
  maxTokens: number,
  fetchImpl: FetchLike = fetch
): Promise<Completion> {
  if (!config.apiToken) {
    throw new AuthenticationError(model, "HF_TOKEN is not set. Configure a Hugging Face access token on the server.");
  }

  const { response, text } = await fetchText(
    fetchImpl,
    `${config.baseUrl}/chat/completions`,
    {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${config.apiToken}`
      },
      body: JSON.stringify({
        model,
        messages: [
          { role: "system", content: budgetSystemPrompt(maxTokens) },
          { role: "user", content: prompt }
        ],
        max_tokens: maxTokens,
        temperature: config.temperature,
        stream: false
      })
    },
    model,
    config.requestTimeoutMs
  );

  const payload = parsePayload(text);
  if (!response.ok) {
    throw classifyHttpFailure(model, response.status, payload, response.headers.get("retry-after"));
  }

  const parsed = ChatCompletionSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ModelUnavailableError(model, `Malformed completion payload: ${payloadToMessage(payload)}`, response.status);
  }

  const message = parsed.data.choices[0].message;
  const content = message?.content ?? "";
  const reasoningContent = message?.reasoning_content ?? null;
  if (!content.trim() && !reasoningContent?.trim()) {
    throw new ModelUnavailableError(model, "Model returned an empty completion.", response.status);
  }

  return {
    model,
    content,
    reasoningContent,
    completionTokens: parsed.data.usage?.completion_tokens ?? null
  };
}
