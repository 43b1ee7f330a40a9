import {
  AllCandidatesExhaustedError,
  InferenceError,
  InvalidRequestError,
  ModelUnavailableError,
  NetworkError,
  errorMessage
} from "@/lib/errors";
import { requestCompletion, type FetchLike } from "@/lib/inference";
import { createLogger, type Logger } from "@/lib/logger";
import { splitReasoning } from "@/lib/reasoning";
import type { CandidateAttempt, DispatcherConfig, GenerationRequest, GenerationResult } from "@/lib/types";

export interface DispatcherDeps {
  fetch?: FetchLike;
  logger?: Logger;
}

export interface PromptDispatcher {
  generate(prompt: string, tokenBudget: number): Promise<GenerationResult>;
}

export function validateGenerationRequest(prompt: string, tokenBudget: number, config: DispatcherConfig): GenerationRequest {
  const trimmed = (prompt ?? "").trim();
  if (!trimmed) {
    throw new InvalidRequestError("Prompt is required.");
  }
  if (!Number.isInteger(tokenBudget) || tokenBudget <= 0) {
    throw new InvalidRequestError(`Token budget must be a positive integer (received ${tokenBudget}).`);
  }
  if (config.modelCandidates.length === 0) {
    throw new InvalidRequestError("No model candidates are configured.");
  }
  return { prompt: trimmed, tokenBudget, modelCandidates: config.modelCandidates };
}

export function clampBudget(tokenBudget: number, maxTokenBudget: number): number {
  return Math.max(1, Math.min(tokenBudget, maxTokenBudget));
}

function asInferenceError(model: string, error: unknown): InferenceError {
  if (error instanceof InferenceError) return error;
  return new NetworkError(model, errorMessage(error));
}

/**
 * Sequential fallback over the configured model candidates. One call per
 * candidate, first success wins; never throws.
 */
export function createDispatcher(config: DispatcherConfig, deps: DispatcherDeps = {}): PromptDispatcher {
  const logger = deps.logger ?? createLogger("dispatcher", config.logLevel);

  async function generate(prompt: string, tokenBudget: number): Promise<GenerationResult> {
    let request: GenerationRequest;
    try {
      request = validateGenerationRequest(prompt, tokenBudget, config);
    } catch (error) {
      logger.warn("rejected generation request", { reason: errorMessage(error) });
      return {
        success: false,
        text: "",
        modelUsed: null,
        errorMessage: errorMessage(error),
        tokenBudget,
        attempts: []
      };
    }

    const maxTokens = clampBudget(request.tokenBudget, config.maxTokenBudget);
    const attempts: CandidateAttempt[] = [];
    let lastError: InferenceError | null = null;

    for (const model of request.modelCandidates) {
      logger.debug("attempting model candidate", { model, maxTokens, position: attempts.length });

      try {
        const completion = await requestCompletion(config, model, request.prompt, maxTokens, deps.fetch);
        const { reasoning, answer } = splitReasoning(completion.content, completion.reasoningContent);
        // An empty think block passes the raw-content check but leaves nothing to show.
        if (!answer) {
          throw new ModelUnavailableError(model, "Model returned an empty completion.");
        }
        attempts.push({ model, ok: true });
        logger.info("generation succeeded", {
          model,
          maxTokens,
          completionTokens: completion.completionTokens,
          fallback: attempts.length > 1
        });

        return {
          success: true,
          text: answer,
          reasoning,
          modelUsed: model,
          tokenBudget: request.tokenBudget,
          maxTokens,
          completionTokens: completion.completionTokens,
          attempts
        };
      } catch (error) {
        lastError = asInferenceError(model, error);
        attempts.push({ model, ok: false, errorKind: lastError.kind, message: lastError.message });
        logger.warn("model candidate failed, failing over", {
          model,
          errorKind: lastError.kind,
          status: lastError.status,
          reason: lastError.message
        });
      }
    }

    const exhausted = lastError
      ? new AllCandidatesExhaustedError(attempts, lastError)
      : new Error("No model candidates were attempted.");
    logger.error("all model candidates failed", { attempts: attempts.length, reason: exhausted.message });

    return {
      success: false,
      text: "",
      modelUsed: null,
      errorMessage: exhausted.message,
      tokenBudget: request.tokenBudget,
      attempts
    };
  }

  return { generate };
}
