import type { CandidateAttempt, InferenceErrorKind } from "@/lib/types";

export function payloadToMessage(payload: unknown): string {
  if (typeof payload === "string") {
    return payload;
  }
  if (payload && typeof payload === "object") {
    const record = payload as Record<string, unknown>;
    const nested = record.error;
    if (typeof nested === "string") return nested;
    if (nested && typeof nested === "object" && typeof (nested as Record<string, unknown>).message === "string") {
      return (nested as { message: string }).message;
    }
    if (typeof record.message === "string") return record.message;
    try {
      return JSON.stringify(payload);
    } catch {
      return "Unserializable payload";
    }
  }
  return String(payload);
}

/** Failure of a single call against one model candidate. */
export abstract class InferenceError extends Error {
  abstract readonly kind: InferenceErrorKind;
  readonly model: string;
  readonly status: number | null;

  constructor(model: string, message: string, status: number | null = null) {
    super(message);
    this.model = model;
    this.status = status;
  }
}

export class AuthenticationError extends InferenceError {
  readonly kind = "authentication" as const;

  constructor(model: string, message: string, status: number | null = null) {
    super(model, message, status);
    this.name = "AuthenticationError";
  }
}

export class ModelUnavailableError extends InferenceError {
  readonly kind = "model_unavailable" as const;

  constructor(model: string, message: string, status: number | null = null) {
    super(model, message, status);
    this.name = "ModelUnavailableError";
  }
}

export class RateLimitError extends InferenceError {
  readonly kind = "rate_limit" as const;
  readonly retryAfterMs: number | null;

  constructor(model: string, message: string, retryAfterMs: number | null = null) {
    super(model, message, 429);
    this.name = "RateLimitError";
    this.retryAfterMs = retryAfterMs;
  }
}

export class NetworkError extends InferenceError {
  readonly kind = "network" as const;

  constructor(model: string, message: string) {
    super(model, message, null);
    this.name = "NetworkError";
  }
}

export class AllCandidatesExhaustedError extends Error {
  readonly kind = "exhausted" as const;
  readonly attempts: CandidateAttempt[];
  readonly lastError: InferenceError;

  constructor(attempts: CandidateAttempt[], lastError: InferenceError) {
    const noun = attempts.length === 1 ? "candidate" : "candidates";
    super(`All ${attempts.length} model ${noun} failed. Last failure (${lastError.model}): ${lastError.message}`);
    this.name = "AllCandidatesExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

export class InvalidCaseStudyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidCaseStudyError";
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
