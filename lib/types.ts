export type ThinkingLevel = "Low" | "Medium" | "High";

export type InferenceErrorKind = "authentication" | "model_unavailable" | "rate_limit" | "network";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface BudgetTier {
  budget: number;
  response: string;
  tokens: number;
  answer: string;
}

export interface CaseStudy {
  name: string;
  description: string;
  prompt: string;
  suggestedBudget?: number;
  budgets: BudgetTier[];
}

export interface DispatcherConfig {
  /** Bearer credential; undefined when HF_TOKEN is unset. */
  apiToken?: string;
  baseUrl: string;
  /** Highest preference first. */
  modelCandidates: readonly string[];
  maxTokenBudget: number;
  defaultTokenBudget: number;
  requestTimeoutMs: number;
  temperature: number;
  logLevel: LogLevel;
}

export interface GenerationRequest {
  prompt: string;
  tokenBudget: number;
  modelCandidates: readonly string[];
}

export interface CandidateAttempt {
  model: string;
  ok: boolean;
  errorKind?: InferenceErrorKind;
  message?: string;
}

export interface Completion {
  model: string;
  content: string;
  reasoningContent: string | null;
  completionTokens: number | null;
}

export interface GenerationSuccess {
  success: true;
  text: string;
  reasoning: string | null;
  modelUsed: string;
  tokenBudget: number;
  maxTokens: number;
  completionTokens: number | null;
  attempts: CandidateAttempt[];
}

export interface GenerationFailure {
  success: false;
  text: "";
  modelUsed: null;
  errorMessage: string;
  tokenBudget: number;
  attempts: CandidateAttempt[];
}

export type GenerationResult = GenerationSuccess | GenerationFailure;

export interface PublicSettings {
  modelCandidates: string[];
  maxTokenBudget: number;
  defaultTokenBudget: number;
  credentialConfigured: boolean;
}
