import { z } from "zod";
import { ConfigError } from "@/lib/errors";
import type { DispatcherConfig, PublicSettings } from "@/lib/types";

export const DEFAULT_BASE_URL = "https://router.huggingface.co/v1";
export const DEFAULT_MODEL_CANDIDATES = [
  "meta-llama/Llama-3.1-8B-Instruct",
  "Qwen/Qwen2.5-7B-Instruct",
  "mistralai/Mistral-7B-Instruct-v0.3"
] as const;

type Env = Record<string, string | undefined>;

export function nonEmpty(value?: string): string | undefined {
  const trimmed = (value ?? "").trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function normalizeCredential(rawValue: string): string {
  let value = (rawValue ?? "").trim();
  if (!value) return "";

  const assignmentMatch = value.match(/^(?:export\s+)?(?:HF_TOKEN|HUGGINGFACEHUB_API_TOKEN)\s*=\s*(.+)$/i);
  if (assignmentMatch) {
    value = assignmentMatch[1].trim();
  }

  if (
    (value.startsWith('"') && value.endsWith('"')) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    value = value.slice(1, -1).trim();
  }

  // Zero-width and other hidden characters survive copy/paste from dashboards.
  return value.normalize("NFKC").replace(/[\p{Z}\p{C}]+/gu, "");
}

export function normalizeBaseURL(value: string): string {
  const trimmed = value.trim();
  return trimmed.endsWith("/") ? trimmed.slice(0, -1) : trimmed;
}

export function parseModelList(raw: string): string[] {
  const models: string[] = [];
  for (const entry of raw.split(",")) {
    const model = entry.trim();
    if (model && !models.includes(model)) models.push(model);
  }
  return models;
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  HF_TOKEN: z.string().optional(),
  INFERENCE_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  INFERENCE_MODELS: z
    .string()
    .default(DEFAULT_MODEL_CANDIDATES.join(","))
    .transform(parseModelList)
    .refine((models) => models.length > 0, "must name at least one model"),
  MAX_TOKEN_BUDGET: positiveInt(1024),
  DEFAULT_TOKEN_BUDGET: positiveInt(256),
  INFERENCE_TIMEOUT_MS: positiveInt(30_000),
  INFERENCE_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info")
});

/** Blank variables count as unset so that `FOO=` in an env file falls back to the default. */
function withoutBlanks(env: Env): Env {
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    const trimmed = nonEmpty(value);
    if (trimmed !== undefined) cleaned[key] = trimmed;
  }
  return cleaned;
}

export function loadConfig(env: Env = process.env): DispatcherConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }

  const values = parsed.data;
  const apiToken = nonEmpty(normalizeCredential(values.HF_TOKEN ?? ""));

  return Object.freeze({
    apiToken,
    baseUrl: normalizeBaseURL(values.INFERENCE_BASE_URL),
    modelCandidates: Object.freeze([...values.INFERENCE_MODELS]),
    maxTokenBudget: values.MAX_TOKEN_BUDGET,
    defaultTokenBudget: Math.min(values.DEFAULT_TOKEN_BUDGET, values.MAX_TOKEN_BUDGET),
    requestTimeoutMs: values.INFERENCE_TIMEOUT_MS,
    temperature: values.INFERENCE_TEMPERATURE,
    logLevel: values.LOG_LEVEL
  });
}

export function publicSettings(config: DispatcherConfig): PublicSettings {
  return {
    modelCandidates: [...config.modelCandidates],
    maxTokenBudget: config.maxTokenBudget,
    defaultTokenBudget: config.defaultTokenBudget,
    credentialConfigured: Boolean(config.apiToken)
  };
}
