import { z } from "zod";
import rawCaseStudies from "@/data/case-studies.json";
import { InvalidCaseStudyError } from "@/lib/errors";
import type { BudgetTier, CaseStudy, ThinkingLevel } from "@/lib/types";

export const thinkingLevels: readonly ThinkingLevel[] = ["Low", "Medium", "High"];

const BudgetTierSchema = z.object({
  budget: z.number().int().positive(),
  response: z.string(),
  tokens: z.number().int().nonnegative(),
  answer: z.string()
});

const CaseStudySchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  prompt: z.string().min(1),
  suggestedBudget: z.number().int().positive().optional(),
  budgets: z.array(BudgetTierSchema)
});

export function parseCaseStudies(raw: unknown): CaseStudy[] {
  const parsed = z.array(CaseStudySchema).safeParse(raw);
  if (!parsed.success) {
    throw new InvalidCaseStudyError(`Invalid case study data: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
  }
  return parsed.data;
}

const caseStudies: readonly CaseStudy[] = Object.freeze(parseCaseStudies(rawCaseStudies));

export function listCaseStudies(): readonly CaseStudy[] {
  return caseStudies;
}

export function findCaseStudy(name: string): CaseStudy | undefined {
  return caseStudies.find((caseStudy) => caseStudy.name === name);
}

/** Low, Medium and High map onto the three smallest recorded budgets. */
export function tierForLevel(caseStudy: CaseStudy, level: ThinkingLevel): BudgetTier {
  const tiers = [...caseStudy.budgets].sort((a, b) => a.budget - b.budget);
  if (tiers.length < 3) {
    throw new InvalidCaseStudyError(`Case study "${caseStudy.name}" needs at least three budget tiers.`);
  }
  return tiers[thinkingLevels.indexOf(level)];
}

export function budgetForLevel(caseStudy: CaseStudy, level: ThinkingLevel): number {
  return tierForLevel(caseStudy, level).budget;
}

export function formatTokenUsage(tokens: number | null, budget: number): string {
  return `${tokens ?? "?"} / ${budget} tokens`;
}

/** Starting budget for a case study's custom prompts: its suggestion, else the default, within the ceiling. */
export function initialBudgetFor(caseStudy: CaseStudy | undefined, defaultBudget: number, maxBudget: number): number {
  return Math.max(1, Math.min(caseStudy?.suggestedBudget ?? defaultBudget, maxBudget));
}
