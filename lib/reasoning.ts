export interface ReasoningSplit {
  reasoning: string | null;
  answer: string;
}

const THINK_OPEN = "<think>";
const THINK_CLOSE = "</think>";

/**
 * Separates a model's reasoning trace from its final answer.
 *
 * Providers that expose reasoning put it in `reasoning_content`; open-weight
 * reasoning models inline it as a leading `<think>` block instead. A block
 * with no closing tag means the token budget ran out mid-thought, so the
 * trace doubles as the answer.
 */
export function splitReasoning(content: string, reasoningContent?: string | null): ReasoningSplit {
  const explicit = reasoningContent?.trim();
  if (explicit) {
    return { reasoning: explicit, answer: content.trim() || explicit };
  }

  const trimmed = content.trim();
  if (!trimmed.startsWith(THINK_OPEN)) {
    return { reasoning: null, answer: trimmed };
  }

  const closeIndex = trimmed.indexOf(THINK_CLOSE);
  if (closeIndex < 0) {
    const trace = trimmed.slice(THINK_OPEN.length).trim();
    return { reasoning: trace || null, answer: trace };
  }

  const trace = trimmed.slice(THINK_OPEN.length, closeIndex).trim();
  const answer = trimmed.slice(closeIndex + THINK_CLOSE.length).trim();
  return { reasoning: trace || null, answer: answer || trace };
}
