export const paperCitation = {
  authors: "Li, J., Zhao, W., Zhang, Y., & Gan, C. (2025)",
  title: "Steering LLM Thinking with Budget Guidance",
  url: "https://arxiv.org/abs/2506.13752",
  label: "arXiv:2506.13752"
} as const;

export const aboutText = `About
Ask a language model to solve a hard problem and give it more room to "think", and it usually writes a longer, more careful chain of steps before answering. That room is measured in tokens (pieces of words). This lab shows how the quality of a model's reasoning changes with its thinking budget.

How to use
1. Select a problem from the case study list.
2. Choose a Low, Medium or High thinking level to replay a recorded reasoning trace at that budget.
3. Or type your own prompt, set a token budget and press Generate to ask a hosted model live.

What the live mode does
The token budget is sent to the model as a hard output limit (max_tokens) and as a hint in the system prompt. Hosted models are tried in a fixed order; if one is unavailable or rate limited, the next one answers.

What it does not do
Budget guidance as described in the paper steers the model during decoding with a learned predictor of remaining reasoning length. This lab does not run that decoder: it only bounds and hints the generation length through a third-party API, so the live results illustrate the idea rather than reproduce the method.`;
