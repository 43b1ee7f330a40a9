import { describe, expect, it } from "vitest";
import { splitReasoning } from "./reasoning";

describe("splitReasoning", () => {
  it("returns plain content as the answer", () => {
    expect(splitReasoning("  Paris.  ")).toEqual({ reasoning: null, answer: "Paris." });
  });

  it("prefers explicit reasoning content", () => {
    expect(splitReasoning("Paris.", " The tower is in France. ")).toEqual({
      reasoning: "The tower is in France.",
      answer: "Paris."
    });
  });

  it("splits a leading think block from the answer", () => {
    expect(splitReasoning("<think>\nFrance, so Paris.\n</think>\n\nParis.")).toEqual({
      reasoning: "France, so Paris.",
      answer: "Paris."
    });
  });

  it("keeps the trace as the answer when the budget ran out mid-thought", () => {
    expect(splitReasoning("<think>First find the country, then")).toEqual({
      reasoning: "First find the country, then",
      answer: "First find the country, then"
    });
  });

  it("falls back to the explicit reasoning when the content is empty", () => {
    expect(splitReasoning("", "Still thinking")).toEqual({ reasoning: "Still thinking", answer: "Still thinking" });
  });

  it("leaves think tags alone when they are not leading", () => {
    expect(splitReasoning("Answer first <think>late</think>")).toEqual({
      reasoning: null,
      answer: "Answer first <think>late</think>"
    });
  });
});
