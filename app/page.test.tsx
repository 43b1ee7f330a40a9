// @vitest-environment jsdom
import { afterEach, describe, expect, it, vi } from "vitest";
import { cleanup, fireEvent, render, screen } from "@testing-library/react";
import HomePage from "./page";
import type { GenerationResult, PublicSettings } from "@/lib/types";

const settings: PublicSettings = {
  modelCandidates: ["org/model-a", "org/model-b"],
  maxTokenBudget: 512,
  defaultTokenBudget: 128,
  credentialConfigured: true
};

function json(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function stubServer(result: GenerationResult) {
  const fetchMock = vi.fn<typeof fetch>(async (input) => {
    const url = String(input);
    if (url.endsWith("/api/settings")) return json(settings);
    if (url.endsWith("/api/generate")) return json(result);
    return json({ error: "not found" }, 404);
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function generateBody(fetchMock: ReturnType<typeof stubServer>): unknown {
  const call = fetchMock.mock.calls.find(([input]) => String(input).endsWith("/api/generate"));
  if (!call) throw new Error("generate was not requested");
  return JSON.parse(String(call[1]?.body));
}

const success: GenerationResult = {
  success: true,
  text: "Plants make sugar from light.",
  reasoning: "Light is the energy source.",
  modelUsed: "org/model-b",
  tokenBudget: 128,
  maxTokens: 128,
  completionTokens: 42,
  attempts: [
    { model: "org/model-a", ok: false, errorKind: "model_unavailable", message: "HTTP 503: busy" },
    { model: "org/model-b", ok: true }
  ]
};

describe("HomePage", () => {
  afterEach(() => {
    cleanup();
    vi.unstubAllGlobals();
  });

  it("shows the first case study and its recorded Low tier", async () => {
    stubServer(success);
    render(<HomePage />);

    expect(screen.getByText("A short multi-step word problem where skipping a step changes the answer.")).toBeTruthy();
    expect(screen.getByText("Token Usage: 14 / 40 tokens")).toBeTruthy();
    expect(screen.getByText("Final Answer: $45")).toBeTruthy();
    expect(await screen.findByText("Models: org/model-a → org/model-b")).toBeTruthy();
  });

  it("switches the recorded tier with the thinking level", async () => {
    stubServer(success);
    render(<HomePage />);

    fireEvent.click(screen.getByLabelText("High"));

    expect(screen.getByText("Token Usage: 118 / 240 tokens")).toBeTruthy();
    expect(screen.getByText("Final Answer: $36")).toBeTruthy();
    expect(await screen.findByText(/^The deal is one free muffin/)).toBeTruthy();
  });

  it("clears the previous tier's trace as soon as the level changes", async () => {
    stubServer(success);
    render(<HomePage />);

    fireEvent.click(screen.getByLabelText("High"));
    await screen.findByText(/^The deal is one free muffin/);

    fireEvent.click(screen.getByLabelText("Low"));

    expect(screen.queryByText(/^The deal is one free muffin/)).toBeNull();
  });

  it("pre-fills the budget with the case study's suggestion", async () => {
    stubServer(success);
    render(<HomePage />);
    await screen.findByText("Models: org/model-a → org/model-b");

    expect(screen.getByLabelText("Token Budget")).toHaveProperty("value", "120");

    fireEvent.change(screen.getByLabelText("Case Study"), { target: { value: "Train Timetable" } });

    expect(screen.getByLabelText("Token Budget")).toHaveProperty("value", "128");
  });

  it("sends a custom prompt with the configured default budget", async () => {
    const fetchMock = stubServer(success);
    render(<HomePage />);
    await screen.findByText("Models: org/model-a → org/model-b");

    fireEvent.change(screen.getByLabelText("Case Study"), { target: { value: "Train Timetable" } });
    fireEvent.change(screen.getByLabelText("Custom Prompt (optional)"), {
      target: { value: "Explain photosynthesis in one sentence." }
    });
    fireEvent.click(screen.getByRole("button", { name: "Generate" }));

    expect(await screen.findByText("Plants make sugar from light.")).toBeTruthy();
    expect(screen.getByText("org/model-b")).toBeTruthy();
    expect(screen.getByText("Light is the energy source.")).toBeTruthy();
    expect(generateBody(fetchMock)).toEqual({ prompt: "Explain photosynthesis in one sentence.", tokenBudget: 128 });
  });

  it("runs a case study live at its tier's budget", async () => {
    const fetchMock = stubServer(success);
    render(<HomePage />);

    fireEvent.click(screen.getByLabelText("Medium"));
    fireEvent.click(screen.getByRole("button", { name: "Run Case Study Live" }));

    await screen.findByText("Plants make sugar from light.");
    expect(generateBody(fetchMock)).toEqual({
      prompt: "A bakery sells muffins for $3 each and gives one free muffin for every four bought. Priya leaves with 15 muffins. How much did she pay?",
      tokenBudget: 120
    });
  });

  it("shows a total failure as a plain message", async () => {
    stubServer({
      success: false,
      text: "",
      modelUsed: null,
      errorMessage: "All 2 model candidates failed. Last failure (org/model-b): HTTP 429: slow down",
      tokenBudget: 128,
      attempts: []
    });
    render(<HomePage />);

    fireEvent.click(screen.getByRole("button", { name: "Run Case Study Live" }));

    expect(
      await screen.findByText("All 2 model candidates failed. Last failure (org/model-b): HTTP 429: slow down")
    ).toBeTruthy();
  });
});
