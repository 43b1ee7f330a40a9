"use client";

import { useEffect, useMemo, useState } from "react";
import {
  budgetForLevel,
  findCaseStudy,
  formatTokenUsage,
  initialBudgetFor,
  listCaseStudies,
  thinkingLevels,
  tierForLevel
} from "@/lib/caseStudies";
import { aboutText, paperCitation } from "@/lib/docs";
import { TYPING_INTERVAL_MS, typingFrames } from "@/lib/typing";
import type { BudgetTier, GenerationResult, PublicSettings, ThinkingLevel } from "@/lib/types";

const FALLBACK_MAX_BUDGET = 1024;

async function requestJSON<T>(url: string, init?: RequestInit): Promise<T> {
  const response = await fetch(url, {
    ...init,
    cache: "no-store"
  });

  const text = await response.text();
  let payload: Record<string, unknown> = {};
  if (text) {
    try {
      payload = JSON.parse(text) as Record<string, unknown>;
    } catch {
      if (text.trimStart().startsWith("<!DOCTYPE")) {
        throw new Error("Server returned HTML instead of JSON. Check terminal logs and restart the dev server.");
      }
      throw new Error("Server returned invalid JSON.");
    }
  }

  if (!response.ok) {
    const message = (payload as { error?: string }).error ?? `HTTP ${response.status}`;
    throw new Error(message);
  }

  return payload as T;
}

function SectionDocModal({ title, body, onClose }: { title: string; body: string; onClose: () => void }) {
  return (
    <div className="modal-backdrop" role="dialog" aria-modal="true">
      <div className="modal-sheet">
        <div className="modal-head">
          <h2>{title}</h2>
          <button onClick={onClose}>Close</button>
        </div>
        <pre className="doc-block">{body}</pre>
        <p className="tiny">
          Related research: {paperCitation.authors}. <strong>{paperCitation.title}</strong>.{" "}
          <a href={paperCitation.url} target="_blank" rel="noreferrer">
            {paperCitation.label}
          </a>
        </p>
      </div>
    </div>
  );
}

function LiveResultPanel({ result }: { result: GenerationResult }) {
  if (!result.success) {
    return (
      <article className="card">
        <h3>Live Result</h3>
        <p className="error-line">{result.errorMessage}</p>
        <AttemptList result={result} />
      </article>
    );
  }

  return (
    <article className="card">
      <h3>Live Result</h3>
      <p className="tiny">
        Model: <strong>{result.modelUsed}</strong> · {formatTokenUsage(result.completionTokens, result.maxTokens)}
      </p>
      {result.reasoning ? <pre className="trace-block">{result.reasoning}</pre> : null}
      <p className="answer-line">{result.text}</p>
      <AttemptList result={result} />
    </article>
  );
}

function AttemptList({ result }: { result: GenerationResult }) {
  if (result.attempts.length === 0) return null;
  return (
    <ol className="attempts">
      {result.attempts.map((attempt) => (
        <li key={attempt.model} className={attempt.ok ? "good" : "bad"}>
          {attempt.model}: {attempt.ok ? "answered" : `${attempt.errorKind ?? "failed"} (${attempt.message ?? "no detail"})`}
        </li>
      ))}
    </ol>
  );
}

export default function HomePage() {
  const caseStudies = listCaseStudies();
  const [caseName, setCaseName] = useState<string>(caseStudies[0]?.name ?? "");
  const [level, setLevel] = useState<ThinkingLevel>("Low");
  const [customPrompt, setCustomPrompt] = useState<string>("");
  const [tokenBudget, setTokenBudget] = useState<number>(256);
  const [settings, setSettings] = useState<PublicSettings | null>(null);

  const [animatedTrace, setAnimatedTrace] = useState<string>("");
  const [liveResult, setLiveResult] = useState<GenerationResult | null>(null);
  const [isRunning, setIsRunning] = useState<boolean>(false);
  const [errorMessage, setErrorMessage] = useState<string | null>(null);
  const [showAbout, setShowAbout] = useState<boolean>(false);

  const selectedCase = useMemo(() => findCaseStudy(caseName), [caseName]);
  const maxBudget = settings?.maxTokenBudget ?? FALLBACK_MAX_BUDGET;
  const usingCustomPrompt = customPrompt.trim().length > 0;

  const recordedTier = useMemo<BudgetTier | null>(() => {
    if (!selectedCase) return null;
    try {
      return tierForLevel(selectedCase, level);
    } catch {
      return null;
    }
  }, [selectedCase, level]);

  useEffect(() => {
    let active = true;
    requestJSON<PublicSettings>("/api/settings")
      .then((loaded) => {
        if (!active) return;
        setSettings(loaded);
      })
      .catch((error: unknown) => {
        if (active) setErrorMessage(error instanceof Error ? error.message : "Unable to load settings.");
      });
    return () => {
      active = false;
    };
  }, []);

  useEffect(() => {
    if (!settings) return;
    setTokenBudget(initialBudgetFor(selectedCase, settings.defaultTokenBudget, settings.maxTokenBudget));
  }, [selectedCase, settings]);

  useEffect(() => {
    setAnimatedTrace("");
    if (!recordedTier || usingCustomPrompt) return;

    const frames = typingFrames(recordedTier.response);
    const timer = window.setInterval(() => {
      const next = frames.next();
      if (next.done) {
        window.clearInterval(timer);
        return;
      }
      setAnimatedTrace(next.value);
    }, TYPING_INTERVAL_MS);

    return () => window.clearInterval(timer);
  }, [recordedTier, usingCustomPrompt]);

  async function runGeneration() {
    const prompt = usingCustomPrompt ? customPrompt.trim() : selectedCase?.prompt ?? "";
    const budget = usingCustomPrompt || !selectedCase ? tokenBudget : budgetForLevel(selectedCase, level);

    setIsRunning(true);
    setErrorMessage(null);
    setLiveResult(null);
    try {
      const result = await requestJSON<GenerationResult>("/api/generate", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ prompt, tokenBudget: budget })
      });
      setLiveResult(result);
    } catch (error) {
      setErrorMessage(error instanceof Error ? error.message : "Generation failed.");
    } finally {
      setIsRunning(false);
    }
  }

  return (
    <main className="shell">
      <section className="top-band">
        <div>
          <h1 className="app-title">Budget-Aware LLM Reasoning</h1>
          <p className="app-subtitle">Explore how thinking budgets affect AI reasoning quality</p>
        </div>
        <div className="row-actions">
          <button onClick={() => setShowAbout(true)}>About</button>
        </div>
      </section>

      {errorMessage ? <p className="error-line">{errorMessage}</p> : null}

      <section className="control-band">
        <article className="card">
          <h3>Configuration</h3>
          <div className="field-block">
            <label htmlFor="case-study">Case Study</label>
            <select id="case-study" value={caseName} onChange={(event) => setCaseName(event.target.value)}>
              {caseStudies.map((caseStudy) => (
                <option key={caseStudy.name} value={caseStudy.name}>
                  {caseStudy.name}
                </option>
              ))}
            </select>
          </div>

          <fieldset className="field-block">
            <legend>Thinking Level</legend>
            {thinkingLevels.map((option) => (
              <label key={option} className="radio">
                <input
                  type="radio"
                  name="thinking-level"
                  value={option}
                  checked={level === option}
                  onChange={() => setLevel(option)}
                />
                {option}
              </label>
            ))}
          </fieldset>

          <div className="field-block">
            <label htmlFor="custom-prompt">Custom Prompt (optional)</label>
            <textarea
              id="custom-prompt"
              rows={3}
              value={customPrompt}
              onChange={(event) => setCustomPrompt(event.target.value)}
              placeholder="Enter your own prompt here..."
            />
          </div>

          <div className="field-block">
            <label htmlFor="token-budget">Token Budget</label>
            <input
              id="token-budget"
              type="number"
              min={1}
              max={maxBudget}
              value={tokenBudget}
              onChange={(event) => setTokenBudget(Math.max(1, Math.min(maxBudget, Math.floor(Number(event.target.value)) || 1)))}
              disabled={isRunning || !usingCustomPrompt}
            />
          </div>

          <div className="row-actions">
            <button className="primary" onClick={() => void runGeneration()} disabled={isRunning || (!usingCustomPrompt && !selectedCase)}>
              {isRunning ? "Generating..." : usingCustomPrompt ? "Generate" : "Run Case Study Live"}
            </button>
          </div>
          <p className="tiny">
            Models: {settings ? settings.modelCandidates.join(" → ") : "loading..."}
            {settings && !settings.credentialConfigured ? " (HF_TOKEN not configured)" : ""}
          </p>
        </article>

        <article className="card">
          <h3>Current Problem</h3>
          {usingCustomPrompt ? (
            <p>{customPrompt.trim()}</p>
          ) : selectedCase ? (
            <>
              <p>
                <strong>{selectedCase.description}</strong>
              </p>
              <p>
                <em>Prompt:</em> {selectedCase.prompt}
              </p>
            </>
          ) : (
            <p className="error-line">Case study not found.</p>
          )}
        </article>
      </section>

      {!usingCustomPrompt && selectedCase ? (
        <section className="card">
          <h3>Recorded Reasoning Trace</h3>
          {recordedTier ? (
            <>
              <pre className="trace-block typing">{animatedTrace}</pre>
              <div className="metrics">
                <span>Token Usage: {formatTokenUsage(recordedTier.tokens, recordedTier.budget)}</span>
                <span>Final Answer: {recordedTier.answer}</span>
              </div>
            </>
          ) : (
            <p className="error-line">Invalid case study data.</p>
          )}
        </section>
      ) : null}

      {liveResult ? <LiveResultPanel result={liveResult} /> : null}

      {showAbout ? <SectionDocModal title="What is this about?" body={aboutText} onClose={() => setShowAbout(false)} /> : null}
    </main>
  );
}
