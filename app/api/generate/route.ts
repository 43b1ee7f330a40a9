import { NextRequest, NextResponse } from "next/server";
import { z } from "zod";
import { loadConfig } from "@/lib/config";
import { createDispatcher, validateGenerationRequest } from "@/lib/dispatcher";
import { InvalidRequestError, errorMessage } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

export const dynamic = "force-dynamic";

const GenerateRequestSchema = z.object({
  prompt: z.string({ required_error: "Prompt is required." }),
  tokenBudget: z.number({ required_error: "Token budget is required." }).finite()
});

export async function POST(request: NextRequest) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: "Request body must be JSON." }, { status: 400 });
  }

  const parsed = GenerateRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json({ error: parsed.error.issues[0]?.message ?? "Invalid request." }, { status: 400 });
  }

  try {
    const config = loadConfig(process.env);
    const { prompt, tokenBudget } = parsed.data;
    validateGenerationRequest(prompt, tokenBudget, config);

    const dispatcher = createDispatcher(config);
    const result = await dispatcher.generate(prompt, tokenBudget);
    return NextResponse.json(result);
  } catch (error) {
    if (error instanceof InvalidRequestError) {
      return NextResponse.json({ error: error.message }, { status: 400 });
    }
    createLogger("api.generate").error("generate request failed", { reason: errorMessage(error) });
    return NextResponse.json({ error: errorMessage(error) }, { status: 500 });
  }
}
