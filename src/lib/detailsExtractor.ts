import type { CompletionClient } from "./ai/index.js";
import { buildExtractionPrompt } from "./prompting.js";
import { NOT_PROVIDED, PROJECT_FIELDS, type ExtractionOutcome, type ProjectDetails } from "./types.js";

export function fallbackDetails(): ProjectDetails {
  return Object.freeze(Object.fromEntries(PROJECT_FIELDS.map((field) => [field, NOT_PROVIDED])));
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    if (err instanceof SyntaxError) return undefined;
    throw err;
  }
}

/**
 * Interpret the model's reply. A JSON object is taken as-is; anything else
 * yields the all-"Not provided" record together with the raw reply.
 */
export function parseModelOutput(raw: string): ExtractionOutcome {
  const rawOutput = raw.trim();
  const parsed = tryParseJson(rawOutput);
  if (isPlainObject(parsed)) {
    return { kind: "parsed", details: Object.freeze(parsed) };
  }
  return { kind: "fallback", details: fallbackDetails(), rawOutput };
}

export async function extractDetails(
  transcriptText: string,
  client: CompletionClient
): Promise<ExtractionOutcome> {
  const prompt = buildExtractionPrompt(transcriptText);
  const output = await client.complete(prompt);
  const outcome = parseModelOutput(output);

  if (outcome.kind === "fallback") {
    console.warn(`Could not parse ${client.model} output as a JSON object; using fallback record. Raw output:\n${outcome.rawOutput}`);
  }
  return outcome;
}
