import OpenAI from "openai";
import { CompletionNotConfiguredError } from "../errors.js";
import { createHttpsAgent } from "../httpAgent.js";
import type { CompletionClient } from "./index.js";

export const OPENAI_MODEL = "gpt-4";
export const OPENAI_TEMPERATURE = 0.2;

export interface OpenAICompletionOptions {
  apiKey?: string;
  baseURL?: string;
  caBundlePath?: string;
}

export class OpenAICompletionClient implements CompletionClient {
  readonly provider = "openai";
  readonly model = OPENAI_MODEL;
  private readonly client: OpenAI | null;

  constructor(opts: OpenAICompletionOptions) {
    this.client = opts.apiKey
      ? new OpenAI({
          apiKey: opts.apiKey,
          baseURL: opts.baseURL,
          maxRetries: 0,
          httpAgent: opts.caBundlePath ? createHttpsAgent(opts.caBundlePath) : undefined
        })
      : null;
  }

  get configured(): boolean {
    return this.client !== null;
  }

  async complete(prompt: string): Promise<string> {
    if (!this.client) throw new CompletionNotConfiguredError();

    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      temperature: OPENAI_TEMPERATURE
    });

    return completion.choices[0]?.message?.content?.trim() ?? "";
  }
}
