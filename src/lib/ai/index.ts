import type { AppConfig } from "../config.js";
import { OpenAICompletionClient } from "./openai.js";

/**
 * One prompt in, the model's raw text out. Tests substitute a stub.
 */
export interface CompletionClient {
  readonly provider: string;
  readonly model: string;
  readonly configured: boolean;
  complete(prompt: string): Promise<string>;
}

export function createCompletionClient(config: AppConfig): CompletionClient {
  return new OpenAICompletionClient({
    apiKey: config.openaiApiKey,
    baseURL: config.openaiBaseUrl,
    caBundlePath: config.caBundlePath
  });
}
