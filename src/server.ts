import "dotenv/config";
import path from "node:path";

import { createApp } from "./app.js";
import { createCompletionClient } from "./lib/ai/index.js";
import { loadConfig } from "./lib/config.js";

const config = loadConfig(process.env);
if (!config.openaiApiKey) {
  console.warn("Please set your OPENAI_API_KEY as an environment variable. Processing will fail until it is set.");
}

const app = createApp({
  completion: createCompletionClient(config),
  uploadLimitBytes: config.uploadLimitBytes,
  publicDir: path.join(process.cwd(), "public")
});

app.listen(config.port, () => {
  console.log(`renovation-transcript-extractor running on http://localhost:${config.port}`);
});
