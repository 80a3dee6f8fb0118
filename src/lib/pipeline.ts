import type { CompletionClient } from "./ai/index.js";
import { extractDetails } from "./detailsExtractor.js";
import { extractText, parseFormat } from "./extract.js";
import { normalizeText } from "./normalize.js";
import { renderSpreadsheet } from "./spreadsheet.js";
import type { ProcessedTranscript } from "./types.js";

/**
 * Uploaded transcript to project details and a rendered workbook.
 * Stages run in sequence; a failure anywhere produces nothing.
 */
export async function processTranscript(
  bytes: Buffer,
  extension: string,
  client: CompletionClient
): Promise<ProcessedTranscript> {
  const format = parseFormat(extension);
  const rawText = await extractText(bytes, format);
  const cleanedText = normalizeText(rawText);
  const outcome = await extractDetails(cleanedText, client);
  const spreadsheet = await renderSpreadsheet(outcome.details);
  return { outcome, spreadsheet };
}
