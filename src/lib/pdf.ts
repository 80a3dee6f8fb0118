import pdf from "pdf-parse/lib/pdf-parse.js";

/**
 * Extract plain text from a PDF buffer using pdf-parse.
 * Pages are rendered in document order; a page with no text layer
 * contributes an empty string. Runs locally (no network).
 */
export async function extractPdfText(bytes: Buffer): Promise<string> {
  const data = await pdf(bytes);
  return data.text || "";
}
