import { extractDocxText } from "./docx.js";
import { UnsupportedFormatError } from "./errors.js";
import { extractPdfText } from "./pdf.js";
import type { TranscriptFormat } from "./types.js";

/**
 * Map a file extension (".DOCX", "pdf", ...) to a transcript format.
 */
export function parseFormat(extension: string): TranscriptFormat {
  const ext = extension.trim().toLowerCase().replace(/^\./, "");
  if (ext === "docx" || ext === "pdf") return ext;
  throw new UnsupportedFormatError(extension);
}

export async function extractText(bytes: Buffer, format: string): Promise<string> {
  if (format === "docx") return extractDocxText(bytes);
  if (format === "pdf") return extractPdfText(bytes);
  throw new UnsupportedFormatError(format);
}
