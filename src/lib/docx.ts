import mammoth from "mammoth";

/**
 * Paragraph texts of a .docx in document order. mammoth ends every
 * paragraph with a blank line.
 */
export async function extractDocxText(bytes: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer: bytes });
  return result.value;
}
