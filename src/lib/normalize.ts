// Collapse every whitespace run (newlines and tabs included) to one space.
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
