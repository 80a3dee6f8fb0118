export type TranscriptFormat = "docx" | "pdf";

// Column order of the rendered sheet
export const PROJECT_FIELDS = [
  "ProjectName",
  "ClientName",
  "PropertyAddress",
  "ProjectManager",
  "RenovationAreas",
  "ScopeOfWork",
  "MaterialPreferences",
  "BudgetOrCost",
  "Timeline",
  "AdditionalNotes"
] as const;

export type ProjectField = (typeof PROJECT_FIELDS)[number];

export const NOT_PROVIDED = "Not provided";

/**
 * Record returned by the model. Keys and values are kept exactly as the model
 * produced them; coercion to cell text happens when the sheet is rendered.
 */
export type ProjectDetails = Readonly<Record<string, unknown>>;

export type ExtractionOutcome =
  | { kind: "parsed"; details: ProjectDetails }
  | { kind: "fallback"; details: ProjectDetails; rawOutput: string };

export interface SpreadsheetArtifact {
  fileName: string;
  mimeType: string;
  content: Buffer;
}

export interface ProcessedTranscript {
  outcome: ExtractionOutcome;
  spreadsheet: SpreadsheetArtifact;
}
