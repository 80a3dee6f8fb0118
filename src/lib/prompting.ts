import { PROJECT_FIELDS, type ProjectField } from "./types.js";

const FIELD_GUIDANCE: Record<ProjectField, string> = {
  ProjectName: `If not mentioned, return "Not provided"`,
  ClientName: `If not mentioned, return "Not provided"`,
  PropertyAddress: `If not mentioned, return "Not provided"`,
  ProjectManager: `If not mentioned, return "Not provided"`,
  RenovationAreas: `List or describe the rooms/areas, e.g., "Kitchen, Bathroom"`,
  ScopeOfWork: "Summarize all renovation tasks or goals",
  MaterialPreferences: "List any specific materials or design preferences",
  BudgetOrCost: "Any budget or cost references",
  Timeline: "Any schedule or start/end dates mentioned",
  AdditionalNotes: "Extra details like permit requirements, constraints, etc."
};

/**
 * Instruction prompt asking the model for one JSON object with the ten
 * project fields. The transcript is inserted as-is.
 */
export function buildExtractionPrompt(transcriptText: string): string {
  const fieldsList = PROJECT_FIELDS.map(
    (field, i) => `${i + 1}. "${field}": (${FIELD_GUIDANCE[field]})`
  ).join("\n");

  return `You are an AI assistant extracting renovation details from a client transcript.
Please carefully analyze the conversation and return a JSON object with these keys:

${fieldsList}

Transcript:
${transcriptText}

Return only valid JSON with exactly the keys:
${PROJECT_FIELDS.join(", ")}.
`;
}
