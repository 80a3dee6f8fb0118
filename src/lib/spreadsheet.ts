import ExcelJS, { type Borders } from "exceljs";
import { NOT_PROVIDED, PROJECT_FIELDS, type ProjectDetails, type SpreadsheetArtifact } from "./types.js";

export const SHEET_NAME = "Renovation Data";
export const SPREADSHEET_FILE_NAME = "Renovation_Extracted_Details.xlsx";
export const SPREADSHEET_MIME_TYPE = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

const COLUMN_WIDTH = 25;
const HEADER_HEIGHT = 25;

const thinBorder: Partial<Borders> = {
  top: { style: "thin" },
  left: { style: "thin" },
  bottom: { style: "thin" },
  right: { style: "thin" }
};

/**
 * Text written to a data cell. Lists become "a, b"; a missing value reads
 * as "Not provided".
 */
export function formatCellValue(value: unknown): string {
  if (value === undefined || value === null) return NOT_PROVIDED;
  if (Array.isArray(value)) return value.map((v) => (typeof v === "string" ? v : formatCellValue(v))).join(", ");
  if (typeof value === "string") return value;
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

export async function renderSpreadsheet(details: ProjectDetails): Promise<SpreadsheetArtifact> {
  const workbook = new ExcelJS.Workbook();
  const ws = workbook.addWorksheet(SHEET_NAME, {
    views: [{ state: "frozen", xSplit: 0, ySplit: 1, topLeftCell: "A2" }]
  });

  const headerRow = ws.getRow(1);
  const valueRow = ws.getRow(2);

  PROJECT_FIELDS.forEach((field, i) => {
    const col = i + 1;
    ws.getColumn(col).width = COLUMN_WIDTH;

    const header = headerRow.getCell(col);
    header.value = field;
    header.font = { bold: true, color: { argb: "FFFFFFFF" } };
    header.fill = { type: "pattern", pattern: "solid", fgColor: { argb: "FF4F81BD" } };
    header.alignment = { horizontal: "center", vertical: "middle" };
    header.border = thinBorder;

    const cell = valueRow.getCell(col);
    cell.value = formatCellValue(details[field]);
    cell.alignment = { wrapText: true, vertical: "top" };
    cell.border = thinBorder;
  });
  headerRow.height = HEADER_HEIGHT;

  const content = Buffer.from(await workbook.xlsx.writeBuffer());
  return { fileName: SPREADSHEET_FILE_NAME, mimeType: SPREADSHEET_MIME_TYPE, content };
}
