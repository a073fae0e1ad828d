import path from "node:path";
import { parse as parseCsv } from "csv-parse/sync";
import ExcelJS from "exceljs";

import type { GradeRecord, TermRecord } from "../rag/types";
import { GRADE_VALUES } from "../rag/types";

export type CtcaeTermsDocument = {
  version: string;
  terms: TermRecord[];
  categories: string[];
};

type SheetRow = Record<string, string>;

export const DEFAULT_CTCAE_VERSION = "5.0";

const REQUIRED_HEADERS = [
  "MedDRA Code",
  "CTCAE Term",
  "Grade 1",
  "Grade 2",
  "Grade 3",
  "Grade 4",
  "Grade 5",
] as const;

function cell(row: SheetRow, header: string): string {
  return (row[header] ?? "").trim();
}

function hasRequiredHeaders(headers: string[]): boolean {
  return REQUIRED_HEADERS.every((header) => headers.includes(header));
}

function missingHeaders(headers: string[]): string[] {
  return REQUIRED_HEADERS.filter((header) => !headers.includes(header));
}

function toTermRecord(row: SheetRow): TermRecord | null {
  const ctcae_term = cell(row, "CTCAE Term");
  if (!ctcae_term) return null;

  const grades: GradeRecord[] = [];
  for (const grade of GRADE_VALUES) {
    const description = cell(row, `Grade ${grade}`);
    // "-" marks a grade that does not apply to the term
    if (!description || description === "-") continue;
    grades.push({ grade, description });
  }
  if (grades.length === 0) return null;

  const term: TermRecord = {
    meddra_code: cell(row, "MedDRA Code"),
    meddra_soc: cell(row, "MedDRA SOC"),
    ctcae_term,
    definition: cell(row, "Definition"),
    grades,
  };
  const note = cell(row, "Navigational Note");
  if (note) term.navigational_note = note;
  return term;
}

/**
 * Turns sheet rows into the canonical terms document. Rows without a term
 * name or without any grade are skipped.
 */
export function buildTermsDocument(rows: SheetRow[], version = DEFAULT_CTCAE_VERSION): CtcaeTermsDocument {
  const terms = rows.map(toTermRecord).filter((term): term is TermRecord => term !== null);
  const categories = Array.from(new Set(terms.map((term) => term.meddra_soc).filter(Boolean))).sort();
  return { version, terms, categories };
}

function cellText(value: unknown): string {
  return value === null || value === undefined ? "" : String(value).trim();
}

/**
 * Parses a CSV export of the CTCAE sheet. Throws when a required column
 * is missing.
 */
export function parseCtcaeCsv(text: string, version = DEFAULT_CTCAE_VERSION): CtcaeTermsDocument {
  const records: unknown = parseCsv(text, { bom: true, skip_empty_lines: true, relax_column_count: true });
  const lines: unknown[][] = Array.isArray(records) ? records.filter(Array.isArray) : [];
  const [headerLine = [], ...body] = lines;
  const headers = headerLine.map(cellText);
  if (!hasRequiredHeaders(headers)) {
    throw new Error(`CTCAE CSV is missing columns: ${missingHeaders(headers).join(", ")}`);
  }

  const rows = body.map((line) => {
    const row: SheetRow = {};
    headers.forEach((header, i) => {
      if (header) row[header] = cellText(line[i]);
    });
    return row;
  });
  return buildTermsDocument(rows, version);
}

function cellToString(value: ExcelJS.CellValue): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object") {
    if ("richText" in value) return value.richText.map((part) => part.text).join("");
    if ("text" in value && typeof value.text === "string") return value.text;
    if ("result" in value && value.result !== null && value.result !== undefined) {
      return String(value.result);
    }
    return "";
  }
  return String(value);
}

function sheetRows(sheet: ExcelJS.Worksheet): { headers: string[]; rows: SheetRow[] } {
  const columnCount = sheet.columnCount;
  const headerRow = sheet.getRow(1);
  const headers: string[] = [];
  for (let col = 1; col <= columnCount; col++) {
    headers.push(cellToString(headerRow.getCell(col).value).trim());
  }

  const rows: SheetRow[] = [];
  for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber++) {
    const row = sheet.getRow(rowNumber);
    const values: SheetRow = {};
    let hasValues = false;
    for (let col = 1; col <= columnCount; col++) {
      const header = headers[col - 1];
      if (!header) continue;
      const value = cellToString(row.getCell(col).value);
      if (value !== "") hasValues = true;
      values[header] = value;
    }
    if (hasValues) rows.push(values);
  }
  return { headers, rows };
}

/**
 * Reads the first worksheet that carries the CTCAE columns.
 */
export async function parseCtcaeWorkbook(
  buffer: Buffer,
  version = DEFAULT_CTCAE_VERSION
): Promise<CtcaeTermsDocument> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(buffer);
  for (const sheet of workbook.worksheets) {
    const { headers, rows } = sheetRows(sheet);
    if (hasRequiredHeaders(headers)) {
      return buildTermsDocument(rows, version);
    }
  }
  throw new Error("Could not find CTCAE data in the workbook");
}

export async function parseCtcaeSource(
  filename: string,
  content: Buffer,
  version = DEFAULT_CTCAE_VERSION
): Promise<CtcaeTermsDocument> {
  const ext = path.extname(filename).toLowerCase();
  if (ext === ".csv") return parseCtcaeCsv(content.toString("utf8"), version);
  if (ext === ".xlsx") return parseCtcaeWorkbook(content, version);
  throw new Error(`Unsupported CTCAE source type: ${ext}`);
}
