import Papa from "papaparse";
import { ResultRecord } from "../types";

/** Columns the extraction service is asked to return, in order. */
export const RESULT_COLUMNS = ["Name", "Category", "RaceName", "Event", "Location", "Rank", "Date"] as const;

export const PROVENANCE_COLUMN = "SourceUrl";

export const MASTER_COLUMNS = [...RESULT_COLUMNS, PROVENANCE_COLUMN] as const;

type ResultColumn = (typeof RESULT_COLUMNS)[number];
type MasterColumn = (typeof MASTER_COLUMNS)[number];

export type CsvRow = Record<string, string | undefined>;

export function recordKey(record: ResultRecord): string {
  return JSON.stringify([record.subjectName, record.eventName, record.discipline]);
}

function compareText(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

/** Orders by date, then race name, then athlete name, comparing code points. */
export function compareRecords(left: ResultRecord, right: ResultRecord): number {
  return (
    compareText(left.date, right.date) ||
    compareText(left.eventName, right.eventName) ||
    compareText(left.subjectName, right.subjectName)
  );
}

export function recordToRow(record: ResultRecord): string[] {
  return [
    record.subjectName,
    record.category,
    record.eventName,
    record.discipline,
    record.location,
    record.rank,
    record.date,
    record.sourceLocator,
  ];
}

function cell(row: CsvRow, column: ResultColumn | MasterColumn): string {
  return (row[column] ?? "").trim();
}

export function rowToRecord(row: CsvRow, sourceLocator?: string): ResultRecord {
  return {
    subjectName: cell(row, "Name"),
    category: cell(row, "Category"),
    eventName: cell(row, "RaceName"),
    discipline: cell(row, "Event"),
    location: cell(row, "Location"),
    rank: cell(row, "Rank"),
    date: cell(row, "Date"),
    sourceLocator: sourceLocator ?? cell(row, PROVENANCE_COLUMN),
  };
}

/** Maps header spellings such as "racename" or " Rank " onto the canonical column names. */
function canonicalHeader(header: string): string {
  const trimmed = header.trim();
  const match = MASTER_COLUMNS.find((column) => column.toLowerCase() === trimmed.toLowerCase());
  return match ?? trimmed;
}

export interface ParsedCsv {
  fields: string[];
  rows: CsvRow[];
}

export function parseCsv(text: string, requiredColumns: readonly string[]): ParsedCsv {
  const result = Papa.parse<CsvRow>(text, {
    header: true,
    delimiter: ",",
    skipEmptyLines: "greedy",
    transformHeader: canonicalHeader,
  });

  if (result.errors.length > 0) {
    const first = result.errors[0];
    const where = first.row !== undefined ? ` (row ${first.row + 1})` : "";
    throw new Error(`CSV ${first.code}${where}: ${first.message}`);
  }

  const fields = result.meta.fields ?? [];
  const missing = requiredColumns.filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    throw new Error(`CSV header is missing column(s): ${missing.join(", ")}`);
  }

  return { fields, rows: result.data };
}

/** Parses a master or staged file. Blank text is an empty record set. */
export function parseRecordsCsv(text: string): ResultRecord[] {
  if (text.trim() === "") {
    return [];
  }
  return parseCsv(text, MASTER_COLUMNS).rows.map((row) => rowToRecord(row));
}

export function recordsToCsv(records: readonly ResultRecord[]): string {
  const rows: string[][] = [[...MASTER_COLUMNS], ...records.map(recordToRow)];
  return `${Papa.unparse(rows, { newline: "\n" })}\n`;
}
