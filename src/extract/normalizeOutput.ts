import { ExtractionError, describeError } from "../core/errors";
import { RESULT_COLUMNS, parseCsv, rowToRecord } from "../records";
import { ResultRecord } from "../types";

/**
 * Opening fence: three or more backticks or tildes, optionally followed by a
 * language tag (```csv, ~~~text, ```plaintext).
 */
const OPENING_FENCE = /^(`{3,}|~{3,})[\w+.-]*$/;
const CLOSING_FENCE = /^(`{3,}|~{3,})$/;

export function stripCodeFences(raw: string): string {
  const lines = raw
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "");

  if (lines.length > 0 && OPENING_FENCE.test(lines[0])) {
    lines.shift();
  }
  if (lines.length > 0 && CLOSING_FENCE.test(lines[lines.length - 1])) {
    lines.pop();
  }

  return lines.join("\n");
}

/**
 * Turns the extraction service's raw text into records. A header with no data
 * rows is a valid, empty answer; no header at all is not.
 */
export function normalizeExtractionOutput(raw: string, sourceLocator: string): ResultRecord[] {
  const cleaned = stripCodeFences(raw);
  if (cleaned === "") {
    throw new ExtractionError("Extraction service returned no CSV content");
  }

  let parsed;
  try {
    parsed = parseCsv(cleaned, RESULT_COLUMNS);
  } catch (error) {
    throw new ExtractionError(`Unparseable extraction output: ${describeError(error)}`, { cause: error });
  }

  return parsed.rows.map((row) => rowToRecord(row, sourceLocator));
}
