import { RESULT_COLUMNS } from "../records";
import { MonitoringCriteria } from "../types";

export interface ExtractionPrompt {
  system: string;
  user: string;
}

const SYSTEM_PROMPT = [
  "You extract data from ski race result lists.",
  "Answer with CSV only: no introductory text, no explanations, no markdown.",
].join(" ");

export function buildPrompt(criteria: MonitoringCriteria, documentText: string): ExtractionPrompt {
  const parts: string[] = ["Extract every result for the following clubs and athletes from the result list below."];

  if (criteria.groups.length > 0) {
    parts.push(`Clubs to extract: ${criteria.groups.join(", ")}`);
  }
  if (criteria.names.length > 0) {
    parts.push("Athletes to extract:");
    for (const name of criteria.names) {
      parts.push(`- ${name}`);
    }
  }

  parts.push(
    "",
    `Format the output as CSV with exactly these headers: ${RESULT_COLUMNS.join(",")}`,
    "Use YYYY-MM-DD for Date. Use the placing number for Rank, or DNF, DNS, DSQ when the athlete has no placing.",
    "If nobody matches, return only the header line.",
    "",
    "--- RESULT LIST ---",
    documentText,
  );

  return { system: SYSTEM_PROMPT, user: parts.join("\n") };
}
