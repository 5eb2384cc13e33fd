import Papa from "papaparse";
import { InputError } from "../core/errors";
import { CsvRow } from "../records";
import { CrawlTarget } from "../types";

export interface CalendarOptions {
  idPrefix: string;
  /** Locator template; `{eventNo}` is replaced by the calendar's event number. */
  urlTemplate: string;
  eventColumn?: string;
  dateColumn?: string;
}

export interface RejectedCalendarRow {
  row: number;
  reason: string;
}

export interface CalendarTargets {
  targets: CrawlTarget[];
  rejected: RejectedCalendarRow[];
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function parseCalendarCsv(text: string, delimiter = ";"): CsvRow[] {
  const result = Papa.parse<CsvRow>(text, {
    header: true,
    delimiter,
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim(),
  });
  if (result.errors.length > 0) {
    const first = result.errors[0];
    throw new InputError(`Calendar CSV ${first.code}: ${first.message}`);
  }
  return result.data;
}

function parseEventDate(value: string): { year: number; month: number; day: number } | undefined {
  const match = ISO_DATE.exec(value);
  if (!match) {
    return undefined;
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return { year, month, day };
}

/** From the race day at midnight UTC until the same date a year later, end of day. */
export function crawlWindowFor(eventDate: string): { validFrom: string; validUntil: string } {
  const parsed = parseEventDate(eventDate);
  if (!parsed) {
    throw new InputError(`Invalid event date: ${eventDate}`);
  }
  const { year, month, day } = parsed;
  let until = new Date(Date.UTC(year + 1, month - 1, day, 23, 59, 59));
  if (until.getUTCMonth() !== month - 1) {
    // 29 February: clamp to the last day of February.
    until = new Date(Date.UTC(year + 1, month, 0, 23, 59, 59));
  }
  return {
    validFrom: new Date(Date.UTC(year, month - 1, day)).toISOString(),
    validUntil: until.toISOString(),
  };
}

export function buildTargetsFromCalendar(rows: readonly CsvRow[], options: CalendarOptions, now: Date): CalendarTargets {
  const eventColumn = options.eventColumn ?? "V-Nr";
  const dateColumn = options.dateColumn ?? "Datum";
  const createdAt = now.toISOString();
  const targets: CrawlTarget[] = [];
  const rejected: RejectedCalendarRow[] = [];

  rows.forEach((row, index) => {
    const eventNo = (row[eventColumn] ?? "").trim();
    const eventDate = (row[dateColumn] ?? "").trim();
    if (eventNo === "") {
      rejected.push({ row: index + 1, reason: `missing ${eventColumn}` });
      return;
    }
    if (!parseEventDate(eventDate)) {
      rejected.push({ row: index + 1, reason: `invalid ${dateColumn} '${eventDate}'` });
      return;
    }

    targets.push({
      id: `${options.idPrefix}${eventNo}`,
      locator: options.urlTemplate.split("{eventNo}").join(encodeURIComponent(eventNo)),
      status: "queued",
      window: crawlWindowFor(eventDate),
      tracking: {
        createdAt,
        updatedAt: createdAt,
        lastAttemptAt: null,
        succeededAt: null,
        attemptCount: 0,
      },
      event: { startDate: eventDate, endDate: eventDate },
    });
  });

  return { targets, rejected };
}

/** Appends generated targets whose id is not known yet; existing lifecycle state is never overwritten. */
export function mergeNewTargets(
  existing: readonly CrawlTarget[],
  generated: readonly CrawlTarget[],
): { targets: CrawlTarget[]; added: CrawlTarget[] } {
  const known = new Set(existing.map((target) => target.id));
  const added: CrawlTarget[] = [];
  for (const target of generated) {
    if (!known.has(target.id)) {
      known.add(target.id);
      added.push(target);
    }
  }
  return { targets: [...existing, ...added], added };
}
