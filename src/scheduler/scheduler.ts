import { InputError } from "../core/errors";
import { CrawlTarget, CrawlWindow } from "../types";
import { isSelectableStatus } from "./stateMachine";

export type SkipReason = "status" | "window";

export interface SkippedTarget {
  target: CrawlTarget;
  reason: SkipReason;
}

export interface Selection {
  selected: CrawlTarget[];
  skipped: SkippedTarget[];
}

export function parseTimestamp(value: string, field: string): number {
  const millis = Date.parse(value);
  if (Number.isNaN(millis)) {
    throw new InputError(`Invalid ${field} timestamp: ${value}`);
  }
  return millis;
}

/** Inclusive at both bounds; a window missing either bound is unrestricted. */
export function isWithinWindow(window: CrawlWindow, now: Date): boolean {
  if (window.validFrom === null || window.validUntil === null) {
    return true;
  }
  const from = parseTimestamp(window.validFrom, "validFrom");
  const until = parseTimestamp(window.validUntil, "validUntil");
  const current = now.getTime();
  return from <= current && current <= until;
}

export function skipReasonFor(target: CrawlTarget, now: Date): SkipReason | undefined {
  if (!isSelectableStatus(target.status)) {
    return "status";
  }
  if (!isWithinWindow(target.window, now)) {
    return "window";
  }
  return undefined;
}

export function isEligible(target: CrawlTarget, now: Date): boolean {
  return skipReasonFor(target, now) === undefined;
}

export function selectTargets(targets: readonly CrawlTarget[], now: Date): Selection {
  const selected: CrawlTarget[] = [];
  const skipped: SkippedTarget[] = [];

  for (const target of targets) {
    const reason = skipReasonFor(target, now);
    if (reason) {
      skipped.push({ target, reason });
    } else {
      selected.push(target);
    }
  }

  return { selected, skipped };
}
