import { InputError, StateTransitionError } from "../core/errors";
import { TARGET_STATUSES, TargetStatus } from "../types";

export type TargetEvent = "begin" | "succeed" | "fail" | "release";

const TRANSITIONS: Record<TargetStatus, Partial<Record<TargetEvent, TargetStatus>>> = {
  queued: { begin: "processing" },
  failed: { begin: "processing" },
  processing: { succeed: "processed", fail: "failed", release: "queued" },
  processed: {},
};

export function parseTargetStatus(raw: unknown): TargetStatus {
  const match = TARGET_STATUSES.find((status) => status === raw);
  if (!match) {
    throw new InputError(`Unrecognized target status: ${JSON.stringify(raw)}`);
  }
  return match;
}

export function canTransition(from: TargetStatus, event: TargetEvent): boolean {
  return TRANSITIONS[from][event] !== undefined;
}

export function transition(from: TargetStatus, event: TargetEvent): TargetStatus {
  const next = TRANSITIONS[from][event];
  if (!next) {
    throw new StateTransitionError(`Cannot apply '${event}' to a target in status '${from}'`);
  }
  return next;
}

export function isSelectableStatus(status: TargetStatus): boolean {
  return canTransition(status, "begin");
}
