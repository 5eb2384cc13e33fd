import { z } from "zod";
import { LoadError, describeError } from "../core/errors";
import { parseTargetStatus } from "../scheduler/stateMachine";
import { parseTimestamp } from "../scheduler/scheduler";
import { CrawlTarget } from "../types";

const windowSchema = z.object({
  validFrom: z.string().nullable(),
  validUntil: z.string().nullable(),
});

const trackingSchema = z.object({
  createdAt: z.string(),
  updatedAt: z.string(),
  lastAttemptAt: z.string().nullable(),
  succeededAt: z.string().nullable(),
  attemptCount: z.number().int().nonnegative(),
});

const targetSchema = z.object({
  id: z.string(),
  locator: z.string(),
  status: z.unknown(),
  window: windowSchema,
  tracking: trackingSchema,
  event: z.object({ startDate: z.string(), endDate: z.string() }).optional(),
  contentHash: z.string().optional(),
});

export const targetListSchema = z.array(targetSchema);

type RawTarget = z.infer<typeof targetSchema>;

function toTarget(raw: RawTarget): CrawlTarget {
  if (raw.window.validFrom !== null) {
    parseTimestamp(raw.window.validFrom, "validFrom");
  }
  if (raw.window.validUntil !== null) {
    parseTimestamp(raw.window.validUntil, "validUntil");
  }

  const target: CrawlTarget = {
    id: raw.id,
    locator: raw.locator,
    status: parseTargetStatus(raw.status),
    window: { ...raw.window },
    tracking: { ...raw.tracking },
  };
  if (raw.event) {
    target.event = { ...raw.event };
  }
  if (raw.contentHash) {
    target.contentHash = raw.contentHash;
  }
  return target;
}

export function decodeTargets(input: unknown, source: string): CrawlTarget[] {
  const parsed = targetListSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new LoadError(`Corrupt target list in ${source}: [${issue.path.join(".")}] ${issue.message}`, source);
  }

  const seen = new Set<string>();
  return parsed.data.map((raw, index) => {
    if (raw.id.trim() !== "") {
      if (seen.has(raw.id)) {
        throw new LoadError(`Duplicate target id '${raw.id}' in ${source}`, source);
      }
      seen.add(raw.id);
    }

    try {
      return toTarget(raw);
    } catch (error) {
      throw new LoadError(`Invalid target at index ${index} in ${source}: ${describeError(error)}`, source, {
        cause: error,
      });
    }
  });
}
