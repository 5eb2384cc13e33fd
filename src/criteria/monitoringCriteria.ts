import path from "node:path";
import { z } from "zod";
import { InputError, LoadError, describeError } from "../core/errors";
import { readTextIfExists } from "../core/files";
import { MonitoringCriteria } from "../types";

const criteriaFileSchema = z.object({
  clubs: z.array(z.string()).default([]),
  athletes: z.array(z.string()).default([]),
});

function uniqueNonBlank(values: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed !== "") {
      seen.add(trimmed);
    }
  }
  return [...seen];
}

export function createCriteria(groups: readonly string[], names: readonly string[]): MonitoringCriteria {
  const criteria: MonitoringCriteria = {
    groups: Object.freeze(uniqueNonBlank(groups)),
    names: Object.freeze(uniqueNonBlank(names)),
  };
  if (criteria.groups.length === 0 && criteria.names.length === 0) {
    throw new InputError("Monitoring criteria name no clubs and no athletes");
  }
  return Object.freeze(criteria);
}

export function parseCriteria(input: unknown, source: string): MonitoringCriteria {
  const parsed = criteriaFileSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InputError(`Invalid monitoring criteria in ${source}: [${issue.path.join(".")}] ${issue.message}`);
  }
  return createCriteria(parsed.data.clubs, parsed.data.athletes);
}

export async function loadCriteria(filePath: string): Promise<MonitoringCriteria> {
  const absolutePath = path.resolve(filePath);
  let raw: string | undefined;
  try {
    raw = await readTextIfExists(absolutePath);
  } catch (error) {
    throw new LoadError(`Cannot read monitoring criteria ${absolutePath}: ${describeError(error)}`, absolutePath, {
      cause: error,
    });
  }
  if (raw === undefined) {
    throw new LoadError(`Monitoring criteria not found: ${absolutePath}`, absolutePath);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new LoadError(`Monitoring criteria is not valid JSON: ${absolutePath}`, absolutePath, { cause: error });
  }
  return parseCriteria(parsed, absolutePath);
}
