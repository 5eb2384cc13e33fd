import fs from "node:fs";
import path from "node:path";
import { LoadError, SaveError, describeError } from "../core/errors";
import { readTextIfExists, writeFileAtomic } from "../core/files";
import { CrawlTarget } from "../types";
import { decodeTargets } from "./targetCodec";
import { TargetStore } from "./types";

export class JsonFileTargetStore implements TargetStore {
  readonly location: string;

  constructor(filePath: string) {
    this.location = path.resolve(filePath);
  }

  async exists(): Promise<boolean> {
    return fs.existsSync(this.location);
  }

  async load(): Promise<CrawlTarget[]> {
    let raw: string | undefined;
    try {
      raw = await readTextIfExists(this.location);
    } catch (error) {
      throw new LoadError(`Cannot read target list ${this.location}: ${describeError(error)}`, this.location, {
        cause: error,
      });
    }
    if (raw === undefined) {
      throw new LoadError(`Target list not found: ${this.location}`, this.location);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new LoadError(`Target list is not valid JSON: ${this.location}`, this.location, { cause: error });
    }
    return decodeTargets(parsed, this.location);
  }

  async save(targets: readonly CrawlTarget[]): Promise<void> {
    try {
      await writeFileAtomic(this.location, `${JSON.stringify(targets, null, 2)}\n`);
    } catch (error) {
      throw new SaveError(`Cannot save target list ${this.location}: ${describeError(error)}`, this.location, {
        cause: error,
      });
    }
  }

  async close(): Promise<void> {
    return;
  }
}
