import path from "node:path";
import { LoadError, SaveError, describeError } from "../core/errors";
import { readTextIfExists, writeFileAtomic } from "../core/files";
import { parseRecordsCsv, recordsToCsv } from "../records";
import { ResultRecord } from "../types";

export class MasterDataset {
  readonly path: string;

  constructor(filePath: string) {
    this.path = path.resolve(filePath);
  }

  /** A missing file is an empty dataset; an unparseable one is fatal. */
  async read(): Promise<ResultRecord[]> {
    let text: string | undefined;
    try {
      text = await readTextIfExists(this.path);
    } catch (error) {
      throw new LoadError(`Cannot read master dataset ${this.path}: ${describeError(error)}`, this.path, { cause: error });
    }
    if (text === undefined) {
      return [];
    }

    try {
      return parseRecordsCsv(text);
    } catch (error) {
      throw new LoadError(`Master dataset ${this.path} is corrupt: ${describeError(error)}`, this.path, { cause: error });
    }
  }

  async write(records: readonly ResultRecord[]): Promise<void> {
    try {
      await writeFileAtomic(this.path, recordsToCsv(records));
    } catch (error) {
      throw new SaveError(`Cannot write master dataset ${this.path}: ${describeError(error)}`, this.path, { cause: error });
    }
  }
}
