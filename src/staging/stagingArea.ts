import fs from "node:fs";
import path from "node:path";
import { MergeIntegrityError, describeError } from "../core/errors";
import { isNotFound, writeFileAtomic } from "../core/files";
import { parseRecordsCsv, recordsToCsv } from "../records";
import { ResultRecord, StagedResultSet } from "../types";

export interface StagedFile {
  name: string;
  path: string;
  modifiedAtMs: number;
}

const STAGED_EXTENSION = ".csv";

const SAFE_CHARACTER = /^[\w.-]$/;

/** Percent-encodes every UTF-8 byte outside `[\w.-]` (`%` included), so distinct ids never share a file. */
export function stagedFileName(targetId: string): string {
  let name = "";
  for (const character of targetId) {
    if (SAFE_CHARACTER.test(character)) {
      name += character;
      continue;
    }
    for (const byte of Buffer.from(character, "utf-8")) {
      name += `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
    }
  }
  return `${name}${STAGED_EXTENSION}`;
}

/** One CSV per target id, waiting for the next merge. */
export class StagingArea {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = path.resolve(dir);
  }

  pathFor(targetId: string): string {
    return path.join(this.dir, stagedFileName(targetId));
  }

  async write(set: StagedResultSet): Promise<string> {
    const filePath = this.pathFor(set.targetId);
    const records = set.records.map((record) => ({ ...record, sourceLocator: set.locator }));
    await writeFileAtomic(filePath, recordsToCsv(records));
    return filePath;
  }

  /** Staged files ordered by modification time, then name, so later extractions are encountered later. */
  async list(): Promise<StagedFile[]> {
    let names: string[];
    try {
      names = await fs.promises.readdir(this.dir);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const files: StagedFile[] = [];
    for (const name of names) {
      if (!name.endsWith(STAGED_EXTENSION)) {
        continue;
      }
      const filePath = path.join(this.dir, name);
      const stats = await fs.promises.stat(filePath);
      if (stats.isFile()) {
        files.push({ name, path: filePath, modifiedAtMs: stats.mtimeMs });
      }
    }

    return files.sort((left, right) => {
      if (left.modifiedAtMs !== right.modifiedAtMs) {
        return left.modifiedAtMs - right.modifiedAtMs;
      }
      return left.name < right.name ? -1 : left.name > right.name ? 1 : 0;
    });
  }

  async read(file: StagedFile): Promise<ResultRecord[]> {
    try {
      const text = await fs.promises.readFile(file.path, "utf-8");
      return parseRecordsCsv(text);
    } catch (error) {
      throw new MergeIntegrityError(file.path, `Staged file ${file.name} is unreadable: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  async remove(file: StagedFile): Promise<void> {
    await fs.promises.rm(file.path, { force: true });
  }

  /** Moves the file aside as `<name>.<stamp>`, so earlier quarantined copies of the same target are kept. */
  async quarantine(file: StagedFile, quarantineDir: string, stamp: string): Promise<string> {
    const destinationDir = path.resolve(quarantineDir);
    await fs.promises.mkdir(destinationDir, { recursive: true });
    const destination = path.join(destinationDir, `${file.name}.${stamp.replace(/[^\w-]/g, "-")}`);
    try {
      await fs.promises.rename(file.path, destination);
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "EXDEV")) {
        throw error;
      }
      await fs.promises.copyFile(file.path, destination);
      await fs.promises.rm(file.path);
    }
    return destination;
  }
}
