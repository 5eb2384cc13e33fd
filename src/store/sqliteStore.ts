import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { LoadError, SaveError, describeError } from "../core/errors";
import { CrawlTarget } from "../types";
import { decodeTargets } from "./targetCodec";
import { TargetStore } from "./types";

type TargetRow = {
  position: number;
  id: string;
  locator: string;
  status: string;
  validFrom: string | null;
  validUntil: string | null;
  createdAt: string;
  updatedAt: string;
  lastAttemptAt: string | null;
  succeededAt: string | null;
  attemptCount: number;
  eventStartDate: string | null;
  eventEndDate: string | null;
  contentHash: string | null;
};

/**
 * Keeps the target list in a single table. `save` rewrites the table inside
 * one transaction, so a failed save leaves the previous list in place.
 */
export class SqliteTargetStore implements TargetStore {
  readonly location: string;
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    this.location = dbPath === ":memory:" ? dbPath : path.resolve(dbPath);
    if (this.location !== ":memory:") {
      fs.mkdirSync(path.dirname(this.location), { recursive: true });
    }
    this.db = new Database(this.location);
    if (this.location !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async exists(): Promise<boolean> {
    const row = this.db.prepare("SELECT COUNT(*) AS total FROM crawl_targets").get() as { total: number };
    return row.total > 0;
  }

  async load(): Promise<CrawlTarget[]> {
    let rows: TargetRow[];
    try {
      rows = this.db.prepare("SELECT * FROM crawl_targets ORDER BY position ASC").all() as TargetRow[];
    } catch (error) {
      throw new LoadError(`Cannot read targets from ${this.location}: ${describeError(error)}`, this.location, {
        cause: error,
      });
    }

    return decodeTargets(
      rows.map((row) => ({
        id: row.id,
        locator: row.locator,
        status: row.status,
        window: { validFrom: row.validFrom, validUntil: row.validUntil },
        tracking: {
          createdAt: row.createdAt,
          updatedAt: row.updatedAt,
          lastAttemptAt: row.lastAttemptAt,
          succeededAt: row.succeededAt,
          attemptCount: row.attemptCount,
        },
        event:
          row.eventStartDate !== null && row.eventEndDate !== null
            ? { startDate: row.eventStartDate, endDate: row.eventEndDate }
            : undefined,
        contentHash: row.contentHash ?? undefined,
      })),
      this.location,
    );
  }

  async save(targets: readonly CrawlTarget[]): Promise<void> {
    const insert = this.db.prepare(`
      INSERT INTO crawl_targets (
        position, id, locator, status, validFrom, validUntil,
        createdAt, updatedAt, lastAttemptAt, succeededAt, attemptCount,
        eventStartDate, eventEndDate, contentHash
      )
      VALUES (
        @position, @id, @locator, @status, @validFrom, @validUntil,
        @createdAt, @updatedAt, @lastAttemptAt, @succeededAt, @attemptCount,
        @eventStartDate, @eventEndDate, @contentHash
      )
    `);

    const replaceAll = this.db.transaction((items: readonly CrawlTarget[]) => {
      this.db.prepare("DELETE FROM crawl_targets").run();
      items.forEach((target, position) => {
        insert.run({
          position,
          id: target.id,
          locator: target.locator,
          status: target.status,
          validFrom: target.window.validFrom,
          validUntil: target.window.validUntil,
          createdAt: target.tracking.createdAt,
          updatedAt: target.tracking.updatedAt,
          lastAttemptAt: target.tracking.lastAttemptAt,
          succeededAt: target.tracking.succeededAt,
          attemptCount: target.tracking.attemptCount,
          eventStartDate: target.event?.startDate ?? null,
          eventEndDate: target.event?.endDate ?? null,
          contentHash: target.contentHash ?? null,
        });
      });
    });

    try {
      replaceAll(targets);
    } catch (error) {
      throw new SaveError(`Cannot save targets to ${this.location}: ${describeError(error)}`, this.location, {
        cause: error,
      });
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS crawl_targets (
        position INTEGER PRIMARY KEY,
        id TEXT NOT NULL,
        locator TEXT NOT NULL,
        status TEXT NOT NULL,
        validFrom TEXT,
        validUntil TEXT,
        createdAt TEXT NOT NULL,
        updatedAt TEXT NOT NULL,
        lastAttemptAt TEXT,
        succeededAt TEXT,
        attemptCount INTEGER NOT NULL DEFAULT 0,
        eventStartDate TEXT,
        eventEndDate TEXT,
        contentHash TEXT
      );
    `);
  }
}
