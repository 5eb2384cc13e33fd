import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { LoadError } from "../src/core/errors";
import { InMemoryTargetStore, JsonFileTargetStore, SqliteTargetStore, TargetStore } from "../src/store";
import { CrawlTarget } from "../src/types";
import { makeTarget, makeTempDir } from "./helpers";

const targets: CrawlTarget[] = [
  makeTarget({
    id: "race-1001",
    locator: "https://results.test/1001.pdf",
    window: { validFrom: "2025-03-08T00:00:00.000Z", validUntil: "2026-03-08T23:59:59.000Z" },
    event: { startDate: "2025-03-08", endDate: "2025-03-08" },
  }),
  makeTarget({
    id: "race-1002",
    locator: "https://results.test/1002.pdf",
    status: "processed",
    contentHash: "abc123",
    tracking: {
      createdAt: "2025-01-01T00:00:00.000Z",
      updatedAt: "2025-04-01T10:00:00.000Z",
      lastAttemptAt: "2025-04-01T10:00:00.000Z",
      succeededAt: "2025-04-01T10:00:00.000Z",
      attemptCount: 2,
    },
  }),
];

function writeJson(dir: string, value: unknown): string {
  const file = path.join(dir, "targets.json");
  fs.writeFileSync(file, JSON.stringify(value));
  return file;
}

describe("JsonFileTargetStore", () => {
  it("round-trips the target list", async () => {
    const store = new JsonFileTargetStore(path.join(makeTempDir(), "nested", "targets.json"));
    expect(await store.exists()).toBe(false);

    await store.save(targets);

    expect(await store.exists()).toBe(true);
    expect(await store.load()).toEqual(targets);
  });

  it("writes pretty-printed JSON and leaves no temporary file behind", async () => {
    const dir = makeTempDir();
    const store = new JsonFileTargetStore(path.join(dir, "targets.json"));
    await store.save([targets[0]]);

    expect(fs.readdirSync(dir)).toEqual(["targets.json"]);
    expect(fs.readFileSync(path.join(dir, "targets.json"), "utf-8")).toBe(`${JSON.stringify([targets[0]], null, 2)}\n`);
  });

  it("fails to load a missing list", async () => {
    const file = path.join(makeTempDir(), "targets.json");
    await expect(new JsonFileTargetStore(file).load()).rejects.toThrow(`Target list not found: ${file}`);
  });

  it("fails to load malformed JSON", async () => {
    const dir = makeTempDir();
    const file = path.join(dir, "targets.json");
    fs.writeFileSync(file, "[{");
    await expect(new JsonFileTargetStore(file).load()).rejects.toBeInstanceOf(LoadError);
  });

  it("rejects an unrecognized status", async () => {
    const file = writeJson(makeTempDir(), [{ ...targets[0], status: "done" }]);
    await expect(new JsonFileTargetStore(file).load()).rejects.toThrow(
      `Invalid target at index 0 in ${file}: Unrecognized target status: "done"`,
    );
  });

  it("rejects an unparseable window bound", async () => {
    const file = writeJson(makeTempDir(), [
      { ...targets[0], window: { validFrom: "next week", validUntil: "2026-01-01T00:00:00Z" } },
    ]);
    await expect(new JsonFileTargetStore(file).load()).rejects.toThrow("Invalid validFrom timestamp: next week");
  });

  it("rejects duplicate ids", async () => {
    const file = writeJson(makeTempDir(), [targets[0], targets[0]]);
    await expect(new JsonFileTargetStore(file).load()).rejects.toThrow(`Duplicate target id 'race-1001' in ${file}`);
  });

  it("rejects entries that are missing required fields", async () => {
    const file = writeJson(makeTempDir(), [{ id: "x", locator: "y", status: "queued" }]);
    await expect(new JsonFileTargetStore(file).load()).rejects.toThrow(/^Corrupt target list in /);
  });
});

describe("SqliteTargetStore", () => {
  const open: TargetStore[] = [];

  afterEach(async () => {
    for (const store of open.splice(0)) {
      await store.close();
    }
  });

  it("round-trips the target list in order", async () => {
    const store = new SqliteTargetStore(":memory:");
    open.push(store);
    expect(await store.exists()).toBe(false);
    expect(await store.load()).toEqual([]);

    await store.save([targets[1], targets[0]]);

    expect(await store.exists()).toBe(true);
    expect(await store.load()).toEqual([targets[1], targets[0]]);
  });

  it("replaces the previous list on save", async () => {
    const store = new SqliteTargetStore(path.join(makeTempDir(), "targets.sqlite"));
    open.push(store);
    await store.save(targets);
    await store.save([targets[0]]);

    expect((await store.load()).map((target) => target.id)).toEqual(["race-1001"]);
  });

  it("keeps data across reopen", async () => {
    const file = path.join(makeTempDir(), "targets.sqlite");
    const first = new SqliteTargetStore(file);
    await first.save(targets);
    await first.close();

    const second = new SqliteTargetStore(file);
    open.push(second);
    expect(await second.load()).toEqual(targets);
  });
});

describe("InMemoryTargetStore", () => {
  it("hands out copies", async () => {
    const store = new InMemoryTargetStore(targets);
    const [loaded] = await store.load();
    loaded.status = "failed";

    expect((await store.load())[0].status).toBe("queued");
  });
});
