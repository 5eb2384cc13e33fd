import path from "node:path";
import { describe, expect, it } from "vitest";
import { SaveError } from "../src/core/errors";
import { DuplicateDocumentRegistry } from "../src/hash";
import { MetricsRegistry } from "../src/observability";
import { ExtractionOrchestrator, runExtractionPass } from "../src/orchestrator";
import { StagingArea } from "../src/staging";
import { InMemoryTargetStore } from "../src/store";
import { CrawlTarget } from "../src/types";
import { FakeExtractor, FakeFetcher, HEADER, criteria, makeTarget, makeTempDir, quietLogger } from "./helpers";

const NOW = new Date("2025-06-01T00:00:00.000Z");
const ANSWER = `${HEADER}\nJane Doe,U16,Spring Cup,Giant Slalom,Hilltown,3,2025-02-01\n`;

function setup(targets: CrawlTarget[], fetcher: FakeFetcher, extractor = new FakeExtractor(ANSWER)) {
  const store = new InMemoryTargetStore(targets);
  const registry = new DuplicateDocumentRegistry();
  const logger = quietLogger();
  const metrics = new MetricsRegistry();
  const orchestrator = new ExtractionOrchestrator({
    fetcher,
    extractor,
    staging: new StagingArea(path.join(makeTempDir(), "staging")),
    registry,
    duplicateDocumentPolicy: "mark_processed",
    logger,
    metrics,
    now: () => NOW,
  });
  const pass = (signal?: AbortSignal) =>
    runExtractionPass({ store, criteria, orchestrator, registry, logger, metrics, now: () => NOW, signal });
  return { store, metrics, pass };
}

describe("runExtractionPass", () => {
  it("attempts eligible targets in order and saves once", async () => {
    const targets = [
      makeTarget({ id: "A", locator: "https://results.test/A.pdf" }),
      makeTarget({ id: "B", locator: "https://results.test/B.pdf", status: "processed" }),
      makeTarget({ id: "C", locator: "https://results.test/C.pdf" }),
    ];
    const fetcher = new FakeFetcher({ "https://results.test/A.pdf": "a" });
    const { store, metrics, pass } = setup(targets, fetcher);

    const summary = await pass();

    expect(fetcher.calls).toEqual(["https://results.test/A.pdf", "https://results.test/C.pdf"]);
    expect(store.saveCount).toBe(1);
    expect((await store.load()).map((target) => [target.id, target.status])).toEqual([
      ["A", "processed"],
      ["B", "processed"],
      ["C", "failed"],
    ]);
    expect(summary).toMatchObject({
      total: 3,
      selected: 2,
      skipped: 1,
      attempted: 2,
      succeeded: 1,
      failed: 1,
      duplicates: 0,
      invalid: 0,
      aborted: false,
      saved: true,
    });
    expect(metrics.getCounters().targets_selected).toBe(2);
    expect(metrics.getCounters().targets_skipped).toBe(1);
  });

  it("does not save when nothing was attempted", async () => {
    const { store, pass } = setup([makeTarget({ status: "processed" })], new FakeFetcher({}));

    const summary = await pass();

    expect(store.saveCount).toBe(0);
    expect(summary.saved).toBe(false);
    expect(summary.outcomes).toEqual([]);
  });

  it("does not save when every selected target is invalid", async () => {
    const { store, pass } = setup([makeTarget({ id: " " })], new FakeFetcher({}));

    const summary = await pass();

    expect(summary.invalid).toBe(1);
    expect(store.saveCount).toBe(0);
  });

  it("counts one attempt per run for a target that keeps failing", async () => {
    const { store, pass } = setup([makeTarget()], new FakeFetcher({}));

    await pass();
    await pass();
    await pass();

    const [target] = await store.load();
    expect(target.status).toBe("failed");
    expect(target.tracking.attemptCount).toBe(3);
    expect(store.saveCount).toBe(3);
  });

  it("skips a processed target on the next run", async () => {
    const fetcher = new FakeFetcher({ "https://results.test/T1.pdf": "t1" });
    const { store, pass } = setup([makeTarget()], fetcher);

    await pass();
    const second = await pass();

    expect(fetcher.calls).toHaveLength(1);
    expect(second.selected).toBe(0);
    expect(store.saveCount).toBe(1);
  });

  it("recognises a document already extracted by a previous run", async () => {
    const fetcher = new FakeFetcher({
      "https://results.test/A.pdf": "same",
      "https://results.test/B.pdf": "same",
    });
    const extractor = new FakeExtractor(ANSWER);
    const { store, pass } = setup([makeTarget({ id: "A", locator: "https://results.test/A.pdf" })], fetcher, extractor);
    await pass();

    const [processed] = await store.load();
    await store.save([processed, makeTarget({ id: "B", locator: "https://results.test/B.pdf" })]);
    const summary = await pass();

    expect(extractor.requests).toHaveLength(1);
    expect(summary.duplicates).toBe(1);
    expect(summary.outcomes[0].duplicateOf).toBe("A");
  });

  it("stops between targets when aborted and still saves what was attempted", async () => {
    const controller = new AbortController();
    const fetcher = new FakeFetcher({ "https://results.test/A.pdf": "a", "https://results.test/B.pdf": "b" });
    const extractor = new FakeExtractor(async () => {
      controller.abort();
      return ANSWER;
    });
    const { store, pass } = setup(
      [
        makeTarget({ id: "A", locator: "https://results.test/A.pdf" }),
        makeTarget({ id: "B", locator: "https://results.test/B.pdf" }),
      ],
      fetcher,
      extractor,
    );

    const summary = await pass(controller.signal);

    expect(summary.aborted).toBe(true);
    expect(summary.attempted).toBe(1);
    expect(fetcher.calls).toEqual(["https://results.test/A.pdf"]);
    expect((await store.load()).map((target) => target.status)).toEqual(["processed", "queued"]);
  });

  it("propagates a load failure without saving", async () => {
    const store = new InMemoryTargetStore();
    const registry = new DuplicateDocumentRegistry();

    await expect(
      runExtractionPass({
        store,
        criteria,
        orchestrator: new ExtractionOrchestrator({
          fetcher: new FakeFetcher({}),
          extractor: new FakeExtractor(ANSWER),
          staging: new StagingArea(makeTempDir()),
          registry,
          duplicateDocumentPolicy: "mark_processed",
          logger: quietLogger(),
          metrics: new MetricsRegistry(),
        }),
        registry,
        logger: quietLogger(),
        metrics: new MetricsRegistry(),
      }),
    ).rejects.toThrow("In-memory target list has not been initialised");
    expect(store.saveCount).toBe(0);
  });

  it("fails the pass and keeps the previous snapshot when saving fails", async () => {
    class ReadOnlyStore extends InMemoryTargetStore {
      async save(): Promise<void> {
        throw new SaveError("Cannot save target list memory: disk full", this.location);
      }
    }
    const store = new ReadOnlyStore([makeTarget()]);
    const before = await store.load();
    const registry = new DuplicateDocumentRegistry();
    const logger = quietLogger();
    const metrics = new MetricsRegistry();

    await expect(
      runExtractionPass({
        store,
        criteria,
        orchestrator: new ExtractionOrchestrator({
          fetcher: new FakeFetcher({ "https://results.test/T1.pdf": "t1" }),
          extractor: new FakeExtractor(ANSWER),
          staging: new StagingArea(makeTempDir()),
          registry,
          duplicateDocumentPolicy: "mark_processed",
          logger,
          metrics,
          now: () => NOW,
        }),
        registry,
        logger,
        metrics,
        now: () => NOW,
      }),
    ).rejects.toBeInstanceOf(SaveError);
    expect(await store.load()).toEqual(before);
  });
});
