import { describe, expect, it } from "vitest";
import { DuplicateDocumentRegistry, hashContent } from "../src/hash";
import { makeTarget } from "./helpers";

describe("hashContent", () => {
  it("returns the sha256 hex digest", () => {
    expect(hashContent(Buffer.from("abc"))).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });

  it("is stable for identical bytes and differs otherwise", () => {
    expect(hashContent(Buffer.from("results"))).toBe(hashContent(Buffer.from("results")));
    expect(hashContent(Buffer.from("results"))).not.toBe(hashContent(Buffer.from("results ")));
  });
});

describe("DuplicateDocumentRegistry", () => {
  it("keeps the first owner of a fingerprint", () => {
    const registry = new DuplicateDocumentRegistry();
    registry.register("h1", "A");
    registry.register("h1", "B");

    expect(registry.firstSeenBy("h1")).toBe("A");
    expect(registry.firstSeenBy("h2")).toBeUndefined();
  });

  it("does not report a target as a duplicate of itself", () => {
    const registry = new DuplicateDocumentRegistry();
    registry.register("h1", "A");

    expect(registry.firstSeenBy("h1", "A")).toBeUndefined();
    expect(registry.firstSeenBy("h1", "B")).toBe("A");
  });

  it("seeds only from processed targets that carry a hash", () => {
    const registry = new DuplicateDocumentRegistry();
    registry.seed([
      makeTarget({ id: "P", status: "processed", contentHash: "h-processed" }),
      makeTarget({ id: "F", status: "failed", contentHash: "h-failed" }),
      makeTarget({ id: "Q", status: "processed" }),
    ]);

    expect(registry.size).toBe(1);
    expect(registry.firstSeenBy("h-processed")).toBe("P");
    expect(registry.firstSeenBy("h-failed")).toBeUndefined();
  });
});
