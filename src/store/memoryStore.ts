import { LoadError } from "../core/errors";
import { CrawlTarget } from "../types";
import { TargetStore } from "./types";

function cloneTarget(target: CrawlTarget): CrawlTarget {
  return structuredClone(target);
}

export class InMemoryTargetStore implements TargetStore {
  readonly location = "memory";
  private snapshot: CrawlTarget[] | undefined;
  saveCount = 0;

  constructor(initial?: readonly CrawlTarget[]) {
    this.snapshot = initial ? initial.map(cloneTarget) : undefined;
  }

  async exists(): Promise<boolean> {
    return this.snapshot !== undefined;
  }

  async load(): Promise<CrawlTarget[]> {
    if (!this.snapshot) {
      throw new LoadError("In-memory target list has not been initialised", this.location);
    }
    return this.snapshot.map(cloneTarget);
  }

  async save(targets: readonly CrawlTarget[]): Promise<void> {
    this.snapshot = targets.map(cloneTarget);
    this.saveCount += 1;
  }

  async close(): Promise<void> {
    return;
  }
}
