import { CrawlTarget } from "../types";

/**
 * Durable list of crawl targets. Nothing is persisted until `save` is called;
 * the extraction pass saves exactly once, after every selected target was attempted.
 */
export interface TargetStore {
  readonly location: string;
  exists(): Promise<boolean>;
  load(): Promise<CrawlTarget[]>;
  save(targets: readonly CrawlTarget[]): Promise<void>;
  close(): Promise<void>;
}
