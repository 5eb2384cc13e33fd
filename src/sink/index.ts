import { AppConfig } from "../config";
import { HttpSink } from "./httpSink";
import { LocalJsonlSink } from "./localJsonlSink";
import { NoopSink } from "./noopSink";
import { Sink } from "./types";

export function createSink(config: AppConfig, runId: string): Sink {
  switch (config.sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config.outputDirs.manifests, runId);
    case "http":
      return new HttpSink({ endpoint: config.httpSinkEndpoint, token: config.httpSinkToken, runId });
    case "none":
      return new NoopSink();
  }
}

export * from "./types";
export { HttpSink } from "./httpSink";
export { LocalJsonlSink } from "./localJsonlSink";
export { NoopSink } from "./noopSink";
