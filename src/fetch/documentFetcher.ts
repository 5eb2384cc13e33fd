import { Agent, Dispatcher, fetch } from "undici";
import { TransportError, describeError } from "../core/errors";

export interface DocumentFetcher {
  fetch(locator: string): Promise<Buffer>;
}

interface FetchInit {
  method: string;
  headers: Record<string, string>;
  signal: AbortSignal;
  redirect: "follow";
  dispatcher?: Dispatcher;
}

interface FetchResponseLike {
  ok: boolean;
  status: number;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

export interface HttpDocumentFetcherOptions {
  userAgent: string;
  timeoutMs: number;
  ignoreHttpsErrors: boolean;
  fetchFn?: FetchLike;
}

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  return ignoreHttpsErrors ? getInsecureAgent() : undefined;
}

export class HttpDocumentFetcher implements DocumentFetcher {
  private readonly options: HttpDocumentFetcherOptions;
  private readonly fetchFn: FetchLike;

  constructor(options: HttpDocumentFetcherOptions) {
    this.options = options;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
  }

  async fetch(locator: string): Promise<Buffer> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.fetchFn(locator, {
        method: "GET",
        headers: {
          "user-agent": this.options.userAgent,
          accept: "application/pdf,*/*",
        },
        signal: controller.signal,
        redirect: "follow",
        dispatcher: getFetchDispatcher(this.options.ignoreHttpsErrors),
      });

      if (!response.ok) {
        throw new TransportError(`HTTP ${response.status} while fetching ${locator}`, response.status);
      }
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new TransportError(`Timed out after ${this.options.timeoutMs} ms fetching ${locator}`, undefined, {
          cause: error,
        });
      }
      throw new TransportError(`Fetch failed for ${locator}: ${describeError(error)}`, undefined, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}
