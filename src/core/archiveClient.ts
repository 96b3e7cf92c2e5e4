import { fetch as undiciFetch, type Dispatcher } from "undici";
import { errorMessage, FormatError, TransportError } from "./errors";
import { getFetchDispatcher } from "./fetch";

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type FetchLike = (
  url: string,
  init: {
    method: string;
    headers: Record<string, string>;
    signal: AbortSignal;
    dispatcher?: Dispatcher;
  },
) => Promise<HttpResponseLike>;

export interface ArchiveClientOptions {
  userAgent: string;
  timeoutMs: number;
  ignoreHttpsErrors?: boolean;
  fetchFn?: FetchLike;
}

// The archive answers 403/404 for index files and bundles it does not publish.
const MISSING_STATUSES = new Set([403, 404]);

const ACCEPT_TEXT = "text/plain,text/html,*/*";
const ACCEPT_JSON = "application/json";

export class ArchiveClient {
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;
  private readonly fetchFn: FetchLike;

  constructor(options: ArchiveClientOptions) {
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn ?? ((url, init) => undiciFetch(url, init));
    // Injected fetch functions run without the pooled transport.
    this.dispatcher = options.fetchFn ? undefined : getFetchDispatcher(options.ignoreHttpsErrors ?? false);
  }

  /** Strict fetch that getJson builds on: any non-2xx status is a TransportError. */
  async getText(url: string, accept = ACCEPT_TEXT): Promise<string> {
    const body = await this.request(url, accept, false);
    return body ?? "";
  }

  /** Like getText, but "forbidden" and "not found" yield an empty body. */
  async getTextOrEmpty(url: string): Promise<string> {
    const body = await this.request(url, ACCEPT_TEXT, true);
    return body ?? "";
  }

  async getJson(url: string): Promise<unknown> {
    const body = await this.getText(url, ACCEPT_JSON);
    try {
      return JSON.parse(body);
    } catch (error) {
      throw new FormatError(`Invalid JSON from ${url}: ${errorMessage(error)}`, url, { cause: error });
    }
  }

  private async request(url: string, accept: string, missingIsEmpty: boolean): Promise<string | undefined> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": this.userAgent,
          accept,
        },
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });

      if (missingIsEmpty && MISSING_STATUSES.has(response.status)) {
        return undefined;
      }

      if (!response.ok) {
        throw new TransportError(`HTTP ${response.status} while fetching ${url}`, url, response.status);
      }

      return await response.text();
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new TransportError(`Timed out after ${this.timeoutMs}ms while fetching ${url}`, url, undefined, {
          cause: error,
        });
      }
      throw new TransportError(`Request failed for ${url}: ${errorMessage(error)}`, url, undefined, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}
