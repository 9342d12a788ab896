import { AxiosInstance } from "axios";
import { http, statusOf } from "./http";
import { Logger, consoleLogger, errorMessage } from "./logger";
import { SearchItem, SearchOutcome, SearchProvider } from "./types";
import { sleep } from "./utils";

export const GOOGLE_API_URL = "https://www.googleapis.com/customsearch/v1";
export const PAGE_SIZE = 10; // Google caps at 10

export type CseClientOptions = {
  apiKey: string;
  cx: string;
  requestDelayMs?: number;
  rateLimitBackoffMs?: number;
  client?: AxiosInstance;
  logger?: Logger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

type CseItem = {
  link?: string;
  title?: string;
  snippet?: string;
};

type CseResponse = {
  items?: CseItem[];
};

export class CseClient implements SearchProvider {
  private readonly apiKey: string;
  private readonly cx: string;
  private readonly requestDelayMs: number;
  private readonly rateLimitBackoffMs: number;
  private readonly client: AxiosInstance;
  private readonly logger: Logger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private issued = 0;

  constructor(opts: CseClientOptions) {
    this.apiKey = opts.apiKey;
    this.cx = opts.cx;
    this.requestDelayMs = opts.requestDelayMs ?? 1000;
    this.rateLimitBackoffMs = opts.rateLimitBackoffMs ?? 10000;
    this.client = opts.client ?? http;
    this.logger = opts.logger ?? consoleLogger;
    this.sleep = opts.sleep ?? sleep;
  }

  /** Requests issued so far, failed ones included. */
  get requests(): number {
    return this.issued;
  }

  /**
   * One page of results starting at the 1-based `start`. Never throws: a 429
   * or any other failure comes back as a non-"ok" outcome.
   */
  async search(query: string, start: number, signal?: AbortSignal): Promise<SearchOutcome> {
    await this.sleep(this.requestDelayMs, signal);
    if (signal?.aborted) return { kind: "failed", error: "aborted" };

    this.issued++;

    try {
      const { data } = await this.client.get<CseResponse>(GOOGLE_API_URL, {
        params: { key: this.apiKey, cx: this.cx, q: query, num: PAGE_SIZE, start },
        signal,
      });
      return { kind: "ok", items: (data?.items ?? []).map(toSearchItem) };
    } catch (err) {
      if (signal?.aborted) return { kind: "failed", error: "aborted" };
      if (statusOf(err) === 429) {
        this.logger.warn(`[!] Rate limited, backing off ${this.rateLimitBackoffMs} ms`);
        await this.sleep(this.rateLimitBackoffMs, signal);
        return { kind: "rate-limited" };
      }
      const error = errorMessage(err);
      this.logger.error(`[!] Request error: ${error}`);
      return { kind: "failed", error };
    }
  }
}

function toSearchItem(i: CseItem): SearchItem {
  return {
    link: i.link ?? "",
    title: i.title ?? "",
    snippet: i.snippet ?? "",
  };
}
