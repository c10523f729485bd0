import axios, { AxiosError, type AxiosAdapter, type AxiosInstance, type AxiosResponse } from "axios";
import { FetchError, type FetchFailure } from "./errors.js";
import type { FetchedPage } from "./types.js";
import { sleep } from "./utils.js";

export interface PageFetcher {
  fetch(url: string): Promise<FetchedPage>;
}

export interface HttpFetcherOptions {
  timeoutMs: number;
  userAgent: string;
  retries?: number;
  retryDelayMs?: number;
  maxBytes?: number;
  /** Replaces the network transport; used by tests. */
  adapter?: AxiosAdapter;
}

const TLS_CODES = new Set([
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "ERR_TLS_CERT_ALTNAME_INVALID",
  "EPROTO",
]);

function classifyAxiosError(err: unknown): FetchFailure {
  const code = err instanceof AxiosError ? err.code : undefined;
  if (code === AxiosError.ECONNABORTED || code === AxiosError.ETIMEDOUT || code === AxiosError.ERR_CANCELED) {
    return "timeout";
  }
  if (code && (TLS_CODES.has(code) || code.startsWith("ERR_SSL") || code.startsWith("ERR_TLS"))) {
    return "tls";
  }
  return "connection";
}

function isTransient(err: FetchError): boolean {
  if (err.failure === "timeout" || err.failure === "connection") return true;
  return err.failure === "http_status" && (err.status ?? 0) >= 500;
}

function toBytes(data: unknown): Uint8Array {
  if (data instanceof Uint8Array) return data;
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  if (typeof data === "string") return new TextEncoder().encode(data);
  return new Uint8Array(0);
}

export class HttpFetcher implements PageFetcher {
  private readonly http: AxiosInstance;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;

  constructor(options: HttpFetcherOptions) {
    this.http = axios.create({
      headers: {
        "User-Agent": options.userAgent,
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      },
      timeout: options.timeoutMs,
      responseType: "arraybuffer",
      // Status is checked below so the body of an error page is never kept
      validateStatus: () => true,
      maxRedirects: 5,
      maxContentLength: options.maxBytes ?? 10 * 1024 * 1024,
      adapter: options.adapter,
    });
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.timeoutMs = options.timeoutMs;
  }

  async fetch(url: string): Promise<FetchedPage> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.fetchOnce(url);
      } catch (err) {
        if (!(err instanceof FetchError) || !isTransient(err) || attempt > this.retries) throw err;
        const delay = this.retryDelayMs * 2 ** (attempt - 1);
        console.warn(`[FETCH] Attempt ${attempt} failed (${err.message}); retrying in ${delay}ms`);
        await sleep(delay);
      }
    }
  }

  private async fetchOnce(url: string): Promise<FetchedPage> {
    let res: AxiosResponse<ArrayBuffer>;
    try {
      // `timeout` only watches for an idle socket; the signal bounds the whole attempt
      res = await this.http.get<ArrayBuffer>(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      const failure = classifyAxiosError(err);
      const detail = err instanceof Error ? err.message : String(err);
      throw new FetchError(failure, `${failure} error fetching ${url}: ${detail}`, { cause: err });
    }

    if (res.status < 200 || res.status > 299) {
      throw new FetchError("http_status", `HTTP ${res.status} from ${url}`, { status: res.status });
    }

    const contentType = res.headers["content-type"];
    return {
      url,
      status: res.status,
      contentType: typeof contentType === "string" ? contentType : undefined,
      body: toBytes(res.data),
    };
  }
}

/** Serves a fixed in-memory document instead of touching the network. */
export class StaticFetcher implements PageFetcher {
  constructor(
    private readonly body: string | Uint8Array,
    private readonly contentType = "text/html; charset=utf-8"
  ) {}

  async fetch(url: string): Promise<FetchedPage> {
    return { url, status: 200, contentType: this.contentType, body: toBytes(this.body) };
  }
}
