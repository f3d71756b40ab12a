import { TransportError, describeError } from "../errors";
import { Logger, silentLogger } from "../logger";
import { SleepFn, sleep as defaultSleep } from "../util/time";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type HttpAuth =
  | { kind: "bearer"; token: string }
  | { kind: "cookies"; cookies: Record<string, string> };

export type HttpClientOptions = {
  timeoutMs?: number;
  /** Total attempts, including the first. */
  retryTimes?: number;
  /** Constant pause between attempts. */
  retryDelayMs?: number;
  headers?: Record<string, string>;
  auth?: HttpAuth;
  logger?: Logger;
  fetch?: FetchFn;
  sleep?: SleepFn;
};

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type Query = Record<string, string | number | boolean>;

export type RequestOptions = {
  body?: unknown;
  query?: Query;
  headers?: Record<string, string>;
};

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_RETRY_TIMES = 3;
export const DEFAULT_RETRY_DELAY_MS = 2_000;

export class HttpClient {
  private readonly timeoutMs: number;
  private readonly retryTimes: number;
  private readonly retryDelayMs: number;
  private readonly headers: Record<string, string>;
  private readonly logger: Logger;
  private readonly fetchFn: FetchFn;
  private readonly sleep: SleepFn;

  constructor(options: HttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryTimes = Math.max(1, options.retryTimes ?? DEFAULT_RETRY_TIMES);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.logger = options.logger ?? silentLogger();
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.headers = {
      "Content-Type": "application/json",
      ...options.headers,
      ...authHeaders(options.auth),
    };
  }

  async request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<Response> {
    const target = withQuery(url, options.query);
    const init: RequestInit = {
      method,
      headers: { ...this.headers, ...options.headers },
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    };

    let lastError: TransportError | undefined;

    for (let attempt = 1; attempt <= this.retryTimes; attempt++) {
      this.logger.debug(`${method} ${target} (attempt ${attempt}/${this.retryTimes})`);
      try {
        const response = await this.attempt(target, init, attempt);
        this.logger.debug(`Request succeeded: ${target}`);
        return response;
      } catch (error) {
        lastError =
          error instanceof TransportError
            ? error
            : new TransportError(`${method} ${target} failed: ${describeError(error)}`, { attempts: attempt, cause: error });
        this.logger.warn(`Request failed (attempt ${attempt}/${this.retryTimes}): ${lastError.message}`);
        if (attempt < this.retryTimes) {
          await this.sleep(this.retryDelayMs);
        }
      }
    }

    this.logger.error(`Request failed after ${this.retryTimes} attempts: ${target}`);
    throw lastError ?? new TransportError(`${method} ${target} failed`, { attempts: this.retryTimes });
  }

  get(url: string, query?: Query): Promise<Response> {
    return this.request("GET", url, { query });
  }

  post(url: string, body?: unknown): Promise<Response> {
    return this.request("POST", url, { body });
  }

  async getJson(url: string, query?: Query): Promise<unknown> {
    const response = await this.get(url, query);
    return readJson(response, url);
  }

  async postJson(url: string, body: unknown): Promise<unknown> {
    const response = await this.post(url, body);
    return readJson(response, url);
  }

  private async attempt(url: string, init: RequestInit, attempt: number): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchFn(url, { ...init, signal: controller.signal });
      if (!response.ok) {
        const text = await response.text().catch(() => "");
        throw new TransportError(`HTTP ${response.status} from ${url}: ${text.slice(0, 200)}`, {
          status: response.status,
          attempts: attempt,
        });
      }
      return response;
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TransportError(`Request to ${url} timed out after ${this.timeoutMs}ms`, { attempts: attempt, cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}

function authHeaders(auth: HttpAuth | undefined): Record<string, string> {
  if (!auth) return {};
  switch (auth.kind) {
    case "bearer":
      return { Authorization: `Bearer ${auth.token}` };
    case "cookies": {
      const cookie = Object.entries(auth.cookies)
        .map(([name, value]) => `${name}=${value}`)
        .join("; ");
      return cookie ? { Cookie: cookie } : {};
    }
  }
}

function withQuery(url: string, query: Query | undefined): string {
  if (!query || Object.keys(query).length === 0) return url;
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    params.set(key, String(value));
  }
  return `${url}${url.includes("?") ? "&" : "?"}${params.toString()}`;
}

async function readJson(response: Response, url: string): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new TransportError(`Invalid JSON from ${url}`, { status: response.status, attempts: 1, cause: error });
  }
}
