/**
 * Thin HTTP client shared by the Notion and Todoist tools.
 * Uses native fetch (Node 20+); a stand-in can be injected for tests.
 */

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type QueryValue = string | number | boolean | string[] | undefined;

export interface ApiClientOptions {
  baseUrl: string;
  token: string;
  headers?: Record<string, string>;
  fetch?: FetchLike;
}

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

/** Build a query string from an object, skipping undefined values. Arrays are comma-joined. */
export function buildQs(params: Record<string, QueryValue>): string {
  const entries = Object.entries(params).filter(
    (kv): kv is [string, Exclude<QueryValue, undefined>] => kv[1] !== undefined,
  );
  if (entries.length === 0) return "";
  const qs = entries
    .map(([k, v]) => `${encodeURIComponent(k)}=${encodeURIComponent(Array.isArray(v) ? v.join(",") : String(v))}`)
    .join("&");
  return `?${qs}`;
}

// Notion errors are JSON `{ message }`, Todoist errors are plain text
function describeFailure(status: number, body: string): string {
  const text = body.trim();
  if (text.startsWith("{")) {
    try {
      const parsed: unknown = JSON.parse(text);
      if (typeof parsed === "object" && parsed !== null && "message" in parsed && typeof parsed.message === "string") {
        return `HTTP ${status}: ${parsed.message}`;
      }
    } catch {
      // not JSON after all; fall through to the raw body
    }
  }
  return text ? `HTTP ${status}: ${text}` : `HTTP ${status}`;
}

export class ApiClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: ApiClientOptions) {
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  // Responses are returned unparsed; callers validate them with their own schemas.
  async get(path: string): Promise<unknown> {
    return this.request("GET", path);
  }

  async post(path: string, body?: Record<string, unknown>): Promise<unknown> {
    return this.request("POST", path, body);
  }

  async patch(path: string, body?: Record<string, unknown>): Promise<unknown> {
    return this.request("PATCH", path, body);
  }

  async delete(path: string): Promise<unknown> {
    return this.request("DELETE", path);
  }

  private async request(method: string, path: string, body?: Record<string, unknown>): Promise<unknown> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.options.token}`,
      Accept: "application/json",
      ...this.options.headers,
    };

    const init: RequestInit = { method, headers };

    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(body);
    }

    const res = await this.fetchImpl(`${this.options.baseUrl}${path}`, init);
    const text = await res.text();

    if (!res.ok) {
      throw new HttpError(res.status, describeFailure(res.status, text));
    }

    // 204 No Content (close/reopen/delete)
    if (!text) return undefined;
    const parsed: unknown = JSON.parse(text);
    return parsed;
  }
}
