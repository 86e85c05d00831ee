// ---------------------------------------------------------------------------
// HTTP client abstraction for the buildrelay API
// ---------------------------------------------------------------------------

/** Successful API result. */
export interface ApiOk<T> {
  ok: true;
  data: T;
  status: number;
}

/** Failed API result. */
export interface ApiErr {
  ok: false;
  error: string;
  status: number;
}

/** Discriminated union returned by all client methods. */
export type ApiResult<T> = ApiOk<T> | ApiErr;

/** Injectable interface so tests can mock the HTTP layer. */
export interface RelayApiClient {
  get<T>(path: string): Promise<ApiResult<T>>;
  post<T>(path: string, body: unknown): Promise<ApiResult<T>>;
  delete<T>(path: string): Promise<ApiResult<T>>;
}

/** Prefer the server's `message`, then its `error` code, then the raw body. */
function errorText(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === "object" && parsed !== null) {
      if ("message" in parsed && typeof parsed.message === "string") return parsed.message;
      if ("error" in parsed && typeof parsed.error === "string") return parsed.error;
    }
  } catch {
    // Not JSON; fall through to the raw body
  }
  return text;
}

// ---------------------------------------------------------------------------
// Production implementation using Node 20's built-in fetch
// ---------------------------------------------------------------------------

export class FetchRelayApiClient implements RelayApiClient {
  constructor(
    private baseUrl: string,
    private apiKey?: string,
  ) {}

  async get<T>(path: string): Promise<ApiResult<T>> {
    return this.execute<T>(`${this.baseUrl}${path}`, {
      method: "GET",
      headers: this.headers(),
    });
  }

  async post<T>(path: string, body: unknown): Promise<ApiResult<T>> {
    return this.execute<T>(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: { ...this.headers(), "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  async delete<T>(path: string): Promise<ApiResult<T>> {
    return this.execute<T>(`${this.baseUrl}${path}`, {
      method: "DELETE",
      headers: this.headers(),
    });
  }

  private headers(): Record<string, string> {
    const h: Record<string, string> = {};
    if (this.apiKey) {
      h["X-API-Key"] = this.apiKey;
    }
    return h;
  }

  private async execute<T>(
    url: string,
    init: RequestInit,
  ): Promise<ApiResult<T>> {
    try {
      const res = await fetch(url, init);
      if (res.ok) {
        const data = (await res.json()) as T;
        return { ok: true, data, status: res.status };
      }
      return { ok: false, error: errorText(await res.text()), status: res.status };
    } catch (err) {
      return {
        ok: false,
        error: `Network error: ${err instanceof Error ? err.message : String(err)}`,
        status: 0,
      };
    }
  }
}
