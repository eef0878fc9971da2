export interface HttpClientOptions {
  /** Sent as a bearer token when present. */
  token?: string;
  defaultTimeoutMs?: number;
}

export interface HttpResponse {
  status: number;
  body: string;
}

export class HttpClientError extends Error {
  constructor(
    message: string,
    public status: number,
  ) {
    super(message);
    this.name = 'HttpClientError';
  }
}

/**
 * Minimal JSON-over-HTTP poster for outbound notifications.
 * Uses the global fetch() of Node 20.
 */
export class HttpClient {
  private token?: string;
  private defaultTimeoutMs: number;

  constructor(options: HttpClientOptions = {}) {
    this.token = options.token;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 10_000;
  }

  async postJson(url: string, payload: unknown, timeoutMs?: number): Promise<HttpResponse> {
    const limitMs = timeoutMs ?? this.defaultTimeoutMs;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), limitMs);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      const body = await response.text();

      if (!response.ok) {
        throw new HttpClientError(`HTTP ${response.status}: ${response.statusText}`, response.status);
      }
      return { status: response.status, body };
    } catch (error) {
      if (error instanceof HttpClientError) throw error;

      if (error instanceof Error && error.name === 'AbortError') {
        throw new HttpClientError(`Request timed out after ${limitMs}ms`, 0);
      }
      throw new HttpClientError(error instanceof Error ? error.message : String(error), 0);
    } finally {
      clearTimeout(timeout);
    }
  }
}
