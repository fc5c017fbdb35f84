/**
 * JSON-over-HTTP transport used by the chat channel and the recovery client
 *
 * Each attempt is bounded by an AbortController timeout; failures other than
 * a timeout are retried with exponential backoff. Callers get the final error
 * thrown and decide whether it matters.
 */

export interface TransportConfig {
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

const DEFAULT_CONFIG: TransportConfig = {
  timeoutMs: 10000,
  maxRetries: 2,
  retryDelayMs: 500,
};

export interface TransportResponse {
  status: number;
  body: string;
}

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    statusText: string,
    public readonly body: string
  ) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = 'HttpError';
  }
}

export class HttpTransport {
  private config: TransportConfig;
  private fetchImpl: typeof fetch;

  constructor(config: Partial<TransportConfig> = {}, fetchImpl: typeof fetch = fetch) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.fetchImpl = fetchImpl;
  }

  async postJson(
    url: string,
    payload: unknown,
    headers: Record<string, string> = {}
  ): Promise<TransportResponse> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

      try {
        const response = await this.fetchImpl(url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            ...headers,
          },
          body: JSON.stringify(payload),
          signal: controller.signal,
        });
        const body = await response.text();

        if (!response.ok) {
          throw new HttpError(response.status, response.statusText, body);
        }

        return { status: response.status, body };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        // 4xx will not get better on retry; neither will a request that already timed out
        const clientError =
          lastError instanceof HttpError && lastError.status >= 400 && lastError.status < 500;
        if (lastError.name === 'AbortError' || clientError || attempt >= this.config.maxRetries) {
          throw lastError;
        }

        await this.sleep(this.config.retryDelayMs * Math.pow(2, attempt));
      } finally {
        clearTimeout(timeoutId);
      }
    }

    throw lastError ?? new Error('Unknown transport error');
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
