import { Logger } from '@nestjs/common';
import { FetchFn, SleepFn } from './http.tokens';

export interface RetryPolicy {
  /** Retries after the first attempt. */
  maxRetries: number;
  /** Delay before retry n is `backoffFactorMs * 2^(n - 1)`. */
  backoffFactorMs: number;
  retryStatuses: readonly number[];
}

export interface HttpRequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: RequestInit['body'];
  timeoutMs: number;
}

/**
 * The outbound HTTP surface the Gemini clients depend on. One session is
 * built per incoming request.
 */
export interface HttpSession {
  request(url: string, options: HttpRequestOptions): Promise<Response>;
}

/**
 * fetch rejects with a TypeError when the connection itself fails; aborts
 * and timeouts surface as DOMExceptions and are not retried.
 */
const isConnectionFailure = (error: unknown): boolean =>
  error instanceof TypeError;

export class RetryingHttpClient implements HttpSession {
  private readonly logger = new Logger(RetryingHttpClient.name);

  constructor(
    private readonly fetchFn: FetchFn,
    private readonly sleep: SleepFn,
    private readonly policy: RetryPolicy,
  ) {}

  async request(url: string, options: HttpRequestOptions): Promise<Response> {
    const method = options.method ?? 'GET';

    for (let retry = 0; ; retry++) {
      const canRetry = retry < this.policy.maxRetries;
      const signal = AbortSignal.timeout(options.timeoutMs);
      let response: Response;

      try {
        response = await this.fetchFn(url, {
          method,
          headers: options.headers,
          body: options.body,
          signal,
        });
      } catch (error) {
        if (!canRetry || !isConnectionFailure(error)) {
          throw error;
        }
        this.logger.warn(
          `${method} ${this.describe(url)} failed to connect, retry ${retry + 1}/${this.policy.maxRetries}`,
        );
        await this.sleep(this.backoffDelay(retry + 1));
        continue;
      }

      if (!canRetry || !this.policy.retryStatuses.includes(response.status)) {
        return response;
      }

      this.logger.warn(
        `${method} ${this.describe(url)} returned ${response.status}, retry ${retry + 1}/${this.policy.maxRetries}`,
      );
      await response.body?.cancel();
      await this.sleep(this.backoffDelay(retry + 1));
    }
  }

  backoffDelay(retryNumber: number): number {
    return this.policy.backoffFactorMs * 2 ** (retryNumber - 1);
  }

  // Upload session URLs carry an upload id in the query string
  private describe(url: string): string {
    const queryStart = url.indexOf('?');
    return queryStart === -1 ? url : url.slice(0, queryStart);
  }
}
