import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import geminiConfig from '../../config/gemini.config';
import { FetchFn, HTTP_FETCH, SLEEP, SleepFn } from './http.tokens';
import { HttpSession, RetryingHttpClient } from './retrying-http-client';

/**
 * Builds the per-request outbound session: retries 502/503/504 and
 * connection failures with exponential backoff.
 */
@Injectable()
export class HttpClientFactory {
  constructor(
    @Inject(HTTP_FETCH) private readonly fetchFn: FetchFn,
    @Inject(SLEEP) private readonly sleep: SleepFn,
    @Inject(geminiConfig.KEY)
    private readonly config: ConfigType<typeof geminiConfig>,
  ) {}

  create(): HttpSession {
    return new RetryingHttpClient(this.fetchFn, this.sleep, this.config.retry);
  }
}
