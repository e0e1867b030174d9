import { registerAs } from '@nestjs/config';

export interface GeminiConfig {
  apiKey: string;
  baseUrl: string;
  modelId: string;
  requestTimeoutMs: number;
  uploadTimeoutMs: number;
  poll: {
    intervalMs: number;
    maxAttempts: number;
  };
  retry: {
    maxRetries: number;
    backoffFactorMs: number;
    retryStatuses: readonly number[];
  };
}

export default registerAs(
  'gemini',
  (): GeminiConfig =>
    Object.freeze({
      // Presence is enforced by validateEnvironment at boot
      apiKey: process.env.GEMINI_API_KEY ?? '',
      baseUrl: (
        process.env.GEMINI_API_BASE_URL ||
        'https://generativelanguage.googleapis.com'
      ).replace(/\/+$/, ''),
      modelId: process.env.GEMINI_MODEL_ID || 'gemini-2.5-flash',
      requestTimeoutMs: parseInt(process.env.GEMINI_REQUEST_TIMEOUT_MS || '30000', 10),
      uploadTimeoutMs: parseInt(process.env.GEMINI_UPLOAD_TIMEOUT_MS || '300000', 10),
      poll: Object.freeze({
        intervalMs: parseInt(process.env.GEMINI_POLL_INTERVAL_MS || '5000', 10),
        maxAttempts: parseInt(process.env.GEMINI_POLL_MAX_ATTEMPTS || '60', 10),
      }),
      retry: Object.freeze({
        maxRetries: parseInt(process.env.GEMINI_RETRY_MAX || '3', 10),
        backoffFactorMs: parseInt(process.env.GEMINI_RETRY_BACKOFF_MS || '1000', 10),
        retryStatuses: Object.freeze([502, 503, 504]),
      }),
    }),
);
