import { UpstreamProtocolError } from '../errors/upstream.errors';

/**
 * Outcome of one protocol step whose next step depends on a value read from
 * the response (a header or a body field).
 */
export type StepResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: UpstreamProtocolError };

export const stepOk = <T>(value: T): StepResult<T> => ({ ok: true, value });

export const stepFailed = <T>(error: UpstreamProtocolError): StepResult<T> => ({
  ok: false,
  error,
});
