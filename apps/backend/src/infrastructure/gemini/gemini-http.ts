import {
  UploadPhase,
  UpstreamHttpError,
  UpstreamProtocolError,
} from '../../common/errors/upstream.errors';
import { HttpRequestOptions, HttpSession } from '../http/retrying-http-client';

const MAX_ERROR_BODY_LENGTH = 500;

/**
 * Sends one request and rejects unless the final response is 2xx. Transport
 * failures become UpstreamHttpError tagged with the phase.
 */
export async function sendOrThrow(
  session: HttpSession,
  phase: UploadPhase,
  url: string,
  options: HttpRequestOptions,
): Promise<Response> {
  let response: Response;
  try {
    response = await session.request(url, options);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new UpstreamHttpError(`${phase} request failed: ${reason}`, phase, undefined, {
      cause: error,
    });
  }

  if (!response.ok) {
    const body = (await readBody(response, phase)).slice(0, MAX_ERROR_BODY_LENGTH);
    const status = [response.status, response.statusText].filter(Boolean).join(' ');
    throw new UpstreamHttpError(
      `${phase} request returned ${status}${body ? `: ${body}` : ''}`,
      phase,
      response.status,
    );
  }

  return response;
}

export async function readJson(
  response: Response,
  phase: UploadPhase,
): Promise<unknown> {
  const text = await readBody(response, phase);
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new UpstreamProtocolError(`${phase} response was not valid JSON`, phase, {
      cause: error,
    });
  }
}

/** A connection dropped or timed out mid-body is still an upstream failure. */
async function readBody(response: Response, phase: UploadPhase): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new UpstreamHttpError(
      `${phase} response could not be read: ${reason}`,
      phase,
      response.status,
      { cause: error },
    );
  }
}
