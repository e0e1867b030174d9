/**
 * Phases of the Gemini resumable upload. Errors record the phase they were
 * raised in so the response detail says where the sequence stopped.
 */
export type UploadPhase = 'START' | 'UPLOADING' | 'POLLING' | 'GENERATING';

/**
 * Base class for every failure that originates in the Gemini API or in the
 * network path to it. The error envelope reports these as
 * "Upload or generation failed".
 */
export abstract class UpstreamServiceError extends Error {
  protected constructor(
    message: string,
    readonly phase: UploadPhase,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Non-2xx response, network failure or timeout. */
export class UpstreamHttpError extends UpstreamServiceError {
  constructor(
    message: string,
    phase: UploadPhase,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, phase, options);
  }
}

/** A response arrived but lacked a header or field the next step needs. */
export class UpstreamProtocolError extends UpstreamServiceError {
  constructor(message: string, phase: UploadPhase, options?: { cause?: unknown }) {
    super(message, phase, options);
  }
}

export class FileProcessingFailedError extends UpstreamServiceError {
  constructor(readonly fileName: string) {
    super(`File processing failed for ${fileName}`, 'POLLING');
  }
}

export class FileProcessingTimeoutError extends UpstreamServiceError {
  constructor(
    readonly fileName: string,
    readonly attempts: number,
  ) {
    super(
      `File processing timed out for ${fileName} after ${attempts} status checks`,
      'POLLING',
    );
  }
}
