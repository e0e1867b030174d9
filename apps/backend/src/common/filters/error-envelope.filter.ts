import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { UpstreamServiceError } from '../errors/upstream.errors';

export interface ErrorEnvelope {
  error: string;
  detail?: string;
}

export const UPSTREAM_FAILURE = 'Upload or generation failed';
export const INTERNAL_FAILURE = 'Internal server error';

const messageOf = (exception: HttpException): string => {
  const body = exception.getResponse();
  if (typeof body === 'string') {
    return body;
  }
  if (typeof body === 'object' && body !== null && 'message' in body) {
    const { message } = body;
    if (Array.isArray(message)) {
      return message.join(', ');
    }
    if (typeof message === 'string') {
      return message;
    }
  }
  return exception.message;
};

/**
 * Maps anything thrown while handling a request to a status and the
 * `{ error, detail? }` body clients receive.
 */
export function toErrorEnvelope(exception: unknown): {
  status: number;
  body: ErrorEnvelope;
} {
  if (exception instanceof HttpException) {
    return { status: exception.getStatus(), body: { error: messageOf(exception) } };
  }

  if (exception instanceof UpstreamServiceError) {
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: { error: UPSTREAM_FAILURE, detail: exception.message },
    };
  }

  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    body: {
      error: INTERNAL_FAILURE,
      detail: exception instanceof Error ? exception.message : String(exception),
    },
  };
}

@Catch()
export class ErrorEnvelopeFilter implements ExceptionFilter {
  private readonly logger = new Logger(ErrorEnvelopeFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, body } = toErrorEnvelope(exception);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${body.error}: ${body.detail ?? ''}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    response.status(status).json(body);
  }
}
