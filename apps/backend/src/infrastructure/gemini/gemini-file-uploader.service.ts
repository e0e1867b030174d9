import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { openAsBlob } from 'fs';
import geminiConfig from '../../config/gemini.config';
import {
  FileProcessingFailedError,
  FileProcessingTimeoutError,
  UpstreamProtocolError,
} from '../../common/errors/upstream.errors';
import { StepResult, stepFailed, stepOk } from '../../common/types/step-result';
import { HttpSession } from '../http/retrying-http-client';
import { SLEEP, SleepFn } from '../http/http.tokens';
import { readJson, sendOrThrow } from './gemini-http';
import {
  FileState,
  LocalMediaFile,
  RemoteFileHandle,
  StartUploadRequestBody,
  UPLOAD_URL_HEADER,
  fileNameFromUri,
  isRecord,
} from './gemini.types';

const KNOWN_STATES: readonly FileState[] = [
  'STATE_UNSPECIFIED',
  'PROCESSING',
  'ACTIVE',
  'FAILED',
];

/**
 * Drives the Gemini Files API resumable upload: START opens a session,
 * UPLOADING sends the whole file and finalizes it, POLLING waits for the
 * file to leave PROCESSING.
 */
@Injectable()
export class GeminiFileUploaderService {
  private readonly logger = new Logger(GeminiFileUploaderService.name);

  constructor(
    @Inject(geminiConfig.KEY)
    private readonly config: ConfigType<typeof geminiConfig>,
    @Inject(SLEEP) private readonly sleep: SleepFn,
  ) {}

  async uploadAndAwaitActive(
    session: HttpSession,
    file: LocalMediaFile,
  ): Promise<RemoteFileHandle> {
    this.logger.log(
      `Uploading ${file.displayName} (${file.mimeType}, ${file.sizeBytes} bytes)`,
    );

    const started = await this.startUpload(session, file);
    if (!started.ok) {
      throw started.error;
    }

    const uploaded = await this.uploadBytes(session, started.value, file);
    if (!uploaded.ok) {
      throw uploaded.error;
    }

    const uri = uploaded.value;
    const name = fileNameFromUri(uri);
    await this.waitForActive(session, name);

    this.logger.log(`File ${name} is ACTIVE`);
    return { uri, name, mimeType: file.mimeType, state: 'ACTIVE' };
  }

  /** Opens a resumable session and returns its continuation URL. */
  async startUpload(
    session: HttpSession,
    file: LocalMediaFile,
  ): Promise<StepResult<string>> {
    const body: StartUploadRequestBody = {
      file: { display_name: file.displayName },
    };

    const response = await sendOrThrow(
      session,
      'START',
      `${this.config.baseUrl}/upload/v1beta/files`,
      {
        method: 'POST',
        headers: {
          'x-goog-api-key': this.config.apiKey,
          'X-Goog-Upload-Protocol': 'resumable',
          'X-Goog-Upload-Command': 'start',
          'X-Goog-Upload-Header-Content-Length': String(file.sizeBytes),
          'X-Goog-Upload-Header-Content-Type': file.mimeType,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        timeoutMs: this.config.requestTimeoutMs,
      },
    );

    const uploadUrl = response.headers.get(UPLOAD_URL_HEADER);
    if (!uploadUrl) {
      return stepFailed(
        new UpstreamProtocolError('No upload URL returned', 'START'),
      );
    }
    return stepOk(uploadUrl);
  }

  /**
   * Sends the file in a single upload-and-finalize call and returns the
   * resulting file URI.
   */
  async uploadBytes(
    session: HttpSession,
    uploadUrl: string,
    file: LocalMediaFile,
  ): Promise<StepResult<string>> {
    const response = await sendOrThrow(session, 'UPLOADING', uploadUrl, {
      method: 'POST',
      headers: {
        'X-Goog-Upload-Offset': '0',
        'X-Goog-Upload-Command': 'upload, finalize',
      },
      body: await openAsBlob(file.path),
      timeoutMs: this.config.uploadTimeoutMs,
    });

    const payload = await readJson(response, 'UPLOADING');
    const uri =
      isRecord(payload) && isRecord(payload.file) ? payload.file.uri : undefined;

    if (typeof uri !== 'string' || uri === '') {
      return stepFailed(
        new UpstreamProtocolError('No file URI returned', 'UPLOADING'),
      );
    }
    return stepOk(uri);
  }

  /**
   * Polls at a fixed interval. Returns on ACTIVE, throws on FAILED, and
   * throws a timeout only once every attempt has seen neither.
   */
  async waitForActive(session: HttpSession, name: string): Promise<void> {
    const { intervalMs, maxAttempts } = this.config.poll;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const state = await this.fetchState(session, name);
      this.logger.debug(
        `Status check ${attempt}/${maxAttempts} for ${name}: ${state ?? 'unknown'}`,
      );

      if (state === 'ACTIVE') {
        return;
      }
      if (state === 'FAILED') {
        throw new FileProcessingFailedError(name);
      }
      if (attempt < maxAttempts) {
        await this.sleep(intervalMs);
      }
    }

    throw new FileProcessingTimeoutError(name, maxAttempts);
  }

  async fetchState(
    session: HttpSession,
    name: string,
  ): Promise<FileState | undefined> {
    const response = await sendOrThrow(
      session,
      'POLLING',
      `${this.config.baseUrl}/v1beta/files/${encodeURIComponent(name)}`,
      {
        method: 'GET',
        headers: { 'x-goog-api-key': this.config.apiKey },
        timeoutMs: this.config.requestTimeoutMs,
      },
    );

    const payload = await readJson(response, 'POLLING');
    const state = isRecord(payload) ? payload.state : undefined;
    return KNOWN_STATES.find((known) => known === state);
  }
}
