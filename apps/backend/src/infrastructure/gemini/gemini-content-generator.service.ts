import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import geminiConfig from '../../config/gemini.config';
import { HttpSession } from '../http/retrying-http-client';
import { readJson, sendOrThrow } from './gemini-http';
import { GenerateContentRequestBody, RemoteFileHandle } from './gemini.types';
import {
  GENERATION_PARSE_FAILED,
  NO_CONTENT_GENERATED,
  concatenateCandidateText,
} from './generated-text.parser';

@Injectable()
export class GeminiContentGeneratorService {
  private readonly logger = new Logger(GeminiContentGeneratorService.name);

  constructor(
    @Inject(geminiConfig.KEY)
    private readonly config: ConfigType<typeof geminiConfig>,
  ) {}

  /**
   * Asks the model to respond to `prompt` about an uploaded file. Transport
   * and status failures propagate; a response body the parser cannot read
   * degrades to a placeholder instead of failing the request.
   */
  async generateTextFromFile(
    session: HttpSession,
    prompt: string,
    file: RemoteFileHandle,
  ): Promise<string> {
    const body: GenerateContentRequestBody = {
      contents: [
        {
          parts: [
            { file_data: { mime_type: file.mimeType, file_uri: file.uri } },
            { text: prompt },
          ],
        },
      ],
    };

    this.logger.log(`Generating content from ${file.name} with ${this.config.modelId}`);

    const response = await sendOrThrow(
      session,
      'GENERATING',
      `${this.config.baseUrl}/v1beta/models/${this.config.modelId}:generateContent`,
      {
        method: 'POST',
        headers: {
          'x-goog-api-key': this.config.apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        timeoutMs: this.config.requestTimeoutMs,
      },
    );

    const payload = await readJson(response, 'GENERATING');
    return this.extractText(payload);
  }

  extractText(payload: unknown): string {
    try {
      const text = concatenateCandidateText(payload);
      if (!text) {
        this.logger.warn('No candidates returned from Gemini');
        return NO_CONTENT_GENERATED;
      }
      this.logger.log(`Generated ${text.length} characters of text`);
      return text;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Parsing error: ${reason}`);
      return GENERATION_PARSE_FAILED;
    }
  }
}
