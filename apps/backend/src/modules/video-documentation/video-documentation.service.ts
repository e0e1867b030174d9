import { Injectable, Logger } from '@nestjs/common';
import { HttpClientFactory } from '../../infrastructure/http/http-client.factory';
import { GeminiFileUploaderService } from '../../infrastructure/gemini/gemini-file-uploader.service';
import { GeminiContentGeneratorService } from '../../infrastructure/gemini/gemini-content-generator.service';
import { TempFileService } from '../../infrastructure/temp-files/temp-file.service';
import { DOCUMENTATION_PROMPT } from './documentation.prompt';
import { GeneratedDocumentationDto } from './dto/generated-documentation.dto';

export interface IncomingVideo {
  buffer: Buffer;
  originalname: string;
}

@Injectable()
export class VideoDocumentationService {
  private readonly logger = new Logger(VideoDocumentationService.name);

  constructor(
    private readonly tempFiles: TempFileService,
    private readonly httpClientFactory: HttpClientFactory,
    private readonly uploader: GeminiFileUploaderService,
    private readonly generator: GeminiContentGeneratorService,
  ) {}

  /**
   * Stages the video in a temp file, uploads it to Gemini, waits for
   * processing and returns the generated markdown. The temp file is removed
   * on every exit path.
   */
  async generateDocumentation(
    video: IncomingVideo,
  ): Promise<GeneratedDocumentationDto> {
    const tempFile = await this.tempFiles.write(video.buffer);

    try {
      const mimeType = await this.tempFiles.detectMimeType(tempFile);
      const session = this.httpClientFactory.create();

      const remoteFile = await this.uploader.uploadAndAwaitActive(session, {
        path: tempFile.path,
        displayName: video.originalname,
        mimeType,
        sizeBytes: video.buffer.length,
      });

      const text = await this.generator.generateTextFromFile(
        session,
        DOCUMENTATION_PROMPT,
        remoteFile,
      );

      this.logger.log(`Documentation generated for ${video.originalname}`);
      return { generated_documentation: text };
    } finally {
      await this.tempFiles.remove(tempFile);
    }
  }
}
