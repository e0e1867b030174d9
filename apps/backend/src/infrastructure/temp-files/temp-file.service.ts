import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { fromFile } from 'file-type';
import videoUploadConfig from '../../config/video-upload.config';

export interface TempFile {
  directory: string;
  path: string;
}

export const FALLBACK_MIME_TYPE = 'application/octet-stream';

/**
 * Request-scoped scratch files. Each write gets its own mkdtemp directory, so
 * concurrent uploads never share a path and removal is a single `rm -r`.
 */
@Injectable()
export class TempFileService {
  private readonly logger = new Logger(TempFileService.name);

  constructor(
    @Inject(videoUploadConfig.KEY)
    private readonly config: ConfigType<typeof videoUploadConfig>,
  ) {}

  async write(contents: Buffer): Promise<TempFile> {
    const directory = await mkdtemp(join(this.config.tempDir, 'video-upload-'));
    const file: TempFile = { directory, path: join(directory, 'upload') };

    try {
      await writeFile(file.path, contents);
    } catch (error) {
      await this.remove(file);
      throw error;
    }

    this.logger.debug(`Wrote ${contents.length} bytes to ${file.path}`);
    return file;
  }

  async remove(file: TempFile): Promise<void> {
    await rm(file.directory, { recursive: true, force: true });
    this.logger.debug(`Removed ${file.directory}`);
  }

  /**
   * Sniffs the MIME type from the file's leading bytes, ignoring whatever the
   * client declared.
   */
  async detectMimeType(file: TempFile): Promise<string> {
    const detected = await fromFile(file.path);
    return detected?.mime ?? FALLBACK_MIME_TYPE;
  }
}
