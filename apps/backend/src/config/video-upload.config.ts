import { registerAs } from '@nestjs/config';
import { tmpdir } from 'os';

export interface VideoUploadConfig {
  maxFileSizeBytes: number;
  tempDir: string;
}

export default registerAs(
  'videoUpload',
  (): VideoUploadConfig =>
    Object.freeze({
      maxFileSizeBytes: parseInt(
        process.env.VIDEO_UPLOAD_MAX_BYTES || '209715200', // 200MB default
        10,
      ),
      tempDir: process.env.VIDEO_UPLOAD_TEMP_DIR || tmpdir(),
    }),
);
