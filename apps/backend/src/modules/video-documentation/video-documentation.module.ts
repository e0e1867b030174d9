import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import videoUploadConfig from '../../config/video-upload.config';
import { GeminiModule } from '../../infrastructure/gemini/gemini.module';
import { TempFilesModule } from '../../infrastructure/temp-files/temp-files.module';
import { VideoDocumentationController } from './video-documentation.controller';
import { VideoDocumentationService } from './video-documentation.service';

@Module({
  imports: [
    GeminiModule,
    TempFilesModule,
    MulterModule.registerAsync({
      inject: [videoUploadConfig.KEY],
      useFactory: (config: ConfigType<typeof videoUploadConfig>) => ({
        limits: { fileSize: config.maxFileSizeBytes, files: 1 },
      }),
    }),
  ],
  controllers: [VideoDocumentationController],
  providers: [VideoDocumentationService],
})
export class VideoDocumentationModule {}
