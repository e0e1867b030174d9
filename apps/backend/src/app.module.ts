import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';

// Config
import appConfig from './config/app.config';
import geminiConfig from './config/gemini.config';
import videoUploadConfig from './config/video-upload.config';
import { validateEnvironment } from './config/env.validation';

// Common
import { ErrorEnvelopeFilter } from './common/filters/error-envelope.filter';

// Modules
import { HealthModule } from './modules/health/health.module';
import { VideoDocumentationModule } from './modules/video-documentation/video-documentation.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, geminiConfig, videoUploadConfig],
      envFilePath: ['.env.local', '.env'],
      validate: validateEnvironment,
    }),

    // Feature Modules
    HealthModule,
    VideoDocumentationModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: ErrorEnvelopeFilter }],
})
export class AppModule {}
