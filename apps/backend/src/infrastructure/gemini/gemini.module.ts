import { Module } from '@nestjs/common';
import { HttpModule } from '../http/http.module';
import { GeminiFileUploaderService } from './gemini-file-uploader.service';
import { GeminiContentGeneratorService } from './gemini-content-generator.service';

@Module({
  imports: [HttpModule],
  providers: [GeminiFileUploaderService, GeminiContentGeneratorService],
  exports: [HttpModule, GeminiFileUploaderService, GeminiContentGeneratorService],
})
export class GeminiModule {}
