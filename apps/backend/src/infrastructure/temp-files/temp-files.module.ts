import { Module } from '@nestjs/common';
import { TempFileService } from './temp-file.service';

@Module({
  providers: [TempFileService],
  exports: [TempFileService],
})
export class TempFilesModule {}
