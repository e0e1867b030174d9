import {
  BadRequestException,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { VideoDocumentationService } from './video-documentation.service';
import { GeneratedDocumentationDto } from './dto/generated-documentation.dto';

export const VIDEO_FIELD = 'video';

@Controller()
export class VideoDocumentationController {
  private readonly logger = new Logger(VideoDocumentationController.name);

  constructor(
    private readonly videoDocumentationService: VideoDocumentationService,
  ) {}

  @Post('upload-video')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor(VIDEO_FIELD))
  async uploadVideo(
    @UploadedFile() video: Express.Multer.File | undefined,
  ): Promise<GeneratedDocumentationDto> {
    if (!video) {
      throw new BadRequestException('No video file part');
    }
    if (video.originalname === '') {
      throw new BadRequestException('No selected file');
    }

    this.logger.log(
      `Received ${video.originalname} (${video.mimetype}, ${video.size} bytes)`,
    );

    return this.videoDocumentationService.generateDocumentation(video);
  }
}
