import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import { mkdtemp, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import videoUploadConfig from '../../config/video-upload.config';
import { FileProcessingFailedError } from '../../common/errors/upstream.errors';
import { HttpClientFactory } from '../../infrastructure/http/http-client.factory';
import { HttpSession } from '../../infrastructure/http/retrying-http-client';
import { GeminiFileUploaderService } from '../../infrastructure/gemini/gemini-file-uploader.service';
import { GeminiContentGeneratorService } from '../../infrastructure/gemini/gemini-content-generator.service';
import { RemoteFileHandle } from '../../infrastructure/gemini/gemini.types';
import { TempFileService } from '../../infrastructure/temp-files/temp-file.service';
import { DOCUMENTATION_PROMPT } from './documentation.prompt';
import { VideoDocumentationService } from './video-documentation.service';

const remoteFile: RemoteFileHandle = {
  uri: 'files/abc123',
  name: 'abc123',
  mimeType: 'application/octet-stream',
  state: 'ACTIVE',
};

describe('VideoDocumentationService', () => {
  let service: VideoDocumentationService;
  let tempDir: string;
  let session: HttpSession;
  let mockFactory: { create: jest.Mock<HttpSession, []> };
  let mockUploader: { uploadAndAwaitActive: jest.Mock };
  let mockGenerator: { generateTextFromFile: jest.Mock };

  const video = { buffer: Buffer.from('0123456789'), originalname: 'clip.mp4' };

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'video-docs-spec-'));
    session = { request: jest.fn() };
    mockFactory = { create: jest.fn<HttpSession, []>().mockReturnValue(session) };
    mockUploader = { uploadAndAwaitActive: jest.fn().mockResolvedValue(remoteFile) };
    mockGenerator = { generateTextFromFile: jest.fn().mockResolvedValue('# Doc') };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        VideoDocumentationService,
        TempFileService,
        {
          provide: videoUploadConfig.KEY,
          useValue: { maxFileSizeBytes: 1024, tempDir },
        },
        { provide: HttpClientFactory, useValue: mockFactory },
        { provide: GeminiFileUploaderService, useValue: mockUploader },
        { provide: GeminiContentGeneratorService, useValue: mockGenerator },
      ],
    }).compile();

    service = module.get<VideoDocumentationService>(VideoDocumentationService);

    // Suppress logger output during tests
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'debug').mockImplementation();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should return the generated documentation', async () => {
    await expect(service.generateDocumentation(video)).resolves.toEqual({
      generated_documentation: '# Doc',
    });
  });

  it('should upload the staged file with its detected metadata', async () => {
    await service.generateDocumentation(video);

    expect(mockUploader.uploadAndAwaitActive).toHaveBeenCalledWith(session, {
      path: expect.stringContaining(tempDir),
      displayName: 'clip.mp4',
      mimeType: 'application/octet-stream',
      sizeBytes: 10,
    });
  });

  it('should generate with the documentation prompt over one session', async () => {
    await service.generateDocumentation(video);

    expect(mockFactory.create).toHaveBeenCalledTimes(1);
    expect(mockGenerator.generateTextFromFile).toHaveBeenCalledWith(
      session,
      DOCUMENTATION_PROMPT,
      remoteFile,
    );
  });

  it('should remove the temp file after success', async () => {
    await service.generateDocumentation(video);

    expect(await readdir(tempDir)).toEqual([]);
  });

  it('should remove the temp file and rethrow when the upload fails', async () => {
    const failure = new FileProcessingFailedError('abc123');
    mockUploader.uploadAndAwaitActive.mockRejectedValueOnce(failure);

    await expect(service.generateDocumentation(video)).rejects.toBe(failure);
    expect(mockGenerator.generateTextFromFile).not.toHaveBeenCalled();
    expect(await readdir(tempDir)).toEqual([]);
  });

  it('should remove the temp file when generation throws', async () => {
    mockGenerator.generateTextFromFile.mockRejectedValueOnce(new Error('boom'));

    await expect(service.generateDocumentation(video)).rejects.toThrow('boom');
    expect(await readdir(tempDir)).toEqual([]);
  });

  it('should remove the temp file exactly once', async () => {
    const removeSpy = jest.spyOn(TempFileService.prototype, 'remove');
    mockUploader.uploadAndAwaitActive.mockRejectedValueOnce(new Error('boom'));

    await expect(service.generateDocumentation(video)).rejects.toThrow('boom');

    expect(removeSpy).toHaveBeenCalledTimes(1);
  });
});
