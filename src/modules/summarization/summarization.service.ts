import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  PayloadTooLargeException,
  UnsupportedMediaTypeException,
} from '@nestjs/common';
import { extname } from 'path';
import { APP_CONFIG, AppConfig } from '../../config/app.config';
import { describeError } from '../../common/errors/http-exception.util';
import { DEFAULT_INSTRUCTION } from './prompts/meeting-minutes.prompt';
import { SummaryResponseDto } from './dto/summarize-transcript.dto';
import { SUMMARIZER, Summarizer, SummaryRequest } from './summarizer.interface';

/** The subset of a multer file the upload flow reads. */
export interface UploadedTranscriptFile {
  originalname: string;
  mimetype: string;
  size: number;
  buffer: Buffer;
}

const TEXT_EXTENSIONS = new Set(['.txt', '.md', '.vtt', '.srt']);

@Injectable()
export class SummarizationService {
  private readonly logger = new Logger(SummarizationService.name);

  constructor(
    @Inject(SUMMARIZER) private readonly summarizer: Summarizer,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async summarize(request: SummaryRequest, signal?: AbortSignal): Promise<SummaryResponseDto> {
    const transcript = request.transcript.trim();
    const instruction = request.instruction.trim();

    if (!transcript) {
      throw new BadRequestException('transcript must not be empty');
    }
    if (!instruction) {
      throw new BadRequestException('instruction must not be empty');
    }
    if (transcript.length > this.config.maxTranscriptChars) {
      throw new PayloadTooLargeException(
        `Transcript is too long (${transcript.length} characters, limit ${this.config.maxTranscriptChars})`,
      );
    }

    const startTime = Date.now();
    try {
      const result = await this.summarizer.summarize({ transcript, instruction }, signal);
      const processingTime = Date.now() - startTime;

      this.logger.log(
        `✅ Summarized ${transcript.length}-character transcript using ${result.model} (${result.tokensUsed} tokens, ${processingTime}ms)`,
      );

      return {
        summary: result.summary,
        model: result.model,
        tokensUsed: result.tokensUsed,
        processingTime,
      };
    } catch (error) {
      this.logger.error(`❌ Summarization failed: ${describeError(error)}`);
      throw error;
    }
  }

  async summarizeUpload(
    file: UploadedTranscriptFile | undefined,
    instruction: string | undefined,
    signal?: AbortSignal,
  ): Promise<SummaryResponseDto> {
    if (!file) {
      throw new BadRequestException('A transcript file is required in the "file" field');
    }
    if (!this.isTextFile(file)) {
      throw new UnsupportedMediaTypeException(
        `Unsupported transcript file type "${file.mimetype}". Upload a plain text file (.txt, .md, .vtt, .srt)`,
      );
    }
    if (file.size > this.config.maxUploadBytes) {
      throw new PayloadTooLargeException(
        `Transcript file is too large (${file.size} bytes, limit ${this.config.maxUploadBytes})`,
      );
    }

    const transcript = this.decodeTranscript(file.buffer);
    if (!transcript.trim()) {
      throw new BadRequestException(`Uploaded file "${file.originalname}" is empty`);
    }

    this.logger.debug(`Received transcript upload "${file.originalname}" (${file.size} bytes)`);

    return this.summarize(
      { transcript, instruction: instruction?.trim() || DEFAULT_INSTRUCTION },
      signal,
    );
  }

  private isTextFile(file: UploadedTranscriptFile): boolean {
    return file.mimetype.startsWith('text/') || TEXT_EXTENSIONS.has(extname(file.originalname).toLowerCase());
  }

  private decodeTranscript(buffer: Buffer): string {
    return buffer.toString('utf8').replace(/^\uFEFF/, '');
  }
}
