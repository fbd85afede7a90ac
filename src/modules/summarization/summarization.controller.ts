import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  Res,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import type { Response } from 'express';
import { toHttpException } from '../../common/errors/http-exception.util';
import { abortOnClientDisconnect } from '../../common/utils/request-abort.util';
import { SummarizeTranscriptDto, UploadTranscriptDto } from './dto/summarize-transcript.dto';
import { SummarizationService, UploadedTranscriptFile } from './summarization.service';

@Controller('summarization')
export class SummarizationController {
  constructor(private readonly summarizationService: SummarizationService) {}

  /**
   * Summarize a transcript sent as JSON
   * POST /summarization
   * Body: { transcript: string, instruction: string }
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  async summarize(
    @Body() summarizeDto: SummarizeTranscriptDto,
    @Res({ passthrough: true }) res: Response,
  ) {
    try {
      const data = await this.summarizationService.summarize(summarizeDto, abortOnClientDisconnect(res));

      return {
        message: 'Summary generated successfully',
        success: true,
        data,
      };
    } catch (error) {
      throw toHttpException(error, 'Summarization failed');
    }
  }

  /**
   * Summarize an uploaded transcript file
   * POST /summarization/upload (multipart/form-data: file, instruction?)
   */
  @Post('upload')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor('file'))
  async uploadAndSummarize(
    @UploadedFile() file: UploadedTranscriptFile | undefined,
    @Body() uploadDto: UploadTranscriptDto,
    @Res({ passthrough: true }) res: Response,
  ) {
    try {
      const data = await this.summarizationService.summarizeUpload(
        file,
        uploadDto.instruction,
        abortOnClientDisconnect(res),
      );

      return {
        message: 'Summary generated successfully',
        success: true,
        data,
      };
    } catch (error) {
      throw toHttpException(error, 'Summarization failed');
    }
  }
}
