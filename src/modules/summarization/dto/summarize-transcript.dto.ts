import { Transform } from 'class-transformer';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { trimString } from '../../../common/utils/text.util';

export const MAX_INSTRUCTION_LENGTH = 2000;

export class SummarizeTranscriptDto {
  @Transform(trimString)
  @IsString({ message: 'transcript must be a string' })
  @IsNotEmpty({ message: 'transcript must not be empty' })
  transcript!: string;

  @Transform(trimString)
  @IsString({ message: 'instruction must be a string' })
  @IsNotEmpty({ message: 'instruction must not be empty' })
  @MaxLength(MAX_INSTRUCTION_LENGTH)
  instruction!: string;
}

/** Multipart fields sent next to an uploaded transcript file. */
export class UploadTranscriptDto {
  @IsOptional()
  @Transform(trimString)
  @IsString()
  @MaxLength(MAX_INSTRUCTION_LENGTH)
  instruction?: string;
}

export interface SummaryResponseDto {
  summary: string;
  model: string;
  tokensUsed: number;
  processingTime: number;
}
