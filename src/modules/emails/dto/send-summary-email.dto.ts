import { Transform } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsEmail,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
} from 'class-validator';
import { trimString, trimStringArray } from '../../../common/utils/text.util';

export const MAX_RECIPIENTS = 50;

export class SendSummaryEmailDto {
  @Transform(trimString)
  @IsString({ message: 'summary must be a string' })
  @IsNotEmpty({ message: 'summary must not be empty' })
  summary!: string;

  @Transform(trimStringArray)
  @IsArray({ message: 'recipients must be an array of email addresses' })
  @ArrayMinSize(1, { message: 'recipients must contain at least one address' })
  @ArrayMaxSize(MAX_RECIPIENTS, { message: `recipients must contain at most ${MAX_RECIPIENTS} addresses` })
  @IsEmail({}, { each: true, message: 'recipients must contain only valid email addresses' })
  recipients!: string[];

  @IsOptional()
  @Transform(trimString)
  @IsString()
  @MaxLength(200)
  @Matches(/^[^\r\n]*$/, { message: 'subject must be a single line' })
  subject?: string;
}

export interface EmailDeliveryResponseDto {
  messageId: string;
  recipients: string[];
  accepted: string[];
  rejected: string[];
}
