import { Module } from '@nestjs/common';
import { MulterModule } from '@nestjs/platform-express';
import { APP_CONFIG } from '../../config/app.config';
import { SummarizationService } from './summarization.service';
import { SummarizationController } from './summarization.controller';
import { LlmClientService } from './llm-client/llm-client.service';
import { SUMMARIZER } from './summarizer.interface';
import { transcriptUploadOptions } from './upload-limits';

@Module({
  imports: [
    MulterModule.registerAsync({
      useFactory: transcriptUploadOptions,
      inject: [APP_CONFIG],
    }),
  ],
  controllers: [SummarizationController],
  providers: [
    SummarizationService,
    LlmClientService,
    { provide: SUMMARIZER, useExisting: LlmClientService },
  ],
})
export class SummarizationModule {}
