import { Controller, Get, Inject } from '@nestjs/common';
import { EMAIL_CONFIG, EmailConfig, isSmtpConfigured } from './config/email.config';
import { LLM_CONFIG, LlmConfig, isLlmConfigured } from './config/llm.config';

@Controller()
export class AppController {
  constructor(
    @Inject(LLM_CONFIG) private readonly llmConfig: LlmConfig,
    @Inject(EMAIL_CONFIG) private readonly emailConfig: EmailConfig,
  ) {}

  @Get('health')
  health() {
    return {
      status: 'ok',
      services: {
        llm: isLlmConfigured(this.llmConfig),
        smtp: isSmtpConfigured(this.emailConfig),
      },
    };
  }
}
