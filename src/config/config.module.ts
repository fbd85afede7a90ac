import { Global, Module } from '@nestjs/common';
import { APP_CONFIG, loadAppConfig } from './app.config';
import { EMAIL_CONFIG, loadEmailConfig } from './email.config';
import { LLM_CONFIG, loadLlmConfig } from './llm.config';

@Global()
@Module({
  providers: [
    { provide: APP_CONFIG, useFactory: () => loadAppConfig() },
    { provide: LLM_CONFIG, useFactory: () => loadLlmConfig() },
    { provide: EMAIL_CONFIG, useFactory: () => loadEmailConfig() },
  ],
  exports: [APP_CONFIG, LLM_CONFIG, EMAIL_CONFIG],
})
export class ConfigModule {}
