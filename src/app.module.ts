import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ConfigModule } from './config/config.module';
import { SummarizationModule } from './modules/summarization/summarization.module';
import { EmailsModule } from './modules/emails/emails.module';

@Module({
  imports: [ConfigModule, SummarizationModule, EmailsModule],
  controllers: [AppController],
})
export class AppModule {}
