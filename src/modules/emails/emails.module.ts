import { Module } from '@nestjs/common';
import { createTransport } from 'nodemailer';
import { EmailsController } from './emails.controller';
import { EmailsService } from './emails.service';
import { MAIL_SENDER } from './mail-sender.interface';
import {
  SMTP_TRANSPORT_FACTORY,
  SmtpMailSenderService,
  SmtpTransportFactory,
} from './delivery/smtp/smtp-mail-sender.service';

const createSmtpTransport: SmtpTransportFactory = (options) => createTransport(options);

@Module({
  controllers: [EmailsController],
  providers: [
    EmailsService,
    SmtpMailSenderService,
    { provide: SMTP_TRANSPORT_FACTORY, useValue: createSmtpTransport },
    { provide: MAIL_SENDER, useExisting: SmtpMailSenderService },
  ],
})
export class EmailsModule {}
