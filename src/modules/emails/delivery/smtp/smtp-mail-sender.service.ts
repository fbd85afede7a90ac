import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import type Mail from 'nodemailer/lib/mailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import { EMAIL_CONFIG, EmailConfig, isSmtpConfigured } from '../../../../config/email.config';
import { describeError } from '../../../../common/errors/http-exception.util';
import { ServiceNotConfiguredError, UpstreamServiceError } from '../../../../common/errors/service.errors';
import { DeliveryReceipt, MailSender, OutgoingMail } from '../../mail-sender.interface';

export const SMTP_TRANSPORT_FACTORY = Symbol('SMTP_TRANSPORT_FACTORY');

type AddressEntry = string | { address: string };

export interface SmtpSendInfo {
  messageId: string;
  accepted: AddressEntry[];
  rejected: AddressEntry[];
  response: string;
}

/** The part of a nodemailer transporter this sender relies on. */
export interface SmtpTransport {
  sendMail(mail: Mail.Options): Promise<SmtpSendInfo>;
  close(): void;
}

export type SmtpTransportFactory = (options: SMTPTransport.Options) => SmtpTransport;

function addressOf(entry: AddressEntry): string {
  return typeof entry === 'string' ? entry : entry.address;
}

@Injectable()
export class SmtpMailSenderService implements MailSender, OnModuleDestroy {
  private readonly logger = new Logger(SmtpMailSenderService.name);
  private readonly transport?: SmtpTransport;

  constructor(
    @Inject(EMAIL_CONFIG) private readonly config: EmailConfig,
    @Inject(SMTP_TRANSPORT_FACTORY) createTransport: SmtpTransportFactory,
  ) {
    if (!isSmtpConfigured(config)) {
      this.logger.warn('SMTP_USER / SMTP_PASS / EMAIL_FROM_EMAIL not found in environment variables');
      return;
    }

    const { smtp } = config;
    this.transport = createTransport({
      host: smtp.host,
      port: smtp.port,
      secure: smtp.secure,
      requireTLS: !smtp.secure,
      auth: {
        user: smtp.auth.user,
        pass: smtp.auth.pass,
      },
      connectionTimeout: smtp.timeoutMs,
      greetingTimeout: smtp.timeoutMs,
      socketTimeout: smtp.timeoutMs,
    });
    this.logger.log(`✅ SMTP transport initialized (${smtp.host}:${smtp.port})`);
  }

  async send(mail: OutgoingMail): Promise<DeliveryReceipt> {
    if (!this.transport) {
      throw new ServiceNotConfiguredError('smtp', 'SMTP not configured on server.');
    }

    try {
      const info = await this.transport.sendMail({
        from: { name: this.config.from.name, address: this.config.from.email },
        to: mail.to,
        subject: mail.subject,
        text: mail.text,
        html: mail.html,
      });

      this.logger.debug(`SMTP relay response: ${info.response}`);

      return {
        messageId: info.messageId,
        accepted: info.accepted.map(addressOf),
        rejected: info.rejected.map(addressOf),
      };
    } catch (error) {
      this.logger.error(`❌ SMTP send failed:`, error);
      throw new UpstreamServiceError('smtp', `SMTP delivery failed: ${describeError(error)}`);
    }
  }

  onModuleDestroy() {
    this.transport?.close();
  }
}
