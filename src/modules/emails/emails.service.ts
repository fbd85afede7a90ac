import { Inject, Injectable, Logger } from '@nestjs/common';
import { EMAIL_CONFIG, EmailConfig } from '../../config/email.config';
import { describeError } from '../../common/errors/http-exception.util';
import { escapeHtml, uniqueAddresses } from '../../common/utils/text.util';
import { EmailDeliveryResponseDto, SendSummaryEmailDto } from './dto/send-summary-email.dto';
import { MAIL_SENDER, MailSender, OutgoingMail } from './mail-sender.interface';

@Injectable()
export class EmailsService {
  private readonly logger = new Logger(EmailsService.name);

  constructor(
    @Inject(MAIL_SENDER) private readonly mailSender: MailSender,
    @Inject(EMAIL_CONFIG) private readonly config: EmailConfig,
  ) {}

  /**
   * Send the (possibly edited) summary as a single message to every recipient
   */
  async sendSummary(emailDto: SendSummaryEmailDto): Promise<EmailDeliveryResponseDto> {
    const mail = this.composeSummaryEmail(emailDto);

    try {
      const receipt = await this.mailSender.send(mail);

      this.logger.log(`✅ Summary email sent to ${mail.to.length} recipient(s) (Message ID: ${receipt.messageId})`);
      if (receipt.rejected.length > 0) {
        this.logger.warn(`Relay rejected ${receipt.rejected.length} recipient(s): ${receipt.rejected.join(', ')}`);
      }

      return {
        messageId: receipt.messageId,
        recipients: mail.to,
        accepted: receipt.accepted,
        rejected: receipt.rejected,
      };
    } catch (error) {
      this.logger.error(`❌ Summary email failed: ${describeError(error)}`);
      throw error;
    }
  }

  composeSummaryEmail(emailDto: SendSummaryEmailDto): OutgoingMail {
    const summary = emailDto.summary.trim();

    return {
      to: uniqueAddresses(emailDto.recipients.map((recipient) => recipient.trim())),
      subject: emailDto.subject?.trim() || this.config.defaultSubject,
      text: summary,
      html: this.renderHtml(summary),
    };
  }

  private renderHtml(summary: string): string {
    return (
      '<html><body>' +
      `<pre style="font-family: ui-monospace, monospace; white-space: pre-wrap;">${escapeHtml(summary)}</pre>` +
      '</body></html>'
    );
  }
}
