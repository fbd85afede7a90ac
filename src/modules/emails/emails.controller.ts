import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { toHttpException } from '../../common/errors/http-exception.util';
import { SendSummaryEmailDto } from './dto/send-summary-email.dto';
import { EmailsService } from './emails.service';

@Controller('emails')
export class EmailsController {
  constructor(private readonly emailsService: EmailsService) {}

  /**
   * Email the final summary
   * POST /emails/send
   * Body: { summary: string, recipients: string[], subject?: string }
   */
  @Post('send')
  @HttpCode(HttpStatus.OK)
  async sendSummary(@Body() emailDto: SendSummaryEmailDto) {
    try {
      const data = await this.emailsService.sendSummary(emailDto);

      return {
        message: 'Email sent successfully',
        success: true,
        data,
      };
    } catch (error) {
      throw toHttpException(error, 'Failed to send email');
    }
  }
}
