import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Transporter } from 'nodemailer';
import { MAIL_TRANSPORT } from './mail.constants';
import { renderConfirmationEmail } from './confirmation-email';

/**
 * MailService — outgoing email over SMTP.
 *
 * Callers decide whether a delivery failure matters; errors from the
 * transport are logged and re-thrown.
 */
@Injectable()
export class MailService {
  private readonly logger = new Logger(MailService.name);
  private readonly from: string;
  private readonly baseUrl: string;

  constructor(
    @Inject(MAIL_TRANSPORT)
    private readonly transport: Transporter,
    configService: ConfigService,
  ) {
    this.from = configService.get<string>('MAIL_FROM', 'no-reply@contacts.local');
    this.baseUrl = configService
      .get<string>('APP_BASE_URL', 'http://localhost:8000')
      .replace(/\/+$/, '');
  }

  /**
   * Sends the confirmation link for `token` to `email`.
   */
  async sendConfirmationEmail(
    email: string,
    username: string,
    token: string,
  ): Promise<void> {
    const confirmUrl = `${this.baseUrl}/api/auth/confirmed_email/${encodeURIComponent(token)}`;
    const { subject, html, text } = renderConfirmationEmail(username, confirmUrl);

    try {
      await this.transport.sendMail({ from: this.from, to: email, subject, html, text });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to send confirmation email to ${email}: ${message}`);
      throw error;
    }

    this.logger.log(`Confirmation email sent to ${email}`);
  }
}
