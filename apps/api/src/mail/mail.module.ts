import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { createTransport, Transporter } from 'nodemailer';
import { parseNumber } from '../common/parse-number';
import { MAIL_TRANSPORT } from './mail.constants';
import { MailService } from './mail.service';

/**
 * MailModule — SMTP transport configured from MAIL_* settings.
 * Port 465 uses implicit TLS; other ports upgrade with STARTTLS.
 */
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: MAIL_TRANSPORT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Transporter => {
        const port = parseNumber(configService.get<string>('MAIL_PORT'), 465);
        const user = configService.get<string>('MAIL_USERNAME');
        return createTransport({
          host: configService.get<string>('MAIL_HOST', 'localhost'),
          port,
          secure: port === 465,
          // Local relays (MailHog, Mailpit) accept mail without auth
          auth: user
            ? { user, pass: configService.get<string>('MAIL_PASSWORD', '') }
            : undefined,
        });
      },
    },
    MailService,
  ],
  exports: [MailService],
})
export class MailModule {}
