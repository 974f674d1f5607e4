// src/common/mail/smtp-email.transport.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { createTransport, Transporter } from 'nodemailer';
import SMTPTransport from 'nodemailer/lib/smtp-transport';
import { APP_CONFIG, AppConfig } from 'src/config/app.config';
import { EmailSendResult, EmailTransport, OutboundEmail } from './email-transport';

@Injectable()
export class SmtpEmailTransport implements EmailTransport {
  private readonly logger = new Logger(SmtpEmailTransport.name);
  private readonly transporter: Transporter<SMTPTransport.SentMessageInfo>;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    const { host, port, secure, user, pass } = config.smtp;
    this.transporter = createTransport({
      host,
      port,
      secure,
      ...(user ? { auth: { user, pass } } : {}),
    });
  }

  async send(email: OutboundEmail): Promise<EmailSendResult> {
    try {
      const info = await this.transporter.sendMail({
        from: { name: email.fromName, address: email.fromEmail },
        to: email.to,
        subject: email.subject,
        html: email.html,
      });
      return { success: true, message: 'Email sent', messageId: info.messageId };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`[send] SMTP delivery to ${email.to} failed: ${message}`);
      return { success: false, message };
    }
  }
}
