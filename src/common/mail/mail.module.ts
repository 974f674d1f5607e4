import { Module } from '@nestjs/common';
import { EMAIL_TRANSPORT } from './email-transport';
import { SmtpEmailTransport } from './smtp-email.transport';

@Module({
  providers: [{ provide: EMAIL_TRANSPORT, useClass: SmtpEmailTransport }],
  exports: [EMAIL_TRANSPORT],
})
export class MailModule {}
