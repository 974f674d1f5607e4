import { Module } from '@nestjs/common';
import { EmailTemplateController } from './email-template.controller';
import { EmailTemplateService } from './email-template.service';
import { EmailTemplateRepository } from './repository/email-template.repository';

@Module({
  controllers: [EmailTemplateController],
  providers: [EmailTemplateRepository, EmailTemplateService],
  exports: [EmailTemplateRepository, EmailTemplateService],
})
export class EmailTemplateModule {}
