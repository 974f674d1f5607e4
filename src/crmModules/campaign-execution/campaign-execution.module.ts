import { Module } from '@nestjs/common';
import { CampaignExecutionController } from './campaign-execution.controller';
import { CampaignExecutorService } from './campaign-executor.service';
import { ScheduledCampaignRunner } from './scheduled-campaign.runner';
import { CampaignModule } from 'src/crmModules/campaign/campaign.module';
import { CampaignMemberModule } from 'src/crmModules/campaign-member/campaign-member.module';
import { CampaignMetricsModule } from 'src/crmModules/campaign-metrics/campaign-metrics.module';
import { EmailTemplateModule } from 'src/crmModules/email-template/email-template.module';
import { RecipientModule } from 'src/crmModules/recipient/recipient.module';
import { MailModule } from 'src/common/mail/mail.module';

@Module({
  imports: [CampaignModule, CampaignMemberModule, CampaignMetricsModule, EmailTemplateModule, RecipientModule, MailModule],
  controllers: [CampaignExecutionController],
  providers: [CampaignExecutorService, ScheduledCampaignRunner],
  exports: [CampaignExecutorService, ScheduledCampaignRunner],
})
export class CampaignExecutionModule {}
