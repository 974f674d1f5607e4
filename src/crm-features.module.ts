import { Module } from '@nestjs/common';
import { EmailTemplateModule } from './crmModules/email-template/email-template.module';
import { CampaignModule } from './crmModules/campaign/campaign.module';
import { ProspectModule } from './crmModules/prospect/prospect.module';
import { CampaignMetricsModule } from './crmModules/campaign-metrics/campaign-metrics.module';
import { CampaignAudienceModule } from './crmModules/campaign-audience/campaign-audience.module';
import { CampaignExecutionModule } from './crmModules/campaign-execution/campaign-execution.module';

/** Every feature module, without the scheduler, so tests can load them as a unit. */
@Module({
  imports: [
    EmailTemplateModule,
    CampaignModule,
    ProspectModule,
    CampaignMetricsModule,
    CampaignAudienceModule,
    CampaignExecutionModule,
  ],
})
export class CrmFeaturesModule {}
