import { Module } from '@nestjs/common';
import { CampaignAudienceController } from './campaign-audience.controller';
import { AudienceManagerService } from './audience-manager.service';
import { EngagementEventsService } from './engagement-events.service';
import { CampaignModule } from 'src/crmModules/campaign/campaign.module';
import { CampaignMemberModule } from 'src/crmModules/campaign-member/campaign-member.module';
import { CampaignMetricsModule } from 'src/crmModules/campaign-metrics/campaign-metrics.module';
import { CrmRecordsModule } from 'src/crmModules/crm-records/crm-records.module';
import { ProspectModule } from 'src/crmModules/prospect/prospect.module';
import { RecipientModule } from 'src/crmModules/recipient/recipient.module';

@Module({
  imports: [CampaignModule, CampaignMemberModule, CampaignMetricsModule, CrmRecordsModule, ProspectModule, RecipientModule],
  controllers: [CampaignAudienceController],
  providers: [AudienceManagerService, EngagementEventsService],
  exports: [AudienceManagerService, EngagementEventsService],
})
export class CampaignAudienceModule {}
