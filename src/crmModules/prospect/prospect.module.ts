import { Module } from '@nestjs/common';
import { ProspectController } from './prospect.controller';
import { ProspectService } from './prospect.service';
import { ProspectConverterService } from './prospect-converter.service';
import { LeadScoreTrackerService } from './lead-score-tracker.service';
import { ProspectRecordsModule } from './prospect-records.module';
import { CampaignModule } from 'src/crmModules/campaign/campaign.module';
import { CampaignMemberModule } from 'src/crmModules/campaign-member/campaign-member.module';
import { CampaignMetricsModule } from 'src/crmModules/campaign-metrics/campaign-metrics.module';
import { CrmRecordsModule } from 'src/crmModules/crm-records/crm-records.module';

@Module({
  imports: [ProspectRecordsModule, CampaignModule, CampaignMemberModule, CampaignMetricsModule, CrmRecordsModule],
  controllers: [ProspectController],
  providers: [LeadScoreTrackerService, ProspectConverterService, ProspectService],
  exports: [ProspectRecordsModule, LeadScoreTrackerService, ProspectConverterService, ProspectService],
})
export class ProspectModule {}
