import { Module } from '@nestjs/common';
import { CampaignMetricsController } from './campaign-metrics.controller';
import { MetricsAggregatorService } from './metrics-aggregator.service';
import { MetricsSnapshotJob } from './metrics-snapshot.job';
import { CampaignMetricRepository } from './repository/campaign-metric.repository';
import { CampaignModule } from 'src/crmModules/campaign/campaign.module';
import { CampaignMemberModule } from 'src/crmModules/campaign-member/campaign-member.module';
import { ProspectRecordsModule } from 'src/crmModules/prospect/prospect-records.module';
import { RecipientModule } from 'src/crmModules/recipient/recipient.module';
import { CrmRecordsModule } from 'src/crmModules/crm-records/crm-records.module';

@Module({
  imports: [CampaignModule, CampaignMemberModule, ProspectRecordsModule, RecipientModule, CrmRecordsModule],
  controllers: [CampaignMetricsController],
  providers: [CampaignMetricRepository, MetricsAggregatorService, MetricsSnapshotJob],
  exports: [MetricsAggregatorService],
})
export class CampaignMetricsModule {}
