import { Module } from '@nestjs/common';
import { CampaignMemberRepository } from './repository/campaign-member.repository';
import { EngagementTrackerService } from './engagement-tracker.service';

@Module({
  providers: [CampaignMemberRepository, EngagementTrackerService],
  exports: [CampaignMemberRepository, EngagementTrackerService],
})
export class CampaignMemberModule {}
