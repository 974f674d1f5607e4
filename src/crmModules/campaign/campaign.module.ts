import { Module } from '@nestjs/common';
import { CampaignController } from './campaign.controller';
import { CampaignService } from './campaign.service';
import { CampaignRepository } from './repository/campaign.repository';
import { EmailTemplateModule } from 'src/crmModules/email-template/email-template.module';

@Module({
  imports: [EmailTemplateModule],
  controllers: [CampaignController],
  providers: [CampaignRepository, CampaignService],
  exports: [CampaignRepository, CampaignService],
})
export class CampaignModule {}
