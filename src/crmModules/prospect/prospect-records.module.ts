import { Module } from '@nestjs/common';
import { ProspectRepository } from './repository/prospect.repository';
import { LeadScoreHistoryRepository } from './repository/lead-score-history.repository';

/** Prospect storage alone, for modules that read prospects without the prospect workflows. */
@Module({
  providers: [ProspectRepository, LeadScoreHistoryRepository],
  exports: [ProspectRepository, LeadScoreHistoryRepository],
})
export class ProspectRecordsModule {}
