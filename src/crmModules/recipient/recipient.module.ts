import { Module } from '@nestjs/common';
import { RecipientResolverService } from './recipient-resolver.service';
import { CrmRecordsModule } from 'src/crmModules/crm-records/crm-records.module';
import { ProspectRecordsModule } from 'src/crmModules/prospect/prospect-records.module';

@Module({
  imports: [CrmRecordsModule, ProspectRecordsModule],
  providers: [RecipientResolverService],
  exports: [RecipientResolverService],
})
export class RecipientModule {}
