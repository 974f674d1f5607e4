// src/crmModules/crm-records/crm-records.module.ts
import { Module } from '@nestjs/common';
import { ContactRepository } from './repository/contact.repository';
import { CompanyRepository } from './repository/company.repository';
import { DealRepository } from './repository/deal.repository';
import { ActivityRepository } from './repository/activity.repository';

/**
 * Contacts, companies, deals and activities are owned elsewhere; this module
 * only exposes the lookups and inserts the campaign/prospect core needs.
 */
@Module({
  providers: [ContactRepository, CompanyRepository, DealRepository, ActivityRepository],
  exports: [ContactRepository, CompanyRepository, DealRepository, ActivityRepository],
})
export class CrmRecordsModule {}
