import { Test, TestingModule } from '@nestjs/testing';
import { DeepPartial } from 'typeorm';

import { AppConfigModule } from '../../src/config/app-config.module';
import { DatabaseModule } from '../../src/database/database.module';
import { CrmFeaturesModule } from '../../src/crm-features.module';
import { Actor, actorFor } from '../../src/auth/actor';
import {
  EMAIL_TRANSPORT,
  EmailSendResult,
  EmailTransport,
  OutboundEmail,
} from '../../src/common/mail/email-transport';
import { Campaign } from '../../src/crmModules/campaign/entities/campaign.entity';
import { CampaignService } from '../../src/crmModules/campaign/campaign.service';
import { CreateCampaignSchema } from '../../src/crmModules/campaign/schema/campaign.schema';
import { EmailTemplate } from '../../src/crmModules/email-template/entities/email-template.entity';
import {
  EmailTemplatePatch,
  EmailTemplateRepository,
} from '../../src/crmModules/email-template/repository/email-template.repository';
import { Contact } from '../../src/crmModules/crm-records/entities/contact.entity';
import { Company } from '../../src/crmModules/crm-records/entities/company.entity';
import { Deal } from '../../src/crmModules/crm-records/entities/deal.entity';
import { ContactRepository } from '../../src/crmModules/crm-records/repository/contact.repository';
import { CompanyRepository } from '../../src/crmModules/crm-records/repository/company.repository';
import { DealRepository } from '../../src/crmModules/crm-records/repository/deal.repository';
import { Prospect } from '../../src/crmModules/prospect/entities/prospect.entity';
import { ProspectService } from '../../src/crmModules/prospect/prospect.service';
import { CreateProspectSchema } from '../../src/crmModules/prospect/schema/prospect.schema';

export const ADMIN = actorFor('00000000-0000-4000-8000-000000000001', 'admin');
export const REP = actorFor('00000000-0000-4000-8000-000000000002', 'sales_rep');

/** Records every accepted email; addresses in `failFor` come back as failures. */
export class FakeEmailTransport implements EmailTransport {
  readonly sent: OutboundEmail[] = [];
  readonly failFor = new Set<string>();
  private seq = 0;

  async send(email: OutboundEmail): Promise<EmailSendResult> {
    if (this.failFor.has(email.to)) {
      return { success: false, message: `Mailbox unavailable: ${email.to}` };
    }
    this.seq += 1;
    this.sent.push(email);
    return { success: true, message: 'Email sent', messageId: `<msg-${this.seq}@test.local>` };
  }

  reset(): void {
    this.sent.length = 0;
    this.failFor.clear();
  }
}

export interface TestApp {
  moduleRef: TestingModule;
  mail: FakeEmailTransport;
  seed: Seeder;
}

/** Every feature module over a private in-memory database. */
export async function createTestApp(): Promise<TestApp> {
  const mail = new FakeEmailTransport();
  const moduleRef = await Test.createTestingModule({
    imports: [AppConfigModule, DatabaseModule, CrmFeaturesModule],
  })
    .overrideProvider(EMAIL_TRANSPORT)
    .useValue(mail)
    .compile();

  return { moduleRef, mail, seed: new Seeder(moduleRef) };
}

let counter = 0;
export const uniqueEmail = (prefix = 'person') => `${prefix}.${++counter}@example.com`;
export const uniquePhone = () => `+1555${String(++counter).padStart(7, '0')}`;

export class Seeder {
  constructor(private readonly moduleRef: TestingModule) {}

  template(data: EmailTemplatePatch = {}): Promise<EmailTemplate> {
    return this.moduleRef.get(EmailTemplateRepository).create({
      name: 'Welcome',
      subject: 'Hello {{first_name}}',
      body: '<p>Hi {{first_name}} from {{company_name}}</p>',
      isActive: true,
      createdBy: ADMIN.id,
      ...data,
    });
  }

  /** Email campaign with its own active template unless `input` says otherwise. */
  async campaign(input: Record<string, unknown> = {}, actor: Actor = ADMIN): Promise<Campaign> {
    const needsTemplate = (input['type'] ?? 'email') === 'email' && !('emailTemplateId' in input);
    const template = needsTemplate ? await this.template() : null;
    const dto = CreateCampaignSchema.parse({
      name: `Campaign ${++counter}`,
      ...(template ? { emailTemplateId: template.id } : {}),
      ...input,
    });
    return this.moduleRef.get(CampaignService).create(dto, actor);
  }

  company(data: DeepPartial<Company> = {}): Promise<Company> {
    return this.moduleRef.get(CompanyRepository).create({ name: `Company ${++counter}`, ...data });
  }

  contact(data: DeepPartial<Contact> = {}): Promise<Contact> {
    return this.moduleRef.get(ContactRepository).create({
      firstName: 'Casey',
      lastName: 'Contact',
      email: uniqueEmail('contact'),
      ownerId: ADMIN.id,
      ...data,
    });
  }

  prospect(input: Record<string, unknown> = {}, actor: Actor = ADMIN): Promise<Prospect> {
    const dto = CreateProspectSchema.parse({
      firstName: 'Pat',
      lastName: 'Prospect',
      email: uniqueEmail('prospect'),
      ...input,
    });
    return this.moduleRef.get(ProspectService).create(dto, actor);
  }

  deal(data: DeepPartial<Deal> = {}): Promise<Deal> {
    return this.moduleRef.get(DealRepository).create({
      name: `Deal ${++counter}`,
      value: 1000,
      ownerId: ADMIN.id,
      ...data,
    });
  }
}
