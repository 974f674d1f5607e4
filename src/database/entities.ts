import { Campaign } from 'src/crmModules/campaign/entities/campaign.entity';
import { CampaignMember } from 'src/crmModules/campaign-member/entities/campaign-member.entity';
import { CampaignMetric } from 'src/crmModules/campaign-metrics/entities/campaign-metric.entity';
import { Prospect } from 'src/crmModules/prospect/entities/prospect.entity';
import { LeadScoreHistory } from 'src/crmModules/prospect/entities/lead-score-history.entity';
import { EmailTemplate } from 'src/crmModules/email-template/entities/email-template.entity';
import { Contact } from 'src/crmModules/crm-records/entities/contact.entity';
import { Company } from 'src/crmModules/crm-records/entities/company.entity';
import { Deal } from 'src/crmModules/crm-records/entities/deal.entity';
import { Activity } from 'src/crmModules/crm-records/entities/activity.entity';

export const ENTITIES = [
  Campaign,
  CampaignMember,
  CampaignMetric,
  Prospect,
  LeadScoreHistory,
  EmailTemplate,
  Contact,
  Company,
  Deal,
  Activity,
];
