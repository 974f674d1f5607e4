// src/crmModules/recipient/recipient-resolver.service.ts
import { Injectable } from '@nestjs/common';

import { CampaignMember } from 'src/crmModules/campaign-member/entities/campaign-member.entity';
import { ContactRepository } from 'src/crmModules/crm-records/repository/contact.repository';
import { CompanyRepository } from 'src/crmModules/crm-records/repository/company.repository';
import { ProspectRepository } from 'src/crmModules/prospect/repository/prospect.repository';
import { MergeData } from 'src/common/templates/template-merge';

/** The person behind an audience member, flattened from a contact or a prospect. */
export interface Recipient {
  kind: 'contact' | 'prospect';
  id: string;
  firstName: string | null;
  lastName: string | null;
  fullName: string;
  email: string | null;
  phone: string | null;
  position: string | null;
  companyName: string | null;
  companyAddress: string | null;
  companyPhone: string | null;
}

const fullName = (first: string | null, last: string | null) =>
  [first, last].filter((s): s is string => !!s).join(' ');

@Injectable()
export class RecipientResolverService {
  constructor(
    private readonly contacts: ContactRepository,
    private readonly companies: CompanyRepository,
    private readonly prospects: ProspectRepository,
  ) {}

  /** Keyed by member id; members whose recipient row is gone are left out. */
  async resolve(members: CampaignMember[]): Promise<Map<string, Recipient>> {
    const contactIds = unique(members.map((m) => m.contactId));
    const prospectIds = unique(members.map((m) => m.prospectId));

    const [contacts, prospects] = await Promise.all([
      this.contacts.findByIds(contactIds),
      this.prospects.findByIds(prospectIds),
    ]);
    const companies = await this.companies.findByIds(unique(contacts.map((c) => c.companyId)));

    const companyById = new Map(companies.map((co) => [co.id, co]));
    const byContact = new Map<string, Recipient>();
    for (const c of contacts) {
      const company = c.companyId ? companyById.get(c.companyId) : undefined;
      byContact.set(c.id, {
        kind: 'contact',
        id: c.id,
        firstName: c.firstName,
        lastName: c.lastName,
        fullName: fullName(c.firstName, c.lastName),
        email: c.email,
        phone: c.phone,
        position: c.position,
        companyName: company?.name ?? null,
        companyAddress: company?.address ?? null,
        companyPhone: company?.phone ?? null,
      });
    }

    const byProspect = new Map<string, Recipient>();
    for (const p of prospects) {
      byProspect.set(p.id, {
        kind: 'prospect',
        id: p.id,
        firstName: p.firstName,
        lastName: p.lastName,
        fullName: fullName(p.firstName, p.lastName),
        email: p.email,
        phone: p.phone,
        position: p.jobTitle,
        companyName: p.companyName,
        companyAddress: null,
        companyPhone: null,
      });
    }

    const out = new Map<string, Recipient>();
    for (const m of members) {
      const r = m.contactId ? byContact.get(m.contactId) : m.prospectId ? byProspect.get(m.prospectId) : undefined;
      if (r) out.set(m.id, r);
    }
    return out;
  }

  async resolveOne(member: CampaignMember): Promise<Recipient | undefined> {
    return (await this.resolve([member])).get(member.id);
  }
}

/**
 * Merge values for one recipient; `email` is the address actually sent to.
 * Company keys are left out when no company is known, so their placeholders stay as written.
 */
export function mergeFieldsFor(r: Recipient, email: string | null): MergeData {
  const data: MergeData = {
    first_name: r.firstName,
    last_name: r.lastName,
    full_name: r.fullName,
    email,
    phone: r.phone,
    position: r.position,
  };
  if (r.companyName === null) return data;
  return {
    ...data,
    company_name: r.companyName,
    company_address: r.companyAddress,
    company_phone: r.companyPhone,
  };
}

function unique(ids: (string | null)[]): string[] {
  return [...new Set(ids.filter((id): id is string => !!id))];
}
