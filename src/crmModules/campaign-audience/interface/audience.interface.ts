import type { CampaignMember } from 'src/crmModules/campaign-member/entities/campaign-member.entity';

export interface AddMemberResult {
  member: CampaignMember;
  /** false when the recipient was already in the audience. */
  created: boolean;
}

export interface BulkAddResult {
  requested: number;
  added: number;
  skipped: number;
  missing: number;
}

export interface AddAudienceResult {
  addedContacts: number;
  addedProspects: number;
  skipped: number;
  missing: number;
  totalAudience: number;
  message: string;
}

export interface AudienceEntry extends CampaignMember {
  recipientType: 'contact' | 'prospect';
  recipientName: string | null;
  recipientEmail: string | null;
  engagementScore: number;
}
