import type { BounceType, EngagementStatus } from '../entities/campaign-member.entity';

export interface NewCampaignMember {
  campaignId: string;
  contactId?: string | null;
  prospectId?: string | null;
  emailSentTo?: string | null;
  notes?: string | null;
}

export interface MarkSentOptions {
  subject?: string | null;
  messageId?: string | null;
  sentTo?: string | null;
}

export interface MarkConvertedOptions {
  dealId?: string | null;
  conversionValue?: number | null;
}

export interface MarkBouncedOptions {
  bounceType?: BounceType;
  errorMessage?: string | null;
}

export interface AudienceQuery {
  status?: EngagementStatus[];
  page: number;
  limit: number;
}

/** Raw per-campaign aggregate over engagement records. */
export interface EngagementAggregate {
  total: number;
  sent: number;
  delivered: number;
  opened: number;
  clicked: number;
  responded: number;
  bounced: number;
  unsubscribed: number;
  converted: number;
  conversionValue: number;
}
