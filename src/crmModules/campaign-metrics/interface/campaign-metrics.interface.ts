import type { EngagementStatus } from 'src/crmModules/campaign-member/entities/campaign-member.entity';
import type { CampaignStatus } from 'src/crmModules/campaign/entities/campaign.entity';

export interface FunnelCounts {
  sent: number;
  delivered: number;
  opened: number;
  clicked: number;
  responded: number;
  bounced: number;
  unsubscribed: number;
  converted: number;
}

/** Percentages rounded to 2 decimals; 0 whenever the denominator is 0. */
export interface CampaignRates {
  deliveryRate: number;
  openRate: number;
  clickRate: number;
  responseRate: number;
  conversionRate: number;
  bounceRate: number;
  roi: number;
}

export interface CampaignMetricsView {
  campaignId: string;
  status: CampaignStatus;
  audienceSize: number;
  counts: FunnelCounts;
  prospectsGenerated: number;
  rates: CampaignRates;
  budget: number;
  actualCost: number;
  actualRevenue: number;
  lastExecutedAt: Date | null;
}

export interface TimelinePoint {
  date: string;
  sent: number;
  delivered: number;
  opened: number;
  clicked: number;
  converted: number;
  openRate: number;
  clickRate: number;
  conversionRate: number;
}

export interface TopPerformer {
  memberId: string;
  contactId: string | null;
  prospectId: string | null;
  name: string | null;
  email: string | null;
  status: EngagementStatus;
  openCount: number;
  clickCount: number;
  weightedScore: number;
  engagementScore: number;
}

export interface ConversionRow {
  memberId: string;
  convertedAt: Date | null;
  conversionValue: number | null;
  deal: { id: string; name: string; value: number; stage: string } | null;
  contact: { id: string; name: string; email: string | null } | null;
  company: { id: string; name: string } | null;
  prospectId: string | null;
}

export interface FunnelStage {
  stage: 'sent' | 'delivered' | 'opened' | 'clicked' | 'responded' | 'converted';
  count: number;
  /** Share of the stage before it, in percent. */
  stepRate: number;
}

export interface CampaignAnalytics {
  metrics: CampaignMetricsView;
  timeSeries: TimelinePoint[];
  topPerformers: TopPerformer[];
  conversionFunnel: FunnelStage[];
}
