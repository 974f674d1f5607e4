import type { CampaignMember } from 'src/crmModules/campaign-member/entities/campaign-member.entity';
import type { LeadScoreHistory, LeadScoreActivityType } from '../entities/lead-score-history.entity';
import type { Prospect, ProspectSource, ProspectStatus } from '../entities/prospect.entity';
import type { SortOrder } from 'src/common/pagination/paginated.interface';

export type ProspectSortBy = 'createdAt' | 'leadScore' | 'lastName' | 'companyName' | 'status';

export interface IProspectQuery {
  page: number;
  limit: number;
  status?: ProspectStatus[];
  source?: ProspectSource;
  campaignId?: string;
  assignedTo?: string;
  minLeadScore?: number;
  maxLeadScore?: number;
  q?: string;
  sortBy: ProspectSortBy;
  sortOrder: SortOrder;
}

/** Who and what a lead score change is attributed to. */
export interface ScoreContext {
  campaignId?: string | null;
  campaignMemberId?: string | null;
  changedBy?: string | null;
  notes?: string | null;
}

export interface ScoreDelta {
  scoreChange: number;
  reason: string;
  activityType: LeadScoreActivityType;
}

export interface ScoreChangeResult {
  prospect: Prospect;
  history: LeadScoreHistory;
}

export interface ConversionOptions {
  assignTo?: string;
  createActivity?: boolean;
  notes?: string;
}

export interface ConversionResult {
  prospectId: string;
  contactId: string;
  activityId?: string;
  relinkedEngagements: number;
  message: string;
}

export interface BulkCreateError {
  index: number;
  email?: string | null;
  phone?: string | null;
  error: string;
}

export interface BulkCreateResult {
  createdCount: number;
  skippedCount: number;
  failedCount: number;
  createdIds: string[];
  errors: BulkCreateError[];
}

export interface ProspectStatistics {
  total: number;
  byStatus: Record<string, number>;
  converted: number;
  conversionRate: number;
  averageLeadScore: number;
}

export interface ProspectWithEngagement {
  prospect: Prospect;
  engagements: CampaignMember[];
  scoreHistory: LeadScoreHistory[];
  engagementCount: number;
  totalOpens: number;
  totalClicks: number;
}
