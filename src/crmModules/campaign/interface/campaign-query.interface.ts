import type { CampaignStatus, CampaignType } from '../entities/campaign.entity';
import type { SortOrder } from 'src/common/pagination/paginated.interface';

export type CampaignSortBy = 'createdAt' | 'name' | 'startDate' | 'budget' | 'status' | 'lastExecutedAt';

/**
 * Normalized query shape AFTER Zod validation (QueryCampaignsSchema).
 * - Defaults applied: page, limit, sortBy, sortOrder
 * - status normalized to an array
 */
export interface ICampaignQuery {
  page: number;
  limit: number;

  status?: CampaignStatus[];
  type?: CampaignType;
  ownerId?: string;
  category?: string;
  tag?: string;
  q?: string;

  startFrom?: Date;
  startTo?: Date;
  endFrom?: Date;
  endTo?: Date;
  minBudget?: number;
  maxBudget?: number;

  sortBy: CampaignSortBy;
  sortOrder: SortOrder;
}
