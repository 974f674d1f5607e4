import { CampaignStatus } from './entities/campaign.entity';

/** Manual status changes. Execution moves draft/scheduled campaigns on its own. */
export const ALLOWED: Record<CampaignStatus, CampaignStatus[]> = {
  draft: ['scheduled', 'active', 'cancelled'],
  scheduled: ['draft', 'active', 'paused', 'cancelled'],
  active: ['paused', 'completed', 'cancelled'],
  paused: ['active', 'cancelled'],
  completed: [],
  cancelled: [],
};

export const TERMINAL = new Set<CampaignStatus>(['completed', 'cancelled']);

/** Statuses a send pass may run from. */
export const EXECUTABLE = new Set<CampaignStatus>(['draft', 'scheduled', 'active']);
