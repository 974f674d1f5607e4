import { z } from 'zod';
import { UpdateCampaignSchema } from '../schema/campaign.schema';

export type UpdateCampaignDto = z.infer<typeof UpdateCampaignSchema>;
export { UpdateCampaignSchema };
