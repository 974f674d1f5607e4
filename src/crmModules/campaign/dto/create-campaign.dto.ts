import { z } from 'zod';
import { CreateCampaignSchema } from '../schema/campaign.schema';

export type CreateCampaignDto = z.infer<typeof CreateCampaignSchema>;
export { CreateCampaignSchema };
