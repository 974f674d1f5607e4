import { z } from 'zod';
import { QueryCampaignsSchema } from '../schema/query-campaigns.schema';

export type QueryCampaignsDto = z.infer<typeof QueryCampaignsSchema>;
export { QueryCampaignsSchema };
