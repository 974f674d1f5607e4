import { z } from 'zod';
import { CAMPAIGN_STATUSES, CAMPAIGN_TYPES } from '../entities/campaign.entity';
import { ANY_UUID } from 'src/common/pipes/any-uuid.pipe';

/** Accepts a single status or an array, returns a normalized array (or undefined). */
const StatusOneOrMany = z
  .union([z.enum(CAMPAIGN_STATUSES), z.array(z.enum(CAMPAIGN_STATUSES)).nonempty()])
  .optional()
  .transform((v) => (v == null ? undefined : Array.isArray(v) ? v : [v]));

export const QueryCampaignsSchema = z
  .object({
    page: z.coerce.number().int().min(1).default(1),
    limit: z.coerce.number().int().min(1).max(100).default(20),

    status: StatusOneOrMany,
    type: z.enum(CAMPAIGN_TYPES).optional(),
    ownerId: z.string().regex(ANY_UUID, 'Invalid UUID').optional(),
    category: z.string().trim().max(100).optional(),
    tag: z.string().trim().max(50).optional(),
    q: z
      .string()
      .trim()
      .max(120, 'Max 120 chars')
      .optional()
      .transform((s) => (s ? s : undefined)), // empty -> undefined

    startFrom: z.coerce.date().optional(),
    startTo: z.coerce.date().optional(),
    endFrom: z.coerce.date().optional(),
    endTo: z.coerce.date().optional(),
    minBudget: z.coerce.number().min(0).optional(),
    maxBudget: z.coerce.number().min(0).optional(),

    sortBy: z
      .enum(['createdAt', 'name', 'startDate', 'budget', 'status', 'lastExecutedAt'])
      .default('createdAt'),
    sortOrder: z.enum(['asc', 'desc']).default('desc'),
  })
  .strict()
  .refine((d) => !(d.startFrom && d.startTo) || d.startFrom <= d.startTo, {
    message: 'startFrom must be <= startTo',
    path: ['startFrom'],
  })
  .refine((d) => !(d.endFrom && d.endTo) || d.endFrom <= d.endTo, {
    message: 'endFrom must be <= endTo',
    path: ['endFrom'],
  })
  .refine((d) => d.minBudget === undefined || d.maxBudget === undefined || d.minBudget <= d.maxBudget, {
    message: 'minBudget must be <= maxBudget',
    path: ['minBudget'],
  });

export type QueryCampaignsInput = z.infer<typeof QueryCampaignsSchema>;
