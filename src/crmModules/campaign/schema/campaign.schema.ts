import { z } from 'zod';
import { CAMPAIGN_STATUSES, CAMPAIGN_TYPES } from '../entities/campaign.entity';
import { ANY_UUID } from 'src/common/pipes/any-uuid.pipe';

const Name = z.string().trim().min(1, 'Name is required').max(200, 'Max 200 chars');
const Uuid = z.string().regex(ANY_UUID, 'Invalid UUID');
const Money = z.coerce.number().min(0, 'Must be >= 0').max(9_999_999_999.99);
const Percent = z.coerce.number().min(0).max(100);
const Tags = z.array(z.string().trim().min(1).max(50)).max(30, 'Too many tags');

const endNotBeforeStart = (d: { startDate?: Date | null; endDate?: Date | null }) =>
  !(d.startDate && d.endDate) || d.startDate <= d.endDate;

// -------- CREATE --------
export const CreateCampaignSchema = z
  .object({
    name: Name,
    description: z.string().trim().max(5000).optional(),
    type: z.enum(CAMPAIGN_TYPES).default('email'),
    category: z.string().trim().max(100).optional(),
    tags: Tags.optional(),
    isAutomated: z.boolean().default(false),

    startDate: z.coerce.date().optional(),
    endDate: z.coerce.date().optional(),

    budget: Money.default(0),
    actualCost: Money.default(0),
    expectedRevenue: Money.default(0),
    targetResponseRate: Percent.optional(),
    targetConversionRate: Percent.optional(),

    emailTemplateId: Uuid.optional(),
    emailSubject: z.string().trim().min(1).max(255).optional(),
    emailFromName: z.string().trim().min(1).max(120).optional(),
    emailFromEmail: z.string().trim().email().optional(),

    notes: z.string().max(10_000).optional(),
    ownerId: Uuid.optional(), // defaults to the caller
  })
  .strict()
  .refine(endNotBeforeStart, { message: 'endDate must be >= startDate', path: ['endDate'] });
export type CreateCampaignInput = z.infer<typeof CreateCampaignSchema>;

// -------- UPDATE --------
export const UpdateCampaignSchema = z
  .object({
    name: Name.optional(),
    description: z.string().trim().max(5000).nullable().optional(),
    type: z.enum(CAMPAIGN_TYPES).optional(),
    category: z.string().trim().max(100).nullable().optional(),
    tags: Tags.nullable().optional(),
    isAutomated: z.boolean().optional(),

    startDate: z.coerce.date().nullable().optional(),
    endDate: z.coerce.date().nullable().optional(),

    budget: Money.optional(),
    actualCost: Money.optional(),
    expectedRevenue: Money.optional(),
    targetResponseRate: Percent.nullable().optional(),
    targetConversionRate: Percent.nullable().optional(),

    emailTemplateId: Uuid.nullable().optional(),
    emailSubject: z.string().trim().min(1).max(255).nullable().optional(),
    emailFromName: z.string().trim().min(1).max(120).nullable().optional(),
    emailFromEmail: z.string().trim().email().nullable().optional(),

    notes: z.string().max(10_000).nullable().optional(),
    ownerId: Uuid.optional(),
  })
  .strict()
  .refine(endNotBeforeStart, { message: 'endDate must be >= startDate', path: ['endDate'] });
export type UpdateCampaignInput = z.infer<typeof UpdateCampaignSchema>;

// -------- STATUS --------
export const SetCampaignStatusSchema = z.object({ status: z.enum(CAMPAIGN_STATUSES) }).strict();
export type SetCampaignStatusInput = z.infer<typeof SetCampaignStatusSchema>;
