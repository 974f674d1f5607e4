import { z } from 'zod';
import {
  LEAD_SCORE_MAX,
  LEAD_SCORE_MIN,
  PROSPECT_SOURCES,
  PROSPECT_STATUSES,
} from '../entities/prospect.entity';
import { ANY_UUID } from 'src/common/pipes/any-uuid.pipe';

const Uuid = z.string().regex(ANY_UUID, 'Invalid UUID');
const PersonName = z.string().trim().min(1).max(100);
const Email = z.string().trim().toLowerCase().email('Invalid email').max(255);
const Phone = z.string().trim().min(3, 'Phone too short').max(50);
const LeadScore = z.coerce.number().int().min(LEAD_SCORE_MIN).max(LEAD_SCORE_MAX);

const hasEmailOrPhone = (d: { email?: string | null; phone?: string | null }) => !!(d.email || d.phone);

const ProspectFields = z.object({
  firstName: PersonName.optional(),
  lastName: PersonName.optional(),
  email: Email.optional(),
  phone: Phone.optional(),
  companyName: z.string().trim().min(1).max(200).optional(),
  jobTitle: z.string().trim().min(1).max(150).optional(),
  industry: z.string().trim().min(1).max(100).optional(),
  notes: z.string().max(10_000).optional(),
  source: z.enum(PROSPECT_SOURCES).default('manual_entry'),
  status: z.enum(PROSPECT_STATUSES).exclude(['converted']).default('new'),
  leadScore: LeadScore.default(0),
  campaignId: Uuid.optional(),
  assignedTo: Uuid.optional(), // defaults to the caller
});

// -------- CREATE --------
export const CreateProspectSchema = ProspectFields.strict().refine(hasEmailOrPhone, {
  message: 'Either email or phone is required',
  path: ['email'],
});
export type CreateProspectInput = z.infer<typeof CreateProspectSchema>;

// -------- BULK CREATE --------
// Rows are validated one by one in the service so a bad row never sinks the batch.
export const BulkCreateProspectsSchema = z
  .object({
    prospects: z.array(z.record(z.unknown())).min(1, 'At least one prospect').max(1000, 'Max 1000 per batch'),
    campaignId: Uuid.optional(),
    skipDuplicates: z.boolean().default(true),
  })
  .strict();
export type BulkCreateProspectsInput = z.infer<typeof BulkCreateProspectsSchema>;

// -------- UPDATE --------
export const UpdateProspectSchema = z
  .object({
    firstName: PersonName.nullable().optional(),
    lastName: PersonName.nullable().optional(),
    email: Email.nullable().optional(),
    phone: Phone.nullable().optional(),
    companyName: z.string().trim().min(1).max(200).nullable().optional(),
    jobTitle: z.string().trim().min(1).max(150).nullable().optional(),
    industry: z.string().trim().min(1).max(100).nullable().optional(),
    notes: z.string().max(10_000).nullable().optional(),
    source: z.enum(PROSPECT_SOURCES).optional(),
    status: z.enum(PROSPECT_STATUSES).optional(),
    leadScore: LeadScore.optional(),
    campaignId: Uuid.nullable().optional(),
    assignedTo: Uuid.optional(),
  })
  .strict();
export type UpdateProspectInput = z.infer<typeof UpdateProspectSchema>;

// -------- LEAD SCORE --------
export const AdjustLeadScoreSchema = z
  .object({
    scoreChange: z.coerce
      .number()
      .int()
      .min(-LEAD_SCORE_MAX)
      .max(LEAD_SCORE_MAX)
      .refine((n) => n !== 0, 'scoreChange must not be 0'),
    reason: z.string().trim().min(1, 'Reason is required').max(255),
    activityType: z.enum(['manual_adjustment', 'email_opened', 'email_clicked', 'email_responded', 'other']).default('manual_adjustment'),
    campaignId: Uuid.optional(),
    notes: z.string().max(2000).optional(),
  })
  .strict();
export type AdjustLeadScoreInput = z.infer<typeof AdjustLeadScoreSchema>;

// -------- CONVERT --------
export const ConvertProspectSchema = z
  .object({
    assignTo: Uuid.optional(),
    createActivity: z.boolean().default(true),
    notes: z.string().trim().max(2000).optional(),
  })
  .strict();
export type ConvertProspectInput = z.infer<typeof ConvertProspectSchema>;

// -------- QUERY --------
const StatusOneOrMany = z
  .union([z.enum(PROSPECT_STATUSES), z.array(z.enum(PROSPECT_STATUSES)).nonempty()])
  .optional()
  .transform((v) => (v == null ? undefined : Array.isArray(v) ? v : [v]));

export const QueryProspectsSchema = z
  .object({
    page: z.coerce.number().int().min(1).default(1),
    limit: z.coerce.number().int().min(1).max(100).default(20),

    status: StatusOneOrMany,
    source: z.enum(PROSPECT_SOURCES).optional(),
    campaignId: Uuid.optional(),
    assignedTo: Uuid.optional(),
    minLeadScore: LeadScore.optional(),
    maxLeadScore: LeadScore.optional(),
    q: z
      .string()
      .trim()
      .max(120, 'Max 120 chars')
      .optional()
      .transform((s) => (s ? s : undefined)),

    sortBy: z.enum(['createdAt', 'leadScore', 'lastName', 'companyName', 'status']).default('createdAt'),
    sortOrder: z.enum(['asc', 'desc']).default('desc'),
  })
  .strict()
  .refine(
    (d) => d.minLeadScore === undefined || d.maxLeadScore === undefined || d.minLeadScore <= d.maxLeadScore,
    { message: 'minLeadScore must be <= maxLeadScore', path: ['minLeadScore'] },
  );
export type QueryProspectsInput = z.infer<typeof QueryProspectsSchema>;

export const ProspectStatisticsQuerySchema = z
  .object({
    campaignId: Uuid.optional(),
    assignedTo: Uuid.optional(),
  })
  .strict();
