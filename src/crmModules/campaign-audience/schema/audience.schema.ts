import { z } from 'zod';
import { BOUNCE_TYPES, ENGAGEMENT_STATUSES } from 'src/crmModules/campaign-member/entities/campaign-member.entity';
import { ANY_UUID } from 'src/common/pipes/any-uuid.pipe';

const Uuid = z.string().regex(ANY_UUID, 'Invalid UUID');
const UuidList = z.array(Uuid).max(5000, 'Max 5000 ids per request');

// -------- ADD ONE --------
export const AddMemberSchema = z
  .object({
    contactId: Uuid.optional(),
    prospectId: Uuid.optional(),
    emailSentTo: z.string().trim().toLowerCase().email().optional(),
    notes: z.string().max(2000).optional(),
  })
  .strict()
  .refine((d) => !!d.contactId !== !!d.prospectId, {
    message: 'Provide exactly one of contactId or prospectId',
    path: ['contactId'],
  });
export type AddMemberInput = z.infer<typeof AddMemberSchema>;

// -------- ADD MANY --------
export const AddAudienceSchema = z
  .object({
    contactIds: UuidList.default([]),
    prospectIds: UuidList.default([]),
  })
  .strict()
  .refine((d) => d.contactIds.length + d.prospectIds.length > 0, {
    message: 'Provide at least one contactId or prospectId',
    path: ['contactIds'],
  });
export type AddAudienceInput = z.infer<typeof AddAudienceSchema>;

// -------- LIST --------
const StatusOneOrMany = z
  .union([z.enum(ENGAGEMENT_STATUSES), z.array(z.enum(ENGAGEMENT_STATUSES)).nonempty()])
  .optional()
  .transform((v) => (v == null ? undefined : Array.isArray(v) ? v : [v]));

export const QueryAudienceSchema = z
  .object({
    page: z.coerce.number().int().min(1).default(1),
    limit: z.coerce.number().int().min(1).max(100).default(50),
    status: StatusOneOrMany,
  })
  .strict();
export type QueryAudienceInput = z.infer<typeof QueryAudienceSchema>;

// -------- EVENTS --------
export const EngagementEventSchema = z.discriminatedUnion('event', [
  z.object({ event: z.literal('delivered') }).strict(),
  z.object({ event: z.literal('opened') }).strict(),
  z.object({ event: z.literal('clicked') }).strict(),
  z.object({ event: z.literal('responded') }).strict(),
  z.object({ event: z.literal('unsubscribed') }).strict(),
  z
    .object({
      event: z.literal('bounced'),
      bounceType: z.enum(BOUNCE_TYPES).default('hard'),
      errorMessage: z.string().trim().max(2000).optional(),
    })
    .strict(),
  z
    .object({
      event: z.literal('converted'),
      dealId: Uuid.optional(),
      conversionValue: z.coerce.number().min(0).optional(),
    })
    .strict(),
]);
export type EngagementEventInput = z.infer<typeof EngagementEventSchema>;

// -------- LINK DEAL --------
export const LinkDealSchema = z
  .object({
    contactId: Uuid.optional(),
    prospectId: Uuid.optional(),
    dealId: Uuid,
    conversionValue: z.coerce.number().min(0).optional(), // defaults to the deal's value
  })
  .strict()
  .refine((d) => !!d.contactId !== !!d.prospectId, {
    message: 'Provide exactly one of contactId or prospectId',
    path: ['contactId'],
  });
export type LinkDealInput = z.infer<typeof LinkDealSchema>;
