import { z } from 'zod';

/** Shared constraints */
const NameSchema = z.string().trim().min(1, 'Name is required').max(120);
const SubjectSchema = z.string().trim().min(1, 'Subject is required').max(255);
const BodySchema = z.string().trim().min(1, 'Body is required').max(100_000);

/** Create */
export const CreateEmailTemplateSchema = z
  .object({
    name: NameSchema,
    subject: SubjectSchema,
    body: BodySchema,
    category: z.string().trim().max(60).optional(),
    isActive: z.boolean().optional().default(true),
  })
  .strict();

/** Update (partial) */
export const UpdateEmailTemplateSchema = z
  .object({
    name: NameSchema.optional(),
    subject: SubjectSchema.optional(),
    body: BodySchema.optional(),
    category: z.string().trim().max(60).nullable().optional(),
    isActive: z.boolean().optional(),
  })
  .strict();

export const QueryEmailTemplatesSchema = z
  .object({
    page: z.coerce.number().int().min(1).default(1),
    limit: z.coerce.number().int().min(1).max(100).default(20),
    search: z.string().trim().max(120).optional(),
    category: z.string().trim().max(60).optional(),
    isActive: z
      .enum(['true', 'false'])
      .optional()
      .transform((v) => (v === undefined ? undefined : v === 'true')),
  })
  .strict();

/** Preview: values for the template's merge fields */
export const PreviewEmailTemplateSchema = z
  .object({
    mergeData: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).default({}),
  })
  .strict();
