import { z } from 'zod';

export const ExecuteCampaignSchema = z
  .object({
    sendTestEmail: z.boolean().default(false),
    testEmailRecipients: z.array(z.string().trim().toLowerCase().email('Invalid email')).max(20).default([]),
    scheduleFor: z.coerce.date().optional(),
  })
  .strict()
  .refine((d) => !d.sendTestEmail || d.testEmailRecipients.length > 0, {
    message: 'testEmailRecipients is required when sendTestEmail is true',
    path: ['testEmailRecipients'],
  });
export type ExecuteCampaignInput = z.infer<typeof ExecuteCampaignSchema>;
