import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { TIMESTAMP, UUID, decimalTransformer } from 'src/database/column-types';

export const ENGAGEMENT_STATUSES = [
  'pending',
  'sent',
  'delivered',
  'opened',
  'clicked',
  'responded',
  'bounced',
  'unsubscribed',
  'converted',
] as const;
export type EngagementStatus = (typeof ENGAGEMENT_STATUSES)[number];

export const BOUNCE_TYPES = ['hard', 'soft'] as const;
export type BounceType = (typeof BOUNCE_TYPES)[number];

/**
 * Engagement record: one campaign's relationship with exactly one recipient,
 * either a contact or a prospect.
 */
@Entity('campaign_members')
@Index('uq_campaign_member_contact', ['campaignId', 'contactId'], { unique: true })
@Index('uq_campaign_member_prospect', ['campaignId', 'prospectId'], { unique: true })
@Check(
  'chk_campaign_member_recipient',
  '("contact_id" IS NOT NULL AND "prospect_id" IS NULL) OR ("contact_id" IS NULL AND "prospect_id" IS NOT NULL)',
)
export class CampaignMember {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ name: 'campaign_id', type: UUID })
  campaignId!: string;

  @Index()
  @Column({ name: 'contact_id', type: UUID, nullable: true })
  contactId!: string | null;

  @Index()
  @Column({ name: 'prospect_id', type: UUID, nullable: true })
  prospectId!: string | null;

  @Column({ type: 'varchar', length: 20, default: 'pending' })
  status!: EngagementStatus;

  // first-occurrence timestamps
  @Column({ name: 'sent_at', type: TIMESTAMP, nullable: true })
  sentAt!: Date | null;

  @Column({ name: 'delivered_at', type: TIMESTAMP, nullable: true })
  deliveredAt!: Date | null;

  @Column({ name: 'opened_at', type: TIMESTAMP, nullable: true })
  openedAt!: Date | null;

  @Column({ name: 'clicked_at', type: TIMESTAMP, nullable: true })
  clickedAt!: Date | null;

  @Column({ name: 'responded_at', type: TIMESTAMP, nullable: true })
  respondedAt!: Date | null;

  @Column({ name: 'bounced_at', type: TIMESTAMP, nullable: true })
  bouncedAt!: Date | null;

  @Column({ name: 'unsubscribed_at', type: TIMESTAMP, nullable: true })
  unsubscribedAt!: Date | null;

  @Column({ name: 'converted_at', type: TIMESTAMP, nullable: true })
  convertedAt!: Date | null;

  @Column({ name: 'open_count', type: 'integer', default: 0 })
  openCount!: number;

  @Column({ name: 'click_count', type: 'integer', default: 0 })
  clickCount!: number;

  // delivery details
  @Column({ name: 'email_sent_to', type: 'varchar', length: 255, nullable: true })
  emailSentTo!: string | null;

  @Column({ name: 'email_message_id', type: 'varchar', length: 255, nullable: true })
  emailMessageId!: string | null;

  @Column({ name: 'email_subject', type: 'varchar', length: 500, nullable: true })
  emailSubject!: string | null;

  // conversion
  @Column({ name: 'deal_id', type: UUID, nullable: true })
  dealId!: string | null;

  @Column({
    name: 'conversion_value',
    type: 'decimal',
    precision: 12,
    scale: 2,
    nullable: true,
    transformer: decimalTransformer,
  })
  conversionValue!: number | null;

  @Column({ name: 'lead_score_change', type: 'integer', default: 0 })
  leadScoreChange!: number;

  // errors
  @Column({ name: 'bounce_type', type: 'varchar', length: 10, nullable: true })
  bounceType!: BounceType | null;

  @Column({ name: 'error_message', type: 'text', nullable: true })
  errorMessage!: string | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @CreateDateColumn({ name: 'created_at', type: TIMESTAMP })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: TIMESTAMP })
  updatedAt!: Date;
}
