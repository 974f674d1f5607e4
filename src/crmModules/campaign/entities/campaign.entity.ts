import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { MONEY, TIMESTAMP, UUID, decimalTransformer } from 'src/database/column-types';

export const CAMPAIGN_TYPES = [
  'email',
  'web_form',
  'phone',
  'social_media',
  'manual_entry',
  'event',
  'other',
] as const;
export type CampaignType = (typeof CAMPAIGN_TYPES)[number];

export const CAMPAIGN_STATUSES = [
  'draft',
  'scheduled',
  'active',
  'paused',
  'completed',
  'cancelled',
] as const;
export type CampaignStatus = (typeof CAMPAIGN_STATUSES)[number];

@Entity('campaigns')
@Index(['ownerId', 'status'])
export class Campaign {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 200 })
  name!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'varchar', length: 30 })
  type!: CampaignType;

  @Column({ type: 'varchar', length: 20, default: 'draft' })
  status!: CampaignStatus;

  @Column({ type: 'varchar', length: 100, nullable: true })
  category!: string | null;

  @Column({ type: 'simple-array', nullable: true })
  tags!: string[] | null;

  @Column({ name: 'is_automated', type: 'boolean', default: false })
  isAutomated!: boolean;

  // scheduling
  @Column({ name: 'start_date', type: TIMESTAMP, nullable: true })
  startDate!: Date | null;

  @Column({ name: 'end_date', type: TIMESTAMP, nullable: true })
  endDate!: Date | null;

  @Column({ name: 'actual_start_date', type: TIMESTAMP, nullable: true })
  actualStartDate!: Date | null;

  @Column({ name: 'actual_end_date', type: TIMESTAMP, nullable: true })
  actualEndDate!: Date | null;

  @Column({ name: 'last_executed_at', type: TIMESTAMP, nullable: true })
  lastExecutedAt!: Date | null;

  // financial
  @Column({ ...MONEY })
  budget!: number;

  @Column({ name: 'actual_cost', ...MONEY })
  actualCost!: number;

  @Column({ name: 'expected_revenue', ...MONEY })
  expectedRevenue!: number;

  @Column({ name: 'actual_revenue', ...MONEY })
  actualRevenue!: number;

  // targets
  @Column({ name: 'target_audience_size', type: 'integer', default: 0 })
  targetAudienceSize!: number;

  @Column({
    name: 'target_response_rate',
    type: 'decimal',
    precision: 5,
    scale: 2,
    nullable: true,
    transformer: decimalTransformer,
  })
  targetResponseRate!: number | null;

  @Column({
    name: 'target_conversion_rate',
    type: 'decimal',
    precision: 5,
    scale: 2,
    nullable: true,
    transformer: decimalTransformer,
  })
  targetConversionRate!: number | null;

  // aggregated counters: a cache rebuilt from campaign_members
  @Column({ name: 'sent_count', type: 'integer', default: 0 })
  sentCount!: number;

  @Column({ name: 'delivered_count', type: 'integer', default: 0 })
  deliveredCount!: number;

  @Column({ name: 'opened_count', type: 'integer', default: 0 })
  openedCount!: number;

  @Column({ name: 'clicked_count', type: 'integer', default: 0 })
  clickedCount!: number;

  @Column({ name: 'responded_count', type: 'integer', default: 0 })
  respondedCount!: number;

  @Column({ name: 'bounced_count', type: 'integer', default: 0 })
  bouncedCount!: number;

  @Column({ name: 'unsubscribed_count', type: 'integer', default: 0 })
  unsubscribedCount!: number;

  @Column({ name: 'converted_count', type: 'integer', default: 0 })
  convertedCount!: number;

  @Column({ name: 'prospects_generated', type: 'integer', default: 0 })
  prospectsGenerated!: number;

  // email configuration
  @Column({ name: 'email_template_id', type: UUID, nullable: true })
  emailTemplateId!: string | null;

  @Column({ name: 'email_subject', type: 'varchar', length: 255, nullable: true })
  emailSubject!: string | null;

  @Column({ name: 'email_from_name', type: 'varchar', length: 120, nullable: true })
  emailFromName!: string | null;

  @Column({ name: 'email_from_email', type: 'varchar', length: 255, nullable: true })
  emailFromEmail!: string | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  // ownership
  @Column({ name: 'owner_id', type: UUID })
  ownerId!: string;

  @Column({ name: 'created_by', type: UUID })
  createdBy!: string;

  @CreateDateColumn({ name: 'created_at', type: TIMESTAMP })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: TIMESTAMP })
  updatedAt!: Date;
}
