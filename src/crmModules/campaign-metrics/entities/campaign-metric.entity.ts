import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { MONEY, TIMESTAMP, UUID, decimalTransformer } from 'src/database/column-types';

export type MetricPeriod = 'daily';

const RATE = {
  type: 'decimal',
  precision: 7,
  scale: 2,
  default: 0,
  transformer: decimalTransformer,
} as const;

/** Time-series snapshot of a campaign's counters, one row per period. */
@Entity('campaign_metrics')
@Index('uq_campaign_metric_period', ['campaignId', 'periodType', 'periodStart'], { unique: true })
export class CampaignMetric {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ name: 'campaign_id', type: UUID })
  campaignId!: string;

  @Column({ name: 'period_type', type: 'varchar', length: 20, default: 'daily' })
  periodType!: MetricPeriod;

  /** Start of the period (UTC midnight for daily rows). */
  @Column({ name: 'period_start', type: TIMESTAMP })
  periodStart!: Date;

  @Index()
  @Column({ name: 'recorded_at', type: TIMESTAMP })
  recordedAt!: Date;

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

  @Column({ name: 'delivery_rate', ...RATE })
  deliveryRate!: number;

  @Column({ name: 'open_rate', ...RATE })
  openRate!: number;

  @Column({ name: 'click_rate', ...RATE })
  clickRate!: number;

  @Column({ name: 'conversion_rate', ...RATE })
  conversionRate!: number;

  @Column({ name: 'bounce_rate', ...RATE })
  bounceRate!: number;

  @Column({ name: 'cost_to_date', ...MONEY })
  costToDate!: number;

  @Column({ name: 'revenue_to_date', ...MONEY })
  revenueToDate!: number;

  @Column({ type: 'decimal', precision: 12, scale: 2, default: 0, transformer: decimalTransformer })
  roi!: number;

  @Column({ name: 'prospects_generated', type: 'integer', default: 0 })
  prospectsGenerated!: number;

  @CreateDateColumn({ name: 'created_at', type: TIMESTAMP })
  createdAt!: Date;
}
