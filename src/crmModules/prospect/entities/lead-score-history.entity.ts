import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { TIMESTAMP, UUID } from 'src/database/column-types';

export type LeadScoreActivityType =
  | 'created'
  | 'manual_adjustment'
  | 'email_opened'
  | 'email_clicked'
  | 'email_responded'
  | 'other';

/** Append-only audit row for one lead score change. */
@Entity('lead_score_history')
export class LeadScoreHistory {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ name: 'prospect_id', type: UUID })
  prospectId!: string;

  @Column({ name: 'old_score', type: 'integer' })
  oldScore!: number;

  @Column({ name: 'new_score', type: 'integer' })
  newScore!: number;

  @Column({ name: 'score_change', type: 'integer' })
  scoreChange!: number;

  @Column({ type: 'varchar', length: 255 })
  reason!: string;

  @Column({ name: 'activity_type', type: 'varchar', length: 50 })
  activityType!: LeadScoreActivityType;

  @Column({ name: 'campaign_id', type: UUID, nullable: true })
  campaignId!: string | null;

  @Column({ name: 'campaign_member_id', type: UUID, nullable: true })
  campaignMemberId!: string | null;

  @Column({ name: 'changed_by', type: UUID, nullable: true })
  changedBy!: string | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @CreateDateColumn({ name: 'created_at', type: TIMESTAMP })
  createdAt!: Date;
}
