import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { TIMESTAMP, UUID } from 'src/database/column-types';

export const PROSPECT_STATUSES = ['new', 'contacted', 'qualified', 'rejected', 'converted'] as const;
export type ProspectStatus = (typeof PROSPECT_STATUSES)[number];

export const PROSPECT_SOURCES = [
  'email_campaign',
  'web_form',
  'phone',
  'social_media',
  'manual_entry',
  'referral',
  'other',
] as const;
export type ProspectSource = (typeof PROSPECT_SOURCES)[number];

export const LEAD_SCORE_MIN = 0;
export const LEAD_SCORE_MAX = 100;

@Entity('prospects')
export class Prospect {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'first_name', type: 'varchar', length: 100, nullable: true })
  firstName!: string | null;

  @Column({ name: 'last_name', type: 'varchar', length: 100, nullable: true })
  lastName!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true, unique: true })
  email!: string | null;

  @Column({ type: 'varchar', length: 50, nullable: true, unique: true })
  phone!: string | null;

  @Column({ name: 'company_name', type: 'varchar', length: 200, nullable: true })
  companyName!: string | null;

  @Column({ name: 'job_title', type: 'varchar', length: 150, nullable: true })
  jobTitle!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  industry!: string | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @Column({ type: 'varchar', length: 30, default: 'manual_entry' })
  source!: ProspectSource;

  @Index()
  @Column({ type: 'varchar', length: 20, default: 'new' })
  status!: ProspectStatus;

  /** Written only by LeadScoreTrackerService. */
  @Column({ name: 'lead_score', type: 'integer', default: 0 })
  leadScore!: number;

  @Index()
  @Column({ name: 'campaign_id', type: UUID, nullable: true })
  campaignId!: string | null;

  @Column({ name: 'converted_to_contact_id', type: UUID, nullable: true })
  convertedToContactId!: string | null;

  @Column({ name: 'converted_at', type: TIMESTAMP, nullable: true })
  convertedAt!: Date | null;

  @Index()
  @Column({ name: 'assigned_to', type: UUID, nullable: true })
  assignedTo!: string | null;

  @Column({ name: 'created_by', type: UUID })
  createdBy!: string;

  @CreateDateColumn({ name: 'created_at', type: TIMESTAMP })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: TIMESTAMP })
  updatedAt!: Date;
}

export const isConverted = (p: Pick<Prospect, 'status'>): boolean => p.status === 'converted';

export const prospectFullName = (p: Pick<Prospect, 'firstName' | 'lastName'>): string =>
  [p.firstName, p.lastName].filter((s): s is string => !!s).join(' ');
