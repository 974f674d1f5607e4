import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { TIMESTAMP, UUID } from 'src/database/column-types';

export type ActivityType = 'note' | 'call' | 'email' | 'meeting' | 'task';

@Entity('activities')
export class Activity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 20 })
  type!: ActivityType;

  @Column({ type: 'varchar', length: 255 })
  subject!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Index()
  @Column({ name: 'contact_id', type: UUID, nullable: true })
  contactId!: string | null;

  @Column({ name: 'deal_id', type: UUID, nullable: true })
  dealId!: string | null;

  @Column({ name: 'user_id', type: UUID })
  userId!: string;

  @CreateDateColumn({ name: 'created_at', type: TIMESTAMP })
  createdAt!: Date;
}
