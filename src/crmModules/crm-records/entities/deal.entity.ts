import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn } from 'typeorm';
import { MONEY, TIMESTAMP, UUID } from 'src/database/column-types';

@Entity('deals')
export class Deal {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 200 })
  name!: string;

  @Column({ ...MONEY })
  value!: number;

  @Column({ type: 'varchar', length: 50, default: 'qualification' })
  stage!: string;

  @Column({ name: 'contact_id', type: UUID, nullable: true })
  contactId!: string | null;

  @Column({ name: 'company_id', type: UUID, nullable: true })
  companyId!: string | null;

  @Column({ name: 'owner_id', type: UUID })
  ownerId!: string;

  @CreateDateColumn({ name: 'created_at', type: TIMESTAMP })
  createdAt!: Date;
}
