import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';
import { TIMESTAMP, UUID } from 'src/database/column-types';

export type ContactStatus = 'lead' | 'active' | 'inactive' | 'customer';

@Entity('contacts')
export class Contact {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'first_name', type: 'varchar', length: 100, nullable: true })
  firstName!: string | null;

  @Column({ name: 'last_name', type: 'varchar', length: 100, nullable: true })
  lastName!: string | null;

  /** One contact per address; conversion relies on this constraint. */
  @Column({ type: 'varchar', length: 255, nullable: true, unique: true })
  email!: string | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  phone!: string | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  mobile!: string | null;

  @Column({ type: 'varchar', length: 150, nullable: true })
  position!: string | null;

  @Index()
  @Column({ name: 'company_id', type: UUID, nullable: true })
  companyId!: string | null;

  @Column({ type: 'varchar', length: 20, default: 'lead' })
  status!: ContactStatus;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @Column({ name: 'owner_id', type: UUID })
  ownerId!: string;

  @CreateDateColumn({ name: 'created_at', type: TIMESTAMP })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: TIMESTAMP })
  updatedAt!: Date;
}
