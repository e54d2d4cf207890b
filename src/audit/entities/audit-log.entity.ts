import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity('audit_logs')
@Index(['action', 'createdAt'])
export class AuditLog {
	@PrimaryGeneratedColumn()
	uid!: number;

	@Column({ type: 'varchar', length: 64 })
	action!: string;

	@Column({ type: 'varchar', length: 255, nullable: true })
	actor!: string | null;

	@Column({ type: 'json' })
	details!: Record<string, unknown>;

	@CreateDateColumn()
	createdAt!: Date;
}
