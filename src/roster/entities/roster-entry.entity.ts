import { Column, CreateDateColumn, Entity, Index, PrimaryColumn, UpdateDateColumn } from 'typeorm';
import { RosterOverrides } from '../interfaces/roster-fields.interface';

@Entity('roster_entries')
@Index(['trackerUserId'])
@Index(['hrSystemId'])
@Index(['email'])
export class RosterEntry {
	/** Lower-cased email when known, otherwise the normalized name */
	@PrimaryColumn({ type: 'varchar', length: 255 })
	key!: string;

	@Column({ type: 'varchar', length: 255 })
	name!: string;

	@Column({ type: 'varchar', length: 255, nullable: true })
	email!: string | null;

	@Column({ type: 'varchar', length: 64, nullable: true })
	trackerUserId!: string | null;

	@Column({ type: 'varchar', length: 64, nullable: true })
	hrSystemId!: string | null;

	@Column({ type: 'varchar', length: 128, nullable: true })
	division!: string | null;

	@Column({ type: 'varchar', length: 128, nullable: true })
	direction!: string | null;

	@Column({ type: 'varchar', length: 128, nullable: true })
	unit!: string | null;

	@Column({ type: 'varchar', length: 128, nullable: true })
	team!: string | null;

	@Column({ type: 'varchar', length: 128, nullable: true })
	location!: string | null;

	@Column({ type: 'varchar', length: 5, nullable: true })
	planStart!: string | null;

	/** 24/7 shift, exempt from lateness */
	@Column({ type: 'boolean', default: false })
	continuousSchedule!: boolean;

	@Column({ type: 'simple-json' })
	controlManager!: number[];

	@Column({ type: 'varchar', length: 128, nullable: true })
	contactHandle!: string | null;

	@Column({ type: 'varchar', length: 128, nullable: true })
	managerContactHandle!: string | null;

	@Column({ type: 'varchar', length: 255, nullable: true })
	managerName!: string | null;

	@Column({ type: 'date', nullable: true })
	hireDate!: string | null;

	@Column({ type: 'boolean', default: false })
	archived!: boolean;

	@Column({ type: 'boolean', default: false })
	ignored!: boolean;

	@Column({ type: 'simple-json' })
	overrides!: RosterOverrides;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
