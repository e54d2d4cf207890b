import { BadRequestException, ConflictException, Injectable, Logger, NotFoundException, ServiceUnavailableException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { In, Repository } from 'typeorm';
import { buildRosterKey, normalizeEmail } from '../lib/utils/name-matching.util';
import { validateDto } from '../lib/utils/validation.util';
import { UpstreamSource } from '../lib/enums/upstream.enums';
import { SyncRunContextFactory } from '../upstream/sync-run.context';
import { AdminAction, AdminActionEvent, AuditEvents } from '../audit/audit.events';
import { RosterEntry } from './entities/roster-entry.entity';
import { CreateRosterEntryDto } from './dto/create-roster-entry.dto';
import { UpdateRosterEntryDto } from './dto/update-roster-entry.dto';
import { AssignControlManagerDto } from './dto/assign-control-manager.dto';
import {
	isOverridableField,
	MergeOptions,
	OVERRIDABLE_FIELDS,
	OverridableField,
	RosterFieldUpdate,
	RosterOverrides,
} from './interfaces/roster-fields.interface';
import { AppliedMerge, BulkAssignResult } from './interfaces/roster-sync.interface';
import { RosterMergeService } from './services/roster-merge.service';
import { HierarchyNormalizerService } from './services/hierarchy-normalizer.service';
import { IdentityResolverService } from './services/identity-resolver.service';
import { RosterDiffService } from './services/roster-diff.service';

/**
 * Roster persistence and the admin operations on top of the merge engine.
 */
@Injectable()
export class RosterService {
	private readonly logger = new Logger(RosterService.name);

	constructor(
		@InjectRepository(RosterEntry)
		private readonly rosterRepository: Repository<RosterEntry>,
		private readonly mergeService: RosterMergeService,
		private readonly normalizer: HierarchyNormalizerService,
		private readonly resolver: IdentityResolverService,
		private readonly diffService: RosterDiffService,
		private readonly contextFactory: SyncRunContextFactory,
		private readonly eventEmitter: EventEmitter2,
	) {}

	async findAll(options: { includeArchived?: boolean; includeIgnored?: boolean } = {}): Promise<RosterEntry[]> {
		const entries = await this.rosterRepository.find({ order: { name: 'ASC' } });
		return entries.filter(
			(entry) => (options.includeArchived || !entry.archived) && (options.includeIgnored || !entry.ignored),
		);
	}

	async findOne(key: string): Promise<RosterEntry> {
		const entry = await this.rosterRepository.findOne({ where: { key } });
		if (!entry) {
			throw new NotFoundException(`Roster entry ${key} not found`);
		}
		return entry;
	}

	/**
	 * Re-read the entry, merge, and write it back only when something changed
	 */
	async applyMerge(key: string, update: RosterFieldUpdate, options: MergeOptions = {}): Promise<AppliedMerge> {
		const current = await this.findOne(key);
		const result = this.mergeService.mergeFields(current, update, options);
		if (result.changedFields.length === 0) {
			return result;
		}

		const saved = await this.rosterRepository.save(result.entry);
		return { ...result, entry: saved };
	}

	async createEntry(input: unknown, actor?: string): Promise<RosterEntry> {
		const dto = await validateDto(CreateRosterEntryDto, input);
		const key = buildRosterKey(dto.email, dto.name);

		const existing = await this.rosterRepository.findOne({ where: { key } });
		if (existing) {
			throw new ConflictException(`Roster entry ${key} already exists`);
		}

		const entry = this.buildEntry(key, dto.name);
		const { continuousSchedule, ...fields } = dto;
		const merged = this.mergeService.mergeFields(entry, {
			...fields,
			email: fields.email ? normalizeEmail(fields.email) : undefined,
		}).entry;
		merged.continuousSchedule = continuousSchedule ?? false;

		const saved = await this.rosterRepository.save(merged);
		this.emitAdminAction('roster.entry.created', actor, { key, name: saved.name });
		return saved;
	}

	/**
	 * "Add to roster" from an unmatched HR record of the latest diff
	 */
	async addFromDiff(hrExternalId: string, actor?: string): Promise<RosterEntry> {
		const context = this.contextFactory.create('roster_add');
		const hrSnapshot = await context.getHrEmployees();
		if (!hrSnapshot.ok) {
			throw new ServiceUnavailableException(`HR system unavailable: ${hrSnapshot.error}`);
		}

		const employee = hrSnapshot.records.find((record) => record.externalId === hrExternalId);
		if (!employee) {
			throw new NotFoundException(`HR employee ${hrExternalId} not found`);
		}

		const roster = await this.rosterRepository.find();
		if (this.resolver.resolve(employee, roster, UpstreamSource.HR)) {
			throw new ConflictException(`HR employee ${hrExternalId} already has a roster entry`);
		}

		const key = buildRosterKey(employee.email, employee.displayName);
		if (roster.some((entry) => entry.key === key)) {
			throw new ConflictException(`Roster entry ${key} already exists`);
		}

		const trackerSnapshot = await context.getTrackerUsers();
		const trackerUser = trackerSnapshot.ok
			? this.resolver.findCounterpart(employee, trackerSnapshot.records)
			: null;
		if (!trackerSnapshot.ok) {
			this.logger.warn(`Adding ${key} without a tracker id: ${trackerSnapshot.error}`);
		}

		const hierarchy = this.normalizer.normalizeHierarchy({
			division: employee.division,
			direction: employee.department,
			managerName: employee.managerName,
			location: employee.location,
		});
		const manager = employee.managerExternalId
			? hrSnapshot.records.find((record) => record.externalId === employee.managerExternalId)
			: undefined;

		const { entry } = this.mergeService.mergeFields(this.buildEntry(key, employee.displayName), {
			email: employee.email,
			hrSystemId: employee.externalId,
			trackerUserId: trackerUser?.externalId,
			...hierarchy.fields,
			managerName: employee.managerName,
			contactHandle: employee.contactHandle,
			managerContactHandle: manager?.contactHandle,
			hireDate: employee.hireDate,
			controlManager: hierarchy.controlManager === null ? undefined : [hierarchy.controlManager],
		});

		const saved = await this.rosterRepository.save(entry);
		await this.diffService.invalidate();
		this.emitAdminAction('roster.entry.added_from_diff', actor, { key, hrExternalId, trackerUserId: saved.trackerUserId });
		return saved;
	}

	/**
	 * Admin edit: writes the given fields and protects each of them with an override flag
	 */
	async updateEntry(key: string, input: unknown, actor?: string): Promise<RosterEntry> {
		const dto = await validateDto(UpdateRosterEntryDto, input);
		const entry = await this.findOne(key);

		const { continuousSchedule, ...fields } = dto;
		const touched = OVERRIDABLE_FIELDS.filter((field) => fields[field] !== undefined);
		const { entry: merged, changedFields } = this.mergeService.mergeFields(entry, fields, { ignoreOverrides: true });

		const overrides: RosterOverrides = { ...(entry.overrides ?? {}) };
		for (const field of touched) {
			overrides[field] = true;
		}
		merged.overrides = overrides;
		if (continuousSchedule !== undefined) {
			merged.continuousSchedule = continuousSchedule;
		}

		const saved = await this.rosterRepository.save(merged);
		this.emitAdminAction('roster.entry.updated', actor, { key, changedFields, overridden: touched });
		return saved;
	}

	/**
	 * Clear some or all override flags so the next sync may write those fields again
	 */
	async resetOverrides(key: string, fields?: string[], actor?: string): Promise<RosterEntry> {
		const entry = await this.findOne(key);

		const unknown = (fields ?? []).filter((field) => !isOverridableField(field));
		if (unknown.length > 0) {
			throw new BadRequestException(`Unknown roster fields: ${unknown.join(', ')}`);
		}

		const targets: readonly OverridableField[] = fields ? fields.filter(isOverridableField) : OVERRIDABLE_FIELDS;
		const overrides: RosterOverrides = { ...(entry.overrides ?? {}) };
		for (const field of targets) {
			delete overrides[field];
		}
		entry.overrides = overrides;

		const saved = await this.rosterRepository.save(entry);
		this.emitAdminAction('roster.overrides.reset', actor, { key, fields: targets });
		return saved;
	}

	/**
	 * Bulk control-manager assignment through the merge engine. Entries whose
	 * controlManager is overridden are skipped unless `ignoreOverrides` is set;
	 * assigned entries get the override flag.
	 */
	async assignControlManager(input: unknown, actor?: string): Promise<BulkAssignResult> {
		const dto = await validateDto(AssignControlManagerDto, input);
		const targets = await this.findAssignTargets(dto);
		const result: BulkAssignResult = { updated: [], unchanged: [], skipped: [] };

		for (const target of targets) {
			// Re-read so a concurrent edit's override flag is honoured
			const current = await this.findOne(target.key);
			const merge = this.mergeService.mergeFields(
				current,
				{ controlManager: dto.managerIds },
				{ ignoreOverrides: dto.ignoreOverrides === true },
			);

			if (merge.skippedFields.includes('controlManager')) {
				result.skipped.push(target.key);
				continue;
			}

			const alreadyOverridden = current.overrides?.controlManager === true;
			if (merge.changedFields.length > 0 || !alreadyOverridden) {
				merge.entry.overrides = { ...merge.entry.overrides, controlManager: true };
				await this.rosterRepository.save(merge.entry);
			}
			(merge.changedFields.length > 0 ? result.updated : result.unchanged).push(target.key);
		}

		this.emitAdminAction('roster.control_manager.assigned', actor, {
			managerIds: dto.managerIds,
			ignoreOverrides: dto.ignoreOverrides === true,
			updated: result.updated.length,
			unchanged: result.unchanged.length,
			skipped: result.skipped.length,
		});
		return result;
	}

	async setIgnored(key: string, ignored: boolean, actor?: string): Promise<RosterEntry> {
		const entry = await this.findOne(key);
		if (entry.ignored === ignored) {
			return entry;
		}

		entry.ignored = ignored;
		const saved = await this.rosterRepository.save(entry);
		await this.diffService.invalidate();
		this.emitAdminAction(ignored ? 'roster.entry.ignored' : 'roster.entry.unignored', actor, { key });
		return saved;
	}

	private async findAssignTargets(dto: AssignControlManagerDto): Promise<RosterEntry[]> {
		if (dto.keys && dto.keys.length > 0) {
			const entries = await this.rosterRepository.find({ where: { key: In(dto.keys) } });
			const missing = dto.keys.filter((key) => !entries.some((entry) => entry.key === key));
			if (missing.length > 0) {
				throw new NotFoundException(`Roster entries not found: ${missing.join(', ')}`);
			}
			return entries;
		}

		if (!dto.team && !dto.division) {
			throw new BadRequestException('No roster entries selected: give keys, a team or a division');
		}

		const entries = await this.findAll();
		return entries.filter(
			(entry) => (!dto.team || entry.team === dto.team) && (!dto.division || entry.division === dto.division),
		);
	}

	private buildEntry(key: string, name: string): RosterEntry {
		return this.rosterRepository.create({
			key,
			name,
			email: null,
			trackerUserId: null,
			hrSystemId: null,
			division: null,
			direction: null,
			unit: null,
			team: null,
			location: null,
			planStart: null,
			continuousSchedule: false,
			controlManager: [],
			contactHandle: null,
			managerContactHandle: null,
			managerName: null,
			hireDate: null,
			archived: false,
			ignored: false,
			overrides: {},
		});
	}

	private emitAdminAction(action: AdminAction, actor: string | undefined, details: Record<string, unknown>): void {
		const event: AdminActionEvent = { action, actor: actor ?? null, details };
		this.eventEmitter.emit(AuditEvents.ADMIN_ACTION, event);
	}
}
