import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { getErrorMessage, getErrorStack } from '../lib/utils/error.util';
import { AuditLog } from './entities/audit-log.entity';
import { AdminActionEvent, AuditEvents, SyncCompletedEvent } from './audit.events';

/**
 * Append-only audit trail. A failed write is logged and never reaches the emitter.
 */
@Injectable()
export class AuditListener {
	private readonly logger = new Logger(AuditListener.name);

	constructor(
		@InjectRepository(AuditLog)
		private readonly auditRepository: Repository<AuditLog>,
	) {}

	@OnEvent(AuditEvents.ADMIN_ACTION)
	async handleAdminAction(event: AdminActionEvent): Promise<void> {
		await this.write(event.action, event.actor ?? null, event.details);
	}

	@OnEvent(AuditEvents.ROSTER_SYNCED)
	async handleRosterSynced(event: SyncCompletedEvent): Promise<void> {
		await this.write(AuditEvents.ROSTER_SYNCED, null, { runId: event.runId, summary: event.summary });
	}

	@OnEvent(AuditEvents.ATTENDANCE_SYNCED)
	async handleAttendanceSynced(event: SyncCompletedEvent): Promise<void> {
		await this.write(AuditEvents.ATTENDANCE_SYNCED, null, { runId: event.runId, summary: event.summary });
	}

	private async write(action: string, actor: string | null, details: Record<string, unknown>): Promise<void> {
		try {
			const log = this.auditRepository.create({ action, actor, details });
			await this.auditRepository.save(log);
		} catch (error) {
			this.logger.error(`Failed to write audit log for ${action}: ${getErrorMessage(error)}`, getErrorStack(error));
		}
	}
}
