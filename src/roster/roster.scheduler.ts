import { Injectable, Logger } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { ConfigService } from '@nestjs/config';
import { getErrorMessage, getErrorStack } from '../lib/utils/error.util';
import { RosterSyncService } from './services/roster-sync.service';
import { RosterDiffService } from './services/roster-diff.service';

@Injectable()
export class RosterScheduler {
	private readonly logger = new Logger(RosterScheduler.name);

	constructor(
		private readonly rosterSyncService: RosterSyncService,
		private readonly rosterDiffService: RosterDiffService,
		private readonly configService: ConfigService,
	) {}

	@Cron('0 6 * * *') // Daily at 6 AM
	async handleRosterSync(): Promise<void> {
		if (!this.isEnabled()) {
			this.logger.log('Roster sync is disabled (SYNC_SCHEDULER_ENABLED != true)');
			return;
		}

		this.logger.log('Starting scheduled roster sync (6 AM daily)...');

		try {
			const outcome = await this.rosterSyncService.syncRoster();
			if (outcome.status === 'already_running') {
				this.logger.warn(`Scheduled roster sync skipped: a run started at ${outcome.startedAt.toISOString()} is still active`);
				return;
			}

			// Refresh the cached diff against the roster we just wrote
			await this.rosterDiffService.getLatestDiff(true);
		} catch (error) {
			this.logger.error(`Scheduled roster sync failed: ${getErrorMessage(error)}`, getErrorStack(error));
		}
	}

	private isEnabled(): boolean {
		return this.configService.get<string>('SYNC_SCHEDULER_ENABLED') === 'true';
	}
}
