import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK, Clock } from '../interfaces/clock.interface';

export type ExclusiveRunResult<T> =
	| { status: 'completed'; result: T }
	| { status: 'already_running'; startedAt: Date };

/**
 * Run-in-progress guard for long sync jobs.
 *
 * A second request for a run that is still active returns immediately with
 * `already_running` instead of queueing. The guard is released whether the job
 * resolves or throws.
 */
@Injectable()
export class SyncLockService {
	private readonly logger = new Logger(SyncLockService.name);
	private readonly activeRuns = new Map<string, Date>();

	constructor(@Inject(CLOCK) private readonly clock: Clock) {}

	async runExclusive<T>(name: string, job: () => Promise<T>): Promise<ExclusiveRunResult<T>> {
		const startedAt = this.activeRuns.get(name);
		if (startedAt) {
			this.logger.warn(`Run "${name}" requested while already running since ${startedAt.toISOString()}`);
			return { status: 'already_running', startedAt };
		}

		this.activeRuns.set(name, this.clock.now());
		try {
			const result = await job();
			return { status: 'completed', result };
		} finally {
			this.activeRuns.delete(name);
		}
	}

	isRunning(name: string): boolean {
		return this.activeRuns.has(name);
	}
}
