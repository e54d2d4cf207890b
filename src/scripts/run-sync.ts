#!/usr/bin/env node

import 'reflect-metadata';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { AppModule } from '../app.module';
import { RosterSyncService } from '../roster/services/roster-sync.service';
import { RosterDiffService } from '../roster/services/roster-diff.service';
import { AttendanceSyncService } from '../attendance/services/attendance-sync.service';
import { AttendanceService } from '../attendance/attendance.service';
import { getErrorMessage } from '../lib/utils/error.util';

const CLI_ACTOR = 'cli';
const logger = new Logger('RunSync');

async function withContext(verbose: boolean, job: (app: INestApplicationContext) => Promise<unknown>): Promise<void> {
	const app = await NestFactory.createApplicationContext(AppModule, {
		logger: verbose ? ['log', 'debug', 'error', 'verbose', 'warn'] : ['log', 'error', 'warn'],
	});
	try {
		const result = await job(app);
		console.log(JSON.stringify(result, null, 2));
	} finally {
		await app.close();
	}
}

async function main() {
	await yargs(hideBin(process.argv))
		.scriptName('run-sync')
		.option('verbose', {
			alias: 'v',
			type: 'boolean',
			default: false,
			describe: 'Enable verbose logging',
		})
		.command(
			'roster',
			'Reconcile the roster against the tracker and the HR system',
			(command) => command.option('key', { alias: 'k', type: 'string', describe: 'Sync only this roster entry' }),
			(argv) =>
				withContext(argv.verbose, (app) => {
					const service = app.get(RosterSyncService);
					return argv.key ? service.syncEntry(argv.key) : service.syncRoster();
				}),
		)
		.command(
			'attendance',
			'Build attendance records for one day or an inclusive range of days',
			(command) =>
				command
					.option('date', { alias: 'd', type: 'string', describe: 'Day to sync (YYYY-MM-DD)' })
					.option('from', { type: 'string', describe: 'First day of the range (YYYY-MM-DD)' })
					.option('to', { type: 'string', describe: 'Last day of the range (YYYY-MM-DD)' })
					.option('skip-absent', {
						type: 'boolean',
						default: false,
						describe: 'Do not write absent records for idle entries without one',
					})
					.check((args) => {
						if (args.date && (args.from || args.to)) {
							throw new Error('Use either --date or --from/--to, not both');
						}
						if (!args.date && !(args.from && args.to)) {
							throw new Error('Pass --date, or both --from and --to');
						}
						return true;
					}),
			(argv) =>
				withContext(argv.verbose, (app) => {
					const service = app.get(AttendanceSyncService);
					const options = { includeAbsent: !argv.skipAbsent };
					if (argv.date) {
						return service.syncDay(argv.date, options);
					}
					return service.syncRange(argv.from ?? '', argv.to ?? '', options);
				}),
		)
		.command(
			'diff',
			'Show people known to only one upstream system',
			(command) => command.option('force', { alias: 'f', type: 'boolean', default: false, describe: 'Recompute instead of using the cached diff' }),
			(argv) => withContext(argv.verbose, (app) => app.get(RosterDiffService).getLatestDiff(argv.force)),
		)
		.command(
			'prune',
			'Delete attendance records older than a day, keeping manual edits',
			(command) => command.option('before', { type: 'string', demandOption: true, describe: 'Cutoff day (YYYY-MM-DD), exclusive' }),
			(argv) => withContext(argv.verbose, (app) => app.get(AttendanceService).pruneRecords(argv.before, CLI_ACTOR)),
		)
		.command(
			'records',
			'Print stored attendance records for a day, or for one entry over a range',
			(command) =>
				command
					.option('date', { alias: 'd', type: 'string', describe: 'Day to list (YYYY-MM-DD)' })
					.option('entry', { alias: 'e', type: 'string', describe: 'Roster entry key' })
					.option('from', { type: 'string', describe: 'First day of the range (YYYY-MM-DD)' })
					.option('to', { type: 'string', describe: 'Last day of the range (YYYY-MM-DD)' })
					.check((args) => {
						if (!args.date && !(args.entry && args.from && args.to)) {
							throw new Error('Pass --date, or --entry with --from and --to');
						}
						return true;
					}),
			(argv) =>
				withContext(argv.verbose, (app) => {
					const service = app.get(AttendanceService);
					if (argv.date) {
						return service.findForDate(argv.date);
					}
					return service.findForEntry(argv.entry ?? '', argv.from ?? '', argv.to ?? '');
				}),
		)
		.example('$0 roster', 'Run one roster sync')
		.example('$0 roster --key ivan@example.com', 'Sync a single roster entry')
		.example('$0 attendance --date 2024-03-14', 'Sync a single day')
		.example('$0 attendance --from 2024-03-01 --to 2024-03-31', 'Re-sync a month')
		.demandCommand(1)
		.strict()
		.help()
		.parseAsync();
}

main().catch((error: unknown) => {
	logger.error(`Sync failed: ${getErrorMessage(error)}`);
	process.exit(1);
});
