import { OverridableField } from './roster-fields.interface';
import { RosterEntry } from '../entities/roster-entry.entity';

export interface SyncError {
	key: string;
	error: string;
}

/**
 * Outcome of one roster sync run
 */
export interface SyncSummary {
	runId: string;
	/** Upstream records whose merge changed at least one field (HR and tracker counted separately) */
	merged: number;
	/** Upstream records whose merge changed nothing */
	unchanged: number;
	/** Field values withheld because the field is overridden, summed over entries */
	skippedFields: number;
	errored: number;
	unmatched: { tracker: number; hr: number };
	/** Records that resolved to an entry another record of the same source had claimed */
	conflicts: { tracker: number; hr: number };
	archived: number;
	errors: SyncError[];
	sourceErrors: { tracker?: string; hr?: string };
	startedAt: Date;
	finishedAt: Date;
}

export interface AppliedMerge {
	entry: RosterEntry;
	changedFields: OverridableField[];
	skippedFields: OverridableField[];
}

export interface BulkAssignResult {
	updated: string[];
	unchanged: string[];
	/** Entries whose controlManager is overridden and was left alone */
	skipped: string[];
}
