export const AuditEvents = {
	ROSTER_SYNCED: 'roster.synced',
	ATTENDANCE_SYNCED: 'attendance.synced',
	ADMIN_ACTION: 'admin.action',
} as const;

export type AdminAction =
	| 'roster.entry.created'
	| 'roster.entry.added_from_diff'
	| 'roster.entry.updated'
	| 'roster.overrides.reset'
	| 'roster.control_manager.assigned'
	| 'roster.entry.ignored'
	| 'roster.entry.unignored'
	| 'attendance.record.edited'
	| 'attendance.record.reset'
	| 'attendance.records.pruned';

export interface AdminActionEvent {
	action: AdminAction;
	actor?: string | null;
	details: Record<string, unknown>;
}

export interface SyncCompletedEvent {
	runId: string;
	summary: object;
}
