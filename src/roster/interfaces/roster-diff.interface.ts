import { HierarchyNormalization } from '../services/hierarchy-normalizer.service';

/**
 * A roster entry as it appears in a diff
 */
export interface RosterRef {
	key: string;
	name: string;
	email: string | null;
	trackerUserId: string | null;
	hrSystemId: string | null;
	division: string | null;
	team: string | null;
}

export interface TrackerOnlyRecord {
	externalId: string | null;
	displayName: string;
	email: string | null;
	group: string | null;
}

/**
 * An HR employee with no roster entry, carrying what "add to roster" needs
 */
export interface HrOnlyRecord {
	externalId: string;
	displayName: string;
	email: string | null;
	division: string | null;
	department: string | null;
	managerName: string | null;
	location: string | null;
	position: string | null;
	contactHandle: string | null;
	hireDate: string | null;
	suggestion: HierarchyNormalization;
}

export interface DiffCounts {
	missingFromTracker: number;
	missingFromHr: number;
	trackerOnly: number;
	hrOnly: number;
	/** Upstream records dropped for carrying no id, email or name */
	dropped: number;
}

export interface DiffResult {
	missingFromTracker: RosterRef[];
	missingFromHr: RosterRef[];
	trackerOnly: TrackerOnlyRecord[];
	hrOnly: HrOnlyRecord[];
	counts: DiffCounts;
	errors: { tracker?: string; hr?: string };
	generatedAt: Date;
}
