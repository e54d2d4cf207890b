/**
 * Roster fields the merge engine may write. Every one of them can carry an
 * override flag, which protects it from upstream syncs.
 */
export interface RosterFields {
	name: string;
	email: string | null;
	trackerUserId: string | null;
	hrSystemId: string | null;
	division: string | null;
	direction: string | null;
	unit: string | null;
	team: string | null;
	location: string | null;
	planStart: string | null;
	controlManager: number[];
	contactHandle: string | null;
	managerContactHandle: string | null;
	managerName: string | null;
	hireDate: string | null;
	archived: boolean;
}

export type OverridableField = keyof RosterFields;

const OVERRIDABLE_FIELD_SET = {
	name: true,
	email: true,
	trackerUserId: true,
	hrSystemId: true,
	division: true,
	direction: true,
	unit: true,
	team: true,
	location: true,
	planStart: true,
	controlManager: true,
	contactHandle: true,
	managerContactHandle: true,
	managerName: true,
	hireDate: true,
	archived: true,
} satisfies Record<OverridableField, true>;

export function isOverridableField(value: string): value is OverridableField {
	return Object.prototype.hasOwnProperty.call(OVERRIDABLE_FIELD_SET, value);
}

export const OVERRIDABLE_FIELDS: readonly OverridableField[] = Object.keys(OVERRIDABLE_FIELD_SET).filter(isOverridableField);

/**
 * Override flags of a roster entry; a field is protected when its flag is `true`.
 */
export type RosterOverrides = Partial<Record<OverridableField, boolean>>;

/**
 * Candidate values for a merge. `undefined`, `null` and empty strings are ignored.
 */
export type RosterFieldUpdate = { [K in OverridableField]?: RosterFields[K] | null };

export interface MergeOptions {
	ignoreOverrides?: boolean;
}
