import { Inject, Injectable } from '@nestjs/common';
import { normalizeName } from '../../lib/utils/name-matching.util';
import { canonicalizeLabel, cleanLabel, HIERARCHY_TABLE, HierarchyTable, ManagerHierarchyRow } from '../config/hierarchy-table.config';

export interface HierarchyFields {
	division: string | null;
	direction: string | null;
	unit: string | null;
	team: string | null;
	location: string | null;
}

export interface RawHierarchy extends Partial<HierarchyFields> {
	managerName?: string | null;
}

export interface HierarchyNormalization {
	fields: HierarchyFields;
	changed: boolean;
	/** Suggested control manager for the canonical division; null when nothing matched */
	controlManager: number | null;
	matchedBy: 'manager' | 'division' | null;
}

const HIERARCHY_KEYS: (keyof HierarchyFields)[] = ['division', 'direction', 'unit', 'team', 'location'];

/**
 * Maps free-form HR hierarchy labels onto the organisation's canonical tree.
 */
@Injectable()
export class HierarchyNormalizerService {
	private readonly managersByName: Map<string, ManagerHierarchyRow>;

	constructor(@Inject(HIERARCHY_TABLE) private readonly table: HierarchyTable) {
		this.managersByName = new Map(table.managers.map((row) => [normalizeName(row.manager), row]));
	}

	normalizeHierarchy(raw: RawHierarchy): HierarchyNormalization {
		const original: HierarchyFields = {
			division: raw.division ?? null,
			direction: raw.direction ?? null,
			unit: raw.unit ?? null,
			team: raw.team ?? null,
			location: raw.location ?? null,
		};

		const row = this.managersByName.get(normalizeName(raw.managerName));
		if (row) {
			const fields: HierarchyFields = {
				division: this.canonical(row.division),
				direction: this.canonical(row.direction),
				unit: this.canonical(row.unit),
				team: this.canonical(row.team),
				location: this.canonical(row.location) ?? original.location,
			};
			return this.result(original, fields, 'manager');
		}

		const division = this.canonicalDivision(original.division);
		if (division) {
			return this.result(original, { ...original, division }, 'division');
		}

		return { fields: original, changed: false, controlManager: null, matchedBy: null };
	}

	/**
	 * Canonical division for a raw label, or null when the alias table has no entry
	 */
	canonicalDivision(label: string | null | undefined): string | null {
		const raw = (label ?? '').trim().toLowerCase();
		if (!raw) return null;
		return this.table.divisionAliases[raw] ?? this.table.divisionAliases[cleanLabel(raw).toLowerCase()] ?? null;
	}

	controlManagerFor(division: string | null | undefined): number {
		const key = cleanLabel(division).toLowerCase();
		return this.table.divisionControlManagers[key] ?? this.table.defaultControlManager;
	}

	private canonical(value: string | null): string | null {
		return canonicalizeLabel(value, this.table.wordCaseOverrides) || null;
	}

	private result(original: HierarchyFields, fields: HierarchyFields, matchedBy: 'manager' | 'division'): HierarchyNormalization {
		return {
			fields,
			changed: HIERARCHY_KEYS.some((key) => fields[key] !== original[key]),
			controlManager: this.controlManagerFor(fields.division),
			matchedBy,
		};
	}
}
