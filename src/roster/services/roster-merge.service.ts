import { Injectable } from '@nestjs/common';
import { RosterEntry } from '../entities/roster-entry.entity';
import {
	MergeOptions,
	OVERRIDABLE_FIELDS,
	OverridableField,
	RosterFields,
	RosterFieldUpdate,
} from '../interfaces/roster-fields.interface';

export interface MergeResult {
	entry: RosterEntry;
	changedFields: OverridableField[];
	skippedFields: OverridableField[];
}

type FieldOutcome = 'changed' | 'skipped' | 'unchanged' | 'absent';

function sameValue(current: unknown, candidate: unknown): boolean {
	if (Array.isArray(current) && Array.isArray(candidate)) {
		if (current.length !== candidate.length) return false;
		const left = [...current].sort();
		const right = [...candidate].sort();
		return left.every((value, index) => value === right[index]);
	}
	return current === candidate;
}

/**
 * Override-aware field merge used by every sync path and by bulk admin assignment.
 *
 * Never mutates its input and never touches the override flags themselves.
 */
@Injectable()
export class RosterMergeService {
	mergeFields(entry: RosterEntry, update: RosterFieldUpdate, options: MergeOptions = {}): MergeResult {
		const merged = Object.assign(new RosterEntry(), entry, {
			controlManager: [...(entry.controlManager ?? [])],
			overrides: { ...(entry.overrides ?? {}) },
		});
		const changedFields: OverridableField[] = [];
		const skippedFields: OverridableField[] = [];

		for (const field of OVERRIDABLE_FIELDS) {
			const outcome = this.mergeField(merged, entry, update, field, options.ignoreOverrides === true);
			if (outcome === 'changed') changedFields.push(field);
			if (outcome === 'skipped') skippedFields.push(field);
		}

		return { entry: merged, changedFields, skippedFields };
	}

	private mergeField<K extends OverridableField>(
		target: RosterFields,
		source: RosterEntry,
		update: RosterFieldUpdate,
		field: K,
		ignoreOverrides: boolean,
	): FieldOutcome {
		const candidate = update[field];
		if (candidate === undefined || candidate === null) return 'absent';
		if (typeof candidate === 'string' && candidate.trim() === '') return 'absent';

		// Overridden fields are protected even when they hold no value
		if (source.overrides?.[field] && !ignoreOverrides) return 'skipped';

		if (sameValue(target[field], candidate)) return 'unchanged';

		target[field] = candidate;
		return 'changed';
	}
}
