import { Injectable } from '@nestjs/common';
import { UpstreamSource } from '../../lib/enums/upstream.enums';
import { namesMatch, normalizeEmail } from '../../lib/utils/name-matching.util';
import { RawIdentity } from '../../upstream/interfaces/upstream-records.interface';
import { RosterEntry } from '../entities/roster-entry.entity';

export type MatchStage = 'id' | 'email' | 'name';

export interface IdentityResolution<T = RosterEntry> {
	entry: T | null;
	matchedBy: MatchStage | null;
	/** A stage found more than one entry; lower stages were not consulted */
	ambiguous: boolean;
}

type Identifiable = Pick<RosterEntry, 'name' | 'email' | 'trackerUserId' | 'hrSystemId'>;

/**
 * Matches upstream records to roster entries: stored source id, then email, then
 * name in either "First Last" or "Last First" order. A stage with several hits
 * ends the cascade with no match.
 */
@Injectable()
export class IdentityResolverService {
	resolve<T extends Identifiable = RosterEntry>(raw: RawIdentity, roster: readonly T[], source: UpstreamSource): T | null {
		return this.explain(raw, roster, source).entry;
	}

	explain<T extends Identifiable = RosterEntry>(
		raw: RawIdentity,
		roster: readonly T[],
		source: UpstreamSource,
	): IdentityResolution<T> {
		const externalId = raw.externalId === null || raw.externalId === undefined ? '' : String(raw.externalId).trim();
		if (externalId) {
			const byId = roster.filter((entry) => this.sourceIdOf(entry, source) === externalId);
			const outcome = this.settle(byId, 'id');
			if (outcome) return outcome;
		}

		const email = normalizeEmail(raw.email);
		if (email) {
			const byEmail = roster.filter((entry) => normalizeEmail(entry.email) === email);
			const outcome = this.settle(byEmail, 'email');
			if (outcome) return outcome;
		}

		if (raw.displayName) {
			const byName = roster.filter((entry) => namesMatch(entry.name, raw.displayName));
			const outcome = this.settle(byName, 'name');
			if (outcome) return outcome;
		}

		return { entry: null, matchedBy: null, ambiguous: false };
	}

	/**
	 * Find the record describing the same person in another upstream population,
	 * by email and then by name. Several hits count as no match.
	 */
	findCounterpart<T extends RawIdentity>(raw: RawIdentity, candidates: readonly T[]): T | null {
		const email = normalizeEmail(raw.email);
		if (email) {
			const byEmail = candidates.filter((candidate) => normalizeEmail(candidate.email) === email);
			if (byEmail.length > 0) return byEmail.length === 1 ? byEmail[0] : null;
		}

		const byName = candidates.filter((candidate) => namesMatch(candidate.displayName, raw.displayName));
		return byName.length === 1 ? byName[0] : null;
	}

	private settle<T>(candidates: T[], stage: MatchStage): IdentityResolution<T> | null {
		if (candidates.length === 0) return null;
		if (candidates.length > 1) return { entry: null, matchedBy: null, ambiguous: true };
		return { entry: candidates[0], matchedBy: stage, ambiguous: false };
	}

	private sourceIdOf(entry: Identifiable, source: UpstreamSource): string {
		const value = source === UpstreamSource.TRACKER ? entry.trackerUserId : entry.hrSystemId;
		return (value ?? '').trim();
	}
}
