/**
 * Hierarchy Table Configuration
 *
 * Maps a manager's name to the canonical division/direction/unit/team path of
 * their reports, collapses division label variants into a fixed vocabulary and
 * suggests a default control manager per division.
 *
 * The table is data, read from `config/hierarchy.json` (override with
 * HIERARCHY_TABLE_PATH).
 */
import { readFileSync } from 'fs';
import { isAbsolute, resolve } from 'path';
import { ConfigService } from '@nestjs/config';
import { FactoryProvider } from '@nestjs/common';
import { isRecord, JsonRecord, readString } from '../../lib/utils/payload.util';

export const HIERARCHY_TABLE = Symbol('HIERARCHY_TABLE');

export const DEFAULT_HIERARCHY_TABLE_PATH = 'config/hierarchy.json';

export interface ManagerHierarchyRow {
	manager: string;
	division: string;
	direction: string | null;
	unit: string | null;
	team: string | null;
	location: string | null;
}

export interface HierarchyTable {
	managers: ManagerHierarchyRow[];
	/** Lower-cased raw label -> canonical division */
	divisionAliases: Record<string, string>;
	/** Lower-cased word -> exact spelling */
	wordCaseOverrides: Record<string, string>;
	/** Lower-cased canonical division -> control manager id */
	divisionControlManagers: Record<string, number>;
	defaultControlManager: number;
}

const DIVISION_SUFFIX = ' division';

/**
 * Trim a label and drop a trailing " Division". "-" counts as empty.
 */
export function cleanLabel(value: string | null | undefined): string {
	const text = (value ?? '').trim();
	if (!text || text === '-') return '';
	if (text.toLowerCase().endsWith(DIVISION_SUFFIX)) {
		return text.slice(0, -DIVISION_SUFFIX.length).trim();
	}
	return text;
}

/**
 * Canonical spelling of a hierarchy label: known words from the override table,
 * short alphabetic words upper-cased, everything else capitalised.
 */
export function canonicalizeLabel(value: string | null | undefined, wordCaseOverrides: Record<string, string> = {}): string {
	const text = cleanLabel(value);
	if (!text) return '';

	return text
		.split(/\s+/)
		.map((word) => {
			const key = word.toLowerCase();
			if (wordCaseOverrides[key]) return wordCaseOverrides[key];
			if (word.length <= 3 && /^[a-z]+$/i.test(word)) return word.toUpperCase();
			return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
		})
		.join(' ');
}

function readStringMap(source: JsonRecord, key: string): Record<string, string> {
	const value = source[key];
	const result: Record<string, string> = {};
	if (!isRecord(value)) return result;

	for (const [label, target] of Object.entries(value)) {
		if (typeof target === 'string') result[label.toLowerCase()] = target;
	}
	return result;
}

function readNumberMap(source: JsonRecord, key: string): Record<string, number> {
	const value = source[key];
	const result: Record<string, number> = {};
	if (!isRecord(value)) return result;

	for (const [label, target] of Object.entries(value)) {
		if (typeof target === 'number' && Number.isInteger(target)) result[label.toLowerCase()] = target;
	}
	return result;
}

/**
 * Validate the parsed JSON. Manager rows without a manager or a division are rejected.
 */
export function parseHierarchyTable(raw: unknown): HierarchyTable {
	if (!isRecord(raw)) {
		throw new Error('Hierarchy table must be a JSON object');
	}

	const rows: unknown[] = Array.isArray(raw.managers) ? raw.managers : [];
	const managers: ManagerHierarchyRow[] = rows.map((row, index) => {
		const manager = isRecord(row) ? readString(row, 'manager') : null;
		const division = isRecord(row) ? readString(row, 'division') : null;
		if (!isRecord(row) || !manager || !division) {
			throw new Error(`Hierarchy table row ${index} needs "manager" and "division"`);
		}
		return {
			manager,
			division,
			direction: readString(row, 'direction'),
			unit: readString(row, 'unit'),
			team: readString(row, 'team'),
			location: readString(row, 'location'),
		};
	});

	const defaultControlManager = raw.defaultControlManager;
	if (typeof defaultControlManager !== 'number' || !Number.isInteger(defaultControlManager)) {
		throw new Error('Hierarchy table needs an integer "defaultControlManager"');
	}

	return {
		managers,
		divisionAliases: readStringMap(raw, 'divisionAliases'),
		wordCaseOverrides: readStringMap(raw, 'wordCaseOverrides'),
		divisionControlManagers: readNumberMap(raw, 'divisionControlManagers'),
		defaultControlManager,
	};
}

export function loadHierarchyTable(path: string): HierarchyTable {
	const fullPath = isAbsolute(path) ? path : resolve(process.cwd(), path);
	return parseHierarchyTable(JSON.parse(readFileSync(fullPath, 'utf8')));
}

export const hierarchyTableProvider: FactoryProvider<HierarchyTable> = {
	provide: HIERARCHY_TABLE,
	inject: [ConfigService],
	useFactory: (configService: ConfigService) =>
		loadHierarchyTable(configService.get<string>('HIERARCHY_TABLE_PATH') || DEFAULT_HIERARCHY_TABLE_PATH),
};
