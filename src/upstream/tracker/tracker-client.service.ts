import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import { isRecord, readArray } from '../../lib/utils/payload.util';
import { getErrorMessage } from '../../lib/utils/error.util';
import { isActiveTrackerUser, mapTrackerDayRecord, mapTrackerUser } from '../mappers/tracker.mapper';
import { TrackerDayRecord, TrackerUser } from '../interfaces/upstream-records.interface';

const REQUEST_TIMEOUT_MS = 30000;

/**
 * Client for the time-tracker API.
 *
 * Every method is a GET on `<base>/<method>` with the access key as a query parameter.
 */
@Injectable()
export class TrackerClientService {
	private readonly logger = new Logger(TrackerClientService.name);
	private readonly accessKey: string;
	private readonly http: AxiosInstance | null = null;

	constructor(private readonly configService: ConfigService) {
		const baseURL = this.configService.get<string>('TRACKER_BASE_URL') || '';
		this.accessKey = this.configService.get<string>('TRACKER_ACCESS_KEY') || '';

		if (!baseURL || !this.accessKey) {
			this.logger.warn('Tracker client is not configured. Tracker fetches will fail until TRACKER_BASE_URL and TRACKER_ACCESS_KEY are set.');
			return;
		}

		this.http = axios.create({ baseURL, timeout: REQUEST_TIMEOUT_MS });
	}

	isConfigured(): boolean {
		return this.http !== null;
	}

	private async request(method: string, params: Record<string, string> = {}): Promise<unknown> {
		if (!this.http) {
			throw new Error('Tracker client is not configured');
		}

		this.logger.debug(`Tracker request: ${method} ${JSON.stringify(params)}`);
		try {
			const response = await this.http.get<unknown>(`/${method}`, {
				params: { access_key: this.accessKey, ...params },
			});
			return response.data;
		} catch (error) {
			this.logger.error(`Tracker request failed: ${method} - ${getErrorMessage(error)}`);
			throw error;
		}
	}

	/**
	 * All tracker users, active ones only unless `activeOnly` is false
	 */
	async getUsers(activeOnly = true): Promise<TrackerUser[]> {
		const payload = await this.request('getUsers');
		if (!Array.isArray(payload)) {
			throw new Error('Unexpected getUsers response: expected an array');
		}

		const rows = activeOnly ? payload.filter(isActiveTrackerUser) : payload;
		const users: TrackerUser[] = [];
		for (const row of rows) {
			const user = mapTrackerUser(row);
			if (user) users.push(user);
		}

		const dropped = rows.length - users.length;
		if (dropped > 0) {
			this.logger.warn(`Dropped ${dropped} tracker user rows without an id`);
		}
		this.logger.log(`Fetched ${users.length} ${activeOnly ? 'active ' : ''}tracker users`);
		return users;
	}

	/**
	 * Per-user summary for one calendar day in a single request
	 */
	async getSummaryByDay(day: string): Promise<TrackerDayRecord[]> {
		const payload = await this.request('getSummaryByDay', { date: day });
		const rows = isRecord(payload) ? readArray(payload, 'data') : Array.isArray(payload) ? payload : null;
		if (!rows) {
			throw new Error(`Unexpected getSummaryByDay response for ${day}`);
		}

		const records: TrackerDayRecord[] = [];
		for (const row of rows) {
			const record = mapTrackerDayRecord(row);
			if (record) records.push(record);
		}

		this.logger.log(`Fetched tracker summary for ${records.length} users on ${day}`);
		return records;
	}
}
