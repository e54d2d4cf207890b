import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import { isRecord, readArray } from '../../lib/utils/payload.util';
import { getErrorMessage } from '../../lib/utils/error.util';
import { mapHrEmployee, mapLeaveForDay } from '../mappers/hr.mapper';
import { HrEmployee, LeaveDay } from '../interfaces/upstream-records.interface';

const REQUEST_TIMEOUT_MS = 30000;

/**
 * Client for the HR system REST API (API key header, page/per_page pagination).
 */
@Injectable()
export class HrClientService {
	private readonly logger = new Logger(HrClientService.name);
	private readonly http: AxiosInstance | null = null;
	private readonly pageSize: number;
	private readonly maxPages: number;

	constructor(private readonly configService: ConfigService) {
		const baseURL = this.configService.get<string>('HR_BASE_URL') || '';
		const apiKey = this.configService.get<string>('HR_API_KEY') || '';
		this.pageSize = Number(this.configService.get<string>('HR_PAGE_SIZE') || 100);
		this.maxPages = Number(this.configService.get<string>('HR_MAX_PAGES') || 50);

		if (!baseURL || !apiKey) {
			this.logger.warn('HR client is not configured. HR fetches will fail until HR_BASE_URL and HR_API_KEY are set.');
			return;
		}

		this.http = axios.create({
			baseURL,
			timeout: REQUEST_TIMEOUT_MS,
			headers: {
				'X-API-KEY': apiKey,
				'Content-Type': 'application/json',
			},
		});
	}

	isConfigured(): boolean {
		return this.http !== null;
	}

	/**
	 * Collect every page of a list endpoint. Stops at the first empty page or after
	 * `HR_MAX_PAGES` pages.
	 */
	private async fetchAllPages(endpoint: string): Promise<unknown[]> {
		if (!this.http) {
			throw new Error('HR client is not configured');
		}

		const rows: unknown[] = [];
		for (let page = 1; page <= this.maxPages; page++) {
			let payload: unknown;
			try {
				const response = await this.http.get<unknown>(endpoint, { params: { page, per_page: this.pageSize } });
				payload = response.data;
			} catch (error) {
				this.logger.error(`HR request failed: ${endpoint} page ${page} - ${getErrorMessage(error)}`);
				throw error;
			}

			const pageRows = isRecord(payload) ? readArray(payload, 'data') : [];
			if (pageRows.length === 0) break;

			rows.push(...pageRows);
			if (page === this.maxPages) {
				this.logger.warn(`HR ${endpoint} stopped at the page limit (${this.maxPages})`);
			}
		}

		return rows;
	}

	async getEmployees(): Promise<HrEmployee[]> {
		const rows = await this.fetchAllPages('/employees');

		const employees: HrEmployee[] = [];
		for (const row of rows) {
			const employee = mapHrEmployee(row);
			if (employee) employees.push(employee);
		}

		const dropped = rows.length - employees.length;
		if (dropped > 0) {
			this.logger.warn(`Dropped ${dropped} HR employee rows without an id`);
		}
		this.logger.log(`Fetched ${employees.length} HR employees`);
		return employees;
	}

	/**
	 * Approved leave covering `day`, one entry per employee email
	 */
	async getLeavesForDay(day: string): Promise<LeaveDay[]> {
		const rows = await this.fetchAllPages('/leave_requests');

		const byEmail = new Map<string, LeaveDay>();
		for (const row of rows) {
			const leave = mapLeaveForDay(row, day);
			if (leave) byEmail.set(leave.email, leave);
		}

		this.logger.log(`Found ${byEmail.size} approved leaves on ${day}`);
		return [...byEmail.values()];
	}
}
