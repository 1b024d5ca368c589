import type { Logger } from 'pino';
import type { z } from 'zod';

import type { DomainConfig } from '../domains/types.js';
import { ApiError, TransportError, ValidationError, describeError } from '../errors.js';
import { NO_RETRY, type RetryPolicy, type Sleep, sleep, withRetry } from './retry.js';
import {
	CloudflareEnvelopeSchema,
	type CreateFirewallRuleRequest,
	type CreateListRequest,
	CreatedFirewallRulesSchema,
	type FirewallRule,
	FirewallRuleCollectionSchema,
	type FirewallRulePage,
	type ListItem,
	type PageInfo,
	type RemoteList,
	RemoteListCollectionSchema,
	RemoteListSchema,
	type ReplaceItemsResult,
	ReplaceItemsResultSchema,
} from './types.js';

const DEFAULT_TIMEOUT_MS = 30_000;
// Largest page the firewall rules endpoint serves; its default is 25
const RULES_PER_PAGE = 100;

type HttpMethod = 'GET' | 'POST' | 'PUT';

// Only these are safe to repeat after a transport failure; a retried POST could create a duplicate
const IDEMPOTENT_METHODS: ReadonlySet<HttpMethod> = new Set(['GET', 'PUT']);

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export type CloudflareClientOptions = {
	baseUrl: string;
	logger: Logger;
	timeoutMs?: number;
	retry?: RetryPolicy;
	fetch?: FetchFn;
	sleep?: Sleep;
};

/**
 * Thin typed wrapper over the Cloudflare v4 endpoints the sync needs.
 *
 * Credentials come from the {@link DomainConfig} passed to each call, so one client
 * serves every configured domain. All failures are thrown as {@link TransportError},
 * {@link ApiError} or {@link ValidationError}, each naming the domain.
 */
export class CloudflareClient {
	private readonly baseUrl: string;
	private readonly logger: Logger;
	private readonly timeoutMs: number;
	private readonly retry: RetryPolicy;
	private readonly fetchFn: FetchFn;
	private readonly sleep: Sleep;

	constructor(options: CloudflareClientOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, '');
		this.logger = options.logger;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.retry = options.retry ?? NO_RETRY;
		this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
		this.sleep = options.sleep ?? sleep;
	}

	// ─── Account Lists ──────────────────────────────────────────────────────

	async listLists(domain: DomainConfig): Promise<Array<RemoteList>> {
		return this.request(domain, 'GET', `/accounts/${enc(domain.accountId)}/rules/lists`, RemoteListCollectionSchema);
	}

	async createList(domain: DomainConfig, body: CreateListRequest): Promise<RemoteList> {
		return this.request(domain, 'POST', `/accounts/${enc(domain.accountId)}/rules/lists`, RemoteListSchema, body);
	}

	async replaceListItems(domain: DomainConfig, listId: string, items: Array<ListItem>): Promise<ReplaceItemsResult> {
		return this.request(
			domain,
			'PUT',
			`/accounts/${enc(domain.accountId)}/rules/lists/${enc(listId)}/items`,
			ReplaceItemsResultSchema,
			items,
		);
	}

	// ─── Zone Firewall Rules ────────────────────────────────────────────────

	/** One page of the zone's rules; callers walk pages until `page >= totalPages`. */
	async listFirewallRules(domain: DomainConfig, page = 1): Promise<FirewallRulePage> {
		const path = `/zones/${enc(domain.zoneId)}/firewall/rules?page=${page}&per_page=${RULES_PER_PAGE}`;
		const { data, pageInfo } = await this.exchange(domain, 'GET', path, FirewallRuleCollectionSchema);
		// Without result_info the response is the whole collection
		return { rules: data, ...(pageInfo ?? { page, totalPages: page }) };
	}

	async createFirewallRules(domain: DomainConfig, rules: Array<CreateFirewallRuleRequest>): Promise<Array<FirewallRule>> {
		return this.request(domain, 'POST', `/zones/${enc(domain.zoneId)}/firewall/rules`, CreatedFirewallRulesSchema, rules);
	}

	// ─── Transport ──────────────────────────────────────────────────────────

	private async request<S extends z.ZodTypeAny>(
		domain: DomainConfig,
		method: HttpMethod,
		path: string,
		resultSchema: S,
		body?: unknown,
	): Promise<z.output<S>> {
		const { data } = await this.exchange(domain, method, path, resultSchema, body);
		return data;
	}

	private async exchange<S extends z.ZodTypeAny>(
		domain: DomainConfig,
		method: HttpMethod,
		path: string,
		resultSchema: S,
		body?: unknown,
	): Promise<{ data: z.output<S>; pageInfo: PageInfo | undefined }> {
		const policy = IDEMPOTENT_METHODS.has(method) ? this.retry : NO_RETRY;
		const response = await withRetry(
			() => this.send(domain, method, path, body),
			policy,
			(err, attempt, delayMs) => {
				this.logger.warn(
					{ domain: domain.domain, method, path, attempt, delayMs, err: err.message },
					'Cloudflare request failed, retrying',
				);
			},
			this.sleep,
		);

		const parsed = resultSchema.safeParse(response.result);
		if (!parsed.success) {
			throw new ValidationError(
				`Unexpected result from ${method} ${path} for ${domain.domain}: ${parsed.error.issues
					.map((issue) => `${issue.path.join('.') || 'result'} ${issue.message}`)
					.join(', ')}`,
				domain.domain,
			);
		}
		return { data: parsed.data, pageInfo: response.pageInfo };
	}

	/** One bounded request; returns the envelope's `result` once `success: true` is confirmed. */
	private async send(
		domain: DomainConfig,
		method: HttpMethod,
		path: string,
		body: unknown,
	): Promise<{ result: unknown; pageInfo: PageInfo | undefined }> {
		const init: RequestInit = {
			method,
			headers: {
				'X-Auth-Email': domain.credentials.email,
				'X-Auth-Key': domain.credentials.apiKey,
				'Content-Type': 'application/json',
			},
			signal: AbortSignal.timeout(this.timeoutMs),
		};
		if (body !== undefined) {
			init.body = JSON.stringify(body);
		}

		let status: number;
		let text: string;
		try {
			const response = await this.fetchFn(`${this.baseUrl}${path}`, init);
			status = response.status;
			text = await response.text();
		} catch (err) {
			throw new TransportError(`${method} ${path} failed for ${domain.domain}: ${describeError(err)}`, domain.domain, {
				cause: err,
			});
		}

		this.logger.debug({ domain: domain.domain, method, path, status }, 'Cloudflare response received');

		if (text.trim() === '') {
			throw new TransportError(`Empty response from ${method} ${path} for ${domain.domain} (HTTP ${status})`, domain.domain);
		}

		let json: unknown;
		try {
			json = JSON.parse(text);
		} catch (err) {
			throw new TransportError(
				`Non-JSON response from ${method} ${path} for ${domain.domain} (HTTP ${status})`,
				domain.domain,
				{ cause: err },
			);
		}

		const envelope = CloudflareEnvelopeSchema.safeParse(json);
		if (!envelope.success) {
			throw new TransportError(
				`Malformed response envelope from ${method} ${path} for ${domain.domain} (HTTP ${status})`,
				domain.domain,
			);
		}

		if (envelope.data.success !== true) {
			const first = envelope.data.errors?.[0]?.message;
			const reason = typeof first === 'string' && first !== '' ? first : `request failed with HTTP ${status}`;
			throw new ApiError(`Cloudflare API error for ${domain.domain}: ${reason}`, status, domain.domain);
		}

		const info = envelope.data.result_info;
		return {
			result: envelope.data.result,
			pageInfo: info ? { page: info.page, totalPages: info.total_pages } : undefined,
		};
	}
}

function enc(segment: string): string {
	return encodeURIComponent(segment);
}
