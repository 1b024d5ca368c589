import type { FetchFn } from './client.js';
import type { ListItem } from './types.js';

export const FAKE_API_URL = 'https://cloudflare.test/client/v4';

export type RecordedCall = {
	method: string;
	path: string;
	body: unknown;
	email: string | null;
};

type StoredList = {
	id: string;
	name: string;
	kind: string;
	description: string;
	items: Array<ListItem>;
};

type StoredRule = {
	id: string;
	description: string;
	action: string;
	expression: string;
};

type Override = {
	method: string;
	pattern: RegExp;
	status: number;
	body: string;
};

const LISTS_PATH = /^\/accounts\/([^/]+)\/rules\/lists$/;
const ITEMS_PATH = /^\/accounts\/([^/]+)\/rules\/lists\/([^/]+)\/items$/;
const RULES_PATH = /^\/zones\/([^/]+)\/firewall\/rules$/;

const DEFAULT_PER_PAGE = 25;

function envelope(result: unknown, resultInfo?: Record<string, number>): string {
	const info = resultInfo ? { result_info: resultInfo } : {};
	return JSON.stringify({ success: true, errors: [], messages: [], result, ...info });
}

function failure(message: string): string {
	return JSON.stringify({ success: false, errors: [{ code: 10000, message }], messages: [], result: null });
}

/**
 * In-process stand-in for the Cloudflare v4 endpoints the sync calls.
 * Keeps lists per account and rules per zone, and records every request.
 */
export class FakeCloudflare {
	readonly calls: Array<RecordedCall> = [];
	private readonly lists = new Map<string, Array<StoredList>>();
	private readonly rules = new Map<string, Array<StoredRule>>();
	private readonly overrides: Array<Override> = [];
	private nextId = 1;

	readonly fetch: FetchFn = async (input, init) => {
		const url = new URL(input);
		const path = url.pathname.replace(new URL(FAKE_API_URL).pathname, '');
		const method = init.method ?? 'GET';
		const body: unknown = typeof init.body === 'string' ? JSON.parse(init.body) : undefined;
		this.calls.push({ method, path, body, email: new Headers(init.headers).get('x-auth-email') });

		const override = this.overrides.find((o) => o.method === method && o.pattern.test(path));
		if (override) {
			return new Response(override.body, { status: override.status });
		}

		const [status, text] = this.route(method, path, body, url.searchParams);
		return new Response(text, { status, headers: { 'Content-Type': 'application/json' } });
	};

	/** Answer every matching request with a fixed status and raw body. */
	respondWith(method: string, pattern: RegExp, status: number, body: string): void {
		this.overrides.push({ method, pattern, status, body });
	}

	seedList(accountId: string, name: string, items: Array<ListItem> = []): string {
		const id = this.newId('list');
		this.accountLists(accountId).push({ id, name, kind: 'ip', description: 'seeded', items });
		return id;
	}

	seedRule(zoneId: string, description: string): void {
		this.zoneRules(zoneId).push({ id: this.newId('rule'), description, action: 'block', expression: 'ip.src in $seeded' });
	}

	listItems(accountId: string, name: string): Array<ListItem> | undefined {
		return this.accountLists(accountId).find((list) => list.name === name)?.items;
	}

	ruleDescriptions(zoneId: string): Array<string> {
		return this.zoneRules(zoneId).map((rule) => rule.description);
	}

	callsTo(method: string, pattern: RegExp): Array<RecordedCall> {
		return this.calls.filter((call) => call.method === method && pattern.test(call.path));
	}

	private route(method: string, path: string, body: unknown, query: URLSearchParams): [number, string] {
		const listsMatch = LISTS_PATH.exec(path);
		if (listsMatch?.[1]) {
			const lists = this.accountLists(decodeURIComponent(listsMatch[1]));
			if (method === 'GET') {
				return [200, envelope(lists.map(({ items, ...list }) => ({ ...list, num_items: items.length })))];
			}
			const payload: Record<string, unknown> = isRecord(body) ? body : {};
			const name = payload['name'];
			if (method === 'POST' && typeof name === 'string') {
				if (lists.some((list) => list.name === name)) return [400, failure('list already exists')];
				const created: StoredList = {
					id: this.newId('list'),
					name,
					kind: String(payload['kind']),
					description: String(payload['description']),
					items: [],
				};
				lists.push(created);
				const { items, ...rest } = created;
				return [200, envelope({ ...rest, num_items: items.length })];
			}
		}

		const itemsMatch = ITEMS_PATH.exec(path);
		if (itemsMatch?.[1] && itemsMatch[2] && method === 'PUT' && Array.isArray(body)) {
			const listId = decodeURIComponent(itemsMatch[2]);
			const list = this.accountLists(decodeURIComponent(itemsMatch[1])).find((l) => l.id === listId);
			if (!list) return [404, failure('list not found')];
			list.items = body.filter(isListItem);
			return [200, envelope({ operation_id: this.newId('op') })];
		}

		const rulesMatch = RULES_PATH.exec(path);
		if (rulesMatch?.[1]) {
			const rules = this.zoneRules(decodeURIComponent(rulesMatch[1]));
			if (method === 'GET') {
				const page = Number(query.get('page') ?? '1');
				const perPage = Number(query.get('per_page') ?? DEFAULT_PER_PAGE);
				const slice = rules.slice((page - 1) * perPage, page * perPage);
				return [
					200,
					envelope(slice, {
						page,
						per_page: perPage,
						count: slice.length,
						total_count: rules.length,
						total_pages: Math.ceil(rules.length / perPage),
					}),
				];
			}
			if (method === 'POST' && Array.isArray(body)) {
				const created: Array<StoredRule> = body.filter(isRecord).map((rule) => {
					const filter = rule['filter'];
					return {
						id: this.newId('rule'),
						description: String(rule['description']),
						action: String(rule['action']),
						expression: isRecord(filter) ? String(filter['expression']) : '',
					};
				});
				rules.push(...created);
				return [200, envelope(created)];
			}
		}

		return [404, failure(`no route for ${method} ${path}`)];
	}

	private accountLists(accountId: string): Array<StoredList> {
		const existing = this.lists.get(accountId);
		if (existing) return existing;
		const created: Array<StoredList> = [];
		this.lists.set(accountId, created);
		return created;
	}

	private zoneRules(zoneId: string): Array<StoredRule> {
		const existing = this.rules.get(zoneId);
		if (existing) return existing;
		const created: Array<StoredRule> = [];
		this.rules.set(zoneId, created);
		return created;
	}

	private newId(prefix: string): string {
		return `${prefix}-${this.nextId++}`;
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isListItem(value: unknown): value is ListItem {
	return isRecord(value) && typeof value['ip'] === 'string' && typeof value['comment'] === 'string';
}
