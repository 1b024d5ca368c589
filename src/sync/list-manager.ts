import type { Logger } from 'pino';

import type { CloudflareClient } from '../cloudflare/client.js';
import type { ListItem } from '../cloudflare/types.js';
import type { DomainConfig } from '../domains/types.js';
import type { BlockedIpSet } from '../firewall/types.js';

export type RemoteListManagerOptions = {
	client: CloudflareClient;
	listName: string;
	listDescription: string;
	itemComment: string;
	logger: Logger;
};

/**
 * Keeps one named IP list per Cloudflare account in step with the local block set.
 * Lists live at account scope, so domains sharing an account share the list.
 */
export class RemoteListManager {
	private readonly client: CloudflareClient;
	private readonly logger: Logger;

	readonly listName: string;
	private readonly listDescription: string;
	private readonly itemComment: string;

	constructor(options: RemoteListManagerOptions) {
		this.client = options.client;
		this.listName = options.listName;
		this.listDescription = options.listDescription;
		this.itemComment = options.itemComment;
		this.logger = options.logger;
	}

	/** Resolve the id of the managed list, creating the list when the account has none by that name. */
	async ensureList(domain: DomainConfig): Promise<string> {
		const lists = await this.client.listLists(domain);
		const existing = lists.find((list) => list.name === this.listName);
		if (existing) {
			this.logger.debug({ domain: domain.domain, listId: existing.id }, 'Found existing IP list');
			return existing.id;
		}

		this.logger.info({ domain: domain.domain, listName: this.listName }, 'IP list not found, creating');
		const created = await this.client.createList(domain, {
			name: this.listName,
			kind: 'ip',
			description: this.listDescription,
		});
		this.logger.info({ domain: domain.domain, listId: created.id }, 'IP list created');
		return created.id;
	}

	/**
	 * Overwrite the list with exactly `ips`. An empty set clears the list.
	 * Returns the number of entries submitted.
	 */
	async replaceListContents(domain: DomainConfig, listId: string, ips: BlockedIpSet): Promise<number> {
		const items: Array<ListItem> = [...ips].sort().map((ip) => ({ ip, comment: this.itemComment }));

		this.logger.info({ domain: domain.domain, listId, count: items.length }, 'Updating IP list');
		const result = await this.client.replaceListItems(domain, listId, items);
		this.logger.info(
			{ domain: domain.domain, listId, count: items.length, operationId: result?.operation_id },
			'IP list updated',
		);
		return items.length;
	}
}
