import type { Logger } from 'pino';

import type { CloudflareClient } from '../cloudflare/client.js';
import type { CreateFirewallRuleRequest } from '../cloudflare/types.js';
import type { DomainConfig } from '../domains/types.js';

const RULE_PRIORITY = 1;

export type RuleOutcome = 'created' | 'exists';

export type AccessRuleEnsurerOptions = {
	client: CloudflareClient;
	ruleName: string;
	filterDescription: string;
	logger: Logger;
};

export function buildBlockRule(
	ruleName: string,
	filterDescription: string,
	listName: string,
): CreateFirewallRuleRequest {
	return {
		action: 'block',
		description: ruleName,
		priority: RULE_PRIORITY,
		filter: {
			expression: `ip.src in $${listName}`,
			paused: false,
			description: filterDescription,
		},
	};
}

/**
 * Makes sure each zone has a block rule pointing at the managed list.
 *
 * The rule description is the only idempotency key. An existing rule is never
 * modified, so a changed list name or action needs the old rule removed by hand.
 */
export class AccessRuleEnsurer {
	private readonly client: CloudflareClient;
	private readonly ruleName: string;
	private readonly filterDescription: string;
	private readonly logger: Logger;

	constructor(options: AccessRuleEnsurerOptions) {
		this.client = options.client;
		this.ruleName = options.ruleName;
		this.filterDescription = options.filterDescription;
		this.logger = options.logger;
	}

	async ensureRule(domain: DomainConfig, listName: string): Promise<RuleOutcome> {
		if (await this.ruleExists(domain)) {
			this.logger.info({ domain: domain.domain, ruleName: this.ruleName }, 'WAF rule already exists');
			return 'exists';
		}

		this.logger.info({ domain: domain.domain, ruleName: this.ruleName, listName }, 'Creating WAF rule');
		const created = await this.client.createFirewallRules(domain, [
			buildBlockRule(this.ruleName, this.filterDescription, listName),
		]);
		this.logger.info({ domain: domain.domain, ruleId: created[0]?.id }, 'WAF rule created');
		return 'created';
	}

	private async ruleExists(domain: DomainConfig): Promise<boolean> {
		for (let page = 1; ; page++) {
			const result = await this.client.listFirewallRules(domain, page);
			if (result.rules.some((rule) => rule.description === this.ruleName)) return true;
			if (page >= result.totalPages) return false;
		}
	}
}
