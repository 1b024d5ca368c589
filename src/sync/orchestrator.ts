import type { Logger } from 'pino';

import { type Sleep, sleep } from '../cloudflare/retry.js';
import type { DomainConfig } from '../domains/types.js';
import { describeError } from '../errors.js';
import type { BlockedIpSet } from '../firewall/types.js';
import type { RemoteListManager } from './list-manager.js';
import type { AccessRuleEnsurer, RuleOutcome } from './rule-ensurer.js';

export const DEFAULT_PACING_MS = 10_000;

export type DomainStatus = 'ok' | 'failed' | 'skipped';

export type DomainSyncResult = {
	domain: string;
	status: DomainStatus;
	listId?: string;
	itemCount?: number;
	rule?: RuleOutcome;
	errors: Array<string>;
};

export type SyncReport = {
	ipCount: number;
	domains: Array<DomainSyncResult>;
	ok: number;
	failed: number;
	skipped: number;
};

export type SyncOrchestratorOptions = {
	lists: RemoteListManager;
	rules: AccessRuleEnsurer;
	logger: Logger;
	pacingMs?: number;
	sleep?: Sleep;
};

// ─── Sync Orchestrator ───────────────────────────────────────────────────────
// Domains run strictly one after another with a pause in between; the remote
// API is never hit concurrently. A failing domain never stops the batch.

export class SyncOrchestrator {
	private readonly lists: RemoteListManager;
	private readonly rules: AccessRuleEnsurer;
	private readonly logger: Logger;
	private readonly pacingMs: number;
	private readonly sleep: Sleep;

	constructor(options: SyncOrchestratorOptions) {
		this.lists = options.lists;
		this.rules = options.rules;
		this.logger = options.logger;
		this.pacingMs = options.pacingMs ?? DEFAULT_PACING_MS;
		this.sleep = options.sleep ?? sleep;
	}

	async run(configs: ReadonlyArray<DomainConfig>, ips: BlockedIpSet): Promise<SyncReport> {
		const ordered = dedupeByDomain(configs);
		const results: Array<DomainSyncResult> = [];

		for (const [index, config] of ordered.entries()) {
			if (index > 0 && this.pacingMs > 0) {
				this.logger.debug({ delayMs: this.pacingMs }, 'Pacing before next domain');
				await this.sleep(this.pacingMs);
			}
			results.push(await this.syncDomain(config, ips));
		}

		const report: SyncReport = {
			ipCount: ips.size,
			domains: results,
			ok: results.filter((r) => r.status === 'ok').length,
			failed: results.filter((r) => r.status === 'failed').length,
			skipped: results.filter((r) => r.status === 'skipped').length,
		};
		this.logger.info(
			{ domains: results.length, ok: report.ok, failed: report.failed, skipped: report.skipped, ips: ips.size },
			'Sync run complete',
		);
		return report;
	}

	private async syncDomain(config: DomainConfig, ips: BlockedIpSet): Promise<DomainSyncResult> {
		const domain = config.domain;
		const log = this.logger.child({ domain });
		log.info('Processing domain');

		let listId: string;
		try {
			listId = await this.lists.ensureList(config);
		} catch (err) {
			log.error({ err }, 'Could not resolve IP list, skipping domain');
			return { domain, status: 'skipped', errors: [describeError(err)] };
		}

		const result: DomainSyncResult = { domain, status: 'ok', listId, errors: [] };

		// Partial application is accepted: a replaced list stays replaced even if the rule step fails
		try {
			result.itemCount = await this.lists.replaceListContents(config, listId, ips);
		} catch (err) {
			log.error({ err, listId }, 'Failed to update IP list');
			result.errors.push(describeError(err));
		}

		try {
			result.rule = await this.rules.ensureRule(config, this.lists.listName);
		} catch (err) {
			log.error({ err }, 'Failed to ensure WAF rule');
			result.errors.push(describeError(err));
		}

		if (result.errors.length > 0) {
			result.status = 'failed';
		}
		log.info({ status: result.status }, 'Processing complete');
		return result;
	}
}

function dedupeByDomain(configs: ReadonlyArray<DomainConfig>): Array<DomainConfig> {
	const byDomain = new Map<string, DomainConfig>();
	for (const config of configs) {
		if (!byDomain.has(config.domain)) byDomain.set(config.domain, config);
	}
	return [...byDomain.values()].sort((a, b) => (a.domain < b.domain ? -1 : a.domain > b.domain ? 1 : 0));
}
