import type { Logger } from 'pino';

import { isStrictIpv4 } from './ipv4.js';
import type { BlockedIpSet, FirewallInspector, FirewallRule } from './types.js';

const BLOCKING_TARGETS = new Set(['REJECT', 'DROP']);

export type IpExtractorOptions = {
	inspector: FirewallInspector;
	chainPrefix: string;
	logger: Logger;
};

/**
 * Collects the addresses fail2ban currently blocks, read from its iptables chains.
 *
 * The result is advisory: a failed listing is logged and contributes nothing
 * instead of aborting the run. A failure to enumerate chains yields an empty set.
 */
export class IpExtractor {
	private readonly inspector: FirewallInspector;
	private readonly chainPrefix: string;
	private readonly logger: Logger;

	constructor(options: IpExtractorOptions) {
		this.inspector = options.inspector;
		this.chainPrefix = options.chainPrefix;
		this.logger = options.logger;
	}

	async extract(): Promise<BlockedIpSet> {
		const ips = new Set<string>();

		let chains: Array<string>;
		try {
			chains = (await this.inspector.listChains()).filter((chain) => chain.startsWith(this.chainPrefix));
		} catch (err) {
			this.logger.error({ err }, 'Failed to list firewall chains, continuing with no blocked IPs');
			return ips;
		}

		this.logger.debug({ chains }, 'Inspecting fail2ban chains');

		for (const chain of chains) {
			let rules: Array<FirewallRule>;
			try {
				rules = await this.inspector.listRules(chain);
			} catch (err) {
				this.logger.error({ err, chain }, 'Failed to list chain rules, skipping chain');
				continue;
			}

			let skipped = 0;
			for (const rule of rules) {
				if (!BLOCKING_TARGETS.has(rule.target)) continue;
				if (isStrictIpv4(rule.source)) {
					ips.add(rule.source);
				} else {
					skipped++;
				}
			}
			if (skipped > 0) {
				this.logger.debug({ chain, skipped }, 'Ignored non-IPv4 sources');
			}
		}

		this.logger.info({ count: ips.size, chains: chains.length }, 'Retrieved blocked IPs');
		return ips;
	}
}
