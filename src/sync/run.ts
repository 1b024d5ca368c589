import type { Logger } from 'pino';

import { CloudflareClient, type FetchFn } from '../cloudflare/client.js';
import type { Sleep } from '../cloudflare/retry.js';
import { type Config, loadConfig } from '../config.js';
import { loadDomainConfigs } from '../domains/config.js';
import type { DomainConfig } from '../domains/types.js';
import { ConfigError, describeError } from '../errors.js';
import { IpExtractor } from '../firewall/extractor.js';
import { IptablesInspector } from '../firewall/iptables.js';
import type { FirewallInspector } from '../firewall/types.js';
import { createLogger } from '../logger.js';
import { RemoteListManager } from './list-manager.js';
import { SyncOrchestrator, type SyncReport } from './orchestrator.js';
import { AccessRuleEnsurer } from './rule-ensurer.js';

export const EXIT_OK = 0;
export const EXIT_CONFIG_ERROR = 1;
export const EXIT_DOMAIN_ERRORS = 2;

export type RunSyncOptions = {
	config: Config;
	logger: Logger;
	domains?: ReadonlyArray<DomainConfig>;
	inspector?: FirewallInspector;
	fetch?: FetchFn;
	sleep?: Sleep;
};

export type RunSyncResult = {
	report: SyncReport;
	exitCode: number;
};

/**
 * One complete sync pass: read the fail2ban block set, then push it to every domain.
 * Throws only for configuration problems; per-domain failures end up in the report.
 */
export async function runSync(options: RunSyncOptions): Promise<RunSyncResult> {
	const { config, logger } = options;

	const domains = options.domains ?? loadDomainConfigs(config.SYNC_DOMAINS_FILE);
	logger.info({ domains: domains.map((d) => d.domain) }, 'Loaded domain configuration');

	const inspector =
		options.inspector ??
		new IptablesInspector({ iptablesPath: config.IPTABLES_PATH, lockWaitSeconds: config.IPTABLES_LOCK_WAIT_SECONDS });
	const extractor = new IpExtractor({
		inspector,
		chainPrefix: config.SYNC_CHAIN_PREFIX,
		logger: logger.child({ module: 'ip-extractor' }),
	});

	const client = new CloudflareClient({
		baseUrl: config.CLOUDFLARE_API_URL,
		timeoutMs: config.REQUEST_TIMEOUT_MS,
		retry: { maxAttempts: config.RETRY_MAX_ATTEMPTS, baseDelayMs: config.RETRY_BASE_DELAY_MS },
		logger: logger.child({ module: 'cloudflare-client' }),
		...(options.fetch ? { fetch: options.fetch } : {}),
		...(options.sleep ? { sleep: options.sleep } : {}),
	});

	const orchestrator = new SyncOrchestrator({
		lists: new RemoteListManager({
			client,
			listName: config.SYNC_LIST_NAME,
			listDescription: config.SYNC_LIST_DESCRIPTION,
			itemComment: config.SYNC_ITEM_COMMENT,
			logger: logger.child({ module: 'list-manager' }),
		}),
		rules: new AccessRuleEnsurer({
			client,
			ruleName: config.SYNC_RULE_NAME,
			filterDescription: config.SYNC_FILTER_DESCRIPTION,
			logger: logger.child({ module: 'rule-ensurer' }),
		}),
		logger: logger.child({ module: 'orchestrator' }),
		pacingMs: config.SYNC_PACING_MS,
		...(options.sleep ? { sleep: options.sleep } : {}),
	});

	logger.info('Retrieving blocked IPs');
	const ips = await extractor.extract();
	logger.info({ count: ips.size }, 'Number of IPs found');

	const report = await orchestrator.run(domains, ips);

	const hadErrors = report.failed + report.skipped > 0;
	const exitCode = hadErrors && config.SYNC_FAIL_ON_DOMAIN_ERROR ? EXIT_DOMAIN_ERRORS : EXIT_OK;
	return { report, exitCode };
}

export type LoggerFactory = (name: string) => Logger;

/**
 * CLI body: load the environment, run one pass, map every outcome to an exit code.
 * Before a logger exists, configuration problems go to stderr.
 */
export async function runFromEnvironment(makeLogger: LoggerFactory = createLogger): Promise<number> {
	let config: Config;
	let logger: Logger;
	try {
		config = loadConfig();
		logger = makeLogger('edge-ban-sync');
	} catch (err) {
		console.error('Invalid configuration:', describeError(err));
		return EXIT_CONFIG_ERROR;
	}

	try {
		const { exitCode } = await runSync({ config, logger });
		return exitCode;
	} catch (err) {
		if (err instanceof ConfigError) {
			logger.fatal({ problems: err.problems }, err.message);
		} else {
			logger.fatal({ err }, 'Sync run aborted');
		}
		return EXIT_CONFIG_ERROR;
	}
}
