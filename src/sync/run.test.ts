import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { FAKE_API_URL, FakeCloudflare } from '../cloudflare/fake-cloudflare.js';
import { type Config, loadConfig } from '../config.js';
import { IptablesInspector } from '../firewall/iptables.js';
import { loggedMessages, makeDomain, makeLogger } from '../test-helpers.js';
import { EXIT_CONFIG_ERROR, EXIT_DOMAIN_ERRORS, EXIT_OK, runFromEnvironment, runSync } from './run.js';

const LISTINGS: Record<string, string> = {
	'': `Chain INPUT (policy ACCEPT)
target     prot opt source               destination
f2b-sshd   tcp  --  0.0.0.0/0            0.0.0.0/0            multiport dports 22
f2b-apache tcp  --  0.0.0.0/0            0.0.0.0/0            multiport dports 80,443

Chain f2b-apache (1 references)
target     prot opt source               destination
REJECT     all  --  1.2.3.4              0.0.0.0/0            reject-with icmp-port-unreachable
REJECT     all  --  5.6.7.8              0.0.0.0/0            reject-with icmp-port-unreachable
RETURN     all  --  0.0.0.0/0            0.0.0.0/0

Chain f2b-sshd (1 references)
target     prot opt source               destination
REJECT     all  --  1.2.3.4              0.0.0.0/0            reject-with icmp-port-unreachable
RETURN     all  --  0.0.0.0/0            0.0.0.0/0
`,
	'f2b-apache': `Chain f2b-apache (1 references)
target     prot opt source               destination
REJECT     all  --  1.2.3.4              0.0.0.0/0            reject-with icmp-port-unreachable
REJECT     all  --  5.6.7.8              0.0.0.0/0            reject-with icmp-port-unreachable
RETURN     all  --  0.0.0.0/0            0.0.0.0/0
`,
	'f2b-sshd': `Chain f2b-sshd (1 references)
target     prot opt source               destination
REJECT     all  --  1.2.3.4              0.0.0.0/0            reject-with icmp-port-unreachable
RETURN     all  --  0.0.0.0/0            0.0.0.0/0
`,
};

function fakeIptables(): IptablesInspector {
	// ['-w', '5', '-L', '-n'] lists everything, ['-w', '5', '-L', chain, '-n'] one chain
	const run = vi.fn(async (_file: string, args: ReadonlyArray<string>) => LISTINGS[args.length === 4 ? '' : (args[3] ?? '')] ?? '');
	return new IptablesInspector({ iptablesPath: '/usr/sbin/iptables', run });
}

function testConfig(overrides: Partial<Config> = {}): Config {
	return { ...loadConfig(), CLOUDFLARE_API_URL: FAKE_API_URL, ...overrides };
}

describe('runSync', () => {
	it('syncs the deduplicated block set to every domain', async () => {
		const cloudflare = new FakeCloudflare();
		const sleep = vi.fn().mockResolvedValue(undefined);

		const { report, exitCode } = await runSync({
			config: testConfig(),
			logger: makeLogger(),
			domains: [makeDomain('b.com'), makeDomain('a.com')],
			inspector: fakeIptables(),
			fetch: cloudflare.fetch,
			sleep,
		});

		expect(exitCode).toBe(EXIT_OK);
		expect(report.ipCount).toBe(2);
		expect(report.domains.map((d) => [d.domain, d.status, d.rule])).toEqual([
			['a.com', 'ok', 'created'],
			['b.com', 'ok', 'created'],
		]);
		for (const account of ['acct-a.com', 'acct-b.com']) {
			expect(cloudflare.listItems(account, 'fail2ban')).toEqual([
				{ ip: '1.2.3.4', comment: 'Blocked by Fail2Ban' },
				{ ip: '5.6.7.8', comment: 'Blocked by Fail2Ban' },
			]);
		}
		expect(cloudflare.callsTo('POST', /\/rules\/lists$/)).toHaveLength(2);
		expect(cloudflare.callsTo('POST', /\/firewall\/rules$/)).toHaveLength(2);
		expect(sleep).toHaveBeenCalledTimes(1);
		expect(sleep).toHaveBeenCalledWith(10_000);
	});

	it('keeps exit code 0 when a domain fails by default', async () => {
		const cloudflare = new FakeCloudflare();
		cloudflare.respondWith('GET', /^\/accounts\/acct-a\.com\//, 200, JSON.stringify({ success: false }));

		const { report, exitCode } = await runSync({
			config: testConfig({ SYNC_PACING_MS: 0 }),
			logger: makeLogger(),
			domains: [makeDomain('a.com'), makeDomain('b.com')],
			inspector: fakeIptables(),
			fetch: cloudflare.fetch,
		});

		expect(report.skipped).toBe(1);
		expect(exitCode).toBe(EXIT_OK);
	});

	it('returns a distinct exit code for domain failures when asked to', async () => {
		const cloudflare = new FakeCloudflare();
		cloudflare.respondWith('GET', /^\/accounts\/acct-a\.com\//, 200, JSON.stringify({ success: false }));

		const { exitCode } = await runSync({
			config: testConfig({ SYNC_PACING_MS: 0, SYNC_FAIL_ON_DOMAIN_ERROR: true }),
			logger: makeLogger(),
			domains: [makeDomain('a.com')],
			inspector: fakeIptables(),
			fetch: cloudflare.fetch,
		});

		expect(exitCode).toBe(EXIT_DOMAIN_ERRORS);
	});

	it('uses configured list and rule names', async () => {
		const cloudflare = new FakeCloudflare();

		await runSync({
			config: testConfig({ SYNC_LIST_NAME: 'edge_bans', SYNC_RULE_NAME: 'Edge bans' }),
			logger: makeLogger(),
			domains: [makeDomain('a.com')],
			inspector: fakeIptables(),
			fetch: cloudflare.fetch,
		});

		expect(cloudflare.listItems('acct-a.com', 'edge_bans')).toHaveLength(2);
		expect(cloudflare.callsTo('POST', /\/firewall\/rules$/)[0]?.body).toMatchObject([
			{ description: 'Edge bans', filter: { expression: 'ip.src in $edge_bans' } },
		]);
	});

	it('fails fast when the domain file is missing', async () => {
		await expect(
			runSync({
				config: testConfig({ SYNC_DOMAINS_FILE: '/nonexistent/edge-ban-sync/domains.json' }),
				logger: makeLogger(),
				inspector: fakeIptables(),
			}),
		).rejects.toThrow('Cannot read domain configuration');
	});
});

describe('runFromEnvironment', () => {
	const originalEnv = process.env;

	beforeEach(() => {
		process.env = { ...originalEnv };
	});

	afterEach(() => {
		process.env = originalEnv;
		vi.restoreAllMocks();
	});

	it('reports an invalid environment on stderr and exits 1', async () => {
		process.env.SYNC_LIST_NAME = 'bad name"';
		const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
		const makeLoggerFn = vi.fn(makeLogger);

		await expect(runFromEnvironment(makeLoggerFn)).resolves.toBe(EXIT_CONFIG_ERROR);

		expect(stderr).toHaveBeenCalledWith('Invalid configuration:', expect.stringContaining('SYNC_LIST_NAME'));
		expect(makeLoggerFn).not.toHaveBeenCalled();
	});

	it('logs a fatal line and exits 1 when the domain file is missing', async () => {
		process.env.SYNC_DOMAINS_FILE = '/nonexistent/edge-ban-sync/domains.json';
		const logger = makeLogger();

		await expect(runFromEnvironment(() => logger)).resolves.toBe(EXIT_CONFIG_ERROR);

		expect(loggedMessages(logger, 'fatal')).toEqual([
			'Cannot read domain configuration /nonexistent/edge-ban-sync/domains.json',
		]);
	});
});
