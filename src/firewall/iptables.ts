import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import type { FirewallInspector, FirewallRule } from './types.js';

const execFileAsync = promisify(execFile);

const DEFAULT_TIMEOUT_MS = 15_000;
// fail2ban holds the xtables lock while banning; without -w a concurrent listing fails at once
const DEFAULT_LOCK_WAIT_SECONDS = 5;
// Large jails list thousands of rules; the default 1 MiB buffer is not enough
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export type CommandRunner = (file: string, args: ReadonlyArray<string>, timeoutMs: number) => Promise<string>;

export type IptablesInspectorOptions = {
	iptablesPath: string;
	timeoutMs?: number;
	lockWaitSeconds?: number;
	run?: CommandRunner;
};

const runCommand: CommandRunner = async (file, args, timeoutMs) => {
	const { stdout } = await execFileAsync(file, [...args], {
		timeout: timeoutMs,
		maxBuffer: MAX_OUTPUT_BYTES,
		encoding: 'utf-8',
	});
	return stdout;
};

// ─── Listing Parsers ─────────────────────────────────────────────────────────
// Both parse `iptables -L -n` output:
//
//   Chain f2b-sshd (1 references)
//   target     prot opt source               destination
//   REJECT     all  --  1.2.3.4              0.0.0.0/0            reject-with icmp-port-unreachable
//   RETURN     all  --  0.0.0.0/0            0.0.0.0/0

export function parseChainNames(listing: string): Array<string> {
	const chains: Array<string> = [];
	for (const line of listing.split('\n')) {
		if (!line.startsWith('Chain ')) continue;
		const name = line.split(/\s+/)[1];
		if (name) chains.push(name);
	}
	return chains;
}

export function parseRuleListing(listing: string): Array<FirewallRule> {
	const rules: Array<FirewallRule> = [];
	for (const line of listing.split('\n')) {
		// Rules without a jump target start with whitespace and can never be a reject
		if (line.trim() === '' || /^\s/.test(line)) continue;
		if (line.startsWith('Chain ') || line.startsWith('target ')) continue;

		const [target, , , source] = line.split(/\s+/);
		if (!(target && source)) continue;
		rules.push({ target, source });
	}
	return rules;
}

export class IptablesInspector implements FirewallInspector {
	private readonly iptablesPath: string;
	private readonly timeoutMs: number;
	private readonly lockWait: Array<string>;
	private readonly run: CommandRunner;

	constructor(options: IptablesInspectorOptions) {
		this.iptablesPath = options.iptablesPath;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.lockWait = ['-w', String(options.lockWaitSeconds ?? DEFAULT_LOCK_WAIT_SECONDS)];
		this.run = options.run ?? runCommand;
	}

	async listChains(): Promise<Array<string>> {
		const listing = await this.run(this.iptablesPath, [...this.lockWait, '-L', '-n'], this.timeoutMs);
		return parseChainNames(listing);
	}

	async listRules(chain: string): Promise<Array<FirewallRule>> {
		const listing = await this.run(this.iptablesPath, [...this.lockWait, '-L', chain, '-n'], this.timeoutMs);
		return parseRuleListing(listing);
	}
}
