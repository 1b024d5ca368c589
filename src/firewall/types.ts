export type FirewallRule = {
	target: string;
	source: string;
};

export interface FirewallInspector {
	listChains(): Promise<Array<string>>;
	listRules(chain: string): Promise<Array<FirewallRule>>;
}

/** Deduplicated, strictly validated IPv4 addresses. Order carries no meaning. */
export type BlockedIpSet = ReadonlySet<string>;
