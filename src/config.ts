import { z } from 'zod';

const booleanFlag = z
	.enum(['true', 'false'])
	.default('false')
	.transform((value) => value === 'true');

const envSchema = z.object({
	NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
	LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
	// JSON map of "domain;field" -> value, read once at startup
	SYNC_DOMAINS_FILE: z.string().min(1).default('/etc/edge-ban-sync/domains.json'),
	CLOUDFLARE_API_URL: z.string().url().default('https://api.cloudflare.com/client/v4'),
	// Cloudflare list names are restricted to lowercase letters, digits and underscores
	SYNC_LIST_NAME: z
		.string()
		.regex(/^[a-z0-9_]{1,50}$/, 'must contain only lowercase letters, digits and underscores')
		.default('fail2ban'),
	SYNC_LIST_DESCRIPTION: z.string().min(1).max(500).default('Blocked IPs from Fail2Ban'),
	SYNC_ITEM_COMMENT: z.string().max(500).default('Blocked by Fail2Ban'),
	SYNC_RULE_NAME: z.string().min(1).max(500).default('Blocked IPs from Fail2Ban'),
	SYNC_FILTER_DESCRIPTION: z.string().min(1).max(500).default('Filter Fail2Ban IPs'),
	SYNC_CHAIN_PREFIX: z.string().min(1).default('f2b-'),
	IPTABLES_PATH: z.string().min(1).default('/usr/sbin/iptables'),
	IPTABLES_LOCK_WAIT_SECONDS: z.coerce.number().int().min(1).max(60).default(5),
	SYNC_PACING_MS: z.coerce.number().int().min(0).max(600_000).default(10_000),
	REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1000).max(300_000).default(30_000),
	RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(1),
	RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).max(60_000).default(500),
	SYNC_FAIL_ON_DOMAIN_ERROR: booleanFlag,
});

export type Config = z.infer<typeof envSchema>;

export function loadConfig(): Config {
	const result = envSchema.safeParse(process.env);
	if (!result.success) {
		const formatted = result.error.flatten().fieldErrors;
		throw new Error(`Invalid environment configuration: ${JSON.stringify(formatted)}`);
	}
	return result.data;
}
