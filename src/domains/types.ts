import { z } from 'zod';

export const DOMAIN_FIELDS = ['email', 'api_key', 'account_id', 'zone_id'] as const;
export const DomainField = z.enum(DOMAIN_FIELDS);
export type DomainField = z.infer<typeof DomainField>;

// On-disk shape: { "example.com;email": "ops@example.com", ... }
export const RawDomainConfigSchema = z.record(z.string(), z.string());
export type RawDomainConfig = z.infer<typeof RawDomainConfigSchema>;

export type DomainCredentials = {
	readonly email: string;
	readonly apiKey: string;
};

export type DomainConfig = {
	readonly domain: string;
	readonly credentials: DomainCredentials;
	readonly accountId: string;
	readonly zoneId: string;
};
