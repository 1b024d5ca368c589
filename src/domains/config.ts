import { readFileSync } from 'node:fs';

import { ConfigError, describeError } from '../errors.js';
import { DOMAIN_FIELDS, DomainField, RawDomainConfigSchema } from './types.js';
import type { DomainConfig } from './types.js';

const KEY_SEPARATOR = ';';

type PartialDomain = Partial<Record<DomainField, string>>;

/**
 * Turn the flat `"domain;field" -> value` map into one record per domain.
 *
 * Keys are split once here; nothing downstream looks at the composite form.
 * Every problem is collected before throwing so an operator can fix the file in one pass.
 */
export function parseDomainConfigs(raw: unknown): ReadonlyArray<DomainConfig> {
	const parsed = RawDomainConfigSchema.safeParse(raw);
	if (!parsed.success) {
		throw new ConfigError(
			'Domain configuration must be an object of string values',
			parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
		);
	}

	const grouped = new Map<string, PartialDomain>();
	const problems: Array<string> = [];

	for (const [key, value] of Object.entries(parsed.data)) {
		const parts = key.split(KEY_SEPARATOR);
		const domain = parts[0]?.trim() ?? '';
		const field = DomainField.safeParse(parts[1]?.trim());
		if (parts.length !== 2 || domain === '' || !field.success) {
			problems.push(`invalid key "${key}" (expected "<domain>;<${DOMAIN_FIELDS.join('|')}>")`);
			continue;
		}

		const entry = grouped.get(domain) ?? {};
		entry[field.data] = value.trim();
		grouped.set(domain, entry);
	}

	const configs: Array<DomainConfig> = [];
	for (const [domain, entry] of grouped) {
		const missing = DOMAIN_FIELDS.filter((field) => !entry[field]);
		if (missing.length > 0) {
			problems.push(`${domain}: missing ${missing.join(', ')}`);
			continue;
		}
		configs.push({
			domain,
			credentials: { email: entry.email ?? '', apiKey: entry.api_key ?? '' },
			accountId: entry.account_id ?? '',
			zoneId: entry.zone_id ?? '',
		});
	}

	if (problems.length > 0) {
		throw new ConfigError('Invalid domain configuration', problems);
	}
	if (configs.length === 0) {
		throw new ConfigError('No domains configured');
	}

	configs.sort((a, b) => (a.domain < b.domain ? -1 : a.domain > b.domain ? 1 : 0));
	return Object.freeze(configs);
}

export function loadDomainConfigs(path: string): ReadonlyArray<DomainConfig> {
	let text: string;
	try {
		text = readFileSync(path, 'utf-8');
	} catch (err) {
		throw new ConfigError(`Cannot read domain configuration ${path}`, [describeError(err)]);
	}

	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (err) {
		throw new ConfigError(`Domain configuration ${path} is not valid JSON`, [describeError(err)]);
	}

	return parseDomainConfigs(raw);
}
