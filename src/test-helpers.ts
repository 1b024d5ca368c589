import type { Logger } from 'pino';
import { vi } from 'vitest';

import type { DomainConfig } from './domains/types.js';

// Minimal pino logger mock
export function makeLogger(): Logger {
	const logger = {
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
		trace: vi.fn(),
		fatal: vi.fn(),
		child: vi.fn(),
		level: 'info',
		silent: vi.fn(),
		isLevelEnabled: vi.fn(),
	};
	logger.child.mockReturnValue(logger);
	return logger as unknown as Logger;
}

/** Messages passed to one level of a mocked logger, in call order. */
export function loggedMessages(logger: Logger, level: 'info' | 'warn' | 'error' | 'debug' | 'fatal'): Array<string> {
	const fn = vi.mocked(logger[level]);
	return fn.mock.calls.map((args: Array<unknown>) => {
		const last = args[args.length - 1];
		return typeof last === 'string' ? last : '';
	});
}

export function makeDomain(domain: string, accountId = `acct-${domain}`): DomainConfig {
	return {
		domain,
		credentials: { email: `ops@${domain}`, apiKey: 'test-key' },
		accountId,
		zoneId: `zone-${domain}`,
	};
}
