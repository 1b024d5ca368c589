import pino from 'pino';
import type { Logger } from 'pino';

import { loadConfig } from './config.js';

export type { Logger };

const REDACT_PATHS = ['apiKey', 'credentials.apiKey', 'headers["x-auth-key"]'];

export function createLogger(name: string): Logger {
	const config = loadConfig();
	const baseOptions = {
		name,
		level: config.LOG_LEVEL,
		redact: REDACT_PATHS,
	};
	if (config.NODE_ENV !== 'production') {
		return pino({ ...baseOptions, transport: { target: 'pino-pretty' } });
	}
	return pino(baseOptions);
}
