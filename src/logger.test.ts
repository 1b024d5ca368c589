import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createLogger } from './logger.js';

describe('createLogger', () => {
	const originalEnv = process.env;

	beforeEach(() => {
		process.env = { ...originalEnv };
	});

	afterEach(() => {
		process.env = originalEnv;
		vi.restoreAllMocks();
	});

	it('returns a logger with the given name', () => {
		process.env.NODE_ENV = 'production';
		const logger = createLogger('test-logger');
		// pino loggers expose the bindings
		expect(logger.bindings().name).toBe('test-logger');
	});

	it('respects LOG_LEVEL environment variable', () => {
		process.env.NODE_ENV = 'production';
		process.env.LOG_LEVEL = 'debug';
		const logger = createLogger('debug-logger');
		expect(logger.level).toBe('debug');
	});

	it('defaults to info log level', () => {
		process.env.NODE_ENV = 'production';
		// biome-ignore lint/performance/noDelete: assigning undefined would store the string "undefined"
		delete process.env.LOG_LEVEL;
		const logger = createLogger('default-logger');
		expect(logger.level).toBe('info');
	});

	it('throws on an invalid log level', () => {
		process.env.LOG_LEVEL = 'verbose';
		expect(() => createLogger('bad-logger')).toThrow('Invalid environment configuration');
	});
});
