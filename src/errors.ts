/**
 * Base class for every failure the sync run knows how to classify.
 * `domain` is set for remote failures so logs always name the affected domain.
 */
export class SyncError extends Error {
	readonly domain: string | undefined;

	constructor(message: string, domain?: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'SyncError';
		this.domain = domain;
	}
}

/** Empty body, unreachable host, timeout, or a body that is not JSON. */
export class TransportError extends SyncError {
	constructor(message: string, domain?: string, options?: { cause?: unknown }) {
		super(message, domain, options);
		this.name = 'TransportError';
	}
}

/** Well-formed response whose envelope did not report `success: true`. */
export class ApiError extends SyncError {
	readonly status: number;

	constructor(message: string, status: number, domain?: string) {
		super(message, domain);
		this.name = 'ApiError';
		this.status = status;
	}
}

/** Successful envelope with a result that lacks what the caller needs (e.g. the id of a created list). */
export class ValidationError extends SyncError {
	constructor(message: string, domain?: string) {
		super(message, domain);
		this.name = 'ValidationError';
	}
}

export class ConfigError extends Error {
	readonly problems: ReadonlyArray<string>;

	constructor(message: string, problems: ReadonlyArray<string> = []) {
		super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message);
		this.name = 'ConfigError';
		this.problems = problems;
	}
}

export function describeError(err: unknown): string {
	if (err instanceof Error) return err.message;
	return String(err);
}
