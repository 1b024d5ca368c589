import { TransportError } from '../errors.js';

const MAX_DELAY_MS = 30_000;

export type RetryPolicy = {
	maxAttempts: number;
	baseDelayMs: number;
};

export const NO_RETRY: RetryPolicy = { maxAttempts: 1, baseDelayMs: 0 };

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
	new Promise((resolve) => {
		setTimeout(resolve, ms);
	});

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
	return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), MAX_DELAY_MS);
}

/**
 * Run `fn` up to `policy.maxAttempts` times, retrying only on {@link TransportError}.
 * API and validation errors are definitive answers and surface immediately.
 */
export async function withRetry<T>(
	fn: () => Promise<T>,
	policy: RetryPolicy,
	onRetry?: (err: TransportError, attempt: number, delayMs: number) => void,
	wait: Sleep = sleep,
): Promise<T> {
	let attempt = 1;
	for (;;) {
		try {
			return await fn();
		} catch (err) {
			if (!(err instanceof TransportError) || attempt >= policy.maxAttempts) throw err;

			const delayMs = backoffDelay(policy, attempt);
			onRetry?.(err, attempt, delayMs);
			await wait(delayMs);
			attempt++;
		}
	}
}
