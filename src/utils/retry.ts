import { logger } from "./logger";

export interface RetryOptions {
	maxRetries?: number;
	/** Delay before each retry in ms; the last entry repeats. */
	backoffs?: number[];
	operationName?: string;
	shouldRetry?: (error: unknown, attempt: number) => boolean;
}

/**
 * Runs `operation` until it resolves, retrying rejected attempts with the
 * configured backoff. The last error is rethrown once retries run out.
 */
export async function withRetry<T>(
	operation: (attempt: number) => Promise<T>,
	options: RetryOptions = {},
): Promise<T> {
	const maxRetries = options.maxRetries ?? 2;
	const backoffs = options.backoffs ?? [100, 200];
	const opName = options.operationName ?? "Operation";
	const shouldRetry = options.shouldRetry ?? (() => true);

	for (let attempt = 1; ; attempt++) {
		try {
			return await operation(attempt);
		} catch (error) {
			if (attempt > maxRetries || !shouldRetry(error, attempt)) {
				throw error;
			}

			const delay =
				backoffs[attempt - 1] ?? backoffs[backoffs.length - 1] ?? 200;
			logger.debug(
				{ err: error, attempt, totalAttempts: maxRetries + 1, delay },
				`${opName} failed, retrying`,
			);
			await new Promise((resolve) => setTimeout(resolve, delay));
		}
	}
}
