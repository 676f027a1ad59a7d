/**
 * Exponential backoff shared by reconnects and delivery retries.
 */

/**
 * Delay before the next attempt after `failures` consecutive failures:
 * min(base * 2^failures, cap).
 */
export function computeBackoff(failures: number, base: number, cap: number): number {
	if (failures < 0) return Math.min(base, cap);
	return Math.min(base * 2 ** failures, cap);
}

/**
 * Resolve after `ms`, or early (without rejecting) when `signal` aborts.
 * Returns true if the full delay elapsed.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<boolean> {
	if (signal?.aborted) return Promise.resolve(false);
	return new Promise<boolean>((resolve) => {
		const onAbort = () => {
			clearTimeout(timer);
			resolve(false);
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve(true);
		}, ms);
		signal?.addEventListener('abort', onAbort, { once: true });
	});
}
