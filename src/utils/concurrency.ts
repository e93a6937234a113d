/**
 * Runs `worker` over `items` with at most `limit` calls in flight.
 * Results keep the order of `items`. The first rejection stops new work from
 * being picked up; calls already running are awaited before it is rethrown.
 */
export const mapWithConcurrency = async <T, R>(items: readonly T[], limit: number, worker: (item: T, index: number) => Promise<R>): Promise<R[]> => {
	const results: R[] = new Array<R>(items.length);
	let cursor = 0;
	const failures: unknown[] = [];

	const run = async (): Promise<void> => {
		while (failures.length === 0 && cursor < items.length) {
			const index = cursor++;
			try {
				results[index] = await worker(items[index], index);
			} catch (error) {
				failures.push(error);
			}
		}
	};

	const runners = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => run());
	await Promise.all(runners);

	if (failures.length > 0) {
		throw failures[0];
	}
	return results;
};

/**
 * Serialises async sections. Each caller waits for the previous section to
 * settle, whatever its outcome.
 */
export class WriteLock {
	private tail: Promise<void> = Promise.resolve();

	public run = <T>(section: () => Promise<T>): Promise<T> => {
		const result = this.tail.then(section);
		this.tail = result.then(
			() => undefined,
			() => undefined
		);
		return result;
	};
}

export const sleep = (delayMs: number, signal?: AbortSignal): Promise<void> => {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(signal.reason);
			return;
		}
		const onAbort = (): void => {
			clearTimeout(timer);
			reject(signal?.reason);
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve();
		}, delayMs);
		signal?.addEventListener('abort', onAbort, { once: true });
	});
};
