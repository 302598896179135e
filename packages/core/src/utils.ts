/**
 * Core Utilities
 */

/**
 * Generate unique ID with optional prefix
 */
export function generateId(prefix = ""): string {
	return `${prefix}${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 9)}`;
}

/**
 * Deferred promise - a promise with externally accessible resolve/reject
 */
export interface Deferred<T> {
	promise: Promise<T>;
	resolve: (value: T) => void;
	reject: (error: Error) => void;
}

/**
 * Create a deferred promise
 */
export function createDeferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => {};
	let reject: (error: Error) => void = () => {};
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

/**
 * Sleep for specified milliseconds.
 */
export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Explicitly bounded grace period.
 *
 * For eventual-consistency windows where no event can be awaited (e.g. a client
 * cycling keys after a logout). This is not a correctness guarantee; prefer a
 * {@link Waiter} whenever an observable event exists.
 */
export function gracePeriod(ms: number, reason: string): Promise<void> {
	console.log(`[Grace] waiting ${ms}ms: ${reason}`);
	return sleep(ms);
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
