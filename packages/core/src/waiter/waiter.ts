/**
 * Waiter
 *
 * One-shot, timeout-bounded completion signal. Producers call `finish()` when a
 * network event has been observed; consumers block on `wait()` until then.
 */

import { WaitTimeoutError } from "../errors";

export class Waiter {
	/** Resolvers of tryWait calls still waiting */
	private readonly listeners = new Set<() => void>();
	private finished = false;

	get isFinished(): boolean {
		return this.finished;
	}

	/** Number of waits in progress */
	get pendingWaits(): number {
		return this.listeners.size;
	}

	/**
	 * Mark the event as observed. Only the first call has an effect.
	 */
	finish(): void {
		if (this.finished) {
			return;
		}
		this.finished = true;
		for (const listener of this.listeners) {
			listener();
		}
		this.listeners.clear();
	}

	/**
	 * Wait until `finish()` is called.
	 * Rejects with {@link WaitTimeoutError} carrying `failureMessage` on timeout.
	 */
	async wait(timeoutMs: number, failureMessage = "waiter was never finished"): Promise<void> {
		const finished = await this.tryWait(timeoutMs);
		if (!finished) {
			throw new WaitTimeoutError(failureMessage, timeoutMs);
		}
	}

	/**
	 * Wait until `finish()` is called.
	 * @returns false if the timeout elapsed first
	 */
	tryWait(timeoutMs: number): Promise<boolean> {
		if (this.finished) {
			return Promise.resolve(true);
		}

		return new Promise<boolean>((resolve) => {
			const listener = () => {
				clearTimeout(timer);
				resolve(true);
			};
			const timer = setTimeout(() => {
				this.listeners.delete(listener);
				resolve(false);
			}, timeoutMs);
			this.listeners.add(listener);
		});
	}
}

/**
 * Create a new unfinished waiter
 */
export function newWaiter(): Waiter {
	return new Waiter();
}
