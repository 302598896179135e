/**
 * Deployment Manager
 *
 * Owns the one deployment of a test process. Lazy construction is guarded by a
 * single lock: the in-flight construction promise. Every caller that arrives
 * while a deployment is being built awaits that same promise, so concurrent
 * callers share one instance. Once built, the deployment is never replaced.
 */

import { FaultlineError, toError } from "faultline";
import type { Deployment } from "./deployment";

export type DeploymentFactory = () => Promise<Deployment>;

export class DeploymentManager {
	private deployment?: Deployment;
	/** Construction lock */
	private building?: Promise<Deployment>;
	private tearingDown?: Promise<void>;
	private exitHooksInstalled = false;

	constructor(private readonly factory: DeploymentFactory) {}

	/**
	 * Current deployment, if built
	 */
	current(): Deployment | undefined {
		return this.deployment;
	}

	/**
	 * Build the deployment, or return the existing one.
	 * A failed build leaves no deployment behind; the next call retries.
	 */
	deploy(): Promise<Deployment> {
		if (this.tearingDown) {
			return Promise.reject(new FaultlineError("Deployment has been torn down"));
		}
		if (this.deployment) {
			return Promise.resolve(this.deployment);
		}
		if (!this.building) {
			this.building = this.factory()
				.then((deployment) => {
					this.deployment = deployment;
					return deployment;
				})
				.finally(() => {
					this.building = undefined;
				});
		}
		return this.building;
	}

	/**
	 * Tear the deployment down. Only the first call has an effect; later calls
	 * await the same teardown.
	 */
	teardown(writeLogs = false): Promise<void> {
		if (!this.tearingDown) {
			this.tearingDown = this.doTeardown(writeLogs);
		}
		return this.tearingDown;
	}

	private async doTeardown(writeLogs: boolean): Promise<void> {
		if (this.building) {
			await this.building.catch(() => undefined);
		}
		await this.deployment?.teardown(writeLogs);
	}

	/**
	 * Tear down on SIGINT/SIGTERM, then exit with the conventional signal code
	 */
	installExitHooks(writeLogs = false): void {
		if (this.exitHooksInstalled) {
			return;
		}
		this.exitHooksInstalled = true;

		const onSignal = (signal: NodeJS.Signals, code: number) => {
			console.log(`[DeploymentManager] ${signal} received, tearing down`);
			this.teardown(writeLogs)
				.catch((error) => {
					console.error("[DeploymentManager] teardown failed:", toError(error).message);
				})
				.finally(() => process.exit(code));
		};
		process.once("SIGINT", () => onSignal("SIGINT", 130));
		process.once("SIGTERM", () => onSignal("SIGTERM", 143));
	}
}
