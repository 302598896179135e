/**
 * Deployment
 *
 * Handle to a running topology. Immutable after construction: URL accessors are
 * safe to call from any test without locking. Owns the processes it was built
 * with and stops them, in reverse start order, on teardown.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
	type CallbackEvent,
	FaultlineError,
	type PushableRule,
	type ReverseProxyController,
	sniff,
	sniffEndpoint,
	toError,
} from "faultline";
import type { DeploymentInfo, ProxiedServiceEndpoint } from "./deployment.types";
import type { PacketCapture } from "./packet-capture";
import type { ManagedNetwork, ManagedProcess } from "./runtime.types";

export interface DeploymentResources {
	/** Processes in start order */
	processes: ManagedProcess[];
	network?: ManagedNetwork;
	packetCapture?: PacketCapture;
	/** Directory container logs are written to */
	logDir?: string;
}

export class Deployment {
	readonly info: Readonly<DeploymentInfo>;
	readonly controller: ReverseProxyController;
	private readonly resources: DeploymentResources;
	private tornDown = false;

	constructor(info: DeploymentInfo, controller: ReverseProxyController, resources: DeploymentResources = { processes: [] }) {
		this.info = Object.freeze(info);
		this.controller = controller;
		this.resources = resources;
	}

	get networkName(): string {
		return this.info.networkName;
	}

	get isTornDown(): boolean {
		return this.tornDown;
	}

	// =========================================================================
	// Addresses
	// =========================================================================

	private homeserver(name: string): ProxiedServiceEndpoint {
		const endpoint = this.info.homeservers[name];
		if (!endpoint) {
			throw new FaultlineError(
				`Unknown homeserver ${name}; deployment has ${Object.keys(this.info.homeservers).join(", ")}`,
			);
		}
		return endpoint;
	}

	/** Direct URL of a chat server, bypassing the fault proxy */
	homeserverUrl(name: string): string {
		return this.homeserver(name).url;
	}

	/** URL of a chat server through the fault proxy */
	proxiedHomeserverUrl(name: string): string {
		return this.homeserver(name).proxiedUrl;
	}

	syncProxyUrl(): string {
		return this.info.syncProxy.url;
	}

	proxiedSyncProxyUrl(): string {
		return this.info.syncProxy.proxiedUrl;
	}

	/**
	 * Sync proxy URL for clients of `name`. Only the first homeserver is served
	 * by the sync proxy.
	 */
	syncProxyUrlForHomeserver(name: string): string {
		this.homeserver(name);
		const [first] = Object.keys(this.info.homeservers);
		if (name !== first) {
			throw new FaultlineError(`The sync proxy only serves ${first}, not ${name}`);
		}
		return this.proxiedSyncProxyUrl();
	}

	// =========================================================================
	// Traffic control
	// =========================================================================

	/**
	 * Push `rules` for the duration of `action`
	 */
	withRules<T>(rules: PushableRule[], action: () => T | Promise<T>): Promise<T> {
		return this.controller.withRules(rules, action);
	}

	/**
	 * Observe traffic to any URL containing `path` for the duration of `action`
	 */
	withSniffedEndpoint<T>(
		path: string,
		onEvent: (event: CallbackEvent) => void | Promise<void>,
		action: () => T | Promise<T>,
	): Promise<T> {
		return sniffEndpoint(this.controller, path, onEvent, action);
	}

	/**
	 * Observe traffic matching a filter expression for the duration of `action`
	 */
	withSniffedTraffic<T>(
		filter: string,
		onEvent: (event: CallbackEvent) => void | Promise<void>,
		action: () => T | Promise<T>,
	): Promise<T> {
		return sniff(this.controller, filter, onEvent, action);
	}

	// =========================================================================
	// Lifecycle
	// =========================================================================

	/**
	 * Stop every owned process in reverse start order. Best-effort: failures are
	 * logged and the remaining processes are still stopped. Runs once.
	 */
	async teardown(writeLogs = false): Promise<void> {
		if (this.tornDown) {
			return;
		}
		this.tornDown = true;

		await releaseResources(this.resources, writeLogs);
	}
}

/**
 * Stop processes in reverse start order, then packet capture, then the network.
 * Failures are logged and skipped; with `writeLogs` each process's output is
 * written to `<logDir>/container-<name>.log` before it is stopped.
 */
export async function releaseResources(resources: DeploymentResources, writeLogs: boolean): Promise<void> {
	const { processes, network, packetCapture, logDir = "." } = resources;

	for (const managed of [...processes].reverse()) {
		if (writeLogs) {
			const file = join(logDir, `container-${managed.name}.log`);
			try {
				await mkdir(logDir, { recursive: true });
				await writeFile(file, managed.output());
			} catch (error) {
				console.error(`[Deployment] failed to write ${managed.name} logs to ${file}:`, toError(error).message);
			}
		}
		try {
			await managed.stop();
		} catch (error) {
			console.error(`[Deployment] failed to stop ${managed.name}:`, toError(error).message);
		}
	}

	if (packetCapture) {
		try {
			await packetCapture.stop();
		} catch (error) {
			console.error("[Deployment] failed to stop packet capture:", toError(error).message);
		}
	}

	if (network) {
		try {
			await network.stop();
		} catch (error) {
			console.error(`[Deployment] failed to remove network ${network.name}:`, toError(error).message);
		}
	}
}
