/**
 * Topology Builder
 *
 * Provisions, in dependency order:
 *
 *   network -> chat servers -> datastore -> fault proxy -> sync proxy
 *
 * and finally routes the sync proxy through the fault proxy as well. Any
 * failure releases everything already started and raises ProvisioningError:
 * there is no partially usable topology.
 */

import { FaultProxy, ProvisioningError, type ProxyRoute, ReverseProxyController } from "faultline";
import { Deployment, type DeploymentResources, releaseResources } from "./deployment";
import type { DeploymentInfo, ProxiedServiceEndpoint } from "./deployment.types";
import type { HarnessConfig } from "./env-config";
import { type PacketCapture, startPacketCapture } from "./packet-capture";
import type {
	ContainerRuntime,
	GenericContainerSpec,
	ManagedNetwork,
	ManagedProcess,
	PostgresContainerSpec,
	RunningContainer,
} from "./runtime.types";
import { TestcontainersRuntime } from "./testcontainers.runtime";

export const HOMESERVER_PORT = 8008;
export const POSTGRES_PORT = 5432;
export const SYNC_PROXY_PORT = 6789;

export const POSTGRES_ALIAS = "postgres";
export const SYNC_PROXY_ALIAS = "ssproxy";
export const REVERSE_PROXY_NAME = "reverseproxy";

const POSTGRES_CREDENTIALS = { database: "syncv3", username: "postgres", password: "postgres" };

export interface TopologyOptions {
	/** Chat server names, also their network aliases (at least one) */
	homeservers: string[];
	homeserverImage: string;
	syncProxyImage: string;
	postgresImage: string;
	startupTimeoutMs: number;
	/** Bind address of the in-process fault proxy and relay servers */
	proxyHost: string;
	tcpdump: boolean;
	pcapFile?: string;
	logDir: string;
}

export function topologyOptionsFromConfig(config: HarnessConfig): TopologyOptions {
	return {
		homeservers: config.homeservers,
		homeserverImage: config.homeserverImage,
		syncProxyImage: config.syncProxyImage,
		postgresImage: config.postgresImage,
		startupTimeoutMs: config.startupTimeoutMs,
		proxyHost: config.proxyHost,
		tcpdump: config.tcpdump,
		logDir: config.logDir,
	};
}

// =============================================================================
// Container specs
// =============================================================================

export function homeserverSpec(name: string, image: string, startupTimeoutMs: number): GenericContainerSpec {
	return {
		kind: "generic",
		name,
		image,
		exposedPorts: [HOMESERVER_PORT],
		aliases: [name],
		env: { SERVER_NAME: name },
		readiness: { type: "http", path: "/_matrix/client/versions", port: HOMESERVER_PORT },
		startupTimeoutMs,
	};
}

export function datastoreSpec(image: string, startupTimeoutMs: number): PostgresContainerSpec {
	return {
		kind: "postgres",
		name: POSTGRES_ALIAS,
		image,
		exposedPorts: [POSTGRES_PORT],
		aliases: [POSTGRES_ALIAS],
		...POSTGRES_CREDENTIALS,
		readiness: { type: "command", command: "pg_isready" },
		startupTimeoutMs,
	};
}

export function syncProxySpec(homeserver: string, image: string, startupTimeoutMs: number): GenericContainerSpec {
	const { database, username, password } = POSTGRES_CREDENTIALS;
	return {
		kind: "generic",
		name: SYNC_PROXY_ALIAS,
		image,
		exposedPorts: [SYNC_PROXY_PORT],
		aliases: [SYNC_PROXY_ALIAS],
		env: {
			SYNCV3_SECRET: "secret",
			SYNCV3_BINDADDR: `:${SYNC_PROXY_PORT}`,
			SYNCV3_SERVER: `http://${homeserver}:${HOMESERVER_PORT}`,
			SYNCV3_DB: `user=${username} dbname=${database} sslmode=disable password=${password} host=${POSTGRES_ALIAS}`,
		},
		readiness: { type: "log", message: "listening on" },
		startupTimeoutMs,
	};
}

// =============================================================================
// Provisioning
// =============================================================================

/**
 * The in-process fault proxy as a deployment-owned process
 */
function proxyProcess(proxy: FaultProxy, controller: ReverseProxyController): ManagedProcess {
	return {
		name: REVERSE_PROXY_NAME,
		output: () => proxy.getAccessLog().map((line) => `${line}\n`).join(""),
		stop: async () => {
			await controller.terminate();
			await proxy.stop();
		},
	};
}

async function provision<T>(service: string, start: () => Promise<T>): Promise<T> {
	try {
		return await start();
	} catch (error) {
		throw new ProvisioningError(service, error);
	}
}

/**
 * Build a complete topology
 * @throws ProvisioningError
 */
export async function deployTopology(
	options: TopologyOptions,
	runtime: ContainerRuntime = new TestcontainersRuntime(),
): Promise<Deployment> {
	if (options.homeservers.length === 0) {
		throw new ProvisioningError("homeservers", new Error("at least one homeserver is required"));
	}

	const processes: ManagedProcess[] = [];
	let network: ManagedNetwork | undefined;
	let packetCapture: PacketCapture | undefined;

	try {
		const net = await provision("network", () => runtime.createNetwork());
		network = net;

		const homeserverContainers: Record<string, RunningContainer> = {};
		for (const name of options.homeservers) {
			const container = await provision(name, () =>
				runtime.startContainer(homeserverSpec(name, options.homeserverImage, options.startupTimeoutMs), net),
			);
			processes.push(container);
			homeserverContainers[name] = container;
		}

		const postgres = await provision(POSTGRES_ALIAS, () =>
			runtime.startContainer(datastoreSpec(options.postgresImage, options.startupTimeoutMs), net),
		);
		processes.push(postgres);

		const proxy = new FaultProxy({ host: options.proxyHost });
		const controller = new ReverseProxyController({
			adminUrl: await provision(REVERSE_PROXY_NAME, () => proxy.start()),
			callbackServer: { host: options.proxyHost },
		});
		processes.push(proxyProcess(proxy, controller));

		const homeservers: Record<string, ProxiedServiceEndpoint> = {};
		const routes: ProxyRoute[] = [];
		for (const [name, container] of Object.entries(homeserverContainers)) {
			const url = container.url(HOMESERVER_PORT);
			const route = await provision(REVERSE_PROXY_NAME, () => proxy.addRoute(name, url));
			routes.push(route);
			homeservers[name] = { alias: name, url, proxiedUrl: route.url };
		}

		const syncProxy = await provision(SYNC_PROXY_ALIAS, () =>
			runtime.startContainer(
				syncProxySpec(options.homeservers[0], options.syncProxyImage, options.startupTimeoutMs),
				net,
			),
		);
		processes.push(syncProxy);
		const syncProxyUrl = syncProxy.url(SYNC_PROXY_PORT);
		const syncRoute = await provision(REVERSE_PROXY_NAME, () => proxy.addRoute(SYNC_PROXY_ALIAS, syncProxyUrl));
		routes.push(syncRoute);

		if (options.tcpdump) {
			const ports = [
				...routes.map((route) => route.port),
				...options.homeservers.map((name) => homeserverContainers[name].mappedPort(HOMESERVER_PORT)),
				syncProxy.mappedPort(SYNC_PROXY_PORT),
			];
			packetCapture = await provision("tcpdump", () =>
				startPacketCapture({ ports, outputFile: options.pcapFile }),
			);
		}

		const { database, username, password } = POSTGRES_CREDENTIALS;
		const info: DeploymentInfo = {
			networkName: net.name,
			homeservers,
			datastore: {
				alias: POSTGRES_ALIAS,
				url: `postgres://${username}:${password}@${postgres.host}:${postgres.mappedPort(POSTGRES_PORT)}/${database}`,
			},
			syncProxy: { alias: SYNC_PROXY_ALIAS, url: syncProxyUrl, proxiedUrl: syncRoute.url },
			adminUrl: controller.adminUrl,
		};
		logDeployment(info);

		const resources: DeploymentResources = { processes, network, packetCapture, logDir: options.logDir };
		return new Deployment(info, controller, resources);
	} catch (error) {
		console.error("[Deployment] provisioning failed, releasing started processes:", error);
		await releaseResources({ processes, network, packetCapture }, false);
		throw error;
	}
}

function logDeployment(info: DeploymentInfo): void {
	console.log(`[Deployment] created (network=${info.networkName}):`);
	console.log("  NAME          INT          EXT");
	console.log(`  sync proxy:   ${info.syncProxy.alias.padEnd(12)} ${info.syncProxy.url} (proxied ${info.syncProxy.proxiedUrl})`);
	for (const endpoint of Object.values(info.homeservers)) {
		console.log(`  homeserver:   ${endpoint.alias.padEnd(12)} ${endpoint.url} (proxied ${endpoint.proxiedUrl})`);
	}
	console.log(`  postgres:     ${info.datastore.alias}`);
	console.log(`  reverseproxy: admin=${info.adminUrl}`);
}
