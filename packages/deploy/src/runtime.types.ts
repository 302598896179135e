/**
 * Container Runtime Types
 *
 * The topology builder talks to containers only through these interfaces; the
 * default implementation is backed by testcontainers.
 */

/**
 * How a process signals it is ready
 */
export type Readiness =
	| { type: "log"; message: string | RegExp }
	| { type: "command"; command: string }
	| { type: "http"; path: string; port: number };

interface BaseContainerSpec {
	/** Logical name, used in logs and log file names */
	name: string;
	image: string;
	exposedPorts: number[];
	/** DNS names inside the shared network */
	aliases: string[];
	env?: Record<string, string>;
	readiness: Readiness;
	startupTimeoutMs: number;
}

export interface GenericContainerSpec extends BaseContainerSpec {
	kind: "generic";
}

export interface PostgresContainerSpec extends BaseContainerSpec {
	kind: "postgres";
	database: string;
	username: string;
	password: string;
}

export type ContainerSpec = GenericContainerSpec | PostgresContainerSpec;

/**
 * A long-lived process owned by a deployment
 */
export interface ManagedProcess {
	readonly name: string;
	/** Output captured since start */
	output(): string;
	stop(): Promise<void>;
}

export interface RunningContainer extends ManagedProcess {
	readonly host: string;
	mappedPort(port: number): number;
	/** http://host:mappedPort */
	url(port: number): string;
}

export interface ManagedNetwork {
	readonly name: string;
	stop(): Promise<void>;
}

export interface ContainerRuntime {
	createNetwork(): Promise<ManagedNetwork>;
	startContainer(spec: ContainerSpec, network: ManagedNetwork): Promise<RunningContainer>;
}
