/**
 * Testcontainers Runtime
 *
 * Runs topology containers with testcontainers. Container output is consumed
 * from start so it can be written to a file at teardown without following a
 * live log stream.
 */

import { PostgreSqlContainer } from "@testcontainers/postgresql";
import { GenericContainer, Network, type StartedNetwork, type StartedTestContainer, Wait } from "testcontainers";
import type { ContainerRuntime, ContainerSpec, ManagedNetwork, Readiness, RunningContainer } from "./runtime.types";

class TestcontainersNetwork implements ManagedNetwork {
	constructor(readonly started: StartedNetwork) {}

	get name(): string {
		return this.started.getName();
	}

	async stop(): Promise<void> {
		await this.started.stop();
	}
}

class TestcontainersContainer implements RunningContainer {
	constructor(
		readonly name: string,
		private readonly started: StartedTestContainer,
		private readonly chunks: string[],
	) {}

	get host(): string {
		return this.started.getHost();
	}

	mappedPort(port: number): number {
		return this.started.getMappedPort(port);
	}

	url(port: number): string {
		return `http://${this.host}:${this.mappedPort(port)}`;
	}

	output(): string {
		return this.chunks.join("");
	}

	async stop(): Promise<void> {
		await this.started.stop();
	}
}

function toWaitStrategy(readiness: Readiness) {
	switch (readiness.type) {
		case "log":
			return Wait.forLogMessage(readiness.message);
		case "command":
			return Wait.forSuccessfulCommand(readiness.command);
		case "http":
			return Wait.forHttp(readiness.path, readiness.port).forStatusCode(200);
	}
}

export class TestcontainersRuntime implements ContainerRuntime {
	async createNetwork(): Promise<ManagedNetwork> {
		return new TestcontainersNetwork(await new Network().start());
	}

	async startContainer(spec: ContainerSpec, network: ManagedNetwork): Promise<RunningContainer> {
		if (!(network instanceof TestcontainersNetwork)) {
			throw new Error(`Network ${network.name} was not created by TestcontainersRuntime`);
		}

		const container: GenericContainer =
			spec.kind === "postgres"
				? new PostgreSqlContainer(spec.image)
						.withDatabase(spec.database)
						.withUsername(spec.username)
						.withPassword(spec.password)
				: new GenericContainer(spec.image);

		const chunks: string[] = [];
		const started = await container
			.withExposedPorts(...spec.exposedPorts)
			.withEnvironment(spec.env ?? {})
			.withNetwork(network.started)
			.withNetworkAliases(...spec.aliases)
			.withWaitStrategy(toWaitStrategy(spec.readiness))
			.withStartupTimeout(spec.startupTimeoutMs)
			.withLogConsumer((stream) => {
				stream.on("data", (chunk: Buffer | string) => {
					chunks.push(chunk.toString());
				});
			})
			.start();

		return new TestcontainersContainer(spec.name, started, chunks);
	}
}
