/**
 * Harness Environment Configuration
 *
 * Reads FAULTLINE_* environment variables. Also carries the deployment
 * published by the global setup to test workers.
 */

import { z } from "zod";
import { FaultlineError, formatIssues } from "faultline";
import type { DeploymentInfo } from "./deployment.types";

const flag = (fallback: boolean) =>
	z
		.enum(["true", "false", "1", "0"])
		.optional()
		.transform((value) => (value === undefined ? fallback : value === "true" || value === "1"));

const HarnessEnvSchema = z.object({
	FAULTLINE_E2E: flag(false),
	FAULTLINE_TCPDUMP: flag(false),
	FAULTLINE_WRITE_CONTAINER_LOGS: flag(false),
	FAULTLINE_LOG_DIR: z.string().min(1).default("./logs"),
	FAULTLINE_HOMESERVERS: z.string().min(1).default("hs1,hs2"),
	FAULTLINE_HOMESERVER_IMAGE: z.string().min(1).default("complement-synapse:latest"),
	FAULTLINE_SYNC_PROXY_IMAGE: z.string().min(1).default("ghcr.io/matrix-org/sliding-sync:v0.99.12"),
	FAULTLINE_POSTGRES_IMAGE: z.string().min(1).default("postgres:13-alpine"),
	FAULTLINE_STARTUP_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
	FAULTLINE_PROXY_HOST: z.string().min(1).default("127.0.0.1"),
});

export interface HarnessConfig {
	/** Run Docker-backed end-to-end tests */
	e2e: boolean;
	/** Attach tcpdump to the deployment */
	tcpdump: boolean;
	/** Write container output to files at teardown */
	writeContainerLogs: boolean;
	logDir: string;
	homeservers: string[];
	homeserverImage: string;
	syncProxyImage: string;
	postgresImage: string;
	startupTimeoutMs: number;
	/** Address the in-process proxy and relay servers bind to */
	proxyHost: string;
}

/**
 * @throws FaultlineError on invalid values
 */
export function loadHarnessConfig(env: NodeJS.ProcessEnv = process.env): HarnessConfig {
	const parsed = HarnessEnvSchema.safeParse(env);
	if (!parsed.success) {
		throw new FaultlineError(`Invalid harness configuration: ${formatIssues(parsed.error).join("; ")}`);
	}
	const e = parsed.data;
	return {
		e2e: e.FAULTLINE_E2E,
		tcpdump: e.FAULTLINE_TCPDUMP,
		writeContainerLogs: e.FAULTLINE_WRITE_CONTAINER_LOGS,
		logDir: e.FAULTLINE_LOG_DIR,
		homeservers: e.FAULTLINE_HOMESERVERS.split(",")
			.map((name) => name.trim())
			.filter(Boolean),
		homeserverImage: e.FAULTLINE_HOMESERVER_IMAGE,
		syncProxyImage: e.FAULTLINE_SYNC_PROXY_IMAGE,
		postgresImage: e.FAULTLINE_POSTGRES_IMAGE,
		startupTimeoutMs: e.FAULTLINE_STARTUP_TIMEOUT_MS,
		proxyHost: e.FAULTLINE_PROXY_HOST,
	};
}

// =============================================================================
// Deployment hand-off (global setup -> test workers)
// =============================================================================

export const DEPLOYMENT_ENV_VAR = "FAULTLINE_DEPLOYMENT";

const EndpointSchema = z.object({ alias: z.string(), url: z.string(), proxiedUrl: z.string() });

const DeploymentInfoSchema = z.object({
	networkName: z.string(),
	homeservers: z.record(EndpointSchema),
	datastore: z.object({ alias: z.string(), url: z.string() }),
	syncProxy: EndpointSchema,
	adminUrl: z.string(),
});

/**
 * Check if the global setup published a deployment
 */
export function isDeploymentAvailable(env: NodeJS.ProcessEnv = process.env): boolean {
	return !!env[DEPLOYMENT_ENV_VAR];
}

/**
 * Get the deployment published by the global setup.
 * @throws FaultlineError if none was published
 */
export function getDeploymentInfo(env: NodeJS.ProcessEnv = process.env): DeploymentInfo {
	const raw = env[DEPLOYMENT_ENV_VAR];
	if (!raw) {
		throw new FaultlineError(
			"Deployment not found in environment. Ensure global setup has run with FAULTLINE_E2E=true and Docker available.",
		);
	}
	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (error) {
		throw new FaultlineError(`Invalid ${DEPLOYMENT_ENV_VAR}: not JSON`, { cause: error });
	}
	const parsed = DeploymentInfoSchema.safeParse(json);
	if (!parsed.success) {
		throw new FaultlineError(`Invalid ${DEPLOYMENT_ENV_VAR}: ${formatIssues(parsed.error).join("; ")}`);
	}
	return parsed.data;
}

export function publishDeploymentInfo(info: DeploymentInfo, env: NodeJS.ProcessEnv = process.env): void {
	env[DEPLOYMENT_ENV_VAR] = JSON.stringify(info);
}
