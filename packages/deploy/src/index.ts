/**
 * @faultline/deploy
 *
 * Provisions the chat-server topology with testcontainers and owns its
 * lifecycle.
 *
 * @example
 * ```typescript
 * import { DeploymentManager, deployTopology, loadHarnessConfig, topologyOptionsFromConfig } from "@faultline/deploy";
 *
 * const config = loadHarnessConfig();
 * const manager = new DeploymentManager(() => deployTopology(topologyOptionsFromConfig(config)));
 * const deployment = await manager.deploy();
 * // ...
 * await manager.teardown(config.writeContainerLogs);
 * ```
 */

export * from "./runtime.types";
export * from "./deployment.types";
export * from "./deployment";
export * from "./deployment-manager";
export * from "./topology";
export * from "./packet-capture";
export * from "./env-config";
export { TestcontainersRuntime } from "./testcontainers.runtime";
export { isDockerAvailable } from "./docker-check";
