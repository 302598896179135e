/**
 * faultline
 *
 * Fault-injection reverse proxy, control plane and synchronization primitives
 * for exercising end-to-end-encrypted chat clients against failing networks.
 *
 * @example
 * ```typescript
 * import { FaultProxy, ReverseProxyController, Waiter, rules } from "faultline";
 *
 * const proxy = new FaultProxy();
 * const controller = new ReverseProxyController({ adminUrl: await proxy.start() });
 * const hs1 = await proxy.addRoute("hs1", "http://localhost:8008");
 *
 * const waiter = new Waiter();
 * const relay = await controller.openCallbackServer(() => waiter.finish());
 * await controller.withRules(
 *   [rules.block(504, "~u .*\/keys/query.*", 3), rules.callback(relay.url, "~u .*\/keys/query.*")],
 *   async () => {
 *     // drive a client against hs1.url
 *     await waiter.wait(3000, "did not see /keys/query");
 *   },
 * );
 * ```
 */

export * from "./errors";
export * from "./utils";
export * from "./waiter";
export * from "./rules";
export * from "./callback";
export * from "./proxy";
export * from "./control";
export * from "./sniffer";
export * from "./clients";
