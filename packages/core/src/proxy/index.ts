export { FaultProxy } from "./fault-proxy";
export type { FaultProxyOptions, ProxyRoute } from "./proxy.types";
