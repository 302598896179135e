/**
 * Fault Proxy Types
 */

export interface FaultProxyOptions {
	/** Interface to bind (default: "127.0.0.1") */
	host?: string;
	/** Host used in published URLs, if different from the bind host */
	advertisedHost?: string;
	/** Admin listener port (default: 0 = ephemeral) */
	adminPort?: number;
	/** Timeout for one callback/sniffer delivery (default: 5000) */
	deliveryTimeoutMs?: number;
	/** Timeout for one forwarded upstream request (default: none, long-polls run to completion) */
	upstreamTimeoutMs?: number;
	/** Access log lines kept in memory (default: 10000) */
	accessLogLimit?: number;
}

/**
 * One proxied upstream
 */
export interface ProxyRoute {
	/** Logical service name, e.g. "hs1" */
	name: string;
	/** Upstream origin requests are forwarded to */
	upstream: string;
	port: number;
	/** Externally reachable URL of this route */
	url: string;
}
