/**
 * Deployment Types
 */

export interface ServiceEndpoint {
	/** Hostname inside the deployment network */
	alias: string;
	/** URL reachable from the test process */
	url: string;
}

export interface ProxiedServiceEndpoint extends ServiceEndpoint {
	/** Same service, reached through the fault proxy */
	proxiedUrl: string;
}

/**
 * Serializable description of a running deployment
 */
export interface DeploymentInfo {
	networkName: string;
	homeservers: Record<string, ProxiedServiceEndpoint>;
	datastore: ServiceEndpoint;
	syncProxy: ProxiedServiceEndpoint;
	/** Admin endpoint of the fault proxy */
	adminUrl: string;
}
