/**
 * Traffic Sniffer
 *
 * Scoped, read-only subscription to proxied traffic. The subscription exists
 * only while `action` runs and is removed when it returns or throws; events
 * arriving after that point are discarded.
 */

import { CallbackServer } from "../callback/callback-server";
import type { ReverseProxyController } from "../control/reverse-proxy-controller";
import { endpointFilter } from "../rules/filter";
import type { CallbackEvent } from "../rules/rule.types";
import { toError } from "../utils";

export type SniffHandler = (event: CallbackEvent) => void | Promise<void>;

export async function sniff<T>(
	controller: ReverseProxyController,
	filter: string,
	onEvent: SniffHandler,
	action: () => T | Promise<T>,
): Promise<T> {
	let active = true;
	const server = new CallbackServer(controller.callbackServerOptions);
	await server.start((event) => {
		if (active) {
			return onEvent(event);
		}
	});

	let id: string | undefined;
	try {
		id = await controller.addSniffer(filter, server.url);
		return await action();
	} finally {
		active = false;
		if (id !== undefined) {
			await controller.removeSniffer(id).catch((error) => {
				console.warn(`[Sniffer] failed to remove sniffer ${id}:`, toError(error).message);
			});
		}
		await server.stop();
	}
}

/**
 * Sniff every request whose URL contains `path`
 */
export function sniffEndpoint<T>(
	controller: ReverseProxyController,
	path: string,
	onEvent: SniffHandler,
	action: () => T | Promise<T>,
): Promise<T> {
	return sniff(controller, endpointFilter(path), onEvent, action);
}
