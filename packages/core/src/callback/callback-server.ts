/**
 * Callback Relay Server
 *
 * Ephemeral listener receiving proxy notifications. Each notification is
 * acknowledged immediately and handed to the handler on its own task, so a slow
 * handler never stalls the listener or other deliveries.
 */

import * as http from "node:http";
import { FaultlineError } from "../errors";
import { close, listen, readJsonBody, sendJson } from "../proxy/http.utils";
import type { CallbackEvent } from "../rules/rule.types";
import { toError } from "../utils";
import { decodeCallbackEvent } from "./callback-payload";

export type CallbackHandler = (event: CallbackEvent) => void | Promise<void>;

export interface CallbackServerOptions {
	/** Interface to bind (default: "127.0.0.1") */
	host?: string;
	/** Host the proxy uses to reach this server, if different from the bind host */
	advertisedHost?: string;
}

export class CallbackServer {
	private readonly host: string;
	private readonly advertisedHost: string;
	private server?: http.Server;
	private _url?: string;
	private handler?: CallbackHandler;
	private readonly tasks = new Set<Promise<void>>();
	private _received = 0;

	constructor(options: CallbackServerOptions = {}) {
		this.host = options.host ?? "127.0.0.1";
		this.advertisedHost = options.advertisedHost ?? this.host;
	}

	/** Notifications received so far */
	get received(): number {
		return this._received;
	}

	get isRunning(): boolean {
		return this.server !== undefined;
	}

	/**
	 * URL to put in a rule's callback field
	 * @throws Error if the server is not started
	 */
	get url(): string {
		if (!this._url) {
			throw new Error("CallbackServer is not started");
		}
		return this._url;
	}

	/**
	 * Start listening on an ephemeral port
	 * @returns externally reachable URL
	 */
	async start(handler: CallbackHandler): Promise<string> {
		if (this.server) {
			throw new Error("CallbackServer is already started");
		}
		this.handler = handler;

		const server = http.createServer((req, res) => {
			this.handleRequest(req, res).catch((error) => {
				console.error("[CallbackServer] request failed:", toError(error).message);
				if (!res.headersSent) sendJson(res, 500, { error: toError(error).message });
			});
		});
		const port = await listen(server, 0, this.host);
		this.server = server;
		this._url = `http://${this.advertisedHost}:${port}`;
		return this._url;
	}

	/**
	 * Wait for running handler tasks to settle
	 */
	async drain(): Promise<void> {
		while (this.tasks.size > 0) {
			await Promise.allSettled([...this.tasks]);
		}
	}

	/**
	 * Release the listener. Safe to call repeatedly or before start().
	 */
	async stop(): Promise<void> {
		const server = this.server;
		this.server = undefined;
		this.handler = undefined;
		if (server) {
			await close(server);
		}
	}

	private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
		if (req.method !== "POST") {
			sendJson(res, 405, { error: "Method not allowed" });
			return;
		}

		let event: CallbackEvent;
		try {
			event = decodeCallbackEvent(await readJsonBody(req));
		} catch (error) {
			if (error instanceof FaultlineError || error instanceof SyntaxError) {
				sendJson(res, 400, { error: error.message });
				return;
			}
			throw error;
		}

		sendJson(res, 200, {});

		const handler = this.handler;
		if (!handler) {
			return;
		}
		this._received++;
		this.spawn(handler, event);
	}

	private spawn(handler: CallbackHandler, event: CallbackEvent): void {
		const task = Promise.resolve()
			.then(() => handler(event))
			.catch((error) => {
				console.error(`[CallbackServer] handler failed for ${event.method} ${event.path}:`, toError(error).message);
			})
			.finally(() => {
				this.tasks.delete(task);
			});
		this.tasks.add(task);
	}
}

/**
 * Start a relay server in one call
 */
export async function startCallbackServer(
	handler: CallbackHandler,
	options?: CallbackServerOptions,
): Promise<{ url: string; server: CallbackServer; close: () => Promise<void> }> {
	const server = new CallbackServer(options);
	const url = await server.start(handler);
	return { url, server, close: () => server.stop() };
}
