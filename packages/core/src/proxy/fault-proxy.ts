/**
 * Fault Proxy
 *
 * Controllable reverse proxy. Every upstream (chat server, sync proxy) gets its
 * own listener; an admin listener accepts rule pushes and sniffer subscriptions.
 *
 * Per request:
 * 1. Resolve observers (callback rules + sniffers) and the action decision
 * 2. Block, or forward and optionally rewrite the status
 * 3. Respond to the client
 * 4. Notify observers, one detached task each (never awaited by the request)
 */

import * as http from "node:http";
import { z } from "zod";
import { encodeCallbackEvent, createCallbackEvent } from "../callback/callback-payload";
import { FilterSyntaxError, RuleValidationError } from "../errors";
import { type FilterInput } from "../rules/filter";
import { type Observer, RuleEngine } from "../rules/rule-engine";
import { decodeRuleSet, encodeRuleSet, formatIssues } from "../rules/rule-set";
import type { CallbackEvent } from "../rules/rule.types";
import { toError } from "../utils";
import { close, flattenHeaders, listen, readBody, readJsonBody, sendJson } from "./http.utils";
import type { FaultProxyOptions, ProxyRoute } from "./proxy.types";

const HOP_BY_HOP_HEADERS = new Set([
	"connection",
	"keep-alive",
	"proxy-authenticate",
	"proxy-authorization",
	"te",
	"trailer",
	"transfer-encoding",
	"upgrade",
	"host",
	"content-length",
	"expect",
]);

/** Headers invalidated by fetch having decoded the body */
const STALE_RESPONSE_HEADERS = new Set([...HOP_BY_HOP_HEADERS, "content-encoding"]);

const SnifferRegistrationSchema = z
	.object({
		filter: z.string().min(1),
		callback_url: z.string().url(),
	})
	.strict();

interface RouteEntry {
	route: ProxyRoute;
	server: http.Server;
}

export class FaultProxy {
	readonly engine = new RuleEngine();

	private readonly host: string;
	private readonly advertisedHost: string;
	private readonly adminPort: number;
	private readonly deliveryTimeoutMs: number;
	private readonly upstreamTimeoutMs: number | undefined;
	private readonly accessLogLimit: number;

	private adminServer?: http.Server;
	private _adminUrl?: string;
	private readonly routes = new Map<string, RouteEntry>();
	private readonly accessLog: string[] = [];
	private readonly pendingDeliveries = new Set<Promise<void>>();

	constructor(options: FaultProxyOptions = {}) {
		this.host = options.host ?? "127.0.0.1";
		this.advertisedHost = options.advertisedHost ?? this.host;
		this.adminPort = options.adminPort ?? 0;
		this.deliveryTimeoutMs = options.deliveryTimeoutMs ?? 5000;
		this.upstreamTimeoutMs = options.upstreamTimeoutMs;
		this.accessLogLimit = options.accessLogLimit ?? 10000;
	}

	get isRunning(): boolean {
		return this.adminServer?.listening ?? false;
	}

	/**
	 * Admin endpoint URL
	 * @throws Error if the proxy is not started
	 */
	get adminUrl(): string {
		if (!this._adminUrl) {
			throw new Error("FaultProxy is not started");
		}
		return this._adminUrl;
	}

	/**
	 * Start the admin listener
	 * @returns admin URL
	 */
	async start(): Promise<string> {
		if (this._adminUrl) {
			return this._adminUrl;
		}
		const server = http.createServer((req, res) => {
			this.handleAdminRequest(req, res).catch((error) => {
				console.error("[FaultProxy] admin request failed:", toError(error).message);
				if (!res.headersSent) sendJson(res, 500, { error: toError(error).message });
			});
		});
		const port = await listen(server, this.adminPort, this.host);
		this.adminServer = server;
		this._adminUrl = `http://${this.advertisedHost}:${port}`;
		this.log(`admin listening on ${this._adminUrl}`);
		return this._adminUrl;
	}

	/**
	 * Open a listener that forwards to `upstream`
	 */
	async addRoute(name: string, upstream: string, port = 0): Promise<ProxyRoute> {
		if (this.routes.has(name)) {
			throw new Error(`Route ${name} already exists`);
		}
		const upstreamUrl = new URL(upstream);
		const server = http.createServer((req, res) => {
			this.handleProxyRequest(name, upstreamUrl, req, res).catch((error) => {
				console.error(`[FaultProxy] ${name} request failed:`, toError(error).message);
				if (!res.headersSent) sendJson(res, 502, { error: toError(error).message });
			});
		});
		const boundPort = await listen(server, port, this.host);
		const route: ProxyRoute = {
			name,
			upstream: upstreamUrl.origin,
			port: boundPort,
			url: `http://${this.advertisedHost}:${boundPort}`,
		};
		this.routes.set(name, { route, server });
		this.log(`route ${name}: ${route.url} -> ${route.upstream}`);
		return route;
	}

	getRoute(name: string): ProxyRoute | undefined {
		return this.routes.get(name)?.route;
	}

	getRoutes(): ProxyRoute[] {
		return [...this.routes.values()].map(({ route }) => route);
	}

	getAccessLog(): string[] {
		return [...this.accessLog];
	}

	/**
	 * Wait for in-flight notifications to settle
	 */
	async flushDeliveries(): Promise<void> {
		while (this.pendingDeliveries.size > 0) {
			await Promise.allSettled([...this.pendingDeliveries]);
		}
	}

	/**
	 * Close every listener and drop all rules and sniffers
	 */
	async stop(): Promise<void> {
		const servers = [...this.routes.values()].map(({ server }) => server);
		if (this.adminServer) servers.push(this.adminServer);

		await Promise.all(servers.map((server) => close(server)));
		await this.flushDeliveries();

		this.routes.clear();
		this.engine.replaceRules([]);
		this.engine.clearSniffers();
		this.adminServer = undefined;
		this._adminUrl = undefined;
		this.log("stopped");
	}

	// =========================================================================
	// Admin channel
	// =========================================================================

	private async handleAdminRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
		const url = new URL(req.url ?? "/", "http://admin");
		const method = req.method ?? "GET";

		if (url.pathname === "/health" && method === "GET") {
			sendJson(res, 200, { ok: true });
			return;
		}

		if (url.pathname === "/rules") {
			if (method === "GET") {
				sendJson(res, 200, encodeRuleSet(this.engine.getRules()));
				return;
			}
			if (method === "POST") {
				await this.handleRulePush(req, res);
				return;
			}
		}

		if (url.pathname === "/sniffers") {
			if (method === "GET") {
				sendJson(res, 200, this.engine.getSniffers());
				return;
			}
			if (method === "POST") {
				await this.handleSnifferRegistration(req, res);
				return;
			}
		}

		const snifferMatch = /^\/sniffers\/([^/]+)$/.exec(url.pathname);
		if (snifferMatch && method === "DELETE") {
			const removed = this.engine.removeSniffer(decodeURIComponent(snifferMatch[1]));
			sendJson(res, removed ? 200 : 404, { removed });
			return;
		}

		sendJson(res, 404, { error: `No admin route for ${method} ${url.pathname}` });
	}

	private async handleRulePush(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
		let body: unknown;
		try {
			body = (await readJsonBody(req)) ?? {};
		} catch (error) {
			sendJson(res, 400, { error: `Invalid JSON: ${toError(error).message}` });
			return;
		}

		try {
			const rules = decodeRuleSet(body);
			this.engine.replaceRules(rules);
			this.log(`rules replaced (${rules.length} rule(s))`);
			sendJson(res, 200, { ok: true });
		} catch (error) {
			if (error instanceof RuleValidationError) {
				sendJson(res, 400, { error: error.message, issues: error.issues });
				return;
			}
			throw error;
		}
	}

	private async handleSnifferRegistration(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
		let body: unknown;
		try {
			body = await readJsonBody(req);
		} catch (error) {
			sendJson(res, 400, { error: `Invalid JSON: ${toError(error).message}` });
			return;
		}

		const parsed = SnifferRegistrationSchema.safeParse(body);
		if (!parsed.success) {
			sendJson(res, 400, { error: formatIssues(parsed.error).join("; ") });
			return;
		}

		try {
			const id = this.engine.addSniffer(parsed.data.filter, parsed.data.callback_url);
			this.log(`sniffer ${id} added for ${parsed.data.filter}`);
			sendJson(res, 201, { id });
		} catch (error) {
			if (error instanceof FilterSyntaxError) {
				sendJson(res, 400, { error: error.message });
				return;
			}
			throw error;
		}
	}

	// =========================================================================
	// Proxying
	// =========================================================================

	private async handleProxyRequest(
		routeName: string,
		upstream: URL,
		req: http.IncomingMessage,
		res: http.ServerResponse,
	): Promise<void> {
		const method = req.method ?? "GET";
		const path = req.url ?? "/";
		const requestBody = await readBody(req);
		const input: FilterInput = { method, url: path, headers: req.headers };

		const observers = this.engine.observersFor(input);
		const decision = this.engine.decide(input);

		let status: number;
		let responseHeaders: Record<string, string> = {};
		let responseBody: Buffer;

		if (decision.type === "block") {
			status = decision.status;
			responseHeaders = { "content-type": "application/json" };
			responseBody = Buffer.from("{}");
		} else {
			const forwarded = await this.forward(upstream, method, path, req.headers, requestBody);
			status = decision.type === "override" ? decision.status : forwarded.status;
			responseHeaders = forwarded.headers;
			responseBody = forwarded.body;
		}

		res.writeHead(status, { ...responseHeaders, "content-length": responseBody.length });
		res.end(responseBody);

		const action = decision.type === "pass" ? "" : ` [${decision.type} ${decision.status}]`;
		this.appendAccessLog(`${routeName} ${method} ${path} -> ${status}${action}`);

		if (observers.length > 0) {
			const event = createCallbackEvent({
				method,
				path,
				status,
				headers: flattenHeaders(req.headers),
				requestBody,
				responseBody,
			});
			for (const observer of observers) {
				this.notify(observer, event);
			}
		}
	}

	private async forward(
		upstream: URL,
		method: string,
		path: string,
		headers: http.IncomingHttpHeaders,
		body: Buffer,
	): Promise<{ status: number; headers: Record<string, string>; body: Buffer }> {
		const outgoing = new Headers();
		for (const [name, value] of Object.entries(headers)) {
			if (value === undefined || HOP_BY_HOP_HEADERS.has(name)) continue;
			for (const v of Array.isArray(value) ? value : [value]) {
				outgoing.append(name, v);
			}
		}

		try {
			const response = await fetch(new URL(path, upstream), {
				method,
				headers: outgoing,
				body: method === "GET" || method === "HEAD" || body.length === 0 ? undefined : body,
				redirect: "manual",
				signal: this.upstreamTimeoutMs === undefined ? undefined : AbortSignal.timeout(this.upstreamTimeoutMs),
			});
			const responseHeaders: Record<string, string> = {};
			response.headers.forEach((value, key) => {
				if (!STALE_RESPONSE_HEADERS.has(key)) {
					responseHeaders[key] = value;
				}
			});
			return {
				status: response.status,
				headers: responseHeaders,
				body: Buffer.from(await response.arrayBuffer()),
			};
		} catch (error) {
			const message = `Upstream ${upstream.origin} unreachable: ${toError(error).message}`;
			this.log(message);
			return {
				status: 502,
				headers: { "content-type": "application/json" },
				body: Buffer.from(JSON.stringify({ error: message })),
			};
		}
	}

	/**
	 * Fire-and-forget delivery. Failures are logged, never propagated.
	 */
	private notify(observer: Observer, event: CallbackEvent): void {
		const delivery = this.deliver(observer, event)
			.catch((error) => {
				console.warn(`[FaultProxy] ${observer.kind} delivery to ${observer.url} failed:`, toError(error).message);
			})
			.finally(() => {
				this.pendingDeliveries.delete(delivery);
			});
		this.pendingDeliveries.add(delivery);
	}

	private async deliver(observer: Observer, event: CallbackEvent): Promise<void> {
		if (!observer.isActive()) {
			return;
		}
		const response = await fetch(observer.url, {
			method: "POST",
			headers: { "content-type": "application/json" },
			body: JSON.stringify(encodeCallbackEvent(event)),
			signal: AbortSignal.timeout(this.deliveryTimeoutMs),
		});
		if (!response.ok) {
			throw new Error(`HTTP ${response.status}`);
		}
		await response.body?.cancel();
	}

	private log(message: string): void {
		this.appendAccessLog(message);
	}

	/**
	 * Keep at most `accessLogLimit` lines, dropping the oldest
	 */
	private appendAccessLog(line: string): void {
		this.accessLog.push(`${new Date().toISOString()} ${line}`);
		if (this.accessLog.length > this.accessLogLimit) {
			this.accessLog.splice(0, this.accessLog.length - this.accessLogLimit);
		}
	}
}
