/**
 * Reverse Proxy Controller
 *
 * Client for the proxy's administrative channel. A push always replaces the
 * whole rule set: resend every rule that should stay active.
 *
 * @example
 * ```typescript
 * const controller = new ReverseProxyController({ adminUrl });
 * await controller.withRules([rules.statusOverride(504, "~u .*\/sendToDevice.*")], async () => {
 *   await expect(client.sendToDevice()).rejects.toThrow();
 * });
 * ```
 */

import { type CallbackHandler, CallbackServer, type CallbackServerOptions } from "../callback/callback-server";
import { RulePushError } from "../errors";
import { decodeRuleSet, encodeRuleSet } from "../rules/rule-set";
import type { PushableRule } from "../rules/rule.types";
import { toError } from "../utils";

export interface ReverseProxyControllerOptions {
	/** Admin endpoint of the proxy */
	adminUrl: string;
	/** Timeout of one admin call (default: 5000) */
	timeoutMs?: number;
	/** Used for relay servers opened by this controller */
	callbackServer?: CallbackServerOptions;
}

export class ReverseProxyController {
	readonly adminUrl: string;
	readonly callbackServerOptions: CallbackServerOptions;
	private readonly timeoutMs: number;
	private readonly ownedSniffers = new Set<string>();
	private readonly ownedServers = new Set<CallbackServer>();

	constructor(options: ReverseProxyControllerOptions) {
		this.adminUrl = options.adminUrl.replace(/\/+$/, "");
		this.timeoutMs = options.timeoutMs ?? 5000;
		this.callbackServerOptions = options.callbackServer ?? {};
	}

	/**
	 * Replace the active rule set
	 * @throws RuleValidationError before sending if the rules are invalid
	 * @throws RulePushError if the proxy rejects the push or is unreachable
	 */
	async setRules(rules: PushableRule[]): Promise<void> {
		await this.setRawRules(encodeRuleSet(rules));
	}

	/**
	 * Push an already-encoded rule set as-is
	 * @throws RulePushError
	 */
	async setRawRules(body: unknown): Promise<void> {
		await this.call("POST", "/rules", body);
	}

	async clearRules(): Promise<void> {
		await this.setRules([]);
	}

	/**
	 * Rule set currently active on the proxy
	 */
	async getRules(): Promise<PushableRule[]> {
		return decodeRuleSet(await this.call("GET", "/rules"));
	}

	/**
	 * Push `rules`, run `action`, then clear the rules even if `action` throws.
	 * When both fail, the clear failure is logged and the action's error is raised.
	 */
	async withRules<T>(rules: PushableRule[], action: () => T | Promise<T>): Promise<T> {
		await this.setRules(rules);
		let result: T;
		try {
			result = await action();
		} catch (error) {
			await this.clearRules().catch((clearError) => {
				console.warn("[ReverseProxyController] failed to clear rules after a failed action:", toError(clearError).message);
			});
			throw error;
		}
		await this.clearRules();
		return result;
	}

	/**
	 * Register a read-only observer
	 * @returns subscription id
	 */
	async addSniffer(filter: string, callbackUrl: string): Promise<string> {
		const response = await this.call("POST", "/sniffers", { filter, callback_url: callbackUrl });
		if (typeof response !== "object" || response === null || !("id" in response) || typeof response.id !== "string") {
			throw new RulePushError("Proxy returned no sniffer id");
		}
		this.ownedSniffers.add(response.id);
		return response.id;
	}

	async removeSniffer(id: string): Promise<void> {
		this.ownedSniffers.delete(id);
		await this.call("DELETE", `/sniffers/${encodeURIComponent(id)}`, undefined, [404]);
	}

	/**
	 * Open a relay server released by terminate()
	 */
	async openCallbackServer(handler: CallbackHandler): Promise<CallbackServer> {
		const server = new CallbackServer(this.callbackServerOptions);
		await server.start(handler);
		this.ownedServers.add(server);
		return server;
	}

	/**
	 * Clear all rules, drop this controller's sniffers and relay servers.
	 * Best-effort: failures are logged.
	 */
	async terminate(): Promise<void> {
		const steps: [string, () => Promise<void>][] = [["clear rules", () => this.clearRules()]];
		for (const id of [...this.ownedSniffers]) {
			steps.push([`remove sniffer ${id}`, () => this.removeSniffer(id)]);
		}
		for (const server of [...this.ownedServers]) {
			steps.push(["stop callback server", () => server.stop()]);
		}

		for (const [name, step] of steps) {
			try {
				await step();
			} catch (error) {
				console.warn(`[ReverseProxyController] terminate: failed to ${name}:`, toError(error).message);
			}
		}
		this.ownedServers.clear();
		this.ownedSniffers.clear();
	}

	private async call(method: string, path: string, body?: unknown, okStatuses: number[] = []): Promise<unknown> {
		let response: Response;
		try {
			response = await fetch(`${this.adminUrl}${path}`, {
				method,
				headers: body === undefined ? undefined : { "content-type": "application/json" },
				body: body === undefined ? undefined : JSON.stringify(body),
				signal: AbortSignal.timeout(this.timeoutMs),
			});
		} catch (error) {
			throw new RulePushError(`${method} ${path}: proxy unreachable at ${this.adminUrl}: ${toError(error).message}`, {
				cause: error,
			});
		}

		const text = await response.text();
		if (!response.ok && !okStatuses.includes(response.status)) {
			throw new RulePushError(`${method} ${path}: proxy rejected the call with HTTP ${response.status}: ${text}`, {
				status: response.status,
			});
		}
		if (!text) {
			return undefined;
		}
		try {
			return JSON.parse(text);
		} catch (error) {
			throw new RulePushError(`${method} ${path}: invalid JSON response: ${toError(error).message}`, { cause: error });
		}
	}
}
