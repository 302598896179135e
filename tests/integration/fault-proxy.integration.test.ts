/**
 * Fault Proxy Integration Tests
 *
 * Real proxy, in-process upstream. Covers block, override, pass-through, match
 * budgets under concurrency and rule replacement.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FaultProxy, type ProxyRoute, ReverseProxyController, RulePushError, rules } from "faultline";
import { startUpstream, type UpstreamStub } from "../helpers/test-helpers";

describe("FaultProxy", () => {
	let upstream: UpstreamStub;
	let proxy: FaultProxy;
	let route: ProxyRoute;
	let controller: ReverseProxyController;

	beforeEach(async () => {
		upstream = await startUpstream();
		proxy = new FaultProxy();
		controller = new ReverseProxyController({ adminUrl: await proxy.start() });
		route = await proxy.addRoute("hs1", upstream.url);
	});

	afterEach(async () => {
		await proxy.stop();
		await upstream.close();
	});

	// =========================================================================
	// Forwarding
	// =========================================================================

	describe("Forwarding", () => {
		it("should pass requests through when no rule matches", async () => {
			const response = await fetch(`${route.url}/_matrix/client/versions?x=1`);

			expect(response.status).toBe(200);
			expect(await response.json()).toEqual({ path: "/_matrix/client/versions?x=1" });
			expect(upstream.requests.map((r) => r.url)).toEqual(["/_matrix/client/versions?x=1"]);
		});

		it("should forward method, body and headers", async () => {
			await fetch(`${route.url}/_matrix/client/v3/sendToDevice/m.test/1`, {
				method: "PUT",
				headers: { authorization: "Bearer test-token", "content-type": "application/json" },
				body: '{"messages":{}}',
			});

			expect(upstream.requests).toHaveLength(1);
			expect(upstream.requests[0]).toMatchObject({
				method: "PUT",
				url: "/_matrix/client/v3/sendToDevice/m.test/1",
				body: '{"messages":{}}',
			});
			expect(upstream.requests[0].headers.authorization).toBe("Bearer test-token");
		});

		it("should answer 502 when the upstream is unreachable", async () => {
			const dead = await proxy.addRoute("dead", "http://127.0.0.1:9");

			const response = await fetch(`${dead.url}/sync`);

			expect(response.status).toBe(502);
		});

		it("should list its routes", () => {
			expect(proxy.getRoutes()).toEqual([route]);
			expect(proxy.getRoute("hs1")?.upstream).toBe(upstream.url);
			expect(proxy.getRoute("hs9")).toBeUndefined();
		});

		it("should refuse a duplicate route name", async () => {
			await expect(proxy.addRoute("hs1", upstream.url)).rejects.toThrow("Route hs1 already exists");
		});
	});

	// =========================================================================
	// Actions
	// =========================================================================

	describe("Actions", () => {
		it("should block matching requests without reaching upstream", async () => {
			await controller.setRules([rules.block(504, "~u .*/keys/query.*")]);

			const blocked = await fetch(`${route.url}/_matrix/client/v3/keys/query`, { method: "POST", body: "{}" });
			const passed = await fetch(`${route.url}/_matrix/client/v3/sync`);

			expect(blocked.status).toBe(504);
			expect(await blocked.json()).toEqual({});
			expect(passed.status).toBe(200);
			expect(upstream.requests.map((r) => r.url)).toEqual(["/_matrix/client/v3/sync"]);
		});

		it("should forward and rewrite the status of overridden requests", async () => {
			await controller.setRules([rules.statusOverride(500, "~u .*/sendToDevice.*")]);

			const response = await fetch(`${route.url}/_matrix/client/v3/sendToDevice/m.test/1`, { method: "PUT", body: "{}" });

			expect(response.status).toBe(500);
			expect(await response.json()).toEqual({ path: "/_matrix/client/v3/sendToDevice/m.test/1" });
			expect(upstream.requests).toHaveLength(1);
		});

		it("should intercept exactly count requests and pass the next", async () => {
			await controller.setRules([rules.block(504, "~u .*/keys/query.*", 2)]);

			const statuses: number[] = [];
			for (let i = 0; i < 3; i++) {
				const response = await fetch(`${route.url}/keys/query`, { method: "POST", body: "{}" });
				statuses.push(response.status);
			}

			expect(statuses).toEqual([504, 504, 200]);
			expect(upstream.requests).toHaveLength(1);
		});

		it("should never overspend a budget under concurrent requests", async () => {
			await controller.setRules([rules.block(504, "~u .*/keys/query.*", 3)]);

			const responses = await Promise.all(
				Array.from({ length: 10 }, () => fetch(`${route.url}/keys/query`, { method: "POST", body: "{}" })),
			);
			const statuses = responses.map((r) => r.status);

			expect(statuses.filter((s) => s === 504)).toHaveLength(3);
			expect(statuses.filter((s) => s === 200)).toHaveLength(7);
			expect(upstream.requests).toHaveLength(7);
		});

		it("should only apply the last pushed rule set", async () => {
			await controller.setRules([rules.block(504, "~u /a")]);
			await controller.setRules([rules.statusOverride(500, "~u /b")]);

			expect((await fetch(`${route.url}/a`)).status).toBe(200);
			expect((await fetch(`${route.url}/b`)).status).toBe(500);
			expect(await controller.getRules()).toEqual([rules.statusOverride(500, "~u /b")]);
		});

		it("should record actions in the access log", async () => {
			await controller.setRules([rules.block(504, "~u /blocked")]);

			await fetch(`${route.url}/blocked`);

			expect(proxy.getAccessLog().some((line) => line.endsWith(" hs1 GET /blocked -> 504 [block 504]"))).toBe(true);
		});
	});

	// =========================================================================
	// Admin channel
	// =========================================================================

	describe("Admin channel", () => {
		it("should report health", async () => {
			const response = await fetch(`${proxy.adminUrl}/health`);

			expect(response.status).toBe(200);
			expect(await response.json()).toEqual({ ok: true });
		});

		it("should reject a rule set with unknown keys and keep the previous one", async () => {
			await controller.setRules([rules.block(504, "~u /a")]);

			const response = await fetch(`${proxy.adminUrl}/rules`, {
				method: "POST",
				body: JSON.stringify({ statuscode: { return_status: 500, filter: "~u /b" }, latency: 100 }),
			});

			expect(response.status).toBe(400);
			expect(await response.json()).toEqual({
				error: "Invalid rule set: Unrecognized key(s) in object: 'latency'",
				issues: ["Unrecognized key(s) in object: 'latency'"],
			});
			expect(proxy.engine.getRules()).toEqual([rules.block(504, "~u /a")]);
		});

		it("should reject invalid JSON", async () => {
			const response = await fetch(`${proxy.adminUrl}/rules`, { method: "POST", body: "{not json" });

			expect(response.status).toBe(400);
		});

		it("should surface rejections to the controller", async () => {
			const error = await controller.setRawRules({ statuscode: { return_status: 99, filter: "~u /a" } }).catch((e: unknown) => e);

			expect(error).toBeInstanceOf(RulePushError);
			expect(error).toHaveProperty("status", 400);
		});

		it("should reject a sniffer with an invalid filter", async () => {
			const response = await fetch(`${proxy.adminUrl}/sniffers`, {
				method: "POST",
				body: JSON.stringify({ filter: "~z nope", callback_url: "http://127.0.0.1:4000" }),
			});

			expect(response.status).toBe(400);
			expect(await response.json()).toEqual({ error: `Invalid filter expression "~z nope": unknown predicate "~z"` });
		});

		it("should answer 404 for an unknown sniffer or route", async () => {
			const removed = await fetch(`${proxy.adminUrl}/sniffers/nope`, { method: "DELETE" });
			const unknown = await fetch(`${proxy.adminUrl}/unknown`);

			expect(removed.status).toBe(404);
			expect(await removed.json()).toEqual({ removed: false });
			expect(unknown.status).toBe(404);
		});
	});

	describe("Notifications", () => {
		it("should log and drop failed deliveries", async () => {
			const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
			await controller.setRules([rules.callback("http://127.0.0.1:9", "~u /sync")]);

			const response = await fetch(`${route.url}/sync`);
			await proxy.flushDeliveries();

			expect(response.status).toBe(200);
			expect(warn).toHaveBeenCalledTimes(1);
			expect(warn.mock.calls[0][0]).toBe("[FaultProxy] callback delivery to http://127.0.0.1:9 failed:");
			warn.mockRestore();
		});
	});

	// =========================================================================
	// Upstream timeouts
	// =========================================================================

	describe("Upstream timeouts", () => {
		let slow: UpstreamStub;
		let slowProxy: FaultProxy | undefined;

		beforeEach(async () => {
			slow = await startUpstream((req) => ({ status: 200, body: { path: req.url }, delayMs: 300 }));
		});

		afterEach(async () => {
			vi.restoreAllMocks();
			await slowProxy?.stop();
			slowProxy = undefined;
			await slow.close();
		});

		it("should never put a deadline on forwarded requests by default", async () => {
			const timeout = vi.spyOn(AbortSignal, "timeout");
			slowProxy = new FaultProxy();
			await slowProxy.start();
			const slowRoute = await slowProxy.addRoute("hs1", slow.url);

			const response = await fetch(`${slowRoute.url}/_matrix/client/v3/sync?timeout=30000`);

			expect(response.status).toBe(200);
			expect(await response.json()).toEqual({ path: "/_matrix/client/v3/sync?timeout=30000" });
			expect(timeout).not.toHaveBeenCalled();
		});

		it("should pass a slow response that stays under the configured limit", async () => {
			slowProxy = new FaultProxy({ upstreamTimeoutMs: 5000 });
			await slowProxy.start();
			const slowRoute = await slowProxy.addRoute("hs1", slow.url);

			const response = await fetch(`${slowRoute.url}/_matrix/client/v3/sync`);

			expect(response.status).toBe(200);
		});

		it("should answer 502 once the configured limit is exceeded", async () => {
			slowProxy = new FaultProxy({ upstreamTimeoutMs: 50 });
			await slowProxy.start();
			const slowRoute = await slowProxy.addRoute("hs1", slow.url);

			const response = await fetch(`${slowRoute.url}/_matrix/client/v3/sync`);

			expect(response.status).toBe(502);
		});
	});

	// =========================================================================
	// Concurrent pushes
	// =========================================================================

	describe("Concurrent pushes", () => {
		it("should leave exactly one complete rule set active", async () => {
			const first = [rules.block(504, "~u /a"), rules.statusOverride(500, "~u /b")];
			const second = [rules.block(503, "~u /c"), rules.callback("http://127.0.0.1:4000", "~u /d")];

			for (let round = 0; round < 5; round++) {
				await Promise.all([controller.setRules(first), controller.setRules(second)]);

				const active = proxy.engine.getRules();
				expect([first, second]).toContainEqual(active);
			}
		});
	});

	// =========================================================================
	// Access log
	// =========================================================================

	describe("Access log", () => {
		it("should keep only the most recent lines", async () => {
			const capped = new FaultProxy({ accessLogLimit: 3 });
			try {
				await capped.start();
				const cappedRoute = await capped.addRoute("hs1", upstream.url);

				for (const path of ["/a", "/b", "/c", "/d"]) {
					await fetch(`${cappedRoute.url}${path}`);
				}

				const lines = capped.getAccessLog();
				expect(lines).toHaveLength(3);
				expect(lines.map((line) => line.slice(line.indexOf(" ") + 1))).toEqual([
					"hs1 GET /b -> 200",
					"hs1 GET /c -> 200",
					"hs1 GET /d -> 200",
				]);
			} finally {
				await capped.stop();
			}
		});
	});
});
