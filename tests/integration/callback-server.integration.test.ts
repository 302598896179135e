/**
 * Callback Relay Server Integration Tests
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import {
	type CallbackEvent,
	CallbackServer,
	createCallbackEvent,
	createDeferred,
	encodeCallbackEvent,
	startCallbackServer,
} from "faultline";

const payload = encodeCallbackEvent(
	createCallbackEvent({
		method: "POST",
		path: "/_matrix/client/v3/keys/query",
		status: 504,
		headers: { authorization: "Bearer test-token" },
		requestBody: Buffer.from('{"device_keys":{}}'),
	}),
);

const post = (url: string, body: unknown) =>
	fetch(url, { method: "POST", headers: { "content-type": "application/json" }, body: JSON.stringify(body) });

describe("CallbackServer", () => {
	const servers: CallbackServer[] = [];

	afterEach(async () => {
		vi.restoreAllMocks();
		await Promise.all(servers.map((server) => server.stop()));
		servers.length = 0;
	});

	const startServer = async (handler: (event: CallbackEvent) => void | Promise<void>) => {
		const server = new CallbackServer();
		servers.push(server);
		await server.start(handler);
		return server;
	};

	it("should decode notifications and hand them to the handler", async () => {
		const received = createDeferred<CallbackEvent>();
		const server = await startServer((event) => received.resolve(event));

		const response = await post(server.url, payload);
		const event = await received.promise;

		expect(response.status).toBe(200);
		expect(await response.json()).toEqual({});
		expect(event.method).toBe("POST");
		expect(event.path).toBe("/_matrix/client/v3/keys/query");
		expect(event.status).toBe(504);
		expect(event.headers).toEqual({ authorization: "Bearer test-token" });
		expect(event.requestBody.toString("utf-8")).toBe('{"device_keys":{}}');
		expect(server.received).toBe(1);
	});

	it("should acknowledge before a slow handler completes", async () => {
		const release = createDeferred<void>();
		let calls = 0;
		const server = await startServer(async () => {
			calls++;
			await release.promise;
		});

		const first = await post(server.url, payload);
		const second = await post(server.url, payload);

		expect(first.status).toBe(200);
		expect(second.status).toBe(200);
		release.resolve();
		await server.drain();
		expect(calls).toBe(2);
	});

	it("should log handler failures", async () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		const server = await startServer(() => {
			throw new Error("handler exploded");
		});

		const response = await post(server.url, payload);
		await server.drain();

		expect(response.status).toBe(200);
		expect(error).toHaveBeenCalledWith(
			"[CallbackServer] handler failed for POST /_matrix/client/v3/keys/query:",
			"handler exploded",
		);
	});

	it("should reject malformed notifications", async () => {
		const handler = vi.fn();
		const server = await startServer(handler);

		const malformed = await post(server.url, { method: "GET" });
		const notJson = await fetch(server.url, { method: "POST", body: "{" });
		const wrongMethod = await fetch(server.url);

		expect(malformed.status).toBe(400);
		expect(notJson.status).toBe(400);
		expect(wrongMethod.status).toBe(405);
		expect(handler).not.toHaveBeenCalled();
	});

	it("should be stoppable at any time", async () => {
		const server = new CallbackServer();

		await server.stop();
		expect(() => server.url).toThrow("CallbackServer is not started");

		await server.start(() => {});
		await expect(server.start(() => {})).rejects.toThrow("CallbackServer is already started");
		expect(server.isRunning).toBe(true);

		await server.stop();
		await server.stop();
		expect(server.isRunning).toBe(false);
	});

	it("should advertise the configured host", async () => {
		const server = new CallbackServer({ host: "127.0.0.1", advertisedHost: "host.docker.internal" });
		servers.push(server);

		const url = await server.start(() => {});

		expect(url).toMatch(/^http:\/\/host\.docker\.internal:\d+$/);
	});

	it("should start and close in one call", async () => {
		const received = createDeferred<CallbackEvent>();
		const { url, server, close } = await startCallbackServer((event) => received.resolve(event));

		await post(url, payload);
		expect((await received.promise).status).toBe(504);

		await close();
		expect(server.isRunning).toBe(false);
	});
});
