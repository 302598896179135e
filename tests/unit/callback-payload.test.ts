/**
 * Callback Payload Tests
 */

import { describe, expect, it } from "vitest";
import { createCallbackEvent, decodeCallbackEvent, encodeCallbackEvent, FaultlineError, parseJsonBody } from "faultline";

describe("Callback payload", () => {
	const event = createCallbackEvent({
		method: "PUT",
		path: "/_matrix/client/v3/sendToDevice/m.test/1",
		status: 200,
		headers: { "content-type": "application/json" },
		requestBody: Buffer.from('{"messages":{}}'),
		responseBody: Buffer.from("{}"),
	});

	it("should encode bodies as base64", () => {
		expect(encodeCallbackEvent(event)).toEqual({
			method: "PUT",
			path: "/_matrix/client/v3/sendToDevice/m.test/1",
			status: 200,
			headers: { "content-type": "application/json" },
			request_body: Buffer.from('{"messages":{}}').toString("base64"),
			response_body: "e30=",
		});
	});

	it("should decode what it encodes", () => {
		const decoded = decodeCallbackEvent(JSON.parse(JSON.stringify(encodeCallbackEvent(event))));

		expect(decoded.method).toBe("PUT");
		expect(decoded.requestBody.toString("utf-8")).toBe('{"messages":{}}');
		expect(decoded.responseBody.toString("utf-8")).toBe("{}");
	});

	it("should freeze events", () => {
		expect(Object.isFrozen(event)).toBe(true);
		expect(Object.isFrozen(event.headers)).toBe(true);
	});

	it("should default missing bodies to empty buffers", () => {
		const bare = createCallbackEvent({ method: "GET", path: "/sync", status: 504 });

		expect(bare.requestBody.length).toBe(0);
		expect(bare.responseBody.length).toBe(0);
		expect(bare.headers).toEqual({});
	});

	it("should reject malformed payloads", () => {
		expect(() => decodeCallbackEvent({ method: "GET" })).toThrow(FaultlineError);
		expect(() => decodeCallbackEvent({ method: "GET" })).toThrow(/^Malformed callback payload: /);
	});

	it("should parse JSON bodies", () => {
		expect(parseJsonBody(Buffer.from('{"rooms":{"join":{}}}'))).toEqual({ rooms: { join: {} } });
		expect(parseJsonBody(Buffer.alloc(0))).toBeUndefined();
		expect(parseJsonBody(Buffer.from("not json"))).toBeUndefined();
	});
});
