/**
 * Callback Payload
 *
 * JSON body POSTed by the proxy to callback and sniffer URLs. Bodies travel as
 * base64 so binary payloads survive the round trip.
 */

import { z } from "zod";
import { FaultlineError } from "../errors";
import { formatIssues } from "../rules/rule-set";
import type { CallbackEvent } from "../rules/rule.types";

export const CallbackPayloadSchema = z
	.object({
		method: z.string(),
		path: z.string(),
		status: z.number().int(),
		headers: z.record(z.string()),
		request_body: z.string(),
		response_body: z.string(),
	})
	.strict();
export type CallbackPayload = z.infer<typeof CallbackPayloadSchema>;

/**
 * Build a frozen CallbackEvent
 */
export function createCallbackEvent(fields: {
	method: string;
	path: string;
	status: number;
	headers?: Record<string, string>;
	requestBody?: Buffer;
	responseBody?: Buffer;
}): CallbackEvent {
	return Object.freeze({
		method: fields.method,
		path: fields.path,
		status: fields.status,
		headers: Object.freeze({ ...fields.headers }),
		requestBody: fields.requestBody ?? Buffer.alloc(0),
		responseBody: fields.responseBody ?? Buffer.alloc(0),
	});
}

export function encodeCallbackEvent(event: CallbackEvent): CallbackPayload {
	return {
		method: event.method,
		path: event.path,
		status: event.status,
		headers: { ...event.headers },
		request_body: event.requestBody.toString("base64"),
		response_body: event.responseBody.toString("base64"),
	};
}

/**
 * @throws FaultlineError on a malformed payload
 */
export function decodeCallbackEvent(input: unknown): CallbackEvent {
	const parsed = CallbackPayloadSchema.safeParse(input);
	if (!parsed.success) {
		throw new FaultlineError(`Malformed callback payload: ${formatIssues(parsed.error).join("; ")}`);
	}
	const payload = parsed.data;
	return createCallbackEvent({
		method: payload.method,
		path: payload.path,
		status: payload.status,
		headers: payload.headers,
		requestBody: Buffer.from(payload.request_body, "base64"),
		responseBody: Buffer.from(payload.response_body, "base64"),
	});
}

/**
 * Parse a body captured in a CallbackEvent as JSON (undefined when empty or not JSON)
 */
export function parseJsonBody(body: Buffer): unknown {
	if (body.length === 0) return undefined;
	try {
		return JSON.parse(body.toString("utf-8"));
	} catch {
		return undefined;
	}
}
