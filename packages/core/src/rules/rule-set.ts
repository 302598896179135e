/**
 * Rule Set Wire Codec
 *
 * Translates between the tagged Rule union and the administrative JSON format:
 *
 * ```json
 * {
 *   "statuscode": { "return_status": 504, "filter": "~u .*\/keys/query.*", "block_request": true, "count": 3 },
 *   "callback": { "callback_url": "http://host:1234", "filter": "~u .*\/keys/query.*" }
 * }
 * ```
 *
 * Each key also accepts an array of entries. An absent key means that action
 * kind is inactive; unknown keys are rejected.
 */

import { z } from "zod";
import { FilterSyntaxError, RuleValidationError } from "../errors";
import { parseFilter } from "./filter";
import type { CallbackRule, PushableRule } from "./rule.types";

export const StatusCodeWireSchema = z
	.object({
		return_status: z.number().int().min(100).max(599),
		filter: z.string().min(1),
		block_request: z.boolean().optional(),
		count: z.number().int().positive().optional(),
	})
	.strict();
export type StatusCodeWire = z.infer<typeof StatusCodeWireSchema>;

export const CallbackWireSchema = z
	.object({
		callback_url: z.string().url(),
		filter: z.string().min(1),
	})
	.strict();
export type CallbackWire = z.infer<typeof CallbackWireSchema>;

export const RuleSetWireSchema = z
	.object({
		statuscode: z.union([StatusCodeWireSchema, z.array(StatusCodeWireSchema)]).optional(),
		callback: z.union([CallbackWireSchema, z.array(CallbackWireSchema)]).optional(),
	})
	.strict();
export type RuleSetWire = z.infer<typeof RuleSetWireSchema>;

function asArray<T>(value: T | T[] | undefined): T[] {
	if (value === undefined) return [];
	return Array.isArray(value) ? value : [value];
}

/**
 * Format zod issues as "path: message"
 */
export function formatIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => {
		const path = issue.path.join(".");
		return path ? `${path}: ${issue.message}` : issue.message;
	});
}

function checkFilters(rules: PushableRule[]): void {
	const issues: string[] = [];
	for (const rule of rules) {
		try {
			parseFilter(rule.filter);
		} catch (error) {
			if (!(error instanceof FilterSyntaxError)) throw error;
			issues.push(error.message);
		}
	}
	if (issues.length > 0) {
		throw new RuleValidationError(issues);
	}
}

/**
 * Decode and validate an administrative rule set.
 * @throws RuleValidationError
 */
export function decodeRuleSet(input: unknown): PushableRule[] {
	const parsed = RuleSetWireSchema.safeParse(input);
	if (!parsed.success) {
		throw new RuleValidationError(formatIssues(parsed.error));
	}

	const decoded: PushableRule[] = [];
	for (const entry of asArray(parsed.data.statuscode)) {
		const kind = entry.block_request ? "block" : "status-override";
		decoded.push(
			entry.count === undefined
				? { kind, status: entry.return_status, filter: entry.filter }
				: { kind, status: entry.return_status, filter: entry.filter, count: entry.count },
		);
	}
	for (const entry of asArray(parsed.data.callback)) {
		decoded.push({ kind: "callback", url: entry.callback_url, filter: entry.filter });
	}

	checkFilters(decoded);
	return decoded;
}

/**
 * Encode rules into the administrative format.
 * @throws RuleValidationError if the result would not decode
 */
export function encodeRuleSet(rules: PushableRule[]): RuleSetWire {
	const statuscode: StatusCodeWire[] = [];
	const callback: CallbackWire[] = [];

	for (const rule of rules) {
		switch (rule.kind) {
			case "status-override":
			case "block": {
				const entry: StatusCodeWire = { return_status: rule.status, filter: rule.filter };
				if (rule.kind === "block") entry.block_request = true;
				if (rule.count !== undefined) entry.count = rule.count;
				statuscode.push(entry);
				break;
			}
			case "callback":
				callback.push(toCallbackWire(rule));
				break;
		}
	}

	const wire: RuleSetWire = {};
	if (statuscode.length > 0) wire.statuscode = statuscode.length === 1 ? statuscode[0] : statuscode;
	if (callback.length > 0) wire.callback = callback.length === 1 ? callback[0] : callback;

	decodeRuleSet(wire);
	return wire;
}

function toCallbackWire(rule: CallbackRule): CallbackWire {
	return { callback_url: rule.url, filter: rule.filter };
}
