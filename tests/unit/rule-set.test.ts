/**
 * Rule Set Codec Tests
 *
 * Administrative wire format <-> tagged Rule union.
 */

import { describe, expect, it } from "vitest";
import { decodeRuleSet, encodeRuleSet, RuleValidationError, rules } from "faultline";

describe("decodeRuleSet", () => {
	it("should decode a single status code entry", () => {
		const decoded = decodeRuleSet({
			statuscode: { return_status: 504, filter: "~u .*/keys/query.*", block_request: true, count: 3 },
		});

		expect(decoded).toEqual([{ kind: "block", status: 504, filter: "~u .*/keys/query.*", count: 3 }]);
	});

	it("should decode a status override without block_request", () => {
		const decoded = decodeRuleSet({ statuscode: { return_status: 500, filter: "~u .*/sendToDevice.*" } });

		expect(decoded).toEqual([{ kind: "status-override", status: 500, filter: "~u .*/sendToDevice.*" }]);
	});

	it("should decode arrays with status rules before callbacks", () => {
		const decoded = decodeRuleSet({
			callback: { callback_url: "http://127.0.0.1:4000", filter: "~u a" },
			statuscode: [
				{ return_status: 504, filter: "~u a", block_request: true },
				{ return_status: 502, filter: "~u b", block_request: false },
			],
		});

		expect(decoded).toEqual([
			{ kind: "block", status: 504, filter: "~u a" },
			{ kind: "status-override", status: 502, filter: "~u b" },
			{ kind: "callback", url: "http://127.0.0.1:4000", filter: "~u a" },
		]);
	});

	it("should decode an empty object as no rules", () => {
		expect(decodeRuleSet({})).toEqual([]);
	});

	it("should reject unknown top-level keys", () => {
		let error: unknown;
		try {
			decodeRuleSet({ statuscode: { return_status: 504, filter: "~u a" }, delay: { ms: 100 } });
		} catch (e) {
			error = e;
		}

		expect(error).toBeInstanceOf(RuleValidationError);
		expect(error).toHaveProperty("issues", ["Unrecognized key(s) in object: 'delay'"]);
	});

	it("should reject unknown keys inside an entry", () => {
		expect(() => decodeRuleSet({ statuscode: { return_status: 504, filter: "~u a", retry: true } })).toThrow(
			RuleValidationError,
		);
	});

	it("should reject out of range statuses and non-positive counts", () => {
		expect(() => decodeRuleSet({ statuscode: { return_status: 700, filter: "~u a" } })).toThrow(RuleValidationError);
		expect(() => decodeRuleSet({ statuscode: { return_status: 504, filter: "~u a", count: 0 } })).toThrow(
			RuleValidationError,
		);
	});

	it("should reject a callback without a valid URL", () => {
		expect(() => decodeRuleSet({ callback: { callback_url: "not a url", filter: "~u a" } })).toThrow(
			RuleValidationError,
		);
	});

	it("should reject a non-object body", () => {
		expect(() => decodeRuleSet(null)).toThrow(RuleValidationError);
		expect(() => decodeRuleSet([])).toThrow(RuleValidationError);
	});

	it("should reject an invalid filter expression", () => {
		let error: unknown;
		try {
			decodeRuleSet({ statuscode: { return_status: 504, filter: "~z nope" } });
		} catch (e) {
			error = e;
		}

		expect(error).toBeInstanceOf(RuleValidationError);
		expect(error).toHaveProperty("issues", [`Invalid filter expression "~z nope": unknown predicate "~z"`]);
	});
});

describe("encodeRuleSet", () => {
	it("should encode a single rule of a kind as an object", () => {
		expect(encodeRuleSet([rules.block(504, "~u .*/keys/query.*", 3)])).toEqual({
			statuscode: { return_status: 504, filter: "~u .*/keys/query.*", block_request: true, count: 3 },
		});
	});

	it("should encode several rules of a kind as an array", () => {
		expect(
			encodeRuleSet([
				rules.statusOverride(500, "~u a"),
				rules.statusOverride(502, "~u b"),
				rules.callback("http://127.0.0.1:4000", "~u a"),
			]),
		).toEqual({
			statuscode: [
				{ return_status: 500, filter: "~u a" },
				{ return_status: 502, filter: "~u b" },
			],
			callback: { callback_url: "http://127.0.0.1:4000", filter: "~u a" },
		});
	});

	it("should encode no rules as an empty object", () => {
		expect(encodeRuleSet([])).toEqual({});
	});

	it("should decode back to the same rules", () => {
		const original = [rules.block(504, "~u a", 2), rules.callback("http://127.0.0.1:4000", "~u a")];

		expect(decodeRuleSet(encodeRuleSet(original))).toEqual(original);
	});

	it("should refuse to encode an invalid filter", () => {
		expect(() => encodeRuleSet([rules.block(504, "~u")])).toThrow(RuleValidationError);
	});
});
