/**
 * Filter Expressions
 *
 * Grammar (predicates separated by whitespace are ANDed):
 *
 *   ~u <regex>     request path + query
 *   ~hq <regex>    any request header, as a "name: value" line
 *   ~m <method>    request method (case-insensitive)
 *   !<predicate>   negation
 *
 * Values may be wrapped in single or double quotes to include whitespace.
 * Regexes are searched (not anchored) and case-insensitive.
 */

import { FilterSyntaxError } from "../errors";

/**
 * Request view that filters are evaluated against
 */
export interface FilterInput {
	method: string;
	/** Path including the query string */
	url: string;
	headers: Record<string, string | string[] | undefined>;
}

export type FilterPredicate =
	| { type: "url"; pattern: RegExp; negate: boolean }
	| { type: "header"; pattern: RegExp; negate: boolean }
	| { type: "method"; method: string; negate: boolean };

export interface Filter {
	readonly expression: string;
	readonly predicates: readonly FilterPredicate[];
}

const OPERATORS = ["~u", "~hq", "~m"] as const;
type Operator = (typeof OPERATORS)[number];

function isOperator(token: string): token is Operator {
	return OPERATORS.some((operator) => operator === token);
}

/**
 * Split an expression into tokens, honouring quotes
 */
export function tokenize(expression: string): string[] {
	const tokens: string[] = [];
	let current = "";
	let quote: string | null = null;
	let quoted = false;

	for (const ch of expression) {
		if (quote) {
			if (ch === quote) {
				quote = null;
			} else {
				current += ch;
			}
			continue;
		}
		if (ch === '"' || ch === "'") {
			quote = ch;
			quoted = true;
			continue;
		}
		if (/\s/.test(ch)) {
			if (current || quoted) {
				tokens.push(current);
			}
			current = "";
			quoted = false;
			continue;
		}
		current += ch;
	}

	if (quote) {
		throw new FilterSyntaxError(expression, "unterminated quote");
	}
	if (current || quoted) {
		tokens.push(current);
	}
	return tokens;
}

function compileRegex(expression: string, source: string): RegExp {
	try {
		return new RegExp(source, "i");
	} catch (error) {
		throw new FilterSyntaxError(expression, error instanceof Error ? error.message : String(error));
	}
}

/**
 * Parse a filter expression.
 * @throws FilterSyntaxError
 */
export function parseFilter(expression: string): Filter {
	const tokens = tokenize(expression);
	if (tokens.length === 0) {
		throw new FilterSyntaxError(expression, "expression is empty");
	}

	const predicates: FilterPredicate[] = [];
	let i = 0;
	while (i < tokens.length) {
		let token = tokens[i];
		let negate = false;

		if (token === "&") {
			i++;
			continue;
		}
		if (token === "!") {
			negate = true;
			i++;
			token = tokens[i] ?? "";
		} else if (token.startsWith("!")) {
			negate = true;
			token = token.slice(1);
		}

		if (!isOperator(token)) {
			throw new FilterSyntaxError(expression, `unknown predicate "${token}"`);
		}

		const value = tokens[i + 1];
		if (value === undefined) {
			throw new FilterSyntaxError(expression, `${token} requires a value`);
		}
		i += 2;

		switch (token) {
			case "~u":
				predicates.push({ type: "url", pattern: compileRegex(expression, value), negate });
				break;
			case "~hq":
				predicates.push({ type: "header", pattern: compileRegex(expression, value), negate });
				break;
			case "~m":
				predicates.push({ type: "method", method: value.toUpperCase(), negate });
				break;
		}
	}

	return { expression, predicates };
}

function headerLines(headers: FilterInput["headers"]): string[] {
	const lines: string[] = [];
	for (const [name, value] of Object.entries(headers)) {
		if (value === undefined) continue;
		for (const v of Array.isArray(value) ? value : [value]) {
			lines.push(`${name}: ${v}`);
		}
	}
	return lines;
}

function evaluatePredicate(predicate: FilterPredicate, input: FilterInput): boolean {
	switch (predicate.type) {
		case "url":
			return predicate.pattern.test(input.url);
		case "header":
			return headerLines(input.headers).some((line) => predicate.pattern.test(line));
		case "method":
			return input.method.toUpperCase() === predicate.method;
	}
}

/**
 * Evaluate a parsed filter against a request
 */
export function matchesFilter(filter: Filter, input: FilterInput): boolean {
	return filter.predicates.every((predicate) => evaluatePredicate(predicate, input) !== predicate.negate);
}

/**
 * Filter matching any URL containing `path`, e.g. "/sync" => "~u .*\/sync.*"
 */
export function endpointFilter(path: string): string {
	const escaped = path.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
	return `~u .*${escaped}.*`;
}
