/**
 * Rule Types
 *
 * A rule is a filter plus exactly one action. Status-override and block rules are
 * "action rules" (at most one fires per request); callback rules observe every
 * matching exchange; sniff rules are registered through the sniffer channel and
 * are never part of a pushed rule set.
 */

/**
 * Forward the request, then rewrite the response status
 */
export interface StatusOverrideRule {
	kind: "status-override";
	status: number;
	filter: string;
	/** Matches after which the rule stops applying (absent = unlimited) */
	count?: number;
}

/**
 * Short-circuit the request with `status`; upstream never sees it
 */
export interface BlockRule {
	kind: "block";
	status: number;
	filter: string;
	count?: number;
}

/**
 * POST every matching exchange to `url`
 */
export interface CallbackRule {
	kind: "callback";
	url: string;
	filter: string;
}

/**
 * Read-only observer subscription
 */
export interface SniffRule {
	kind: "sniff";
	url: string;
	filter: string;
}

export type ActionRule = StatusOverrideRule | BlockRule;

export type Rule = ActionRule | CallbackRule | SniffRule;

/**
 * Rules accepted by a push (sniffers have their own channel)
 */
export type PushableRule = ActionRule | CallbackRule;

export function isActionRule(rule: Rule): rule is ActionRule {
	return rule.kind === "status-override" || rule.kind === "block";
}

/**
 * Observation of one proxied exchange. Frozen once delivered.
 */
export interface CallbackEvent {
	readonly method: string;
	readonly path: string;
	readonly status: number;
	readonly headers: Readonly<Record<string, string>>;
	readonly requestBody: Buffer;
	readonly responseBody: Buffer;
}

// =============================================================================
// Builders
// =============================================================================

export const rules = {
	statusOverride(status: number, filter: string, count?: number): StatusOverrideRule {
		return count === undefined ? { kind: "status-override", status, filter } : { kind: "status-override", status, filter, count };
	},
	block(status: number, filter: string, count?: number): BlockRule {
		return count === undefined ? { kind: "block", status, filter } : { kind: "block", status, filter, count };
	},
	callback(url: string, filter: string): CallbackRule {
		return { kind: "callback", url, filter };
	},
};
