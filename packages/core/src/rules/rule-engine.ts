/**
 * Rule Engine
 *
 * Holds the active rule set and the sniffer subscriptions of one proxy and
 * decides, per request, which action (if any) applies and who gets notified.
 *
 * Budget decrement happens synchronously inside `decide()`, so two requests
 * racing the last unit are serialized by the event loop and only one wins it.
 */

import { generateId } from "../utils";
import { type Filter, type FilterInput, matchesFilter, parseFilter } from "./filter";
import type { ActionRule, CallbackRule, PushableRule, SniffRule } from "./rule.types";
import { isActionRule } from "./rule.types";

interface CompiledActionRule {
	rule: ActionRule;
	filter: Filter;
	/** undefined = unlimited */
	remaining: number | undefined;
}

interface CompiledObserverRule<R extends CallbackRule | SniffRule> {
	rule: R;
	filter: Filter;
}

export type RuleDecision =
	| { type: "pass" }
	| { type: "block"; status: number; rule: ActionRule }
	| { type: "override"; status: number; rule: ActionRule };

/**
 * A notification target resolved for one request
 */
export interface Observer {
	kind: "callback" | "sniff";
	url: string;
	/** Sniffers removed while the request was in flight stop receiving */
	isActive(): boolean;
}

export class RuleEngine {
	private rules: PushableRule[] = [];
	private actionRules: CompiledActionRule[] = [];
	private callbackRules: CompiledObserverRule<CallbackRule>[] = [];
	private generation = 0;
	private readonly sniffers = new Map<string, CompiledObserverRule<SniffRule>>();

	/**
	 * Replace the whole rule set. Budgets start fresh.
	 * @throws FilterSyntaxError
	 */
	replaceRules(rules: PushableRule[]): void {
		const actionRules: CompiledActionRule[] = [];
		const callbackRules: CompiledObserverRule<CallbackRule>[] = [];

		for (const rule of rules) {
			const filter = parseFilter(rule.filter);
			if (isActionRule(rule)) {
				actionRules.push({ rule, filter, remaining: rule.count });
			} else {
				callbackRules.push({ rule, filter });
			}
		}

		this.rules = [...rules];
		this.actionRules = actionRules;
		this.callbackRules = callbackRules;
		this.generation++;
	}

	getRules(): PushableRule[] {
		return [...this.rules];
	}

	/**
	 * Remaining budget of each action rule, in push order (undefined = unlimited)
	 */
	getBudgets(): (number | undefined)[] {
		return this.actionRules.map((compiled) => compiled.remaining);
	}

	/**
	 * Pick the first action rule that matches and still has budget
	 */
	decide(input: FilterInput): RuleDecision {
		for (const compiled of this.actionRules) {
			if (compiled.remaining === 0 || !matchesFilter(compiled.filter, input)) {
				continue;
			}
			if (compiled.remaining !== undefined) {
				compiled.remaining--;
			}
			const { rule } = compiled;
			return rule.kind === "block"
				? { type: "block", status: rule.status, rule }
				: { type: "override", status: rule.status, rule };
		}
		return { type: "pass" };
	}

	/**
	 * Callback rules and sniffers that observe this request
	 */
	observersFor(input: FilterInput): Observer[] {
		const observers: Observer[] = [];
		const generation = this.generation;

		for (const { rule, filter } of this.callbackRules) {
			if (matchesFilter(filter, input)) {
				observers.push({ kind: "callback", url: rule.url, isActive: () => this.generation === generation });
			}
		}
		for (const [id, { rule, filter }] of this.sniffers) {
			if (matchesFilter(filter, input)) {
				observers.push({ kind: "sniff", url: rule.url, isActive: () => this.sniffers.has(id) });
			}
		}
		return observers;
	}

	/**
	 * @returns subscription id
	 * @throws FilterSyntaxError
	 */
	addSniffer(filter: string, url: string): string {
		const id = generateId("sniffer_");
		this.sniffers.set(id, { rule: { kind: "sniff", url, filter }, filter: parseFilter(filter) });
		return id;
	}

	removeSniffer(id: string): boolean {
		return this.sniffers.delete(id);
	}

	getSniffers(): SniffRule[] {
		return [...this.sniffers.values()].map(({ rule }) => rule);
	}

	clearSniffers(): void {
		this.sniffers.clear();
	}
}
