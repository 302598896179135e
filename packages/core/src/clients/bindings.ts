/**
 * Language Binding Registry
 */

import { FaultlineError } from "../errors";
import type { ChatEvent, ClientLang, ClientType, LanguageBindings } from "./client.types";

const registry = new Map<ClientLang, LanguageBindings>();

export function setLanguageBinding(lang: ClientLang, bindings: LanguageBindings): void {
	registry.set(lang, bindings);
}

/**
 * @throws FaultlineError for an unknown language
 */
export function getLanguageBinding(lang: ClientLang): LanguageBindings {
	const bindings = registry.get(lang);
	if (!bindings) {
		throw new FaultlineError(`unknown language: ${lang}`);
	}
	return bindings;
}

export function getRegisteredLanguages(): ClientLang[] {
	return [...registry.keys()];
}

export function clearLanguageBindings(): void {
	registry.clear();
}

/**
 * Parse a client matrix like "rj,jr" (r = rust, j = js) into client pairs.
 * Every pair talks to `hs`.
 */
export function parseClientMatrix(matrix: string, hs = "hs1"): [ClientType, ClientType][] {
	const langs: Record<string, ClientLang> = { r: "rust", j: "js" };
	return matrix
		.split(",")
		.map((entry) => entry.trim())
		.filter(Boolean)
		.map((entry) => {
			if (entry.length !== 2 || !langs[entry[0]] || !langs[entry[1]]) {
				throw new FaultlineError(`invalid client matrix entry "${entry}"`);
			}
			return [
				{ lang: langs[entry[0]], hs },
				{ lang: langs[entry[1]], hs },
			];
		});
}

/**
 * Event check matching a plain-text body
 */
export function checkEventHasBody(body: string): (event: ChatEvent) => boolean {
	return (event) => event.text === body;
}
