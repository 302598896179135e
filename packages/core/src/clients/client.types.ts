/**
 * Client Binding Boundary
 *
 * Chat clients under test are provided by per-language bindings that forward
 * into third-party encryption SDKs. Only the boundary lives here.
 */

import type { Waiter } from "../waiter/waiter";

export type ClientLang = "rust" | "js" | (string & {});

/**
 * Which binding to use and which chat server it talks to
 */
export interface ClientType {
	lang: ClientLang;
	/** Chat server name, e.g. "hs1" */
	hs: string;
}

export interface ClientCreationOpts {
	baseUrl: string;
	userId: string;
	deviceId?: string;
	password: string;
	/** Sync-aggregation proxy URL, when the client uses it */
	syncProxyUrl?: string;
	persistentStorage?: boolean;
}

export interface ChatEvent {
	id: string;
	sender: string;
	text: string;
	failedToDecrypt: boolean;
}

export interface ChatClient {
	readonly type: ClientLang;
	userId(): string;
	opts(): ClientCreationOpts;
	login(): Promise<void>;
	/** @returns a function that stops the sync loop */
	startSyncing(): Promise<() => Promise<void>>;
	sendMessage(roomId: string, text: string): Promise<string>;
	getEvent(roomId: string, eventId: string): Promise<ChatEvent>;
	/** Waiter finished once an event satisfying `check` appears in the room */
	waitUntilEventInRoom(roomId: string, check: (event: ChatEvent) => boolean): Waiter;
	currentAccessToken(): string;
	close(): Promise<void>;
	/** Kill without any graceful shutdown */
	forceClose(): Promise<void>;
}

export interface LanguageBindings {
	/** Called once before any test runs */
	preTestRun(contextId: string): Promise<void>;
	/** Called once after every test ran */
	postTestRun(contextId: string): Promise<void>;
	createClient(opts: ClientCreationOpts): Promise<ChatClient>;
}
