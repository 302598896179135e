/**
 * HTTP helpers shared by the proxy and the callback relay server
 */

import type * as http from "node:http";

/**
 * Read the full request body
 */
export function readBody(req: http.IncomingMessage): Promise<Buffer> {
	return new Promise((resolve, reject) => {
		const chunks: Buffer[] = [];

		req.on("data", (chunk: Buffer) => {
			chunks.push(chunk);
		});
		req.on("end", () => {
			resolve(Buffer.concat(chunks));
		});
		req.on("error", reject);
	});
}

/**
 * Read the request body as JSON (undefined for an empty body)
 * @throws SyntaxError on invalid JSON
 */
export async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
	const body = await readBody(req);
	if (body.length === 0) {
		return undefined;
	}
	return JSON.parse(body.toString("utf-8"));
}

export function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
	const data = JSON.stringify(body);
	res.writeHead(status, {
		"content-type": "application/json",
		"content-length": Buffer.byteLength(data),
	});
	res.end(data);
}

/**
 * Start listening and resolve with the bound port
 */
export function listen(server: http.Server, port: number, host: string): Promise<number> {
	return new Promise((resolve, reject) => {
		const onError = (err: Error) => reject(err);
		server.once("error", onError);
		server.listen(port, host, () => {
			server.off("error", onError);
			const address = server.address();
			if (address === null || typeof address === "string") {
				reject(new Error(`Unexpected listen address: ${address}`));
				return;
			}
			resolve(address.port);
		});
	});
}

/**
 * Close a server, dropping idle keep-alive connections
 */
export function close(server: http.Server): Promise<void> {
	return new Promise((resolve, reject) => {
		if (!server.listening) {
			resolve();
			return;
		}
		server.close((err) => (err ? reject(err) : resolve()));
		server.closeAllConnections();
	});
}

/**
 * Flatten Node's header record into single string values
 */
export function flattenHeaders(headers: http.IncomingHttpHeaders): Record<string, string> {
	const flat: Record<string, string> = {};
	for (const [name, value] of Object.entries(headers)) {
		if (value === undefined) continue;
		flat[name] = Array.isArray(value) ? value.join(", ") : value;
	}
	return flat;
}
