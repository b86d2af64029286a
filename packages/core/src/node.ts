import { createServer, type IncomingHttpHeaders, type OutgoingHttpHeaders } from "node:http";
import { httpErrorResponse } from "./dispatcher";
import { describeError } from "./error-boundary";
import { MethodNotAllowedError, ProcessTermination } from "./errors";
import type { AppLogger, ListenOptions, Server } from "./types";

/** Fetch-style request handler, as exposed by `app.handle` */
export type FetchHandler = (req: Request) => Promise<Response>;

/**
 * The parts of `http.IncomingMessage` the adapter reads.
 */
export interface NodeRequest extends AsyncIterable<unknown> {
	method?: string;
	url?: string;
	headers: IncomingHttpHeaders;
	/** TLS sockets carry an `encrypted` flag, which selects the https scheme */
	socket?: object;
}

/**
 * The parts of `http.ServerResponse` the adapter writes.
 */
export interface NodeResponse {
	headersSent: boolean;
	writeHead(status: number, headers?: OutgoingHttpHeaders): unknown;
	end(chunk?: string | Uint8Array): unknown;
	destroy(error?: Error): unknown;
}

/** Methods the Web `Request` class refuses to construct */
export const UNSUPPORTED_METHODS: ReadonlySet<string> = new Set(["CONNECT", "TRACE", "TRACK"]);

export interface NodeHandlerOptions {
	/** Receives failures that happen outside the application's error boundary */
	logger: AppLogger;
	/**
	 * Answers requests whose method cannot be represented as a Web `Request`.
	 * Default: 405 "Method Not Allowed"
	 */
	rejectRequest?: (method: string, path: string) => Response | Promise<Response>;
}

/**
 * Converts a Node.js request into a Web `Request`, runs it through `handler` and writes the result back.
 *
 * @param handler - Fetch-style handler, usually `app.handle`
 * @param nodeReq - Node.js IncomingMessage object
 * @param nodeRes - Node.js ServerResponse object
 * @throws {ProcessTermination} Passed through after dropping the connection
 *
 * @example
 * ```typescript
 * import { createServer } from "node:http";
 *
 * createServer((req, res) => handleNode(app.handle, req, res, { logger })).listen(3000);
 * ```
 */
export async function handleNode(handler: FetchHandler, nodeReq: NodeRequest, nodeRes: NodeResponse, options: NodeHandlerOptions): Promise<void> {
	const method = (nodeReq.method ?? "GET").toUpperCase();

	let response: Response;
	try {
		if (UNSUPPORTED_METHODS.has(method)) {
			const path = (nodeReq.url ?? "/").split("?", 1)[0] || "/";
			response = options.rejectRequest ? await options.rejectRequest(method, path) : httpErrorResponse(new MethodNotAllowedError());
		} else {
			response = await handler(await toWebRequest(nodeReq));
		}
	} catch (err) {
		if (err instanceof ProcessTermination) {
			nodeRes.destroy();
			throw err;
		}
		options.logger.error(`Failed to handle ${method} ${nodeReq.url ?? "/"}: ${err instanceof Error ? err.message : String(err)}`, {
			method,
			url: nodeReq.url,
			error: describeError(err),
		});
		if (!nodeRes.headersSent) {
			nodeRes.writeHead(500, { "Content-Type": "text/plain; charset=utf-8" });
		}
		nodeRes.end("Internal Server Error");
		return;
	}

	const headers: OutgoingHttpHeaders = {};
	response.headers.forEach((value, key) => {
		if (key !== "set-cookie") headers[key] = value;
	});
	const cookies = response.headers.getSetCookie();
	if (cookies.length > 0) {
		headers["set-cookie"] = cookies;
	}

	nodeRes.writeHead(response.status, headers);
	if (response.body) {
		nodeRes.end(new Uint8Array(await response.arrayBuffer()));
	} else {
		nodeRes.end();
	}
}

/**
 * Builds a Web `Request` from a Node.js request, buffering the body for methods that carry one.
 * A `Host` header that does not form a valid URL is replaced by `localhost`.
 */
export async function toWebRequest(nodeReq: NodeRequest): Promise<Request> {
	const method = nodeReq.method ?? "GET";

	const headers = new Headers();
	for (const [key, value] of Object.entries(nodeReq.headers)) {
		if (value === undefined) continue;
		if (Array.isArray(value)) {
			value.forEach((v) => headers.append(key, v));
		} else {
			headers.set(key, value);
		}
	}

	let body: Buffer | null = null;
	if (method !== "GET" && method !== "HEAD") {
		const chunks: Buffer[] = [];
		for await (const chunk of nodeReq) {
			chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
		}
		if (chunks.length > 0) {
			body = Buffer.concat(chunks);
		}
	}

	return new Request(requestUrl(nodeReq), { method, headers, body });
}

function requestUrl(nodeReq: NodeRequest): string {
	const protocol = nodeReq.socket && "encrypted" in nodeReq.socket ? "https" : "http";
	const path = nodeReq.url ?? "/";
	const host = nodeReq.headers.host;

	if (typeof host === "string" && URL.canParse(`${protocol}://${host}${path}`)) {
		return `${protocol}://${host}${path}`;
	}
	return `${protocol}://localhost${path}`;
}

/**
 * Starts a `node:http` server for a fetch-style handler.
 *
 * A {@link ProcessTermination} escaping a request stops the server and sets `process.exitCode`,
 * so the process ends once open connections close.
 */
export async function listen(handler: FetchHandler, nodeOptions: NodeHandlerOptions, options: ListenOptions = {}): Promise<Server> {
	const { port = 3000, hostname = "localhost", onListen } = options;
	const { logger } = nodeOptions;

	const nodeServer = createServer((req, res) => {
		handleNode(handler, req, res, nodeOptions).catch((err: unknown) => {
			if (err instanceof ProcessTermination) {
				process.exitCode = err.exitCode;
				nodeServer.close();
				nodeServer.closeAllConnections();
				return;
			}
			logger.error("Failed to write response.", { error: err instanceof Error ? err.message : String(err) });
			if (!res.headersSent) {
				res.writeHead(500, { "Content-Type": "text/plain; charset=utf-8" });
			}
			res.end("Internal Server Error");
		});
	});

	// Start listening
	await new Promise<void>((resolve, reject) => {
		const errorHandler = (err: Error): void => {
			reject(err);
		};

		nodeServer.on("error", errorHandler);

		nodeServer.listen(port, hostname, () => {
			nodeServer.off("error", errorHandler);
			resolve();
		});
	});

	const address = nodeServer.address();
	const server: Server = {
		port: address !== null && typeof address === "object" ? address.port : port,
		hostname,
		stop: async (): Promise<void> => {
			return new Promise<void>((resolve, reject) => {
				nodeServer.close((err?: Error) => {
					if (err) {
						reject(err);
					} else {
						resolve();
					}
				});
			});
		},
	};

	logger.info(`Listening on http://${server.hostname}:${server.port}`);
	if (onListen) {
		onListen({ port: server.port, hostname: server.hostname });
	}

	return server;
}
