import type { ResponseBuilder } from "./response";

/**
 * HTTP methods supported by the framework.
 *
 * @example
 * ```typescript
 * const method: Method = "GET";
 * app.addRoute("/users", handler, { methods: [method] });
 * ```
 */
export type Method = "GET" | "POST" | "PUT" | "DELETE" | "PATCH" | "OPTIONS" | "HEAD";

/** Named path parameters extracted from a request path. */
export type Params = Record<string, string>;

/**
 * Result of matching a request path against a route pattern: the bound parameters, or `null` when the path does not match.
 *
 * @example
 * ```typescript
 * const result: MatchResult = { name: "Ada" };
 * ```
 */
export type MatchResult = Params | null;

/** Value a handler may produce. Returning nothing means the mutated {@link ResponseBuilder} is the response. */
export type HandlerResult = Response | ResponseBuilder | void;

/**
 * Function-style route handler. Receives the request, a mutable response and the bound path parameters.
 * It either mutates the response in place or returns a finished `Response`.
 *
 * @example
 * ```typescript
 * const greet: Handler = (req, res, params) => {
 *   res.text(`Hello, ${params.name}`);
 * };
 *
 * app.route("/hello/{name}", greet);
 * ```
 */
export type Handler = (req: Request, res: ResponseBuilder, params: Params) => HandlerResult | Promise<HandlerResult>;

/**
 * Resource-style handler: an object with one operation per lowercase HTTP method name.
 *
 * @example
 * ```typescript
 * class Books implements Resource {
 *   get(req: Request, res: ResponseBuilder) {
 *     res.text("Books Page");
 *   }
 * }
 *
 * app.route("/book", new Books());
 * ```
 */
export type Resource = Partial<Record<Lowercase<Method>, Handler>>;

/** Options accepted when registering a route. */
export interface RouteOptions {
	/** Methods the route answers. Defaults to GET and HEAD for functions, and every implemented operation for resources. */
	methods?: Method[];
	/** Unique name used for reverse routing with `app.url()`. */
	name?: string;
}

/** Public view of a registered route. */
export interface RouteInfo {
	path: string;
	methods: Method[];
	name?: string;
}

/**
 * Handler for a mounted sub-tree. Receives the request and the path below the mount prefix (always starting with "/").
 */
export type MountHandler = (req: Request, subpath: string) => Response | Promise<Response>;

/**
 * Per-request state owned by the dispatcher for the duration of one request.
 */
export interface DispatchContext {
	/** Request method as sent by the client (may be outside {@link Method}) */
	method: string;
	/** Request pathname, still percent-encoded */
	path: string;
	/** Parameters bound by the matched route, empty until lookup succeeds */
	params: Params;
	debug: boolean;
	/** Epoch milliseconds at which dispatch started */
	startedAt: number;
}

/**
 * Logging capability injected into the application. A `Logger` from `@rabbit-company/logger` satisfies it.
 */
export interface AppLogger {
	error(message: string, metadata?: Record<string, unknown>): void;
	warn(message: string, metadata?: Record<string, unknown>): void;
	info(message: string, metadata?: Record<string, unknown>): void;
	debug(message: string, metadata?: Record<string, unknown>): void;
}

/**
 * Template collaborator: turns a template name and a context into markup.
 */
export interface TemplateRenderer {
	render(name: string, context?: Record<string, unknown>): string;
}

/**
 * Options for creating an {@link App}.
 */
export interface AppOptions {
	/**
	 * Include stack traces in 500 responses and log at debug level.
	 * Default: false
	 */
	debug?: boolean;
	/**
	 * Application name, logged at startup.
	 * Default: "Zephyr"
	 */
	name?: string;
	/**
	 * Application version, logged at startup.
	 * Default: "0.1.0"
	 */
	version?: string;
	/**
	 * Level for the default logger. Ignored when `logger` is provided.
	 * Default: Levels.INFO, or Levels.DEBUG in debug mode
	 */
	logLevel?: number;
	/** Logger instance to use. If not provided, a console logger will be created. */
	logger?: AppLogger;
	/** Template renderer used by `app.render()` and by debug error pages. */
	templates?: TemplateRenderer;
}

/**
 * Configuration options for starting a server.
 */
export interface ListenOptions {
	/** Port number to listen on (default: 3000) */
	port?: number;
	/** Hostname to bind to (default: "localhost") */
	hostname?: string;
	/** Callback invoked when the server starts listening */
	onListen?: (info: { port: number; hostname: string }) => void;
}

/**
 * A running server returned by `app.listen()`.
 */
export interface Server {
	/** Port the server is listening on */
	port: number;
	/** Hostname the server is bound to */
	hostname: string;
	/** Gracefully stops the server */
	stop(): Promise<void>;
}
