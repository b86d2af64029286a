import { ConsoleTransport, Levels, Logger } from "@rabbit-company/logger";
import { Dispatcher } from "./dispatcher";
import { ErrorBoundary } from "./error-boundary";
import { MethodNotAllowedError, RouteNotFoundError, RouteTableFrozenError, TemplatesNotConfiguredError } from "./errors";
import { handleNode, listen, type NodeHandlerOptions, type NodeRequest, type NodeResponse } from "./node";
import { allowedMethods, RouteTable, type RouteEntry } from "./route-table";
import type {
	AppLogger,
	AppOptions,
	DispatchContext,
	Handler,
	ListenOptions,
	Method,
	MountHandler,
	Params,
	Resource,
	RouteInfo,
	RouteOptions,
	Server,
	TemplateRenderer,
} from "./types";

/** A handler mounted below a path prefix */
interface Mount {
	prefix: string;
	handler: MountHandler;
}

const encoder = new TextEncoder();

/**
 * Minimal web application: ordered routes with `{name}` placeholders, function or resource handlers,
 * mounted sub-trees and a single error boundary around every dispatch.
 *
 * Routes are registered during setup. `listen()` freezes the route table, after which registration throws.
 *
 * @example
 * ```typescript
 * const app = new App({ debug: true });
 *
 * app.route("/hello/{name}", (req, res, { name }) => {
 *   res.text(`Hello, ${name}`);
 * });
 *
 * app.route("/book", {
 *   get: (req, res) => res.text("Books Page"),
 *   post: (req, res) => res.text("Book created", 201),
 * });
 *
 * await app.listen({ port: 8000 });
 * ```
 */
export class App {
	readonly debug: boolean;
	readonly name: string;
	readonly version: string;
	readonly logger: AppLogger;
	readonly templates?: TemplateRenderer;

	private readonly table = new RouteTable();
	private readonly mounts: Mount[] = [];
	private readonly dispatcher: Dispatcher;
	private readonly boundary: ErrorBoundary;

	/**
	 * Creates a new application
	 */
	constructor(options: AppOptions = {}) {
		const { debug = false, name = "Zephyr", version = "0.1.0", logLevel = debug ? Levels.DEBUG : Levels.INFO, templates } = options;

		this.debug = debug;
		this.name = name;
		this.version = version;
		this.templates = templates;
		this.logger =
			options.logger ||
			new Logger({
				level: logLevel,
				transports: [new ConsoleTransport()],
			});

		this.dispatcher = new Dispatcher(this.table, this.logger);
		this.boundary = new ErrorBoundary({ logger: this.logger, templates });

		this.handle = this.handle.bind(this);
		this.handleNode = this.handleNode.bind(this);
		this.reject = this.reject.bind(this);

		this.logger.info(`Application initialized: ${name} v${version}`, { debug });
	}

	/**
	 * Registers a route and returns its metadata.
	 *
	 * @param path - Route template (e.g. `/users/{id}`)
	 * @param handler - Function handler, or resource object with `get`, `post`, ... operations
	 * @param options - Allowed methods (functions default to GET and HEAD) and route name
	 * @throws {DuplicateRouteError} When the path is already registered for one of the methods
	 *
	 * @example
	 * ```typescript
	 * const info = app.addRoute("/users/{id}", showUser, { name: "user" });
	 * console.log(info.methods); // ["GET", "HEAD"]
	 * ```
	 */
	addRoute(path: string, handler: Handler | Resource, options: RouteOptions = {}): RouteInfo {
		let route: RouteEntry;
		try {
			route = this.table.register(path, handler, options);
		} catch (err) {
			this.logger.error(`Failed to register route '${path}': ${err instanceof Error ? err.message : String(err)}`);
			throw err;
		}

		const methods = allowedMethods(route);
		this.logger.info(`Route registered: ${methods.join(",")} ${path}`, options.name ? { name: options.name } : undefined);

		return {
			path: route.pattern.source,
			methods,
			...(route.name !== undefined ? { name: route.name } : {}),
		};
	}

	/**
	 * Registers a route. Same as {@link App.addRoute} but returns the application for chaining.
	 *
	 * @example
	 * ```typescript
	 * app
	 *   .route("/", home)
	 *   .route("/about", about, { name: "about" })
	 *   .route("/items", items, { methods: ["GET", "POST"] });
	 * ```
	 */
	route(path: string, handler: Handler | Resource, options?: RouteOptions): this {
		this.addRoute(path, handler, options);
		return this;
	}

	/**
	 * Registers a GET route handler.
	 *
	 * @example
	 * ```typescript
	 * app.get("/users/{id}", async (req, res, params) => {
	 *   res.json(await getUserById(params.id));
	 * });
	 * ```
	 */
	get(path: string, handler: Handler, name?: string): this {
		return this.method("GET", path, handler, name);
	}

	/** Registers a POST route handler. */
	post(path: string, handler: Handler, name?: string): this {
		return this.method("POST", path, handler, name);
	}

	/** Registers a PUT route handler. */
	put(path: string, handler: Handler, name?: string): this {
		return this.method("PUT", path, handler, name);
	}

	/** Registers a DELETE route handler. */
	delete(path: string, handler: Handler, name?: string): this {
		return this.method("DELETE", path, handler, name);
	}

	/** Registers a PATCH route handler. */
	patch(path: string, handler: Handler, name?: string): this {
		return this.method("PATCH", path, handler, name);
	}

	/** Registers an OPTIONS route handler. */
	options(path: string, handler: Handler, name?: string): this {
		return this.method("OPTIONS", path, handler, name);
	}

	/**
	 * Registers a HEAD route handler.
	 * HEAD responses have their body stripped while status and headers are kept.
	 */
	head(path: string, handler: Handler, name?: string): this {
		return this.method("HEAD", path, handler, name);
	}

	private method(method: Method, path: string, handler: Handler, name?: string): this {
		return this.route(path, handler, name !== undefined ? { methods: [method], name } : { methods: [method] });
	}

	/**
	 * Mounts a handler below a path prefix. Mounts are checked before routes, in the order they were added,
	 * and like routes they must be added before the application is frozen.
	 *
	 * @param prefix - Path prefix without trailing slash, e.g. `/static`
	 * @param handler - Receives the request and the path below the prefix
	 *
	 * @example
	 * ```typescript
	 * app.mount("/static", serveStatic({ directory: "static" }));
	 * // GET /static/css/site.css is answered with static/css/site.css
	 * ```
	 */
	mount(prefix: string, handler: MountHandler): this {
		if (!prefix.startsWith("/") || prefix === "/" || prefix.endsWith("/")) {
			throw new Error(`Invalid mount prefix '${prefix}': it must start with '/' and not end with one.`);
		}
		if (this.table.isFrozen) throw new RouteTableFrozenError(prefix);
		this.mounts.push({ prefix, handler });
		this.logger.info(`Mounted handler at ${prefix}`);
		return this;
	}

	/**
	 * Freezes the route table. Later registrations throw `RouteTableFrozenError`.
	 */
	freeze(): this {
		this.table.freeze();
		return this;
	}

	/**
	 * Gets all registered routes with their metadata, in lookup order.
	 */
	getRoutes(): RouteInfo[] {
		return this.table.list();
	}

	/**
	 * Builds the path of a named route.
	 *
	 * @throws {RouteNotFoundError} When no route has this name
	 * @throws {PatternError} When a placeholder has no value
	 *
	 * @example
	 * ```typescript
	 * app.route("/hello/{name}", greet, { name: "greeting" });
	 * app.url("greeting", { name: "Ada Lovelace" }); // "/hello/Ada%20Lovelace"
	 * ```
	 */
	url(name: string, params: Params = {}): string {
		const route = this.table.find(name);
		if (!route) throw new RouteNotFoundError(name);
		return route.pattern.build(params);
	}

	/**
	 * Renders a template with the configured renderer and returns UTF-8 bytes.
	 *
	 * @throws {TemplatesNotConfiguredError} When the application was created without `templates`
	 *
	 * @example
	 * ```typescript
	 * app.get("/", (req, res) => {
	 *   res.bytes(app.render("index.html", { title: "Home" }), MediaTypes.HTML);
	 * });
	 * ```
	 */
	render(name: string, context: Record<string, unknown> = {}): Uint8Array {
		if (!this.templates) throw new TemplatesNotConfiguredError(name);
		return encoder.encode(this.templates.render(name, context));
	}

	/**
	 * Main request handler. Mounted handlers are tried first, then the route table; everything runs inside the
	 * error boundary.
	 *
	 * @param req - The incoming Request object
	 * @returns Promise that resolves to a Response object
	 * @throws {ProcessTermination} Logged and passed through, never answered
	 *
	 * @example
	 * ```typescript
	 * const res = await app.handle(new Request("http://localhost/hello/Ada"));
	 * console.log(await res.text()); // "Hello, Ada"
	 * ```
	 */
	async handle(req: Request): Promise<Response> {
		const ctx: DispatchContext = {
			method: req.method,
			path: new URL(req.url).pathname,
			params: {},
			debug: this.debug,
			startedAt: Date.now(),
		};

		const response = await this.boundary.run(ctx, () => {
			const mount = this.findMount(ctx.path);
			if (mount) {
				return Promise.resolve(mount.handler(req, ctx.path.slice(mount.prefix.length) || "/"));
			}
			return this.dispatcher.dispatch(req, ctx);
		});

		this.logger.info(`${ctx.method} ${ctx.path} - ${response.status} - ${Date.now() - ctx.startedAt}ms`);
		return response;
	}

	/**
	 * Request handler for Node.js that handles both request and response.
	 *
	 * @example
	 * ```typescript
	 * import { createServer } from "node:http";
	 *
	 * createServer((req, res) => app.handleNode(req, res)).listen(3000);
	 * ```
	 */
	async handleNode(nodeReq: NodeRequest, nodeRes: NodeResponse): Promise<void> {
		return handleNode(this.handle, nodeReq, nodeRes, this.nodeOptions());
	}

	/**
	 * Freezes the route table and starts a `node:http` server.
	 *
	 * @example
	 * ```typescript
	 * const server = await app.listen({ port: 8000 });
	 * // Gracefully stop the server
	 * await server.stop();
	 * ```
	 */
	async listen(options: ListenOptions = {}): Promise<Server> {
		this.freeze();
		return listen(this.handle, this.nodeOptions(), options);
	}

	/**
	 * Answers a request whose method has no Web `Request` form (CONNECT, TRACE, TRACK). Such a method never
	 * has an operation, so the answer is 404 when no route matches and 405 otherwise.
	 */
	async reject(method: string, path: string): Promise<Response> {
		const ctx: DispatchContext = { method, path, params: {}, debug: this.debug, startedAt: Date.now() };

		const response = await this.boundary.run(ctx, async () => {
			if (this.findMount(path)) throw new MethodNotAllowedError();
			throw new MethodNotAllowedError(allowedMethods(this.dispatcher.resolveRoute(ctx)));
		});

		this.logger.info(`${ctx.method} ${ctx.path} - ${response.status} - ${Date.now() - ctx.startedAt}ms`);
		return response;
	}

	private nodeOptions(): NodeHandlerOptions {
		return { logger: this.logger, rejectRequest: this.reject };
	}

	private findMount(path: string): Mount | undefined {
		return this.mounts.find((mount) => path === mount.prefix || path.startsWith(mount.prefix + "/"));
	}
}

export { Dispatcher, httpErrorResponse, stripBody } from "./dispatcher";
export { describeError, ErrorBoundary, ERROR_TEMPLATE, formatDiagnostic, GENERIC_ERROR_MESSAGE } from "./error-boundary";
export type { ErrorBoundaryOptions, ErrorDetails } from "./error-boundary";
export * from "./errors";
export { handleNode, listen, toWebRequest, UNSUPPORTED_METHODS } from "./node";
export type { FetchHandler, NodeHandlerOptions, NodeRequest, NodeResponse } from "./node";
export { compilePattern, match, PathPattern } from "./pattern";
export { html, json, MediaTypes, ResponseBuilder, text } from "./response";
export { allowedMethods, DEFAULT_METHODS, isMethod, METHODS, RouteTable } from "./route-table";
export type { RouteEntry, RouteMatch } from "./route-table";
export type * from "./types";
