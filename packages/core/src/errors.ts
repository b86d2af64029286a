import type { DispatchContext, Method } from "./types";

/**
 * Error that maps directly to an HTTP status. Thrown by the dispatcher for its own fallbacks,
 * and may be thrown by handlers to produce the same responses.
 */
export class HttpError extends Error {
	constructor(
		public readonly status: number,
		message: string
	) {
		super(message);
		this.name = "HttpError";
	}
}

/** No route matches the request path. Always answered with 404 "Not Found". */
export class NotFoundError extends HttpError {
	constructor() {
		super(404, "Not Found");
		this.name = "NotFoundError";
	}
}

/** A route matches but has no operation for the request method. Always answered with 405 "Method Not Allowed". */
export class MethodNotAllowedError extends HttpError {
	constructor(public readonly allowed: Method[] = []) {
		super(405, "Method Not Allowed");
		this.name = "MethodNotAllowedError";
	}
}

/**
 * A path and method combination, or a route name, is registered twice.
 * Raised synchronously at registration time.
 */
export class DuplicateRouteError extends Error {
	constructor(
		public readonly path: string,
		public readonly methods: Method[],
		message = `Route '${path}' already exists for ${methods.join(", ")}.`
	) {
		super(message);
		this.name = "DuplicateRouteError";
	}
}

/** A route template is malformed, or reverse routing is missing a parameter. */
export class PatternError extends Error {
	constructor(
		public readonly pattern: string,
		reason: string
	) {
		super(`Invalid route pattern '${pattern}': ${reason}`);
		this.name = "PatternError";
	}
}

/** Registration attempted after the route table was frozen for serving. */
export class RouteTableFrozenError extends Error {
	constructor(path: string) {
		super(`Cannot register '${path}': the route table is frozen.`);
		this.name = "RouteTableFrozenError";
	}
}

/** Reverse routing was asked for a name no route carries. */
export class RouteNotFoundError extends Error {
	constructor(public readonly routeName: string) {
		super(`No route named '${routeName}'.`);
		this.name = "RouteNotFoundError";
	}
}

export class TemplatesNotConfiguredError extends Error {
	constructor(template: string) {
		super(`Cannot render '${template}': no template renderer was passed to the application.`);
		this.name = "TemplatesNotConfiguredError";
	}
}

/**
 * Wraps anything thrown while a handler runs. The original value is kept in `cause`.
 */
export class HandlerFailure extends Error {
	constructor(
		public readonly context: DispatchContext,
		cause: unknown
	) {
		super(`Handler for ${context.method} ${context.path} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
		this.name = "HandlerFailure";
	}
}

/**
 * Request to stop the process (the equivalent of an interrupt or exit).
 * Never converted into an HTTP response: the error boundary logs it and throws it again.
 *
 * @example
 * ```typescript
 * app.post("/admin/shutdown", () => {
 *   throw new ProcessTermination("SIGTERM");
 * });
 * ```
 */
export class ProcessTermination extends Error {
	constructor(
		public readonly signal: NodeJS.Signals | null = null,
		public readonly exitCode = 0
	) {
		super(signal ? `Process terminated by ${signal}` : `Process exited with code ${exitCode}`);
		this.name = "ProcessTermination";
	}
}
