import { HandlerFailure, HttpError, MethodNotAllowedError, NotFoundError, ProcessTermination } from "./errors";
import { ResponseBuilder } from "./response";
import { allowedMethods, isMethod, type RouteEntry, type RouteTable } from "./route-table";
import type { AppLogger, DispatchContext, HandlerResult } from "./types";

/**
 * Resolves a request to a route operation and invokes it.
 *
 * Per request: lookup (404 when nothing matches), method check (405 when the route has no operation for the
 * method), invoke, then either the handler's outcome becomes the response or the failure propagates to the
 * error boundary wrapped in a {@link HandlerFailure}.
 */
export class Dispatcher {
	constructor(
		private readonly table: RouteTable,
		private readonly logger: AppLogger
	) {}

	/**
	 * Dispatches one request.
	 *
	 * @param req - The incoming Request object
	 * @param ctx - Dispatch context for this request; `params` is filled in once the route is found
	 * @throws {NotFoundError} When no route matches
	 * @throws {MethodNotAllowedError} When the route does not answer the request method
	 * @throws {HandlerFailure} When the handler throws
	 * @throws {ProcessTermination} Re-thrown untouched from the handler
	 */
	async dispatch(req: Request, ctx: DispatchContext): Promise<Response> {
		const route = this.resolveRoute(ctx);
		const { params } = ctx;

		const operation = isMethod(ctx.method) ? route.operations.get(ctx.method) : undefined;
		if (!operation) {
			throw new MethodNotAllowedError(allowedMethods(route));
		}

		this.logger.debug(`Dispatching ${ctx.method} ${ctx.path} to '${route.pattern.source}'`, { params });

		const res = new ResponseBuilder();
		let result: HandlerResult;
		try {
			result = await operation(req, res, params);
		} catch (err) {
			if (err instanceof ProcessTermination || err instanceof HttpError) throw err;
			throw new HandlerFailure(ctx, err);
		}

		const omitBody = ctx.method === "HEAD";
		if (result instanceof Response) {
			return omitBody ? stripBody(result) : result;
		}
		return (result ?? res).toResponse(omitBody);
	}

	/**
	 * Finds the route for `ctx.path` and stores its bound parameters in `ctx.params`.
	 *
	 * @throws {NotFoundError} When no route matches
	 */
	resolveRoute(ctx: DispatchContext): RouteEntry {
		const matched = this.table.lookup(ctx.path);
		if (!matched) {
			throw new NotFoundError();
		}

		ctx.params = matched.params;
		return matched.route;
	}
}

/**
 * Creates the response for an {@link HttpError}.
 */
export function httpErrorResponse(err: HttpError): Response {
	const headers = new Headers({ "Content-Type": "text/plain; charset=utf-8" });
	if (err instanceof MethodNotAllowedError && err.allowed.length > 0) {
		headers.set("Allow", err.allowed.join(", "));
	}
	return new Response(err.message, { status: err.status, headers });
}

/**
 * Drops the body of a response while preserving headers and status.
 */
export function stripBody(res: Response): Response {
	return new Response(null, {
		status: res.status,
		headers: res.headers,
	});
}
