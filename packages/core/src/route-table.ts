import { DuplicateRouteError, RouteTableFrozenError } from "./errors";
import { compilePattern, type PathPattern } from "./pattern";
import type { Handler, Method, Params, Resource, RouteInfo, RouteOptions } from "./types";

/** Every method the framework knows, in the order used for `Allow` headers */
export const METHODS: readonly Method[] = ["GET", "HEAD", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"];

/** Methods a function handler answers when none are given */
export const DEFAULT_METHODS: readonly Method[] = ["GET", "HEAD"];

/**
 * A registered route: one pattern and the operation bound to each allowed method.
 * The operation map is built once, at registration.
 */
export interface RouteEntry {
	pattern: PathPattern;
	operations: Map<Method, Handler>;
	name?: string;
}

/** Result of a successful {@link RouteTable.lookup} */
export interface RouteMatch {
	route: RouteEntry;
	params: Params;
}

/**
 * Narrows an arbitrary request method to a {@link Method}.
 */
export function isMethod(value: string): value is Method {
	return (METHODS as readonly string[]).includes(value);
}

/**
 * Ordered collection of routes. Registration happens during application setup; after {@link RouteTable.freeze}
 * the table is read-only and lookups are safe from any number of concurrent requests.
 *
 * Lookup is a linear scan in registration order, so the first registered pattern that matches wins.
 *
 * @example
 * ```typescript
 * const table = new RouteTable();
 * table.register("/users/{id}", showUser);
 * table.register("/users/me", showMe); // never reached, "/users/{id}" matches first
 *
 * table.lookup("/users/me"); // { route: <"/users/{id}">, params: { id: "me" } }
 * ```
 */
export class RouteTable {
	/** Routes in registration order */
	private routes: RouteEntry[] = [];
	/** Routes keyed by their exact template */
	private byPath = new Map<string, RouteEntry>();
	/** Routes keyed by name, for reverse routing */
	private byName = new Map<string, RouteEntry>();
	private frozen = false;

	/** Number of distinct route patterns */
	get size(): number {
		return this.routes.length;
	}

	get isFrozen(): boolean {
		return this.frozen;
	}

	/**
	 * Registers a handler for a path pattern.
	 *
	 * A path and method combination can be registered only once. Registering an existing pattern again with
	 * methods it does not have yet adds them to that route, which keeps its place in the lookup order.
	 *
	 * @param path - Route template, e.g. `/hello/{name}`
	 * @param handler - A function, or a resource object with lowercase method operations
	 * @param options - Allowed methods and an optional route name
	 * @returns The route the handler was added to
	 * @throws {DuplicateRouteError} When one of the methods or the name is already registered
	 * @throws {PatternError} When the template is malformed
	 * @throws {RouteTableFrozenError} After {@link RouteTable.freeze}
	 */
	register(path: string, handler: Handler | Resource, options: RouteOptions = {}): RouteEntry {
		if (this.frozen) throw new RouteTableFrozenError(path);

		const operations = buildOperations(handler, options.methods);
		const existing = this.byPath.get(path);
		const { name } = options;

		if (existing) {
			const conflicts = [...operations.keys()].filter((method) => existing.operations.has(method));
			if (conflicts.length > 0) {
				throw new DuplicateRouteError(path, conflicts);
			}
		}

		if (name !== undefined) {
			const named = this.byName.get(name);
			if (named && named !== existing) {
				throw new DuplicateRouteError(path, [...operations.keys()], `Route name '${name}' is already used by '${named.pattern.source}'.`);
			}
			if (existing?.name !== undefined && existing.name !== name) {
				throw new DuplicateRouteError(path, [...operations.keys()], `Route '${path}' is already named '${existing.name}'.`);
			}
		}

		let route = existing;
		if (route) {
			for (const [method, operation] of operations) {
				route.operations.set(method, operation);
			}
		} else {
			route = { pattern: compilePattern(path), operations };
			this.routes.push(route);
			this.byPath.set(path, route);
		}

		if (name !== undefined) {
			route.name = name;
			this.byName.set(name, route);
		}

		return route;
	}

	/**
	 * Finds the first route, in registration order, whose pattern matches the path.
	 *
	 * @param path - Request pathname
	 * @returns The route with its bound parameters, or `null` when nothing matches
	 */
	lookup(path: string): RouteMatch | null {
		for (const route of this.routes) {
			const params = route.pattern.match(path);
			if (params) return { route, params };
		}
		return null;
	}

	/** Finds a route by name. */
	find(name: string): RouteEntry | undefined {
		return this.byName.get(name);
	}

	/** Rejects further registrations. */
	freeze(): void {
		this.frozen = true;
	}

	/**
	 * Gets all registered routes with their metadata.
	 *
	 * @example
	 * ```typescript
	 * table.list().forEach((route) => {
	 *   console.log(`${route.methods.join(",")} ${route.path}`);
	 * });
	 * ```
	 */
	list(): RouteInfo[] {
		return this.routes.map((route) => ({
			path: route.pattern.source,
			methods: allowedMethods(route),
			...(route.name !== undefined ? { name: route.name } : {}),
		}));
	}
}

/**
 * Methods a route answers, in {@link METHODS} order.
 */
export function allowedMethods(route: RouteEntry): Method[] {
	return METHODS.filter((method) => route.operations.has(method));
}

/**
 * Builds the method to operation map for a handler.
 * Functions are bound to every requested method; resources contribute one operation per implemented method,
 * with HEAD served by `get` when the resource has no `head`.
 */
function buildOperations(handler: Handler | Resource, methods?: Method[]): Map<Method, Handler> {
	const operations = new Map<Method, Handler>();

	if (typeof handler === "function") {
		for (const method of methods ?? DEFAULT_METHODS) {
			operations.set(method, handler);
		}
		return operations;
	}

	for (const method of methods ?? METHODS) {
		const operation = handler[toOperationName(method)] ?? (method === "HEAD" ? handler.get : undefined);
		if (typeof operation === "function") {
			operations.set(method, operation.bind(handler));
		}
	}
	return operations;
}

function toOperationName(method: Method): Lowercase<Method> {
	switch (method) {
		case "GET":
			return "get";
		case "HEAD":
			return "head";
		case "POST":
			return "post";
		case "PUT":
			return "put";
		case "PATCH":
			return "patch";
		case "DELETE":
			return "delete";
		case "OPTIONS":
			return "options";
	}
}
