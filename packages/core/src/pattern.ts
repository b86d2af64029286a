import { PatternError } from "./errors";
import type { MatchResult, Params } from "./types";

type Segment = { kind: "literal"; value: string } | { kind: "param"; name: string };

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Names inherited from `Object.prototype`, which a plain params object cannot bind */
const RESERVED_NAMES = new Set(Object.getOwnPropertyNames(Object.prototype));

/** Compiled patterns keyed by template, shared by {@link match} */
const patternCache = new Map<string, PathPattern>();

/**
 * A compiled route template made of literal segments and `{name}` placeholders.
 * Immutable once created.
 *
 * @example
 * ```typescript
 * const pattern = compilePattern("/users/{id}/posts/{post}");
 * pattern.match("/users/7/posts/42"); // { id: "7", post: "42" }
 * pattern.match("/users/7"); // null
 * pattern.build({ id: "7", post: "42" }); // "/users/7/posts/42"
 * ```
 */
export class PathPattern {
	/** Placeholder names in the order they appear */
	readonly paramNames: readonly string[];

	/** @internal use {@link compilePattern} */
	constructor(
		readonly source: string,
		private readonly segments: readonly Segment[]
	) {
		const names: string[] = [];
		for (const segment of segments) {
			if (segment.kind === "param") names.push(segment.name);
		}
		this.paramNames = names;
	}

	/** True when the pattern has no placeholders. */
	get isStatic(): boolean {
		return this.paramNames.length === 0;
	}

	/**
	 * Tests a request path against the pattern.
	 *
	 * @param path - Request pathname, percent-encoded as received
	 * @returns The decoded values bound to each placeholder, or `null` on any segment-count or literal mismatch
	 */
	match(path: string): MatchResult {
		const parts = path.split("/");
		if (parts.length !== this.segments.length) return null;

		const params: Params = {};
		for (let i = 0; i < parts.length; i++) {
			const segment = this.segments[i];
			const part = decodeSegment(parts[i]);

			if (segment.kind === "literal") {
				if (segment.value !== part) return null;
			} else {
				if (part.length === 0) return null;
				params[segment.name] = part;
			}
		}

		return params;
	}

	/**
	 * Builds a concrete path by substituting placeholder values (reverse routing).
	 *
	 * @throws {PatternError} When a placeholder has no value
	 */
	build(params: Params = {}): string {
		return this.segments
			.map((segment) => {
				if (segment.kind === "literal") return segment.value;
				const value = Object.hasOwn(params, segment.name) ? params[segment.name] : undefined;
				if (value === undefined || value === "") {
					throw new PatternError(this.source, `missing value for '{${segment.name}}'`);
				}
				return encodeURIComponent(value);
			})
			.join("/");
	}
}

/**
 * Compiles a route template into a {@link PathPattern}.
 *
 * @param template - A path starting with "/", e.g. `/hello/{name}`
 * @throws {PatternError} When the template does not start with "/", a placeholder name is invalid, reserved
 * (`__proto__`, `constructor`, ...) or repeated, or a segment contains braces without being a whole placeholder
 */
export function compilePattern(template: string): PathPattern {
	if (!template.startsWith("/")) {
		throw new PatternError(template, "must start with '/'");
	}

	const seen = new Set<string>();
	const segments = template.split("/").map((raw): Segment => {
		if (raw.startsWith("{") && raw.endsWith("}")) {
			const name = raw.slice(1, -1);
			if (!IDENTIFIER.test(name)) {
				throw new PatternError(template, `'${name}' is not a valid placeholder name`);
			}
			if (RESERVED_NAMES.has(name)) {
				throw new PatternError(template, `'${name}' is a reserved placeholder name`);
			}
			if (seen.has(name)) {
				throw new PatternError(template, `placeholder '{${name}}' appears more than once`);
			}
			seen.add(name);
			return { kind: "param", name };
		}
		if (raw.includes("{") || raw.includes("}")) {
			throw new PatternError(template, `segment '${raw}' mixes literal text and a placeholder`);
		}
		return { kind: "literal", value: raw };
	});

	return new PathPattern(template, segments);
}

/**
 * Matches a request path against a route template, compiling and caching the template on first use.
 *
 * @example
 * ```typescript
 * match("/hello/{name}", "/hello/Ada"); // { name: "Ada" }
 * match("/hello/{name}", "/hello"); // null
 * ```
 */
export function match(pattern: string, path: string): MatchResult {
	let compiled = patternCache.get(pattern);
	if (!compiled) {
		compiled = compilePattern(pattern);
		// Cache with size limit
		if (patternCache.size < 1000) {
			patternCache.set(pattern, compiled);
		}
	}
	return compiled.match(path);
}

function decodeSegment(segment: string): string {
	if (!segment.includes("%")) return segment;
	try {
		return decodeURIComponent(segment);
	} catch {
		return segment;
	}
}
