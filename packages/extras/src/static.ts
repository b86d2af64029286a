import { mkdirSync } from "node:fs";
import { readFile, stat } from "node:fs/promises";
import { extname, relative, resolve, sep } from "node:path";
import type { MountHandler } from "@zephyr/web";

/** Content types by file extension */
const CONTENT_TYPES: Record<string, string> = {
	".html": "text/html; charset=utf-8",
	".css": "text/css; charset=utf-8",
	".js": "text/javascript; charset=utf-8",
	".mjs": "text/javascript; charset=utf-8",
	".json": "application/json",
	".txt": "text/plain; charset=utf-8",
	".svg": "image/svg+xml",
	".png": "image/png",
	".jpg": "image/jpeg",
	".jpeg": "image/jpeg",
	".gif": "image/gif",
	".webp": "image/webp",
	".ico": "image/x-icon",
	".woff": "font/woff",
	".woff2": "font/woff2",
	".map": "application/json",
};

/**
 * Options for configuring the static file handler.
 */
export interface StaticOptions {
	/**
	 * Directory to serve files from. Created if it does not exist.
	 * Default: "static" (relative to the working directory)
	 */
	directory?: string;

	/**
	 * Value of the Cache-Control header, or null to omit it.
	 * Default: "public, max-age=0"
	 */
	cacheControl?: string | null;

	/**
	 * Content type for extensions missing from the built-in table.
	 * Default: "application/octet-stream"
	 */
	fallbackContentType?: string;
}

/**
 * Serves files from a directory. Meant to be mounted, and answers GET and HEAD only.
 * Paths that leave the directory, directories and missing files are answered with 404.
 *
 * @example
 * ```typescript
 * app.mount("/static", serveStatic({ directory: "static" }));
 * ```
 */
export function serveStatic(options: StaticOptions = {}): MountHandler {
	const { directory = "static", cacheControl = "public, max-age=0", fallbackContentType = "application/octet-stream" } = options;

	const root = resolve(directory);
	mkdirSync(root, { recursive: true });

	return async (req, subpath) => {
		if (req.method !== "GET" && req.method !== "HEAD") {
			return new Response("Method Not Allowed", {
				status: 405,
				headers: { Allow: "GET, HEAD", "Content-Type": "text/plain; charset=utf-8" },
			});
		}

		const file = resolveInside(root, subpath);
		if (!file) return notFound();

		const info = await stat(file).catch(() => null);
		if (!info || !info.isFile()) return notFound();

		const headers = new Headers({
			"Content-Type": CONTENT_TYPES[extname(file).toLowerCase()] ?? fallbackContentType,
			"Content-Length": String(info.size),
			"Last-Modified": info.mtime.toUTCString(),
		});
		if (cacheControl !== null) headers.set("Cache-Control", cacheControl);

		if (req.method === "HEAD") {
			return new Response(null, { status: 200, headers });
		}
		return new Response(await readFile(file), { status: 200, headers });
	};
}

/**
 * Resolves a request sub-path to a file below `root`, or returns null when it would escape it.
 */
export function resolveInside(root: string, subpath: string): string | null {
	let decoded: string;
	try {
		decoded = decodeURIComponent(subpath);
	} catch {
		return null;
	}
	if (decoded.includes("\0")) return null;

	const file = resolve(root, "." + (decoded.startsWith("/") ? decoded : "/" + decoded));
	const rel = relative(root, file);
	if (rel === "" || rel.startsWith("..") || rel.split(sep).includes("..")) return null;
	return file;
}

function notFound(): Response {
	return new Response("Not Found", {
		status: 404,
		headers: { "Content-Type": "text/plain; charset=utf-8" },
	});
}
