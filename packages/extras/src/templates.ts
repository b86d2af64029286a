import { mkdirSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import nunjucks, { type Environment } from "nunjucks";
import type { TemplateRenderer } from "@zephyr/web";

/** Directory of the templates shipped with this package (`error.html`) */
export const BUILTIN_TEMPLATE_DIR = fileURLToPath(new URL("../templates", import.meta.url));

/**
 * Options for configuring the template renderer.
 */
export interface TemplateOptions {
	/**
	 * Directory with the application's templates. Created if it does not exist.
	 * Default: "templates" (relative to the working directory)
	 */
	directory?: string;

	/**
	 * Escape HTML in every rendered value.
	 * Default: true
	 */
	autoescape?: boolean;

	/**
	 * Reload templates from disk on every render, e.g. while developing.
	 * Default: false
	 */
	noCache?: boolean;
}

/**
 * Template renderer backed by nunjucks. Templates are looked up in the application's directory first and in
 * {@link BUILTIN_TEMPLATE_DIR} second, so an application can override the built-in `error.html`.
 *
 * @example
 * ```typescript
 * const templates = new Templates({ directory: "templates" });
 * const app = new App({ debug: true, templates });
 *
 * app.get("/", (req, res) => {
 *   res.bytes(app.render("index.html", { name: "Ada", title: "Home" }), MediaTypes.HTML);
 * });
 * ```
 */
export class Templates implements TemplateRenderer {
	/** The nunjucks environment, for registering filters and globals */
	readonly environment: Environment;
	/** Absolute path of the application's template directory */
	readonly directory: string;

	constructor(options: TemplateOptions = {}) {
		const { directory = "templates", autoescape = true, noCache = false } = options;

		this.directory = resolve(directory);
		mkdirSync(this.directory, { recursive: true });

		const loader = new nunjucks.FileSystemLoader([this.directory, BUILTIN_TEMPLATE_DIR], { noCache });
		this.environment = new nunjucks.Environment(loader, { autoescape });
	}

	/**
	 * Renders a template by name.
	 *
	 * @throws {Error} When the template cannot be found in either directory or fails to render
	 */
	render(name: string, context: Record<string, unknown> = {}): string {
		return this.environment.render(name, context);
	}
}

/**
 * Creates a {@link Templates} renderer.
 */
export function createTemplates(options: TemplateOptions = {}): Templates {
	return new Templates(options);
}
