import { httpErrorResponse } from "./dispatcher";
import { HandlerFailure, HttpError, ProcessTermination } from "./errors";
import { MediaTypes } from "./response";
import type { AppLogger, DispatchContext, TemplateRenderer } from "./types";

/** Body of every 500 response outside debug mode */
export const GENERIC_ERROR_MESSAGE = "Something ducky happened.";

/** Template rendered for 500 responses in debug mode */
export const ERROR_TEMPLATE = "error.html";

export interface ErrorBoundaryOptions {
	logger: AppLogger;
	/** Renderer for {@link ERROR_TEMPLATE}; plain text is used without one */
	templates?: TemplateRenderer;
}

/** Name, message and stack of a thrown value */
export interface ErrorDetails {
	name: string;
	message: string;
	stack: string;
}

/**
 * Outermost failure boundary of a dispatch. Runs once per request around the whole dispatch and turns
 * whatever escapes it into a response:
 *
 * - {@link ProcessTermination} is logged and thrown again.
 * - {@link HttpError} becomes its status response.
 * - Anything else is logged and answered with 500: the message and stack trace when the dispatch context is in
 *   debug mode, {@link GENERIC_ERROR_MESSAGE} otherwise.
 */
export class ErrorBoundary {
	private readonly logger: AppLogger;
	private readonly templates?: TemplateRenderer;

	constructor(options: ErrorBoundaryOptions) {
		this.logger = options.logger;
		this.templates = options.templates;
	}

	/**
	 * Runs `work` inside the boundary.
	 *
	 * @throws {ProcessTermination} Never converted into a response
	 */
	async run(ctx: DispatchContext, work: () => Promise<Response>): Promise<Response> {
		try {
			return await work();
		} catch (err) {
			if (err instanceof ProcessTermination) {
				this.logger.error("Application stopped.", {
					signal: err.signal,
					exitCode: err.exitCode,
					method: ctx.method,
					path: ctx.path,
				});
				throw err;
			}

			if (err instanceof HttpError) {
				return httpErrorResponse(err);
			}

			return this.fail(ctx, err);
		}
	}

	private fail(ctx: DispatchContext, err: unknown): Response {
		const details = describeError(err instanceof HandlerFailure ? err.cause : err);

		this.logger.error(`Unhandled error while handling ${ctx.method} ${ctx.path}: ${details.message}`, {
			method: ctx.method,
			path: ctx.path,
			params: ctx.params,
			error: details,
		});

		if (!ctx.debug) {
			return new Response(GENERIC_ERROR_MESSAGE, {
				status: 500,
				headers: { "Content-Type": MediaTypes.TEXT },
			});
		}

		if (this.templates) {
			try {
				const page = this.templates.render(ERROR_TEMPLATE, {
					name: details.name,
					message: details.message,
					traceback: details.stack,
					request: { method: ctx.method, path: ctx.path, params: ctx.params },
				});
				return new Response(page, {
					status: 500,
					headers: { "Content-Type": MediaTypes.HTML },
				});
			} catch (renderError) {
				this.logger.warn(`Could not render ${ERROR_TEMPLATE}, falling back to plain text.`, {
					error: describeError(renderError),
				});
			}
		}

		return new Response(formatDiagnostic(ctx, details), {
			status: 500,
			headers: { "Content-Type": MediaTypes.TEXT },
		});
	}
}

/**
 * Extracts name, message and stack from any thrown value.
 */
export function describeError(err: unknown): ErrorDetails {
	if (err instanceof Error) {
		return {
			name: err.name,
			message: err.message,
			stack: err.stack ?? `${err.name}: ${err.message}`,
		};
	}
	return {
		name: "Error",
		message: String(err),
		stack: "(no stack trace available)",
	};
}

/**
 * Plain text diagnostic used for debug 500 responses.
 *
 * @example
 * ```text
 * Internal Server Error: GET /error
 *
 * Error: boom
 *
 * Stack trace:
 * Error: boom
 *     at ...
 * ```
 */
export function formatDiagnostic(ctx: DispatchContext, details: ErrorDetails): string {
	return [`Internal Server Error: ${ctx.method} ${ctx.path}`, "", `${details.name}: ${details.message}`, "", "Stack trace:", details.stack].join("\n");
}
