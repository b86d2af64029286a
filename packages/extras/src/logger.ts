import { ConsoleTransport, Levels, Logger, NDJsonTransport } from "@rabbit-company/logger";

/**
 * Options for {@link createWebLogger}.
 */
export interface WebLoggerOptions {
	/**
	 * Minimum level that gets written.
	 * Default: Levels.INFO, or Levels.DEBUG when `debug` is set
	 */
	level?: number;

	/**
	 * Shortcut for `level: Levels.DEBUG`.
	 * Default: false
	 */
	debug?: boolean;

	/**
	 * Write human readable lines to the console.
	 * Default: true
	 */
	console?: boolean;

	/**
	 * Collect entries as newline-delimited JSON (see `NDJsonTransport`).
	 * Default: false
	 */
	ndjson?: boolean;
}

/**
 * Resolves the minimum level for {@link WebLoggerOptions}: an explicit `level` wins over `debug`.
 */
export function resolveLogLevel(options: WebLoggerOptions = {}): number {
	const { debug = false, level = debug ? Levels.DEBUG : Levels.INFO } = options;
	return level;
}

/**
 * Creates the transports selected by {@link WebLoggerOptions}, console first.
 */
export function createTransports(options: WebLoggerOptions = {}): Array<ConsoleTransport | NDJsonTransport> {
	const { console: enableConsole = true, ndjson = false } = options;
	const transports: Array<ConsoleTransport | NDJsonTransport> = [];

	if (enableConsole) {
		transports.push(new ConsoleTransport());
	}

	if (ndjson) {
		transports.push(new NDJsonTransport());
	}

	return transports;
}

/**
 * Create a logger instance with common transports, ready to be passed to `new App({ logger })`.
 *
 * @example
 * ```typescript
 * const logger = createWebLogger({ debug: true });
 * const app = new App({ debug: true, logger });
 * ```
 */
export function createWebLogger(options: WebLoggerOptions = {}): Logger {
	return new Logger({ level: resolveLogLevel(options), transports: createTransports(options) });
}

export { ConsoleTransport, Levels, Logger, NDJsonTransport } from "@rabbit-company/logger";
