import type { AppLogger } from "../packages/core/src";

export function mockRequest(path: string, method = "GET", headers: Record<string, string> = {}) {
	return new Request(`http://localhost${path}`, {
		method,
		headers: {
			Host: "localhost",
			...headers,
		},
	});
}

type LogLevel = "error" | "warn" | "info" | "debug";

export class MockLogger implements AppLogger {
	public logs: Array<{ level: LogLevel; message: string; metadata?: Record<string, unknown> }> = [];

	error(message: string, metadata?: Record<string, unknown>): void {
		this.logs.push({ level: "error", message, metadata });
	}

	warn(message: string, metadata?: Record<string, unknown>): void {
		this.logs.push({ level: "warn", message, metadata });
	}

	info(message: string, metadata?: Record<string, unknown>): void {
		this.logs.push({ level: "info", message, metadata });
	}

	debug(message: string, metadata?: Record<string, unknown>): void {
		this.logs.push({ level: "debug", message, metadata });
	}

	clear() {
		this.logs = [];
	}

	getLastLog() {
		return this.logs[this.logs.length - 1];
	}

	getLogsByLevel(level: LogLevel) {
		return this.logs.filter((log) => log.level === level);
	}
}
