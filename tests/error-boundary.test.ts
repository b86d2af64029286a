import { describe, expect, it } from "vitest";
import {
	App,
	describeError,
	ErrorBoundary,
	formatDiagnostic,
	GENERIC_ERROR_MESSAGE,
	HandlerFailure,
	MethodNotAllowedError,
	ProcessTermination,
	type DispatchContext,
	type TemplateRenderer,
} from "../packages/core/src";
import { MockLogger, mockRequest } from "./helpers";

function context(debug: boolean): DispatchContext {
	return { method: "GET", path: "/error", params: { id: "1" }, debug, startedAt: Date.now() };
}

function failing(ctx: DispatchContext, cause: unknown) {
	return () => Promise.reject(new HandlerFailure(ctx, cause));
}

describe("Error Boundary", () => {
	it("should pass successful responses through", async () => {
		const boundary = new ErrorBoundary({ logger: new MockLogger() });
		const res = await boundary.run(context(false), async () => new Response("ok"));

		expect(await res.text()).toBe("ok");
	});

	it("should answer with the generic message outside debug mode", async () => {
		const logger = new MockLogger();
		const boundary = new ErrorBoundary({ logger });
		const ctx = context(false);

		const res = await boundary.run(ctx, failing(ctx, new Error("database exploded")));

		expect(res.status).toBe(500);
		expect(res.headers.get("Content-Type")).toBe("text/plain; charset=utf-8");
		expect(await res.text()).toBe(GENERIC_ERROR_MESSAGE);
		expect(GENERIC_ERROR_MESSAGE).toBe("Something ducky happened.");
	});

	it("should answer with a diagnostic in debug mode", async () => {
		const boundary = new ErrorBoundary({ logger: new MockLogger() });
		const ctx = context(true);

		const res = await boundary.run(ctx, failing(ctx, new Error("boom")));
		const body = await res.text();

		expect(res.status).toBe(500);
		expect(body.startsWith("Internal Server Error: GET /error\n\nError: boom\n\nStack trace:\nError: boom\n")).toBe(true);
	});

	it("should log every failure with the original error", async () => {
		const logger = new MockLogger();
		const boundary = new ErrorBoundary({ logger });
		const ctx = context(false);

		await boundary.run(ctx, failing(ctx, new TypeError("bad input")));

		const errors = logger.getLogsByLevel("error");
		expect(errors).toHaveLength(1);
		expect(errors[0]?.message).toBe("Unhandled error while handling GET /error: bad input");
		expect(errors[0]?.metadata).toMatchObject({
			method: "GET",
			path: "/error",
			params: { id: "1" },
			error: { name: "TypeError", message: "bad input" },
		});
	});

	it("should treat values thrown outside a handler the same way", async () => {
		const logger = new MockLogger();
		const boundary = new ErrorBoundary({ logger });

		const res = await boundary.run(context(false), () => Promise.reject(new Error("mount failed")));

		expect(res.status).toBe(500);
		expect(logger.getLogsByLevel("error")[0]?.message).toBe("Unhandled error while handling GET /error: mount failed");
	});

	it("should answer HttpError with its status and no log", async () => {
		const logger = new MockLogger();
		const boundary = new ErrorBoundary({ logger });

		const res = await boundary.run(context(true), () => Promise.reject(new MethodNotAllowedError(["GET", "HEAD"])));

		expect(res.status).toBe(405);
		expect(res.headers.get("Allow")).toBe("GET, HEAD");
		expect(await res.text()).toBe("Method Not Allowed");
		expect(logger.getLogsByLevel("error")).toHaveLength(0);
	});

	it("should log and rethrow ProcessTermination", async () => {
		const logger = new MockLogger();
		const boundary = new ErrorBoundary({ logger });
		const termination = new ProcessTermination("SIGINT", 130);

		await expect(boundary.run(context(false), () => Promise.reject(termination))).rejects.toBe(termination);
		expect(logger.getLastLog()).toEqual({
			level: "error",
			message: "Application stopped.",
			metadata: { signal: "SIGINT", exitCode: 130, method: "GET", path: "/error" },
		});
	});

	it("should render the error template in debug mode", async () => {
		const rendered: Array<{ name: string; context?: Record<string, unknown> }> = [];
		const templates: TemplateRenderer = {
			render(name, context) {
				rendered.push({ name, context });
				return `<p>${String(context?.message)}</p>`;
			},
		};
		const boundary = new ErrorBoundary({ logger: new MockLogger(), templates });
		const ctx = context(true);

		const res = await boundary.run(ctx, failing(ctx, new Error("boom")));

		expect(res.headers.get("Content-Type")).toBe("text/html; charset=utf-8");
		expect(await res.text()).toBe("<p>boom</p>");
		expect(rendered[0]?.name).toBe("error.html");
		expect(rendered[0]?.context).toMatchObject({
			name: "Error",
			message: "boom",
			request: { method: "GET", path: "/error", params: { id: "1" } },
		});
	});

	it("should not render the error template outside debug mode", async () => {
		let calls = 0;
		const templates: TemplateRenderer = {
			render() {
				calls++;
				return "";
			},
		};
		const boundary = new ErrorBoundary({ logger: new MockLogger(), templates });
		const ctx = context(false);

		const res = await boundary.run(ctx, failing(ctx, new Error("boom")));

		expect(await res.text()).toBe(GENERIC_ERROR_MESSAGE);
		expect(calls).toBe(0);
	});

	it("should fall back to plain text when the error template fails", async () => {
		const logger = new MockLogger();
		const templates: TemplateRenderer = {
			render() {
				throw new Error("template missing");
			},
		};
		const boundary = new ErrorBoundary({ logger, templates });
		const ctx = context(true);

		const res = await boundary.run(ctx, failing(ctx, new Error("boom")));

		expect(res.headers.get("Content-Type")).toBe("text/plain; charset=utf-8");
		expect((await res.text()).startsWith("Internal Server Error: GET /error")).toBe(true);
		expect(logger.getLogsByLevel("warn")[0]?.message).toBe("Could not render error.html, falling back to plain text.");
	});
});

describe("describeError", () => {
	it("should describe Error instances", () => {
		const details = describeError(new RangeError("out of range"));

		expect(details.name).toBe("RangeError");
		expect(details.message).toBe("out of range");
		expect(details.stack.startsWith("RangeError: out of range")).toBe(true);
	});

	it("should describe thrown non-errors", () => {
		expect(describeError(42)).toEqual({ name: "Error", message: "42", stack: "(no stack trace available)" });
	});
});

describe("formatDiagnostic", () => {
	it("should join the request line, error and stack", () => {
		const body = formatDiagnostic(context(true), { name: "Error", message: "boom", stack: "Error: boom\n    at handler" });

		expect(body).toBe("Internal Server Error: GET /error\n\nError: boom\n\nStack trace:\nError: boom\n    at handler");
	});
});

describe("App error handling", () => {
	it("should hide details outside debug mode", async () => {
		const app = new App({ logger: new MockLogger() });
		app.route("/error", () => {
			throw new Error("secret detail");
		});

		const res = await app.handle(mockRequest("/error"));
		const body = await res.text();

		expect(res.status).toBe(500);
		expect(body).toBe("Something ducky happened.");
	});

	it("should show the message and stack trace in debug mode", async () => {
		const app = new App({ debug: true, logger: new MockLogger() });
		app.route("/error", () => {
			throw new Error("secret detail");
		});

		const res = await app.handle(mockRequest("/error"));
		const body = await res.text();

		expect(res.status).toBe(500);
		expect(body.split("\n").slice(0, 5)).toEqual(["Internal Server Error: GET /error", "", "Error: secret detail", "", "Stack trace:"]);
	});

	it("should keep serving after a failure", async () => {
		const app = new App({ logger: new MockLogger() });
		app.route("/error", () => {
			throw new Error("boom");
		});
		app.route("/ok", (req, res) => res.text("fine"));

		await app.handle(mockRequest("/error"));
		const res = await app.handle(mockRequest("/ok"));

		expect(await res.text()).toBe("fine");
	});

	it("should rethrow ProcessTermination from handle", async () => {
		const logger = new MockLogger();
		const app = new App({ logger });
		app.route("/stop", () => {
			throw new ProcessTermination();
		});

		await expect(app.handle(mockRequest("/stop"))).rejects.toBeInstanceOf(ProcessTermination);
		expect(logger.getLogsByLevel("error")[0]?.message).toBe("Application stopped.");
	});
});
