import { Readable } from "node:stream";
import type { OutgoingHttpHeaders } from "node:http";
import { describe, expect, it } from "vitest";
import { App, handleNode, ProcessTermination, toWebRequest, type NodeRequest, type NodeResponse } from "../packages/core/src";
import { MockLogger } from "./helpers";

function nodeRequest(options: { method?: string; url?: string; headers?: NodeRequest["headers"]; body?: string[] }): NodeRequest {
	return Object.assign(Readable.from(options.body ?? []), {
		method: options.method ?? "GET",
		url: options.url ?? "/",
		headers: options.headers ?? { host: "example.com" },
	});
}

class FakeNodeResponse implements NodeResponse {
	headersSent = false;
	status = 0;
	headers: OutgoingHttpHeaders = {};
	chunk: string | Uint8Array | undefined;
	ended = false;
	destroyed = false;

	writeHead(status: number, headers: OutgoingHttpHeaders = {}) {
		this.status = status;
		this.headers = headers;
		this.headersSent = true;
		return this;
	}

	end(chunk?: string | Uint8Array) {
		this.chunk = chunk;
		this.ended = true;
		return this;
	}

	destroy() {
		this.destroyed = true;
		return this;
	}

	get bodyText(): string {
		if (this.chunk === undefined) return "";
		return typeof this.chunk === "string" ? this.chunk : new TextDecoder().decode(this.chunk);
	}
}

describe("Node.js adapter", () => {
	describe("toWebRequest", () => {
		it("should build the URL from the host header", async () => {
			const req = await toWebRequest(nodeRequest({ url: "/hello/Ada?x=1" }));

			expect(req.url).toBe("http://example.com/hello/Ada?x=1");
			expect(req.method).toBe("GET");
		});

		it("should fall back to localhost", async () => {
			const req = await toWebRequest(nodeRequest({ headers: {} }));

			expect(req.url).toBe("http://localhost/");
		});

		it("should replace a malformed host header with localhost", async () => {
			const req = await toWebRequest(nodeRequest({ url: "/home", headers: { host: "bad host" } }));

			expect(req.url).toBe("http://localhost/home");
		});

		it("should copy repeated headers", async () => {
			const req = await toWebRequest(nodeRequest({ headers: { host: "example.com", "x-tag": ["a", "b"] } }));

			expect(req.headers.get("x-tag")).toBe("a, b");
		});

		it("should buffer the body of POST requests", async () => {
			const req = await toWebRequest(nodeRequest({ method: "POST", body: ["name=", "Ada"] }));

			expect(await req.text()).toBe("name=Ada");
		});
	});

	describe("handleNode", () => {
		it("should write status, headers and body", async () => {
			const app = new App({ logger: new MockLogger() });
			app.route("/hello/{name}", (req, res, { name }) => res.header("X-Greeting", "yes").text(`Hello, ${name}`));
			const res = new FakeNodeResponse();

			await app.handleNode(nodeRequest({ url: "/hello/Ada" }), res);

			expect(res.status).toBe(200);
			expect(res.headers["content-type"]).toBe("text/plain; charset=utf-8");
			expect(res.headers["x-greeting"]).toBe("yes");
			expect(res.bodyText).toBe("Hello, Ada");
		});

		it("should pass the request body to handlers", async () => {
			const app = new App({ logger: new MockLogger() });
			app.post("/echo", async (req, res) => {
				res.text(await req.text());
			});
			const res = new FakeNodeResponse();

			await app.handleNode(nodeRequest({ method: "POST", url: "/echo", body: ["ping"] }), res);

			expect(res.bodyText).toBe("ping");
		});

		it("should end without a body for HEAD", async () => {
			const app = new App({ logger: new MockLogger() });
			app.route("/home", (req, res) => res.text("home"));
			const res = new FakeNodeResponse();

			await app.handleNode(nodeRequest({ method: "HEAD", url: "/home" }), res);

			expect(res.status).toBe(200);
			expect(res.ended).toBe(true);
			expect(res.chunk).toBeUndefined();
		});

		it("should answer 500 and log when the handler itself fails", async () => {
			const logger = new MockLogger();
			const res = new FakeNodeResponse();

			await handleNode(() => Promise.reject(new Error("adapter failure")), nodeRequest({ url: "/home" }), res, { logger });

			expect(res.status).toBe(500);
			expect(res.bodyText).toBe("Internal Server Error");
			expect(logger.getLogsByLevel("error")).toHaveLength(1);
			expect(logger.getLastLog()?.message).toBe("Failed to handle GET /home: adapter failure");
		});

		it("should drop the connection and rethrow ProcessTermination", async () => {
			const res = new FakeNodeResponse();
			const termination = new ProcessTermination("SIGTERM");

			await expect(handleNode(() => Promise.reject(termination), nodeRequest({}), res, { logger: new MockLogger() })).rejects.toBe(termination);
			expect(res.destroyed).toBe(true);
			expect(res.headersSent).toBe(false);
		});

		it("should keep every Set-Cookie header", async () => {
			const headers = new Headers();
			headers.append("Set-Cookie", "a=1");
			headers.append("Set-Cookie", "b=2");
			const res = new FakeNodeResponse();

			await handleNode(async () => new Response("ok", { headers }), nodeRequest({}), res, { logger: new MockLogger() });

			expect(res.headers["set-cookie"]).toEqual(["a=1", "b=2"]);
		});

		it("should answer 405 for methods without a Web Request form", async () => {
			const logger = new MockLogger();
			const app = new App({ logger });
			let calls = 0;
			app.route("/home", (req, res) => {
				calls++;
				res.text("home");
			});

			for (const method of ["TRACE", "TRACK", "CONNECT"]) {
				const res = new FakeNodeResponse();
				await app.handleNode(nodeRequest({ method, url: "/home?x=1" }), res);

				expect(res.status).toBe(405);
				expect(res.headers["allow"]).toBe("GET, HEAD");
				expect(res.bodyText).toBe("Method Not Allowed");
			}
			expect(calls).toBe(0);
			expect(logger.getLastLog()?.message).toMatch(/^CONNECT \/home - 405 - \d+ms$/);
		});

		it("should answer 404 for those methods on unknown paths", async () => {
			const app = new App({ logger: new MockLogger() });
			const res = new FakeNodeResponse();

			await app.handleNode(nodeRequest({ method: "TRACE", url: "/missing" }), res);

			expect(res.status).toBe(404);
			expect(res.bodyText).toBe("Not Found");
		});

		it("should answer 405 for those methods below a mount", async () => {
			const app = new App({ logger: new MockLogger() });
			app.mount("/static", () => new Response("file"));
			const res = new FakeNodeResponse();

			await app.handleNode(nodeRequest({ method: "TRACE", url: "/static/site.css" }), res);

			expect(res.status).toBe(405);
		});

		it("should default to 405 without a rejectRequest callback", async () => {
			const res = new FakeNodeResponse();
			let calls = 0;

			await handleNode(
				async () => {
					calls++;
					return new Response("ok");
				},
				nodeRequest({ method: "TRACE" }),
				res,
				{ logger: new MockLogger() }
			);

			expect(res.status).toBe(405);
			expect(calls).toBe(0);
		});
	});
});
