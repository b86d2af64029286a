import { App, MediaTypes, ProcessTermination, type ResponseBuilder } from "../packages/core/src";
import { createWebLogger, serveStatic, Templates } from "../packages/extras/src";

/**
 * Usage example for Node.js
 *
 * Run with `npm start`, then try:
 * - GET  /hello/Ada
 * - GET  /book and POST /book
 * - GET  /about (rendered from templates/index.html)
 * - GET  /static/... (files from ./static)
 * - GET  /error (debug error page)
 */

const debug = process.env.NODE_ENV !== "production";
const logger = createWebLogger({ debug });
const templates = new Templates({ directory: "templates", noCache: debug });

const app = new App({ debug, logger, templates, name: "Example" });

app.mount("/static", serveStatic({ directory: "static" }));

app.route(
	"/hello/{name}",
	(req, res, { name }) => {
		res.text(`Hello, ${name}`);
	},
	{ name: "greeting" }
);

class Books {
	private readonly books: string[] = [];

	get(req: Request, res: ResponseBuilder) {
		res.json(this.books);
	}

	async post(req: Request, res: ResponseBuilder) {
		const title = (await req.text()).trim();
		if (!title) {
			res.text("A title is required", 400);
			return;
		}
		this.books.push(title);
		res.header("Location", app.url("greeting", { name: title })).json({ title }, 201);
	}
}

app.route("/book", new Books(), { name: "books" });

app.get("/about", (req, res) => {
	res.bytes(app.render("index.html", { title: "About" }), MediaTypes.HTML);
});

app.get("/error", () => {
	throw new Error("Something went wrong on purpose");
});

const server = await app.listen({ port: Number(process.env.PORT ?? 8000) });

for (const signal of ["SIGINT", "SIGTERM"] as const) {
	process.once(signal, () => {
		logger.error("Application stopped.", { error: new ProcessTermination(signal).message });
		server
			.stop()
			.then(() => process.exit(0))
			.catch((err: unknown) => {
				logger.error("Failed to stop the server.", { error: err instanceof Error ? err.message : String(err) });
				process.exit(1);
			});
	});
}
