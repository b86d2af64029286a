/** Media types set by the {@link ResponseBuilder} helpers */
export const MediaTypes = {
	TEXT: "text/plain; charset=utf-8",
	HTML: "text/html; charset=utf-8",
	JSON: "application/json",
	BINARY: "application/octet-stream",
} as const;

/**
 * Mutable response handed to every handler. Handlers set the status, headers and body on it;
 * once the dispatcher converts it into a Web `Response` it is sealed and further changes throw.
 *
 * @example
 * ```typescript
 * app.route("/hello/{name}", (req, res, { name }) => {
 *   res.text(`Hello, ${name}`);
 * });
 *
 * app.route("/items", (req, res) => {
 *   res.status = 201;
 *   res.header("Location", "/items/1").json({ id: 1 });
 * });
 * ```
 */
export class ResponseBuilder {
	/** Response headers */
	readonly headers = new Headers();
	private _status = 200;
	private _body: string | Uint8Array | null = null;
	private _mediaType: string | null = null;
	private sealed = false;

	/** HTTP status code (default 200) */
	get status(): number {
		return this._status;
	}

	set status(value: number) {
		this.assertMutable();
		this._status = value;
	}

	/** Body set so far, or `null` for an empty response */
	get body(): string | Uint8Array | null {
		return this._body;
	}

	/** Media type of the body, or `null` while no body is set */
	get mediaType(): string | null {
		return this._mediaType;
	}

	/** True once the response has been handed to the transport */
	get isSealed(): boolean {
		return this.sealed;
	}

	/**
	 * Sets a plain text body.
	 *
	 * @example
	 * ```typescript
	 * res.text("Not here", 404);
	 * ```
	 */
	text(body: string, status?: number): this {
		return this.setBody(body, MediaTypes.TEXT, status);
	}

	/** Sets an HTML body. */
	html(body: string, status?: number): this {
		return this.setBody(body, MediaTypes.HTML, status);
	}

	/** Serializes `data` as a JSON body. */
	json(data: unknown, status?: number): this {
		return this.setBody(JSON.stringify(data), MediaTypes.JSON, status);
	}

	/**
	 * Sets a binary body, e.g. the bytes returned by `app.render()`.
	 *
	 * @example
	 * ```typescript
	 * res.bytes(app.render("index.html", { title: "Home" }), MediaTypes.HTML);
	 * ```
	 */
	bytes(body: Uint8Array, mediaType: string = MediaTypes.BINARY, status?: number): this {
		return this.setBody(body, mediaType, status);
	}

	/** Sets a response header, replacing any previous value. */
	header(name: string, value: string): this {
		this.assertMutable();
		this.headers.set(name, value);
		return this;
	}

	/** Turns the response into a redirect. */
	redirect(url: string, status = 302): this {
		this.assertMutable();
		this._status = status;
		this._body = null;
		this._mediaType = null;
		this.headers.set("Location", url);
		return this;
	}

	/**
	 * Seals the builder and converts it into a Web `Response`.
	 *
	 * @param omitBody - Drop the body while keeping status and headers (HEAD requests)
	 */
	toResponse(omitBody = false): Response {
		this.sealed = true;

		const headers = new Headers(this.headers);
		if (this._mediaType && !headers.has("Content-Type")) {
			headers.set("Content-Type", this._mediaType);
		}

		return new Response(omitBody ? null : this._body, {
			status: this._status,
			headers,
		});
	}

	private setBody(body: string | Uint8Array, mediaType: string, status?: number): this {
		this.assertMutable();
		this._body = body;
		this._mediaType = mediaType;
		if (status !== undefined) this._status = status;
		return this;
	}

	private assertMutable(): void {
		if (this.sealed) {
			throw new Error("Response has already been sent and can no longer be modified.");
		}
	}
}

/**
 * Creates a plain text `Response`.
 *
 * @example
 * ```typescript
 * app.route("/ping", () => text("pong"));
 * ```
 */
export function text(body: string, status = 200, headers?: Record<string, string>): Response {
	return new Response(body, {
		status,
		headers: { "Content-Type": MediaTypes.TEXT, ...headers },
	});
}

/** Creates an HTML `Response`. */
export function html(body: string, status = 200, headers?: Record<string, string>): Response {
	return new Response(body, {
		status,
		headers: { "Content-Type": MediaTypes.HTML, ...headers },
	});
}

/** Creates a JSON `Response`. */
export function json(data: unknown, status = 200, headers?: Record<string, string>): Response {
	return new Response(JSON.stringify(data), {
		status,
		headers: { "Content-Type": MediaTypes.JSON, ...headers },
	});
}
