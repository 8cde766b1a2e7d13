/**
 * @module adapters/http
 *
 * `fetch`-based transport against the store's REST API, authenticated with
 * HTTP basic auth (consumer key and secret).
 */

import { createClog } from "@marianmeres/clog";
import { isSuccessStatus } from "../errors.ts";
import type { Transport, TransportRequest, TransportResponse } from "../types/transport.ts";

/** HTTP transport options */
export interface HttpTransportOptions {
	/** Store root, e.g. "https://shop.example.com" */
	baseUrl: string;
	/** REST root relative to `baseUrl` (default: "/wp-json/wc/v3") */
	apiPath?: string;
	consumerKey?: string;
	consumerSecret?: string;
	/** Per-request timeout in ms (default: 30000) */
	timeout?: number;
	/** Custom fetch implementation (default: global fetch) */
	fetch?: typeof fetch;
}

export const DEFAULT_API_PATH = "/wp-json/wc/v3";
export const DEFAULT_TIMEOUT = 30_000;

const trimSlashes = (value: string): string => value.replace(/^\/+|\/+$/g, "");

/** Builds the absolute request URL */
export function buildUrl(
	baseUrl: string,
	apiPath: string,
	request: Pick<TransportRequest, "path" | "query">,
): string {
	const root = [baseUrl.replace(/\/+$/, ""), trimSlashes(apiPath), trimSlashes(request.path)]
		.filter(Boolean)
		.join("/");
	const params = new URLSearchParams();
	for (const [key, value] of Object.entries(request.query ?? {})) {
		params.append(key, String(value));
	}
	const search = params.toString();
	return search ? `${root}?${search}` : root;
}

/**
 * Parses a JSON body. A malformed 2xx body throws `SyntaxError` (a decode
 * failure); any other status keeps the raw text so it still surfaces as a
 * server error carrying its status.
 */
export function parseBody(text: string, status: number): unknown {
	if (text.trim() === "") return null;
	try {
		return JSON.parse(text);
	} catch (e) {
		if (isSuccessStatus(status)) throw e;
		return text;
	}
}

const namedError = (name: string, message: string, cause?: unknown): Error => {
	const e = new Error(message, { cause });
	e.name = name;
	return e;
};

/**
 * Creates a transport issuing real HTTP calls.
 *
 * @example
 * ```typescript
 * const transport = createHttpTransport({
 *   baseUrl: "https://shop.example.com",
 *   consumerKey: "ck_test",
 *   consumerSecret: "cs_test",
 * });
 * ```
 */
export function createHttpTransport(options: HttpTransportOptions): Transport {
	const clog = createClog("woo-client:http", { color: "auto" });
	const apiPath = options.apiPath ?? DEFAULT_API_PATH;
	const timeout = options.timeout ?? DEFAULT_TIMEOUT;
	const doFetch = options.fetch ?? fetch;

	const headers: Record<string, string> = { Accept: "application/json" };
	if (options.consumerKey && options.consumerSecret) {
		const token = Buffer.from(`${options.consumerKey}:${options.consumerSecret}`).toString(
			"base64",
		);
		headers.Authorization = `Basic ${token}`;
	}

	return {
		async request(request: TransportRequest): Promise<TransportResponse> {
			const url = buildUrl(options.baseUrl, apiPath, request);
			const controller = new AbortController();
			let timedOut = false;
			const timer = setTimeout(() => {
				timedOut = true;
				controller.abort();
			}, timeout);
			const onAbort = () => controller.abort();
			request.signal?.addEventListener("abort", onAbort, { once: true });
			if (request.signal?.aborted) controller.abort();

			clog.debug(request.method, url);

			try {
				const response = await doFetch(url, {
					method: request.method,
					headers: request.body === undefined
						? headers
						: { ...headers, "Content-Type": "application/json" },
					body: request.body === undefined ? undefined : JSON.stringify(request.body),
					signal: controller.signal,
				});

				const text = await response.text();
				const responseHeaders: Record<string, string> = {};
				response.headers.forEach((value, key) => {
					responseHeaders[key.toLowerCase()] = value;
				});

				return {
					status: response.status,
					data: parseBody(text, response.status),
					headers: responseHeaders,
				};
			} catch (e) {
				if (timedOut) {
					throw namedError("TimeoutError", `Request timed out after ${timeout}ms`, e);
				}
				if (request.signal?.aborted) {
					throw namedError("AbortError", "Request aborted", e);
				}
				throw e;
			} finally {
				clearTimeout(timer);
				request.signal?.removeEventListener("abort", onAbort);
			}
		},
	};
}
