/**
 * @module errors
 *
 * Error normalization. Every failure surfacing from a resource operation is a
 * `StoreApiError`; batch item failures are carried as data instead (see `batch.ts`).
 */

import { HTTP_ERROR } from "@marianmeres/http-utils";
import type { TransportRequest, TransportResponse } from "./types/transport.ts";

/**
 * Failure taxonomy.
 *
 * - `transport`: no response (connection refused, DNS, timeout, abort)
 * - `server`: non-2xx response (validation, auth, not found, server fault)
 * - `decode`: response body did not have the expected shape
 * - `request`: the request could not be formed, nothing was sent
 */
export type StoreErrorKind = "transport" | "server" | "decode" | "request";

export interface StoreApiErrorOptions {
	kind: StoreErrorKind;
	/** HTTP status, when a response was received */
	status?: number;
	/** Server-supplied (or synthesized) error code */
	code?: string;
	/** Server-supplied extra error data */
	data?: unknown;
	/** Operation that failed, e.g. "list" */
	operation?: string;
	method?: string;
	path?: string;
	cause?: unknown;
}

/**
 * The single exception type thrown by the client.
 */
export class StoreApiError extends Error {
	readonly kind: StoreErrorKind;
	readonly status?: number;
	readonly code?: string;
	readonly data?: unknown;
	readonly operation?: string;
	readonly method?: string;
	readonly path?: string;

	constructor(message: string, options: StoreApiErrorOptions) {
		super(message, { cause: options.cause });
		this.name = "StoreApiError";
		this.kind = options.kind;
		this.status = options.status;
		this.code = options.code;
		this.data = options.data;
		this.operation = options.operation;
		this.method = options.method;
		this.path = options.path;
	}
}

/** Context attached to a translated error */
export interface ErrorContext {
	operation?: string;
	request?: TransportRequest;
	/** Kind given to errors nothing more specific matches (default: "transport") */
	fallback?: "transport" | "decode";
}

/** Shape of the store's REST error bodies */
interface WireError {
	code?: string;
	message?: string;
	data?: unknown;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/** Reads `{ code, message, data }` out of an error body, if it has that shape */
export function readWireError(body: unknown): WireError {
	if (!isRecord(body)) return {};
	return {
		code: typeof body.code === "string" ? body.code : undefined,
		message: typeof body.message === "string" ? body.message : undefined,
		data: body.data,
	};
}

/** Returns the status nested in a server error's `data`, if any */
export function readWireStatus(data: unknown): number | undefined {
	if (isRecord(data) && typeof data.status === "number") return data.status;
	return undefined;
}

/** True for 2xx statuses */
export const isSuccessStatus = (status: number): boolean =>
	status >= 200 && status < 300;

/**
 * Builds the `server` error for a non-2xx response.
 */
export function rejectionFromResponse(
	response: TransportResponse,
	context: ErrorContext = {},
): StoreApiError {
	const wire = readWireError(response.data);
	return new StoreApiError(
		wire.message ?? `Request failed with status ${response.status}`,
		{
			kind: "server",
			status: response.status,
			code: wire.code ?? `http_${response.status}`,
			data: wire.data,
			operation: context.operation,
			method: context.request?.method,
			path: context.request?.path,
		},
	);
}

/**
 * Normalizes anything thrown while performing an operation into a `StoreApiError`.
 * Already-translated errors pass through, gaining the operation context they lack.
 */
export function translateError(e: unknown, context: ErrorContext = {}): StoreApiError {
	if (e instanceof StoreApiError) {
		if (e.operation || !context.operation) return e;
		return new StoreApiError(e.message, {
			kind: e.kind,
			status: e.status,
			code: e.code,
			data: e.data,
			operation: context.operation,
			method: e.method ?? context.request?.method,
			path: e.path ?? context.request?.path,
			cause: e.cause,
		});
	}

	const base = {
		operation: context.operation,
		method: context.request?.method,
		path: context.request?.path,
		cause: e,
	};
	const message = e instanceof Error ? e.message : String(e);

	if (e instanceof HTTP_ERROR.HttpError) {
		return new StoreApiError(message, {
			...base,
			kind: "server",
			status: e.status,
			code: `http_${e.status}`,
		});
	}

	if (e instanceof Error && e.name === "TimeoutError") {
		return new StoreApiError(message, { ...base, kind: "transport", code: "timeout" });
	}
	if (e instanceof Error && e.name === "AbortError") {
		return new StoreApiError(message, { ...base, kind: "transport", code: "aborted" });
	}
	if (e instanceof SyntaxError) {
		return new StoreApiError(message, { ...base, kind: "decode", code: "invalid_json" });
	}

	const fallback = context.fallback ?? "transport";
	return new StoreApiError(message || "Network error", {
		...base,
		kind: fallback,
		code: fallback === "transport" ? "network" : "invalid_payload",
	});
}

/** Decode failure for a payload that does not match its codec */
export function decodeFailure(path: string, expected: string, actual: unknown): StoreApiError {
	const got = actual === null ? "null" : Array.isArray(actual) ? "array" : typeof actual;
	return new StoreApiError(`Expected ${expected} at "${path}", got ${got}`, {
		kind: "decode",
		code: "unexpected_shape",
	});
}
