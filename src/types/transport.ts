/**
 * @module types/transport
 *
 * Transport interface definitions. The transport is the only place the client
 * touches the network; implement `Transport` to plug in another HTTP stack.
 */

/** HTTP verbs used by the store's REST API */
export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/** Primitive wire query value */
export type QueryValue = string | number | boolean;

/** Wire query-parameter map */
export type QueryParams = Record<string, QueryValue>;

/** A single request, relative to the API root (e.g. `products/categories/12`) */
export interface TransportRequest {
	method: HttpMethod;
	path: string;
	query?: QueryParams;
	/** JSON body (POST and PUT) */
	body?: unknown;
	/** Cancels the in-flight call */
	signal?: AbortSignal;
}

/** A received response, whatever its status */
export interface TransportResponse {
	status: number;
	/** Parsed JSON body (`null` when empty) */
	data: unknown;
	/** Lower-cased response headers */
	headers: Record<string, string>;
}

/**
 * Issues one request and resolves with the response, 2xx or not.
 * Rejects only when no response was received.
 */
export interface Transport {
	request(request: TransportRequest): Promise<TransportResponse>;
}
