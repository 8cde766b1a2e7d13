/**
 * Mock transport for testing: canned responses keyed by method and path.
 */

import { HTTP_ERROR } from "@marianmeres/http-utils";
import type {
	HttpMethod,
	Transport,
	TransportRequest,
	TransportResponse,
} from "../../types/transport.ts";

/** Canned response; `status` defaults to 200 */
export interface MockReply {
	status?: number;
	data?: unknown;
	headers?: Record<string, string>;
}

export type MockHandler = MockReply | ((request: TransportRequest) => MockReply);

/** Mock transport options */
export interface MockTransportOptions {
	/** Replies keyed by `"<METHOD> <path>"`, e.g. `"GET products/categories"` */
	routes?: Record<string, MockHandler>;
	/** Simulated network delay in ms (default: 0) */
	delay?: number;
	/** Force errors for testing */
	forceError?: {
		method?: HttpMethod;
		path?: string;
		message?: string;
		/** Fail as if no connection could be made, instead of with a 400 */
		network?: boolean;
	};
}

/** Transport that also records every request it received */
export interface MockTransport extends Transport {
	readonly calls: ReadonlyArray<TransportRequest>;
}

/** Body the store answers with for unknown routes */
export const NO_ROUTE = {
	code: "rest_no_route",
	message: "No route was found matching the URL and request method.",
	data: { status: 404 },
} as const;

export const routeKey = (method: HttpMethod, path: string): string => `${method} ${path}`;

/** Create a mock transport for testing */
export function createMockTransport(options: MockTransportOptions = {}): MockTransport {
	const delay = options.delay ?? 0;
	const routes = options.routes ?? {};
	const calls: TransportRequest[] = [];

	const wait = () => new Promise<void>((r) => setTimeout(r, delay));

	const matchesForced = (request: TransportRequest): boolean => {
		const forced = options.forceError;
		if (!forced) return false;
		if (forced.method && forced.method !== request.method) return false;
		if (forced.path !== undefined && forced.path !== request.path) return false;
		return true;
	};

	return {
		calls,
		async request(request: TransportRequest): Promise<TransportResponse> {
			calls.push(request);
			if (delay) await wait();

			if (options.forceError && matchesForced(request)) {
				const message = options.forceError.message ??
					`Mock error for ${routeKey(request.method, request.path)}`;
				if (options.forceError.network) throw new TypeError(message);
				throw new HTTP_ERROR.BadRequest(message);
			}

			const handler = routes[routeKey(request.method, request.path)];
			if (handler === undefined) {
				return { status: 404, data: structuredClone(NO_ROUTE), headers: {} };
			}

			const reply = typeof handler === "function" ? handler(request) : handler;
			return {
				status: reply.status ?? 200,
				data: reply.data === undefined ? null : structuredClone(reply.data),
				headers: { ...reply.headers },
			};
		},
	};
}
