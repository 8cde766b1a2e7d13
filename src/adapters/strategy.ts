/**
 * @module adapters/strategy
 *
 * Execution strategies. A resource operation is described once as an
 * `Operation`; the strategy decides whether it goes over the wire or is
 * synthesized locally. Both return the same promise shape.
 */

import { createClog } from "@marianmeres/clog";
import {
	type ErrorContext,
	isSuccessStatus,
	rejectionFromResponse,
	translateError,
} from "../errors.ts";
import type { ExecutionMode } from "../types/events.ts";
import type { Transport, TransportRequest, TransportResponse } from "../types/transport.ts";

export type OperationName = "list" | "get" | "create" | "update" | "delete" | "batch";

/** One resource operation, in both its live and synthetic forms */
export interface Operation<T> {
	name: OperationName;
	request: TransportRequest;
	/** Turns a 2xx response into the typed result */
	decode(response: TransportResponse): T;
	/** Synthesizes the typed result without I/O */
	fake(): T;
}

export interface ExecutionStrategy {
	readonly mode: ExecutionMode;
	execute<T>(operation: Operation<T>): Promise<T>;
}

/**
 * Live strategy: transport call, status check, decode. Every failure leaves
 * as a `StoreApiError`.
 */
export function createLiveStrategy(transport: Transport): ExecutionStrategy {
	const clog = createClog("woo-client:transport", { color: "auto" });

	return {
		mode: "live",
		async execute<T>(operation: Operation<T>): Promise<T> {
			const { request } = operation;
			const context: ErrorContext = { operation: operation.name, request };
			clog.debug(operation.name, { method: request.method, path: request.path });

			let response: TransportResponse;
			try {
				response = await transport.request(request);
			} catch (e) {
				throw translateError(e, context);
			}

			if (!isSuccessStatus(response.status)) {
				clog.debug("rejected", { path: request.path, status: response.status });
				throw rejectionFromResponse(response, context);
			}

			try {
				return operation.decode(response);
			} catch (e) {
				throw translateError(e, { ...context, fallback: "decode" });
			}
		},
	};
}

/** Fake strategy: never touches the transport */
export function createFakeStrategy(): ExecutionStrategy {
	return {
		mode: "fake",
		async execute<T>(operation: Operation<T>): Promise<T> {
			return operation.fake();
		},
	};
}
