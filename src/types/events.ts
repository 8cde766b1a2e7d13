/**
 * Event type definitions for the client event system.
 */

import type { StoreApiError } from "../errors.ts";
import type { ResourceId } from "../codec/mod.ts";

/** Resource identifiers */
export type ResourceName =
	| "category"
	| "product"
	| "product-tag"
	| "product-variation"
	| "tax-rate"
	| "tax-class"
	| "coupon"
	| "customer"
	| "order"
	| "order-note"
	| "shipping-method"
	| "webhook";

/** Which strategy served the call */
export type ExecutionMode = "live" | "fake";

/** Event types emitted by the client */
export type WooClientEventType =
	| "resource:listed"
	| "resource:fetched"
	| "resource:created"
	| "resource:updated"
	| "resource:deleted"
	| "resource:batched"
	| "resource:error";

/** Base event data */
export interface WooClientEventBase {
	/** Event timestamp */
	timestamp: number;
	/** Resource that emitted the event */
	resource: ResourceName;
	mode: ExecutionMode;
}

/** List call completed */
export interface ResourceListedEvent extends WooClientEventBase {
	type: "resource:listed";
	count: number;
}

/** Single item fetched */
export interface ResourceFetchedEvent extends WooClientEventBase {
	type: "resource:fetched";
	id?: ResourceId;
}

/** Item created */
export interface ResourceCreatedEvent extends WooClientEventBase {
	type: "resource:created";
	id?: ResourceId;
}

/** Item updated */
export interface ResourceUpdatedEvent extends WooClientEventBase {
	type: "resource:updated";
	id?: ResourceId;
}

/** Item deleted */
export interface ResourceDeletedEvent extends WooClientEventBase {
	type: "resource:deleted";
	id: ResourceId;
}

/** Batch call completed; item failures are counted, not raised */
export interface ResourceBatchedEvent extends WooClientEventBase {
	type: "resource:batched";
	ok: number;
	failed: number;
	missing: number;
}

/** Operation failed */
export interface ResourceErrorEvent extends WooClientEventBase {
	type: "resource:error";
	operation: string;
	error: StoreApiError;
}

/** All event types union */
export type WooClientEvent =
	| ResourceListedEvent
	| ResourceFetchedEvent
	| ResourceCreatedEvent
	| ResourceUpdatedEvent
	| ResourceDeletedEvent
	| ResourceBatchedEvent
	| ResourceErrorEvent;
