/**
 * @module types/context
 *
 * Client context and per-call options.
 */

import type { CredentialStore } from "../credentials.ts";

/** Context shared by every resource client of one `WooClient` */
export interface ClientContext {
	/** Client-wide faking flag: synthesize results instead of calling the network */
	fake: boolean;
	/** Persisted user identifier (read-only for resource clients) */
	credentials: CredentialStore;
}

/** Context scope: which fields the server includes in a response */
export type ContextScope = "view" | "edit";

/** Options accepted by every resource operation */
export interface CallOptions {
	/** Overrides the client-wide faking flag for this call */
	fake?: boolean;
	/** Abandons the in-flight call */
	signal?: AbortSignal;
}

/** Options for single-item reads */
export interface GetOptions extends CallOptions {
	context?: ContextScope;
}

/** Options for deletes */
export interface DeleteOptions extends CallOptions {
	/** Delete permanently instead of moving to trash */
	force?: boolean;
}
