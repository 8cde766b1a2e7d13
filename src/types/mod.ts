/**
 * @module types
 *
 * Type exports for the transport, client context and event modules.
 */

export * from "./transport.ts";
export * from "./context.ts";
export * from "./events.ts";
