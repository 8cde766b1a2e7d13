/**
 * @module woo-resource-client
 *
 * Typed client for a store's WooCommerce REST API (v3), with a faking layer
 * for offline use, batch aggregation and one error type.
 *
 * @example Basic usage
 * ```typescript
 * import { createWooClient } from "woo-resource-client";
 *
 * const woo = createWooClient({
 *   baseUrl: "https://shop.example.com",
 *   consumerKey: "ck_test",
 *   consumerSecret: "cs_test",
 * });
 *
 * woo.on("resource:error", (e) => console.error(e.error.code));
 *
 * const categories = await woo.categories.list({ hideEmpty: true, perPage: 20 });
 * const result = await woo.categories.batch({ create: [{ name: "Shoes" }], delete: [12] });
 * ```
 *
 * @example Faking
 * ```typescript
 * const woo = createWooClient({ fake: true });
 * const orders = await woo.orders.list({ perPage: 5 }); // five synthesized orders
 * ```
 */

// Main exports
export { createWooClient, WooClient } from "./client.ts";
export type { OrderNoteClient, ShippingMethodClient, TaxClassClient } from "./client.ts";
export * from "./config.ts";
export * from "./credentials.ts";
export * from "./errors.ts";
export * from "./query.ts";
export * from "./batch.ts";

// Codec
export * from "./codec/mod.ts";

// Types
export * from "./types/mod.ts";

// Resources (descriptors, models, generic client)
export * from "./resources/mod.ts";

// Transports and execution strategies (including the mock transport for testing)
export * from "./adapters/mod.ts";
