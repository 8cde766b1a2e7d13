/**
 * @module resources
 *
 * Generic resource client, descriptors and per-resource models.
 */

export * from "./base.ts";
export * from "./descriptor.ts";
export * from "./shared.ts";
export * from "./category.ts";
export * from "./product-tag.ts";
export * from "./product.ts";
export * from "./product-variation.ts";
export * from "./tax-rate.ts";
export * from "./tax-class.ts";
export * from "./coupon.ts";
export * from "./customer.ts";
export * from "./order.ts";
export * from "./order-note.ts";
export * from "./shipping-method.ts";
export * from "./webhook.ts";
