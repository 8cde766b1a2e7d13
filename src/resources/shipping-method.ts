/**
 * @module resources/shipping-method
 *
 * Shipping methods (`shipping_methods`). Read-only; identified by a string id.
 */

import { defineCodec, fake, field, type Model, str } from "../codec/mod.ts";
import type { ListQuery } from "../query.ts";
import { defineResource } from "./descriptor.ts";

export interface ShippingMethodFields {
	/** e.g. "flat_rate" */
	id: string;
	title: string;
	description: string;
}

export type ShippingMethod = Model<ShippingMethodFields>;

export const shippingMethodCodec = defineCodec<ShippingMethodFields>({
	id: field("id", str),
	title: field("title", str),
	description: field("description", str),
});

export const fakeShippingMethod = (): ShippingMethod =>
	Object.freeze({
		id: fake.pick(["flat_rate", "free_shipping", "local_pickup"]),
		title: fake.word(),
		description: fake.sentence(),
	});

export const shippingMethodResource = defineResource<ShippingMethodFields, ListQuery>({
	name: "shipping-method",
	path: "shipping_methods",
	codec: shippingMethodCodec,
	idKey: "id",
	identify: (method) => method.id,
	fake: fakeShippingMethod,
	filters: {},
});
