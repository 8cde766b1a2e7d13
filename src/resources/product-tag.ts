/**
 * @module resources/product-tag
 *
 * Product tags (`products/tags`).
 */

import { defineCodec, fake, field, type Model, num, str } from "../codec/mod.ts";
import type { ListQuery } from "../query.ts";
import { defineResource } from "./descriptor.ts";
import type { TermOrderBy } from "./shared.ts";

export interface ProductTagFields {
	id: number;
	name: string;
	slug: string;
	description: string;
	count: number;
}

export type ProductTag = Model<ProductTagFields>;

export interface ProductTagQuery extends ListQuery<TermOrderBy> {
	hideEmpty?: boolean;
	product?: number;
	slug?: string;
}

export const productTagCodec = defineCodec<ProductTagFields>(
	{
		id: field("id", num),
		name: field("name", str),
		slug: field("slug", str),
		description: field("description", str),
		count: field("count", num),
	},
	{ required: ["name"] },
);

export const fakeProductTag = (): ProductTag =>
	Object.freeze({
		id: fake.id(),
		name: fake.word(),
		slug: fake.slug(),
		description: fake.sentence(),
		count: fake.integer(),
	});

export const productTagResource = defineResource<ProductTagFields, ProductTagQuery>({
	name: "product-tag",
	path: "products/tags",
	codec: productTagCodec,
	idKey: "id",
	identify: (tag) => tag.id,
	fake: fakeProductTag,
	filters: { hideEmpty: "hide_empty", product: "product", slug: "slug" },
});
