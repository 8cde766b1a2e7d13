/**
 * @module resources/category
 *
 * Product categories (`products/categories`).
 */

import { date, defineCodec, fake, field, type Model, num, oneOf, str } from "../codec/mod.ts";
import type { ListQuery } from "../query.ts";
import { defineResource } from "./descriptor.ts";
import type { TermOrderBy } from "./shared.ts";

/** Archive display type */
export const CATEGORY_DISPLAYS = ["default", "products", "subcategories", "both"] as const;
export type CategoryDisplay = (typeof CATEGORY_DISPLAYS)[number];

export interface CategoryImageFields {
	id: number;
	dateCreated: Date;
	dateCreatedGmt: Date;
	dateModified: Date;
	dateModifiedGmt: Date;
	src: string;
	name: string;
	alt: string;
}

export type CategoryImage = Model<CategoryImageFields>;

export const categoryImageCodec = defineCodec<CategoryImageFields>({
	id: field("id", num),
	dateCreated: field("date_created", date),
	dateCreatedGmt: field("date_created_gmt", date),
	dateModified: field("date_modified", date),
	dateModifiedGmt: field("date_modified_gmt", date),
	src: field("src", str),
	name: field("name", str),
	alt: field("alt", str),
});

export interface CategoryFields {
	id: number;
	name: string;
	slug: string;
	/** Parent category id, 0 for top level */
	parent: number;
	description: string;
	display: CategoryDisplay;
	image: CategoryImage;
	menuOrder: number;
	/** Number of published products */
	count: number;
}

export type Category = Model<CategoryFields>;

export interface CategoryQuery extends ListQuery<TermOrderBy> {
	/** Hide categories without products */
	hideEmpty?: boolean;
	/** Only children of this category */
	parent?: number;
	/** Only categories assigned to this product */
	product?: number;
	slug?: string;
}

export const categoryCodec = defineCodec<CategoryFields>(
	{
		id: field("id", num),
		name: field("name", str),
		slug: field("slug", str),
		parent: field("parent", num),
		description: field("description", str),
		display: field("display", oneOf(CATEGORY_DISPLAYS, "default")),
		image: field("image", categoryImageCodec),
		menuOrder: field("menu_order", num),
		count: field("count", num),
	},
	{ required: ["name"] },
);

export const fakeCategoryImage = (): CategoryImage => {
	const created = fake.datetime();
	return Object.freeze({
		id: fake.id(),
		dateCreated: created,
		dateCreatedGmt: created,
		dateModified: created,
		dateModifiedGmt: created,
		src: fake.image(),
		name: fake.word(),
		alt: fake.sentence(),
	});
};

export const fakeCategory = (): Category =>
	Object.freeze({
		id: fake.id(),
		name: fake.word(),
		slug: fake.slug(),
		parent: fake.integer(),
		description: fake.sentence(),
		display: fake.pick(CATEGORY_DISPLAYS),
		image: fakeCategoryImage(),
		menuOrder: fake.integer(),
		count: fake.integer(),
	});

export const categoryResource = defineResource<CategoryFields, CategoryQuery>({
	name: "category",
	path: "products/categories",
	codec: categoryCodec,
	idKey: "id",
	identify: (category) => category.id,
	fake: fakeCategory,
	filters: {
		hideEmpty: "hide_empty",
		parent: "parent",
		product: "product",
		slug: "slug",
	},
});
