/**
 * @module resources/product
 *
 * Products (`products`). Covers the simple-product field set; attributes
 * are left as raw JSON and variations live in `product-variation.ts`.
 */

import {
	anyJson,
	bool,
	date,
	defineCodec,
	fake,
	field,
	listOf,
	type Model,
	num,
	oneOf,
	str,
} from "../codec/mod.ts";
import type { ListQuery } from "../query.ts";
import { defineResource } from "./descriptor.ts";
import {
	fakeMetaData,
	fakeTermRef,
	type MetaData,
	metaDataCodec,
	type TermRef,
	termRefCodec,
} from "./shared.ts";

export const PRODUCT_TYPES = ["simple", "grouped", "external", "variable"] as const;
export type ProductType = (typeof PRODUCT_TYPES)[number];

export const PRODUCT_STATUSES = ["draft", "pending", "private", "publish"] as const;
export type ProductStatus = (typeof PRODUCT_STATUSES)[number];

export const CATALOG_VISIBILITIES = ["visible", "catalog", "search", "hidden"] as const;
export type CatalogVisibility = (typeof CATALOG_VISIBILITIES)[number];

export const TAX_STATUSES = ["taxable", "shipping", "none"] as const;
export type TaxStatus = (typeof TAX_STATUSES)[number];

export const STOCK_STATUSES = ["instock", "outofstock", "onbackorder"] as const;
export type StockStatus = (typeof STOCK_STATUSES)[number];

export type ProductOrderBy =
	| "date"
	| "id"
	| "include"
	| "title"
	| "slug"
	| "price"
	| "popularity"
	| "rating";

export interface ProductImageFields {
	id: number;
	src: string;
	name: string;
	alt: string;
}

export type ProductImage = Model<ProductImageFields>;

export const productImageCodec = defineCodec<ProductImageFields>({
	id: field("id", num),
	src: field("src", str),
	name: field("name", str),
	alt: field("alt", str),
});

export interface ProductFields {
	id: number;
	name: string;
	slug: string;
	permalink: string;
	dateCreated: Date;
	dateModified: Date;
	type: ProductType;
	status: ProductStatus;
	featured: boolean;
	catalogVisibility: CatalogVisibility;
	description: string;
	shortDescription: string;
	sku: string;
	/** Decimal strings, as the server sends them */
	price: string;
	regularPrice: string;
	salePrice: string;
	onSale: boolean;
	purchasable: boolean;
	totalSales: number;
	virtual: boolean;
	downloadable: boolean;
	taxStatus: TaxStatus;
	taxClass: string;
	manageStock: boolean;
	stockQuantity: number;
	stockStatus: StockStatus;
	weight: string;
	parentId: number;
	categories: readonly TermRef[];
	tags: readonly TermRef[];
	images: readonly ProductImage[];
	attributes: unknown;
	variations: readonly number[];
	metaData: readonly MetaData[];
}

export type Product = Model<ProductFields>;

export interface ProductQuery extends ListQuery<ProductOrderBy> {
	/** Published after this date */
	after?: Date;
	/** Published before this date */
	before?: Date;
	parent?: readonly number[];
	slug?: string;
	sku?: string;
	type?: ProductType;
	featured?: boolean;
	/** Category id */
	category?: string;
	/** Tag id */
	tag?: string;
	status?: ProductStatus | "any";
	onSale?: boolean;
	minPrice?: string;
	maxPrice?: string;
	stockStatus?: StockStatus;
	taxClass?: string;
}

export const productCodec = defineCodec<ProductFields>(
	{
		id: field("id", num),
		name: field("name", str),
		slug: field("slug", str),
		permalink: field("permalink", str),
		dateCreated: field("date_created", date),
		dateModified: field("date_modified", date),
		type: field("type", oneOf(PRODUCT_TYPES, "simple")),
		status: field("status", oneOf(PRODUCT_STATUSES, "publish")),
		featured: field("featured", bool),
		catalogVisibility: field("catalog_visibility", oneOf(CATALOG_VISIBILITIES, "visible")),
		description: field("description", str),
		shortDescription: field("short_description", str),
		sku: field("sku", str),
		price: field("price", str),
		regularPrice: field("regular_price", str),
		salePrice: field("sale_price", str),
		onSale: field("on_sale", bool),
		purchasable: field("purchasable", bool),
		totalSales: field("total_sales", num),
		virtual: field("virtual", bool),
		downloadable: field("downloadable", bool),
		taxStatus: field("tax_status", oneOf(TAX_STATUSES, "taxable")),
		taxClass: field("tax_class", str),
		manageStock: field("manage_stock", bool),
		stockQuantity: field("stock_quantity", num),
		stockStatus: field("stock_status", oneOf(STOCK_STATUSES, "instock")),
		weight: field("weight", str),
		parentId: field("parent_id", num),
		categories: field("categories", listOf(termRefCodec)),
		tags: field("tags", listOf(termRefCodec)),
		images: field("images", listOf(productImageCodec)),
		attributes: field("attributes", anyJson),
		variations: field("variations", listOf(num)),
		metaData: field("meta_data", listOf(metaDataCodec)),
	},
	{ required: ["name"] },
);

export const fakeProductImage = (): ProductImage =>
	Object.freeze({ id: fake.id(), src: fake.image(), name: fake.word(), alt: fake.word() });

export const fakeProduct = (): Product => {
	const regularPrice = fake.price();
	return Object.freeze({
		id: fake.id(),
		name: fake.word(),
		slug: fake.slug(),
		permalink: fake.url(),
		dateCreated: fake.datetime(),
		dateModified: fake.datetime(),
		type: fake.pick(PRODUCT_TYPES),
		status: fake.pick(PRODUCT_STATUSES),
		featured: fake.boolean(),
		catalogVisibility: fake.pick(CATALOG_VISIBILITIES),
		description: fake.sentence(),
		shortDescription: fake.sentence(),
		sku: fake.slug(),
		price: regularPrice,
		regularPrice,
		salePrice: "",
		onSale: false,
		purchasable: true,
		totalSales: fake.integer(),
		virtual: fake.boolean(),
		downloadable: fake.boolean(),
		taxStatus: fake.pick(TAX_STATUSES),
		taxClass: "",
		manageStock: fake.boolean(),
		stockQuantity: fake.integer(),
		stockStatus: fake.pick(STOCK_STATUSES),
		weight: String(fake.integer()),
		parentId: 0,
		categories: fake.list(fakeTermRef),
		tags: fake.list(fakeTermRef),
		images: fake.list(fakeProductImage),
		variations: [],
		metaData: fake.list(fakeMetaData),
	});
};

export const productResource = defineResource<ProductFields, ProductQuery>({
	name: "product",
	path: "products",
	codec: productCodec,
	idKey: "id",
	identify: (product) => product.id,
	fake: fakeProduct,
	filters: {
		after: "after",
		before: "before",
		parent: "parent",
		slug: "slug",
		sku: "sku",
		type: "type",
		featured: "featured",
		category: "category",
		tag: "tag",
		status: "status",
		onSale: "on_sale",
		minPrice: "min_price",
		maxPrice: "max_price",
		stockStatus: "stock_status",
		taxClass: "tax_class",
	},
});
