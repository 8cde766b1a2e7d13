/**
 * @module resources/product-variation
 *
 * Variations of one variable product (`products/{product_id}/variations`).
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
	fakeProductImage,
	PRODUCT_STATUSES,
	type ProductImage,
	productImageCodec,
	type ProductOrderBy,
	type ProductStatus,
	STOCK_STATUSES,
	type StockStatus,
	TAX_STATUSES,
	type TaxStatus,
} from "./product.ts";
import { fakeMetaData, type MetaData, metaDataCodec } from "./shared.ts";

export interface ProductVariationFields {
	id: number;
	permalink: string;
	dateCreated: Date;
	dateModified: Date;
	status: ProductStatus;
	description: string;
	sku: string;
	price: string;
	regularPrice: string;
	salePrice: string;
	dateOnSaleFrom: Date;
	dateOnSaleTo: Date;
	onSale: boolean;
	purchasable: boolean;
	virtual: boolean;
	downloadable: boolean;
	taxStatus: TaxStatus;
	taxClass: string;
	manageStock: boolean;
	stockQuantity: number;
	stockStatus: StockStatus;
	weight: string;
	image: ProductImage;
	menuOrder: number;
	/** Chosen attribute options, e.g. `[{ id: 6, option: "Red" }]` */
	attributes: unknown;
	metaData: readonly MetaData[];
}

export type ProductVariation = Model<ProductVariationFields>;

export interface ProductVariationQuery extends ListQuery<ProductOrderBy> {
	after?: Date;
	before?: Date;
	sku?: string;
	status?: ProductStatus | "any";
	onSale?: boolean;
	minPrice?: string;
	maxPrice?: string;
	stockStatus?: StockStatus;
	taxClass?: string;
}

export const productVariationCodec = defineCodec<ProductVariationFields>({
	id: field("id", num),
	permalink: field("permalink", str),
	dateCreated: field("date_created", date),
	dateModified: field("date_modified", date),
	status: field("status", oneOf(PRODUCT_STATUSES, "publish")),
	description: field("description", str),
	sku: field("sku", str),
	price: field("price", str),
	regularPrice: field("regular_price", str),
	salePrice: field("sale_price", str),
	dateOnSaleFrom: field("date_on_sale_from", date),
	dateOnSaleTo: field("date_on_sale_to", date),
	onSale: field("on_sale", bool),
	purchasable: field("purchasable", bool),
	virtual: field("virtual", bool),
	downloadable: field("downloadable", bool),
	taxStatus: field("tax_status", oneOf(TAX_STATUSES, "taxable")),
	taxClass: field("tax_class", str),
	manageStock: field("manage_stock", bool),
	stockQuantity: field("stock_quantity", num),
	stockStatus: field("stock_status", oneOf(STOCK_STATUSES, "instock")),
	weight: field("weight", str),
	image: field("image", productImageCodec),
	menuOrder: field("menu_order", num),
	attributes: field("attributes", anyJson),
	metaData: field("meta_data", listOf(metaDataCodec)),
});

export const fakeProductVariation = (): ProductVariation => {
	const regularPrice = fake.price();
	return Object.freeze({
		id: fake.id(),
		permalink: fake.url(),
		dateCreated: fake.datetime(),
		dateModified: fake.datetime(),
		status: "publish",
		description: fake.sentence(),
		sku: fake.slug(),
		price: regularPrice,
		regularPrice,
		salePrice: "",
		onSale: false,
		purchasable: true,
		virtual: fake.boolean(),
		downloadable: fake.boolean(),
		taxStatus: fake.pick(TAX_STATUSES),
		taxClass: "",
		manageStock: fake.boolean(),
		stockQuantity: fake.integer(),
		stockStatus: fake.pick(STOCK_STATUSES),
		weight: String(fake.integer()),
		image: fakeProductImage(),
		menuOrder: fake.integer(),
		metaData: fake.list(fakeMetaData),
	});
};

export const productVariationResource = defineResource<ProductVariationFields, ProductVariationQuery>({
	name: "product-variation",
	path: "products/{product_id}/variations",
	codec: productVariationCodec,
	idKey: "id",
	identify: (variation) => variation.id,
	fake: fakeProductVariation,
	filters: {
		after: "after",
		before: "before",
		sku: "sku",
		status: "status",
		onSale: "on_sale",
		minPrice: "min_price",
		maxPrice: "max_price",
		stockStatus: "stock_status",
		taxClass: "tax_class",
	},
});
