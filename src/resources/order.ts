/**
 * @module resources/order
 *
 * Orders (`orders`).
 */

import {
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
	type Address,
	addressCodec,
	fakeAddress,
	fakeMetaData,
	type MetaData,
	metaDataCodec,
	type PostOrderBy,
} from "./shared.ts";

export const ORDER_STATUSES = [
	"pending",
	"processing",
	"on-hold",
	"completed",
	"cancelled",
	"refunded",
	"failed",
	"trash",
] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export interface LineItemFields {
	id: number;
	name: string;
	productId: number;
	variationId: number;
	quantity: number;
	taxClass: string;
	subtotal: string;
	subtotalTax: string;
	total: string;
	totalTax: string;
	sku: string;
	price: number;
	metaData: readonly MetaData[];
}

export type LineItem = Model<LineItemFields>;

export const lineItemCodec = defineCodec<LineItemFields>({
	id: field("id", num),
	name: field("name", str),
	productId: field("product_id", num),
	variationId: field("variation_id", num),
	quantity: field("quantity", num),
	taxClass: field("tax_class", str),
	subtotal: field("subtotal", str),
	subtotalTax: field("subtotal_tax", str),
	total: field("total", str),
	totalTax: field("total_tax", str),
	sku: field("sku", str),
	price: field("price", num),
	metaData: field("meta_data", listOf(metaDataCodec)),
});

export interface ShippingLineFields {
	id: number;
	methodTitle: string;
	methodId: string;
	total: string;
	totalTax: string;
}

export type ShippingLine = Model<ShippingLineFields>;

export const shippingLineCodec = defineCodec<ShippingLineFields>({
	id: field("id", num),
	methodTitle: field("method_title", str),
	methodId: field("method_id", str),
	total: field("total", str),
	totalTax: field("total_tax", str),
});

export interface OrderFields {
	id: number;
	parentId: number;
	number: string;
	orderKey: string;
	createdVia: string;
	version: string;
	status: OrderStatus;
	/** ISO 4217 currency code */
	currency: string;
	dateCreated: Date;
	dateModified: Date;
	discountTotal: string;
	discountTax: string;
	shippingTotal: string;
	shippingTax: string;
	cartTax: string;
	total: string;
	totalTax: string;
	pricesIncludeTax: boolean;
	customerId: number;
	customerIpAddress: string;
	customerNote: string;
	billing: Address;
	shipping: Address;
	paymentMethod: string;
	paymentMethodTitle: string;
	transactionId: string;
	datePaid: Date;
	dateCompleted: Date;
	cartHash: string;
	lineItems: readonly LineItem[];
	shippingLines: readonly ShippingLine[];
	metaData: readonly MetaData[];
	/** Write-only: marks the order paid and reduces stock */
	setPaid: boolean;
}

export type Order = Model<OrderFields>;

export interface OrderQuery extends ListQuery<PostOrderBy> {
	after?: Date;
	before?: Date;
	status?: readonly OrderStatus[];
	/** Customer id */
	customer?: number;
	/** Product id */
	product?: number;
	/** Decimal points used in totals */
	dp?: number;
	parent?: readonly number[];
	parentExclude?: readonly number[];
}

export const orderCodec = defineCodec<OrderFields>({
	id: field("id", num),
	parentId: field("parent_id", num),
	number: field("number", str),
	orderKey: field("order_key", str),
	createdVia: field("created_via", str),
	version: field("version", str),
	status: field("status", oneOf(ORDER_STATUSES, "pending")),
	currency: field("currency", str),
	dateCreated: field("date_created", date),
	dateModified: field("date_modified", date),
	discountTotal: field("discount_total", str),
	discountTax: field("discount_tax", str),
	shippingTotal: field("shipping_total", str),
	shippingTax: field("shipping_tax", str),
	cartTax: field("cart_tax", str),
	total: field("total", str),
	totalTax: field("total_tax", str),
	pricesIncludeTax: field("prices_include_tax", bool),
	customerId: field("customer_id", num),
	customerIpAddress: field("customer_ip_address", str),
	customerNote: field("customer_note", str),
	billing: field("billing", addressCodec),
	shipping: field("shipping", addressCodec),
	paymentMethod: field("payment_method", str),
	paymentMethodTitle: field("payment_method_title", str),
	transactionId: field("transaction_id", str),
	datePaid: field("date_paid", date),
	dateCompleted: field("date_completed", date),
	cartHash: field("cart_hash", str),
	lineItems: field("line_items", listOf(lineItemCodec)),
	shippingLines: field("shipping_lines", listOf(shippingLineCodec)),
	metaData: field("meta_data", listOf(metaDataCodec)),
	setPaid: field("set_paid", bool),
});

export const fakeLineItem = (): LineItem => {
	const price = fake.integer();
	const quantity = fake.integer() % 5 + 1;
	const total = (price * quantity).toFixed(2);
	return Object.freeze({
		id: fake.id(),
		name: fake.word(),
		productId: fake.id(),
		variationId: 0,
		quantity,
		taxClass: "",
		subtotal: total,
		subtotalTax: "0.00",
		total,
		totalTax: "0.00",
		sku: fake.slug(),
		price,
		metaData: [],
	});
};

export const fakeOrder = (): Order => {
	const created = fake.datetime();
	return Object.freeze({
		id: fake.id(),
		parentId: 0,
		number: String(fake.id()),
		orderKey: `wc_order_${fake.slug()}`,
		createdVia: "rest-api",
		version: "8.0.0",
		status: fake.pick(ORDER_STATUSES),
		currency: "USD",
		dateCreated: created,
		dateModified: created,
		discountTotal: "0.00",
		discountTax: "0.00",
		shippingTotal: fake.price(),
		shippingTax: "0.00",
		cartTax: "0.00",
		total: fake.price(),
		totalTax: "0.00",
		pricesIncludeTax: fake.boolean(),
		customerId: fake.id(),
		customerNote: fake.sentence(),
		billing: fakeAddress(),
		shipping: fakeAddress(),
		paymentMethod: "bacs",
		paymentMethodTitle: "Direct bank transfer",
		lineItems: fake.list(fakeLineItem),
		shippingLines: [],
		metaData: fake.list(fakeMetaData),
	});
};

export const orderResource = defineResource<OrderFields, OrderQuery>({
	name: "order",
	path: "orders",
	codec: orderCodec,
	idKey: "id",
	identify: (order) => order.id,
	fake: fakeOrder,
	filters: {
		after: "after",
		before: "before",
		status: "status",
		customer: "customer",
		product: "product",
		dp: "dp",
		parent: "parent",
		parentExclude: "parent_exclude",
	},
});
