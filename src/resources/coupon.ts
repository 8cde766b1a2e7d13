/**
 * @module resources/coupon
 *
 * Coupons (`coupons`).
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
import { fakeMetaData, type MetaData, metaDataCodec, type PostOrderBy } from "./shared.ts";

export const DISCOUNT_TYPES = ["percent", "fixed_cart", "fixed_product"] as const;
export type DiscountType = (typeof DISCOUNT_TYPES)[number];

export interface CouponFields {
	id: number;
	code: string;
	/** Decimal string; percentage or fixed amount depending on `discountType` */
	amount: string;
	dateCreated: Date;
	dateModified: Date;
	discountType: DiscountType;
	description: string;
	dateExpires: Date;
	usageCount: number;
	individualUse: boolean;
	productIds: readonly number[];
	excludedProductIds: readonly number[];
	usageLimit: number;
	usageLimitPerUser: number;
	freeShipping: boolean;
	excludeSaleItems: boolean;
	minimumAmount: string;
	maximumAmount: string;
	emailRestrictions: readonly string[];
	usedBy: readonly string[];
	metaData: readonly MetaData[];
}

export type Coupon = Model<CouponFields>;

export interface CouponQuery extends ListQuery<PostOrderBy> {
	code?: string;
	after?: Date;
	before?: Date;
}

export const couponCodec = defineCodec<CouponFields>(
	{
		id: field("id", num),
		code: field("code", str),
		amount: field("amount", str),
		dateCreated: field("date_created", date),
		dateModified: field("date_modified", date),
		discountType: field("discount_type", oneOf(DISCOUNT_TYPES, "fixed_cart")),
		description: field("description", str),
		dateExpires: field("date_expires", date),
		usageCount: field("usage_count", num),
		individualUse: field("individual_use", bool),
		productIds: field("product_ids", listOf(num)),
		excludedProductIds: field("excluded_product_ids", listOf(num)),
		usageLimit: field("usage_limit", num),
		usageLimitPerUser: field("usage_limit_per_user", num),
		freeShipping: field("free_shipping", bool),
		excludeSaleItems: field("exclude_sale_items", bool),
		minimumAmount: field("minimum_amount", str),
		maximumAmount: field("maximum_amount", str),
		emailRestrictions: field("email_restrictions", listOf(str)),
		usedBy: field("used_by", listOf(str)),
		metaData: field("meta_data", listOf(metaDataCodec)),
	},
	{ required: ["code"] },
);

export const fakeCoupon = (): Coupon =>
	Object.freeze({
		id: fake.id(),
		code: fake.slug(),
		amount: fake.price(),
		dateCreated: fake.datetime(),
		dateModified: fake.datetime(),
		discountType: fake.pick(DISCOUNT_TYPES),
		description: fake.sentence(),
		dateExpires: fake.datetime(),
		usageCount: fake.integer(),
		individualUse: fake.boolean(),
		productIds: fake.list(fake.id),
		excludedProductIds: [],
		usageLimit: fake.integer(),
		usageLimitPerUser: fake.integer(),
		freeShipping: fake.boolean(),
		excludeSaleItems: fake.boolean(),
		minimumAmount: "0.00",
		maximumAmount: "0.00",
		emailRestrictions: [],
		usedBy: fake.list(fake.email),
		metaData: fake.list(fakeMetaData),
	});

export const couponResource = defineResource<CouponFields, CouponQuery>({
	name: "coupon",
	path: "coupons",
	codec: couponCodec,
	idKey: "id",
	identify: (coupon) => coupon.id,
	fake: fakeCoupon,
	filters: { code: "code", after: "after", before: "before" },
});
