/**
 * @module resources/tax-rate
 *
 * Tax rates (`taxes`). The server does not trash tax rates, so deletes are forced.
 */

import { bool, defineCodec, fake, field, listOf, type Model, num, str } from "../codec/mod.ts";
import type { ListQuery } from "../query.ts";
import { defineResource } from "./descriptor.ts";

export type TaxRateOrderBy = "id" | "order" | "priority";

export interface TaxRateFields {
	id: number;
	/** ISO 3166 country code */
	country: string;
	state: string;
	postcode: string;
	city: string;
	postcodes: readonly string[];
	cities: readonly string[];
	/** Percentage as a decimal string, e.g. "20.0000" */
	rate: string;
	name: string;
	priority: number;
	compound: boolean;
	/** Applies to shipping too */
	shipping: boolean;
	/** Position in the rate list */
	order: number;
	taxClass: string;
}

export type TaxRate = Model<TaxRateFields>;

export interface TaxRateQuery extends ListQuery<TaxRateOrderBy> {
	taxClass?: string;
}

export const taxRateCodec = defineCodec<TaxRateFields>({
	id: field("id", num),
	country: field("country", str),
	state: field("state", str),
	postcode: field("postcode", str),
	city: field("city", str),
	postcodes: field("postcodes", listOf(str)),
	cities: field("cities", listOf(str)),
	rate: field("rate", str),
	name: field("name", str),
	priority: field("priority", num),
	compound: field("compound", bool),
	shipping: field("shipping", bool),
	order: field("order", num),
	taxClass: field("class", str),
});

export const fakeTaxRate = (): TaxRate =>
	Object.freeze({
		id: fake.id(),
		country: fake.countryCode(),
		state: fake.state(),
		postcode: fake.postcode(),
		city: fake.city(),
		postcodes: [],
		cities: [],
		rate: fake.rate(),
		name: fake.word(),
		priority: 1,
		compound: fake.boolean(),
		shipping: fake.boolean(),
		order: fake.integer(),
		taxClass: "standard",
	});

export const taxRateResource = defineResource<TaxRateFields, TaxRateQuery>({
	name: "tax-rate",
	path: "taxes",
	codec: taxRateCodec,
	idKey: "id",
	identify: (rate) => rate.id,
	fake: fakeTaxRate,
	filters: { taxClass: "class" },
	forceDelete: true,
});
