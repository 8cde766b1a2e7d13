/**
 * @module resources/shared
 *
 * Sub-models several resources embed.
 */

import { anyJson, defineCodec, fake, field, type Model, num, str } from "../codec/mod.ts";

/** Custom field attached to a resource */
export interface MetaDataFields {
	id: number;
	key: string;
	value: unknown;
}

export type MetaData = Model<MetaDataFields>;

export const metaDataCodec = defineCodec<MetaDataFields>({
	id: field("id", num),
	key: field("key", str),
	value: field("value", anyJson),
});

export const fakeMetaData = (): MetaData =>
	Object.freeze({ id: fake.id(), key: fake.word(), value: fake.word() });

/** Billing or shipping address */
export interface AddressFields {
	firstName: string;
	lastName: string;
	company: string;
	address1: string;
	address2: string;
	city: string;
	state: string;
	postcode: string;
	country: string;
	/** Billing only */
	email: string;
	phone: string;
}

export type Address = Model<AddressFields>;

export const addressCodec = defineCodec<AddressFields>({
	firstName: field("first_name", str),
	lastName: field("last_name", str),
	company: field("company", str),
	address1: field("address_1", str),
	address2: field("address_2", str),
	city: field("city", str),
	state: field("state", str),
	postcode: field("postcode", str),
	country: field("country", str),
	email: field("email", str),
	phone: field("phone", str),
});

export const fakeAddress = (): Address =>
	Object.freeze({
		firstName: fake.firstName(),
		lastName: fake.lastName(),
		company: fake.company(),
		address1: fake.street(),
		address2: "",
		city: fake.city(),
		state: fake.state(),
		postcode: fake.postcode(),
		country: fake.countryCode(),
		email: fake.email(),
		phone: fake.phone(),
	});

/** Reference to a taxonomy term (category or tag) */
export interface TermRefFields {
	id: number;
	name: string;
	slug: string;
}

export type TermRef = Model<TermRefFields>;

export const termRefCodec = defineCodec<TermRefFields>({
	id: field("id", num),
	name: field("name", str),
	slug: field("slug", str),
});

export const fakeTermRef = (): TermRef =>
	Object.freeze({ id: fake.id(), name: fake.word(), slug: fake.slug() });

/** Orderings shared by post-like collections */
export type PostOrderBy = "date" | "id" | "include" | "title" | "slug";

/** Orderings shared by taxonomy term collections */
export type TermOrderBy =
	| "id"
	| "include"
	| "name"
	| "slug"
	| "term_group"
	| "description"
	| "count";
