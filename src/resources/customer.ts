/**
 * @module resources/customer
 *
 * Customers (`customers`). The server does not trash customers, so deletes are forced.
 */

import { bool, date, defineCodec, fake, field, listOf, type Model, num, str } from "../codec/mod.ts";
import type { ListQuery } from "../query.ts";
import { defineResource } from "./descriptor.ts";
import {
	type Address,
	addressCodec,
	fakeAddress,
	fakeMetaData,
	type MetaData,
	metaDataCodec,
} from "./shared.ts";

export type CustomerOrderBy = "id" | "include" | "name" | "registered_date";

export interface CustomerFields {
	id: number;
	dateCreated: Date;
	dateModified: Date;
	email: string;
	firstName: string;
	lastName: string;
	role: string;
	username: string;
	/** Write-only */
	password: string;
	billing: Address;
	shipping: Address;
	isPayingCustomer: boolean;
	avatarUrl: string;
	metaData: readonly MetaData[];
}

export type Customer = Model<CustomerFields>;

export interface CustomerQuery extends ListQuery<CustomerOrderBy> {
	email?: string;
	/** "all", "customer", "administrator", "shop_manager", ... */
	role?: string;
}

export const customerCodec = defineCodec<CustomerFields>(
	{
		id: field("id", num),
		dateCreated: field("date_created", date),
		dateModified: field("date_modified", date),
		email: field("email", str),
		firstName: field("first_name", str),
		lastName: field("last_name", str),
		role: field("role", str),
		username: field("username", str),
		password: field("password", str),
		billing: field("billing", addressCodec),
		shipping: field("shipping", addressCodec),
		isPayingCustomer: field("is_paying_customer", bool),
		avatarUrl: field("avatar_url", str),
		metaData: field("meta_data", listOf(metaDataCodec)),
	},
	{ required: ["email"] },
);

export const fakeCustomer = (): Customer =>
	Object.freeze({
		id: fake.id(),
		dateCreated: fake.datetime(),
		dateModified: fake.datetime(),
		email: fake.email(),
		firstName: fake.firstName(),
		lastName: fake.lastName(),
		role: "customer",
		username: fake.username(),
		billing: fakeAddress(),
		shipping: fakeAddress(),
		isPayingCustomer: fake.boolean(),
		avatarUrl: fake.image(),
		metaData: fake.list(fakeMetaData),
	});

export const customerResource = defineResource<CustomerFields, CustomerQuery>({
	name: "customer",
	path: "customers",
	codec: customerCodec,
	idKey: "id",
	identify: (customer) => customer.id,
	fake: fakeCustomer,
	filters: { email: "email", role: "role" },
	forceDelete: true,
});
