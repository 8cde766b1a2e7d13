/**
 * @module resources/order-note
 *
 * Notes on one order (`orders/{order_id}/notes`). Notes cannot be trashed,
 * so deletes are forced.
 */

import { bool, date, defineCodec, fake, field, type Model, num, str } from "../codec/mod.ts";
import type { ListQuery } from "../query.ts";
import { defineResource } from "./descriptor.ts";

export type OrderNoteType = "any" | "customer" | "internal";

export interface OrderNoteFields {
	id: number;
	author: string;
	dateCreated: Date;
	dateCreatedGmt: Date;
	note: string;
	/** Shown to the customer and emailed to them */
	customerNote: boolean;
	/** Write-only: attribute the note to the current user */
	addedByUser: boolean;
}

export type OrderNote = Model<OrderNoteFields>;

export interface OrderNoteQuery extends ListQuery {
	type?: OrderNoteType;
}

export const orderNoteCodec = defineCodec<OrderNoteFields>(
	{
		id: field("id", num),
		author: field("author", str),
		dateCreated: field("date_created", date),
		dateCreatedGmt: field("date_created_gmt", date),
		note: field("note", str),
		customerNote: field("customer_note", bool),
		addedByUser: field("added_by_user", bool),
	},
	{ required: ["note"] },
);

export const fakeOrderNote = (): OrderNote => {
	const created = fake.datetime();
	return Object.freeze({
		id: fake.id(),
		author: "system",
		dateCreated: created,
		dateCreatedGmt: created,
		note: fake.sentence(),
		customerNote: fake.boolean(),
	});
};

export const orderNoteResource = defineResource<OrderNoteFields, OrderNoteQuery>({
	name: "order-note",
	path: "orders/{order_id}/notes",
	codec: orderNoteCodec,
	idKey: "id",
	identify: (note) => note.id,
	fake: fakeOrderNote,
	filters: { type: "type" },
	forceDelete: true,
});
