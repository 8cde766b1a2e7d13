/**
 * @module resources/tax-class
 *
 * Tax classes (`taxes/classes`), identified by slug.
 */

import { defineCodec, fake, field, type Model, str } from "../codec/mod.ts";
import type { ListQuery } from "../query.ts";
import { defineResource } from "./descriptor.ts";

export interface TaxClassFields {
	slug: string;
	name: string;
}

export type TaxClass = Model<TaxClassFields>;

export const taxClassCodec = defineCodec<TaxClassFields>(
	{
		slug: field("slug", str),
		name: field("name", str),
	},
	{ required: ["name"] },
);

export const fakeTaxClass = (): TaxClass =>
	Object.freeze({ slug: fake.slug(), name: fake.word() });

export const taxClassResource = defineResource<TaxClassFields, ListQuery>({
	name: "tax-class",
	path: "taxes/classes",
	codec: taxClassCodec,
	idKey: "slug",
	identify: (taxClass) => taxClass.slug,
	fake: fakeTaxClass,
	filters: {},
	forceDelete: true,
});
