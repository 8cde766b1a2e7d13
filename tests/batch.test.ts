import assert from "node:assert/strict";
import { afterEach, beforeEach, test } from "node:test";
import { createClog } from "@marianmeres/clog";
import {
	buildBatchBody,
	correlateBatch,
	decodeBatchResponse,
	failedOutcomes,
	resolveBatch,
	synthesizeBatch,
} from "../src/batch.ts";
import { StoreApiError } from "../src/errors.ts";
import { type CategoryFields, categoryResource } from "../src/resources/category.ts";
import { type TaxClassFields, taxClassResource } from "../src/resources/tax-class.ts";

beforeEach(() => {
	createClog.global.debug = false;
});

afterEach(() => {
	createClog.reset();
});

test("a batch with only creates serializes only the create list", () => {
	const body = buildBatchBody<CategoryFields>(categoryResource, {
		create: [{ name: "Shoes" }],
		update: [],
		delete: [],
	});
	assert.deepEqual(body, { create: [{ name: "Shoes" }] });
});

test("delete entries serialize to identifiers where they have one", () => {
	const body = buildBatchBody<CategoryFields>(categoryResource, {
		update: [{ id: 3, name: "Boots" }],
		delete: [5, { id: 6, name: "Old" }, { name: "No id" }],
	});
	assert.deepEqual(body, {
		update: [{ id: 3, name: "Boots" }],
		delete: [5, 6, { name: "No id" }],
	});
});

test("string identifiers work for slug-keyed resources", () => {
	const body = buildBatchBody<TaxClassFields>(taxClassResource, { delete: ["reduced-rate", { slug: "zero-rate" }] });
	assert.deepEqual(body, { delete: ["reduced-rate", "zero-rate"] });
});

test("response items with an error marker decode as failed items", () => {
	const response = decodeBatchResponse<CategoryFields>(categoryResource, {
		create: [{ id: 10, name: "Shoes" }],
		delete: [
			{
				id: 99,
				error: {
					code: "woocommerce_rest_term_invalid",
					message: "Resource does not exist.",
					data: { status: 404 },
				},
			},
		],
	});

	assert.deepEqual(response.create, [{ ok: true, id: 10, model: { id: 10, name: "Shoes" } }]);
	assert.deepEqual(response.update, []);
	assert.deepEqual(response.delete, [
		{
			ok: false,
			id: 99,
			error: {
				code: "woocommerce_rest_term_invalid",
				message: "Resource does not exist.",
				status: 404,
				data: { status: 404 },
			},
		},
	]);
});

test("a malformed envelope is a decode error", () => {
	assert.throws(
		() => decodeBatchResponse<CategoryFields>(categoryResource, { update: {} }),
		(e: unknown) => e instanceof StoreApiError && e.kind === "decode",
	);
	assert.throws(
		() => decodeBatchResponse<CategoryFields>(categoryResource, "ok"),
		(e: unknown) => e instanceof StoreApiError && e.kind === "decode",
	);
});

test("an item that does not decode fails alone", () => {
	const result = resolveBatch<CategoryFields>(
		categoryResource,
		{ update: [{ id: 1, name: "A" }, { id: 2, name: "B" }], delete: [3] },
		{
			update: [{ id: 1, name: "A" }, { id: 2, name: ["bad"] }],
			delete: [{ id: 3 }],
		},
	);

	assert.deepEqual(result.update[1], {
		ok: false,
		id: 2,
		error: {
			code: "invalid_payload",
			message: 'Expected string at "$.update[1].name", got array',
		},
	});
	assert.deepEqual(
		result.outcomes.map((o) => [o.op, o.id, o.status]),
		[
			["update", 1, "ok"],
			["update", 2, "failed"],
			["delete", 3, "ok"],
		],
	);
});

test("updates and deletes correlate by identifier regardless of order", () => {
	const request = {
		update: [{ id: 1, name: "A" }, { id: 2, name: "B" }],
		delete: [7, 8],
	};
	const result = resolveBatch<CategoryFields>(categoryResource, request, {
		update: [{ id: 2, name: "B" }, { id: 1, name: "A" }],
		delete: [{ id: 8, error: { code: "gone", message: "Gone" } }, { id: 7, name: "Seven" }],
	});

	assert.deepEqual(
		result.outcomes.map((o) => [o.op, o.index, o.id, o.status, o.item?.id]),
		[
			["update", 0, 1, "ok", 1],
			["update", 1, 2, "ok", 2],
			["delete", 0, 7, "ok", 7],
			["delete", 1, 8, "failed", 8],
		],
	);
	assert.deepEqual(result.unmatched, []);
});

test("creates correlate by position", () => {
	const result = resolveBatch<CategoryFields>(categoryResource, { create: [{ name: "A" }, { name: "B" }] }, {
		create: [{ id: 11, name: "A" }, { id: 12, name: "B" }],
	});

	assert.deepEqual(
		result.outcomes.map((o) => [o.index, o.id, o.status]),
		[[0, 11, "ok"], [1, 12, "ok"]],
	);
});

test("entries without a response item are missing; stray items are unmatched", () => {
	const request = { create: [{ name: "A" }, { name: "B" }], update: [{ id: 1 }] };
	const response = decodeBatchResponse<CategoryFields>(categoryResource, {
		create: [{ id: 11, name: "A" }],
		update: [{ id: 3, name: "Three" }],
	});
	const { outcomes, unmatched } = correlateBatch<CategoryFields>(categoryResource, request, response);

	assert.deepEqual(
		outcomes.map((o) => [o.op, o.index, o.status]),
		[["create", 0, "ok"], ["create", 1, "missing"], ["update", 0, "missing"]],
	);
	assert.deepEqual(unmatched.map((item) => item.id), [3]);
	assert.deepEqual(
		failedOutcomes<CategoryFields>({ outcomes }).map((o) => [o.op, o.index]),
		[["create", 1], ["update", 0]],
	);
});

test("identifiers match across number and string forms", () => {
	const result = resolveBatch<CategoryFields>(categoryResource, { delete: ["5"] }, { delete: [{ id: 5 }] });
	assert.equal(result.outcomes[0].status, "ok");
});

test("a synthesized batch succeeds for every entry and keeps requested ids", () => {
	const result = synthesizeBatch<CategoryFields>(categoryResource, {
		create: [{ name: "A" }],
		update: [{ id: 4, name: "Renamed" }],
		delete: [9],
	});

	assert.equal(result.create.length, 1);
	assert.equal(result.outcomes.every((o) => o.status === "ok"), true);
	const [created] = result.create;
	assert.equal(created.ok && created.model.name, "A");
	const [updated] = result.update;
	assert.equal(updated.ok && updated.model.name, "Renamed");
	assert.equal(updated.id, 4);
	assert.equal(result.delete[0].id, 9);
	assert.deepEqual(result.unmatched, []);
});
