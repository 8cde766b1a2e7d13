import assert from "node:assert/strict";
import { afterEach, beforeEach, test } from "node:test";
import { createClog } from "@marianmeres/clog";
import { createPubSub } from "@marianmeres/pubsub";
import { createMockTransport, type MockTransportOptions } from "../src/adapters/mock/mod.ts";
import { createMemoryCredentialStore } from "../src/credentials.ts";
import { StoreApiError } from "../src/errors.ts";
import { ResourceClient } from "../src/resources/base.ts";
import { categoryResource } from "../src/resources/category.ts";
import { orderNoteResource } from "../src/resources/order-note.ts";
import { taxRateResource } from "../src/resources/tax-rate.ts";
import type { WooClientEvent } from "../src/types/events.ts";

beforeEach(() => {
	createClog.global.debug = false;
});

afterEach(() => {
	createClog.reset();
});

const setup = (options: MockTransportOptions = {}, fake = false) => {
	const transport = createMockTransport(options);
	const pubsub = createPubSub();
	const events: WooClientEvent[] = [];
	pubsub.subscribe("*", (envelope: { event: string; data: WooClientEvent }) => {
		events.push(envelope.data);
	});
	const categories = new ResourceClient(categoryResource, {
		context: { fake, credentials: createMemoryCredentialStore() },
		transport,
		pubsub,
	});
	return { transport, pubsub, events, categories };
};

const isStoreError = (fields: Partial<Pick<StoreApiError, "kind" | "code" | "status" | "operation">>) =>
(e: unknown) => {
	assert.ok(e instanceof StoreApiError);
	assert.deepEqual(
		{ kind: e.kind, code: e.code, status: e.status, operation: e.operation },
		{ kind: undefined, code: undefined, status: undefined, operation: undefined, ...fields },
	);
	return true;
};

test("listing categories returns models in response order", async () => {
	const { categories, transport } = setup({
		routes: {
			"GET products/categories": {
				data: [
					{ id: 14, name: "Hats", count: 1, display: "default" },
					{ id: 9, name: "Shoes", count: 6, display: "products" },
				],
			},
		},
	});

	const items = await categories.list({ orderBy: "count", order: "asc", perPage: 2 });

	assert.deepEqual(items, [
		{ id: 14, name: "Hats", count: 1, display: "default" },
		{ id: 9, name: "Shoes", count: 6, display: "products" },
	]);
	assert.deepEqual(transport.calls[0], {
		method: "GET",
		path: "products/categories",
		query: { context: "view", page: 1, per_page: 2, order: "asc", orderby: "count" },
		signal: undefined,
	});
});

test("listPage reads the pagination totals", async () => {
	const { categories } = setup({
		routes: {
			"GET products/categories": {
				data: [{ id: 1, name: "A" }],
				headers: { "x-wp-total": "21", "x-wp-totalpages": "3" },
			},
		},
	});

	const page = await categories.listPage({ page: 3 });
	assert.equal(page.items.length, 1);
	assert.equal(page.total, 21);
	assert.equal(page.totalPages, 3);
});

test("listPage falls back to the item count without headers", async () => {
	const { categories } = setup({
		routes: { "GET products/categories": { data: [{ id: 1 }, { id: 2 }] } },
	});

	const page = await categories.listPage();
	assert.deepEqual([page.total, page.totalPages], [2, 1]);
});

test("a page size over the server maximum is sent as is", async () => {
	const { categories, transport } = setup({
		routes: { "GET products/categories": { data: [] } },
	});

	await categories.list({ perPage: 150 });
	assert.equal(transport.calls[0].query?.per_page, 150);
});

test("get fetches one item in view context", async () => {
	const { categories, transport, events } = setup({
		routes: { "GET products/categories/12": { data: { id: 12, name: "Shoes" } } },
	});

	const category = await categories.get(12);

	assert.deepEqual(category, { id: 12, name: "Shoes" });
	assert.deepEqual(transport.calls[0].query, { context: "view" });
	assert.equal(events.length, 1);
	const [event] = events;
	assert.equal(event.type, "resource:fetched");
	assert.equal(event.resource, "category");
	assert.equal(event.mode, "live");
});

test("an unknown item rejects with the server's error", async () => {
	const { categories, events } = setup();

	await assert.rejects(
		categories.get(404, { context: "edit" }),
		isStoreError({ kind: "server", code: "rest_no_route", status: 404, operation: "get" }),
	);
	assert.deepEqual(events.map((e) => e.type), ["resource:error"]);
});

test("create posts the encoded model", async () => {
	const { categories, transport } = setup({
		routes: {
			"POST products/categories": { status: 201, data: { id: 30, name: "Boots", parent: 9 } },
		},
	});

	const created = await categories.create({ name: "Boots", parent: 9 });

	assert.deepEqual(transport.calls[0].body, { name: "Boots", parent: 9 });
	assert.deepEqual(created, { id: 30, name: "Boots", parent: 9 });
});

test("update puts only the present fields", async () => {
	const { categories, transport } = setup({
		routes: { "PUT products/categories/3": { data: { id: 3, name: "Renamed", count: 4 } } },
	});

	const updated = await categories.update({ id: 3, name: "Renamed" });

	assert.deepEqual(transport.calls[0].body, { id: 3, name: "Renamed" });
	assert.deepEqual(updated, { id: 3, name: "Renamed", count: 4 });
});

test("a partial update leaves required fields out of the body", async () => {
	const { categories, transport } = setup({
		routes: {
			"PUT products/categories/3": { data: { id: 3, name: "Shoes", description: "x" } },
		},
	});

	await categories.update({ id: 3, description: "x" });

	assert.deepEqual(transport.calls[0].body, { id: 3, description: "x" });
});

test("batch updates carry present fields only", async () => {
	const { categories, transport } = setup({
		routes: {
			"POST products/categories/batch": {
				data: { create: [{ id: 11, name: "New" }], update: [{ id: 4, menu_order: 2 }] },
			},
		},
	});

	await categories.batch({ create: [{ slug: "new" }], update: [{ id: 4, menuOrder: 2 }] });

	assert.deepEqual(transport.calls[0].body, {
		create: [{ name: null, slug: "new" }],
		update: [{ id: 4, menu_order: 2 }],
	});
});

test("update without an identifier fails before any I/O", async () => {
	const { categories, transport, events } = setup();

	await assert.rejects(
		categories.update({ name: "Nameless" }),
		isStoreError({ kind: "request", code: "missing_id", operation: "update" }),
	);
	assert.equal(transport.calls.length, 0);
	assert.deepEqual(events.map((e) => e.type), ["resource:error"]);
});

test("delete resolves true and forces where the resource requires it", async () => {
	const { categories, transport } = setup({
		routes: {
			"DELETE products/categories/5": { data: { id: 5 } },
			"DELETE taxes/7": { data: { id: 7 } },
		},
	});
	const taxRates = new ResourceClient(taxRateResource, {
		context: { fake: false, credentials: createMemoryCredentialStore() },
		transport,
	});

	assert.equal(await categories.delete(5), true);
	assert.equal(await taxRates.delete(7), true);
	assert.equal(await categories.delete(5, { force: true }), true);

	assert.deepEqual(
		transport.calls.map((c) => c.query),
		[{ force: false }, { force: true }, { force: true }],
	);
});

test("batch posts one body and correlates the outcome", async () => {
	const { categories, transport, events } = setup({
		routes: {
			"POST products/categories/batch": {
				data: {
					create: [{ id: 40, name: "New" }],
					delete: [
						{
							id: 8,
							error: {
								code: "woocommerce_rest_term_invalid",
								message: "Resource does not exist.",
								data: { status: 404 },
							},
						},
					],
				},
			},
		},
	});

	const result = await categories.batch({ create: [{ name: "New" }], delete: [8] });

	assert.deepEqual(transport.calls[0].body, { create: [{ name: "New" }], delete: [8] });
	assert.deepEqual(
		result.outcomes.map((o) => [o.op, o.id, o.status]),
		[["create", 40, "ok"], ["delete", 8, "failed"]],
	);
	const batched = events.find((e) => e.type === "resource:batched");
	assert.deepEqual(
		batched?.type === "resource:batched" ? [batched.ok, batched.failed, batched.missing] : null,
		[1, 1, 0],
	);
});

test("a non-list payload for a list call is a decode error", async () => {
	const { categories } = setup({
		routes: { "GET products/categories": { data: { id: 1 } } },
	});

	await assert.rejects(
		categories.list(),
		isStoreError({ kind: "decode", code: "unexpected_shape", operation: "list" }),
	);
});

test("a mistyped field is a decode error", async () => {
	const { categories } = setup({
		routes: { "GET products/categories/1": { data: { id: 1, name: ["not", "a", "string"] } } },
	});

	await assert.rejects(categories.get(1), (e: unknown) =>
		e instanceof StoreApiError && e.kind === "decode" &&
		e.message === 'Expected string at "$.name", got array');
});

test("connection failures and thrown HTTP errors are translated", async () => {
	const offline = setup({ forceError: { network: true, message: "fetch failed" } });
	await assert.rejects(
		offline.categories.list(),
		isStoreError({ kind: "transport", code: "network", operation: "list" }),
	);

	const rejecting = setup({ forceError: { method: "POST" } });
	await assert.rejects(
		rejecting.categories.create({ name: "X" }),
		isStoreError({ kind: "server", code: "http_400", status: 400, operation: "create" }),
	);
});

test("the per-call flag overrides the context in both directions", async () => {
	const live = setup({ routes: { "GET products/categories": { data: [] } } });
	const faked = await live.categories.list({ perPage: 3 }, { fake: true });
	assert.equal(faked.length, 3);
	assert.equal(live.transport.calls.length, 0);
	assert.equal(live.events[0].mode, "fake");

	const fakeByDefault = setup({ routes: { "GET products/categories": { data: [] } } }, true);
	const real = await fakeByDefault.categories.list({ perPage: 3 }, { fake: false });
	assert.deepEqual(real, []);
	assert.equal(fakeByDefault.transport.calls.length, 1);
});

test("setContext switches the strategy", async () => {
	const { categories, transport } = setup();
	categories.setContext({ fake: true });

	assert.equal(categories.getContext().fake, true);
	assert.equal(await categories.delete(1), true);
	assert.equal(transport.calls.length, 0);
});

test("a fake get with an identifier the codec cannot read returns a plain fake", async () => {
	const { categories, transport } = setup({}, true);

	const fetched = await categories.get("abc");

	assert.equal(typeof fetched.id, "number");
	assert.equal(typeof fetched.name, "string");
	assert.equal(transport.calls.length, 0);
});

test("fake get and update keep the requested identifier and fields", async () => {
	const { categories } = setup({}, true);

	const fetched = await categories.get(77);
	assert.equal(fetched.id, 77);

	const updated = await categories.update({ id: 5, name: "Kept" });
	assert.equal(updated.id, 5);
	assert.equal(updated.name, "Kept");
});

test("nested paths fill their parameters", async () => {
	const transport = createMockTransport({
		routes: { "GET orders/42/notes": { data: [{ id: 1, note: "Packed" }] } },
	});
	const context = { fake: false, credentials: createMemoryCredentialStore() };
	const notes = new ResourceClient(orderNoteResource, {
		context,
		transport,
		pathParams: { order_id: 42 },
	});

	assert.deepEqual(await notes.list({ type: "internal" }), [{ id: 1, note: "Packed" }]);
	assert.equal(transport.calls[0].query?.type, "internal");

	const unbound = new ResourceClient(orderNoteResource, { context, transport });
	await assert.rejects(
		unbound.list(),
		isStoreError({ kind: "request", code: "missing_path_param", operation: "list" }),
	);
});
