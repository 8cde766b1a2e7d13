import assert from "node:assert/strict";
import { afterEach, beforeEach, test } from "node:test";
import { createClog } from "@marianmeres/clog";
import { createMockTransport } from "../src/adapters/mock/mod.ts";
import { createFakeStrategy } from "../src/adapters/strategy.ts";
import { fake } from "../src/codec/mod.ts";
import { createMemoryCredentialStore } from "../src/credentials.ts";
import type { ListQuery } from "../src/query.ts";
import { ResourceClient } from "../src/resources/base.ts";
import type { ResourceDescriptor } from "../src/resources/descriptor.ts";
import { categoryResource } from "../src/resources/category.ts";
import { couponResource } from "../src/resources/coupon.ts";
import { customerResource } from "../src/resources/customer.ts";
import { orderNoteResource } from "../src/resources/order-note.ts";
import { orderResource } from "../src/resources/order.ts";
import { productTagResource } from "../src/resources/product-tag.ts";
import { productVariationResource } from "../src/resources/product-variation.ts";
import { productResource } from "../src/resources/product.ts";
import { shippingMethodResource } from "../src/resources/shipping-method.ts";
import { taxClassResource } from "../src/resources/tax-class.ts";
import { taxRateResource } from "../src/resources/tax-rate.ts";
import { webhookResource } from "../src/resources/webhook.ts";

beforeEach(() => {
	createClog.global.debug = false;
});

afterEach(() => {
	createClog.reset();
});

const times = (n: number, fn: () => void) => Array.from({ length: n }).forEach(fn);

test("integers stay within 0..100 and ids within 1..100", () => {
	times(200, () => {
		const i = fake.integer();
		assert.ok(Number.isInteger(i) && i >= 0 && i <= 100, `integer ${i}`);
		const id = fake.id();
		assert.ok(Number.isInteger(id) && id >= 1 && id <= 100, `id ${id}`);
	});
});

test("dates fall between 2024 and 2050", () => {
	times(100, () => {
		const year = fake.datetime().getUTCFullYear();
		assert.ok(year >= 2024 && year <= 2050, `year ${year}`);
	});
});

test("rates are four-decimal strings and lists hold at most ten items", () => {
	times(50, () => {
		assert.match(fake.rate(), /^\d{1,2}\.0000$/);
		const list = fake.list(fake.word);
		assert.ok(list.length <= 10);
		assert.equal(Object.isFrozen(list), true);
	});
});

test("pick returns one of the given values", () => {
	const values = ["a", "b", "c"] as const;
	times(20, () => assert.ok(values.includes(fake.pick(values))));
});

const checkFake = <S, Q extends ListQuery>(descriptor: ResourceDescriptor<S, Q>) => {
	const model = descriptor.fake();
	const wire = descriptor.codec.encode(model);

	for (const name of descriptor.codec.required) {
		const key = descriptor.codec.fields[name].key;
		assert.notEqual(wire[key], null, `${descriptor.name}.${key}`);
	}
	assert.deepEqual(descriptor.codec.decode(wire), model, descriptor.name);
	assert.notEqual(descriptor.identify(model), undefined, descriptor.name);
};

test("every fake carries the required fields and survives its own codec", () => {
	checkFake(categoryResource);
	checkFake(productTagResource);
	checkFake(productResource);
	checkFake(productVariationResource);
	checkFake(taxRateResource);
	checkFake(taxClassResource);
	checkFake(couponResource);
	checkFake(customerResource);
	checkFake(orderResource);
	checkFake(orderNoteResource);
	checkFake(shippingMethodResource);
	checkFake(webhookResource);
});

test("a fake list returns exactly perPage items and never calls the transport", async () => {
	const transport = createMockTransport();
	const categories = new ResourceClient(categoryResource, {
		context: { fake: true, credentials: createMemoryCredentialStore() },
		transport,
	});

	const items = await categories.list({ perPage: 5, search: "ignored", hideEmpty: true });

	assert.equal(items.length, 5);
	for (const item of items) {
		assert.equal(typeof item.name, "string");
		assert.equal(typeof item.id, "number");
	}
	assert.equal(transport.calls.length, 0);
});

test("the fake strategy resolves the synthesized result", async () => {
	const strategy = createFakeStrategy();
	const result = await strategy.execute({
		name: "delete",
		request: { method: "DELETE", path: "coupons/1" },
		decode: () => false,
		fake: () => true,
	});

	assert.equal(strategy.mode, "fake");
	assert.equal(result, true);
});
