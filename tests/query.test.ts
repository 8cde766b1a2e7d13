import assert from "node:assert/strict";
import { afterEach, beforeEach, test } from "node:test";
import { createClog } from "@marianmeres/clog";
import {
	buildListQuery,
	buildQuery,
	resolvePerPage,
	serializeQueryValue,
} from "../src/query.ts";
import { type CategoryQuery, categoryResource } from "../src/resources/category.ts";
import { type OrderQuery, orderResource } from "../src/resources/order.ts";
import { type ProductQuery, productResource } from "../src/resources/product.ts";
import { type TaxRateQuery, taxRateResource } from "../src/resources/tax-rate.ts";

beforeEach(() => {
	createClog.global.debug = false;
});

afterEach(() => {
	createClog.reset();
});

test("id lists join with commas", () => {
	assert.deepEqual(buildQuery({ include: [3, 7, 9] }, {}), { include: "3,7,9" });
});

test("absent fields and empty lists are omitted", () => {
	assert.deepEqual(buildQuery({ search: undefined, exclude: [] }, {}), {});
	assert.deepEqual(buildQuery(undefined, categoryResource.filters), {});
});

test("list queries carry the collection defaults", () => {
	assert.deepEqual(buildListQuery(undefined, categoryResource.filters), {
		context: "view",
		page: 1,
		per_page: 10,
	});
});

test("shared and resource fields map to their wire names", () => {
	const query: CategoryQuery = {
		orderBy: "count",
		order: "asc",
		perPage: 2,
		hideEmpty: true,
		parent: 0,
	};
	const params = buildListQuery(query, categoryResource.filters);

	assert.deepEqual(params, {
		context: "view",
		page: 1,
		per_page: 2,
		order: "asc",
		orderby: "count",
		hide_empty: true,
		parent: 0,
	});
});

test("dates serialize as ISO-8601 and enum lists join", () => {
	const products: ProductQuery = {
		after: new Date("2024-01-02T00:00:00.000Z"),
		onSale: false,
		minPrice: "5",
	};
	const params = buildQuery(products, productResource.filters);
	assert.deepEqual(params, {
		after: "2024-01-02T00:00:00.000Z",
		on_sale: false,
		min_price: "5",
	});

	const orders: OrderQuery = { status: ["processing", "on-hold"], parentExclude: [4, 5] };
	assert.deepEqual(buildQuery(orders, orderResource.filters), {
		status: "processing,on-hold",
		parent_exclude: "4,5",
	});
});

test("the tax class filter uses the server's reserved name", () => {
	const rates: TaxRateQuery = { taxClass: "reduced-rate" };
	assert.deepEqual(buildQuery(rates, taxRateResource.filters), {
		class: "reduced-rate",
	});
});

test("serializeQueryValue", () => {
	assert.equal(serializeQueryValue(null), undefined);
	assert.equal(serializeQueryValue(["a", "b"]), "a,b");
	assert.equal(serializeQueryValue(0), 0);
	assert.equal(serializeQueryValue(true), true);
	assert.equal(serializeQueryValue({ nested: true }), undefined);
});

test("resolvePerPage falls back to the default page size", () => {
	assert.equal(resolvePerPage(), 10);
	assert.equal(resolvePerPage({ perPage: 150 }), 150);
});
