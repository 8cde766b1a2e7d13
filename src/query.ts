/**
 * @module query
 *
 * Builds wire query-parameter maps from typed query specifications.
 * No cross-field validation happens here; the server rejects bad combinations.
 */

import type { ContextScope } from "./types/context.ts";
import type { QueryParams } from "./types/transport.ts";

export type SortOrder = "asc" | "desc";

/** Query fields shared by every collection endpoint */
export interface ListQuery<O extends string = string> {
	/** Scope under which the request is made (default: "view") */
	context?: ContextScope;
	/** Current page, starting at 1 (default: 1) */
	page?: number;
	/** Items per page (default: 10, server maximum: 100) */
	perPage?: number;
	search?: string;
	include?: readonly number[];
	exclude?: readonly number[];
	order?: SortOrder;
	orderBy?: O;
	offset?: number;
}

/** Wire key for every resource-specific query field */
export type FilterKeys<Q> = {
	readonly [K in Exclude<keyof Q, keyof ListQuery>]-?: string;
};

/** Server-declared page size limit; exceeding it is not rejected locally */
export const MAX_PER_PAGE = 100;

export const LIST_DEFAULTS = {
	context: "view",
	page: 1,
	perPage: 10,
} as const;

const BASE_FIELDS: ReadonlyArray<keyof ListQuery> = [
	"context",
	"page",
	"perPage",
	"search",
	"include",
	"exclude",
	"order",
	"orderBy",
	"offset",
];

const BASE_WIRE_KEYS: Readonly<Record<keyof ListQuery, string>> = {
	context: "context",
	page: "page",
	perPage: "per_page",
	search: "search",
	include: "include",
	exclude: "exclude",
	order: "order",
	orderBy: "orderby",
	offset: "offset",
};

/**
 * Serializes one query value. Lists join with commas, dates become ISO-8601,
 * primitives pass through. Absent values and empty lists yield `undefined`.
 */
export function serializeQueryValue(value: unknown): string | number | boolean | undefined {
	if (value === undefined || value === null) return undefined;
	if (Array.isArray(value)) {
		return value.length ? value.map((v) => String(v)).join(",") : undefined;
	}
	if (value instanceof Date) return value.toISOString();
	if (
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "boolean"
	) {
		return value;
	}
	return undefined;
}

/**
 * Maps a typed query to wire parameters, omitting absent fields.
 *
 * @example
 * ```typescript
 * buildQuery({ include: [3, 7, 9], order: "asc" }, {});
 * // { include: "3,7,9", order: "asc" }
 * ```
 */
export function buildQuery<Q extends ListQuery>(
	query: Q | undefined,
	filters: FilterKeys<Q>,
): QueryParams {
	const params: QueryParams = {};
	const base: ListQuery = query ?? {};

	for (const name of BASE_FIELDS) {
		const value = serializeQueryValue(base[name]);
		if (value !== undefined) params[BASE_WIRE_KEYS[name]] = value;
	}
	let name: Extract<keyof FilterKeys<Q>, string>;
	for (name in filters) {
		const value = serializeQueryValue(query?.[name]);
		if (value !== undefined) params[filters[name]] = value;
	}

	return params;
}

/** Like `buildQuery`, with the collection defaults filled in */
export function buildListQuery<Q extends ListQuery>(
	query: Q | undefined,
	filters: FilterKeys<Q>,
): QueryParams {
	return {
		context: LIST_DEFAULTS.context,
		page: LIST_DEFAULTS.page,
		per_page: LIST_DEFAULTS.perPage,
		...buildQuery(query, filters),
	};
}

/** Page size the call will request */
export const resolvePerPage = (query: ListQuery = {}): number =>
	query.perPage ?? LIST_DEFAULTS.perPage;
