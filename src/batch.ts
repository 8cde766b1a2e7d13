/**
 * @module batch
 *
 * Batch aggregation: one request body from create/update/delete lists, a typed
 * response, and correlation of response items back to request entries.
 *
 * Item-level failures are data. Nothing in this module throws for them; callers
 * inspect `BatchResult.outcomes`.
 */

import { copyWith, isWireObject, type Model, type ResourceId, type WireObject } from "./codec/mod.ts";
import { decodeFailure, readWireError, readWireStatus, StoreApiError } from "./errors.ts";
import { type ResourceDescriptor, stampId } from "./resources/descriptor.ts";

export type BatchOp = "create" | "update" | "delete";

/** Three independent lists; any of them may be empty or absent */
export interface BatchRequest<S> {
	create?: ReadonlyArray<Model<S>>;
	update?: ReadonlyArray<Model<S>>;
	/** Identifiers, or models (serialized to their identifier when they carry one) */
	delete?: ReadonlyArray<ResourceId | Model<S>>;
}

/** Server error marker on a batch item */
export interface BatchItemError {
	code: string;
	message: string;
	status?: number;
	data?: unknown;
}

export type BatchItem<S> =
	| { ok: true; id?: ResourceId; model: Model<S> }
	| { ok: false; id?: ResourceId; error: BatchItemError };

export interface BatchResponse<S> {
	create: ReadonlyArray<BatchItem<S>>;
	update: ReadonlyArray<BatchItem<S>>;
	delete: ReadonlyArray<BatchItem<S>>;
}

/**
 * - `ok`: a matching response item succeeded
 * - `failed`: a matching response item carries an error marker
 * - `missing`: no response item could be matched
 */
export type BatchOutcomeStatus = "ok" | "failed" | "missing";

/** Result for one request entry */
export interface BatchOutcome<S> {
	op: BatchOp;
	/** Position of the entry in its request list */
	index: number;
	id?: ResourceId;
	status: BatchOutcomeStatus;
	item?: BatchItem<S>;
}

export interface BatchResult<S> extends BatchResponse<S> {
	/** One entry per request entry, in request order */
	outcomes: ReadonlyArray<BatchOutcome<S>>;
	/** Response items no request entry claimed */
	unmatched: ReadonlyArray<BatchItem<S>>;
}

type BatchSubject<S> = Pick<ResourceDescriptor<S>, "codec" | "identify" | "idKey" | "fake">;

export const isResourceId = (value: unknown): value is ResourceId =>
	typeof value === "number" || typeof value === "string";

/** Identifier of a request entry */
export function requestId<S>(
	subject: Pick<BatchSubject<S>, "identify">,
	entry: ResourceId | Model<S>,
): ResourceId | undefined {
	if (isResourceId(entry)) return entry;
	return subject.identify(entry);
}

/**
 * Serializes a batch request, omitting every empty list.
 *
 * @example
 * ```typescript
 * buildBatchBody(categoryResource, { create: [{ name: "Shoes" }], update: [] });
 * // { create: [{ name: "Shoes" }] }
 * ```
 */
export function buildBatchBody<S>(
	subject: Pick<BatchSubject<S>, "codec" | "identify">,
	request: BatchRequest<S>,
): WireObject {
	const body: WireObject = {};
	if (request.create?.length) {
		body.create = request.create.map((m) => subject.codec.encode(m));
	}
	if (request.update?.length) {
		body.update = request.update.map((m) => subject.codec.encode(m, { partial: true }));
	}
	if (request.delete?.length) {
		body.delete = request.delete.map((entry) => {
			if (isResourceId(entry)) return entry;
			return subject.identify(entry) ?? subject.codec.encode(entry, { partial: true });
		});
	}
	return body;
}

const readId = (raw: unknown): ResourceId | undefined =>
	typeof raw === "number" || (typeof raw === "string" && raw !== "") ? raw : undefined;

function decodeItem<S>(
	subject: Pick<BatchSubject<S>, "codec" | "identify">,
	raw: unknown,
	path: string,
): BatchItem<S> {
	if (isWireObject(raw) && raw.error !== undefined && raw.error !== null) {
		const wire = readWireError(raw.error);
		return {
			ok: false,
			id: readId(raw.id),
			error: {
				code: wire.code ?? "unknown_error",
				message: wire.message ?? "Batch item failed",
				status: readWireStatus(wire.data),
				data: wire.data,
			},
		};
	}
	try {
		const model = subject.codec.decode(raw, path);
		return { ok: true, id: subject.identify(model), model };
	} catch (e) {
		if (!(e instanceof StoreApiError)) throw e;
		return {
			ok: false,
			id: isWireObject(raw) ? readId(raw.id) : undefined,
			error: { code: "invalid_payload", message: e.message },
		};
	}
}

/**
 * Decodes a batch response envelope. Absent lists decode as empty.
 *
 * An item that does not match the codec becomes a failed item coded
 * "invalid_payload".
 *
 * @throws StoreApiError (kind "decode") when the envelope or a list is malformed
 */
export function decodeBatchResponse<S>(
	subject: Pick<BatchSubject<S>, "codec" | "identify">,
	wire: unknown,
): BatchResponse<S> {
	if (!isWireObject(wire)) throw decodeFailure("$", "object", wire);

	const decodeList = (op: BatchOp): ReadonlyArray<BatchItem<S>> => {
		const raw = wire[op];
		if (raw === undefined || raw === null) return [];
		if (!Array.isArray(raw)) throw decodeFailure(`$.${op}`, "array", raw);
		return raw.map((item: unknown, i) => decodeItem(subject, item, `$.${op}[${i}]`));
	};

	return {
		create: decodeList("create"),
		update: decodeList("update"),
		delete: decodeList("delete"),
	};
}

const sameId = (a: ResourceId | undefined, b: ResourceId | undefined): boolean =>
	a !== undefined && b !== undefined && String(a) === String(b);

const statusOf = <S>(item: BatchItem<S> | undefined): BatchOutcomeStatus =>
	item === undefined ? "missing" : item.ok ? "ok" : "failed";

/**
 * Pairs every request entry with its response item.
 *
 * Updates and deletes are matched by identifier, never by position.
 * Creates are matched by position: the server echoes no identifier for them.
 */
export function correlateBatch<S>(
	subject: Pick<BatchSubject<S>, "identify">,
	request: BatchRequest<S>,
	response: BatchResponse<S>,
): Pick<BatchResult<S>, "outcomes" | "unmatched"> {
	const outcomes: BatchOutcome<S>[] = [];
	const unmatched: BatchItem<S>[] = [];

	(request.create ?? []).forEach((_model, index) => {
		const item: BatchItem<S> | undefined = response.create[index];
		outcomes.push({ op: "create", index, id: item?.id, status: statusOf(item), item });
	});
	unmatched.push(...response.create.slice(request.create?.length ?? 0));

	const matchById = (op: "update" | "delete", ids: Array<ResourceId | undefined>) => {
		const pool = [...response[op]];
		ids.forEach((id, index) => {
			const at = pool.findIndex((candidate) => sameId(candidate.id, id));
			const item = at >= 0 ? pool.splice(at, 1)[0] : undefined;
			outcomes.push({ op, index, id, status: statusOf(item), item });
		});
		unmatched.push(...pool);
	};

	matchById("update", (request.update ?? []).map((m) => subject.identify(m)));
	matchById("delete", (request.delete ?? []).map((entry) => requestId(subject, entry)));

	return { outcomes, unmatched };
}

/** Decodes and correlates in one step */
export function resolveBatch<S>(
	subject: Pick<BatchSubject<S>, "codec" | "identify">,
	request: BatchRequest<S>,
	wire: unknown,
): BatchResult<S> {
	const response = decodeBatchResponse(subject, wire);
	return { ...response, ...correlateBatch(subject, request, response) };
}

/**
 * Synthesizes a successful result for every request entry. Requested fields
 * are kept; updated and deleted items keep their requested identifier.
 */
export function synthesizeBatch<S>(
	subject: BatchSubject<S>,
	request: BatchRequest<S>,
): BatchResult<S> {
	const ok = (model: Model<S>): BatchItem<S> => ({
		ok: true,
		id: subject.identify(model),
		model,
	});

	const response: BatchResponse<S> = {
		create: (request.create ?? []).map((m) => ok(copyWith<S>(subject.fake(), m))),
		update: (request.update ?? []).map((m) => ok(copyWith<S>(subject.fake(), m))),
		delete: (request.delete ?? []).map((entry) =>
			ok(
				isResourceId(entry)
					? stampId<S>(subject, subject.fake(), entry)
					: copyWith<S>(subject.fake(), entry),
			)
		),
	};
	return { ...response, ...correlateBatch(subject, request, response) };
}

/** Outcomes that did not succeed */
export const failedOutcomes = <S>(result: Pick<BatchResult<S>, "outcomes">): BatchOutcome<S>[] =>
	result.outcomes.filter((o) => o.status !== "ok");
