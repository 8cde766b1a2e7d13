/**
 * @module resources/base
 *
 * Generic resource client. One class serves every resource kind; the
 * per-resource differences live in its `ResourceDescriptor`.
 */

import { type Clog, createClog } from "@marianmeres/clog";
import { createPubSub, type PubSub } from "@marianmeres/pubsub";
import {
	createFakeStrategy,
	createLiveStrategy,
	type ExecutionStrategy,
	type Operation,
	type OperationName,
} from "../adapters/strategy.ts";
import {
	type BatchRequest,
	type BatchResult,
	buildBatchBody,
	resolveBatch,
	synthesizeBatch,
} from "../batch.ts";
import { copyWith, type Model, type ResourceId } from "../codec/mod.ts";
import { decodeFailure, StoreApiError, translateError } from "../errors.ts";
import { buildListQuery, type ListQuery, MAX_PER_PAGE, resolvePerPage } from "../query.ts";
import type { CallOptions, ClientContext, DeleteOptions, GetOptions } from "../types/context.ts";
import type { ExecutionMode, WooClientEvent, WooClientEventBase } from "../types/events.ts";
import type { Transport, TransportResponse } from "../types/transport.ts";
import { type ResourceDescriptor, resolvePath, stampId } from "./descriptor.ts";

/** Options for resource clients */
export interface ResourceClientOptions {
	context: ClientContext;
	transport: Transport;
	/** Shared pubsub instance for events */
	pubsub?: PubSub;
	/** Values for the `{param}` placeholders of the descriptor's path */
	pathParams?: Readonly<Record<string, ResourceId>>;
}

/** One page of a collection with the server's pagination totals */
export interface Page<S> {
	items: ReadonlyArray<Model<S>>;
	total: number;
	totalPages: number;
}

const readCount = (headers: Record<string, string>, name: string): number | undefined => {
	const raw = headers[name];
	if (raw === undefined) return undefined;
	const value = Number(raw);
	return Number.isInteger(value) && value >= 0 ? value : undefined;
};

/**
 * Typed access to one REST collection: list, get, create, update, delete, batch.
 *
 * Every operation resolves to the same shape whether it was served live or
 * synthesized, and every failure rejects with a `StoreApiError`.
 *
 * @typeParam S - Field shape of the model
 * @typeParam Q - Query specification for list calls
 */
export class ResourceClient<S, Q extends ListQuery = ListQuery> {
	readonly descriptor: ResourceDescriptor<S, Q>;
	protected readonly clog: Clog;
	protected readonly pubsub: PubSub;
	protected context: ClientContext;
	readonly #live: ExecutionStrategy;
	readonly #fake: ExecutionStrategy;
	readonly #pathParams: Readonly<Record<string, ResourceId>>;

	constructor(descriptor: ResourceDescriptor<S, Q>, options: ResourceClientOptions) {
		this.descriptor = descriptor;
		this.clog = createClog(`woo-client:${descriptor.name}`, { color: "auto" });
		this.pubsub = options.pubsub ?? createPubSub();
		this.context = { ...options.context };
		this.#pathParams = { ...options.pathParams };
		this.#live = createLiveStrategy(options.transport);
		this.#fake = createFakeStrategy();
	}

	/** Update context (fake flag, credentials) */
	setContext(context: Partial<ClientContext>): void {
		this.context = { ...this.context, ...context };
	}

	/** Get the current context */
	getContext(): ClientContext {
		return { ...this.context };
	}

	/** Collection path with placeholders filled */
	get path(): string {
		return resolvePath(this.descriptor.path, this.#pathParams);
	}

	/** Lists items of the current page */
	async list(query?: Q, options: CallOptions = {}): Promise<ReadonlyArray<Model<S>>> {
		const page = await this.#listPage("list", query, options);
		return page.items;
	}

	/** Lists items of the current page along with pagination totals */
	listPage(query?: Q, options: CallOptions = {}): Promise<Page<S>> {
		return this.#listPage("list", query, options);
	}

	/** Fetches one item */
	get(id: ResourceId, options: GetOptions = {}): Promise<Model<S>> {
		const { descriptor } = this;
		return this.run(
			"get",
			options,
			() => ({
				request: {
					method: "GET",
					path: this.#itemPath(id),
					query: { context: options.context ?? "view" },
					signal: options.signal,
				},
				decode: (response) => descriptor.codec.decode(response.data),
				fake: () => stampId<S>(descriptor, descriptor.fake(), id),
			}),
			(model, base) => ({ ...base, type: "resource:fetched", id: descriptor.identify(model) }),
		);
	}

	/** Creates an item; the result carries server-assigned fields */
	create(model: Model<S>, options: CallOptions = {}): Promise<Model<S>> {
		const { descriptor } = this;
		return this.run(
			"create",
			options,
			() => ({
				request: {
					method: "POST",
					path: this.path,
					body: descriptor.codec.encode(model),
					signal: options.signal,
				},
				decode: (response) => descriptor.codec.decode(response.data),
				fake: () => copyWith<S>(descriptor.fake(), model),
			}),
			(created, base) => ({ ...base, type: "resource:created", id: descriptor.identify(created) }),
		);
	}

	/**
	 * Updates an item. Only the fields present on `model` are sent.
	 *
	 * @throws StoreApiError (kind "request") when `model` carries no identifier
	 */
	update(model: Model<S>, options: CallOptions = {}): Promise<Model<S>> {
		const { descriptor } = this;
		return this.run(
			"update",
			options,
			() => {
				const id = descriptor.identify(model);
				if (id === undefined) {
					throw new StoreApiError(`Cannot update ${descriptor.name} without an identifier`, {
						kind: "request",
						code: "missing_id",
					});
				}
				return {
					request: {
						method: "PUT",
						path: this.#itemPath(id),
						body: descriptor.codec.encode(model, { partial: true }),
						signal: options.signal,
					},
					decode: (response) => descriptor.codec.decode(response.data),
					fake: () => copyWith<S>(descriptor.fake(), model),
				};
			},
			(updated, base) => ({ ...base, type: "resource:updated", id: descriptor.identify(updated) }),
		);
	}

	/**
	 * Deletes an item. Resolves `true` once the server confirmed.
	 * `force` defaults to what the resource requires.
	 */
	delete(id: ResourceId, options: DeleteOptions = {}): Promise<boolean> {
		const force = options.force ?? this.descriptor.forceDelete ?? false;
		return this.run(
			"delete",
			options,
			() => ({
				request: {
					method: "DELETE",
					path: this.#itemPath(id),
					query: { force },
					signal: options.signal,
				},
				decode: () => true,
				fake: () => true,
			}),
			(_result, base) => ({ ...base, type: "resource:deleted", id }),
		);
	}

	/**
	 * Creates, updates and deletes in one round trip.
	 * Item failures are reported in the result, never thrown.
	 */
	batch(request: BatchRequest<S>, options: CallOptions = {}): Promise<BatchResult<S>> {
		const { descriptor } = this;
		return this.run(
			"batch",
			options,
			() => ({
				request: {
					method: "POST",
					path: `${this.path}/batch`,
					body: buildBatchBody<S>(descriptor, request),
					signal: options.signal,
				},
				decode: (response) => resolveBatch<S>(descriptor, request, response.data),
				fake: () => synthesizeBatch<S>(descriptor, request),
			}),
			(result, base) => {
				const count = (status: string) =>
					result.outcomes.filter((o) => o.status === status).length;
				return {
					...base,
					type: "resource:batched",
					ok: count("ok"),
					failed: count("failed"),
					missing: count("missing"),
				};
			},
		);
	}

	/** Picks the strategy for one call; the per-call flag wins over the context */
	protected select(options: CallOptions = {}): ExecutionStrategy {
		return (options.fake ?? this.context.fake) ? this.#fake : this.#live;
	}

	/**
	 * Builds and executes one operation, emitting its success or error event.
	 * Failures while building (missing identifier, path parameter) are reported
	 * the same way as failures on the wire.
	 */
	protected async run<T>(
		name: OperationName,
		options: CallOptions,
		build: () => Omit<Operation<T>, "name">,
		notify: (result: T, base: WooClientEventBase) => WooClientEvent,
	): Promise<T> {
		const strategy = this.select(options);
		let result: T;
		try {
			result = await strategy.execute({ name, ...build() });
		} catch (e) {
			const error = translateError(e, { operation: name });
			this.clog.error(name, { kind: error.kind, code: error.code, message: error.message });
			this.emit({
				...this.#eventBase(strategy.mode),
				type: "resource:error",
				operation: name,
				error,
			});
			throw error;
		}
		this.emit(notify(result, this.#eventBase(strategy.mode)));
		return result;
	}

	/** Emit an event via pubsub */
	protected emit(event: WooClientEvent): void {
		this.pubsub.publish(event.type, event);
	}

	#eventBase(mode: ExecutionMode): WooClientEventBase {
		return { timestamp: Date.now(), resource: this.descriptor.name, mode };
	}

	#itemPath(id: ResourceId): string {
		return `${this.path}/${encodeURIComponent(String(id))}`;
	}

	#decodeList(data: unknown): ReadonlyArray<Model<S>> {
		if (!Array.isArray(data)) throw decodeFailure("$", "array", data);
		return Object.freeze(
			data.map((raw: unknown, i) => this.descriptor.codec.decode(raw, `$[${i}]`)),
		);
	}

	#listPage(name: OperationName, query: Q | undefined, options: CallOptions): Promise<Page<S>> {
		const { descriptor } = this;
		const perPage = resolvePerPage(query);
		if (perPage > MAX_PER_PAGE) {
			this.clog.warn(`perPage ${perPage} exceeds the server maximum of ${MAX_PER_PAGE}`);
		}

		return this.run(
			name,
			options,
			() => ({
				request: {
					method: "GET",
					path: this.path,
					query: buildListQuery(query, descriptor.filters),
					signal: options.signal,
				},
				decode: (response: TransportResponse) => {
					const items = this.#decodeList(response.data);
					return {
						items,
						total: readCount(response.headers, "x-wp-total") ?? items.length,
						totalPages: readCount(response.headers, "x-wp-totalpages") ?? 1,
					};
				},
				fake: () => ({
					items: Object.freeze(Array.from({ length: perPage }, () => descriptor.fake())),
					total: perPage,
					totalPages: 1,
				}),
			}),
			(page, base) => ({ ...base, type: "resource:listed", count: page.items.length }),
		);
	}
}
