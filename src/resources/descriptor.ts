/**
 * @module resources/descriptor
 *
 * Resource descriptors: the per-resource data a generic `ResourceClient` needs.
 */

import type { Codec, Model, ResourceId } from "../codec/mod.ts";
import { StoreApiError } from "../errors.ts";
import type { FilterKeys, ListQuery } from "../query.ts";
import type { ResourceName } from "../types/events.ts";

/**
 * Everything that distinguishes one resource kind from another.
 * Defined once per resource; never mutated.
 *
 * @typeParam S - Field shape of the model
 * @typeParam Q - Query specification for list calls
 */
export interface ResourceDescriptor<S, Q extends ListQuery = ListQuery> {
	readonly name: ResourceName;
	/** Path template relative to the API root, e.g. `orders/{order_id}/notes` */
	readonly path: string;
	readonly codec: Codec<S>;
	/** Wire key holding the identifier */
	readonly idKey: string;
	/** Identifier accessor */
	identify(model: Model<S>): ResourceId | undefined;
	/** Synthesizes one plausible model with every required field set */
	fake(): Model<S>;
	/** Wire keys of the resource-specific query fields */
	readonly filters: FilterKeys<Q>;
	/** The server refuses deletes without `force=true` */
	readonly forceDelete?: boolean;
}

/** Freezes a descriptor */
export function defineResource<S, Q extends ListQuery = ListQuery>(
	descriptor: ResourceDescriptor<S, Q>,
): ResourceDescriptor<S, Q> {
	return Object.freeze(descriptor);
}

/**
 * Returns a copy of `model` carrying `id`, going through the wire form.
 * An `id` the codec does not read (e.g. "abc" for a numeric key) leaves the
 * model unchanged.
 */
export function stampId<S>(
	descriptor: Pick<ResourceDescriptor<S>, "codec" | "idKey">,
	model: Model<S>,
	id: ResourceId,
): Model<S> {
	const { codec, idKey } = descriptor;
	try {
		return codec.decode({ ...codec.encode(model, { partial: true }), [idKey]: id });
	} catch (e) {
		if (!(e instanceof StoreApiError)) throw e;
		return model;
	}
}

/**
 * Fills `{param}` placeholders of a path template.
 *
 * @throws StoreApiError (kind "request") when a placeholder has no value
 */
export function resolvePath(
	template: string,
	params: Readonly<Record<string, ResourceId>> = {},
): string {
	return template.replace(/\{(\w+)\}/g, (_match, name: string) => {
		const value = params[name];
		if (value === undefined) {
			throw new StoreApiError(`Missing path parameter "${name}" for "${template}"`, {
				kind: "request",
				code: "missing_path_param",
			});
		}
		return encodeURIComponent(String(value));
	});
}
