/**
 * @module codec
 *
 * Model codec and fake value generators.
 */

export {
	anyJson,
	bool,
	type Codec,
	type CodecOptions,
	type EncodeOptions,
	copyWith,
	date,
	defineCodec,
	type Element,
	field,
	type Field,
	type Fields,
	isWireObject,
	listOf,
	type Model,
	num,
	oneOf,
	type ResourceId,
	str,
	type WireObject,
} from "./fields.ts";
export * as fake from "./fake.ts";
