/**
 * @module codec/fields
 *
 * Declarative, bidirectional mapping between wire JSON and frozen model objects.
 *
 * A resource declares its shape as an interface of wire-independent field names
 * (`Fields`), and a codec mapping each name to a wire key and an element type.
 * Decoded models carry only the fields present in the payload.
 *
 * @example
 * ```typescript
 * interface ImageFields { id: number; src: string }
 * const imageCodec = defineCodec<ImageFields>({
 *   id: field("id", num),
 *   src: field("src", str),
 * });
 * const image = imageCodec.decode({ id: 4, src: "https://example.com/a.png" });
 * ```
 */

import { decodeFailure } from "../errors.ts";

/** Resource identifier: numeric for most resources, a slug or string id for some */
export type ResourceId = number | string;

/** A JSON object as exchanged with the server */
export type WireObject = Record<string, unknown>;

/** Immutable model: every field optional, none writable */
export type Model<S> = Readonly<Partial<S>>;

/** Decodes one non-null wire value and encodes it back */
export interface Element<V> {
	decode(raw: unknown, path: string): V | undefined;
	encode(value: V): unknown;
}

/** An element bound to a wire key */
export interface Field<V> {
	readonly key: string;
	/** Absent or `null` wire values read as `undefined` */
	read(raw: unknown, path: string): V | undefined;
	/** `undefined` in, `undefined` out */
	write(value: V | undefined): unknown;
}

/** One field per shape property */
export type Fields<S> = { readonly [K in keyof S]-?: Field<S[K]> };

export interface EncodeOptions {
	/** Emit present fields only, skipping the `null` placeholders of required ones */
	partial?: boolean;
}

export interface Codec<S> extends Element<Model<S>> {
	readonly fields: Fields<S>;
	/** Fields emitted by a full `encode`, as `null` when absent */
	readonly required: ReadonlyArray<keyof S>;
	decode(raw: unknown, path?: string): Model<S>;
	encode(model: Model<S>, options?: EncodeOptions): WireObject;
}

export interface CodecOptions<S> {
	required?: ReadonlyArray<keyof S>;
}

export const isWireObject = (value: unknown): value is WireObject =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/** Numbers; numeric strings are accepted and empty strings read as absent */
export const num: Element<number> = {
	decode(raw, path) {
		if (typeof raw === "number" && Number.isFinite(raw)) return raw;
		if (typeof raw === "string") {
			if (raw.trim() === "") return undefined;
			const parsed = Number(raw);
			if (Number.isFinite(parsed)) return parsed;
		}
		throw decodeFailure(path, "number", raw);
	},
	encode: (value) => value,
};

/** Strings; numbers are stringified */
export const str: Element<string> = {
	decode(raw, path) {
		if (typeof raw === "string") return raw;
		if (typeof raw === "number") return String(raw);
		throw decodeFailure(path, "string", raw);
	},
	encode: (value) => value,
};

export const bool: Element<boolean> = {
	decode(raw, path) {
		if (typeof raw === "boolean") return raw;
		throw decodeFailure(path, "boolean", raw);
	},
	encode: (value) => value,
};

/** ISO-8601 date strings */
export const date: Element<Date> = {
	decode(raw, path) {
		if (typeof raw !== "string") throw decodeFailure(path, "date string", raw);
		if (raw === "") return undefined;
		const parsed = new Date(raw);
		if (Number.isNaN(parsed.getTime())) throw decodeFailure(path, "date string", raw);
		return parsed;
	},
	encode: (value) => value.toISOString(),
};

/** Arbitrary JSON, passed through */
export const anyJson: Element<unknown> = {
	decode: (raw) => raw,
	encode: (value) => value,
};

/**
 * Closed string vocabulary. Values outside it decode to `fallback` instead of failing,
 * so a server adding a new value never breaks decoding.
 */
export function oneOf<T extends string>(values: readonly T[], fallback: T): Element<T> {
	return {
		decode: (raw) => values.find((v) => v === raw) ?? fallback,
		encode: (value) => value,
	};
}

/** Homogeneous list; `null` entries are dropped */
export function listOf<V>(element: Element<V>): Element<readonly V[]> {
	return {
		decode(raw, path) {
			if (!Array.isArray(raw)) throw decodeFailure(path, "array", raw);
			const out: V[] = [];
			raw.forEach((item: unknown, i) => {
				if (item === null || item === undefined) return;
				const value = element.decode(item, `${path}[${i}]`);
				if (value !== undefined) out.push(value);
			});
			return Object.freeze(out);
		},
		encode: (value) => value.map((item) => element.encode(item)),
	};
}

/** Binds an element to a wire key */
export function field<V>(key: string, element: Element<V>): Field<V> {
	return {
		key,
		read: (raw, path) =>
			raw === undefined || raw === null ? undefined : element.decode(raw, path),
		write: (value) => (value === undefined ? undefined : element.encode(value)),
	};
}

/**
 * Creates a codec from per-field declarations.
 *
 * `decode` fails on a non-object payload or on a field of the wrong type;
 * `encode` emits only present fields plus the `required` ones (present fields
 * only with `{ partial: true }`, as update bodies need).
 */
export function defineCodec<S>(fields: Fields<S>, options: CodecOptions<S> = {}): Codec<S> {
	const required = options.required ?? [];

	return {
		fields,
		required,
		decode(raw: unknown, path = "$"): Model<S> {
			if (!isWireObject(raw)) throw decodeFailure(path, "object", raw);
			const out: Partial<S> = {};
			for (const name in fields) {
				const def = fields[name];
				const value = def.read(raw[def.key], `${path}.${def.key}`);
				if (value !== undefined) out[name] = value;
			}
			return Object.freeze(out);
		},
		encode(model: Model<S>, options: EncodeOptions = {}): WireObject {
			const wire: WireObject = {};
			for (const name in fields) {
				const def = fields[name];
				const encoded = def.write(model[name]);
				if (encoded !== undefined) {
					wire[def.key] = encoded;
				} else if (!options.partial && required.includes(name)) {
					wire[def.key] = null;
				}
			}
			return wire;
		},
	};
}

/** Returns a new frozen model with `patch` applied over `model` */
export function copyWith<S>(model: Model<S>, patch: Model<S>): Model<S> {
	const next: Partial<S> = { ...model, ...patch };
	return Object.freeze(next);
}
