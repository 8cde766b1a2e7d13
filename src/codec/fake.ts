/**
 * @module codec/fake
 *
 * Bounded pseudo-random value generators used by resource fake generators.
 * Values look plausible; they are not reproducible.
 */

import { faker } from "@faker-js/faker";

/** Earliest and latest synthesized date */
const DATE_WINDOW = {
	from: "2024-01-01T00:00:00.000Z",
	to: "2050-12-31T23:59:59.000Z",
} as const;

/** Small non-negative integer (0..100) */
export const integer = (): number => faker.number.int({ min: 0, max: 100 });

/** Identifier-like positive integer (1..100) */
export const id = (): number => faker.number.int({ min: 1, max: 100 });

export const word = (): string => faker.lorem.word();

export const sentence = (): string => faker.lorem.sentence();

export const slug = (): string => faker.lorem.slug(2);

export const url = (): string => faker.internet.url();

export const image = (): string => faker.image.url();

export const boolean = (): boolean => faker.datatype.boolean();

/** Price-like decimal string, e.g. "12.50" */
export const price = (): string => faker.commerce.price();

/** Percentage rate string with four decimals, e.g. "8.2500" */
export const rate = (): string => faker.number.int({ min: 0, max: 25 }).toFixed(4);

export const datetime = (): Date => faker.date.between(DATE_WINDOW);

export const firstName = (): string => faker.person.firstName();

export const lastName = (): string => faker.person.lastName();

export const email = (): string => faker.internet.email();

export const username = (): string => faker.internet.userName();

export const company = (): string => faker.company.name();

export const phone = (): string => faker.phone.number();

export const street = (): string => faker.location.streetAddress();

export const city = (): string => faker.location.city();

export const state = (): string => faker.location.state({ abbreviated: true });

export const countryCode = (): string => faker.location.countryCode();

export const postcode = (): string => faker.location.zipCode();

/** One of the given values */
export const pick = <T>(values: readonly T[]): T => faker.helpers.arrayElement(values);

/** Between 0 and 10 generated items */
export const list = <T>(generate: () => T): readonly T[] =>
	Object.freeze(faker.helpers.multiple(generate, { count: { min: 0, max: 10 } }));
