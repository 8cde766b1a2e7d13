/**
 * @module config
 *
 * Client configuration: defaults and loading from environment variables.
 */

import { z } from "zod";
import { DEFAULT_API_PATH, DEFAULT_TIMEOUT } from "./adapters/http.ts";
import type { CredentialStore } from "./credentials.ts";
import type { Transport } from "./types/transport.ts";

/** Configuration for WooClient */
export interface WooClientConfig {
	/** Store root, e.g. "https://shop.example.com" (required for live calls without `transport`) */
	baseUrl?: string;
	consumerKey?: string;
	consumerSecret?: string;
	/** REST root (default: "/wp-json/wc/v3") */
	apiPath?: string;
	/** Synthesize every result instead of calling the network (default: false) */
	fake?: boolean;
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Per-request timeout in ms (default: 30000) */
	timeout?: number;
	/** Custom transport; replaces the built-in HTTP transport */
	transport?: Transport;
	/** Custom fetch for the built-in HTTP transport */
	fetch?: typeof fetch;
	/** User id store (default: in-memory) */
	credentials?: CredentialStore;
}

/** Config with defaults applied */
export type ResolvedWooClientConfig =
	& Omit<WooClientConfig, "apiPath" | "fake" | "debug" | "timeout">
	& {
		apiPath: string;
		fake: boolean;
		debug: boolean;
		timeout: number;
	};

/** Applies defaults */
export function resolveConfig(config: WooClientConfig = {}): ResolvedWooClientConfig {
	return {
		...config,
		apiPath: config.apiPath ?? DEFAULT_API_PATH,
		fake: config.fake ?? false,
		debug: config.debug ?? false,
		timeout: config.timeout ?? DEFAULT_TIMEOUT,
	};
}

const flag = z
	.enum(["true", "false", "1", "0", "yes", "no"])
	.transform((value) => value === "true" || value === "1" || value === "yes");

const EnvSchema = z.object({
	WOO_BASE_URL: z.string().url().optional(),
	WOO_CONSUMER_KEY: z.string().optional(),
	WOO_CONSUMER_SECRET: z.string().optional(),
	WOO_API_PATH: z.string().startsWith("/").optional(),
	WOO_FAKE: flag.optional(),
	WOO_DEBUG: flag.optional(),
	WOO_TIMEOUT: z.coerce.number().int().positive().optional(),
});

export type WooEnv = z.infer<typeof EnvSchema>;

/**
 * Reads `WOO_*` variables. Empty values count as unset.
 *
 * @throws Error listing every invalid variable
 */
export function loadConfigFromEnv(
	env: Record<string, string | undefined> = process.env,
): WooClientConfig {
	const present: Record<string, string> = {};
	for (const [key, value] of Object.entries(env)) {
		if (key.startsWith("WOO_") && value !== undefined && value.trim() !== "") {
			present[key] = value.trim();
		}
	}

	const parsed = EnvSchema.safeParse(present);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
		throw new Error(`Invalid environment configuration (${issues.join("; ")})`);
	}

	const out: WooClientConfig = {};
	const vars = parsed.data;
	if (vars.WOO_BASE_URL !== undefined) out.baseUrl = vars.WOO_BASE_URL;
	if (vars.WOO_CONSUMER_KEY !== undefined) out.consumerKey = vars.WOO_CONSUMER_KEY;
	if (vars.WOO_CONSUMER_SECRET !== undefined) out.consumerSecret = vars.WOO_CONSUMER_SECRET;
	if (vars.WOO_API_PATH !== undefined) out.apiPath = vars.WOO_API_PATH;
	if (vars.WOO_FAKE !== undefined) out.fake = vars.WOO_FAKE;
	if (vars.WOO_DEBUG !== undefined) out.debug = vars.WOO_DEBUG;
	if (vars.WOO_TIMEOUT !== undefined) out.timeout = vars.WOO_TIMEOUT;
	return out;
}
