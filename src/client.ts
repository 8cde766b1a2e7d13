/**
 * @module client
 *
 * WooClient: one resource client per REST collection over a shared context,
 * transport and event system.
 */

import { createClog } from "@marianmeres/clog";
import {
	createPubSub,
	type PubSub,
	type Subscriber,
	type Unsubscriber,
} from "@marianmeres/pubsub";
import { createHttpTransport } from "./adapters/http.ts";
import type { ResourceId } from "./codec/mod.ts";
import { resolveConfig, type ResolvedWooClientConfig, type WooClientConfig } from "./config.ts";
import { createMemoryCredentialStore } from "./credentials.ts";
import { StoreApiError } from "./errors.ts";
import { ResourceClient } from "./resources/base.ts";
import type { ResourceDescriptor } from "./resources/descriptor.ts";
import { type CategoryFields, type CategoryQuery, categoryResource } from "./resources/category.ts";
import { type CouponFields, type CouponQuery, couponResource } from "./resources/coupon.ts";
import {
	type Customer,
	type CustomerFields,
	type CustomerQuery,
	customerResource,
} from "./resources/customer.ts";
import { type OrderNoteFields, type OrderNoteQuery, orderNoteResource } from "./resources/order-note.ts";
import { type OrderFields, type OrderQuery, orderResource } from "./resources/order.ts";
import { type ProductTagFields, type ProductTagQuery, productTagResource } from "./resources/product-tag.ts";
import {
	type ProductVariationFields,
	type ProductVariationQuery,
	productVariationResource,
} from "./resources/product-variation.ts";
import { type ProductFields, type ProductQuery, productResource } from "./resources/product.ts";
import { type ShippingMethodFields, shippingMethodResource } from "./resources/shipping-method.ts";
import { type TaxClassFields, taxClassResource } from "./resources/tax-class.ts";
import { type TaxRateFields, type TaxRateQuery, taxRateResource } from "./resources/tax-rate.ts";
import { type WebhookFields, type WebhookQuery, webhookResource } from "./resources/webhook.ts";
import type { ListQuery } from "./query.ts";
import type { ClientContext, GetOptions } from "./types/context.ts";
import type { WooClientEvent, WooClientEventType } from "./types/events.ts";
import type { Transport } from "./types/transport.ts";

/** Tax classes support listing, creating and deleting only */
export type TaxClassClient = Pick<ResourceClient<TaxClassFields, ListQuery>, "list" | "create" | "delete">;

/** Shipping methods are read-only */
export type ShippingMethodClient = Pick<ResourceClient<ShippingMethodFields, ListQuery>, "list" | "get">;

/** Order notes cannot be updated or batched */
export type OrderNoteClient = Pick<
	ResourceClient<OrderNoteFields, OrderNoteQuery>,
	"list" | "listPage" | "get" | "create" | "delete"
>;

/** Live calls without a base URL or transport fail before any I/O */
const unconfiguredTransport: Transport = {
	request() {
		return Promise.reject(
			new StoreApiError("No baseUrl or transport configured for live calls", {
				kind: "request",
				code: "missing_base_url",
			}),
		);
	},
};

/**
 * Typed client for a store's REST API.
 *
 * @example
 * ```typescript
 * const woo = createWooClient({
 *   baseUrl: "https://shop.example.com",
 *   consumerKey: "ck_test",
 *   consumerSecret: "cs_test",
 * });
 *
 * const categories = await woo.categories.list({ orderBy: "count", order: "asc", perPage: 2 });
 * ```
 */
export class WooClient {
	readonly #clog = createClog("woo-client", { color: "auto" });
	readonly #pubsub: PubSub;
	readonly #transport: Transport;
	readonly #config: ResolvedWooClientConfig;
	#context: ClientContext;

	readonly categories: ResourceClient<CategoryFields, CategoryQuery>;
	readonly productTags: ResourceClient<ProductTagFields, ProductTagQuery>;
	readonly products: ResourceClient<ProductFields, ProductQuery>;
	readonly taxRates: ResourceClient<TaxRateFields, TaxRateQuery>;
	readonly taxClasses: TaxClassClient;
	readonly coupons: ResourceClient<CouponFields, CouponQuery>;
	readonly customers: ResourceClient<CustomerFields, CustomerQuery>;
	readonly orders: ResourceClient<OrderFields, OrderQuery>;
	readonly shippingMethods: ShippingMethodClient;
	readonly webhooks: ResourceClient<WebhookFields, WebhookQuery>;

	// Keeps the full clients so setContext reaches the narrowed members too.
	readonly #resources: ReadonlyArray<Pick<ResourceClient<unknown>, "setContext">>;

	constructor(config: WooClientConfig = {}) {
		this.#config = resolveConfig(config);
		if (this.#config.debug) createClog.global.debug = true;

		this.#clog.debug("creating client", {
			baseUrl: this.#config.baseUrl,
			fake: this.#config.fake,
			customTransport: !!config.transport,
		});

		this.#pubsub = createPubSub();
		this.#context = {
			fake: this.#config.fake,
			credentials: this.#config.credentials ?? createMemoryCredentialStore(),
		};
		this.#transport = this.#config.transport ?? (this.#config.baseUrl
			? createHttpTransport({
				baseUrl: this.#config.baseUrl,
				apiPath: this.#config.apiPath,
				consumerKey: this.#config.consumerKey,
				consumerSecret: this.#config.consumerSecret,
				timeout: this.#config.timeout,
				fetch: this.#config.fetch,
			})
			: unconfiguredTransport);

		const taxClasses = this.#resource(taxClassResource);
		const shippingMethods = this.#resource(shippingMethodResource);

		this.categories = this.#resource(categoryResource);
		this.productTags = this.#resource(productTagResource);
		this.products = this.#resource(productResource);
		this.taxRates = this.#resource(taxRateResource);
		this.taxClasses = taxClasses;
		this.coupons = this.#resource(couponResource);
		this.customers = this.#resource(customerResource);
		this.orders = this.#resource(orderResource);
		this.shippingMethods = shippingMethods;
		this.webhooks = this.#resource(webhookResource);

		this.#resources = [
			this.categories,
			this.productTags,
			this.products,
			this.taxRates,
			taxClasses,
			this.coupons,
			this.customers,
			this.orders,
			shippingMethods,
			this.webhooks,
		];
	}

	/** Variations of one variable product */
	productVariations(
		productId: ResourceId,
	): ResourceClient<ProductVariationFields, ProductVariationQuery> {
		return this.#resource(productVariationResource, { product_id: productId });
	}

	/** Notes of one order */
	orderNotes(orderId: ResourceId): OrderNoteClient {
		return this.#resource(orderNoteResource, { order_id: orderId });
	}

	/**
	 * Fetches the customer whose id is in the credential store.
	 *
	 * @throws StoreApiError (kind "request") when no user id is stored
	 */
	async currentCustomer(options: GetOptions = {}): Promise<Customer> {
		const userId = await this.#context.credentials.getUserId();
		if (userId === null) {
			throw new StoreApiError("No current user id stored", {
				kind: "request",
				code: "no_current_user",
				operation: "get",
			});
		}
		return this.customers.get(userId, options);
	}

	/** Update context across all resources */
	setContext(context: Partial<ClientContext>): void {
		this.#clog.debug("setContext", { fake: context.fake });
		this.#context = { ...this.#context, ...context };
		for (const resource of this.#resources) resource.setContext(context);
	}

	/** Get the current context */
	getContext(): ClientContext {
		return { ...this.#context };
	}

	/** Credential store in use */
	get credentials(): ClientContext["credentials"] {
		return this.#context.credentials;
	}

	/** True when calls are synthesized unless a call says otherwise */
	get fake(): boolean {
		return this.#context.fake;
	}

	/** Subscribe to specific event type */
	on(eventType: WooClientEventType, callback: Subscriber): Unsubscriber {
		return this.#pubsub.subscribe(eventType, callback);
	}

	/** Subscribe to all events (receives { event, data } envelope) */
	onAny(
		callback: (envelope: { event: string; data: WooClientEvent }) => void,
	): Unsubscriber {
		return this.#pubsub.subscribe("*", callback);
	}

	/** Subscribe once to an event */
	once(eventType: WooClientEventType, callback: Subscriber): Unsubscriber {
		return this.#pubsub.subscribeOnce(eventType, callback);
	}

	#resource<S, Q extends ListQuery>(
		descriptor: ResourceDescriptor<S, Q>,
		pathParams?: Readonly<Record<string, ResourceId>>,
	): ResourceClient<S, Q> {
		return new ResourceClient(descriptor, {
			context: this.#context,
			transport: this.#transport,
			pubsub: this.#pubsub,
			pathParams,
		});
	}
}

/**
 * Factory function to create a WooClient instance.
 *
 * @example
 * ```typescript
 * const woo = createWooClient({ fake: true });
 * const products = await woo.products.list({ perPage: 5 });
 * ```
 */
export function createWooClient(config: WooClientConfig = {}): WooClient {
	return new WooClient(config);
}
