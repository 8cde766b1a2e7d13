/**
 * @module resources/webhook
 *
 * Webhooks (`webhooks`). Deletes are forced.
 */

import {
	date,
	defineCodec,
	fake,
	field,
	listOf,
	type Model,
	num,
	oneOf,
	str,
} from "../codec/mod.ts";
import type { ListQuery } from "../query.ts";
import { defineResource } from "./descriptor.ts";
import type { PostOrderBy } from "./shared.ts";

export const WEBHOOK_STATUSES = ["active", "paused", "disabled"] as const;
export type WebhookStatus = (typeof WEBHOOK_STATUSES)[number];

export interface WebhookFields {
	id: number;
	name: string;
	status: WebhookStatus;
	/** e.g. "order.created" */
	topic: string;
	resource: string;
	event: string;
	hooks: readonly string[];
	deliveryUrl: string;
	/** Write-only: signs the payload */
	secret: string;
	dateCreated: Date;
	dateModified: Date;
}

export type Webhook = Model<WebhookFields>;

export interface WebhookQuery extends ListQuery<PostOrderBy> {
	status?: WebhookStatus | "all";
}

export const webhookCodec = defineCodec<WebhookFields>(
	{
		id: field("id", num),
		name: field("name", str),
		status: field("status", oneOf(WEBHOOK_STATUSES, "active")),
		topic: field("topic", str),
		resource: field("resource", str),
		event: field("event", str),
		hooks: field("hooks", listOf(str)),
		deliveryUrl: field("delivery_url", str),
		secret: field("secret", str),
		dateCreated: field("date_created", date),
		dateModified: field("date_modified", date),
	},
	{ required: ["topic", "deliveryUrl"] },
);

const TOPICS = ["order.created", "order.updated", "product.created", "customer.deleted"] as const;

export const fakeWebhook = (): Webhook => {
	const topic = fake.pick(TOPICS);
	const [resource, event] = topic.split(".");
	return Object.freeze({
		id: fake.id(),
		name: fake.sentence(),
		status: fake.pick(WEBHOOK_STATUSES),
		topic,
		resource,
		event,
		hooks: [],
		deliveryUrl: fake.url(),
		dateCreated: fake.datetime(),
		dateModified: fake.datetime(),
	});
};

export const webhookResource = defineResource<WebhookFields, WebhookQuery>({
	name: "webhook",
	path: "webhooks",
	codec: webhookCodec,
	idKey: "id",
	identify: (webhook) => webhook.id,
	fake: fakeWebhook,
	filters: { status: "status" },
	forceDelete: true,
});
