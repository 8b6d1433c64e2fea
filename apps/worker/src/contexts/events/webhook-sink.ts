/**
 * Webhook Event Sink
 *
 * Delivers outbound events as JSON POSTs to the messaging service. Server
 * errors and timeouts are retried; a 4xx answer means the payload was
 * refused and is not.
 */

import {
	DependencyUnavailableError,
	type OutboundEvent,
	OutboundEventSchema,
	RetryPolicy,
	ValidationError,
} from "@shiftlog/domain";
import { formatError, type Logger } from "@shiftlog/logger";
import { log as defaultLog } from "../../shared/logger.js";
import type { EventSink } from "./event-sink.js";

export interface WebhookEventSinkOptions {
	url: string;
	/** GET target for probe(); without it probe() sends HEAD to `url` */
	healthUrl?: string;
	timeoutMs: number;
	retry?: RetryPolicy;
	fetch?: typeof fetch;
	logger?: Logger;
}

export class WebhookEventSink implements EventSink {
	private readonly url: string;
	private readonly healthUrl: string | undefined;
	private readonly timeoutMs: number;
	private readonly retry: RetryPolicy;
	private readonly fetchImpl: typeof fetch;
	private readonly log: Logger;

	constructor(options: WebhookEventSinkOptions) {
		this.url = options.url;
		this.healthUrl = options.healthUrl;
		this.timeoutMs = options.timeoutMs;
		this.retry = options.retry ?? new RetryPolicy();
		this.fetchImpl = options.fetch ?? fetch;
		this.log = options.logger ?? defaultLog;
	}

	async emit(event: OutboundEvent): Promise<void> {
		const parsed = OutboundEventSchema.safeParse(event);
		if (!parsed.success) {
			throw ValidationError.fromZod(parsed.error, `${event.type} event`);
		}
		const body = JSON.stringify(parsed.data);

		await this.retry.execute(
			() => this.deliver(event.type, body),
			({ attempt, delayMs, error }) => {
				this.log.warn({ eventType: event.type, attempt, delayMs, error: formatError(error) }, "Event delivery failed, retrying");
			},
		);
		this.log.debug({ eventType: event.type }, "Event delivered");
	}

	/**
	 * With a health URL, any 2xx is up. Without one, any HTTP answer from
	 * the delivery URL is.
	 */
	async probe(): Promise<void> {
		const target = this.healthUrl ?? this.url;
		const response = await this.send(target, { method: this.healthUrl ? "GET" : "HEAD" });

		if (this.healthUrl && !response.ok) {
			throw new DependencyUnavailableError("messaging", `Event sink health check returned HTTP ${response.status}`);
		}
	}

	private async deliver(eventType: OutboundEvent["type"], body: string): Promise<void> {
		const response = await this.send(this.url, {
			method: "POST",
			headers: { "content-type": "application/json" },
			body,
		});

		if (response.ok) {
			return;
		}
		if (response.status >= 500 || response.status === 429) {
			throw new DependencyUnavailableError("messaging", `Event sink returned HTTP ${response.status}`);
		}
		throw new ValidationError(`Event sink refused ${eventType} event with HTTP ${response.status}`, [
			{ path: "event", message: `HTTP ${response.status}` },
		]);
	}

	private async send(target: string, init: RequestInit): Promise<Response> {
		try {
			return await this.fetchImpl(target, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
		} catch (error) {
			throw new DependencyUnavailableError("messaging", `Event sink request failed: ${formatError(error)}`, {
				cause: error,
			});
		}
	}
}
