import { DependencyUnavailableError, type OutboundEvent, RetryPolicy, ValidationError } from "@shiftlog/domain";
import { describe, expect, it, vi } from "vitest";
import { WebhookEventSink } from "./webhook-sink.js";

const BACKUP: OutboundEvent = {
	type: "backup_requested",
	occurredAt: "2024-06-16T03:00:00.000Z",
	runId: "run-1",
};

function createSink(fetchImpl: typeof fetch, healthUrl?: string): WebhookEventSink {
	return new WebhookEventSink({
		url: "https://events.example.test/hook",
		healthUrl,
		timeoutMs: 1_000,
		retry: new RetryPolicy({ maxAttempts: 3 }, { sleep: async () => undefined }),
		fetch: fetchImpl,
	});
}

describe("WebhookEventSink", () => {
	describe("emit", () => {
		it("posts the event as JSON", async () => {
			const fetchImpl = vi.fn<typeof fetch>(async () => new Response(null, { status: 204 }));

			await createSink(fetchImpl).emit(BACKUP);

			expect(fetchImpl).toHaveBeenCalledTimes(1);
			const [target, init] = fetchImpl.mock.calls[0] ?? [];
			expect(target).toBe("https://events.example.test/hook");
			expect(init?.method).toBe("POST");
			expect(init?.headers).toEqual({ "content-type": "application/json" });
			expect(init?.body).toBe(
				JSON.stringify({ type: "backup_requested", occurredAt: "2024-06-16T03:00:00.000Z", runId: "run-1" }),
			);
		});

		it("retries server errors", async () => {
			const fetchImpl = vi.fn<typeof fetch>();
			fetchImpl
				.mockResolvedValueOnce(new Response(null, { status: 503 }))
				.mockResolvedValueOnce(new Response(null, { status: 200 }));

			await createSink(fetchImpl).emit(BACKUP);

			expect(fetchImpl).toHaveBeenCalledTimes(2);
		});

		it("gives up with a messaging dependency error", async () => {
			const fetchImpl = vi.fn<typeof fetch>(async () => {
				throw new TypeError("fetch failed");
			});

			const delivery = createSink(fetchImpl).emit(BACKUP);

			await expect(delivery).rejects.toBeInstanceOf(DependencyUnavailableError);
			await expect(delivery).rejects.toMatchObject({ dependency: "messaging" });
			expect(fetchImpl).toHaveBeenCalledTimes(3);
		});

		it("does not retry a refused payload", async () => {
			const fetchImpl = vi.fn<typeof fetch>(async () => new Response(null, { status: 422 }));

			const delivery = createSink(fetchImpl).emit(BACKUP);

			await expect(delivery).rejects.toBeInstanceOf(ValidationError);
			await expect(delivery).rejects.toThrow("Event sink refused backup_requested event with HTTP 422");
			expect(fetchImpl).toHaveBeenCalledTimes(1);
		});

		it("rejects a malformed event before sending", async () => {
			const fetchImpl = vi.fn<typeof fetch>();

			await expect(
				createSink(fetchImpl).emit({ type: "backup_requested", occurredAt: "yesterday", runId: "run-1" }),
			).rejects.toBeInstanceOf(ValidationError);
			expect(fetchImpl).not.toHaveBeenCalled();
		});
	});

	describe("probe", () => {
		it("requires a 2xx from the health URL", async () => {
			const fetchImpl = vi.fn<typeof fetch>(async () => new Response(null, { status: 500 }));

			await expect(createSink(fetchImpl, "https://events.example.test/health").probe()).rejects.toThrow(
				"Event sink health check returned HTTP 500",
			);
			expect(fetchImpl.mock.calls[0]?.[0]).toBe("https://events.example.test/health");
			expect(fetchImpl.mock.calls[0]?.[1]?.method).toBe("GET");
		});

		it("accepts any answer from the delivery URL without a health URL", async () => {
			const fetchImpl = vi.fn<typeof fetch>(async () => new Response(null, { status: 405 }));

			await expect(createSink(fetchImpl).probe()).resolves.toBeUndefined();
			expect(fetchImpl.mock.calls[0]?.[1]?.method).toBe("HEAD");
		});

		it("fails when the sink is unreachable", async () => {
			const fetchImpl = vi.fn<typeof fetch>(async () => {
				throw new TypeError("fetch failed");
			});

			await expect(createSink(fetchImpl).probe()).rejects.toBeInstanceOf(DependencyUnavailableError);
		});
	});
});
