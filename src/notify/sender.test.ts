import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from "vitest";
import { setupServer } from "msw/node";
import { http, HttpResponse } from "msw";
import pino from "pino";
import { createMockLogger } from "../test-utils/logger";
import { createWebhookNotifier, endpointFingerprint } from "./sender";
import { MESSAGE_LIMIT } from "./message";
import type { NewEntryRecord } from "../pipeline/types";

const WEBHOOK_URL = "https://discord.test/api/webhooks/123/test-token";

const server = setupServer();

beforeAll(() => {
  server.listen({ onUnhandledRequest: "error" });
});

afterEach(() => {
  server.resetHandlers();
  vi.restoreAllMocks();
});

afterAll(() => {
  server.close();
});

const entries: Array<NewEntryRecord> = [
  { feedName: "Example", title: "Hello", link: "https://example.com/hello" },
];

function captureWebhook(status: number, body: string | null = null) {
  const received: Array<unknown> = [];
  server.use(
    http.post(WEBHOOK_URL, async ({ request }) => {
      received.push(await request.json());
      return new HttpResponse(body, { status });
    }),
  );
  return received;
}

describe("createWebhookNotifier", () => {
  const logger = pino({ level: "silent" });

  it("should make no request for an empty entry list", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch");
    const notify = createWebhookNotifier(WEBHOOK_URL);

    const result = await notify([], logger);

    expect(result).toEqual({ success: true, status: null });
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it("should post the formatted message as the content field", async () => {
    const received = captureWebhook(204);
    const notify = createWebhookNotifier(WEBHOOK_URL);

    const result = await notify(entries, logger);

    expect(result).toEqual({ success: true, status: 204 });
    expect(received).toEqual([
      {
        content:
          "**New RSS Feed Entries Found:**\n**Example**: [Hello](https://example.com/hello)",
      },
    ]);
  });

  it("should accept a 200 response", async () => {
    captureWebhook(200, "ok");
    const notify = createWebhookNotifier(WEBHOOK_URL);

    const result = await notify(entries, logger);

    expect(result).toEqual({ success: true, status: 200 });
  });

  it("should cap the delivered content at the message limit", async () => {
    const received = captureWebhook(204);
    const notify = createWebhookNotifier(WEBHOOK_URL);
    const many: Array<NewEntryRecord> = Array.from({ length: 80 }, (_, i) => ({
      feedName: "Busy Feed",
      title: `Post ${i}`,
      link: `https://busy.example.com/posts/${i}`,
    }));

    await notify(many, logger);

    expect(received).toHaveLength(1);
    const payload = received[0];
    expect(payload).toHaveProperty("content");
    if (typeof payload === "object" && payload !== null && "content" in payload) {
      expect(String(payload.content)).toHaveLength(MESSAGE_LIMIT);
    }
  });

  it("should treat other success codes as failures", async () => {
    captureWebhook(201, "created");
    const notify = createWebhookNotifier(WEBHOOK_URL);

    const result = await notify(entries, logger);

    expect(result).toEqual({ success: false, error: "HTTP 201 - created" });
  });

  it("should return and log a rejected delivery without throwing", async () => {
    captureWebhook(429, "rate limited");
    const mockLogger = createMockLogger();
    const notify = createWebhookNotifier(WEBHOOK_URL);

    const result = await notify(entries, mockLogger);

    expect(result).toEqual({ success: false, error: "HTTP 429 - rate limited" });
    expect(mockLogger.error).toHaveBeenCalledWith(
      {
        endpoint: endpointFingerprint(WEBHOOK_URL),
        status: 429,
        error: "HTTP 429 - rate limited",
      },
      "webhook notification rejected",
    );
  });

  it("should return a failure on a transport error", async () => {
    server.use(http.post(WEBHOOK_URL, () => HttpResponse.error()));
    const notify = createWebhookNotifier(WEBHOOK_URL);

    const result = await notify(entries, logger);

    expect(result.success).toBe(false);
  });

  it("should never log the webhook URL", async () => {
    captureWebhook(204);
    const mockLogger = createMockLogger();
    const notify = createWebhookNotifier(WEBHOOK_URL);

    await notify(entries, mockLogger);

    expect(mockLogger.info).toHaveBeenCalledWith(
      { endpoint: endpointFingerprint(WEBHOOK_URL), status: 204, entryCount: 1 },
      "webhook notification sent",
    );
  });
});

describe("endpointFingerprint", () => {
  it("should be eight hex characters and stable", () => {
    const first = endpointFingerprint(WEBHOOK_URL);

    expect(first).toMatch(/^[0-9a-f]{8}$/);
    expect(endpointFingerprint(WEBHOOK_URL)).toBe(first);
    expect(endpointFingerprint(`${WEBHOOK_URL}-other`)).not.toBe(first);
  });
});
