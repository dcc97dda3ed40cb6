// pattern: Imperative Shell
import { createHash } from "node:crypto";
import type { Logger } from "pino";
import type { NewEntryRecord } from "../pipeline/types";
import { formatNotification } from "./message";

/**
 * Discriminated union result type for webhook deliveries. `status` is `null`
 * when there was nothing to send.
 */
export type SendResult =
  | { readonly success: true; readonly status: number | null }
  | { readonly success: false; readonly error: string };

/**
 * Function signature for delivering new entries to a chat channel.
 * Never throws — failures are returned in the result.
 */
export type NotifyFn = (
  entries: ReadonlyArray<NewEntryRecord>,
  logger: Logger,
) => Promise<SendResult>;

const ACCEPTED_STATUSES: ReadonlySet<number> = new Set([200, 204]);

/**
 * Short stable identifier for a webhook URL. The URL itself embeds the
 * webhook token and is never logged.
 */
export function endpointFingerprint(url: string): string {
  return createHash("sha256").update(url).digest("hex").slice(0, 8);
}

/**
 * Creates a notifier that posts `{ content }` to a Discord-compatible webhook.
 *
 * @param webhookUrl - Endpoint to POST to
 * @returns A NotifyFn bound to the endpoint. An empty entry list makes no request.
 */
export function createWebhookNotifier(webhookUrl: string): NotifyFn {
  const endpoint = endpointFingerprint(webhookUrl);

  return async function notify(
    entries: ReadonlyArray<NewEntryRecord>,
    logger: Logger,
  ): Promise<SendResult> {
    if (entries.length === 0) {
      return { success: true, status: null };
    }

    const content = formatNotification(entries);

    try {
      const response = await fetch(webhookUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ content }),
      });

      if (!ACCEPTED_STATUSES.has(response.status)) {
        const body = await response.text();
        const error = `HTTP ${response.status} - ${body}`;
        logger.error(
          { endpoint, status: response.status, error },
          "webhook notification rejected",
        );
        return { success: false, error };
      }

      logger.info(
        { endpoint, status: response.status, entryCount: entries.length },
        "webhook notification sent",
      );
      return { success: true, status: response.status };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ endpoint, error: message }, "webhook notification failed");
      return { success: false, error: message };
    }
  };
}
