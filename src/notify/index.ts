export { formatNotification, formatEntryLine, MESSAGE_LIMIT } from "./message";

export { createWebhookNotifier, endpointFingerprint } from "./sender";
export type { SendResult, NotifyFn } from "./sender";
