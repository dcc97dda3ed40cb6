// pattern: Imperative Shell
import { existsSync } from "node:fs";
import type { Logger } from "pino";
import { parseWatcherOptions } from "./config";
import type { Env, WatcherOptions } from "./config";
import { createDatabase } from "./db";
import type { DatabaseResult } from "./db";
import { createFeedRegistry } from "./registry";
import { createSeenEntryCache } from "./cache";
import { createWebhookNotifier } from "./notify";
import type { NotifyFn } from "./notify";
import { createFeedFetcher, runWatchCycle } from "./pipeline";
import type { FetchFeedFn, WatchSummary } from "./pipeline";
import { registerShutdownHandlers } from "./lifecycle";

export type WatcherDeps = {
  readonly logger: Logger;
  readonly fetchFeed?: FetchFeedFn;
  readonly createNotifier?: (webhookUrl: string) => NotifyFn;
};

export type WatcherOutcome = {
  readonly exitCode: number;
  readonly summary: WatchSummary | null;
};

/**
 * One watcher run: check the options, open both stores, run a watch cycle,
 * close the stores.
 *
 * Exit code 1 only for bad options, a missing feed database or an empty
 * registry. Feed failures and delivery failures still exit 0.
 */
export async function runWatcher(
  argv: ReadonlyArray<string>,
  env: Env,
  deps: WatcherDeps,
): Promise<WatcherOutcome> {
  const { logger } = deps;

  let options: WatcherOptions;
  try {
    options = parseWatcherOptions(argv, env);
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    return { exitCode: 1, summary: null };
  }

  if (!existsSync(options.feedConfig)) {
    logger.error(
      { feedConfig: options.feedConfig },
      "feed configuration store does not exist, add feeds with the feeds command first",
    );
    return { exitCode: 1, summary: null };
  }

  const registryStore = createDatabase(options.feedConfig);
  const registry = createFeedRegistry(registryStore.db, logger);

  let feedCount: number;
  try {
    feedCount = registry.count();
  } catch (err) {
    registryStore.close();
    throw err;
  }

  if (feedCount === 0) {
    registryStore.close();
    logger.error(
      { feedConfig: options.feedConfig },
      "no feed configurations found",
    );
    return { exitCode: 1, summary: null };
  }

  let cacheStore: DatabaseResult;
  try {
    cacheStore = createDatabase(options.cache);
  } catch (err) {
    registryStore.close();
    throw err;
  }

  const unregister = registerShutdownHandlers({
    closeables: [
      { name: "feed-config", close: registryStore.close },
      { name: "cache", close: cacheStore.close },
    ],
    logger,
  });

  try {
    const makeNotifier = deps.createNotifier ?? createWebhookNotifier;
    const summary = await runWatchCycle({
      registry,
      cache: createSeenEntryCache(cacheStore.db),
      fetchFeed: deps.fetchFeed ?? createFeedFetcher(logger),
      notify: makeNotifier(options.discordWebhook),
      logger,
    });
    return { exitCode: 0, summary };
  } finally {
    unregister();
    cacheStore.close();
    registryStore.close();
  }
}
