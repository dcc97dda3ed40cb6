import { createLogger } from "./logger";
import { runWatcher } from "./watcher";

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("feed-watch starting");

  const { exitCode } = await runWatcher(process.argv.slice(2), process.env, {
    logger,
  });

  process.exitCode = exitCode;
}

main().catch((err) => {
  console.error("fatal error:", err);
  process.exit(1);
});
