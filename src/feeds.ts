import { createLogger } from "./logger";
import { runFeedsCli } from "./commands";

const logger = createLogger(process.env["LOG_LEVEL"] ?? "warn");

process.exitCode = runFeedsCli(
  process.argv.slice(2),
  process.env,
  {
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
  },
  logger,
);
