import { readFileSync } from "node:fs";
import { parseArgs } from "node:util";
import { parse } from "yaml";
import type { ZodIssue } from "zod";
import { UsageError } from "../errors";
import {
  importFileSchema,
  registryCommandSchema,
  watcherOptionsSchema,
} from "./schema";
import type { ImportFile, RegistryCommand, WatcherOptions } from "./schema";

export const DEFAULT_FEED_DB = "feeds.db";
export const DEFAULT_CACHE_DB = "feed_cache.db";

export type Env = Readonly<Record<string, string | undefined>>;

export type RegistryInvocation = {
  readonly dbPath: string;
  readonly command: RegistryCommand;
};

function toFlag(key: string | number): string {
  return `--${String(key).replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}`;
}

function formatIssues(
  issues: ReadonlyArray<ZodIssue>,
  label: (path: ReadonlyArray<string | number>) => string,
): string {
  return issues.map((i) => `  - ${label(i.path)}: ${i.message}`).join("\n");
}

function flagLabel(path: ReadonlyArray<string | number>): string {
  const [head] = path;
  return head === undefined ? "options" : toFlag(head);
}

function withUsageErrors<T>(parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new UsageError(message);
  }
}

/**
 * Parses `feeds [--db <path>] <command> [options]`.
 * `FEED_CONFIG` replaces the default database path when `--db` is absent.
 */
export function parseRegistryArgs(
  argv: ReadonlyArray<string>,
  env: Env = process.env,
): RegistryInvocation {
  const { values, positionals } = withUsageErrors(() =>
    parseArgs({
      args: [...argv],
      options: {
        db: { type: "string" },
        name: { type: "string" },
        "new-name": { type: "string" },
        url: { type: "string" },
        file: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
      strict: true,
      allowPositionals: true,
    }),
  );

  const dbPath = values.db ?? env["FEED_CONFIG"] ?? DEFAULT_FEED_DB;

  if (values.help === true) {
    return { dbPath, command: { command: "help" } };
  }

  if (positionals.length === 0) {
    throw new UsageError(
      "a command is required (add, edit, update, delete, list, import)",
    );
  }
  if (positionals.length > 1) {
    throw new UsageError(`unexpected argument '${positionals[1]}'`);
  }

  const raw: Record<string, unknown> = { command: positionals[0] };
  for (const [key, value] of Object.entries(values)) {
    if (key === "db" || key === "help" || value === undefined) continue;
    raw[key === "new-name" ? "newName" : key] = value;
  }

  const result = registryCommandSchema.safeParse(raw);
  if (!result.success) {
    const unknownCommand = result.error.issues.some(
      (i) => i.code === "invalid_union_discriminator",
    );
    if (unknownCommand) {
      throw new UsageError(`unknown command '${positionals[0]}'`);
    }
    const issues = formatIssues(result.error.issues, flagLabel);
    throw new UsageError(`invalid options for '${positionals[0]}':\n${issues}`);
  }

  return { dbPath, command: result.data };
}

/**
 * Parses the watcher's options. Each option falls back to an environment
 * variable (`DISCORD_WEBHOOK_URL`, `FEED_CONFIG`, `FEED_CACHE`), then to its
 * default.
 */
export function parseWatcherOptions(
  argv: ReadonlyArray<string>,
  env: Env = process.env,
): WatcherOptions {
  const { values, positionals } = withUsageErrors(() =>
    parseArgs({
      args: [...argv],
      options: {
        "discord-webhook": { type: "string" },
        "feed-config": { type: "string" },
        cache: { type: "string" },
      },
      strict: true,
      allowPositionals: true,
    }),
  );

  if (positionals.length > 0) {
    throw new UsageError(`unexpected argument '${positionals[0]}'`);
  }

  const result = watcherOptionsSchema.safeParse({
    discordWebhook: values["discord-webhook"] ?? env["DISCORD_WEBHOOK_URL"],
    feedConfig: values["feed-config"] ?? env["FEED_CONFIG"] ?? DEFAULT_FEED_DB,
    cache: values.cache ?? env["FEED_CACHE"] ?? DEFAULT_CACHE_DB,
  });

  if (!result.success) {
    throw new UsageError(
      `invalid options:\n${formatIssues(result.error.issues, flagLabel)}`,
    );
  }

  return result.data;
}

/**
 * Reads a YAML file listing feeds to add in bulk.
 */
export function loadImportFile(filePath: string): ImportFile {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read import file at ${filePath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${filePath}: ${message}`);
  }

  const result = importFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid import file ${filePath}:\n${issues}`);
  }

  return result.data;
}

export type { RegistryCommand, WatcherOptions, ImportFile };
