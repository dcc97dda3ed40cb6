// pattern: Imperative Shell
import type { Logger } from "pino";
import { loadImportFile, parseRegistryArgs } from "./config";
import type { Env, RegistryCommand } from "./config";
import { createDatabase } from "./db";
import { FeedWatchError, MissingRequiredOptionError } from "./errors";
import { createFeedRegistry } from "./registry";
import type { Feed, FeedRegistry } from "./registry";

export type Output = {
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
};

export const REGISTRY_USAGE = `Usage: feeds [--db <path>] <command> [options]

Commands:
  add     --name <name> --url <url>                Add a new feed
  edit    --name <name> [--new-name <name>] [--url <url>]
                                                   Rename a feed and/or change its URL
  update  --name <name> --url <url>                Change only the URL of a feed
  delete  --name <name>                            Delete a feed
  list                                             List all feeds
  import  --file <feeds.yaml>                      Add every feed listed in a YAML file

Options:
  --db <path>   Feed database file (default: feeds.db, or $FEED_CONFIG)`;

/**
 * A command with everything it needs read from disk. Checks that need no
 * store (the edit option rule, the import file) happen while building this,
 * before the store is opened.
 */
export type PreparedCommand =
  | Exclude<RegistryCommand, { command: "import" }>
  | { readonly command: "import"; readonly feeds: ReadonlyArray<Feed> };

export function prepareCommand(command: RegistryCommand): PreparedCommand {
  switch (command.command) {
    case "edit":
      if (command.newName === undefined && command.url === undefined) {
        throw new MissingRequiredOptionError(
          "Provide at least one option to update (--new-name and/or --url).",
        );
      }
      return command;
    case "import":
      return { command: "import", feeds: loadImportFile(command.file).feeds };
    default:
      return command;
  }
}

export function executeRegistryCommand(
  registry: FeedRegistry,
  command: PreparedCommand,
  print: (line: string) => void,
): void {
  switch (command.command) {
    case "add": {
      registry.add(command.name, command.url);
      print(`Feed '${command.name}' added with URL: ${command.url}`);
      return;
    }
    case "edit": {
      const feed = registry.renameOrUpdate(command.name, {
        newName: command.newName,
        newUrl: command.url,
      });
      print(`Feed updated: Name='${feed.name}', URL='${feed.url}'`);
      return;
    }
    case "update": {
      registry.updateUrl(command.name, command.url);
      print(`Feed '${command.name}' updated with new URL: ${command.url}`);
      return;
    }
    case "delete": {
      registry.delete(command.name);
      print(`Feed '${command.name}' deleted.`);
      return;
    }
    case "list": {
      const feeds = [...registry.list()];
      if (feeds.length === 0) {
        print("No feeds found.");
        return;
      }
      print("Current feeds:");
      for (const feed of feeds) {
        print(` - ${feed.name}: ${feed.url}`);
      }
      return;
    }
    case "import": {
      const { added, skipped } = registry.importFeeds(command.feeds);
      print(
        `Imported ${added.length} feed(s), skipped ${skipped.length} existing.`,
      );
      for (const name of skipped) {
        print(` - skipped ${name}`);
      }
      return;
    }
    case "help": {
      print(REGISTRY_USAGE);
      return;
    }
  }
}

/**
 * Runs one `feeds` invocation and returns its exit code. Domain and usage
 * errors print `Error: <message>` and give 1.
 */
export function runFeedsCli(
  argv: ReadonlyArray<string>,
  env: Env,
  output: Output,
  logger: Logger,
): number {
  let close: (() => void) | undefined;

  try {
    const { dbPath, command } = parseRegistryArgs(argv, env);
    const prepared = prepareCommand(command);

    if (prepared.command === "help") {
      output.stdout(REGISTRY_USAGE);
      return 0;
    }

    const database = createDatabase(dbPath);
    close = database.close;
    logger.debug({ dbPath, command: prepared.command }, "feed database opened");

    const registry = createFeedRegistry(database.db, logger);
    executeRegistryCommand(registry, prepared, output.stdout);
    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    const code = err instanceof FeedWatchError ? err.code : "UNEXPECTED";
    logger.debug({ code, error: message }, "feeds command failed");
    output.stderr(`Error: ${message}`);
    return 1;
  } finally {
    close?.();
  }
}
