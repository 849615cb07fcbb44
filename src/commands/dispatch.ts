import { writeFile } from "fs/promises";
import {
  expandAllTag,
  listAny,
  listEvery,
  lookup,
  searchTag,
  sortTagCounts,
  sortUrlRows,
  tagFrequency,
} from "../bookmarks/query";
import { load, mergeFrom, save, type StoreContext } from "../bookmarks/store";
import { add, deleteUrl, remove, type Database } from "../bookmarks/tag-set";
import type { Config } from "../config";
import { renderHtml, type BrowserOpener } from "../utils/browser";
import { UsageError, errorCode } from "../utils/errors";
import type { Diagnostics, Output } from "../utils/log";
import { substitutePath } from "../utils/paths";
import type { Transport } from "../utils/transport";
import { formatLines, type CommandResult } from "./result";

export type Action =
  | "add"
  | "remove"
  | "delete"
  | "import"
  | "list-any"
  | "list-every"
  | "tags"
  | "search"
  | "lookup";

export interface CommandOptions {
  verbose: boolean;
  web: boolean;
  noPathSubs: boolean;
  clean: boolean;
  // Database path or remote locator, overrides the configured one
  file?: string;
}

export interface ParsedCommand {
  action: Action;
  urls: string[];
  tags: string[];
  options: CommandOptions;
}

export interface DispatcherDeps {
  diagnostics: Diagnostics;
  output: Output;
  transport: Transport;
  openBrowser: BrowserOpener;
  cwd?: string;
}

export interface Dispatcher {
  dispatch(command: ParsedCommand): Promise<CommandResult>;
}

const MUTATING_ACTIONS: ReadonlySet<Action> = new Set<Action>([
  "add",
  "remove",
  "delete",
  "import",
]);

export function isMutating(action: Action): boolean {
  return MUTATING_ACTIONS.has(action);
}

function firstArgument(values: string[], what: string): string {
  const [first] = values;
  if (first === undefined) {
    throw new UsageError(`Missing ${what}`);
  }
  return first;
}

export function createDispatcher(
  config: Config,
  deps: DispatcherDeps
): Dispatcher {
  const store: StoreContext = {
    diagnostics: deps.diagnostics,
    transport: deps.transport,
  };

  async function apply(
    database: Database,
    { action, urls, tags, options }: ParsedCommand
  ): Promise<CommandResult> {
    switch (action) {
      case "add":
        for (const url of urls) {
          add(database, url, tags);
        }
        return { kind: "none" };

      case "remove": {
        const removed = expandAllTag(database, tags);
        for (const url of urls) {
          remove(database, url, removed);
        }
        return { kind: "none" };
      }

      case "delete":
        for (const url of urls) {
          deleteUrl(database, url);
        }
        return { kind: "none" };

      case "import":
        await mergeFrom(database, urls, store);
        return { kind: "none" };

      case "list-any":
        return {
          kind: "urls",
          heading: tags.join(" "),
          rows: sortUrlRows(
            listAny(database, expandAllTag(database, tags), {
              verbose: options.verbose,
            })
          ),
        };

      case "list-every":
        return {
          kind: "urls",
          heading: tags.join(" "),
          rows: sortUrlRows(
            listEvery(database, expandAllTag(database, tags), {
              verbose: options.verbose,
            })
          ),
        };

      case "tags":
        return {
          kind: "tag-counts",
          heading: "Tags",
          rows: sortTagCounts(tagFrequency(database)),
        };

      case "search": {
        const pattern = firstArgument(tags, "search pattern");
        return {
          kind: "tag-counts",
          heading: pattern,
          rows: sortTagCounts(searchTag(database, pattern)),
        };
      }

      case "lookup": {
        const url = firstArgument(urls, "URL");
        return { kind: "tags", heading: url, rows: lookup(database, url) };
      }
    }
  }

  // Falls back to printing when the page cannot be written
  async function writePage(result: CommandResult): Promise<boolean> {
    try {
      await writeFile(config.htmlPath, renderHtml(result));
      return true;
    } catch (error) {
      const reason =
        errorCode(error) ??
        (error instanceof Error ? error.message : String(error));
      deps.diagnostics.warn(
        `Cannot write "${config.htmlPath}" (${reason}): printing results instead.`
      );
      return false;
    }
  }

  async function present(result: CommandResult, web: boolean): Promise<void> {
    if (result.kind === "none") {
      return;
    }
    if (web && (await writePage(result))) {
      deps.diagnostics.debug(`[WEB] Opening ${config.htmlPath}`);
      await deps.openBrowser(config.htmlPath);
      return;
    }
    for (const line of formatLines(result)) {
      deps.output(line);
    }
  }

  return {
    async dispatch(command) {
      const source = command.options.file ?? config.databasePath;
      const database = await load(source, store, { create: true });
      const mutating = isMutating(command.action);

      // Sets drop duplicated tags on decode; rewriting stores the clean form
      if (command.options.clean && !mutating) {
        await save(database, source, store);
      }

      // Import sources are loaded as given, everything else is a key
      const urls =
        command.options.noPathSubs || command.action === "import"
          ? command.urls
          : command.urls.map((url) => substitutePath(url, deps.cwd));

      const result = await apply(database, { ...command, urls });

      if (mutating) {
        await save(database, source, store);
      }

      await present(result, command.options.web);
      return result;
    },
  };
}
