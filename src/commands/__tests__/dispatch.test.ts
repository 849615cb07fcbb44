import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import { encode } from "@msgpack/msgpack";
import * as cheerio from "cheerio";
import { readFile, rm, writeFile } from "fs/promises";
import path from "path";

import {
  createFakeTransport,
  createRecordingDiagnostics,
  makeTempDir,
  warnings,
  writeDatabaseFile,
} from "../../__tests__/fakes";
import { decodeDatabase } from "../../bookmarks/store";
import { toRecord } from "../../bookmarks/tag-set";
import type { Config } from "../../config";
import {
  NetworkError,
  NotFoundError,
  UsageError,
} from "../../utils/errors";
import {
  createDispatcher,
  isMutating,
  type Action,
  type CommandOptions,
  type ParsedCommand,
} from "../dispatch";

function command(
  action: Action,
  {
    urls = [],
    tags = [],
    ...options
  }: Partial<CommandOptions> & { urls?: string[]; tags?: string[] } = {}
): ParsedCommand {
  return {
    action,
    urls,
    tags,
    options: {
      verbose: false,
      web: false,
      noPathSubs: false,
      clean: false,
      ...options,
    },
  };
}

describe("createDispatcher", () => {
  let dir: string;
  let config: Config;

  beforeEach(async () => {
    dir = await makeTempDir();
    config = {
      databasePath: path.join(dir, "bookmarks"),
      htmlPath: path.join(dir, "results.html"),
      fetchTimeoutMs: 1000,
      debug: false,
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function setup(responses: Record<string, Uint8Array | Error> = {}) {
    const diagnostics = createRecordingDiagnostics();
    const lines: string[] = [];
    const opened: string[] = [];
    const dispatcher = createDispatcher(config, {
      diagnostics,
      output: (line) => lines.push(line),
      transport: createFakeTransport(responses),
      openBrowser: async (file) => {
        opened.push(file);
      },
      cwd: dir,
    });
    return { diagnostics, lines, opened, dispatcher };
  }

  async function storedRecord(): Promise<Record<string, string[]>> {
    const bytes = await readFile(config.databasePath);
    return toRecord(decodeDatabase(bytes, config.databasePath));
  }

  async function seed(record: Record<string, string[]>): Promise<void> {
    await writeDatabaseFile(config.databasePath, record);
  }

  it("creates the database on first use and stores added tags", async () => {
    const { diagnostics, dispatcher } = setup();

    await dispatcher.dispatch(
      command("add", { urls: ["http://x"], tags: ["b", "a"] })
    );

    assert.deepStrictEqual(warnings(diagnostics), [
      `The file "${config.databasePath}" does not exist: creating it.`,
    ]);
    assert.deepStrictEqual(await storedRecord(), { "http://x": ["a", "b"] });
  });

  it("prints the sorted tags of a URL", async () => {
    await seed({ "http://x": ["b", "a"] });
    const { lines, dispatcher } = setup();

    await dispatcher.dispatch(command("lookup", { urls: ["http://x"] }));

    assert.deepStrictEqual(lines, ["a", "b"]);
  });

  it("fails the lookup of an unknown URL", async () => {
    await seed({ "http://x": ["a"] });
    const { dispatcher } = setup();

    await assert.rejects(
      dispatcher.dispatch(command("lookup", { urls: ["http://nowhere"] })),
      NotFoundError
    );
  });

  it("drops a URL whose last tag is removed", async () => {
    await seed({ "http://x": ["a"], "http://y": ["b"] });
    const { dispatcher } = setup();

    await dispatcher.dispatch(
      command("remove", { urls: ["http://x"], tags: ["a"] })
    );

    assert.deepStrictEqual(await storedRecord(), { "http://y": ["b"] });
  });

  it("removes every tag when asked for all", async () => {
    await seed({ "http://x": ["a", "b"], "http://y": ["b"] });
    const { dispatcher } = setup();

    await dispatcher.dispatch(
      command("remove", { urls: ["http://x"], tags: ["ALL"] })
    );

    assert.deepStrictEqual(await storedRecord(), { "http://y": ["b"] });
  });

  it("deletes every given URL", async () => {
    await seed({ "http://x": ["a"], "http://y": ["b"], "http://z": ["c"] });
    const { dispatcher } = setup();

    await dispatcher.dispatch(
      command("delete", { urls: ["http://x", "http://z", "http://gone"] })
    );

    assert.deepStrictEqual(await storedRecord(), { "http://y": ["b"] });
  });

  it("lists URLs with any tag in order", async () => {
    await seed({
      "http://y": ["b"],
      "http://x": ["a", "b"],
      "http://w": ["c"],
    });
    const { lines, dispatcher } = setup();

    await dispatcher.dispatch(command("list-any", { tags: ["b"] }));

    assert.deepStrictEqual(lines, ["http://x", "http://y"]);
  });

  it("lists URLs with every tag and their tags in verbose mode", async () => {
    await seed({ "http://y": ["b"], "http://x": ["b", "a"] });
    const { lines, dispatcher } = setup();

    await dispatcher.dispatch(command("list-every", { verbose: true }));

    assert.deepStrictEqual(lines, ["http://x\ta b", "http://y\tb"]);
  });

  it("prints tag counts, least used first", async () => {
    await seed({ "http://x": ["a", "b"], "http://y": ["b"] });
    const { lines, dispatcher } = setup();

    await dispatcher.dispatch(command("tags"));

    assert.deepStrictEqual(lines, ["1\ta", "2\tb"]);
  });

  it("searches tags by pattern", async () => {
    await seed({
      "http://1": ["apple"],
      "http://2": ["banana"],
      "http://3": ["avocado"],
    });
    const { lines, dispatcher } = setup();

    await dispatcher.dispatch(command("search", { tags: ["^a"] }));

    assert.deepStrictEqual(lines, ["1\tapple", "1\tavocado"]);
  });

  it("requires a search pattern", async () => {
    const { dispatcher } = setup();

    await assert.rejects(dispatcher.dispatch(command("search")), UsageError);
  });

  it("imports a remote database without losing local tags", async () => {
    await seed({ "http://x": ["a", "b"], "http://y": ["b"] });
    const { dispatcher } = setup({
      "https://example.test/db": encode({ "http://x": ["c"] }),
    });

    await dispatcher.dispatch(
      command("import", { urls: ["https://example.test/db"] })
    );

    assert.deepStrictEqual(await storedRecord(), {
      "http://x": ["a", "b", "c"],
      "http://y": ["b"],
    });
  });

  it("keys existing files by their absolute path", async () => {
    await writeFile(path.join(dir, "notes.txt"), "");
    const { dispatcher } = setup();

    await dispatcher.dispatch(
      command("add", { urls: ["notes.txt"], tags: ["local"] })
    );

    assert.deepStrictEqual(await storedRecord(), {
      [path.join(dir, "notes.txt")]: ["local"],
    });
  });

  it("keeps file arguments as given without path substitution", async () => {
    await writeFile(path.join(dir, "notes.txt"), "");
    const { dispatcher } = setup();

    await dispatcher.dispatch(
      command("add", { urls: ["notes.txt"], tags: ["local"], noPathSubs: true })
    );

    assert.deepStrictEqual(await storedRecord(), { "notes.txt": ["local"] });
  });

  it("does not rewrite the database when listing", async () => {
    const raw = { "http://x": ["a", "a", "b"] };
    await seed(raw);
    const { dispatcher } = setup();

    await dispatcher.dispatch(command("list-any"));

    assert.deepStrictEqual(
      await readFile(config.databasePath),
      Buffer.from(encode(raw))
    );
  });

  it("rewrites a deduplicated database with the clean option", async () => {
    await seed({ "http://x": ["a", "a", "b"] });
    const { lines, dispatcher } = setup();

    await dispatcher.dispatch(command("list-any", { clean: true }));

    assert.deepStrictEqual(lines, ["http://x"]);
    assert.deepStrictEqual(
      await readFile(config.databasePath),
      Buffer.from(encode({ "http://x": ["a", "b"] }))
    );
  });

  it("reads from a remote database but does not write to it", async () => {
    const { diagnostics, dispatcher } = setup({
      "https://example.test/db": encode({ "http://x": ["a"] }),
    });

    await dispatcher.dispatch(
      command("add", {
        urls: ["http://y"],
        tags: ["b"],
        file: "https://example.test/db",
      })
    );

    assert.deepStrictEqual(warnings(diagnostics), [
      'Cannot write to remote database "https://example.test/db": changes were not saved.',
    ]);
  });

  it("renders results to a page and opens it", async () => {
    await seed({ "http://x": ["a", "b"], "http://y": ["b"] });
    const { lines, opened, dispatcher } = setup();

    await dispatcher.dispatch(command("list-any", { tags: ["a"], web: true }));

    assert.deepStrictEqual(lines, []);
    assert.deepStrictEqual(opened, [config.htmlPath]);
    const $ = cheerio.load(await readFile(config.htmlPath, "utf8"));
    assert.strictEqual($("h1").text(), "a");
    assert.strictEqual($("ol li").length, 1);
    assert.strictEqual($("ol li a").attr("href"), "http://x");
  });

  it("keeps every bookmark next to a URL named __proto__", async () => {
    const { lines, dispatcher } = setup();

    for (const url of ["http://x", "__proto__", "http://y"]) {
      await dispatcher.dispatch(command("add", { urls: [url], tags: ["a"] }));
    }
    await dispatcher.dispatch(command("list-any"));

    assert.deepStrictEqual(lines, ["__proto__", "http://x", "http://y"]);
  });

  it("imports the sources that load when another one fails", async () => {
    await seed({ "http://x": ["a"] });
    const missing = path.join(dir, "missing.db");
    const { diagnostics, dispatcher } = setup({
      "https://example.test/down": new NetworkError(
        "https://example.test/down",
        "connection refused"
      ),
      "https://example.test/db": encode({
        "http://x": ["c"],
        "http://y": ["d"],
      }),
    });

    await dispatcher.dispatch(
      command("import", {
        urls: ["https://example.test/down", missing, "https://example.test/db"],
      })
    );

    assert.deepStrictEqual(warnings(diagnostics), [
      'Cannot fetch "https://example.test/down": connection refused',
      `The file "${missing}" does not exist.`,
    ]);
    assert.deepStrictEqual(await storedRecord(), {
      "http://x": ["a", "c"],
      "http://y": ["d"],
    });
  });

  it("prints the results when the page cannot be written", async () => {
    config.htmlPath = path.join(dir, "no-such-dir", "results.html");
    await seed({ "http://x": ["a"] });
    const { diagnostics, lines, opened, dispatcher } = setup();

    await dispatcher.dispatch(command("list-any", { tags: ["a"], web: true }));

    assert.deepStrictEqual(opened, []);
    assert.deepStrictEqual(lines, ["http://x"]);
    assert.deepStrictEqual(warnings(diagnostics), [
      `Cannot write "${config.htmlPath}" (ENOENT): printing results instead.`,
    ]);
  });
});

describe("isMutating", () => {
  it("flags the actions that rewrite the database", () => {
    const actions: Action[] = [
      "add",
      "remove",
      "delete",
      "import",
      "list-any",
      "list-every",
      "tags",
      "search",
      "lookup",
    ];

    assert.deepStrictEqual(actions.filter(isMutating), [
      "add",
      "remove",
      "delete",
      "import",
    ]);
  });
});
