import { Command } from "commander";
import type { Action, ParsedCommand } from "./commands/dispatch";
import { UsageError } from "./utils/errors";

type CliOptions = {
  remove?: boolean;
  delete?: boolean;
  listAny?: boolean;
  listEvery?: boolean;
  tags?: boolean;
  search?: boolean;
  import?: boolean;
  file?: string;
  verbose?: boolean;
  web?: boolean;
  pathSubs: boolean;
  clean?: boolean;
};

const ACTION_FLAGS = [
  ["remove", "remove"],
  ["delete", "delete"],
  ["listAny", "list-any"],
  ["listEvery", "list-every"],
  ["tags", "tags"],
  ["search", "search"],
  ["import", "import"],
] as const satisfies ReadonlyArray<readonly [keyof CliOptions, Action]>;

export function createProgram(): Command {
  return new Command()
    .name("bookmark")
    .description("Simple command line browser independent bookmark utility")
    .usage(
      "[options] [-r] URL TAG...\n" +
        "       bookmark [options] -d URL...\n" +
        "       bookmark [options] -l|-L [TAG...]\n" +
        "       bookmark [options] -t\n" +
        "       bookmark [options] -s PATTERN\n" +
        "       bookmark [options] -i SOURCE...\n" +
        "       bookmark [options] URL"
    )
    .argument(
      "[args...]",
      "URL and tags, tags, pattern or sources depending on the action"
    )
    .option("-r, --remove", "remove TAG from URL")
    .option("-d, --delete", "delete URL from the database")
    .option(
      "-l, --list-any",
      "list the URLs with any of TAG ('all' matches every tag)"
    )
    .option("-L, --list-every", "list the URLs with every TAG")
    .option("-t, --tags", "list the tags with the number of URLs using them")
    .option("-s, --search", "list the tags matching PATTERN")
    .option("-i, --import", "merge the databases at SOURCE (paths or URLs)")
    .option("-f, --file <file>", "use FILE (path or URL) as the database")
    .option("-v, --verbose", "print the tags along with the URLs")
    .option("-w, --web", "show the results in a browser")
    .option(
      "--no-path-subs",
      "do not replace existing file paths by their absolute path"
    )
    .option("--clean", "deduplicate the tags of every URL in the database")
    .exitOverride();
}

function requireArgs(args: string[], count: number, usage: string): void {
  if (args.length < count) {
    throw new UsageError(`Usage: bookmark ${usage}`);
  }
}

function selectAction(options: CliOptions, args: string[]): Action {
  const selected = ACTION_FLAGS.filter(([flag]) => options[flag] === true);
  if (selected.length > 1) {
    throw new UsageError(
      `Options ${selected
        .map(([, action]) => `--${action}`)
        .join(", ")} cannot be combined`
    );
  }
  const [only] = selected;
  if (only) {
    return only[1];
  }
  return args.length > 1 ? "add" : "lookup";
}

/**
 * Turns command-line arguments (without the node and script entries) into
 * a command for the dispatcher.
 */
export function parseCommand(argv: string[]): ParsedCommand {
  const program = createProgram();
  program.parse(argv, { from: "user" });

  const options = program.opts<CliOptions>();
  const args = program.args;
  const action = selectAction(options, args);

  let urls: string[] = [];
  let tags: string[] = [];

  switch (action) {
    case "add":
    case "remove":
      requireArgs(args, 2, `${action === "remove" ? "-r " : ""}URL TAG...`);
      urls = args.slice(0, 1);
      tags = args.slice(1);
      break;
    case "delete":
      requireArgs(args, 1, "-d URL...");
      urls = args;
      break;
    case "import":
      requireArgs(args, 1, "-i SOURCE...");
      urls = args;
      break;
    case "search":
      requireArgs(args, 1, "-s PATTERN");
      tags = args.slice(0, 1);
      break;
    case "list-any":
    case "list-every":
      tags = args;
      break;
    case "tags":
      break;
    case "lookup":
      requireArgs(args, 1, "URL");
      urls = args;
      break;
  }

  return {
    action,
    urls,
    tags,
    options: {
      verbose: options.verbose === true,
      web: options.web === true,
      noPathSubs: !options.pathSubs,
      clean: options.clean === true,
      file: options.file,
    },
  };
}
