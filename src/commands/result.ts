import type { TagCount, UrlRow } from "../bookmarks/query";

export type CommandResult =
  | { kind: "urls"; heading: string; rows: UrlRow[] }
  | { kind: "tag-counts"; heading: string; rows: TagCount[] }
  | { kind: "tags"; heading: string; rows: string[] }
  | { kind: "none" };

/** Plain-text form written to stdout, one line per row. */
export function formatLines(result: CommandResult): string[] {
  switch (result.kind) {
    case "urls":
      return result.rows.map((row) =>
        row.tags ? `${row.url}\t${row.tags.join(" ")}` : row.url
      );
    case "tag-counts":
      return result.rows.map((row) => `${row.count}\t${row.tag}`);
    case "tags":
      return result.rows;
    case "none":
      return [];
  }
}
