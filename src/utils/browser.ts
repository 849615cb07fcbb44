import { spawn } from "child_process";
import * as cheerio from "cheerio";
import type { CommandResult } from "../commands/result";
import type { Diagnostics } from "./log";

export type BrowserOpener = (file: string) => Promise<void>;

const PAGE_SKELETON =
  '<!DOCTYPE html><html><head><meta charset="utf-8"><title></title></head>' +
  "<body><h1></h1><ol></ol></body></html>";

/**
 * Renders a result as a minimal page: the filters as heading, then one
 * list item per row.
 */
export function renderHtml(result: CommandResult): string {
  const $ = cheerio.load(PAGE_SKELETON);
  const list = $("ol");

  if (result.kind === "none") {
    return $.html();
  }

  $("title").text(result.heading);
  $("h1").text(result.heading);

  switch (result.kind) {
    case "urls":
      for (const row of result.rows) {
        const item = $("<li></li>");
        item.append($("<a></a>").attr("href", row.url).text(row.url));
        if (row.tags) {
          item.append(
            $('<span class="tags"></span>').text(` ${row.tags.join(", ")}`)
          );
        }
        list.append(item);
      }
      break;
    case "tag-counts":
      for (const row of result.rows) {
        list.append($("<li></li>").text(`${row.tag} (${row.count})`));
      }
      break;
    case "tags":
      for (const tag of result.rows) {
        list.append($("<li></li>").text(tag));
      }
      break;
  }

  return $.html();
}

export function createBrowserOpener(
  command: string | undefined,
  diagnostics: Diagnostics
): BrowserOpener {
  return (file) => {
    const [program, ...args] = (command ?? "").trim().split(/\s+/);
    if (!program) {
      diagnostics.warn(
        `No browser configured (set BROWSER). Results written to ${file}`
      );
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const child = spawn(program, [...args, file], {
        detached: true,
        stdio: "ignore",
      });
      child.once("spawn", () => {
        child.unref();
        resolve();
      });
      child.once("error", (error) => {
        diagnostics.warn(`Cannot start browser "${program}": ${error.message}`);
        resolve();
      });
    });
  };
}
