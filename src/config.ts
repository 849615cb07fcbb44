import os from "os";
import path from "path";

export interface Config {
  databasePath: string;
  browser?: string;
  htmlPath: string;
  fetchTimeoutMs: number;
  debug: boolean;
}

export const DEFAULT_FETCH_TIMEOUT_MS = 10000;

type Env = Record<string, string | undefined>;

function parseTimeout(value: string | undefined): number {
  if (!value) {
    return DEFAULT_FETCH_TIMEOUT_MS;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return DEFAULT_FETCH_TIMEOUT_MS;
  }
  return parsed;
}

/**
 * Builds the runtime configuration from environment variables.
 *
 * Only the entry point calls this with `process.env`; everything below it
 * receives the resulting object.
 */
export function loadConfig(env: Env): Config {
  const home = env.HOME || os.homedir();
  const debugFlag = env.BOOKMARK_DEBUG?.toLowerCase();

  return {
    databasePath: env.BOOKMARK_FILE || path.join(home, ".bookmarks"),
    browser: env.BROWSER || undefined,
    htmlPath:
      env.BOOKMARK_HTML_FILE || path.join(os.tmpdir(), "bookmarks.html"),
    fetchTimeoutMs: parseTimeout(env.BOOKMARK_FETCH_TIMEOUT),
    debug: debugFlag === "1" || debugFlag === "true",
  };
}
