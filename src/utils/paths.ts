import { existsSync } from "fs";
import path from "path";

// Arguments naming an existing file or directory are keyed by absolute path
export function substitutePath(
  url: string,
  cwd: string = process.cwd()
): string {
  if (!url) {
    return url;
  }
  const candidate = path.resolve(cwd, url);
  return existsSync(candidate) ? candidate : url;
}
