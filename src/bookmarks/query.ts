import { NotFoundError, PatternError } from "../utils/errors";
import type { Database, TagSet } from "./tag-set";

export interface UrlRow {
  url: string;
  // Present in verbose mode only
  tags?: string[];
}

export interface TagCount {
  tag: string;
  count: number;
}

export interface ListOptions {
  verbose?: boolean;
}

function toRow(url: string, tags: TagSet, verbose: boolean): UrlRow {
  return verbose ? { url, tags: [...tags].sort() } : { url };
}

/**
 * Lists the URLs sharing at least one tag with `tags`, or every URL when
 * no tag is requested.
 */
export function listAny(
  database: Database,
  tags: Iterable<string>,
  { verbose = false }: ListOptions = {}
): UrlRow[] {
  const wanted = new Set(tags);
  const rows: UrlRow[] = [];

  for (const [url, urlTags] of database) {
    if (wanted.size === 0 || [...wanted].some((tag) => urlTags.has(tag))) {
      rows.push(toRow(url, urlTags, verbose));
    }
  }
  return rows;
}

/**
 * Lists the URLs carrying every tag of `tags`. An empty request is a
 * subset of any tag set, so it matches every URL.
 */
export function listEvery(
  database: Database,
  tags: Iterable<string>,
  { verbose = false }: ListOptions = {}
): UrlRow[] {
  const wanted = [...new Set(tags)];
  const rows: UrlRow[] = [];

  for (const [url, urlTags] of database) {
    if (wanted.every((tag) => urlTags.has(tag))) {
      rows.push(toRow(url, urlTags, verbose));
    }
  }
  return rows;
}

function countTags(
  database: Database,
  accept: (tag: string) => boolean
): TagCount[] {
  const counts = new Map<string, number>();
  for (const tags of database.values()) {
    for (const tag of tags) {
      if (accept(tag)) {
        counts.set(tag, (counts.get(tag) ?? 0) + 1);
      }
    }
  }
  return [...counts].map(([tag, count]) => ({ tag, count }));
}

/** Number of URLs carrying each distinct tag. */
export function tagFrequency(database: Database): TagCount[] {
  return countTags(database, () => true);
}

/**
 * Same counts as {@link tagFrequency}, restricted to tags in which
 * `pattern` matches somewhere.
 *
 * @throws PatternError when `pattern` is not a valid regular expression
 */
export function searchTag(database: Database, pattern: string): TagCount[] {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch (error) {
    throw new PatternError(
      pattern,
      error instanceof Error ? error.message : String(error)
    );
  }
  return countTags(database, (tag) => regex.test(tag));
}

export function lookup(database: Database, url: string): string[] {
  const tags = database.get(url);
  if (!tags) {
    throw new NotFoundError(url);
  }
  return [...tags].sort();
}

// "all" (any case) stands for every tag in the database
export function expandAllTag(database: Database, tags: string[]): string[] {
  if (!tags.some((tag) => tag.toLowerCase() === "all")) {
    return tags;
  }
  const every = new Set<string>();
  for (const urlTags of database.values()) {
    for (const tag of urlTags) {
      every.add(tag);
    }
  }
  return [...every].sort();
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortUrlRows(rows: UrlRow[]): UrlRow[] {
  return [...rows].sort((a, b) => compareText(a.url, b.url));
}

// Least used first, then by name
export function sortTagCounts(counts: TagCount[]): TagCount[] {
  return [...counts].sort(
    (a, b) => a.count - b.count || compareText(a.tag, b.tag)
  );
}
