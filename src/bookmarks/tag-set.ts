export type TagSet = Set<string>;

/** URL (or absolute file path) to the tags attached to it. */
export type Database = Map<string, TagSet>;

export function createDatabase(
  entries: Iterable<readonly [string, Iterable<string>]> = []
): Database {
  const database: Database = new Map();
  for (const [url, tags] of entries) {
    add(database, url, tags);
  }
  return database;
}

/**
 * Unions `tags` into the tags of `url`. Existing tags are never removed.
 */
export function add(
  database: Database,
  url: string,
  tags: Iterable<string>
): void {
  const current = database.get(url) ?? new Set<string>();
  for (const tag of tags) {
    current.add(tag);
  }
  if (current.size > 0) {
    database.set(url, current);
  }
}

/**
 * Removes `tags` from `url`. A URL left without tags is dropped from the
 * database. Unknown URLs are ignored.
 */
export function remove(
  database: Database,
  url: string,
  tags: Iterable<string>
): void {
  const current = database.get(url);
  if (!current) {
    return;
  }
  for (const tag of tags) {
    current.delete(tag);
  }
  if (current.size === 0) {
    database.delete(url);
  }
}

export function deleteUrl(database: Database, url: string): void {
  database.delete(url);
}

/** Plain object form, tags sorted. Used for encoding and assertions. */
export function toRecord(database: Database): Record<string, string[]> {
  return Object.fromEntries(
    [...database].map(([url, tags]) => [url, [...tags].sort()])
  );
}
