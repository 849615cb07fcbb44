import { decode, encode } from "@msgpack/msgpack";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import {
  DecodeError,
  NetworkError,
  PermissionError,
  errorCode,
  isPermissionDenied,
} from "../utils/errors";
import type { Diagnostics } from "../utils/log";
import { isRemote, type Transport } from "../utils/transport";
import { add, type Database } from "./tag-set";

// Reads and writes of the database file itself
export interface DatabaseFiles {
  readFile(file: string): Promise<Uint8Array>;
  writeFile(file: string, data: Uint8Array): Promise<void>;
}

export const nodeFiles: DatabaseFiles = {
  readFile: (file) => readFile(file),
  writeFile: (file, data) => writeFile(file, data),
};

export interface StoreContext {
  diagnostics: Diagnostics;
  transport: Transport;
  files?: DatabaseFiles;
  // Where remote payloads are staged; defaults to the OS temp directory
  tempDir?: string;
}

export interface LoadOptions {
  // Write an empty database when the local file is missing
  create?: boolean;
}

function isStringArray(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((item) => typeof item === "string")
  );
}

export function encodeDatabase(database: Database): Uint8Array {
  return encode(
    new Map([...database].map(([url, tags]) => [url, [...tags].sort()]))
  );
}

/**
 * Decodes a MessagePack map of URL to tag list. An empty payload is an
 * empty database. Entries with an empty tag list are kept as they are.
 */
export function decodeDatabase(bytes: Uint8Array, source: string): Database {
  if (bytes.length === 0) {
    return new Map();
  }

  // Decoding into a Map keeps keys such as "__proto__" ordinary
  let raw: unknown;
  try {
    raw = decode(bytes, { useMap: true });
  } catch (error) {
    throw new DecodeError(
      source,
      error instanceof Error ? error.message : String(error)
    );
  }

  if (!(raw instanceof Map)) {
    throw new DecodeError(source, "expected a map of URL to tags");
  }

  const database: Database = new Map();
  const entries: [unknown, unknown][] = [...raw];
  for (const [url, tags] of entries) {
    if (typeof url !== "string") {
      throw new DecodeError(source, `key ${String(url)} is not a URL string`);
    }
    if (!isStringArray(tags)) {
      throw new DecodeError(
        source,
        `tags of "${url}" are not a list of strings`
      );
    }
    database.set(url, new Set(tags));
  }
  return database;
}

function decodeOrEmpty(
  bytes: Uint8Array,
  source: string,
  context: StoreContext
): Database {
  try {
    return decodeDatabase(bytes, source);
  } catch (error) {
    if (error instanceof DecodeError) {
      context.diagnostics.warn(error.message);
      return new Map();
    }
    throw error;
  }
}

async function loadLocal(
  file: string,
  context: StoreContext,
  create: boolean
): Promise<Database> {
  const files = context.files ?? nodeFiles;

  let bytes: Uint8Array;
  try {
    bytes = await files.readFile(file);
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      if (!create) {
        context.diagnostics.warn(`The file "${file}" does not exist.`);
      } else if (await save(new Map(), file, context)) {
        context.diagnostics.warn(
          `The file "${file}" does not exist: creating it.`
        );
      }
      return new Map();
    }
    if (isPermissionDenied(error)) {
      throw new PermissionError(file, "read");
    }
    throw error;
  }

  context.diagnostics.debug(`[STORE] Read ${bytes.length} bytes from ${file}`);
  return decodeOrEmpty(bytes, file, context);
}

/**
 * Downloads a remote database, stages it in a temporary file and loads it.
 * The staging directory is removed whatever happens.
 */
export async function fetchAndLoad(
  locator: string,
  context: StoreContext
): Promise<Database> {
  const stagingDir = await mkdtemp(
    path.join(context.tempDir ?? os.tmpdir(), "bookmark-")
  );

  try {
    context.diagnostics.debug(`[FETCH] Downloading ${locator}`);
    let payload: Uint8Array;
    try {
      payload = await context.transport.fetch(locator);
    } catch (error) {
      if (error instanceof NetworkError) {
        context.diagnostics.warn(error.message);
        return new Map();
      }
      throw error;
    }

    const staged = path.join(stagingDir, "database");
    await writeFile(staged, payload);
    context.diagnostics.debug(
      `[FETCH] Staged ${payload.length} bytes in ${staged}`
    );

    return decodeOrEmpty(await readFile(staged), locator, context);
  } finally {
    await rm(stagingDir, { recursive: true, force: true });
  }
}

export async function load(
  source: string,
  context: StoreContext,
  { create = false }: LoadOptions = {}
): Promise<Database> {
  if (isRemote(source)) {
    return fetchAndLoad(source, context);
  }
  return loadLocal(source, context, create);
}

/**
 * Overwrites `destination` with the whole database. Returns whether
 * anything was written: a missing parent directory or a remote
 * destination is reported and skipped.
 *
 * @throws PermissionError when the file cannot be written
 */
export async function save(
  database: Database,
  destination: string,
  context: StoreContext
): Promise<boolean> {
  if (isRemote(destination)) {
    context.diagnostics.warn(
      `Cannot write to remote database "${destination}": changes were not saved.`
    );
    return false;
  }

  const files = context.files ?? nodeFiles;
  try {
    await files.writeFile(destination, encodeDatabase(database));
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      context.diagnostics.warn(`Cannot write "${destination}": invalid path.`);
      return false;
    }
    if (isPermissionDenied(error)) {
      throw new PermissionError(destination, "write");
    }
    throw error;
  }

  context.diagnostics.debug(
    `[STORE] Saved ${database.size} bookmarks to ${destination}`
  );
  return true;
}

/** Unions every bookmark of every source into `database`. */
export async function mergeFrom(
  database: Database,
  sources: string[],
  context: StoreContext
): Promise<void> {
  for (const source of sources) {
    const loaded = await load(source, context);
    context.diagnostics.debug(
      `[STORE] Importing ${loaded.size} bookmarks from ${source}`
    );
    for (const [url, tags] of loaded) {
      add(database, url, tags);
    }
  }
}
