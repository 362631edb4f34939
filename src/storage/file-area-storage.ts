import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { AreaRecord, AreaStorage } from "../types/index.js";
import { StorageError } from "../errors.js";

const BOM = "\uFEFF";

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

/**
 * Keeps every area in a single JSON object keyed by slug.
 *
 * A missing file loads as an empty mapping. Files saved by editors that add a
 * UTF-8 byte-order mark are accepted.
 */
export class FileAreaStorage implements AreaStorage {
  constructor(private readonly path: string) {}

  async load(): Promise<Record<string, unknown>> {
    let text: string;
    try {
      text = await readFile(this.path, "utf-8");
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") return {};
      throw e;
    }

    if (text.startsWith(BOM)) text = text.slice(BOM.length);

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new StorageError(`${this.path} is not valid JSON: ${msg}`);
    }

    if (!isPlainObject(parsed)) {
      throw new StorageError(`${this.path} must contain a JSON object keyed by slug.`);
    }
    return parsed;
  }

  async save(records: Record<string, AreaRecord>): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, `${JSON.stringify(records, null, 2)}\n`, "utf-8");
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
