import { readFile, writeFile, mkdir, rename, rm } from "node:fs/promises";
import path from "node:path";
import type { ZodType } from "zod";
import { PersistenceError } from "./errors.js";

/**
 * Reads and validates a JSON file. Missing, unparsable and invalid files all
 * read as `null`.
 */
export async function readJsonFile<T>(
  filePath: string,
  schema: ZodType<T>,
): Promise<T | null> {
  let data: string;
  try {
    data = await readFile(filePath, "utf-8");
  } catch {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    return null;
  }

  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Writes to a sibling temp file and renames it over the target, so readers
 * see either the previous file or the new one.
 */
export async function writeJsonFileAtomic(
  filePath: string,
  value: unknown,
): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(tmpPath, JSON.stringify(value, null, 2), "utf-8");
    await rename(tmpPath, filePath);
  } catch (err) {
    await rm(tmpPath, { force: true, recursive: true });
    throw new PersistenceError(filePath, { cause: err });
  }
}
