import { createReadStream } from "node:fs";
import { readdir } from "node:fs/promises";
import { createHash } from "node:crypto";
import path from "node:path";
import { CORPUS_CONFIG } from "./config.js";
import type { IndexTable } from "./types.js";

/** Digest recorded when a file cannot be read; never equal to a stored hash. */
export const UNKNOWN_HASH = "unknown";

export interface ScannedFile {
  filename: string;
  filePath: string;
  hash: string;
}

export interface ScanResult {
  newOrChanged: ScannedFile[];
  unchanged: ScannedFile[];
  deleted: string[];
}

export async function hashFile(
  filePath: string,
  chunkSize: number = CORPUS_CONFIG.hashChunkSize,
): Promise<string> {
  const hash = createHash("sha256");
  try {
    const stream = createReadStream(filePath, { highWaterMark: chunkSize });
    for await (const chunk of stream) {
      hash.update(chunk);
    }
  } catch {
    return UNKNOWN_HASH;
  }
  return hash.digest("hex");
}

export async function listDocuments(documentsDir: string): Promise<string[]> {
  const allowed = new Set<string>(CORPUS_CONFIG.extensions);
  let entries: string[];
  try {
    entries = await readdir(documentsDir);
  } catch {
    // documents dir doesn't exist yet
    return [];
  }

  return entries
    .filter((f) => allowed.has(path.extname(f).toLowerCase()))
    .sort()
    .map((f) => path.join(documentsDir, f));
}

export async function scanDocuments(
  documentsDir: string,
  table: IndexTable,
): Promise<ScanResult> {
  const result: ScanResult = { newOrChanged: [], unchanged: [], deleted: [] };
  const filePaths = await listDocuments(documentsDir);
  const present = new Set(filePaths.map((f) => path.basename(f)));

  for (const filename of Object.keys(table)) {
    if (!present.has(filename)) {
      result.deleted.push(filename);
    }
  }

  for (const filePath of filePaths) {
    const filename = path.basename(filePath);
    const hash = await hashFile(filePath);
    const entry = table[filename];

    if (entry && hash !== UNKNOWN_HASH && entry.contentHash === hash) {
      result.unchanged.push({ filename, filePath, hash });
    } else {
      result.newOrChanged.push({ filename, filePath, hash });
    }
  }

  return result;
}
