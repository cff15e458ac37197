import { readJsonFile, writeJsonFileAtomic } from "./json-file.js";
import { IndexTableSchema } from "./schemas.js";
import type { IndexTable } from "./types.js";

/**
 * The compact per-document metadata table. One indexing run loads it once and
 * replaces it once; two runs against the same file must be serialized by the
 * caller.
 */
export class IndexStore {
  constructor(readonly indexPath: string) {}

  async load(): Promise<IndexTable> {
    return (await readJsonFile(this.indexPath, IndexTableSchema)) ?? {};
  }

  async replace(table: IndexTable): Promise<void> {
    await writeJsonFileAtomic(this.indexPath, table);
  }
}
