import { readdir, rm } from "node:fs/promises";
import { createHash } from "node:crypto";
import path from "node:path";
import { readJsonFile, writeJsonFileAtomic } from "./json-file.js";
import { AnnotationFileSchema, ContentCacheSchema } from "./schemas.js";
import type { Annotation, AnnotationFile, ContentCache, Page } from "./types.js";

const ANNOTATION_SUFFIX = "_annotations.json";

export function annotationId(filename: string): string {
  return createHash("sha256").update(filename).digest("hex");
}

/** Per-document page text and annotation files under one cache directory. */
export class ContentStore {
  constructor(readonly cacheDir: string) {}

  contentPath(filename: string): string {
    return path.join(this.cacheDir, `${filename}_content.json`);
  }

  annotationPath(filename: string): string {
    return path.join(this.cacheDir, `${annotationId(filename)}${ANNOTATION_SUFFIX}`);
  }

  async saveContent(
    filename: string,
    pages: Page[],
    fullContent: string,
  ): Promise<ContentCache> {
    const cache: ContentCache = {
      filename,
      pages,
      fullContent,
      cachedAt: new Date().toISOString(),
    };
    await writeJsonFileAtomic(this.contentPath(filename), cache);
    return cache;
  }

  async loadContent(filename: string): Promise<ContentCache | null> {
    return readJsonFile(this.contentPath(filename), ContentCacheSchema);
  }

  async saveAnnotations(filename: string, summaries: Annotation[]): Promise<string> {
    const filePath = this.annotationPath(filename);
    const data: AnnotationFile = { filename, summaries };
    await writeJsonFileAtomic(filePath, data);
    return filePath;
  }

  async loadAnnotations(filename: string): Promise<AnnotationFile | null> {
    return readJsonFile(this.annotationPath(filename), AnnotationFileSchema);
  }

  async loadAllAnnotations(): Promise<AnnotationFile[]> {
    let entries: string[];
    try {
      entries = await readdir(this.cacheDir);
    } catch {
      return [];
    }

    const files: AnnotationFile[] = [];
    for (const entry of entries.filter((f) => f.endsWith(ANNOTATION_SUFFIX))) {
      const data = await readJsonFile(path.join(this.cacheDir, entry), AnnotationFileSchema);
      if (data) files.push(data);
    }
    return files;
  }

  async remove(filename: string): Promise<void> {
    await rm(this.contentPath(filename), { force: true });
    await rm(this.annotationPath(filename), { force: true });
  }
}
