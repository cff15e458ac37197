import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { CorpusSettings } from "./config.js";
import { ContentStore } from "./content-store.js";
import { initCorpus } from "./corpus.js";

describe("initCorpus", () => {
  let root: string;
  let settings: CorpusSettings;
  let logs: string[];

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "corpus-facade-"));
    settings = {
      documentsDir: path.join(root, "documents"),
      cacheDir: path.join(root, "cache"),
      indexPath: path.join(root, "index.json"),
      summarizer: "rule-based",
      apiKey: null,
      model: "test-model",
    };
    logs = [];
    await mkdir(settings.documentsDir);
    await writeFile(path.join(settings.documentsDir, "tax.txt"), "Tax rules changed in 2023. Tax rates rose.");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("indexes on start and answers queries", async () => {
    const corpus = await initCorpus(settings, (msg) => logs.push(msg));

    expect(logs).toContain("corpus ready: 1 document(s) (rule-based summaries)");
    expect(corpus.documentCount).toBe(1);
    expect(corpus.lastRun.processed).toEqual(["tax.txt"]);

    const [hit] = await corpus.query("tax");
    expect(hit?.filename).toBe("tax.txt");
    // two content hits plus two summary hits counted twice
    expect(hit?.relevanceScore).toBe(6);

    const pages = await corpus.searchPages("tax");
    expect(pages.map((p) => [p.filename, p.pageNumber])).toEqual([["tax.txt", 1]]);
  });

  it("picks up new documents on reindex", async () => {
    const corpus = await initCorpus(settings, (msg) => logs.push(msg));
    await writeFile(path.join(settings.documentsDir, "audit.txt"), "Audit notes.");

    const report = await corpus.reindex();

    expect(report.processed).toEqual(["audit.txt"]);
    expect(report.unchanged).toEqual(["tax.txt"]);
    expect(corpus.documentCount).toBe(2);
  });

  it("leaves stray annotation files out of page search", async () => {
    const corpus = await initCorpus(settings, (msg) => logs.push(msg));
    await new ContentStore(settings.cacheDir).saveAnnotations("ghost.txt", [
      { pageNumber: 1, summary: "Tax records of a removed file.", keywords: [], relations: [] },
    ]);

    const pages = await corpus.searchPages("tax");
    expect(pages.map((p) => p.filename)).toEqual(["tax.txt"]);
  });

  it("refuses sentence search without an API key", async () => {
    const corpus = await initCorpus(settings, (msg) => logs.push(msg));
    await expect(corpus.search("tax")).rejects.toThrow("Sentence search needs OPENROUTER_API_KEY");
  });

  it("hands back the input when highlighting finds nothing", async () => {
    const corpus = await initCorpus(settings, (msg) => logs.push(msg));
    const bytes = new Uint8Array([1, 2, 3]);
    expect(await corpus.highlight(bytes, [])).toBe(bytes);
  });
});
