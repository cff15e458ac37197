import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { PDFDocument, StandardFonts } from "pdf-lib";
import { ContentStore } from "./content-store.js";
import { IndexStore } from "./index-store.js";
import { indexDocuments } from "./pipeline.js";
import { searchCorpus, type SentenceSource } from "./search.js";
import { RuleBasedSummarizer } from "./summarization/rule-based.js";
import type { IndexTable } from "./types.js";

async function writePdf(filePath: string, line: string): Promise<void> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);
  doc.addPage([400, 300]).drawText(line, { x: 50, y: 200, size: 12, font });
  await writeFile(filePath, await doc.save());
}

/** Quotes the first sentence of whatever it is given. */
const firstSentence: SentenceSource = {
  async extract(_query, chunks) {
    const sentence = /[^.]+\./.exec(chunks.join(" "))?.[0]?.trim();
    return sentence ? [sentence] : [];
  },
};

describe("searchCorpus", () => {
  let root: string;
  let contentStore: ContentStore;
  let table: IndexTable;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "corpus-search-"));
    const documentsDir = path.join(root, "documents");
    await mkdir(documentsDir);
    await writePdf(path.join(documentsDir, "report.pdf"), "Revenue grew 12% in 2023.");
    await writeFile(path.join(documentsDir, "notes.txt"), "Revenue notes for the team.");
    await writeFile(path.join(documentsDir, "other.txt"), "Nothing relevant lives here.");

    contentStore = new ContentStore(path.join(root, "cache"));
    const report = await indexDocuments({
      documentsDir,
      indexStore: new IndexStore(path.join(root, "index.json")),
      contentStore,
      summarizer: new RuleBasedSummarizer(),
    });
    table = report.table;
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("quotes sentences for matching documents and highlights PDFs", async () => {
    const results = await searchCorpus("revenue", { table, contentStore, sentences: firstSentence });
    const byName = new Map(results.map((r) => [r.filename, r]));

    expect([...byName.keys()].sort()).toEqual(["notes.txt", "report.pdf"]);

    const notes = byName.get("notes.txt");
    expect(notes?.sentences).toEqual(["Revenue notes for the team."]);
    expect(notes?.highlighted).toBeNull();
    expect(notes?.pageSummaries).toEqual(["Revenue notes for the team."]);

    const pdf = byName.get("report.pdf");
    expect(pdf?.highlighted).toBeInstanceOf(Uint8Array);
    expect(pdf?.previews).toEqual([]);
  });

  it("returns nothing when no document matches", async () => {
    const extract = vi.fn();
    const results = await searchCorpus("zebra", {
      table,
      contentStore,
      sentences: { extract },
    });

    expect(results).toEqual([]);
    expect(extract).not.toHaveBeenCalled();
  });

  it("leaves out documents without sentences", async () => {
    const none: SentenceSource = { extract: async () => [] };
    expect(await searchCorpus("revenue", { table, contentStore, sentences: none })).toEqual([]);
  });

  it("logs and skips documents whose sentence lookup fails", async () => {
    const log = vi.fn();
    const picky: SentenceSource = {
      async extract(query, chunks, topK) {
        if (chunks.join(" ").includes("notes")) throw new Error("rate limited");
        return firstSentence.extract(query, chunks, topK);
      },
    };

    const results = await searchCorpus("revenue", { table, contentStore, sentences: picky, log });

    expect(results.map((r) => r.filename)).toEqual(["report.pdf"]);
    expect(log).toHaveBeenCalledWith("corpus: search in notes.txt failed: rate limited");
  });
});
