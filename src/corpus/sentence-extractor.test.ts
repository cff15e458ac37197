import { afterEach, describe, expect, it, vi } from "vitest";
import {
  SentenceExtractor,
  buildSentencePrompt,
  parseNumberedList,
  splitIntoChunks,
} from "./sentence-extractor.js";

describe("splitIntoChunks", () => {
  it("groups words into fixed-size chunks", () => {
    expect(splitIntoChunks("a b  c\nd e", 2)).toEqual(["a b", "c d", "e"]);
    expect(splitIntoChunks("   ", 2)).toEqual([]);
  });
});

describe("parseNumberedList", () => {
  it("keeps numbered lines from 1 to 10", () => {
    const reply = [
      "Here you go:",
      "1. Revenue grew 12% in 2023.",
      "  2.Costs stayed flat.",
      "11. Too far down the list.",
      "0. Not a real item.",
      "- bullet",
    ].join("\n");

    expect(parseNumberedList(reply)).toEqual(["Revenue grew 12% in 2023.", "Costs stayed flat."]);
  });
});

describe("buildSentencePrompt", () => {
  it("names the query and the sentence count and includes every chunk", () => {
    const prompt = buildSentencePrompt("revenue", ["first chunk", "second chunk"], 5);

    expect(prompt).toContain("The user is searching for: 'revenue'.");
    expect(prompt).toContain("up to 5 of the most relevant sentences");
    expect(prompt.endsWith("Text:\n---\nfirst chunk\n\nsecond chunk\n---")).toBe(true);
  });
});

describe("SentenceExtractor", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("rejects an empty chunk list", async () => {
    const extractor = new SentenceExtractor({ apiKey: "test-key", model: "test-model" });
    await expect(extractor.extract("revenue", [])).rejects.toThrow("Text chunks cannot be empty");
  });

  it("returns the quoted sentences from the reply", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(
        JSON.stringify({ choices: [{ message: { content: "1. Revenue grew.\n2. \n3. Costs fell." } }] }),
        { status: 200, headers: { "Content-Type": "application/json" } },
      ),
    );
    vi.stubGlobal("fetch", fetchMock);
    const extractor = new SentenceExtractor({ apiKey: "test-key", model: "test-model" });

    await expect(extractor.extract("revenue", ["Revenue grew. Costs fell."])).resolves.toEqual([
      "Revenue grew.",
      "Costs fell.",
    ]);
  });

  it("propagates API errors", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("bad key", { status: 401 })));
    const extractor = new SentenceExtractor({ apiKey: "test-key", model: "test-model" });

    await expect(extractor.extract("revenue", ["text"])).rejects.toThrow(
      "Chat API error (401): bad key",
    );
  });
});
