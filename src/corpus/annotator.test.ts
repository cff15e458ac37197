import { describe, it, expect } from "vitest";
import { annotatePage, extractKeywords, extractRelations, isStopWord } from "./annotator.js";

describe("extractKeywords", () => {
  it("ranks single words by frequency, then appends two-word terms", () => {
    const text =
      "Revenue increased by 25 percent in 2023. Revenue growth was strong. " +
      "The revenue team reviewed quarterly revenue figures.";

    expect(extractKeywords(text)).toEqual([
      "revenue",
      "increased",
      "percent",
      "2023",
      "growth",
      "strong",
      "team",
      "reviewed",
      "quarterly",
      "figures",
      "revenue increased",
      "revenue growth",
      "revenue team",
      "team reviewed",
      "reviewed quarterly",
      "quarterly revenue",
      "revenue figures",
    ]);
  });

  it("never returns stop words, short tokens or more than 20 entries", () => {
    const words = Array.from({ length: 60 }, (_, i) => `term${String.fromCharCode(97 + (i % 26))}${i}`);
    const text = `${words.join(" ")}. The cat and the dog sat on a mat with this page.`;

    const keywords = extractKeywords(text);
    expect(keywords.length).toBeLessThanOrEqual(20);
    for (const keyword of keywords) {
      const parts = keyword.split(" ");
      for (const part of parts) expect(isStopWord(part)).toBe(false);
      if (parts.length === 1) expect(keyword.length).toBeGreaterThanOrEqual(4);
    }
  });

  it("returns nothing for text without usable words", () => {
    expect(extractKeywords("a an the of to 12")).toEqual([]);
  });
});

describe("extractRelations", () => {
  it("collects matches across the pattern families", () => {
    const text = "Sales increased by 15 percent after the launch. Higher prices lead to lower demand.";
    expect(extractRelations(text)).toEqual([
      "increased by 15 percent",
      "prices lead to lower",
      "after the launch",
    ]);
  });

  it("keeps entries between 10 and 150 characters and at most 15 of them", () => {
    const sentences = Array.from(
      { length: 30 },
      (_, i) => `Output ${i} increased by ${i + 10} percent when demand ${i} leads to growth ${i}.`,
    );
    const relations = extractRelations(sentences.join(" ") + " During " + "x".repeat(200) + " end");

    expect(relations.length).toBeLessThanOrEqual(15);
    for (const relation of relations) {
      expect(relation.length).toBeGreaterThan(10);
      expect(relation.length).toBeLessThan(150);
    }
    expect(new Set(relations).size).toBe(relations.length);
  });
});

describe("annotatePage", () => {
  it("carries the page number and summary", () => {
    const annotation = annotatePage({
      pageNumber: 3,
      content: "Quarterly revenue rose. Revenue matters.",
      summary: "Revenue rose.",
      wordCount: 5,
    });

    expect(annotation.pageNumber).toBe(3);
    expect(annotation.summary).toBe("Revenue rose.");
    expect(annotation.keywords[0]).toBe("revenue");
    expect(annotation.relations).toEqual([]);
  });
});
