import { describe, expect, it } from "vitest";
import { TextLayer, foldText, type TextRun } from "./text-layer.js";

function run(str: string, x: number, y: number, width: number, hasEOL = false): TextRun {
  return { str, x, y, width, height: 10, hasEOL };
}

describe("foldText", () => {
  it("lowercases and collapses whitespace", () => {
    expect(foldText("  Revenue\n  GREW\t12% ")).toBe("revenue grew 12%");
  });
});

describe("TextLayer", () => {
  it("joins runs that touch into one word", () => {
    const layer = new TextLayer([run("Reve", 0, 100, 40), run("nue", 40, 100, 30)]);
    expect(layer.text).toBe("revenue");
  });

  it("separates runs on different lines or with a gap", () => {
    const layer = new TextLayer([
      run("first", 0, 100, 50),
      run("line", 60, 100, 40, true),
      run("second", 0, 80, 60),
    ]);
    expect(layer.text).toBe("first line second");
  });

  it("maps a match on one line to one region", () => {
    const layer = new TextLayer([run("Revenue grew 12% in 2023.", 50, 700, 150)]);
    const matches = layer.search("revenue   GREW 12%");

    expect(matches).toHaveLength(1);
    const [region] = matches[0] ?? [];
    expect(region?.x).toBe(50);
    expect(region?.width).toBe(96);
    expect(region?.y).toBeCloseTo(698);
    expect(region?.height).toBeCloseTo(12);
  });

  it("maps a match across two lines to one region per line", () => {
    const layer = new TextLayer([
      run("net income rose", 0, 100, 150, true),
      run("sharply this year", 0, 80, 170),
    ]);
    const matches = layer.search("income rose sharply");

    expect(matches).toHaveLength(1);
    expect(matches[0]?.map((r) => r.x)).toEqual([40, 0]);
  });

  it("finds every non-overlapping occurrence", () => {
    const layer = new TextLayer([run("tax and tax and TAX", 0, 100, 190)]);
    expect(layer.search("tax")).toHaveLength(3);
    expect(layer.search("absent")).toEqual([]);
    expect(layer.search("   ")).toEqual([]);
  });
});
