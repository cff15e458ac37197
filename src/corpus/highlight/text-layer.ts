import type { Region } from "./types.js";

/** One positioned string from a page's text content. */
export interface TextRun {
  str: string;
  x: number;
  y: number;
  width: number;
  height: number;
  hasEOL: boolean;
}

interface Glyph {
  run: number;
  offset: number;
}

interface Box {
  x0: number;
  x1: number;
  y: number;
  height: number;
}

function foldChar(ch: string): string {
  const lower = ch.toLowerCase();
  return lower.length === ch.length ? lower : ch;
}

export function foldText(text: string): string {
  let folded = "";
  for (const ch of text.replace(/\s+/g, " ").trim()) {
    folded += foldChar(ch);
  }
  return folded;
}

function sameLine(a: { y: number; height: number }, b: { y: number; height: number }): boolean {
  return Math.abs(a.y - b.y) < Math.max(a.height, b.height, 1) * 0.5;
}

/** Runs that sit next to each other on a line are part of the same word. */
function adjoins(prev: TextRun, next: TextRun): boolean {
  if (prev.hasEOL || !sameLine(prev, next)) return false;
  const gap = next.x - (prev.x + prev.width);
  const h = Math.max(prev.height, 1);
  return gap > -h * 0.5 && gap < h * 0.15;
}

/**
 * Searchable view of a page: lowercased text with whitespace collapsed, where
 * every character maps back to its run so matches can be turned into boxes.
 */
export class TextLayer {
  readonly text: string;
  private readonly glyphs: Array<Glyph | null>;

  constructor(private readonly runs: readonly TextRun[]) {
    let text = "";
    const glyphs: Array<Glyph | null> = [];
    const space = () => {
      if (text.length > 0 && !text.endsWith(" ")) {
        text += " ";
        glyphs.push(null);
      }
    };

    runs.forEach((run, index) => {
      const prev = runs[index - 1];
      if (prev && !adjoins(prev, run)) space();

      for (let offset = 0; offset < run.str.length; offset++) {
        const ch = run.str.charAt(offset);
        if (/\s/.test(ch)) {
          space();
          continue;
        }
        const folded = foldChar(ch);
        text += folded;
        for (let k = 0; k < folded.length; k++) glyphs.push({ run: index, offset });
      }
    });

    this.text = text;
    this.glyphs = glyphs;
  }

  /** Every non-overlapping match of `needle`, one region per line it covers. */
  search(needle: string): Region[][] {
    const folded = foldText(needle);
    if (!folded) return [];

    const matches: Region[][] = [];
    for (
      let at = this.text.indexOf(folded);
      at !== -1;
      at = this.text.indexOf(folded, at + folded.length)
    ) {
      const regions = this.regionsFor(at, at + folded.length);
      if (regions.length > 0) matches.push(regions);
    }
    return matches;
  }

  private regionsFor(start: number, end: number): Region[] {
    const spans = new Map<number, { first: number; last: number }>();
    for (const glyph of this.glyphs.slice(start, end)) {
      if (!glyph) continue;
      const span = spans.get(glyph.run);
      if (span) {
        span.first = Math.min(span.first, glyph.offset);
        span.last = Math.max(span.last, glyph.offset);
      } else {
        spans.set(glyph.run, { first: glyph.offset, last: glyph.offset });
      }
    }

    const lines: Box[] = [];
    for (const [index, { first, last }] of spans) {
      const run = this.runs[index];
      if (!run || run.str.length === 0) continue;
      const charWidth = run.width / run.str.length;
      const box: Box = {
        x0: run.x + charWidth * first,
        x1: run.x + charWidth * (last + 1),
        y: run.y,
        height: run.height,
      };

      const line = lines.find((l) => sameLine(l, box));
      if (line) {
        line.x0 = Math.min(line.x0, box.x0);
        line.x1 = Math.max(line.x1, box.x1);
        line.height = Math.max(line.height, box.height);
      } else {
        lines.push(box);
      }
    }

    return lines.map((line) => ({
      x: line.x0,
      y: line.y - line.height * 0.2,
      width: line.x1 - line.x0,
      height: line.height * 1.2,
    }));
  }
}
