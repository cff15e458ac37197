import type { Outcome } from "../types.js";
import type { MatchStrategy, Region, RenderedPage } from "./types.js";

const PAGE_MARKER = /--- Page \d+ ---/g;
const WINDOW_WORDS = 8;
const WINDOW_STEP = 5;
const MIN_WINDOW_CHARS = 20;
const MIN_WINDOWED_SPAN_WORDS = 5;

function found(regions: Region[], what: string): Outcome<Region[]> {
  return regions.length > 0 ? { ok: true, value: regions } : { ok: false, reason: `${what} not found` };
}

export function normalizeSpan(span: string): string {
  return span.replace(/\s+/g, " ").trim();
}

export function stripPageMarkers(span: string): string {
  return normalizeSpan(span.replace(PAGE_MARKER, ""));
}

/** Overlapping 8-word windows, stepping 5 words, skipping short ones. */
export function spanWindows(span: string): string[] {
  const words = span.split(" ").filter(Boolean);
  const windows: string[] = [];
  for (let i = 0; i < words.length; i += WINDOW_STEP) {
    const window = words.slice(i, i + WINDOW_WORDS).join(" ");
    if (window.length > MIN_WINDOW_CHARS) windows.push(window);
  }
  return windows;
}

export const exactMatch: MatchStrategy = {
  name: "exact",
  locate(page: RenderedPage, span: string) {
    return found(page.search(span), "span");
  },
};

export const withoutPageMarkers: MatchStrategy = {
  name: "without-page-markers",
  locate(page: RenderedPage, span: string) {
    const cleaned = stripPageMarkers(span);
    if (!cleaned || cleaned === span) {
      return { ok: false, reason: "no page markers to strip" };
    }
    return found(page.search(cleaned), "cleaned span");
  },
};

export const slidingWindows: MatchStrategy = {
  name: "sliding-windows",
  locate(page: RenderedPage, span: string) {
    if (span.split(" ").length <= MIN_WINDOWED_SPAN_WORDS) {
      return { ok: false, reason: "span too short for windows" };
    }
    return found(spanWindows(span).flatMap((w) => page.search(w)), "every window");
  },
};

export const DEFAULT_STRATEGIES: readonly MatchStrategy[] = [
  exactMatch,
  withoutPageMarkers,
  slidingWindows,
];
