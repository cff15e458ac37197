import { describeError } from "../errors.js";
import type { Logger } from "../types.js";
import { PdfRenderedDocument } from "./pdf-document.js";
import { DEFAULT_STRATEGIES, normalizeSpan } from "./strategies.js";
import type { HighlightReport, MatchStrategy, RenderedDocument } from "./types.js";

export interface HighlightResult extends HighlightReport {
  bytes: Uint8Array;
}

/** Normalized, non-empty spans, longest first. */
export function orderSpans(spans: readonly string[]): string[] {
  return spans
    .map(normalizeSpan)
    .filter((s) => s.length > 0)
    .sort((a, b) => b.length - a.length);
}

/**
 * Marks every located span on every page. Each span is tried against the
 * strategies in order until one finds something. Marks are added on top of
 * whatever the document already has.
 */
export function highlightDocument(
  doc: RenderedDocument,
  spans: readonly string[],
  strategies: readonly MatchStrategy[] = DEFAULT_STRATEGIES,
): HighlightReport {
  const ordered = orderSpans(spans);
  const matched = new Set<string>();
  const pagesMarked: number[] = [];
  let regions = 0;

  for (const page of doc.pages) {
    let marked = 0;
    for (const span of ordered) {
      for (const strategy of strategies) {
        const outcome = strategy.locate(page, span);
        if (!outcome.ok) continue;
        for (const region of outcome.value) {
          page.mark(region);
          marked++;
        }
        matched.add(span);
        break;
      }
    }
    if (marked > 0) pagesMarked.push(page.pageNumber);
    regions += marked;
  }

  return {
    regions,
    pagesMarked,
    unmatched: ordered.filter((s) => !matched.has(s)),
  };
}

/**
 * Highlights spans in PDF bytes. Never throws: when nothing matches, or the
 * PDF can't be processed, the input bytes come back as they were.
 */
export async function highlightPdf(
  bytes: Uint8Array,
  spans: readonly string[],
  log: Logger = () => {},
): Promise<HighlightResult> {
  const untouched: HighlightResult = {
    bytes,
    regions: 0,
    pagesMarked: [],
    unmatched: orderSpans(spans),
  };
  if (untouched.unmatched.length === 0) return untouched;

  try {
    const doc = await PdfRenderedDocument.open(bytes);
    const report = highlightDocument(doc, spans);
    log(`corpus: added ${report.regions} highlight(s) across ${doc.pages.length} page(s)`);
    if (report.regions === 0) return { ...untouched, unmatched: report.unmatched };
    return { ...report, bytes: await doc.save() };
  } catch (err) {
    log(`corpus: highlighting failed: ${describeError(err)}`);
    return untouched;
  }
}
