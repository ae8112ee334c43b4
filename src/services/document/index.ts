// =============================================================================
// SHROUD — Text Document Model
//
// Both engines and the restoration service work on the same representation:
//
//   document  = pages separated by form feed (\f)
//   page      = lines separated by \n
//   bbox      = [startColumn, line, endColumn, line + 1] on the page grid
//
// Redaction overwrites each character inside a box with █, one for one,
// so the artifact keeps the original geometry and a box recorded at
// redaction time addresses the same cells in the redacted artifact.
// =============================================================================

import * as fs from 'fs';
import { BoundingBox, PiiItem, PiiPages } from '../../types/session';

export const PAGE_SEPARATOR = '\f';
export const LINE_SEPARATOR = '\n';

/** Unicode full block (U+2588) */
export const REDACTION_CHAR = '█';

export interface TextPage {
  /** 1-based page number as a string */
  pageId: string;
  lines: string[];
}

export interface TextDocument {
  pages: TextPage[];
}

/** A detected span on one line of a page. */
export interface TextSpan {
  line: number;
  start: number;
  end: number;
}

// ── Parsing ────────────────────────────────────────────────────────────

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Parse raw bytes into the page/line model.
 * @throws on binary content or invalid UTF-8
 */
export function parseDocument(buffer: Buffer): TextDocument {
  if (buffer.includes(0)) {
    throw new Error('Unsupported document: binary content');
  }

  let text: string;
  try {
    text = utf8.decode(buffer);
  } catch {
    throw new Error('Unsupported document: not valid UTF-8 text');
  }

  return {
    pages: text.split(PAGE_SEPARATOR).map((pageText, i) => ({
      pageId: String(i + 1),
      lines: pageText.split(LINE_SEPARATOR),
    })),
  };
}

export function serializeDocument(document: TextDocument): Buffer {
  const text = document.pages
    .map(page => page.lines.join(LINE_SEPARATOR))
    .join(PAGE_SEPARATOR);
  return Buffer.from(text, 'utf-8');
}

export async function loadDocument(filePath: string): Promise<TextDocument> {
  return parseDocument(await fs.promises.readFile(filePath));
}

export async function writeDocument(filePath: string, document: TextDocument): Promise<void> {
  await fs.promises.writeFile(filePath, serializeDocument(document));
}

export function pageText(page: TextPage): string {
  return page.lines.join(LINE_SEPARATOR);
}

// ── Geometry ───────────────────────────────────────────────────────────

export function spanToBBox(span: TextSpan): BoundingBox {
  return [span.start, span.line, span.end, span.line + 1];
}

/**
 * Reduce overlapping spans to a disjoint set: earliest start wins, and on
 * equal starts the longer span wins. Output is ordered by line, then column.
 */
export function resolveOverlaps(spans: TextSpan[]): TextSpan[] {
  const ordered = [...spans]
    .filter(s => s.end > s.start)
    .sort((a, b) =>
      a.line - b.line ||
      a.start - b.start ||
      (b.end - b.start) - (a.end - a.start)
    );

  const kept: TextSpan[] = [];
  for (const span of ordered) {
    const last = kept[kept.length - 1];
    if (last && last.line === span.line && span.start < last.end) continue;
    kept.push(span);
  }
  return kept;
}

/** Every index at which `needle` occurs in `line` (non-overlapping). */
export function findOccurrences(line: string, needle: string): number[] {
  const positions: number[] = [];
  if (!needle) return positions;

  let from = 0;
  for (;;) {
    const index = line.indexOf(needle, from);
    if (index === -1) break;
    positions.push(index);
    from = index + needle.length;
  }
  return positions;
}

// ── Redaction ──────────────────────────────────────────────────────────

/**
 * Mask the given spans on every page and collect the removed text.
 * `spansByPage` is keyed by pageId; spans must already be disjoint.
 * Returns items = null when nothing was masked.
 */
export function applyRedactions(
  document: TextDocument,
  spansByPage: Map<string, TextSpan[]>
): { redacted: TextDocument; items: PiiPages | null } {
  const items: PiiPages = {};
  let total = 0;

  const pages = document.pages.map(page => {
    const spans = spansByPage.get(page.pageId) ?? [];
    if (spans.length === 0) return page;

    const lines = [...page.lines];
    const pageItems: PiiItem[] = [];

    for (const span of spans) {
      const line = lines[span.line];
      if (line === undefined || span.end > line.length) {
        throw new Error(`Span outside page ${page.pageId} at line ${span.line}`);
      }
      pageItems.push({ text: line.slice(span.start, span.end), bbox: spanToBBox(span) });
      lines[span.line] =
        line.slice(0, span.start) +
        REDACTION_CHAR.repeat(span.end - span.start) +
        line.slice(span.end);
    }

    items[page.pageId] = pageItems;
    total += pageItems.length;
    return { pageId: page.pageId, lines };
  });

  return { redacted: { pages }, items: total > 0 ? items : null };
}

// ── Restoration ────────────────────────────────────────────────────────

function isSingleLineBox(bbox: BoundingBox): boolean {
  const [x0, y0, x1, y1] = bbox;
  return [x0, y0, x1, y1].every(Number.isInteger) && x0 >= 0 && y0 >= 0 && x1 >= x0 && y1 === y0 + 1;
}

/**
 * Write each item's text back into its box.
 * Items on the same line are applied right to left so earlier columns stay
 * valid even when a replacement differs in length from its box.
 * @throws when a box does not fit the supplied document
 */
export function reinsertItems(document: TextDocument, pages: PiiPages): TextDocument {
  const byId = new Map(document.pages.map(p => [p.pageId, { pageId: p.pageId, lines: [...p.lines] }]));

  for (const [pageId, items] of Object.entries(pages)) {
    const page = byId.get(pageId);
    if (!page) {
      throw new Error(`Page ${pageId} does not exist in the supplied document`);
    }

    const ordered = [...items].sort((a, b) => a.bbox[1] - b.bbox[1] || b.bbox[0] - a.bbox[0]);
    for (const item of ordered) {
      if (!isSingleLineBox(item.bbox)) {
        throw new Error(`Unsupported bounding box on page ${pageId}: [${item.bbox.join(', ')}]`);
      }
      const [x0, y, x1] = item.bbox;
      const line = page.lines[y];
      if (line === undefined || x1 > line.length) {
        throw new Error(`Bounding box [${item.bbox.join(', ')}] falls outside page ${pageId}`);
      }
      page.lines[y] = line.slice(0, x0) + item.text + line.slice(x1);
    }
  }

  return { pages: document.pages.map(p => byId.get(p.pageId) ?? p) };
}
