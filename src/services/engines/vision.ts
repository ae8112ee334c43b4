// =============================================================================
// SHROUD — Vision Redaction Engine
//
// Model-backed detection via a remote inference service. Each page is sent
// for analysis; the model answers with the sensitive strings it found and
// this engine locates them on the page grid.
//
//   POST {apiUrl}/v1/detect
//   { model, severity, page, text }  →  { entities: [{ text, category? }] }
//
// Slower than the classic engine and network-bound. The gateway's abort
// signal is passed straight to fetch, so a timeout cancels the request.
// =============================================================================

import fetch from 'node-fetch';
import { EngineInput, EngineOutput, RedactionEngine } from '../../types/engine';
import {
  LINE_SEPARATOR,
  TextPage,
  TextSpan,
  applyRedactions,
  findOccurrences,
  loadDocument,
  pageText,
  resolveOverlaps,
  writeDocument,
} from '../document';

export interface VisionEngineOptions {
  apiUrl: string;
  apiKey: string;
  model: string;
}

export interface VisionEntity {
  text: string;
  category?: string;
}

interface DetectResponse {
  entities: VisionEntity[];
}

function isDetectResponse(body: unknown): body is DetectResponse {
  if (typeof body !== 'object' || body === null || !('entities' in body)) return false;
  const { entities } = body;
  return Array.isArray(entities) && entities.every(e =>
    typeof e === 'object' && e !== null && 'text' in e && typeof e.text === 'string'
  );
}

/** Spans covering every occurrence of every entity string on the page. */
export function locateEntities(page: TextPage, entities: VisionEntity[]): TextSpan[] {
  const spans: TextSpan[] = [];

  for (const entity of entities) {
    // An entity the model reports across a line break is matched line by line
    for (const fragment of entity.text.split(LINE_SEPARATOR)) {
      const needle = fragment.trim();
      if (!needle) continue;

      page.lines.forEach((line, lineIndex) => {
        for (const start of findOccurrences(line, needle)) {
          spans.push({ line: lineIndex, start, end: start + needle.length });
        }
      });
    }
  }

  return resolveOverlaps(spans);
}

export class VisionEngine implements RedactionEngine {
  readonly variant = 'vision' as const;

  constructor(private readonly options: VisionEngineOptions) {}

  async redact(input: EngineInput, signal: AbortSignal): Promise<EngineOutput> {
    const document = await loadDocument(input.filePath);
    const spansByPage = new Map<string, TextSpan[]>();

    for (const page of document.pages) {
      const text = pageText(page);
      if (!text.trim()) continue;

      const entities = await this.detectEntities(page.pageId, text, input.severity, signal);
      spansByPage.set(page.pageId, locateEntities(page, entities));
    }

    const { redacted, items } = applyRedactions(document, spansByPage);

    signal.throwIfAborted();
    await writeDocument(input.outputPath, redacted);

    return { artifactPath: input.outputPath, items };
  }

  private async detectEntities(
    page: string,
    text: string,
    severity: number,
    signal: AbortSignal
  ): Promise<VisionEntity[]> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers['Authorization'] = `Bearer ${this.options.apiKey}`;
    }

    const response = await fetch(`${this.options.apiUrl.replace(/\/+$/, '')}/v1/detect`, {
      method: 'POST',
      headers,
      body: JSON.stringify({ model: this.options.model, severity, page, text }),
      signal,
    });

    if (!response.ok) {
      throw new Error(`Vision model returned HTTP ${response.status} for page ${page}`);
    }

    const body: unknown = await response.json();
    if (!isDetectResponse(body)) {
      throw new Error(`Vision model returned a malformed response for page ${page}`);
    }

    return body.entities;
  }
}
