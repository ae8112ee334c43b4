// =============================================================================
// SHROUD — Classic Redaction Engine
//
// Fast, fully local detection: pattern rules for structured identifiers
// plus a context heuristic for person names. Runs in-process, so it yields
// between pages to let the gateway's timeout and abort take effect.
//
// Severity selects rules by confidence:
//   1 → ≥ 0.9   only unambiguous identifiers
//   3 → ≥ 0.7   default-ish: adds phones, dates, names
//   5 → ≥ 0.3   everything, including bare digit runs
// =============================================================================

import { setImmediate } from 'timers/promises';
import { EngineInput, EngineOutput, RedactionEngine, MIN_SEVERITY, MAX_SEVERITY } from '../../types/engine';
import {
  TextPage,
  TextSpan,
  applyRedactions,
  loadDocument,
  resolveOverlaps,
  writeDocument,
} from '../document';

export interface DetectionRule {
  name: string;
  /** Must carry the g flag */
  pattern: RegExp;
  category: 'personal_data' | 'financial' | 'temporal' | 'address' | 'network' | 'classification';
  confidence: number;
}

export const DETECTION_RULES: DetectionRule[] = [
  // Personal identifiers
  { name: 'ssn',            pattern: /\b\d{3}-\d{2}-\d{4}\b/g,                                         category: 'personal_data', confidence: 0.95 },
  { name: 'email_address',  pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,           category: 'personal_data', confidence: 0.9 },
  { name: 'phone',          pattern: /(?:\+1[-.\s]?)?(?:\(\d{3}\)\s?|\b\d{3}[-.\s])\d{3}[-.\s]\d{4}\b/g, category: 'personal_data', confidence: 0.75 },

  // Names (heuristic NER): honorific or "Name:" label followed by capitalised words
  { name: 'person_titled',  pattern: /(?<=\b(?:Mr|Mrs|Ms|Dr|Prof)\.?\s)[A-Z][a-z]+(?:\s[A-Z][a-z]+)?/g, category: 'personal_data', confidence: 0.8 },
  { name: 'person_labeled', pattern: /(?<=\bName:\s*)[A-Z][a-z]+(?:\s[A-Z][a-z]+)+/g,                   category: 'personal_data', confidence: 0.7 },

  // Financial
  { name: 'card_number',    pattern: /\b(?:\d{4}[- ]){3}\d{4}\b/g,                                      category: 'financial',     confidence: 0.9 },
  { name: 'currency',       pattern: /[$€£¥]\d[\d,]*(?:\.\d{2})?/g,                                     category: 'financial',     confidence: 0.8 },
  { name: 'account_number', pattern: /\b\d{8,17}\b/g,                                                   category: 'financial',     confidence: 0.4 },

  // Dates
  { name: 'iso_date',       pattern: /\b\d{4}-\d{2}-\d{2}\b/g,                                          category: 'temporal',      confidence: 0.7 },
  { name: 'date',           pattern: /\b\d{1,2}\/\d{1,2}\/\d{2,4}\b/g,                                  category: 'temporal',      confidence: 0.6 },

  // Addresses
  { name: 'po_box',         pattern: /\bP\.?\s?O\.?\s*Box\s+\d+\b/gi,                                   category: 'address',       confidence: 0.85 },
  { name: 'zip_code',       pattern: /\b\d{5}(?:-\d{4})?\b/g,                                           category: 'address',       confidence: 0.5 },

  { name: 'ip_address',     pattern: /\b(?:\d{1,3}\.){3}\d{1,3}\b/g,                                    category: 'network',       confidence: 0.85 },

  // Handling and classification markings
  { name: 'classified',     pattern: /\b(?:TOP SECRET|CONFIDENTIAL|SECRET|CLASSIFIED|RESTRICTED)\b/g,     category: 'classification', confidence: 0.9 },
  { name: 'dissemination',  pattern: /\b(?:FOR OFFICIAL USE ONLY|FOUO|NOFORN|ORCON)\b/g,                 category: 'classification', confidence: 0.95 },
];

const SEVERITY_THRESHOLDS: Record<number, number> = {
  1: 0.9,
  2: 0.8,
  3: 0.7,
  4: 0.5,
  5: 0.3,
};

/** Minimum rule confidence applied at a severity level (clamped to 1–5). */
export function severityThreshold(severity: number): number {
  const level = Math.max(MIN_SEVERITY, Math.min(MAX_SEVERITY, Math.round(severity)));
  return SEVERITY_THRESHOLDS[level];
}

export class ClassicEngine implements RedactionEngine {
  readonly variant = 'classic' as const;

  constructor(private readonly rules: DetectionRule[] = DETECTION_RULES) {}

  /** Disjoint spans on one page for the rules active at `severity`. */
  detectSpans(page: TextPage, severity: number): TextSpan[] {
    const threshold = severityThreshold(severity);
    const active = this.rules.filter(rule => rule.confidence >= threshold);
    const spans: TextSpan[] = [];

    page.lines.forEach((line, lineIndex) => {
      if (!line) return;
      for (const rule of active) {
        for (const match of line.matchAll(rule.pattern)) {
          if (match.index === undefined) continue;
          spans.push({ line: lineIndex, start: match.index, end: match.index + match[0].length });
        }
      }
    });

    return resolveOverlaps(spans);
  }

  async redact(input: EngineInput, signal: AbortSignal): Promise<EngineOutput> {
    const document = await loadDocument(input.filePath);
    const spansByPage = new Map<string, TextSpan[]>();

    for (const page of document.pages) {
      await setImmediate();
      signal.throwIfAborted();
      spansByPage.set(page.pageId, this.detectSpans(page, input.severity));
    }

    const { redacted, items } = applyRedactions(document, spansByPage);

    signal.throwIfAborted();
    await writeDocument(input.outputPath, redacted);

    return { artifactPath: input.outputPath, items };
  }
}
