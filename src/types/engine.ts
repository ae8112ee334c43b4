// =============================================================================
// SHROUD — Redaction Engine Types
// =============================================================================

import { PiiPages } from './session';

export const ENGINE_VARIANTS = ['vision', 'classic'] as const;

/**
 * vision  — remote model-backed detection (slower, network-bound)
 * classic — local pattern rules and name heuristics (fast, CPU-bound)
 */
export type EngineVariant = typeof ENGINE_VARIANTS[number];

/** Severity bounds. 1 redacts only high-confidence matches; 5 is most aggressive. */
export const MIN_SEVERITY = 1;
export const MAX_SEVERITY = 5;

export interface EngineInput {
  /** Uploaded document on disk */
  filePath: string;

  severity: number;

  /** Where the engine writes the redacted artifact */
  outputPath: string;
}

export interface EngineOutput {
  artifactPath: string;

  /** null when nothing was redacted */
  items: PiiPages | null;
}

/**
 * The single capability both backends share. Implementations must either
 * write a complete artifact to `input.outputPath` and resolve, or reject.
 * They should stop work once `signal` is aborted.
 */
export interface RedactionEngine {
  readonly variant: EngineVariant;
  redact(input: EngineInput, signal: AbortSignal): Promise<EngineOutput>;
}
