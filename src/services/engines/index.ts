// =============================================================================
// SHROUD — Engine Gateway
//
// Uniform entry point over the redaction backends. Callers pick a variant;
// everything downstream (encryption, storage, restoration) is identical
// whichever engine ran.
//
// Guarantees:
//   - bounded by a timeout; on expiry the engine is aborted
//   - all-or-nothing: on any failure the artifact path is removed, so a
//     partially written file is never handed on
//   - every failure surfaces as a single EngineFailure result
// =============================================================================

import * as fs from 'fs';
import { AppConfig } from '../../config';
import { EngineInput, EngineOutput, EngineVariant, RedactionEngine } from '../../types/engine';
import { Result, ok, fail } from '../../types/session';
import { ClassicEngine } from './classic';
import { VisionEngine } from './vision';

export { ClassicEngine, DETECTION_RULES, severityThreshold } from './classic';
export { VisionEngine, locateEntities } from './vision';

export class EngineGateway {
  constructor(
    private readonly engines: Record<EngineVariant, RedactionEngine>,
    private readonly timeoutMs: number,
  ) {}

  async redact(variant: EngineVariant, input: EngineInput): Promise<Result<EngineOutput>> {
    const engine = this.engines[variant];
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        const err = new Error(`timed out after ${this.timeoutMs}ms`);
        controller.abort(err);
        reject(err);
      }, this.timeoutMs);
    });

    try {
      const output = await Promise.race([engine.redact(input, controller.signal), timeout]);
      const pageCount = output.items ? Object.keys(output.items).length : 0;
      return ok({
        artifactPath: output.artifactPath,
        items: pageCount > 0 ? output.items : null,
      });
    } catch (err: unknown) {
      if (!controller.signal.aborted) controller.abort();
      await fs.promises.rm(input.outputPath, { force: true });

      const message = err instanceof Error ? err.message : String(err);
      console.error(`[Engine] ${variant} engine failed: ${message}`);
      return fail('EngineFailure', `The ${variant} engine could not process the document: ${message}`);
    } finally {
      clearTimeout(timer);
    }
  }
}

export function createEngineGateway(appConfig: Pick<AppConfig, 'engine' | 'vision'>): EngineGateway {
  return new EngineGateway(
    {
      vision: new VisionEngine(appConfig.vision),
      classic: new ClassicEngine(),
    },
    appConfig.engine.timeoutMs
  );
}
