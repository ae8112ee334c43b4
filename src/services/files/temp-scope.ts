// =============================================================================
// SHROUD — Temporary File Scope
//
// Request-owned temporary files (upload, artifact, restored output). The
// route registers every path it creates and releases the scope when the
// response closes — after the body is delivered, after an error response,
// or when the client goes away.
// =============================================================================

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

export class TempFileScope {
  private readonly paths = new Set<string>();
  private released = false;

  constructor(private readonly dir: string) {}

  /** Register an existing file (e.g. one multer wrote) for cleanup. */
  track(filePath: string): string {
    this.paths.add(filePath);
    return filePath;
  }

  /** Reserve a fresh path inside the scope directory. */
  allocate(label: string): string {
    const safeLabel = path.basename(label).replace(/[^\w.-]/g, '_');
    return this.track(path.join(this.dir, `${uuidv4()}_${safeLabel}`));
  }

  /** Delete every tracked file. Idempotent. */
  release(): void {
    if (this.released) return;
    this.released = true;

    for (const filePath of this.paths) {
      try {
        fs.rmSync(filePath, { force: true });
      } catch (err: unknown) {
        console.warn(`[Files] Could not remove ${filePath}: ${err instanceof Error ? err.message : err}`);
      }
    }
    this.paths.clear();
  }

  get size(): number {
    return this.paths.size;
  }
}
