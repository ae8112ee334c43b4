// =============================================================================
// SHROUD — File Upload Configuration
//
// Uploads go to disk under the temp directory with a unique prefix; the
// route's TempFileScope removes them once the response closes.
// =============================================================================

import * as fs from 'fs';
import * as path from 'path';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';

export function createUpload(uploadDir: string, maxFileSizeBytes: number): multer.Multer {
  fs.mkdirSync(uploadDir, { recursive: true });

  return multer({
    storage: multer.diskStorage({
      destination: (_req, _file, cb) => cb(null, uploadDir),
      filename: (_req, file, cb) => {
        // Unique prefix prevents collisions between concurrent uploads
        const safeName = path.basename(file.originalname).replace(/[^\w.-]/g, '_');
        cb(null, `${uuidv4()}_${safeName}`);
      },
    }),
    limits: {
      fileSize: maxFileSizeBytes,
      files: 1,
    },
  });
}
