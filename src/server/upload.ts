/**
 * Multipart handling for theme file uploads.
 *
 * Files are buffered in memory; the submission dialog applies the real size
 * and format rules. Multer only enforces a hard ceiling so a runaway upload
 * is cut off before it is fully read.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';

/** Room above the configured maximum so the dialog reports oversize files itself. */
const CEILING_FACTOR = 2;

export function createThemeUpload(maxFileSizeBytes: number): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxFileSizeBytes * CEILING_FACTOR, files: 1 },
  }).single('file');

  return (req: Request, res: Response, next: NextFunction): void => {
    upload(req, res, (err: unknown) => {
      if (!err) {
        next();
        return;
      }
      if (err instanceof multer.MulterError) {
        if (err.code === 'LIMIT_FILE_SIZE') {
          res.status(413).json({
            success: false,
            error: `File too large. Maximum size is ${maxFileSizeBytes} bytes.`,
            code: 'FILE_TOO_LARGE',
            maxBytes: maxFileSizeBytes,
          });
          return;
        }
        res.status(400).json({ success: false, error: err.message, code: 'INVALID_UPLOAD' });
        return;
      }
      next(err);
    });
  };
}
