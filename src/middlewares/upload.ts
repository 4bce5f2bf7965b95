/**
 * Document upload middleware
 *
 * Uploaded documents are stored on disk under UPLOAD_DIR; the extraction
 * pipeline reads them from there and removes them once processed.
 */

import { Request } from 'express';
import multer from 'multer';
import { extname, resolve } from 'path';
import { existsSync, mkdirSync } from 'fs';
import { randomUUID } from 'crypto';
import { env } from '../config';
import { SUPPORTED_EXTENSIONS } from '../conversion';
import { AppError } from '../utils';

/** Most documents accepted in one batch upload */
export const MAX_BATCH_FILES = 50;

const uploadsDir = (): string => {
  const dir = resolve(env.UPLOAD_DIR);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  return dir;
};

const storage = multer.diskStorage({
  destination: (_req, _file, cb) => {
    cb(null, uploadsDir());
  },
  filename: (_req, file, cb) => {
    cb(null, `${randomUUID()}${extname(file.originalname).toLowerCase()}`);
  },
});

/**
 * Accepts only document types a converter exists for
 */
const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback): void => {
  const extension = extname(file.originalname).toLowerCase();

  if (SUPPORTED_EXTENSIONS.includes(extension)) {
    cb(null, true);
  } else {
    cb(
      AppError.badRequest(
        `Unsupported document type: ${file.originalname}. Allowed: ${SUPPORTED_EXTENSIONS.join(', ')}`
      )
    );
  }
};

export const documentUpload = multer({
  storage,
  fileFilter,
  limits: {
    fileSize: env.MAX_UPLOAD_MB * 1024 * 1024,
    files: MAX_BATCH_FILES,
  },
});

export default documentUpload;
