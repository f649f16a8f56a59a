import multer from 'multer';
import { Request, Response, NextFunction } from 'express';
import * as path from 'path';
import * as fs from 'fs';
import { MAX_UPLOAD_BYTES, STORAGE_DIR } from '../config/settings';

/**
 * Raised for uploads the service refuses; mapped to a 400 response.
 */
export class UploadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UploadError';
  }
}

export const UPLOAD_PREFIX = 'validate-upload-';

const storage = multer.diskStorage({
  destination: (req, file, cb) => {
    fs.mkdirSync(STORAGE_DIR, { recursive: true });
    cb(null, STORAGE_DIR);
  },
  filename: (req, file, cb) => {
    const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * 1e9);
    const ext = path.extname(file.originalname).toLowerCase() || '.csv';
    cb(null, UPLOAD_PREFIX + uniqueSuffix + ext);
  },
});

const allowedMimeTypes = [
  'text/csv',
  'text/plain',
  'text/tab-separated-values',
  'application/csv',
  'application/vnd.ms-excel', // Some systems report CSV as this
];

const allowedExtensions = ['.csv', '.tsv', '.txt'];

/**
 * Accept CSV, TSV and TXT files
 */
export function isAcceptedUpload(originalName: string, mimeType: string): boolean {
  const ext = path.extname(originalName).toLowerCase();
  return allowedMimeTypes.includes(mimeType) || allowedExtensions.includes(ext);
}

const fileFilter = (req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback): void => {
  if (isAcceptedUpload(file.originalname, file.mimetype)) {
    cb(null, true);
  } else {
    cb(new UploadError('Only CSV, TSV and TXT files are allowed'));
  }
};

export const upload = multer({
  storage,
  fileFilter,
  limits: {
    fileSize: MAX_UPLOAD_BYTES,
  },
}).single('datafile');

/**
 * Express middleware for handling file uploads; leaves the stored file on `req.file`
 */
export const uploadMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  upload(req, res, err => {
    if (err instanceof multer.MulterError) {
      return next(new UploadError(err.message));
    }
    if (err) {
      return next(err);
    }
    if (!req.file) {
      return next(new UploadError('No file uploaded'));
    }
    next();
  });
};
