import fs from 'fs';
import path from 'path';
import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';
import { OUTPUT_DIRS } from '../config/settings';
import { MAX_REFERENCE_VIDEOS } from '../types/ugc.types';
import { AppError } from './errorHandler';

export const UPLOAD_FIELDS = {
  productImages: 'productImages',
  referenceVideos: 'referenceVideos',
} as const;

const MAX_PRODUCT_IMAGES = 10;

const storage = multer.diskStorage({
  destination: (req, file, cb) => {
    fs.mkdirSync(OUTPUT_DIRS.uploads, { recursive: true });
    cb(null, OUTPUT_DIRS.uploads);
  },
  filename: (req, file, cb) => {
    cb(null, `${uuidv4()}${path.extname(file.originalname).toLowerCase()}`);
  },
});

/** Product photos must be images and reference clips must be videos. */
export function acceptsUpload(fieldname: string, mimetype: string): boolean {
  if (fieldname === UPLOAD_FIELDS.productImages) return mimetype.startsWith('image/');
  if (fieldname === UPLOAD_FIELDS.referenceVideos) return mimetype.startsWith('video/');
  return false;
}

export const ugcUpload = multer({
  storage,
  limits: { fileSize: 200 * 1024 * 1024 },
  fileFilter: (req, file, cb) => {
    if (acceptsUpload(file.fieldname, file.mimetype)) {
      cb(null, true);
    } else {
      cb(new AppError(`Unsupported upload for ${file.fieldname}: ${file.mimetype}`, 400));
    }
  },
}).fields([
  { name: UPLOAD_FIELDS.productImages, maxCount: MAX_PRODUCT_IMAGES },
  { name: UPLOAD_FIELDS.referenceVideos, maxCount: MAX_REFERENCE_VIDEOS },
]);

function uploadedPaths(req: Request, field: string): string[] {
  const files = req.files;
  if (!files || Array.isArray(files)) return [];
  return (files[field] ?? []).map((file) => file.path);
}

/** Move uploaded file paths into the body fields the UGC pipeline reads. */
export const attachUploads = (req: Request, res: Response, next: NextFunction): void => {
  req.body = {
    ...req.body,
    productImagePaths: uploadedPaths(req, UPLOAD_FIELDS.productImages),
    referenceVideoPaths: uploadedPaths(req, UPLOAD_FIELDS.referenceVideos),
  };
  next();
};
