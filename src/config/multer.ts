import multer from 'multer';

const BYTES_PER_MB = 1024 * 1024;

const ACCEPTED_TYPES = new Set(['image/png', 'image/webp', 'image/jpeg', 'image/svg+xml', 'image/tiff']);

/**
 * In-memory uploads of icon bitmaps
 */
export function createUpload(maxUploadMb: number): multer.Multer {
  return multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: Math.round(maxUploadMb * BYTES_PER_MB),
      files: 32,
    },
    fileFilter: (_req, file, callback) => {
      if (ACCEPTED_TYPES.has(file.mimetype)) {
        callback(null, true);
      } else {
        callback(new multer.MulterError('LIMIT_UNEXPECTED_FILE', file.fieldname));
      }
    },
  });
}
