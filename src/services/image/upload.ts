import * as path from "path";
import {
  EncodingError,
  MIB,
  UnsupportedFormatError,
  UploadTooLargeError,
  formatMegabytes,
} from "../../utils/errors";

export const UPLOAD_LIMIT_BYTES = 10 * MIB;

const ACCEPTED_EXTENSIONS: readonly string[] = ["png", "jpg", "jpeg", "bmp", "webp"];

export interface ImageUpload {
  bytes: Buffer;
  /** Original file name; when present its extension is checked */
  fileName?: string;
}

export interface ValidatedUpload {
  sizeBytes: number;
  /** e.g. "2.4MB" */
  sizeLabel: string;
}

/**
 * Check an upload's size and file type without decoding it
 * @throws UploadTooLargeError, UnsupportedFormatError or EncodingError (empty file)
 */
export function validateUpload(
  upload: ImageUpload,
  limitBytes: number = UPLOAD_LIMIT_BYTES
): ValidatedUpload {
  const sizeBytes = upload.bytes.length;

  if (sizeBytes > limitBytes) {
    throw new UploadTooLargeError(sizeBytes, limitBytes);
  }
  if (sizeBytes === 0) {
    throw new EncodingError("The uploaded file is empty");
  }

  if (upload.fileName !== undefined) {
    const extension = path.extname(upload.fileName).slice(1).toLowerCase();
    if (!ACCEPTED_EXTENSIONS.includes(extension)) {
      throw new UnsupportedFormatError(extension || "no extension");
    }
  }

  return { sizeBytes, sizeLabel: formatMegabytes(sizeBytes) };
}
