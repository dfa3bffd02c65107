export type SourceFormat = "png" | "jpeg" | "webp" | "bmp";

/**
 * Decoded pixels of an uploaded image, interleaved by channel
 */
export interface SourceImage {
  data: Buffer;
  width: number;
  height: number;
  channels: 1 | 2 | 3 | 4;
  hasAlpha: boolean;
  format: SourceFormat;
}

export interface EncodeAttempt {
  width: number;
  height: number;
  quality: number;
  sizeBytes: number;
}

/**
 * JPEG bytes ready to attach to a description request
 */
export interface EncodedPayload {
  data: Buffer;
  format: "jpeg";
  mediaType: "image/jpeg";
  width: number;
  height: number;
  quality: number;
  sizeBytes: number;
  /** Every encode tried, in order; the last one is the accepted result */
  attempts: EncodeAttempt[];
}
