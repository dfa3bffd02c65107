import sharp from "sharp";
import { EncodingError, MIB, describeError, formatMegabytes } from "../../utils/errors";
import { getLogger } from "../../utils/logger";
import { EncodeAttempt, EncodedPayload, SourceImage } from "./types";

/** Largest image attachment the description service accepts */
export const PAYLOAD_CEILING_BYTES = 5 * MIB;

export interface ReduceOptions {
  /** Accepted payloads are strictly smaller than this */
  ceilingBytes: number;
  maxDimension: number;
  qualities: readonly number[];
  fallbackDimensions: readonly number[];
  fallbackQuality: number;
  finalDimension: number;
  finalQuality: number;
}

const DEFAULT_REDUCE_OPTIONS: ReduceOptions = {
  ceilingBytes: PAYLOAD_CEILING_BYTES,
  maxDimension: 1920,
  qualities: [85, 70, 50, 30],
  fallbackDimensions: [1280, 960, 640],
  fallbackQuality: 50,
  finalDimension: 480,
  finalQuality: 30,
};

interface RgbImage {
  data: Buffer;
  width: number;
  height: number;
}

const logger = getLogger("ImageReducer");

/**
 * Scale dimensions so the longer side equals `bound`, keeping the aspect
 * ratio. Dimensions already within the bound are returned unchanged.
 */
export function fitWithin(
  width: number,
  height: number,
  bound: number
): { width: number; height: number } {
  if (width <= bound && height <= bound) {
    return { width, height };
  }
  if (width >= height) {
    return { width: bound, height: Math.max(1, Math.round((height * bound) / width)) };
  }
  return { width: Math.max(1, Math.round((width * bound) / height)), height: bound };
}

function rawInput(image: RgbImage) {
  return { raw: { width: image.width, height: image.height, channels: 3 as const } };
}

/**
 * Drop any alpha band and convert to three-channel sRGB. Transparency is
 * discarded, not composited, so fully transparent pixels keep their colour.
 */
async function toOpaqueRgb(image: SourceImage): Promise<RgbImage> {
  if (image.channels === 3) {
    return { data: image.data, width: image.width, height: image.height };
  }

  let pipeline = sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  });
  if (image.hasAlpha) {
    pipeline = pipeline.removeAlpha();
  }
  const { data, info } = await pipeline
    .toColourspace("srgb")
    .raw()
    .toBuffer({ resolveWithObject: true });

  return { data, width: info.width, height: info.height };
}

async function downscale(image: RgbImage, bound: number): Promise<RgbImage> {
  const target = fitWithin(image.width, image.height, bound);
  if (target.width === image.width && target.height === image.height) {
    return image;
  }

  const { data, info } = await sharp(image.data, rawInput(image))
    .resize(target.width, target.height, { kernel: sharp.kernel.lanczos3, fit: "fill" })
    .raw()
    .toBuffer({ resolveWithObject: true });

  logger.debug(`Resized ${image.width}x${image.height} to ${info.width}x${info.height}`);
  return { data, width: info.width, height: info.height };
}

function longestSide(image: RgbImage): number {
  return Math.max(image.width, image.height);
}

/**
 * Encode an image as JPEG so it fits under the description service's
 * payload ceiling. Strategies run from least to most lossy and the first
 * result under the ceiling wins:
 *
 * 1. drop alpha and clamp the longer side to `maxDimension`
 * 2. encode at each of `qualities`
 * 3. downscale to each of `fallbackDimensions`, encoding at `fallbackQuality`
 * 4. downscale to `finalDimension` and encode at `finalQuality`
 *
 * @throws EncodingError if pixels cannot be processed, or if even the final
 * step is not under the ceiling
 */
export async function reduceImage(
  image: SourceImage,
  options: Partial<ReduceOptions> = {}
): Promise<EncodedPayload> {
  const settings: ReduceOptions = { ...DEFAULT_REDUCE_OPTIONS, ...options };
  const attempts: EncodeAttempt[] = [];

  const encode = async (current: RgbImage, quality: number): Promise<Buffer> => {
    const data = await sharp(current.data, rawInput(current))
      .jpeg({ quality, optimiseCoding: true })
      .toBuffer();
    attempts.push({
      width: current.width,
      height: current.height,
      quality,
      sizeBytes: data.length,
    });
    logger.debug(
      `Encoded ${current.width}x${current.height} at quality ${quality}: ${formatMegabytes(data.length)}`
    );
    return data;
  };

  const accept = (current: RgbImage, data: Buffer, quality: number): EncodedPayload => ({
    data,
    format: "jpeg",
    mediaType: "image/jpeg",
    width: current.width,
    height: current.height,
    quality,
    sizeBytes: data.length,
    attempts,
  });

  try {
    let current = await downscale(await toOpaqueRgb(image), settings.maxDimension);

    for (const quality of settings.qualities) {
      const data = await encode(current, quality);
      if (data.length < settings.ceilingBytes) {
        return accept(current, data, quality);
      }
    }

    for (const bound of settings.fallbackDimensions) {
      if (longestSide(current) > bound) {
        current = await downscale(current, bound);
        const data = await encode(current, settings.fallbackQuality);
        if (data.length < settings.ceilingBytes) {
          return accept(current, data, settings.fallbackQuality);
        }
      }
    }

    current = await downscale(current, settings.finalDimension);
    const data = await encode(current, settings.finalQuality);
    if (data.length >= settings.ceilingBytes) {
      throw new EncodingError(
        `Image is still ${formatMegabytes(data.length)} after maximum compression`
      );
    }
    return accept(current, data, settings.finalQuality);
  } catch (error) {
    if (error instanceof EncodingError) {
      throw error;
    }
    throw new EncodingError(`Could not re-encode image: ${describeError(error)}`, {
      cause: error,
    });
  }
}
