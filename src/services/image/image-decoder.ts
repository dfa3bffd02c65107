import bmp from "bmp-js";
import sharp from "sharp";
import { EncodingError, UnsupportedFormatError, describeError } from "../../utils/errors";
import { getLogger } from "../../utils/logger";
import { SourceFormat, SourceImage } from "./types";

const logger = getLogger("ImageDecoder");

/**
 * Identify the codec from the leading bytes
 * @returns The format, or null for anything other than PNG, JPEG, WEBP or BMP
 */
export function detectFormat(bytes: Buffer): SourceFormat | null {
  if (
    bytes.length >= 8 &&
    bytes.subarray(0, 8).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))
  ) {
    return "png";
  }
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return "jpeg";
  }
  if (
    bytes.length >= 12 &&
    bytes.toString("ascii", 0, 4) === "RIFF" &&
    bytes.toString("ascii", 8, 12) === "WEBP"
  ) {
    return "webp";
  }
  if (bytes.length >= 2 && bytes.toString("ascii", 0, 2) === "BM") {
    return "bmp";
  }
  return null;
}

/**
 * bmp-js yields ABGR quads; reorder them to RGB or RGBA
 */
function decodeBmp(bytes: Buffer): SourceImage {
  const bitmap = bmp.decode(bytes);
  const channels = bitmap.is_with_alpha ? 4 : 3;
  const pixels = bitmap.width * bitmap.height;
  const data = Buffer.alloc(pixels * channels);

  for (let i = 0; i < pixels; i++) {
    const src = i * 4;
    const dst = i * channels;
    data[dst] = bitmap.data[src + 3];
    data[dst + 1] = bitmap.data[src + 2];
    data[dst + 2] = bitmap.data[src + 1];
    if (channels === 4) {
      data[dst + 3] = bitmap.data[src];
    }
  }

  return {
    data,
    width: bitmap.width,
    height: bitmap.height,
    channels,
    hasAlpha: channels === 4,
    format: "bmp",
  };
}

async function decodeWithSharp(bytes: Buffer, format: SourceFormat): Promise<SourceImage> {
  // rotate() with no angle applies the EXIF orientation
  const { data, info } = await sharp(bytes, { failOn: "error" })
    .rotate()
    .raw()
    .toBuffer({ resolveWithObject: true });

  return {
    data,
    width: info.width,
    height: info.height,
    channels: info.channels,
    hasAlpha: info.channels === 2 || info.channels === 4,
    format,
  };
}

/**
 * Decode an uploaded PNG, JPEG, WEBP or BMP file into raw pixels
 * @throws UnsupportedFormatError for other formats, EncodingError for corrupt data
 */
export async function decodeImage(bytes: Buffer): Promise<SourceImage> {
  const format = detectFormat(bytes);
  if (!format) {
    throw new UnsupportedFormatError("unknown");
  }

  try {
    const image = format === "bmp" ? decodeBmp(bytes) : await decodeWithSharp(bytes, format);
    logger.debug(
      `Decoded ${format} image ${image.width}x${image.height} with ${image.channels} channel(s)`
    );
    return image;
  } catch (error) {
    throw new EncodingError(`Could not decode ${format} image: ${describeError(error)}`, {
      cause: error,
    });
  }
}
