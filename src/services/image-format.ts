import sharp from "sharp";

export type ImageMediaType = "image/png" | "image/gif" | "image/jpeg" | "image/webp";

export type ImageFormat = ImageMediaType | "image/tiff";

export interface NormalizedImage {
  data: Buffer;
  mediaType: ImageMediaType;
}

const startsWith = (bytes: Buffer, signature: readonly number[], offset = 0): boolean =>
  bytes.length >= offset + signature.length &&
  signature.every((byte, i) => bytes[offset + i] === byte);

const ascii = (text: string): number[] => Array.from(text, (ch) => ch.charCodeAt(0));

const PNG = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const GIF87A = ascii("GIF87a");
const GIF89A = ascii("GIF89a");
const JPEG = [0xff, 0xd8];
const RIFF = ascii("RIFF");
const WEBP = ascii("WEBP");
const TIFF_LE = [0x49, 0x49, 0x2a, 0x00];
const TIFF_BE = [0x4d, 0x4d, 0x00, 0x2a];

/** Container format from the leading bytes. Unrecognised data is treated as JPEG. */
export function sniffImageFormat(bytes: Buffer): ImageFormat {
  if (startsWith(bytes, PNG)) return "image/png";
  if (startsWith(bytes, GIF87A) || startsWith(bytes, GIF89A)) return "image/gif";
  if (startsWith(bytes, JPEG)) return "image/jpeg";
  if (startsWith(bytes, RIFF) && startsWith(bytes, WEBP, 8)) return "image/webp";
  if (startsWith(bytes, TIFF_LE) || startsWith(bytes, TIFF_BE)) return "image/tiff";
  return "image/jpeg";
}

/**
 * Bytes the vision model accepts. TIFF is re-encoded as JPEG on a white
 * background; everything else passes through untouched.
 */
export async function normalizeImage(bytes: Buffer): Promise<NormalizedImage> {
  const format = sniffImageFormat(bytes);
  if (format !== "image/tiff") {
    return { data: bytes, mediaType: format };
  }

  const data = await sharp(bytes)
    .flatten({ background: "#ffffff" })
    .jpeg({ quality: 95 })
    .toBuffer();
  return { data, mediaType: "image/jpeg" };
}
