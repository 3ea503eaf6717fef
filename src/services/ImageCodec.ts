/**
 * ImageCodec - sharp-backed decoding of client frames
 *
 * Turns base64 / data-URL payloads into stored JPEG bytes and reads stored
 * frames back as raw pixels for the classifiers.
 */

import sharp from 'sharp';
import { DecodeError, errorMessage } from '../domain/errors';

const BASE64_PATTERN = /^[A-Za-z0-9+/_-]+={0,2}$/;

/** JPEG quality used for stored frames */
export const STORED_JPEG_QUALITY = 90;

/**
 * Raw 8-bit pixels, interleaved by channel
 */
export interface RawImage {
  data: Buffer;
  width: number;
  height: number;
  channels: number;
}

/**
 * Drop a "data:image/...;base64," prefix if present
 */
export function stripDataUrlPrefix(imageData: string): string {
  const comma = imageData.indexOf(',');
  return comma >= 0 ? imageData.slice(comma + 1) : imageData;
}

/**
 * Decode a client payload into JPEG bytes ready to store
 *
 * Throws DecodeError when the payload is not base64 or not an image.
 */
export async function decodeFrameImage(imageData: string): Promise<Buffer> {
  const base64 = stripDataUrlPrefix(imageData).replace(/\s+/g, '');
  if (base64.length === 0) {
    throw new DecodeError('Empty image data');
  }
  if (!BASE64_PATTERN.test(base64)) {
    throw new DecodeError('Image data is not valid base64');
  }

  const bytes = Buffer.from(base64, 'base64');
  try {
    return await sharp(bytes).rotate().jpeg({ quality: STORED_JPEG_QUALITY }).toBuffer();
  } catch (error) {
    throw new DecodeError(`Failed to decode image: ${errorMessage(error)}`);
  }
}

/**
 * Read an image as single-channel greyscale pixels
 */
export async function readGreyscale(image: Buffer): Promise<RawImage> {
  const { data, info } = await sharp(image).greyscale().raw().toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height, channels: info.channels };
}

/**
 * Mean greyscale brightness (0-255)
 */
export async function meanBrightness(image: Buffer): Promise<number> {
  const raw = await readGreyscale(image);
  const pixelCount = raw.width * raw.height;
  if (pixelCount === 0) {
    throw new DecodeError('Image has no pixels');
  }

  let total = 0;
  for (let i = 0; i < raw.data.length; i += raw.channels) {
    total += raw.data[i];
  }
  return total / pixelCount;
}

/**
 * Resize an image to a model's input and return pixels scaled to [0, 1]
 *
 * The whole frame is stretched to the target size; channels is 1 for
 * greyscale models and 3 for RGB models.
 */
export async function toModelPixels(
  image: Buffer,
  width: number,
  height: number,
  channels: 1 | 3
): Promise<Float32Array> {
  let pipeline = sharp(image).resize(width, height, { fit: 'fill' });
  pipeline = channels === 1 ? pipeline.greyscale() : pipeline.removeAlpha().toColourspace('srgb');

  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  const pixels = new Float32Array(width * height * channels);

  for (let p = 0; p < width * height; p++) {
    for (let c = 0; c < channels; c++) {
      // a greyscale source feeding an RGB model repeats its one channel
      const source = Math.min(c, info.channels - 1);
      pixels[p * channels + c] = data[p * info.channels + source] / 255;
    }
  }

  return pixels;
}
