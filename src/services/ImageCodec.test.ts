import { describe, expect, it } from 'vitest';
import sharp from 'sharp';
import { decodeFrameImage, meanBrightness, stripDataUrlPrefix, toModelPixels } from './ImageCodec';
import { DecodeError } from '../domain/errors';
import { CORRUPT_DATA_URL, solidDataUrl, solidJpeg } from '../test-utils/fixtures';

describe('stripDataUrlPrefix', () => {
  it('removes everything up to the first comma', () => {
    expect(stripDataUrlPrefix('data:image/jpeg;base64,AAAA')).toBe('AAAA');
  });

  it('leaves bare base64 alone', () => {
    expect(stripDataUrlPrefix('AAAA')).toBe('AAAA');
  });
});

describe('decodeFrameImage', () => {
  it('decodes a data URL into JPEG bytes', async () => {
    const jpeg = await decodeFrameImage(await solidDataUrl(200));
    const metadata = await sharp(jpeg).metadata();

    expect(metadata.format).toBe('jpeg');
    expect(metadata.width).toBe(8);
    expect(metadata.height).toBe(8);
  });

  it('accepts bare base64', async () => {
    const base64 = (await solidJpeg(50)).toString('base64');
    const jpeg = await decodeFrameImage(base64);

    expect((await sharp(jpeg).metadata()).format).toBe('jpeg');
  });

  it('rejects invalid base64', async () => {
    await expect(decodeFrameImage(CORRUPT_DATA_URL)).rejects.toThrow('Image data is not valid base64');
  });

  it('rejects empty payloads', async () => {
    await expect(decodeFrameImage('data:image/jpeg;base64,')).rejects.toThrow('Empty image data');
  });

  it('rejects base64 that is not an image', async () => {
    const error = await decodeFrameImage(Buffer.from('hello world').toString('base64')).catch(e => e);

    expect(error).toBeInstanceOf(DecodeError);
    expect(error.message).toMatch(/^Failed to decode image/);
  });
});

describe('meanBrightness', () => {
  it('is 255 for a white frame and 0 for a black one', async () => {
    expect(await meanBrightness(await solidJpeg(255))).toBe(255);
    expect(await meanBrightness(await solidJpeg(0))).toBe(0);
  });
});

describe('toModelPixels', () => {
  it('resizes to the model input and scales to 0-1', async () => {
    const pixels = await toModelPixels(await solidJpeg(255), 4, 4, 1);

    expect(pixels).toHaveLength(16);
    expect(Array.from(pixels).every(v => v === 1)).toBe(true);
  });

  it('produces three channels for RGB models', async () => {
    const pixels = await toModelPixels(await solidJpeg(0), 2, 2, 3);

    expect(pixels).toHaveLength(12);
    expect(Array.from(pixels).every(v => v === 0)).toBe(true);
  });
});
