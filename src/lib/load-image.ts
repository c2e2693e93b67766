import path from 'path';
import sharp from 'sharp';
import type { ImageStack } from './types';

export type LoadImageOptions = {
  /** Physical size of one pixel (default: 1 x 1) */
  pixelSize?: { x: number; y: number };
};

/**
 * Reads an image file into an ImageStack. Every page of a multi-page file
 * (TIFF stack, animated GIF/WebP) becomes one time point. Alpha is dropped;
 * 16-bit data stays 16-bit, anything else is read as 8-bit.
 */
export async function loadImageStack(imagePath: string, options: LoadImageOptions = {}): Promise<ImageStack> {
  const metadata = await sharp(imagePath).metadata();
  if (!metadata.width || !metadata.height) {
    throw new Error(`Unable to read image dimensions of ${imagePath}.`);
  }

  const pages = metadata.pages ?? 1;
  const sixteenBit = metadata.depth === 'ushort';

  let width = 0;
  let height = 0;
  let channels = 0;
  const planes: Buffer[] = [];

  for (let page = 0; page < pages; page++) {
    const { data, info } = await sharp(imagePath, { page })
      .removeAlpha()
      .raw({ depth: sixteenBit ? 'ushort' : 'uchar' })
      .toBuffer({ resolveWithObject: true });

    if (page === 0) {
      ({ width, height, channels } = info);
    } else if (info.width !== width || info.height !== height || info.channels !== channels) {
      throw new Error(`Page ${page} of ${imagePath} differs in size from page 0.`);
    }
    planes.push(data);
  }

  const raw = Buffer.concat(planes);
  const pixelCount = width * height * channels * pages;
  let data: Uint8Array | Uint16Array;
  if (sixteenBit) {
    data = new Uint16Array(pixelCount);
    for (let i = 0; i < pixelCount; i++) data[i] = raw.readUInt16LE(i * 2);
  } else {
    data = Uint8Array.from(raw.subarray(0, pixelCount));
  }

  // sharp's raw output is interleaved: channel fastest, then x, then y.
  const pixelSize = options.pixelSize ?? { x: 1, y: 1 };
  return {
    name: path.basename(imagePath),
    axes: pages > 1 ? ['C', 'X', 'Y', 'T'] : ['C', 'X', 'Y'],
    shape: pages > 1 ? [channels, width, height, pages] : [channels, width, height],
    data,
    calibration: { x: pixelSize.x, y: pixelSize.y, z: 1 },
  };
}
