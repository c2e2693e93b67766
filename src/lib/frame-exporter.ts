/**
 * Stages an image stack as one 8-bit RGB TIFF per time point, the layout
 * the predictor reads from its `source=` folder.
 */
import path from 'path';
import sharp from 'sharp';
import { clamp, logErrorDetails, rangeSize } from './detection-utils';
import type { Axis, CropInterval, ImageStack, Range, RunContext } from './types';

// ==========================================
// TYPES
// ==========================================

/** Channel-last interleaved pixels: index = (y * width + x) * channels + c */
export type Frame = {
  width: number;
  height: number;
  channels: number;
  data: Float64Array;
};

export type Rgb8Frame = {
  width: number;
  height: number;
  channels: 3;
  data: Uint8Array;
};

export const FRAME_EXTENSION = '.tif';

/** File stem of a staged frame: the time index itself. */
export const frameName = (t: number) => String(t);

// ==========================================
// AXIS HELPERS
// ==========================================

function axisSize(image: ImageStack, axis: Axis): number {
  const i = image.axes.indexOf(axis);
  return i < 0 ? 1 : image.shape[i];
}

function axisStride(image: ImageStack, axis: Axis): number {
  const i = image.axes.indexOf(axis);
  if (i < 0) return 0;
  let stride = 1;
  for (let k = 0; k < i; k++) stride *= image.shape[k];
  return stride;
}

function fullRange(image: ImageStack, axis: Axis): Range {
  return [0, axisSize(image, axis) - 1];
}

/** Time points to export, or null when the image has no T axis. */
export function timeRange(image: ImageStack, interval: CropInterval): Range | null {
  if (!image.axes.includes('T')) return null;
  return interval.t ?? fullRange(image, 'T');
}

export function frameCount(image: ImageStack, interval: CropInterval): number {
  const t = timeRange(image, interval);
  return t ? rangeSize(t) : 1;
}

/**
 * Returns a reason when the interval does not fit inside the image.
 */
export function checkInterval(image: ImageStack, interval: CropInterval): string | null {
  const ranges: Array<[Axis, Range | undefined]> = [
    ['X', interval.x],
    ['Y', interval.y],
    ['Z', interval.z],
    ['T', interval.t],
  ];
  for (const [axis, range] of ranges) {
    if (!range) continue;
    const size = axisSize(image, axis);
    const [min, max] = range;
    if (!Number.isInteger(min) || !Number.isInteger(max) || min < 0 || max < min || max >= size) {
      return `${axis} range [${min}, ${max}] is outside the image (size ${size}).`;
    }
  }
  return null;
}

// ==========================================
// FRAME EXTRACTION
// ==========================================

/**
 * Crops time point `t` and lays it out channel-last, whatever the position
 * of C in `image.axes`. A Z range longer than one slice is reduced by
 * maximum-intensity projection.
 */
export function extractFrame(image: ImageStack, interval: CropInterval, t: number): Frame {
  const [x0] = interval.x;
  const [y0] = interval.y;
  const width = rangeSize(interval.x);
  const height = rangeSize(interval.y);
  const single: Range = [0, 0];
  const zRange = image.axes.includes('Z') ? interval.z ?? fullRange(image, 'Z') : single;
  const channels = axisSize(image, 'C');

  const sx = axisStride(image, 'X');
  const sy = axisStride(image, 'Y');
  const sz = axisStride(image, 'Z');
  const sc = axisStride(image, 'C');
  const tOffset = axisStride(image, 'T') * t;

  const data = new Float64Array(width * height * channels);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const base = (x0 + x) * sx + (y0 + y) * sy + tOffset;
      for (let c = 0; c < channels; c++) {
        let value = -Infinity;
        for (let z = zRange[0]; z <= zRange[1]; z++) {
          value = Math.max(value, image.data[base + z * sz + c * sc]);
        }
        data[(y * width + x) * channels + c] = value;
      }
    }
  }

  return { width, height, channels, data };
}

/**
 * Forces a frame into 8-bit RGB. 8-bit RGB input is passed through.
 */
export function toRgb8(frame: Frame, sourceIs8Bit: boolean): Rgb8Frame {
  const { width, height, channels } = frame;
  if (channels === 3 && sourceIs8Bit) {
    return { width, height, channels: 3, data: Uint8Array.from(frame.data) };
  }

  const pixels = width * height;
  const out = new Uint8Array(pixels * 3);
  const used = Math.min(3, channels);

  for (let c = 0; c < used; c++) {
    let min = Infinity;
    let max = -Infinity;
    if (!sourceIs8Bit) {
      for (let p = 0; p < pixels; p++) {
        const v = frame.data[p * channels + c];
        if (v < min) min = v;
        if (v > max) max = v;
      }
    }
    const span = max - min;

    for (let p = 0; p < pixels; p++) {
      const v = frame.data[p * channels + c];
      const mapped = sourceIs8Bit
        ? clamp(Math.round(v), 0, 255)
        : span > 0
          ? Math.round(((v - min) / span) * 255)
          : 0;
      if (channels === 1) {
        out[p * 3] = mapped;
        out[p * 3 + 1] = mapped;
        out[p * 3 + 2] = mapped;
      } else {
        out[p * 3 + c] = mapped;
      }
    }
  }

  return { width, height, channels: 3, data: out };
}

// ==========================================
// EXPORT
// ==========================================

async function writeTiff(frame: Rgb8Frame, filePath: string): Promise<void> {
  const buffer = Buffer.from(frame.data.buffer, frame.data.byteOffset, frame.data.byteLength);
  await sharp(buffer, {
    raw: { width: frame.width, height: frame.height, channels: frame.channels },
  })
    .tiff()
    .toFile(filePath);
}

/**
 * Writes `<folder>/<t>.tif` for every time point of the crop. Stops at the
 * first failed write and returns false; frames already written stay.
 */
export async function resaveSingleTimePoints(
  image: ImageStack,
  interval: CropInterval,
  folder: string,
  ctx: RunContext
): Promise<boolean> {
  const range = timeRange(image, interval);
  const times: number[] = [];
  if (range) {
    for (let t = range[0]; t <= range[1]; t++) times.push(t);
  } else {
    times.push(0);
  }

  const sourceIs8Bit = image.data instanceof Uint8Array;

  for (let i = 0; i < times.length; i++) {
    const t = times[i];
    if (ctx.signal?.aborted) {
      ctx.logger.error(`Export aborted before frame ${t}.`);
      return false;
    }

    const filePath = path.join(folder, frameName(t) + FRAME_EXTENSION);
    try {
      const frame = toRgb8(extractFrame(image, interval, t), sourceIs8Bit);
      await writeTiff(frame, filePath);
    } catch (error) {
      logErrorDetails(ctx.logger, `❌ Could not write frame ${t} to ${filePath}. `, error);
      return false;
    }

    ctx.logger.setProgress((i + 1) / times.length);
  }

  return true;
}
