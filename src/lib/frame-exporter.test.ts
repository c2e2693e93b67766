import fs from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  checkInterval,
  extractFrame,
  frameCount,
  resaveSingleTimePoints,
  toRgb8,
} from './frame-exporter';
import type { CropInterval, ImageStack, RunContext } from './types';

const calibration = { x: 1, y: 1, z: 1 };

function makeContext() {
  const logger = { log: vi.fn(), error: vi.fn(), setStatus: vi.fn(), setProgress: vi.fn() };
  const ctx: RunContext = { logger };
  return { ctx, logger };
}

describe('extractFrame', () => {
  it('lays out channels last whatever the axis order', () => {
    const xyc: ImageStack = {
      axes: ['X', 'Y', 'C'],
      shape: [2, 2, 2],
      data: Uint8Array.from([1, 2, 3, 4, 10, 20, 30, 40]),
      calibration,
    };
    const cxy: ImageStack = {
      axes: ['C', 'X', 'Y'],
      shape: [2, 2, 2],
      data: Uint8Array.from([1, 10, 2, 20, 3, 30, 4, 40]),
      calibration,
    };
    const interval: CropInterval = { x: [0, 1], y: [0, 1] };

    const a = extractFrame(xyc, interval, 0);
    const b = extractFrame(cxy, interval, 0);
    expect(a.channels).toBe(2);
    expect(Array.from(a.data)).toEqual([1, 10, 2, 20, 3, 30, 4, 40]);
    expect(Array.from(b.data)).toEqual(Array.from(a.data));
  });

  it('crops to the interval', () => {
    const image: ImageStack = {
      axes: ['X', 'Y', 'C'],
      shape: [2, 2, 2],
      data: Uint8Array.from([1, 2, 3, 4, 10, 20, 30, 40]),
      calibration,
    };
    const frame = extractFrame(image, { x: [1, 1], y: [0, 1] }, 0);
    expect(frame.width).toBe(1);
    expect(frame.height).toBe(2);
    expect(Array.from(frame.data)).toEqual([2, 20, 4, 40]);
  });

  it('selects the requested time point', () => {
    const image: ImageStack = {
      axes: ['X', 'Y', 'T'],
      shape: [2, 1, 3],
      data: Uint8Array.from([1, 2, 3, 4, 5, 6]),
      calibration,
    };
    expect(Array.from(extractFrame(image, { x: [0, 1], y: [0, 0] }, 2).data)).toEqual([5, 6]);
  });

  it('projects a Z range by maximum intensity', () => {
    const image: ImageStack = {
      axes: ['X', 'Y', 'Z'],
      shape: [2, 1, 2],
      data: Uint8Array.from([1, 9, 7, 3]),
      calibration,
    };
    expect(Array.from(extractFrame(image, { x: [0, 1], y: [0, 0] }, 0).data)).toEqual([7, 9]);
    expect(Array.from(extractFrame(image, { x: [0, 1], y: [0, 0], z: [1, 1] }, 0).data)).toEqual([7, 3]);
  });
});

describe('toRgb8', () => {
  it('replicates a single 8-bit channel', () => {
    const rgb = toRgb8({ width: 2, height: 1, channels: 1, data: Float64Array.from([7, 9]) }, true);
    expect(Array.from(rgb.data)).toEqual([7, 7, 7, 9, 9, 9]);
  });

  it('passes 8-bit RGB through unchanged', () => {
    const rgb = toRgb8({ width: 1, height: 1, channels: 3, data: Float64Array.from([1, 2, 3]) }, true);
    expect(Array.from(rgb.data)).toEqual([1, 2, 3]);
  });

  it('scales deeper data from min..max to 0..255', () => {
    const rgb = toRgb8({ width: 3, height: 1, channels: 1, data: Float64Array.from([100, 300, 200]) }, false);
    expect(Array.from(rgb.data)).toEqual([0, 0, 0, 255, 255, 255, 128, 128, 128]);
  });

  it('maps a flat channel to black', () => {
    const rgb = toRgb8({ width: 2, height: 1, channels: 1, data: Float64Array.from([5, 5]) }, false);
    expect(Array.from(rgb.data)).toEqual([0, 0, 0, 0, 0, 0]);
  });

  it('puts two channels in red and green', () => {
    const rgb = toRgb8({ width: 2, height: 1, channels: 2, data: Float64Array.from([1, 10, 2, 20]) }, true);
    expect(Array.from(rgb.data)).toEqual([1, 10, 0, 2, 20, 0]);
  });
});

describe('frameCount / checkInterval', () => {
  const image: ImageStack = {
    axes: ['X', 'Y', 'T'],
    shape: [4, 3, 5],
    data: new Uint8Array(60),
    calibration,
  };

  it('counts time points of the crop', () => {
    expect(frameCount(image, { x: [0, 3], y: [0, 2] })).toBe(5);
    expect(frameCount(image, { x: [0, 3], y: [0, 2], t: [1, 2] })).toBe(2);
    expect(frameCount({ ...image, axes: ['X', 'Y', 'C'] }, { x: [0, 3], y: [0, 2] })).toBe(1);
  });

  it('rejects ranges outside the image', () => {
    expect(checkInterval(image, { x: [0, 3], y: [0, 2] })).toBeNull();
    expect(checkInterval(image, { x: [0, 4], y: [0, 2] })).toBe('X range [0, 4] is outside the image (size 4).');
    expect(checkInterval(image, { x: [0, 3], y: [2, 1] })).toBe('Y range [2, 1] is outside the image (size 3).');
  });
});

describe('resaveSingleTimePoints', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'frame-exporter-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const movie: ImageStack = {
    axes: ['X', 'Y', 'T'],
    shape: [4, 3, 3],
    data: Uint8Array.from({ length: 36 }, (_, i) => i * 7),
    calibration,
  };

  it('writes one RGB TIFF per time point', async () => {
    const { ctx, logger } = makeContext();
    const ok = await resaveSingleTimePoints(movie, { x: [0, 3], y: [0, 2] }, dir, ctx);

    expect(ok).toBe(true);
    expect(fs.readdirSync(dir).sort()).toEqual(['0.tif', '1.tif', '2.tif']);
    expect(logger.setProgress.mock.calls.map(([p]) => p)).toEqual([1 / 3, 2 / 3, 1]);

    const metadata = await sharp(path.join(dir, '1.tif')).metadata();
    expect(metadata.width).toBe(4);
    expect(metadata.height).toBe(3);
    expect(metadata.channels).toBe(3);
  });

  it('names frames by their absolute time index', async () => {
    const { ctx } = makeContext();
    await resaveSingleTimePoints(movie, { x: [1, 2], y: [0, 1], t: [1, 2] }, dir, ctx);
    expect(fs.readdirSync(dir).sort()).toEqual(['1.tif', '2.tif']);
  });

  it('writes a single 0.tif without a time axis', async () => {
    const { ctx } = makeContext();
    const still: ImageStack = { axes: ['X', 'Y'], shape: [2, 2], data: Uint8Array.from([0, 1, 2, 3]), calibration };
    expect(await resaveSingleTimePoints(still, { x: [0, 1], y: [0, 1] }, dir, ctx)).toBe(true);
    expect(fs.readdirSync(dir)).toEqual(['0.tif']);
  });

  it('stops at the first failed write', async () => {
    const { ctx, logger } = makeContext();
    const ok = await resaveSingleTimePoints(movie, { x: [0, 3], y: [0, 2] }, path.join(dir, 'missing'), ctx);
    expect(ok).toBe(false);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.setProgress).not.toHaveBeenCalled();
  });
});
