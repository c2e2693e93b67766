import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DetectionCollection } from './detection-collection';
import {
  extractFrameIndex,
  importResultFile,
  ingestResults,
  parseResultLine,
  toDetection,
} from './result-ingestor';
import type { CropInterval, RunContext } from './types';

function makeContext() {
  const logger = { log: vi.fn(), error: vi.fn(), setStatus: vi.fn(), setProgress: vi.fn() };
  const ctx: RunContext = { logger };
  return { ctx, logger };
}

const unit = { x: 1, y: 1, z: 1 };
const hundred: CropInterval = { x: [0, 99], y: [0, 99] };

describe('parseResultLine', () => {
  it('reads a box without confidence', () => {
    expect(parseResultLine('0 0.5 0.5 0.2 0.2')).toEqual({
      kind: 'box',
      classId: 0,
      cx: 0.5,
      cy: 0.5,
      w: 0.2,
      h: 0.2,
    });
  });

  it('reads a box with confidence', () => {
    expect(parseResultLine('2 0.1 0.9 0.05 0.07 0.83')).toEqual({
      kind: 'scored',
      classId: 2,
      cx: 0.1,
      cy: 0.9,
      w: 0.05,
      h: 0.07,
      confidence: 0.83,
    });
  });

  it('splits on any whitespace', () => {
    expect(parseResultLine('  0\t0.5  0.5 0.2 0.2 ').kind).toBe('box');
  });

  it('rejects short and non-numeric lines', () => {
    expect(parseResultLine('0 0.1 0.2')).toEqual({
      kind: 'invalid',
      problem: 'field-count',
      fieldCount: 3,
      reason: 'Should be at least 5, but was 3.',
    });
    expect(parseResultLine('')).toMatchObject({ kind: 'invalid', fieldCount: 0 });
    expect(parseResultLine('0 0.5 abc 0.2 0.2')).toMatchObject({
      kind: 'invalid',
      problem: 'non-numeric',
      fieldCount: 5,
    });
  });
});

describe('toDetection', () => {
  it('maps the center of a 100 px crop to (50, 50)', () => {
    const line = parseResultLine('0 0.5 0.5 0.2 0.2');
    if (line.kind === 'invalid') throw new Error('unexpected invalid line');

    const detection = toDetection(line, hundred, unit);
    expect(detection.x).toBe(50);
    expect(detection.y).toBe(50);
    expect(detection.z).toBe(0);
    // 0.25 * 1 * 0.2 * 100 + 0.25 * 1 * 0.2 * 100
    expect(detection.radius).toBeCloseTo(10, 10);
    expect(detection.quality).toBe(1);
  });

  it('applies crop offset and per-axis calibration', () => {
    const line = parseResultLine('1 0.5 0.25 0.1 0.2 0.75');
    if (line.kind === 'invalid') throw new Error('unexpected invalid line');

    const detection = toDetection(line, { x: [10, 59], y: [20, 39] }, { x: 0.5, y: 2, z: 1 });
    expect(detection.x).toBeCloseTo(17.5, 10);
    expect(detection.y).toBeCloseTo(50, 10);
    // w = 0.5 * 0.1 * 50 = 2.5, h = 2 * 0.2 * 20 = 8, r = 0.5 * (w + h) / 2
    expect(detection.radius).toBeCloseTo(2.625, 10);
    expect(detection.quality).toBe(0.75);
    expect(detection.classId).toBe(1);
    expect(Object.isFrozen(detection)).toBe(true);
  });
});

describe('extractFrameIndex', () => {
  it('takes the digits right before the extension', () => {
    expect(extractFrameIndex('7.txt')).toBe(7);
    expect(extractFrameIndex('image_07.txt')).toBe(7);
    expect(extractFrameIndex('a.b.12.txt')).toBe(12);
    expect(extractFrameIndex('/tmp/run3/5.txt')).toBe(5);
  });

  it('returns null without such digits', () => {
    expect(extractFrameIndex('frame.txt')).toBeNull();
    expect(extractFrameIndex('12frame.txt')).toBeNull();
  });

  it('shifts one-based names', () => {
    expect(extractFrameIndex('1.txt', 1)).toBe(0);
    expect(extractFrameIndex('10.txt', 1)).toBe(9);
  });
});

describe('result files', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'result-ingestor-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('skips malformed lines with one diagnostic each', async () => {
    const file = path.join(dir, '0.txt');
    fs.writeFileSync(file, '0 0.5 0.5 0.2 0.2 0.8\n0 0.1 0.2\n');
    const { ctx, logger } = makeContext();

    const records = await importResultFile(file, hundred, unit, ctx);

    expect(records).toHaveLength(1);
    expect(records?.[0].quality).toBe(0.8);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      `[YOLO] Line 2 in file ${file} has an unexpected number of values. Should be at least 5, but was 3.\n`
    );
  });

  it('reports a non-numeric value as such', async () => {
    const file = path.join(dir, '1.txt');
    fs.writeFileSync(file, '0 0.5 abc 0.2 0.2\n');
    const { ctx, logger } = makeContext();

    expect(await importResultFile(file, hundred, unit, ctx)).toEqual([]);
    expect(logger.error).toHaveBeenCalledWith(
      `[YOLO] Line 1 in file ${file} has a value that is not a number. Non-numeric value in "0 0.5 abc 0.2 0.2".\n`
    );
  });

  it('gives an empty list for an empty file', async () => {
    const file = path.join(dir, '3.txt');
    fs.writeFileSync(file, '');
    const { ctx, logger } = makeContext();

    expect(await importResultFile(file, hundred, unit, ctx)).toEqual([]);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('returns null for an unreadable file', async () => {
    const { ctx, logger } = makeContext();
    expect(await importResultFile(path.join(dir, 'nope.txt'), hundred, unit, ctx)).toBeNull();
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('ingests every results file of the folder by frame', async () => {
    fs.writeFileSync(path.join(dir, '0.txt'), '0 0.5 0.5 0.2 0.2 0.9\n');
    fs.writeFileSync(path.join(dir, '3.txt'), '0 0.1 0.1 0.1 0.1\n1 0.9 0.9 0.1 0.1 0.4\n');
    fs.writeFileSync(path.join(dir, 'frame.txt'), '0 0.5 0.5 0.2 0.2\n');
    fs.writeFileSync(path.join(dir, 'notes.md'), 'not a result\n');
    fs.mkdirSync(path.join(dir, '9.txt'));
    const { ctx, logger } = makeContext();
    const collection = new DetectionCollection();

    const files = await ingestResults({
      labelsFolder: dir,
      interval: hundred,
      calibration: unit,
      collection,
      ctx,
      concurrency: 2,
    });

    expect(files).toBe(2);
    expect(collection.frames()).toEqual([0, 3]);
    expect(collection.get(3)).toHaveLength(2);
    expect(collection.count()).toBe(3);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      `[YOLO] Could not find the time-point indication in the filename of file: ${path.join(dir, 'frame.txt')}. Skipping.\n`
    );
  });

  it('applies a one-based naming convention', async () => {
    fs.writeFileSync(path.join(dir, '1.txt'), '0 0.5 0.5 0.2 0.2\n');
    fs.writeFileSync(path.join(dir, '2.txt'), '0 0.5 0.5 0.2 0.2\n');
    const { ctx } = makeContext();
    const collection = new DetectionCollection();

    await ingestResults({ labelsFolder: dir, interval: hundred, calibration: unit, collection, ctx, frameIndexBase: 1 });

    expect(collection.frames()).toEqual([0, 1]);
  });

  it('skips a file numbered below a one-based first index', async () => {
    fs.writeFileSync(path.join(dir, '0.txt'), '0 0.5 0.5 0.2 0.2\n');
    fs.writeFileSync(path.join(dir, '1.txt'), '0 0.5 0.5 0.2 0.2\n');
    const { ctx, logger } = makeContext();
    const collection = new DetectionCollection();

    const files = await ingestResults({
      labelsFolder: dir,
      interval: hundred,
      calibration: unit,
      collection,
      ctx,
      frameIndexBase: 1,
    });

    expect(files).toBe(1);
    expect(collection.frames()).toEqual([0]);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      `[YOLO] Frame index of file ${path.join(dir, '0.txt')} is below the first index 1. Skipping.\n`
    );
  });

  it('rejects when the folder cannot be listed', async () => {
    const { ctx } = makeContext();
    await expect(
      ingestResults({
        labelsFolder: path.join(dir, 'missing'),
        interval: hundred,
        calibration: unit,
        collection: new DetectionCollection(),
        ctx,
      })
    ).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
