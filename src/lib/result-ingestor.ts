/**
 * Reads the predictor's `save_txt` output back into calibrated detections.
 *
 * Each results file holds one detection per line:
 *
 *   class_id center_x center_y width height [confidence]
 *
 * with center and size normalized to [0, 1] relative to the crop that was
 * staged.
 */
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { DetectionCollection } from './detection-collection';
import { cropSize, logErrorDetails } from './detection-utils';
import { createTaskPool } from './pool';
import type { Calibration, CropInterval, DetectionRecord, RunContext } from './types';

// ==========================================
// CONSTANTS
// ==========================================

/** Where results land below the `project=` folder. */
export const RESULTS_SUBFOLDER = path.join('predict', 'labels');
export const RESULT_EXTENSION = '.txt';

/** Last run of digits right before the extension. */
export const FRAME_INDEX_PATTERN = /(\d+)(?=\.[^.]+$)/;

export const DEFAULT_INGEST_CONCURRENCY = 4;

// ==========================================
// LINE PARSING
// ==========================================

export type BoxLine = {
  kind: 'box';
  classId: number;
  cx: number;
  cy: number;
  w: number;
  h: number;
};

export type ScoredLine = Omit<BoxLine, 'kind'> & {
  kind: 'scored';
  confidence: number;
};

export type InvalidLine = {
  kind: 'invalid';
  problem: 'field-count' | 'non-numeric';
  fieldCount: number;
  reason: string;
};

const PROBLEM_TEXT: Record<InvalidLine['problem'], string> = {
  'field-count': 'has an unexpected number of values',
  'non-numeric': 'has a value that is not a number',
};

export type ResultLine = BoxLine | ScoredLine | InvalidLine;

const NumericField = z.coerce.number().finite();
const BoxFieldsSchema = z.tuple([NumericField, NumericField, NumericField, NumericField, NumericField]);
const ScoredFieldsSchema = z.tuple([
  NumericField,
  NumericField,
  NumericField,
  NumericField,
  NumericField,
  NumericField,
]);

export function parseResultLine(line: string): ResultLine {
  const fields = line.trim().split(/\s+/).filter(Boolean);
  const fieldCount = fields.length;

  if (fieldCount < 5) {
    return {
      kind: 'invalid',
      problem: 'field-count',
      fieldCount,
      reason: `Should be at least 5, but was ${fieldCount}.`,
    };
  }

  if (fieldCount >= 6) {
    const parsed = ScoredFieldsSchema.safeParse(fields.slice(0, 6));
    if (!parsed.success) {
      return {
        kind: 'invalid',
        problem: 'non-numeric',
        fieldCount,
        reason: `Non-numeric value in "${fields.slice(0, 6).join(' ')}".`,
      };
    }
    const [classId, cx, cy, w, h, confidence] = parsed.data;
    return { kind: 'scored', classId, cx, cy, w, h, confidence };
  }

  const parsed = BoxFieldsSchema.safeParse(fields);
  if (!parsed.success) {
    return {
      kind: 'invalid',
      problem: 'non-numeric',
      fieldCount,
      reason: `Non-numeric value in "${fields.join(' ')}".`,
    };
  }
  const [classId, cx, cy, w, h] = parsed.data;
  return { kind: 'box', classId, cx, cy, w, h };
}

// ==========================================
// COORDINATE TRANSFORMATION
// ==========================================

/**
 * Maps a normalized box to physical coordinates of the full image. The
 * radius is half the mean of the calibrated width and height, halved once
 * more: r = 0.5 * (w + h) / 2.
 */
export function toDetection(
  line: BoxLine | ScoredLine,
  interval: CropInterval,
  calibration: Calibration
): DetectionRecord {
  const { width, height } = cropSize(interval);
  const x0 = interval.x[0];
  const y0 = interval.y[0];

  const x = calibration.x * (x0 + line.cx * width);
  const y = calibration.y * (y0 + line.cy * height);
  const w = calibration.x * line.w * width;
  const h = calibration.y * line.h * height;
  const radius = (0.5 * (w + h)) / 2;

  return Object.freeze({
    x,
    y,
    z: 0,
    radius,
    quality: line.kind === 'scored' ? line.confidence : 1,
    classId: line.classId,
  });
}

// ==========================================
// FILES
// ==========================================

/**
 * Frame index from a results file name, or null when the name carries no
 * digits right before its extension. `base` is the index the predictor
 * gives the first frame.
 */
export function extractFrameIndex(fileName: string, base: 0 | 1 = 0): number | null {
  const match = FRAME_INDEX_PATTERN.exec(path.basename(fileName));
  if (!match) return null;
  return Number.parseInt(match[1], 10) - base;
}

/**
 * Parses one results file. Malformed lines are reported and skipped; a file
 * that cannot be read gives null.
 */
export async function importResultFile(
  filePath: string,
  interval: CropInterval,
  calibration: Calibration,
  ctx: RunContext
): Promise<DetectionRecord[] | null> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    logErrorDetails(ctx.logger, `[YOLO] Error reading the file ${filePath}. `, error);
    return null;
  }

  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();

  const records: DetectionRecord[] = [];
  lines.forEach((line, i) => {
    const parsed = parseResultLine(line);
    if (parsed.kind === 'invalid') {
      ctx.logger.error(
        `[YOLO] Line ${i + 1} in file ${filePath} ${PROBLEM_TEXT[parsed.problem]}. ${parsed.reason}\n`
      );
      return;
    }
    records.push(toDetection(parsed, interval, calibration));
  });
  return records;
}

export type IngestOptions = {
  labelsFolder: string;
  interval: CropInterval;
  calibration: Calibration;
  collection: DetectionCollection;
  ctx: RunContext;
  frameIndexBase?: 0 | 1;
  concurrency?: number;
};

/**
 * Fills `collection` from every results file in `labelsFolder`. Only a
 * failure to list the folder rejects; per-file problems are logged and
 * skipped. Resolves to the number of files ingested.
 */
export async function ingestResults(options: IngestOptions): Promise<number> {
  const { labelsFolder, interval, calibration, collection, ctx } = options;
  const base = options.frameIndexBase ?? 0;

  const entries = await fs.promises.readdir(labelsFolder, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(RESULT_EXTENSION))
    .map((entry) => path.join(labelsFolder, entry.name))
    .sort();

  const parsePool = createTaskPool({
    maxConcurrency: options.concurrency ?? DEFAULT_INGEST_CONCURRENCY,
    name: 'ingest',
  });
  const collectionLock = createTaskPool({ maxConcurrency: 1, name: 'collection-lock' });
  let ingested = 0;

  await Promise.all(
    files.map((file) =>
      parsePool.run(async () => {
        const frame = extractFrameIndex(file, base);
        if (frame === null) {
          ctx.logger.error(
            `[YOLO] Could not find the time-point indication in the filename of file: ${file}. Skipping.\n`
          );
          return;
        }
        if (frame < 0) {
          ctx.logger.error(`[YOLO] Frame index of file ${file} is below the first index ${base}. Skipping.\n`);
          return;
        }

        const records = await importResultFile(file, interval, calibration, ctx);
        if (!records) return;

        await collectionLock.run(() => {
          collection.put(frame, records);
          ingested++;
        });
      })
    )
  );

  return ingested;
}
