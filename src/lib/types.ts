import { z } from 'zod';

// ==========================================
// IMAGE
// ==========================================

export const AXES = ['X', 'Y', 'Z', 'C', 'T'] as const;
export type Axis = (typeof AXES)[number];

export type PixelArray =
  | Uint8Array
  | Uint16Array
  | Int16Array
  | Uint32Array
  | Int32Array
  | Float32Array
  | Float64Array;

export type Calibration = {
  x: number;
  y: number;
  z: number;
};

/**
 * An axis-labelled pixel array. The first axis varies fastest in `data`.
 */
export type ImageStack = {
  name?: string;
  axes: Axis[];
  shape: number[];
  data: PixelArray;
  calibration: Calibration;
};

/** Inclusive pixel index range. */
export type Range = [number, number];

export type CropInterval = {
  x: Range;
  y: Range;
  z?: Range;
  t?: Range;
};

const isPixelArray = (value: unknown): value is PixelArray =>
  value instanceof Uint8Array ||
  value instanceof Uint16Array ||
  value instanceof Int16Array ||
  value instanceof Uint32Array ||
  value instanceof Int32Array ||
  value instanceof Float32Array ||
  value instanceof Float64Array;

export const ImageStackSchema = z
  .object({
    name: z.string().optional(),
    axes: z.array(z.enum(AXES)).min(2),
    shape: z.array(z.number().int().positive()),
    data: z.custom<PixelArray>(isPixelArray, { message: 'Expected a typed pixel array' }),
    calibration: z.object({
      x: z.number().positive(),
      y: z.number().positive(),
      z: z.number().positive(),
    }),
  })
  .superRefine((image, ctx) => {
    if (new Set(image.axes).size !== image.axes.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['axes'], message: 'Axes must be unique' });
    }
    if (!image.axes.includes('X') || !image.axes.includes('Y')) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['axes'], message: 'X and Y axes are required' });
    }
    if (image.shape.length !== image.axes.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['shape'],
        message: `Expected ${image.axes.length} dimensions, got ${image.shape.length}`,
      });
      return;
    }
    const expected = image.shape.reduce((acc, n) => acc * n, 1);
    if (image.data.length !== expected) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['data'],
        message: `Expected ${expected} pixels, got ${image.data.length}`,
      });
    }
  });

// ==========================================
// DETECTIONS
// ==========================================

export type DetectionRecord = Readonly<{
  x: number;
  y: number;
  z: number;
  radius: number;
  quality: number;
  classId: number;
}>;

export type ProgressEvent =
  | { type: 'frame-completed'; done: number; total: number }
  | { type: 'log-line'; line: string };

// ==========================================
// RUN CONTEXT
// ==========================================

export type RunLogger = {
  log(message: string): void;
  error(message: string): void;
  setStatus(status: string): void;
  setProgress(fraction: number): void;
};

export type RunContext = {
  logger: RunLogger;
  signal?: AbortSignal;
};

export type RunState =
  | 'idle'
  | 'staging'
  | 'configuring'
  | 'launching'
  | 'running'
  | 'ingesting'
  | 'done'
  | 'failed';
