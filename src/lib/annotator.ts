import sharp from 'sharp';
import type { Calibration, CropInterval, DetectionRecord } from './types';

export type PixelCircle = {
  cx: number;
  cy: number;
  r: number;
  classId: number;
  quality: number;
};

/** Stroke colours cycled by class id. */
export const CLASS_COLORS = ['#ffd400', '#00e5ff', '#ff4fd8', '#7cff4f', '#ff8a00', '#b388ff'] as const;

export function colorForClass(classId: number): string {
  const n = CLASS_COLORS.length;
  return CLASS_COLORS[((Math.trunc(classId) % n) + n) % n];
}

/**
 * Physical detection -> pixel circle inside the staged crop.
 */
export function toPixelCircle(
  detection: DetectionRecord,
  interval: CropInterval,
  calibration: Calibration
): PixelCircle {
  return {
    cx: detection.x / calibration.x - interval.x[0],
    cy: detection.y / calibration.y - interval.y[0],
    r: detection.radius / ((calibration.x + calibration.y) / 2),
    classId: detection.classId,
    quality: detection.quality,
  };
}

export function buildSvg(width: number, height: number, circles: PixelCircle[]): string {
  const thickness = Math.max(1, Math.round(Math.min(width, height) / 400));
  const fontSize = Math.max(10, Math.round(Math.min(width, height) / 60));

  const elements = circles
    .map((circle) => {
      const color = colorForClass(circle.classId);
      const label = circle.quality.toFixed(2);
      return `
  <circle cx="${circle.cx.toFixed(1)}" cy="${circle.cy.toFixed(1)}" r="${circle.r.toFixed(1)}" fill="none" stroke="${color}" stroke-width="${thickness}" />
  <text x="${(circle.cx + circle.r + 2).toFixed(1)}" y="${circle.cy.toFixed(1)}" font-size="${fontSize}" font-family="system-ui, -apple-system, Segoe UI, sans-serif" fill="${color}" dominant-baseline="middle">${label}</text>
`;
    })
    .join('\n');

  return `
<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">
${elements}
</svg>
`.trim();
}

/**
 * Draws the detections of one frame over its staged image. The output
 * format follows the extension of `outputPath`.
 */
export async function annotateFrame(options: {
  framePath: string;
  detections: readonly DetectionRecord[];
  interval: CropInterval;
  calibration: Calibration;
  outputPath: string;
}) {
  const base = sharp(options.framePath);
  const metadata = await base.metadata();

  if (!metadata.width || !metadata.height) {
    throw new Error(`Unable to read image dimensions of ${options.framePath}.`);
  }

  if (options.detections.length === 0) {
    await sharp(options.framePath).toFile(options.outputPath);
    return;
  }

  const circles = options.detections.map((d) => toPixelCircle(d, options.interval, options.calibration));
  const svg = buildSvg(metadata.width, metadata.height, circles);
  await base.composite([{ input: Buffer.from(svg), top: 0, left: 0 }]).toFile(options.outputPath);
}
