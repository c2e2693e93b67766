import type { DetectionRecord } from './types';

/**
 * Detections keyed by frame index. Insertion order across frames is not
 * meaningful; `frames()` returns indices sorted ascending.
 */
export class DetectionCollection {
  private readonly byFrame = new Map<number, DetectionRecord[]>();

  /** Replaces the records of a frame. */
  put(frame: number, records: readonly DetectionRecord[]): void {
    this.byFrame.set(frame, [...records]);
  }

  get(frame: number): readonly DetectionRecord[] | undefined {
    return this.byFrame.get(frame);
  }

  has(frame: number): boolean {
    return this.byFrame.has(frame);
  }

  frames(): number[] {
    return [...this.byFrame.keys()].sort((a, b) => a - b);
  }

  /** Total number of records over all frames. */
  count(): number {
    let total = 0;
    for (const records of this.byFrame.values()) total += records.length;
    return total;
  }

  get size(): number {
    return this.byFrame.size;
  }

  toJSON(): Record<string, DetectionRecord[]> {
    const out: Record<string, DetectionRecord[]> = {};
    for (const frame of this.frames()) {
      out[String(frame)] = [...(this.byFrame.get(frame) ?? [])];
    }
    return out;
  }

  toString(): string {
    const lines = this.frames().map((frame) => `  frame ${frame}: ${this.byFrame.get(frame)?.length ?? 0} detections`);
    return [`DetectionCollection (${this.count()} detections in ${this.size} frames)`, ...lines].join('\n');
  }
}
