import type { ProgressEvent } from './types';

/** One line per processed image, e.g. "image 3/12 /tmp/.../2.tif: 640x640 4 cells, 11.2ms" */
export const IMAGE_DONE_PATTERN = /^image \d+\/\d+.*/;

/**
 * Turns predictor log lines into progress events. The done counter only
 * moves forward and stops at `total`.
 */
export class PredictLogListener {
  private readonly total: number;
  private readonly emit: (event: ProgressEvent) => void;
  private done = 0;

  constructor(total: number, emit: (event: ProgressEvent) => void) {
    this.total = total;
    this.emit = emit;
  }

  get completed(): number {
    return this.done;
  }

  handle(line: string): void {
    if (IMAGE_DONE_PATTERN.test(line)) {
      this.done = Math.min(this.total, this.done + 1);
      this.emit({ type: 'frame-completed', done: this.done, total: this.total });
      return;
    }
    if (line.trim()) {
      this.emit({ type: 'log-line', line });
    }
  }
}

/**
 * Default routing of progress events to a logger: fractions for frames,
 * indented raw lines for everything else.
 */
export function progressToLogger(logger: {
  log(message: string): void;
  setProgress(fraction: number): void;
}): (event: ProgressEvent) => void {
  return (event) => {
    if (event.type === 'frame-completed') {
      logger.setProgress(event.total > 0 ? event.done / event.total : 1);
    } else {
      logger.log(` - ${event.line}\n`);
    }
  };
}
