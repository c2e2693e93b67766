import fs from 'fs';
import type { FileHandle } from 'fs/promises';
import { StringDecoder } from 'string_decoder';
import { errorCode } from './detection-utils';

export type TailerHandler = {
  line(line: string): void;
  error?(error: unknown): void;
};

export type TailerOptions = {
  /** Poll interval in ms (default: 200) */
  delayMs?: number;
};

export const DEFAULT_TAIL_DELAY_MS = 200;

const LINE_BREAK = /\r?\n|\r/;

/**
 * Follows a growing text file from its first byte, handing each complete
 * line to the handler. The file may not exist yet when tailing starts.
 */
export class LogTailer {
  private readonly file: string;
  private readonly handler: TailerHandler;
  private readonly delayMs: number;
  private position = 0;
  private remainder = '';
  private decoder = new StringDecoder('utf8');
  private timer: NodeJS.Timeout | null = null;
  private pending: Promise<void> | null = null;
  private started = false;
  private stopped = false;

  constructor(file: string, handler: TailerHandler, options: TailerOptions = {}) {
    this.file = file;
    this.handler = handler;
    this.delayMs = options.delayMs ?? DEFAULT_TAIL_DELAY_MS;
  }

  get isRunning(): boolean {
    return this.started && !this.stopped;
  }

  start(): void {
    if (this.started || this.stopped) return;
    this.started = true;
    this.schedule(0);
  }

  /**
   * Stops polling, then reads whatever the file still holds, including a
   * last line with no line break.
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.pending) await this.pending;
    if (!this.started) return;

    try {
      await this.readNewContent();
    } catch (error) {
      this.reportError(error);
    }

    const last = this.remainder + this.decoder.end();
    this.remainder = '';
    if (last) this.emit(last);
  }

  // ==========================================
  // POLLING
  // ==========================================

  private schedule(delay: number) {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.pending = this.poll();
    }, delay);
  }

  private async poll(): Promise<void> {
    try {
      await this.readNewContent();
    } catch (error) {
      this.reportError(error);
    } finally {
      this.pending = null;
      if (!this.stopped) this.schedule(this.delayMs);
    }
  }

  private async readNewContent(): Promise<void> {
    let handle: FileHandle;
    try {
      handle = await fs.promises.open(this.file, 'r');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return;
      throw error;
    }

    try {
      const { size } = await handle.stat();
      if (size < this.position) {
        // Truncated or replaced: start over.
        this.position = 0;
        this.remainder = '';
        this.decoder = new StringDecoder('utf8');
      }
      if (size === this.position) return;

      const buffer = Buffer.alloc(size - this.position);
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, this.position);
      this.position += bytesRead;
      this.consume(this.decoder.write(buffer.subarray(0, bytesRead)));
    } finally {
      await handle.close();
    }
  }

  private consume(text: string) {
    const parts = (this.remainder + text).split(LINE_BREAK);
    this.remainder = parts.pop() ?? '';
    for (const part of parts) this.emit(part);
  }

  private emit(line: string) {
    try {
      this.handler.line(line);
    } catch (error) {
      this.reportError(error);
    }
  }

  private reportError(error: unknown) {
    if (this.handler.error) {
      this.handler.error(error);
    } else {
      console.warn(`⚠️ Log tailer error on ${this.file}:`, error);
    }
  }
}
