/**
 * Shared utilities for the detection run
 */
import type { CropInterval, Range, RunLogger } from './types';

// ==========================================
// GEOMETRY HELPERS
// ==========================================

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Number of pixels covered by an inclusive range. */
export function rangeSize(range: Range): number {
  return range[1] - range[0] + 1;
}

export function cropSize(interval: CropInterval): { width: number; height: number } {
  return { width: rangeSize(interval.x), height: rangeSize(interval.y) };
}

// ==========================================
// ERROR HANDLING
// ==========================================

/** Read on every call, so a `.env` loaded after import still applies. */
export function debugErrorsEnabled(): boolean {
  const flag = process.env.DEBUG_ERRORS;
  return flag === '1' || flag === 'true' || flag === 'yes';
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

/** Error `code` as set by Node's system errors (ENOENT, EACCES, ...). */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    if (typeof code === 'string') return code;
  }
  return undefined;
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    const parts: string[] = [];
    parts.push(`${error.name || 'Error'}: ${error.message || String(error)}`);
    const code = errorCode(error);
    if (code) parts.push(`code=${code}`);
    if (error.cause) {
      parts.push(`cause=${formatError(error.cause)}`);
    }
    return parts.join(' | ');
  }
  return safeStringify(error);
}

export function logErrorDetails(logger: RunLogger, prefix: string, error: unknown): void {
  logger.error(prefix + formatError(error));
  if (debugErrorsEnabled() && error instanceof Error && error.stack) {
    logger.error(error.stack);
  }
}
