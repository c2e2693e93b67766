import { spawn } from 'child_process';
import fs from 'fs';
import type { FileHandle } from 'fs/promises';
import { logErrorDetails } from './detection-utils';
import { LogTailer } from './log-tailer';
import { PredictLogListener, progressToLogger } from './progress-listener';
import type { ProgressEvent, RunContext } from './types';

export type RunProcessOptions = {
  tokens: string[];
  /** stdout and stderr are appended here */
  logFile: string;
  /** Units the log is expected to report, one "image i/n" line each */
  total: number;
  ctx: RunContext;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Defaults to forwarding progress and log lines to `ctx.logger` */
  onEvent?: (event: ProgressEvent) => void;
  /** Called once the child process has started */
  onSpawn?: () => void;
  tailDelayMs?: number;
};

export type ProcessOutcome = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
};

/**
 * Runs a command with its output appended to `logFile` while a tailer
 * follows that file. Rejects on spawn failure (ENOENT, EACCES) or abort;
 * the exit code is returned, not judged. The tailer is stopped and the log
 * closed on every path.
 */
export async function runProcess(options: RunProcessOptions): Promise<ProcessOutcome> {
  const { tokens, logFile, total, ctx } = options;
  const [command, ...args] = tokens;
  if (!command) throw new Error('Empty command line.');

  const listener = new PredictLogListener(total, options.onEvent ?? progressToLogger(ctx.logger));
  const tailer = new LogTailer(
    logFile,
    {
      line: (line) => listener.handle(line),
      error: (error) => logErrorDetails(ctx.logger, '⚠️ Could not read log file. ', error),
    },
    { delayMs: options.tailDelayMs }
  );
  tailer.start();

  let log: FileHandle | null = null;
  try {
    log = await fs.promises.open(logFile, 'a');
    const fd = log.fd;

    return await new Promise<ProcessOutcome>((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env,
        stdio: ['ignore', fd, fd],
        signal: ctx.signal,
      });
      child.once('spawn', () => options.onSpawn?.());
      child.once('error', reject);
      child.once('close', (exitCode, signal) => resolve({ exitCode, signal }));
    });
  } finally {
    await log?.close();
    await tailer.stop();
  }
}
