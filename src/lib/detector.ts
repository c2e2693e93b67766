/**
 * Runs an external YOLO predictor over every time point of an image and
 * reads its results back as calibrated detections.
 *
 * A run stages the crop as one TIFF per frame in a private temp folder,
 * launches the predictor with its output appended to a log file (tailed
 * for progress), then ingests the per-frame label files it leaves behind.
 * The exit code of the predictor is not checked: the result files are the
 * signal.
 */
import fs from 'fs';
import path from 'path';
import { annotateFrame } from './annotator';
import { DetectionCollection } from './detection-collection';
import { errorCode, logErrorDetails } from './detection-utils';
import { checkInterval, FRAME_EXTENSION, frameCount, frameName, resaveSingleTimePoints } from './frame-exporter';
import { VOID_LOGGER } from './logger';
import type { RunConfiguration } from './predict-command';
import { runProcess } from './process-runner';
import { ingestResults, RESULTS_SUBFOLDER } from './result-ingestor';
import { ImageStackSchema } from './types';
import type { CropInterval, ImageStack, RunContext, RunState } from './types';
import { Workspace } from './workspace';

// ==========================================
// CONSTANTS
// ==========================================

export const BASE_ERROR_MESSAGE = '[YOLO] ';
export const WORKSPACE_PREFIX = 'yolo-frames-imgs_';
export const OUTPUT_FOLDER_NAME = 'output';
export const LOG_FILENAME = 'yolo-predict.log';

const STATUS_TEXT: Record<RunState, string> = {
  idle: 'Idle',
  staging: 'Resaving source image',
  configuring: 'Checking predictor configuration',
  launching: 'Launching predictor',
  running: 'Running predictor',
  ingesting: 'Importing detections',
  done: 'Done',
  failed: 'Failed',
};

// ==========================================
// TYPES
// ==========================================

export type YoloDetectorOptions = {
  image: ImageStack;
  interval: CropInterval;
  command: RunConfiguration;
  context?: RunContext;
  /** Index the predictor gives the first result file (default: 0) */
  frameIndexBase?: 0 | 1;
  ingestConcurrency?: number;
  /** Parent of the temp workspace (default: os.tmpdir()) */
  tmpRoot?: string;
  /** Leave the workspace on disk after the run */
  keepWorkspace?: boolean;
  /** Write `<t>.png` overlays of the detections here */
  annotatedOutputDir?: string;
  tailDelayMs?: number;
};

// ==========================================
// CLASS
// ==========================================

export class YoloDetector {
  private readonly options: YoloDetectorOptions;
  private readonly ctx: RunContext;
  private state: RunState = 'idle';
  private errorMessage: string | null = null;
  private processingTime = 0;
  private output = new DetectionCollection();
  private workspace: Workspace | null = null;

  constructor(options: YoloDetectorOptions) {
    this.options = options;
    this.ctx = options.context ?? { logger: VOID_LOGGER };
  }

  getResult(): DetectionCollection {
    return this.output;
  }

  getErrorMessage(): string | null {
    return this.errorMessage;
  }

  /** Milliseconds spent in the last `process()` call, failed or not. */
  getProcessingTime(): number {
    return this.processingTime;
  }

  getState(): RunState {
    return this.state;
  }

  /** Root of the last run's workspace, if one was created. */
  getWorkspacePath(): string | null {
    return this.workspace?.root ?? null;
  }

  checkInput(): boolean {
    const problem = this.inputProblem();
    if (problem !== null) {
      this.errorMessage = BASE_ERROR_MESSAGE + problem;
      return false;
    }
    return true;
  }

  async process(): Promise<boolean> {
    this.errorMessage = null;
    this.output = new DetectionCollection();
    this.workspace = null;
    const startTime = Date.now();

    try {
      return await this.run();
    } finally {
      this.processingTime = Date.now() - startTime;
      await this.releaseWorkspace();
    }
  }

  // ==========================================
  // STATE MACHINE
  // ==========================================

  private async run(): Promise<boolean> {
    const { image, interval, command } = this.options;
    const { logger } = this.ctx;

    // Staging
    this.transition('staging');
    if (this.ctx.signal?.aborted) return this.fail('Run aborted.');
    const problem = this.inputProblem();
    if (problem !== null) return this.fail(problem);

    let workspace: Workspace;
    try {
      workspace = await Workspace.create(WORKSPACE_PREFIX, this.options.tmpRoot);
      this.workspace = workspace;
    } catch (error) {
      return this.fail(`Could not create temp folder to save input image:\n${messageOf(error)}`);
    }

    logger.log(`Saving source image to ${workspace.root}\n`);
    const staged = await resaveSingleTimePoints(image, interval, workspace.root, this.ctx);
    if (!staged) {
      if (this.ctx.signal?.aborted) return this.fail('Run aborted.');
      return this.fail(`Problem saving image frames to ${workspace.root}\n`);
    }

    // Configuring
    this.transition('configuring');
    const outputFolder = workspace.resolve(OUTPUT_FOLDER_NAME);
    command.setInputFolder(workspace.root);
    command.setOutputFolder(outputFolder);
    const invalid = command.validate();
    if (invalid !== null) return this.fail(invalid);

    // Launching -> Running
    this.transition('launching');
    const commandName = command.commandName();
    const logFile = workspace.resolve(LOG_FILENAME);
    try {
      const tokens = command.buildCommandTokens();
      logger.log(`Running ${commandName} with args:\n${tokens.join(' ')}\n`);

      const outcome = await runProcess({
        tokens,
        logFile,
        total: frameCount(image, interval),
        ctx: this.ctx,
        cwd: workspace.root,
        tailDelayMs: this.options.tailDelayMs,
        onSpawn: () => this.transition('running'),
      });
      logger.log(
        `${commandName} finished (exit code ${outcome.exitCode ?? 'none'}${outcome.signal ? `, signal ${outcome.signal}` : ''}).\n`
      );
    } catch (error) {
      if (this.ctx.signal?.aborted) return this.fail('Run aborted.');
      return this.fail(await this.describeRunFailure(commandName, error, logFile));
    }

    // Ingesting
    this.transition('ingesting');
    try {
      const files = await ingestResults({
        labelsFolder: path.join(outputFolder, RESULTS_SUBFOLDER),
        interval,
        calibration: image.calibration,
        collection: this.output,
        ctx: this.ctx,
        frameIndexBase: this.options.frameIndexBase,
        concurrency: this.options.ingestConcurrency,
      });
      logger.log(`✅ Imported ${this.output.count()} detections from ${files} result files.\n`);
    } catch (error) {
      logErrorDetails(logger, `${BASE_ERROR_MESSAGE}Could not read the results folder. `, error);
    }

    if (this.options.annotatedOutputDir) {
      await this.annotate(workspace, this.options.annotatedOutputDir);
    }

    this.transition('done');
    return true;
  }

  private inputProblem(): string | null {
    const parsed = ImageStackSchema.safeParse(this.options.image);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.length ? `${issue.path.join('.')}: ` : '';
      return `Invalid input: ${where}${issue?.message ?? 'invalid image'}`;
    }
    const reason = checkInterval(this.options.image, this.options.interval);
    return reason ? `Invalid input: ${reason}` : null;
  }

  private transition(state: RunState) {
    this.state = state;
    this.ctx.logger.setStatus(STATUS_TEXT[state]);
  }

  private fail(message: string): false {
    this.errorMessage = BASE_ERROR_MESSAGE + message;
    this.transition('failed');
    return false;
  }

  private async describeRunFailure(commandName: string, error: unknown, logFile: string): Promise<string> {
    let message = `Problem running ${commandName}:\n`;
    message += errorCode(error) === 'EACCES'
      ? 'The executable does not have the file permission to run.\n'
      : messageOf(error);

    const log = await fs.promises.readFile(logFile, 'utf-8').catch((readError: unknown) => {
      logErrorDetails(this.ctx.logger, 'Could not read the predictor log. ', readError);
      return null;
    });
    if (log !== null) message += '\n' + log;
    return message;
  }

  // ==========================================
  // OUTPUT
  // ==========================================

  private async annotate(workspace: Workspace, outputDir: string) {
    const { interval, image } = this.options;
    const { logger } = this.ctx;

    try {
      await fs.promises.mkdir(outputDir, { recursive: true });
    } catch (error) {
      logErrorDetails(logger, `⚠️ Could not create ${outputDir}. `, error);
      return;
    }

    let written = 0;
    for (const frame of this.output.frames()) {
      const framePath = workspace.resolve(frameName(frame) + FRAME_EXTENSION);
      if (!fs.existsSync(framePath)) continue;
      try {
        await annotateFrame({
          framePath,
          detections: this.output.get(frame) ?? [],
          interval,
          calibration: image.calibration,
          outputPath: path.join(outputDir, `${frameName(frame)}.png`),
        });
        written++;
      } catch (error) {
        logErrorDetails(logger, `⚠️ Annotation of frame ${frame} failed. `, error);
      }
    }
    logger.log(`📂 Wrote ${written} annotated frames to ${outputDir}\n`);
  }

  private async releaseWorkspace() {
    const workspace = this.workspace;
    if (!workspace) return;

    if (this.options.keepWorkspace) {
      workspace.keep();
      this.ctx.logger.log(`Workspace kept at ${workspace.root}\n`);
      return;
    }
    try {
      await workspace.dispose();
    } catch (error) {
      logErrorDetails(this.ctx.logger, `⚠️ Could not remove ${workspace.root}. `, error);
    }
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
