import fs from 'fs';
import { z } from 'zod';

// ==========================================
// RUN CONFIGURATION
// ==========================================

/**
 * What the detector needs from a command configuration. Folder paths are
 * set by the detector before `validate()` is called.
 */
export interface RunConfiguration {
  setInputFolder(folder: string): void;
  setOutputFolder(folder: string): void;
  /** Null when the command is ready to run. */
  validate(): string | null;
  commandName(): string;
  buildCommandTokens(): string[];
}

// ==========================================
// SCHEMAS
// ==========================================

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.25;
export const DEFAULT_IOU_THRESHOLD = 0.7;

export const PredictSettingsSchema = z.object({
  executable: z.string().min(1).default('yolo'),
  condaEnvironment: z.string().min(1).optional(),
  modelPath: z.string(),
  confidenceThreshold: z
    .number()
    .min(0)
    .max(1)
    .default(DEFAULT_CONFIDENCE_THRESHOLD)
    .describe('Detections below this confidence are discarded'),
  iouThreshold: z
    .number()
    .min(0)
    .max(1)
    .default(DEFAULT_IOU_THRESHOLD)
    .describe('IoU threshold used by non-maximum suppression'),
  useGpu: z.boolean().default(false),
});

export type PredictSettings = z.infer<typeof PredictSettingsSchema>;
export type PredictSettingsInput = z.input<typeof PredictSettingsSchema>;

// ==========================================
// YOLO PREDICT
// ==========================================

function formatIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'Invalid settings.';
  const where = issue.path.length ? `${issue.path.join('.')}: ` : '';
  return `${where}${issue.message}`;
}

function pythonBool(value: boolean): string {
  return value ? 'True' : 'False';
}

/**
 * `yolo detect predict` with text output (`save_txt`, `save_conf`) and no
 * overlay images.
 */
export class YoloPredictCommand implements RunConfiguration {
  private readonly input: PredictSettingsInput;
  private readonly platform: NodeJS.Platform;
  private inputFolder: string | null = null;
  private outputFolder: string | null = null;

  constructor(settings: PredictSettingsInput, platform: NodeJS.Platform = process.platform) {
    this.input = settings;
    this.platform = platform;
  }

  setInputFolder(folder: string): void {
    this.inputFolder = folder;
  }

  setOutputFolder(folder: string): void {
    this.outputFolder = folder;
  }

  getInputFolder(): string | null {
    return this.inputFolder;
  }

  getOutputFolder(): string | null {
    return this.outputFolder;
  }

  /** Parsed settings with defaults filled in; throws on invalid input. */
  get settings(): PredictSettings {
    return PredictSettingsSchema.parse(this.input);
  }

  validate(): string | null {
    const parsed = PredictSettingsSchema.safeParse(this.input);
    if (!parsed.success) return `Invalid settings: ${formatIssue(parsed.error)}`;
    if (!this.inputFolder) return 'Input image folder path is not set.';
    if (!this.outputFolder) return 'Output folder is not set.';

    const { modelPath } = parsed.data;
    if (!modelPath.trim()) return 'Path to a YOLO model is not set.';
    if (!fs.existsSync(modelPath)) return `Model file does not exist: ${modelPath}`;
    return null;
  }

  commandName(): string {
    return `${this.settings.executable} detect predict`;
  }

  buildCommandTokens(): string[] {
    const settings = this.settings;
    const device = settings.useGpu ? (this.platform === 'darwin' ? 'mps' : 'cuda') : 'cpu';

    const tokens = [
      settings.executable,
      'detect',
      'predict',
      `model=${settings.modelPath}`,
      `conf=${settings.confidenceThreshold}`,
      `iou=${settings.iouThreshold}`,
      `source=${this.inputFolder ?? ''}`,
      `project=${this.outputFolder ?? ''}`,
      `device=${device}`,
      `save_txt=${pythonBool(true)}`,
      `save_conf=${pythonBool(true)}`,
      `save=${pythonBool(false)}`,
    ];

    if (settings.condaEnvironment) {
      return ['conda', 'run', '--no-capture-output', '-n', settings.condaEnvironment, ...tokens];
    }
    return tokens;
  }
}
