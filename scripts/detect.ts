#!/usr/bin/env npx tsx
/**
 * CLI wrapper for running a YOLO predictor over every frame of an image
 */
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { YoloDetector } from '../src/lib/detector';
import { createConsoleLogger } from '../src/lib/logger';
import { loadImageStack } from '../src/lib/load-image';
import { YoloPredictCommand } from '../src/lib/predict-command';
import type { PredictSettings } from '../src/lib/predict-command';
import { DEFAULT_INGEST_CONCURRENCY } from '../src/lib/result-ingestor';
import type { CropInterval, Range } from '../src/lib/types';

dotenv.config();

// Defaults from environment
const DEFAULT_EXECUTABLE = process.env.YOLO_EXECUTABLE || 'yolo';
const DEFAULT_CONDA_ENV = process.env.YOLO_CONDA_ENV || undefined;
const DEFAULT_MODEL = process.env.YOLO_MODEL || '';
const DEFAULT_CONF = Number(process.env.YOLO_CONF || 0.25);
const DEFAULT_IOU = Number(process.env.YOLO_IOU || 0.7);
const DEFAULT_USE_GPU = process.env.USE_GPU === '1' || process.env.USE_GPU === 'true';
const DEFAULT_CONCURRENCY = Number(process.env.INGEST_CONCURRENCY || DEFAULT_INGEST_CONCURRENCY);

function printHelp() {
  console.log(`
Usage: npx tsx scripts/detect.ts -i <image> -o <output.json> [options]

Runs "yolo detect predict" on every frame of an image (multi-page TIFF
stacks become time series) and writes the detections as JSON.

Options:
  -i, --image <path>          Input image path
  -o, --output <path>         Output JSON path (default: <image>.detections.json)
      --model <path>          YOLO model file (default: $YOLO_MODEL)
      --conf <0-1>            Confidence threshold (default: ${DEFAULT_CONF})
      --iou <0-1>             IoU threshold for NMS (default: ${DEFAULT_IOU})
      --gpu / --cpu           Run on GPU (cuda, mps on macOS) or CPU (default: ${DEFAULT_USE_GPU ? 'gpu' : 'cpu'})
      --executable <cmd>      Predictor command (default: ${DEFAULT_EXECUTABLE})
      --conda-env <name>      Run the predictor inside a conda environment
      --pixel-size <x[,y]>    Physical pixel size (default: 1)
      --crop <x0,y0,x1,y1>    Inclusive pixel crop (default: full image)
      --frames <t0,t1>        Inclusive frame range (default: all)
      --frame-base <0|1>      Index of the first result file (default: 0)
      --concurrency <n>       Result files parsed in parallel (default: ${DEFAULT_CONCURRENCY})
      --annotate <dir>        Write annotated frames to this folder
      --keep-workspace        Keep the temp folder for inspection
      --force                 Overwrite an existing output file
  -h, --help                  Show help
`);
}

function fail(message: string): never {
  console.error(`❌ ${message}`);
  process.exit(1);
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (!value || value.startsWith('-')) {
    fail(`Missing value for ${flag}`);
  }
  return value;
}

function parseNumbers(value: string, flag: string, count: number[]): number[] {
  const parts = value.split(',').map((v) => Number(v.trim()));
  if (!count.includes(parts.length) || parts.some((n) => !Number.isFinite(n))) {
    fail(`Invalid value for ${flag}: ${value}`);
  }
  return parts;
}

function parseUnit(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0 || n > 1) {
    fail(`Invalid value for ${flag}: ${value} (must be 0-1)`);
  }
  return n;
}

type CLIConfig = {
  imagePath: string;
  outputFile: string;
  settings: PredictSettings;
  pixelSize: { x: number; y: number };
  crop: [number, number, number, number] | null;
  frames: Range | null;
  frameIndexBase: 0 | 1;
  concurrency: number;
  annotateDir: string | null;
  keepWorkspace: boolean;
  force: boolean;
};

function parseArgs(): CLIConfig {
  const args = process.argv.slice(2);
  const config: CLIConfig = {
    imagePath: '',
    outputFile: '',
    settings: {
      executable: DEFAULT_EXECUTABLE,
      condaEnvironment: DEFAULT_CONDA_ENV,
      modelPath: DEFAULT_MODEL,
      confidenceThreshold: DEFAULT_CONF,
      iouThreshold: DEFAULT_IOU,
      useGpu: DEFAULT_USE_GPU,
    },
    pixelSize: { x: 1, y: 1 },
    crop: null,
    frames: null,
    frameIndexBase: 0,
    concurrency: DEFAULT_CONCURRENCY,
    annotateDir: null,
    keepWorkspace: false,
    force: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-i':
      case '--image':
        config.imagePath = requireValue(args, i, arg);
        i++;
        break;
      case '-o':
      case '--output':
        config.outputFile = requireValue(args, i, arg);
        i++;
        break;
      case '--model':
        config.settings.modelPath = requireValue(args, i, arg);
        i++;
        break;
      case '--conf':
        config.settings.confidenceThreshold = parseUnit(requireValue(args, i, arg), arg);
        i++;
        break;
      case '--iou':
        config.settings.iouThreshold = parseUnit(requireValue(args, i, arg), arg);
        i++;
        break;
      case '--gpu':
        config.settings.useGpu = true;
        break;
      case '--cpu':
        config.settings.useGpu = false;
        break;
      case '--executable':
        config.settings.executable = requireValue(args, i, arg);
        i++;
        break;
      case '--conda-env':
        config.settings.condaEnvironment = requireValue(args, i, arg);
        i++;
        break;
      case '--pixel-size': {
        const [x, y = x] = parseNumbers(requireValue(args, i, arg), arg, [1, 2]);
        if (x <= 0 || y <= 0) fail(`Invalid value for ${arg}: must be positive`);
        config.pixelSize = { x, y };
        i++;
        break;
      }
      case '--crop': {
        const [x0, y0, x1, y1] = parseNumbers(requireValue(args, i, arg), arg, [4]);
        config.crop = [x0, y0, x1, y1];
        i++;
        break;
      }
      case '--frames': {
        const [t0, t1] = parseNumbers(requireValue(args, i, arg), arg, [2]);
        config.frames = [t0, t1];
        i++;
        break;
      }
      case '--frame-base': {
        const value = requireValue(args, i, arg);
        if (value !== '0' && value !== '1') fail(`Invalid value for ${arg}: ${value} (must be 0 or 1)`);
        config.frameIndexBase = value === '1' ? 1 : 0;
        i++;
        break;
      }
      case '--concurrency': {
        const value = Number(requireValue(args, i, arg));
        if (!Number.isInteger(value) || value < 1 || value > 32) {
          fail(`Invalid value for ${arg}: ${args[i + 1]} (must be 1-32)`);
        }
        config.concurrency = value;
        i++;
        break;
      }
      case '--annotate':
        config.annotateDir = requireValue(args, i, arg);
        i++;
        break;
      case '--keep-workspace':
        config.keepWorkspace = true;
        break;
      case '--force':
        config.force = true;
        break;
      case '-h':
      case '--help':
        printHelp();
        process.exit(0);
      default:
        if (arg.startsWith('-')) {
          console.warn(`⚠️ Unknown argument ignored: ${arg}`);
        } else if (!config.imagePath) {
          config.imagePath = arg;
        }
    }
  }

  if (!config.imagePath) {
    fail(`No input specified.\n   Usage: npx tsx scripts/detect.ts -i <image> -o <output.json>`);
  }
  if (!fs.existsSync(config.imagePath)) {
    fail(`Image not found: ${config.imagePath}`);
  }
  if (!config.outputFile) {
    config.outputFile = config.imagePath.replace(/\.[^.]+$/, '') + '.detections.json';
  }
  if (fs.existsSync(config.outputFile) && !config.force) {
    fail(`Output file already exists: ${config.outputFile}\n   Use --force to overwrite.`);
  }

  return config;
}

async function main() {
  const config = parseArgs();

  console.log(`🚀 Starting YOLO detection...`);
  console.log(`   Input:  ${config.imagePath}`);
  console.log(`   Output: ${config.outputFile}`);

  const image = await loadImageStack(config.imagePath, { pixelSize: config.pixelSize });
  const width = image.shape[image.axes.indexOf('X')];
  const height = image.shape[image.axes.indexOf('Y')];
  const tIndex = image.axes.indexOf('T');
  const nFrames = tIndex < 0 ? 1 : image.shape[tIndex];
  console.log(`   Image:  ${width}x${height}, ${nFrames} frame(s)`);

  const interval: CropInterval = {
    x: config.crop ? [config.crop[0], config.crop[2]] : [0, width - 1],
    y: config.crop ? [config.crop[1], config.crop[3]] : [0, height - 1],
  };
  if (config.frames) interval.t = config.frames;

  const command = new YoloPredictCommand(config.settings);
  const detector = new YoloDetector({
    image,
    interval,
    command,
    context: { logger: createConsoleLogger({ prefix: '[yolo]' }) },
    frameIndexBase: config.frameIndexBase,
    ingestConcurrency: config.concurrency,
    keepWorkspace: config.keepWorkspace,
    annotatedOutputDir: config.annotateDir ?? undefined,
  });

  if (!detector.checkInput()) {
    fail(detector.getErrorMessage() ?? 'Invalid input.');
  }

  const ok = await detector.process();
  if (!ok) {
    fail(detector.getErrorMessage() ?? 'Detection failed.');
  }

  const result = detector.getResult();
  const outputPayload = {
    strategy: 'yolo-predict',
    image_path: config.imagePath,
    command: command.commandName(),
    settings: command.settings,
    interval,
    calibration: image.calibration,
    frames: result.toJSON(),
    detection_count: result.count(),
    processing_time_ms: detector.getProcessingTime(),
    generated_at: new Date().toISOString(),
  };

  const outputDir = path.dirname(config.outputFile);
  fs.mkdirSync(outputDir, { recursive: true });
  fs.writeFileSync(config.outputFile, JSON.stringify(outputPayload, null, 2));

  console.log(`\n✅ Found ${result.count()} detections in ${result.size} frames.`);
  console.log(`   Finished in ${(detector.getProcessingTime() / 1000).toFixed(1)} s.`);
  console.log(`\n📂 Output written to ${config.outputFile}`);
}

main().catch((error: unknown) => {
  console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
});
