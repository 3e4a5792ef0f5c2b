import {
  DEFAULT_BASE_OUTPUT,
  DEFAULT_FRAME_EXTENSIONS,
  type GenerateScanimationInput,
} from '../application/scanimation/index.js';
import { RESIZE_STRATEGIES, STRIPE_DIRECTIONS } from '../domain/scanimation/index.js';
import type { PostPassMode, ResizeStrategy, StripeDirection } from '../domain/scanimation/index.js';

export interface CliOptions {
  dir: string;
  recursive: boolean;
  exts: string[];
  slice: number;
  direction: StripeDirection;
  resize: ResizeStrategy;
  outBase: string;
  outMask?: string;
  whiteBg: boolean;
  forceRgb: boolean;
  fromGif?: string;
  help: boolean;
}

export const USAGE = `Usage: scanimate [options]

Generate a scanimation base (and optional grille mask) from frames.

  --dir <folder>         Folder containing frames (default: .)
  --recursive            Recurse into subfolders
  --exts <list>          Comma-separated extensions (default: ${DEFAULT_FRAME_EXTENSIONS.join(',')})
  --from-gif <file>      Use the frames of an animated GIF instead of a folder
  --slice <px>           Stripe / slit size in pixels (default: 1)
  --direction <dir>      vertical (left-right slide) or horizontal (up-down slide)
  --resize <mode>        first = match first frame, min = smallest width/height
  --out-base <file>      Output file for the interlaced base (default: ${DEFAULT_BASE_OUTPUT})
  --out-mask <file>      Also export the periodic grille mask (.png or .webp)
  --white-bg             Composite onto a solid white background
  --force-rgb            Drop the alpha channel without blending
  --help                 Show this message
`;

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    dir: '.',
    recursive: false,
    exts: [...DEFAULT_FRAME_EXTENSIONS],
    slice: 1,
    direction: 'vertical',
    resize: 'first',
    outBase: DEFAULT_BASE_OUTPUT,
    whiteBg: false,
    forceRgb: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';
    const takeValue = (): string => {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new Error(`Missing value for ${arg}`);
      }
      i += 1;
      return next;
    };

    switch (arg) {
      case '--dir':
        options.dir = takeValue();
        break;
      case '--recursive':
        options.recursive = true;
        break;
      case '--exts':
        options.exts = takeValue()
          .split(',')
          .map((ext) => ext.trim())
          .filter((ext) => ext.length > 0);
        break;
      case '--from-gif':
        options.fromGif = takeValue();
        break;
      case '--slice':
        options.slice = Number(takeValue());
        break;
      case '--direction':
        options.direction = oneOf(STRIPE_DIRECTIONS, takeValue(), arg);
        break;
      case '--resize':
        options.resize = oneOf(RESIZE_STRATEGIES, takeValue(), arg);
        break;
      case '--out-base':
        options.outBase = takeValue();
        break;
      case '--out-mask':
        options.outMask = takeValue();
        break;
      case '--white-bg':
        options.whiteBg = true;
        break;
      case '--force-rgb':
        options.forceRgb = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

export function resolvePostPass(options: Pick<CliOptions, 'whiteBg' | 'forceRgb'>): PostPassMode {
  if (options.whiteBg) {
    return 'white-background';
  }

  return options.forceRgb ? 'drop-alpha' : 'none';
}

export function toCommandInput(options: CliOptions, id: string): GenerateScanimationInput {
  return {
    id,
    source: options.fromGif
      ? { type: 'animatedGif', path: options.fromGif }
      : { type: 'directory', path: options.dir, recursive: options.recursive, extensions: options.exts },
    options: {
      sliceSize: options.slice,
      direction: options.direction,
      resize: options.resize,
      postPass: resolvePostPass(options),
    },
    output: {
      basePath: options.outBase,
      maskPath: options.outMask,
    },
  };
}

function oneOf<T extends string>(values: readonly T[], value: string, flag: string): T {
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`${flag} must be one of: ${values.join(', ')}`);
  }

  return match;
}
