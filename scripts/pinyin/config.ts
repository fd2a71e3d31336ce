import { isAbsolute, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { CJK_UNIFIED_END, CJK_UNIFIED_START, assertRange } from './assemble';
import { ConfigError } from './errors';

export type BuildMode = 'sample' | 'production';

export interface BuildOptions {
  mode: BuildMode;
  force: boolean;
  start: number;
  end: number;
  outputPath: string;
  gzip: boolean;
  sqlite: boolean;
  progressInterval: number;
}

export type BuildEnv = Partial<Record<string, string>>;

export const LOG_TAG = '[pinyin:build]';

export const OUTPUT_DIR = fileURLToPath(new URL('../../resources/pinyin/', import.meta.url));
export const DEFAULT_OUTPUT_PATH = join(OUTPUT_DIR, 'pinyin_database.json');
const DEFAULT_PROGRESS_INTERVAL = 1000;

const parseCodePoint = (raw: string, label: string): number => {
  const trimmed = raw.trim().replace(/^(u\+|0x)/i, '');
  if (!/^[0-9a-f]+$/i.test(trimmed)) {
    throw new ConfigError(`Invalid ${label} code point "${raw}"; expected hex such as 4e00`);
  }
  return Number.parseInt(trimmed, 16);
};

const parsePositiveInteger = (raw: string, label: string): number => {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`Invalid ${label} "${raw}"; expected a positive integer`);
  }
  return value;
};

const toOutputPath = (raw: string): string => {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new ConfigError('Output path must not be empty');
  }
  return isAbsolute(trimmed) ? trimmed : resolve(process.cwd(), trimmed);
};

/**
 * Reads `--flag` and `--key=value` arguments over env overrides over the
 * defaults. Env only reaches the range and the output path.
 */
export const resolveBuildOptions = (args: string[] = process.argv.slice(2), env: BuildEnv = process.env): BuildOptions => {
  const options: BuildOptions = {
    mode: 'production',
    force: false,
    start: env.PINYIN_DB_START ? parseCodePoint(env.PINYIN_DB_START, 'PINYIN_DB_START') : CJK_UNIFIED_START,
    end: env.PINYIN_DB_END ? parseCodePoint(env.PINYIN_DB_END, 'PINYIN_DB_END') : CJK_UNIFIED_END,
    outputPath: env.PINYIN_DB_OUT ? toOutputPath(env.PINYIN_DB_OUT) : DEFAULT_OUTPUT_PATH,
    gzip: false,
    sqlite: false,
    progressInterval: DEFAULT_PROGRESS_INTERVAL
  };

  args.forEach((arg) => {
    if (arg === '--sample') {
      options.mode = 'sample';
      return;
    }
    if (arg === '--force') {
      options.force = true;
      return;
    }
    if (arg === '--gzip') {
      options.gzip = true;
      return;
    }
    if (arg === '--sqlite') {
      options.sqlite = true;
      return;
    }
    if (arg.startsWith('--start=')) {
      options.start = parseCodePoint(arg.substring('--start='.length), '--start');
      return;
    }
    if (arg.startsWith('--end=')) {
      options.end = parseCodePoint(arg.substring('--end='.length), '--end');
      return;
    }
    if (arg.startsWith('--out=')) {
      options.outputPath = toOutputPath(arg.substring('--out='.length));
      return;
    }
    if (arg.startsWith('--progress=')) {
      options.progressInterval = parsePositiveInteger(arg.substring('--progress='.length), '--progress');
      return;
    }
    console.warn(`${LOG_TAG} Ignoring unknown argument "${arg}".`);
  });

  assertRange({ start: options.start, end: options.end });
  return options;
};
