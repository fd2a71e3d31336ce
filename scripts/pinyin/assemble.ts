import { ConfigError, LookupError } from './errors';
import { DEFAULT_FORMATS } from './formats';
import { buildCharacterRecord } from './record';
import type { CodePointRange, FormatPair, HanCharacter, PinyinDatabase, ReadingsResolver, Resolution } from './types';

export const CJK_UNIFIED_START = 0x4e00;
export const CJK_UNIFIED_END = 0x9fff;

export const CJK_UNIFIED_RANGE: CodePointRange = Object.freeze({
  start: CJK_UNIFIED_START,
  end: CJK_UNIFIED_END
});

export const CJK_UNIFIED_SIZE = CJK_UNIFIED_END - CJK_UNIFIED_START + 1;

const DEFAULT_PROGRESS_INTERVAL = 1000;

export interface AssembleProgress {
  processed: number;
  total: number;
  recorded: number;
  character: HanCharacter;
}

export interface CharacterFailure {
  character: HanCharacter;
  error: LookupError;
}

export interface AssembleStats {
  start: number;
  end: number;
  scanned: number;
  recorded: number;
  skipped: number;
  failed: number;
}

export interface AssembleOptions {
  range?: CodePointRange;
  formats?: FormatPair;
  progressInterval?: number;
  onProgress?: (progress: AssembleProgress) => void;
  onFailure?: (failure: CharacterFailure) => void;
}

export interface AssembleResult {
  database: PinyinDatabase;
  stats: AssembleStats;
  failures: CharacterFailure[];
}

export const formatCodePoint = (codePoint: number): string =>
  `U+${codePoint.toString(16).toUpperCase().padStart(4, '0')}`;

export const isInCjkUnifiedBlock = (codePoint: number): boolean =>
  Number.isInteger(codePoint) && codePoint >= CJK_UNIFIED_START && codePoint <= CJK_UNIFIED_END;

export const assertRange = (range: CodePointRange): CodePointRange => {
  if (!isInCjkUnifiedBlock(range.start) || !isInCjkUnifiedBlock(range.end)) {
    throw new ConfigError(
      `Range ${formatCodePoint(range.start)}-${formatCodePoint(range.end)} falls outside ` +
        `${formatCodePoint(CJK_UNIFIED_START)}-${formatCodePoint(CJK_UNIFIED_END)}`
    );
  }
  if (range.start > range.end) {
    throw new ConfigError(`Range start ${formatCodePoint(range.start)} is after end ${formatCodePoint(range.end)}`);
  }
  return range;
};

export const toCharacter = (codePoint: number): HanCharacter => {
  if (!isInCjkUnifiedBlock(codePoint)) {
    throw new ConfigError(`${formatCodePoint(codePoint)} is not a CJK Unified Ideograph code point`);
  }
  return { codePoint, text: String.fromCodePoint(codePoint) };
};

// Resolvers may throw instead of returning a failure; either way the
// character is reported as failed and the scan goes on.
const containFailures = (resolver: ReadingsResolver): ReadingsResolver => ({
  resolve(character, format): Resolution {
    try {
      return resolver.resolve(character, format);
    } catch (error) {
      return {
        kind: 'failure',
        error: error instanceof LookupError ? error : new LookupError(character, format, error)
      };
    }
  }
});

/**
 * Scans the range once in ascending order and collects one record per
 * character that has readings in both formats. Lookup failures are counted
 * and handed to `onFailure`; they never stop the scan.
 */
export const assemblePinyinDatabase = (
  resolver: ReadingsResolver,
  options: AssembleOptions = {}
): AssembleResult => {
  const { start, end } = assertRange(options.range ?? CJK_UNIFIED_RANGE);
  const formats = options.formats ?? DEFAULT_FORMATS;
  const guarded = containFailures(resolver);
  const interval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
  if (!Number.isInteger(interval) || interval <= 0) {
    throw new ConfigError(`Progress interval must be a positive integer, got ${interval}`);
  }

  const database: PinyinDatabase = new Map();
  const failures: CharacterFailure[] = [];
  const total = end - start + 1;
  const stats: AssembleStats = { start, end, scanned: 0, recorded: 0, skipped: 0, failed: 0 };

  for (let codePoint = start; codePoint <= end; codePoint += 1) {
    const character = toCharacter(codePoint);
    const outcome = buildCharacterRecord(guarded, character, formats);
    stats.scanned += 1;

    switch (outcome.kind) {
      case 'record':
        database.set(character.text, outcome.record);
        stats.recorded += 1;
        break;
      case 'skipped':
        stats.skipped += 1;
        break;
      case 'failed': {
        const failure = { character, error: outcome.error };
        failures.push(failure);
        stats.failed += 1;
        options.onFailure?.(failure);
        break;
      }
    }

    if (options.onProgress && (stats.scanned % interval === 0 || stats.scanned === total)) {
      options.onProgress({ processed: stats.scanned, total, recorded: stats.recorded, character });
    }
  }

  return { database, stats, failures };
};
