import type { LookupError } from './errors';
import type { HanCharacter, PinyinFormat, ReadingsResolver } from './types';

export type ReadingsOutcome = { ok: true; readings: string[] } | { ok: false; error: LookupError };

/**
 * Resolves one character in one format and collapses exact duplicates.
 * Distinct readings stay in the order the resolver first reported them.
 */
export const dedupeReadings = (
  resolver: ReadingsResolver,
  character: HanCharacter,
  format: PinyinFormat
): ReadingsOutcome => {
  const resolution = resolver.resolve(character, format);
  if (resolution.kind === 'failure') {
    return { ok: false, error: resolution.error };
  }
  if (resolution.kind === 'empty') {
    return { ok: true, readings: [] };
  }

  const unique = new Set<string>();
  resolution.readings.forEach((reading) => {
    if (reading) {
      unique.add(reading);
    }
  });
  return { ok: true, readings: Array.from(unique) };
};
